import type { FastifyBaseLogger } from "fastify";
import type { IInstrumentation } from "../shared/instrumentation";
import type { PaymentQueryService } from "../services/payment-query.service";
import type { Payment, PaymentItem } from "../repositories/payment-repository";
import type { Cents } from "../shared/cents";
import type { YearMonth } from "../shared/year-month";
import { UseCase } from "../shared/use-case";
import { Either, failure, success } from "../shared/either";
import { isInvalidArgumentError } from "../shared/errors";

export type SortKey = "date" | "item-count";
export type SortOrder = "asc" | "desc";

export type RunPaymentReportRequest =
  | { report: "sorted"; by: SortKey; order: SortOrder }
  | { report: "month"; yearMonth: YearMonth }
  | { report: "current-month" }
  | { report: "last-days"; days: number }
  | { report: "single-item" }
  | { report: "products-current-month" }
  | { report: "month-total"; yearMonth: YearMonth }
  | { report: "month-discount"; yearMonth: YearMonth }
  | { report: "user-items"; email: string }
  | { report: "value-over"; threshold: number };

export type PaymentReport =
  | { kind: "payments"; payments: Payment[] }
  | { kind: "items"; items: PaymentItem[] }
  | { kind: "product-names"; names: string[] }
  | { kind: "amount"; amount: Cents };

export type RunPaymentReportResponse = Either<PaymentReport, { error: string }>;

const payments = (list: Payment[]): PaymentReport => ({
  kind: "payments",
  payments: list,
});

const amount = (value: Cents): PaymentReport => ({
  kind: "amount",
  amount: value,
});

export interface RunPaymentReportDeps {
  paymentQueryService: PaymentQueryService;
  logger: FastifyBaseLogger;
}

export class RunPaymentReport extends UseCase<
  RunPaymentReportRequest,
  RunPaymentReportResponse
> {
  serviceName = "run-payment-report";
  private readonly paymentQueryService: RunPaymentReportDeps["paymentQueryService"];

  constructor(deps: RunPaymentReportDeps) {
    super(deps.logger);
    this.paymentQueryService = deps.paymentQueryService;
  }

  async run(
    instrumentation: IInstrumentation,
    request: RunPaymentReportRequest
  ): Promise<RunPaymentReportResponse> {
    try {
      const report = await this.buildReport(request);
      instrumentation.logDebug("Report built", {
        report: request.report,
        kind: report.kind,
      });
      return success(report);
    } catch (error) {
      if (isInvalidArgumentError(error)) {
        instrumentation.logWarning("Report rejected", {
          argument: error.argument,
          error: error.message,
        });
        return failure({ error: error.message });
      }
      throw error;
    }
  }

  private async buildReport(
    request: RunPaymentReportRequest
  ): Promise<PaymentReport> {
    const service = this.paymentQueryService;
    switch (request.report) {
      case "sorted":
        return payments(await this.sorted(request.by, request.order));
      case "month":
        return payments(await service.forMonth(request.yearMonth));
      case "current-month":
        return payments(await service.forCurrentMonth());
      case "last-days":
        return payments(await service.forLastDays(request.days));
      case "single-item":
        return payments([...(await service.withExactlyOneItem())]);
      case "products-current-month":
        return {
          kind: "product-names",
          names: [...(await service.productNamesSoldInCurrentMonth())],
        };
      case "month-total":
        return amount(await service.totalForMonth(request.yearMonth));
      case "month-discount":
        return amount(await service.totalDiscountForMonth(request.yearMonth));
      case "user-items":
        return {
          kind: "items",
          items: await service.itemsForUserEmail(request.email),
        };
      case "value-over":
        return payments([
          ...(await service.paymentsWithValueOver(request.threshold)),
        ]);
    }
  }

  private sorted(by: SortKey, order: SortOrder): Promise<Payment[]> {
    const service = this.paymentQueryService;
    if (by === "date") {
      return order === "asc"
        ? service.sortedByDateAscending()
        : service.sortedByDateDescending();
    }
    return order === "asc"
      ? service.sortedByItemCountAscending()
      : service.sortedByItemCountDescending();
  }
}
