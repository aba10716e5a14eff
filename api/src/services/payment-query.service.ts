import type { FastifyBaseLogger } from "fastify";
import type { ClockProvider } from "../clock/clock-provider";
import type {
  Payment,
  PaymentItem,
  PaymentRepository,
} from "../repositories/payment-repository";
import type { CalendarDate } from "../shared/calendar";
import { Cents } from "../shared/cents";
import { InvalidArgumentError } from "../shared/errors";
import type { YearMonth } from "../shared/year-month";

export interface PaymentQueryServiceDeps {
  paymentRepository: PaymentRepository;
  clock: ClockProvider;
  logger: FastifyBaseLogger;
}

type Comparator<T> = (a: T, b: T) => number;

const byPaymentDate: Comparator<Payment> = (a, b) =>
  a.paymentDate.getTime() - b.paymentDate.getTime();

const byItemCount: Comparator<Payment> = (a, b) =>
  a.items.length - b.items.length;

const byNegatedItemCount: Comparator<Payment> = (a, b) =>
  -a.items.length - -b.items.length;

const discountOf = (item: PaymentItem): Cents =>
  item.regularPrice.subtract(item.finalPrice);

const valueOf = (payment: Payment): Cents =>
  Cents.sum(payment.items.map((item) => item.finalPrice));

/**
 * Read-only reports over the full payment snapshot. Every query reads the
 * repository once. A payment's calendar fields are taken in the zone it was
 * recorded in, today's in the clock's zone.
 */
export class PaymentQueryService {
  private readonly paymentRepository: PaymentQueryServiceDeps["paymentRepository"];
  private readonly clock: PaymentQueryServiceDeps["clock"];
  private readonly logger: PaymentQueryServiceDeps["logger"];

  constructor(deps: PaymentQueryServiceDeps) {
    this.paymentRepository = deps.paymentRepository;
    this.clock = deps.clock;
    this.logger = deps.logger;
  }

  async sortedByDateAscending(): Promise<Payment[]> {
    return this.sorted(byPaymentDate);
  }

  async sortedByDateDescending(): Promise<Payment[]> {
    return this.sorted((a, b) => byPaymentDate(b, a));
  }

  async sortedByItemCountAscending(): Promise<Payment[]> {
    return this.sorted(byItemCount);
  }

  async sortedByItemCountDescending(): Promise<Payment[]> {
    return this.sorted(byNegatedItemCount);
  }

  async forMonth(yearMonth: YearMonth): Promise<Payment[]> {
    const payments = await this.snapshot();
    return payments.filter((payment) => this.isInMonth(payment, yearMonth));
  }

  async forCurrentMonth(): Promise<Payment[]> {
    const currentMonth = this.today().yearMonth();
    const payments = await this.snapshot();
    return payments.filter((payment) => this.isInMonth(payment, currentMonth));
  }

  /**
   * Keeps payments dated in the same calendar year as `today - days` and on a
   * later day of that year. A window reaching back into the previous year only
   * matches payments of that previous year.
   */
  async forLastDays(days: number): Promise<Payment[]> {
    if (!Number.isInteger(days) || days < 0) {
      throw new InvalidArgumentError(
        "days",
        `Expected a non-negative integer number of days, got ${days}`
      );
    }
    const cutoff = this.today().minusDays(days);
    const payments = await this.snapshot();
    return payments.filter((payment) => {
      const date = this.dateOf(payment);
      return date.year === cutoff.year && date.dayOfYear > cutoff.dayOfYear;
    });
  }

  async withExactlyOneItem(): Promise<ReadonlySet<Payment>> {
    const payments = await this.snapshot();
    return new Set(payments.filter((payment) => payment.items.length === 1));
  }

  async productNamesSoldInCurrentMonth(): Promise<ReadonlySet<string>> {
    const payments = await this.forCurrentMonth();
    return new Set(
      payments.flatMap((payment) => payment.items).map((item) => item.name)
    );
  }

  async totalForMonth(yearMonth: YearMonth): Promise<Cents> {
    const items = await this.itemsForMonth(yearMonth);
    return Cents.sum(items.map((item) => item.finalPrice));
  }

  async totalDiscountForMonth(yearMonth: YearMonth): Promise<Cents> {
    const items = await this.itemsForMonth(yearMonth);
    return Cents.sum(items.map(discountOf));
  }

  /**
   * Exact, case-sensitive match. An absent email matches nothing.
   */
  async itemsForUserEmail(email: string | null | undefined): Promise<PaymentItem[]> {
    if (email === null || email === undefined) {
      this.logger.debug("No email given, returning no items");
      return [];
    }
    const payments = await this.snapshot();
    return payments
      .filter((payment) => payment.user.email === email)
      .flatMap((payment) => payment.items);
  }

  /**
   * @param threshold whole currency units; the payment value must be strictly greater
   */
  async paymentsWithValueOver(threshold: number): Promise<ReadonlySet<Payment>> {
    if (!Number.isInteger(threshold)) {
      throw new InvalidArgumentError(
        "threshold",
        `Expected an integer threshold, got ${threshold}`
      );
    }
    const limit = Cents.fromFloat(threshold);
    const payments = await this.snapshot();
    return new Set(
      payments.filter((payment) => valueOf(payment).isGreaterThan(limit))
    );
  }

  private async snapshot(): Promise<Payment[]> {
    const payments = await this.paymentRepository.findAll();
    this.logger.debug({ count: payments.length }, "Payment snapshot fetched");
    return payments;
  }

  private async sorted(comparator: Comparator<Payment>): Promise<Payment[]> {
    const payments = await this.snapshot();
    return [...payments].sort(comparator);
  }

  private async itemsForMonth(yearMonth: YearMonth): Promise<PaymentItem[]> {
    const payments = await this.forMonth(yearMonth);
    return payments.flatMap((payment) => payment.items);
  }

  private today(): CalendarDate {
    return this.clock.now().toCalendarDate();
  }

  private dateOf(payment: Payment): CalendarDate {
    return payment.paymentDate.toCalendarDate();
  }

  private isInMonth(payment: Payment, yearMonth: YearMonth): boolean {
    const date = this.dateOf(payment);
    return date.year === yearMonth.year && date.month === yearMonth.month;
  }
}
