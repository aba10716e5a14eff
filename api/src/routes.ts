import type { FastifyPluginAsync } from "fastify";
import fp from "fastify-plugin";
import type { ZodTypeProvider } from "fastify-type-provider-zod";
import { z } from "zod";
import type { Payment, PaymentItem } from "./repositories/payment-repository";
import type {
  PaymentReport,
  RunPaymentReportRequest,
} from "./use-cases/run-payment-report";
import { YearMonth } from "./shared/year-month";

const paymentItemResponseSchema = z.object({
  name: z.string(),
  regularPrice: z.number(),
  finalPrice: z.number(),
});

const paymentResponseSchema = z.object({
  paymentDate: z.string(),
  user: z.object({ email: z.string() }),
  items: z.array(paymentItemResponseSchema),
});

const paymentsResponseSchema = z.object({
  payments: z.array(paymentResponseSchema),
});

const itemsResponseSchema = z.object({
  items: z.array(paymentItemResponseSchema),
});

const productNamesResponseSchema = z.object({
  names: z.array(z.string()),
});

const amountResponseSchema = z.object({
  yearMonth: z.string(),
  amount: z.number(),
});

const errorResponseSchema = z.object({
  error: z.string(),
});

const yearMonthParamsSchema = z.object({
  yearMonth: z.string().regex(/^\d{4}-\d{2}$/, "Expected YYYY-MM"),
});

const toItemResponse = (item: PaymentItem) => ({
  name: item.name,
  regularPrice: item.regularPrice.toFloat(),
  finalPrice: item.finalPrice.toFloat(),
});

const toPaymentResponse = (payment: Payment) => ({
  paymentDate: payment.paymentDate.toISOString(),
  user: { email: payment.user.email },
  items: payment.items.map(toItemResponse),
});

function paymentsOf(report: PaymentReport) {
  if (report.kind !== "payments") {
    throw new Error(`Unexpected report kind: ${report.kind}`);
  }
  return { payments: report.payments.map(toPaymentResponse) };
}

function itemsOf(report: PaymentReport) {
  if (report.kind !== "items") {
    throw new Error(`Unexpected report kind: ${report.kind}`);
  }
  return { items: report.items.map(toItemResponse) };
}

function namesOf(report: PaymentReport) {
  if (report.kind !== "product-names") {
    throw new Error(`Unexpected report kind: ${report.kind}`);
  }
  return { names: report.names };
}

function amountOf(report: PaymentReport, yearMonth: YearMonth) {
  if (report.kind !== "amount") {
    throw new Error(`Unexpected report kind: ${report.kind}`);
  }
  return { yearMonth: yearMonth.toString(), amount: report.amount.toFloat() };
}

const routes: FastifyPluginAsync = async (instance) => {
  const fastify = instance.withTypeProvider<ZodTypeProvider>();

  const runReport = (request: RunPaymentReportRequest) =>
    fastify.diContainer.resolve("runPaymentReport").execute(request);

  fastify.get(
    "/health",
    {
      schema: {
        response: {
          200: z.object({
            status: z.literal("healthy"),
            timestamp: z.string(),
            uptime: z.number(),
          }),
        },
      },
    },
    async () => ({
      status: "healthy" as const,
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    })
  );

  fastify.get(
    "/payments",
    {
      schema: {
        querystring: z.object({
          sort: z.enum(["date", "item-count"]).default("date"),
          order: z.enum(["asc", "desc"]).default("asc"),
        }),
        response: { 200: paymentsResponseSchema, 400: errorResponseSchema },
      },
    },
    async (request, reply) => {
      const response = await runReport({
        report: "sorted",
        by: request.query.sort,
        order: request.query.order,
      });
      if (response.isFailure()) {
        return reply.status(400).send(response.getError());
      }
      return reply.status(200).send(paymentsOf(response.getValue()));
    }
  );

  fastify.get(
    "/payments/months/:yearMonth",
    {
      schema: {
        params: yearMonthParamsSchema,
        response: { 200: paymentsResponseSchema, 400: errorResponseSchema },
      },
    },
    async (request, reply) => {
      const response = await runReport({
        report: "month",
        yearMonth: YearMonth.parse(request.params.yearMonth),
      });
      if (response.isFailure()) {
        return reply.status(400).send(response.getError());
      }
      return reply.status(200).send(paymentsOf(response.getValue()));
    }
  );

  fastify.get(
    "/payments/current-month",
    {
      schema: {
        response: { 200: paymentsResponseSchema, 400: errorResponseSchema },
      },
    },
    async (_request, reply) => {
      const response = await runReport({ report: "current-month" });
      if (response.isFailure()) {
        return reply.status(400).send(response.getError());
      }
      return reply.status(200).send(paymentsOf(response.getValue()));
    }
  );

  fastify.get(
    "/payments/last-days/:days",
    {
      schema: {
        params: z.object({ days: z.coerce.number().int() }),
        response: { 200: paymentsResponseSchema, 400: errorResponseSchema },
      },
    },
    async (request, reply) => {
      const response = await runReport({
        report: "last-days",
        days: request.params.days,
      });
      if (response.isFailure()) {
        return reply.status(400).send(response.getError());
      }
      return reply.status(200).send(paymentsOf(response.getValue()));
    }
  );

  fastify.get(
    "/payments/single-item",
    {
      schema: {
        response: { 200: paymentsResponseSchema, 400: errorResponseSchema },
      },
    },
    async (_request, reply) => {
      const response = await runReport({ report: "single-item" });
      if (response.isFailure()) {
        return reply.status(400).send(response.getError());
      }
      return reply.status(200).send(paymentsOf(response.getValue()));
    }
  );

  fastify.get(
    "/payments/value-over/:threshold",
    {
      schema: {
        params: z.object({ threshold: z.coerce.number().int() }),
        response: { 200: paymentsResponseSchema, 400: errorResponseSchema },
      },
    },
    async (request, reply) => {
      const response = await runReport({
        report: "value-over",
        threshold: request.params.threshold,
      });
      if (response.isFailure()) {
        return reply.status(400).send(response.getError());
      }
      return reply.status(200).send(paymentsOf(response.getValue()));
    }
  );

  fastify.get(
    "/products/current-month",
    {
      schema: {
        response: { 200: productNamesResponseSchema, 400: errorResponseSchema },
      },
    },
    async (_request, reply) => {
      const response = await runReport({ report: "products-current-month" });
      if (response.isFailure()) {
        return reply.status(400).send(response.getError());
      }
      return reply.status(200).send(namesOf(response.getValue()));
    }
  );

  fastify.get(
    "/reports/months/:yearMonth/total",
    {
      schema: {
        params: yearMonthParamsSchema,
        response: { 200: amountResponseSchema, 400: errorResponseSchema },
      },
    },
    async (request, reply) => {
      const yearMonth = YearMonth.parse(request.params.yearMonth);
      const response = await runReport({ report: "month-total", yearMonth });
      if (response.isFailure()) {
        return reply.status(400).send(response.getError());
      }
      return reply.status(200).send(amountOf(response.getValue(), yearMonth));
    }
  );

  fastify.get(
    "/reports/months/:yearMonth/discount",
    {
      schema: {
        params: yearMonthParamsSchema,
        response: { 200: amountResponseSchema, 400: errorResponseSchema },
      },
    },
    async (request, reply) => {
      const yearMonth = YearMonth.parse(request.params.yearMonth);
      const response = await runReport({ report: "month-discount", yearMonth });
      if (response.isFailure()) {
        return reply.status(400).send(response.getError());
      }
      return reply.status(200).send(amountOf(response.getValue(), yearMonth));
    }
  );

  fastify.get(
    "/users/:email/items",
    {
      schema: {
        params: z.object({ email: z.string().min(1) }),
        response: { 200: itemsResponseSchema, 400: errorResponseSchema },
      },
    },
    async (request, reply) => {
      const response = await runReport({
        report: "user-items",
        email: request.params.email,
      });
      if (response.isFailure()) {
        return reply.status(400).send(response.getError());
      }
      return reply.status(200).send(itemsOf(response.getValue()));
    }
  );
};

export default fp(routes, {
  name: "routes",
  dependencies: ["di-container-plugin"],
});
