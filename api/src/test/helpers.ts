import type { FastifyBaseLogger } from "fastify";
import type {
  Payment,
  PaymentItem,
} from "../repositories/payment-repository";
import { Cents } from "../shared/cents";
import { ZonedDateTime } from "../shared/calendar";

export function createMockLogger(): FastifyBaseLogger {
  const logger: Record<string, unknown> = {
    info: jest.fn(),
    error: jest.fn(),
    warn: jest.fn(),
    debug: jest.fn(),
    trace: jest.fn(),
    fatal: jest.fn(),
    silent: jest.fn(),
    child: jest.fn(() => logger),
    level: "info",
  };
  return logger as unknown as FastifyBaseLogger;
}

export function item(
  name: string,
  regularPrice: number,
  finalPrice: number
): PaymentItem {
  return {
    name,
    regularPrice: Cents.fromFloat(regularPrice),
    finalPrice: Cents.fromFloat(finalPrice),
  };
}

export function payment(
  paymentDate: string,
  email: string,
  items: PaymentItem[]
): Payment {
  return {
    paymentDate: ZonedDateTime.parse(paymentDate),
    user: { email },
    items,
  };
}
