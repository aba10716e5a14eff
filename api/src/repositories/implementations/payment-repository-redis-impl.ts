import type { FastifyBaseLogger } from "fastify";
import type Redis from "ioredis";
import type { Payment, PaymentRepository } from "../payment-repository";
import { paymentRecordSchema, toPayment } from "../payment-record";

export interface PaymentRepositoryRedisImplDeps {
  redis: Pick<Redis, "lrange">;
  logger: FastifyBaseLogger;
}

export class PaymentRepositoryRedisImpl implements PaymentRepository {
  static readonly PAYMENTS_LIST_KEY = "payments:list";

  private readonly redis: PaymentRepositoryRedisImplDeps["redis"];
  private readonly logger: FastifyBaseLogger;

  constructor(deps: PaymentRepositoryRedisImplDeps) {
    this.redis = deps.redis;
    this.logger = deps.logger;
  }

  async findAll(): Promise<Payment[]> {
    const key = PaymentRepositoryRedisImpl.PAYMENTS_LIST_KEY;
    try {
      const rawEntries = await this.redis.lrange(key, 0, -1);
      if (rawEntries.length === 0) {
        this.logger.debug({ key }, "No payments found in list");
        return [];
      }
      const payments: Payment[] = [];
      for (const rawEntry of rawEntries) {
        try {
          const record = paymentRecordSchema.parse(JSON.parse(rawEntry));
          payments.push(toPayment(record));
        } catch (error) {
          this.logger.error(
            { error, rawEntry },
            "Failed to parse payment data"
          );
        }
      }
      this.logger.debug(
        { key, count: payments.length, skipped: rawEntries.length - payments.length },
        "Payments read from Redis"
      );
      return payments;
    } catch (error) {
      this.logger.error({ error, key }, "Failed to read payments from Redis");
      throw error;
    }
  }
}
