import { readFile } from "node:fs/promises";
import type { FastifyBaseLogger } from "fastify";
import type { Payment, PaymentRepository } from "../payment-repository";
import { paymentRecordListSchema, toPayment } from "../payment-record";

export interface PaymentRepositoryMemoryImplDeps {
  logger: FastifyBaseLogger;
  payments?: Payment[];
}

export class PaymentRepositoryMemoryImpl implements PaymentRepository {
  private readonly payments: readonly Payment[];
  private readonly logger: FastifyBaseLogger;

  constructor(deps: PaymentRepositoryMemoryImplDeps) {
    this.payments = [...(deps.payments ?? [])];
    this.logger = deps.logger;
  }

  /**
   * Loads a JSON array of payment records.
   */
  static async fromFile(
    path: string,
    logger: FastifyBaseLogger
  ): Promise<PaymentRepositoryMemoryImpl> {
    try {
      const raw = await readFile(path, "utf8");
      const records = paymentRecordListSchema.parse(JSON.parse(raw));
      logger.info({ path, count: records.length }, "Payments loaded from file");
      return new PaymentRepositoryMemoryImpl({
        logger,
        payments: records.map(toPayment),
      });
    } catch (error) {
      logger.error({ error, path }, "Failed to load payments from file");
      throw error;
    }
  }

  async findAll(): Promise<Payment[]> {
    this.logger.debug(
      { count: this.payments.length },
      "Returning in-memory payments"
    );
    return [...this.payments];
  }
}
