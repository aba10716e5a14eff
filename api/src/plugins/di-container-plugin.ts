import type {
  FastifyBaseLogger,
  FastifyInstance,
  FastifyPluginAsync,
} from "fastify";
import fp from "fastify-plugin";
import { diContainer, fastifyAwilixPlugin } from "@fastify/awilix";
import { asClass, asValue } from "awilix";
import type { AppConfig } from "./config-plugin";
import { type ClockProvider, SystemClock } from "../clock/clock-provider";
import { PaymentQueryService } from "../services/payment-query.service";
import { RunPaymentReport } from "../use-cases/run-payment-report";
import type { PaymentRepository } from "../repositories/payment-repository";
import { PaymentRepositoryFactory } from "../repositories/implementations/payment-repository-factory";
import { PaymentRepositoryMemoryImpl } from "../repositories/implementations/payment-repository-memory-impl";

declare module "@fastify/awilix" {
  interface Cradle {
    appConfig: AppConfig;
    logger: FastifyBaseLogger;
    paymentRepository: PaymentRepository;
    clock: ClockProvider;
    paymentQueryService: PaymentQueryService;
    runPaymentReport: RunPaymentReport;
  }
}

export interface DiContainerPluginOptions {
  paymentRepository?: PaymentRepository;
  clock?: ClockProvider;
}

async function createPaymentRepository(
  fastify: FastifyInstance
): Promise<PaymentRepository> {
  const { PAYMENT_REPOSITORY, PAYMENTS_FILE } = fastify.appConfig;
  if (PAYMENT_REPOSITORY === "redis") {
    return PaymentRepositoryFactory.create("redis", {
      redis: fastify.redis,
      logger: fastify.log,
    });
  }
  if (PAYMENTS_FILE) {
    return PaymentRepositoryMemoryImpl.fromFile(PAYMENTS_FILE, fastify.log);
  }
  return PaymentRepositoryFactory.create("memory", { logger: fastify.log });
}

const diContainerPlugin: FastifyPluginAsync<DiContainerPluginOptions> = async (
  fastify: FastifyInstance,
  options
) => {
  fastify.log.info("Registering DI Container plugin...");
  await fastify.register(fastifyAwilixPlugin, {
    disposeOnClose: true,
    disposeOnResponse: false,
  });
  const paymentRepository =
    options.paymentRepository ?? (await createPaymentRepository(fastify));
  const clock =
    options.clock ?? new SystemClock({ timeZone: fastify.appConfig.TIME_ZONE });
  diContainer.register({
    appConfig: asValue(fastify.appConfig),
    logger: asValue(fastify.log),
    paymentRepository: asValue(paymentRepository),
    clock: asValue(clock),
    paymentQueryService: asClass(PaymentQueryService).singleton(),
    runPaymentReport: asClass(RunPaymentReport).singleton(),
  });
  fastify.log.info(
    { repository: fastify.appConfig.PAYMENT_REPOSITORY },
    "DI Container plugin registered successfully"
  );
};

export default fp(diContainerPlugin, {
  name: "di-container-plugin",
  dependencies: ["config-plugin"],
});
