import type { PaymentRepository } from "../payment-repository";
import {
  PaymentRepositoryMemoryImpl,
  PaymentRepositoryMemoryImplDeps,
} from "./payment-repository-memory-impl";
import {
  PaymentRepositoryRedisImpl,
  PaymentRepositoryRedisImplDeps,
} from "./payment-repository-redis-impl";

export type PaymentRepositoryType = "memory" | "redis";

export class PaymentRepositoryFactory {
  static createMemoryImplementation(
    deps: PaymentRepositoryMemoryImplDeps
  ): PaymentRepository {
    return new PaymentRepositoryMemoryImpl(deps);
  }

  static createRedisImplementation(
    deps: PaymentRepositoryRedisImplDeps
  ): PaymentRepository {
    return new PaymentRepositoryRedisImpl(deps);
  }

  static create(
    type: "memory",
    deps: PaymentRepositoryMemoryImplDeps
  ): PaymentRepository;
  static create(
    type: "redis",
    deps: PaymentRepositoryRedisImplDeps
  ): PaymentRepository;
  static create(
    type: PaymentRepositoryType,
    deps: PaymentRepositoryMemoryImplDeps | PaymentRepositoryRedisImplDeps
  ): PaymentRepository {
    switch (type) {
      case "memory":
        return this.createMemoryImplementation(deps);
      case "redis":
        if (!("redis" in deps)) {
          throw new Error("Redis repository requires a redis client");
        }
        return this.createRedisImplementation(deps);
      default:
        throw new Error(`Unsupported repository type: ${type}`);
    }
  }
}
