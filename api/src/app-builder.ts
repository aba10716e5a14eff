import { fastify, type FastifyInstance } from "fastify";
import type { PinoLoggerOptions } from "fastify/types/logger";
import {
  serializerCompiler,
  validatorCompiler,
  ZodTypeProvider,
} from "fastify-type-provider-zod";
import configPlugin, { type AppConfig, parseAppConfig } from "./plugins/config-plugin";
import redisPlugin from "./plugins/redis-plugin";
import diContainerPlugin, {
  type DiContainerPluginOptions,
} from "./plugins/di-container-plugin";
import routes from "./routes";
import { isInvalidArgumentError } from "./shared/errors";

export interface AppBuilderOptions extends DiContainerPluginOptions {
  config?: AppConfig;
}

export class AppBuilder {
  private readonly config: AppConfig;
  private readonly options: AppBuilderOptions;

  constructor(options: AppBuilderOptions = {}) {
    this.options = options;
    this.config = options.config ?? parseAppConfig();
  }

  async build(): Promise<FastifyInstance> {
    const app = fastify({
      logger: this.getLoggerConfig(),
    });
    app.withTypeProvider<ZodTypeProvider>();
    app.setValidatorCompiler(validatorCompiler);
    app.setSerializerCompiler(serializerCompiler);
    await app.register(configPlugin, { config: this.config });
    if (this.config.PAYMENT_REPOSITORY === "redis" && !this.options.paymentRepository) {
      await app.register(redisPlugin);
    }
    await app.register(diContainerPlugin, {
      paymentRepository: this.options.paymentRepository,
      clock: this.options.clock,
    });
    await app.register(routes);
    app.setErrorHandler((error, request, reply) => {
      if (isInvalidArgumentError(error)) {
        request.log.warn({ argument: error.argument }, error.message);
        return reply.status(400).send({ error: error.message });
      }
      if (error.validation) {
        request.log.debug({ validation: error.validation }, error.message);
        return reply.status(400).send({ error: error.message });
      }
      request.log.error(error);
      return reply.status(500).send({
        error: "Internal Server Error",
        message: error.message,
      });
    });
    app.setNotFoundHandler((request, reply) => {
      reply.status(404).send({
        error: "Not Found",
        message: `Route ${request.method}:${request.url} not found`,
      });
    });
    return app;
  }

  private getLoggerConfig(): PinoLoggerOptions | boolean {
    if (this.config.DISABLE_LOG) {
      return false;
    }
    if (
      this.config.NODE_ENV === "development" ||
      this.config.NODE_ENV === "local" ||
      this.config.NODE_ENV === "test"
    ) {
      return {
        level: this.config.LOG_LEVEL,
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "HH:MM:ss Z",
            ignore: "pid,hostname",
            messageFormat: "{msg}",
            singleLine: false,
            hideObject: false,
          },
        },
      };
    }
    return {
      level: this.config.LOG_LEVEL,
      messageKey: "message",
    };
  }
}
