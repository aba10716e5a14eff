import * as dotenv from "dotenv";
import { type FastifyInstance, type FastifyPluginAsync } from "fastify";
import fp from "fastify-plugin";
import { z } from "zod";
import { isValidTimeZone } from "../shared/calendar";

export const environmentConfigSchema = z.object({
  PORT: z.coerce.number().default(3004),
  HOST: z.string().default("0.0.0.0"),
  NODE_ENV: z
    .enum(["local", "development", "production", "test"])
    .default("development"),
  LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal"])
    .default("info"),
  DISABLE_LOG: z
    .enum(["true", "false"])
    .default("false")
    .transform((value) => value === "true"),
  PAYMENT_REPOSITORY: z.enum(["memory", "redis"]).default("memory"),
  PAYMENTS_FILE: z.string().optional(),
  REDIS_URL: z.string().default("redis://localhost:6379"),
  TIME_ZONE: z
    .string()
    .default("UTC")
    .refine(isValidTimeZone, { message: "Unknown IANA time zone" }),
});

// Load environment variables
if (process.env.NODE_ENV !== "test") {
  dotenv.config();
}

// Local overrides
if (process.env.NODE_ENV === "local") {
  dotenv.config({ path: ".env.local", override: true });
}

export type AppConfig = z.infer<typeof environmentConfigSchema>;

export interface ConfigPluginOptions {
  config?: AppConfig;
}

declare module "fastify" {
  interface FastifyInstance {
    appConfig: AppConfig;
  }
}

export function parseAppConfig(
  env: Record<string, string | undefined> = process.env
): AppConfig {
  return environmentConfigSchema.parse(env);
}

const configPlugin: FastifyPluginAsync<ConfigPluginOptions> = async (
  fastify: FastifyInstance,
  options
) => {
  const config = options.config ?? parseAppConfig();
  fastify.decorate("appConfig", config);
};

export default fp(configPlugin, { name: "config-plugin" });
