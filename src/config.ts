import { z } from "zod";
import { isIsoDate } from "./features/dates";
import type { LogLevel } from "./logger";

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

const emptyAsUndefined = (value: unknown) => (value === "" ? undefined : value);

const EnvSchema = z.object({
  POSTGRES_URL_NON_POOLING: z.preprocess(emptyAsUndefined, z.string().optional()),
  POSTGRES_URL: z.preprocess(emptyAsUndefined, z.string().optional()),
  DATABASE_URL: z.preprocess(emptyAsUndefined, z.string().optional()),
  PORT: z.preprocess(emptyAsUndefined, z.coerce.number().int().positive().default(3000)),
  AUTH_SECRET: z.preprocess(emptyAsUndefined, z.string().min(1).default("dev-secret")),
  SIGNAL_CACHE_TTL_HOURS: z.preprocess(
    emptyAsUndefined,
    z.coerce.number().positive().default(24),
  ),
  SIGNAL_CACHE_ENABLED: z.preprocess(emptyAsUndefined, booleanFlag.default("true")),
  REFERENCE_DATE: z.preprocess(
    emptyAsUndefined,
    z
      .string()
      .refine(isIsoDate, "REFERENCE_DATE must be YYYY-MM-DD")
      .optional(),
  ),
  LOG_LEVEL: z.preprocess(
    emptyAsUndefined,
    z.enum(["debug", "info", "warn", "error"]).default("info"),
  ),
});

export interface AppConfig {
  databaseUrl: string | null;
  port: number;
  authSecret: string;
  signalCacheTtlMs: number;
  signalCacheEnabled: boolean;
  referenceDate: string | null;
  logLevel: LogLevel;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.parse(env);
  return {
    databaseUrl:
      parsed.POSTGRES_URL_NON_POOLING ?? parsed.POSTGRES_URL ?? parsed.DATABASE_URL ?? null,
    port: parsed.PORT,
    authSecret: parsed.AUTH_SECRET,
    signalCacheTtlMs: parsed.SIGNAL_CACHE_TTL_HOURS * 60 * 60 * 1000,
    signalCacheEnabled: parsed.SIGNAL_CACHE_ENABLED,
    referenceDate: parsed.REFERENCE_DATE ?? null,
    logLevel: parsed.LOG_LEVEL,
  };
}
