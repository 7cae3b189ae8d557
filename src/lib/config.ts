import { z } from "zod";
import type { LevelWithSilent } from "pino";
import type { ServiceKind } from "../types/monitor";
import { normalizeLogLevel } from "./logger";

export const APP_NAME = "healthwatch";
export const APP_VERSION = "1.1.0";

/**
 * Raised when the environment does not describe a runnable daemon.
 * Carries every problem found, not just the first.
 */
export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return (url.protocol === "http:" || url.protocol === "https:") && url.host !== "";
  } catch {
    return false;
  }
}

// Unset and empty variables are treated the same
const blankToUndefined = (value: unknown) =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const HttpUrlSchema = z
  .string()
  .trim()
  .refine(isHttpUrl, (value) => ({ message: `invalid URL: ${value}` }));

// A URL listed twice is watched once
const UrlListSchema = z.preprocess(
  blankToUndefined,
  z
    .string({ required_error: "is not set" })
    .transform((value) => [
      ...new Set(
        value
          .split(",")
          .map((url) => url.trim())
          .filter((url) => url.length > 0),
      ),
    ])
    .pipe(z.array(HttpUrlSchema).min(1, "contains no valid URLs")),
);

const positiveInt = (fallback: number) =>
  z.preprocess(
    blankToUndefined,
    z.coerce
      .number({ invalid_type_error: "must be an integer" })
      .int("must be an integer")
      .min(1, "must be >= 1")
      .default(fallback),
  );

const LogLevelSchema = z.preprocess(
  blankToUndefined,
  z
    .string()
    .optional()
    .transform((value, ctx): LevelWithSilent | undefined => {
      if (value === undefined) return undefined;
      const level = normalizeLogLevel(value);
      if (!level) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `invalid level '${value}'`,
        });
        return z.NEVER;
      }
      return level;
    }),
);

export const EnvSchema = z.object({
  LOKI_URL: UrlListSchema,
  GRAFANA_URL: UrlListSchema,
  DISCORD_WEBHOOK_URL: z.preprocess(
    blankToUndefined,
    z.string({ required_error: "is not set" }).pipe(HttpUrlSchema),
  ),
  CHECK_INTERVAL_SECONDS: positiveInt(120),
  FAILURE_THRESHOLD: positiveInt(2),
  REQUEST_TIMEOUT_SECONDS: positiveInt(10),
  LOG_LEVEL: LogLevelSchema,
  LOG_FILE: z.preprocess(blankToUndefined, z.string().optional()),
  METRICS_PORT: z.preprocess(
    blankToUndefined,
    z.coerce
      .number({ invalid_type_error: "must be a port number" })
      .int("must be a port number")
      .min(1, "must be between 1 and 65535")
      .max(65535, "must be between 1 and 65535")
      .optional(),
  ),
});

export interface Config {
  urls: Record<ServiceKind, string[]>;
  discordWebhookUrl: string;
  checkIntervalSeconds: number;
  failureThreshold: number;
  requestTimeoutSeconds: number;
  logLevel?: LevelWithSilent;
  logFile?: string;
  metricsPort?: number;
}

/**
 * Parse and validate configuration from the environment
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    );
  }

  const values = parsed.data;

  return {
    urls: {
      loki: values.LOKI_URL,
      grafana: values.GRAFANA_URL,
    },
    discordWebhookUrl: values.DISCORD_WEBHOOK_URL,
    checkIntervalSeconds: values.CHECK_INTERVAL_SECONDS,
    failureThreshold: values.FAILURE_THRESHOLD,
    requestTimeoutSeconds: values.REQUEST_TIMEOUT_SECONDS,
    logLevel: values.LOG_LEVEL,
    logFile: values.LOG_FILE,
    metricsPort: values.METRICS_PORT,
  };
}
