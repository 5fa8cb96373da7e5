import { z } from "zod";

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const EnvSchema = z.object({
  ALPHA_VANTAGE_API_KEY: z
    .string({ required_error: "ALPHA_VANTAGE_API_KEY is not set" })
    .trim()
    .min(1, { message: "ALPHA_VANTAGE_API_KEY is not set" }),
  ALPHA_VANTAGE_BASE_URL: z
    .string()
    .url()
    .default("https://www.alphavantage.co/query"),
  ALPHA_VANTAGE_OUTPUT_SIZE: z.enum(["compact", "full"]).default("compact"),
  UPSTREAM_TIMEOUT_MS: positiveInt(10_000),
  RETRIEVAL_CONCURRENCY: positiveInt(2),
  // Use 127.0.0.1 if redis://localhost gives getaddrinfo ENOTFOUND.
  REDIS_URL: z.string().trim().min(1).default("redis://127.0.0.1:6379"),
  RESPONSE_LOG_DIR: z.string().trim().min(1).default("logs"),
  PORT: positiveInt(4001),
});

export type AppConfig = {
  alphaVantage: {
    apiKey: string;
    baseUrl: string;
    outputSize: "compact" | "full";
    timeoutMs: number;
  };
  retrievalConcurrency: number;
  redisUrl: string;
  responseLogDir: string;
  port: number;
};

export class ConfigError extends Error {
  constructor(readonly issues: z.ZodIssue[]) {
    super(
      `Invalid environment: ${issues
        .map((i) => `${i.path.join(".") || "env"}: ${i.message}`)
        .join("; ")}`
    );
    this.name = "ConfigError";
  }
}

/**
 * Reads configuration from an env map (process.env by default).
 * Call once at startup and pass the result down; nothing below reads process.env.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): AppConfig {
  // Blank values fall back to defaults, same as unset ones.
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([, v]) => v !== undefined && v.trim() !== "")
  );
  const parsed = EnvSchema.safeParse(cleaned);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues);
  }
  const e = parsed.data;
  return {
    alphaVantage: {
      apiKey: e.ALPHA_VANTAGE_API_KEY,
      baseUrl: e.ALPHA_VANTAGE_BASE_URL,
      outputSize: e.ALPHA_VANTAGE_OUTPUT_SIZE,
      timeoutMs: e.UPSTREAM_TIMEOUT_MS,
    },
    retrievalConcurrency: e.RETRIEVAL_CONCURRENCY,
    redisUrl: e.REDIS_URL,
    responseLogDir: e.RESPONSE_LOG_DIR,
    port: e.PORT,
  };
}
