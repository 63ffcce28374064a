/**
 * Application configuration.
 *
 * Read once at startup and frozen. A missing model credential is not an
 * error: the provider factory drops to fallback-only mode instead.
 */

import { z } from "zod";
import { ConfigError, optionalEnv, optionalEnvNumber, type EnvSource } from "./env.js";

export { ConfigError } from "./env.js";
export type { EnvSource } from "./env.js";

export const ProviderName = z.enum(["groq", "huggingface", "mock", "offline"]);
export type ProviderName = z.infer<typeof ProviderName>;

export const TargetLengthSchema = z.enum(["short", "medium", "long"]);

export const AppConfigSchema = z
  .object({
    env: z.enum(["development", "production", "test"]),
    port: z.number().int().min(0).max(65535),
    logLevel: z.enum(["debug", "info", "warn", "error"]),
    /** Append log lines to this file as well as the console */
    logFile: z.string().optional(),
    provider: ProviderName,
    groq: z
      .object({
        apiKey: z.string().optional(),
        model: z.string().min(1)
      })
      .strict(),
    huggingFace: z
      .object({
        apiToken: z.string().optional(),
        model: z.string().min(1)
      })
      .strict(),
    mockResponse: z.string().min(1),
    model: z
      .object({
        /** Upper bound applied to every request's token budget */
        maxTokens: z.number().int().min(1).max(8192),
        temperature: z.number().min(0).max(1),
        timeoutMs: z.number().int().min(1000).max(60000)
      })
      .strict(),
    defaultTargetLength: TargetLengthSchema,
    /** Idle time after which a session and its history are dropped */
    sessionTtlMs: z.number().int().min(1000)
  })
  .strict();

export type AppConfig = z.infer<typeof AppConfigSchema>;

export const DEFAULT_MOCK_RESPONSE =
  "This is a stubbed model response used for local development.";

/**
 * Build and validate configuration from an environment source.
 * Throws ConfigError listing every invalid field.
 */
export function loadConfig(env: EnvSource = process.env): Readonly<AppConfig> {
  const raw = {
    env: optionalEnv(env, "NODE_ENV") ?? "development",
    port: optionalEnvNumber(env, "PORT") ?? 4000,
    logLevel: optionalEnv(env, "LOG_LEVEL") ?? "info",
    logFile: optionalEnv(env, "LOG_FILE"),
    provider: optionalEnv(env, "LLM_PROVIDER") ?? "groq",
    groq: {
      apiKey: optionalEnv(env, "GROQ_API_KEY"),
      model: optionalEnv(env, "GROQ_MODEL") ?? "llama-3.1-8b-instant"
    },
    huggingFace: {
      apiToken: optionalEnv(env, "HF_API_TOKEN"),
      model: optionalEnv(env, "HF_MODEL") ?? "HuggingFaceH4/zephyr-7b-beta"
    },
    mockResponse: optionalEnv(env, "MOCK_RESPONSE") ?? DEFAULT_MOCK_RESPONSE,
    model: {
      maxTokens: optionalEnvNumber(env, "MODEL_MAX_TOKENS") ?? 2048,
      temperature: optionalEnvNumber(env, "MODEL_TEMPERATURE") ?? 0.7,
      timeoutMs: optionalEnvNumber(env, "MODEL_TIMEOUT_MS") ?? 20000
    },
    defaultTargetLength: optionalEnv(env, "DEFAULT_TARGET_LENGTH") ?? "medium",
    sessionTtlMs: optionalEnvNumber(env, "SESSION_TTL_MS") ?? 1800000
  };

  const result = AppConfigSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${details}`);
  }
  return Object.freeze(result.data);
}

/**
 * True when the selected provider has no credential and every stage will use
 * the template fallback.
 */
export function isFallbackOnly(config: AppConfig): boolean {
  switch (config.provider) {
    case "groq":
      return config.groq.apiKey === undefined;
    case "huggingface":
      return config.huggingFace.apiToken === undefined;
    case "offline":
      return true;
    case "mock":
      return false;
  }
}
