import type { AppConfig } from "../config/index.js";
import type { Logger } from "../logging/index.js";
import { GroqProvider } from "./GroqProvider.js";
import { HuggingFaceProvider } from "./HuggingFaceProvider.js";
import type { LLMProvider } from "./LLMProvider.js";
import { MockProvider } from "./MockProvider.js";
import { OfflineProvider } from "./OfflineProvider.js";

export { attempt, failed } from "./LLMProvider.js";
export type { CompletionRequest, FailureKind, LLMProvider, ModelFailure, ModelResult } from "./LLMProvider.js";

function fallbackOnly(logger: Logger, provider: string, variable: string): LLMProvider {
  logger.warn("No model credential configured, running in fallback-only mode", { provider, variable });
  return new OfflineProvider(`${variable} is not set`);
}

export function createProvider(config: AppConfig, logger: Logger): LLMProvider {
  const { maxTokens, timeoutMs } = config.model;

  switch (config.provider) {
    case "groq": {
      const apiKey = config.groq.apiKey;
      if (!apiKey) {
        return fallbackOnly(logger, "groq", "GROQ_API_KEY");
      }
      return new GroqProvider({ apiKey, model: config.groq.model, maxTokens, timeoutMs });
    }
    case "huggingface": {
      const apiToken = config.huggingFace.apiToken;
      if (!apiToken) {
        return fallbackOnly(logger, "huggingface", "HF_API_TOKEN");
      }
      return new HuggingFaceProvider({ apiToken, model: config.huggingFace.model, maxTokens, timeoutMs });
    }
    case "mock":
      return new MockProvider(config.mockResponse, maxTokens);
    case "offline":
      return new OfflineProvider();
  }
}
