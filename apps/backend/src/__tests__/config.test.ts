import { describe, expect, it } from "vitest";
import { ConfigError, DEFAULT_MOCK_RESPONSE, isFallbackOnly, loadConfig } from "../config/index.js";

describe("loadConfig", () => {
  it("applies defaults to an empty environment", () => {
    expect(loadConfig({})).toEqual({
      env: "development",
      port: 4000,
      logLevel: "info",
      logFile: undefined,
      provider: "groq",
      groq: { apiKey: undefined, model: "llama-3.1-8b-instant" },
      huggingFace: { apiToken: undefined, model: "HuggingFaceH4/zephyr-7b-beta" },
      mockResponse: DEFAULT_MOCK_RESPONSE,
      model: { maxTokens: 2048, temperature: 0.7, timeoutMs: 20000 },
      defaultTargetLength: "medium",
      sessionTtlMs: 1800000
    });
  });

  it("reads overrides and treats blank values as unset", () => {
    const config = loadConfig({
      LLM_PROVIDER: "huggingface",
      HF_API_TOKEN: "test-token",
      HF_MODEL: " org/model-x ",
      MODEL_MAX_TOKENS: "512",
      MODEL_TIMEOUT_MS: "15000",
      DEFAULT_TARGET_LENGTH: "short",
      GROQ_API_KEY: "   "
    });

    expect(config.provider).toBe("huggingface");
    expect(config.huggingFace).toEqual({ apiToken: "test-token", model: "org/model-x" });
    expect(config.model).toEqual({ maxTokens: 512, temperature: 0.7, timeoutMs: 15000 });
    expect(config.defaultTargetLength).toBe("short");
    expect(config.groq.apiKey).toBeUndefined();
  });

  it("freezes the result", () => {
    expect(Object.isFrozen(loadConfig({}))).toBe(true);
  });

  it("rejects a non-numeric number", () => {
    expect(() => loadConfig({ PORT: "eighty" })).toThrow(
      new ConfigError("Environment variable PORT must be a number, got: eighty")
    );
  });

  it("rejects values outside their range", () => {
    expect(() => loadConfig({ MODEL_TEMPERATURE: "1.5" })).toThrow(ConfigError);
    expect(() => loadConfig({ MODEL_TIMEOUT_MS: "500" })).toThrow(/model\.timeoutMs/);
    expect(() => loadConfig({ SESSION_TTL_MS: "10" })).toThrow(/sessionTtlMs/);
  });

  it("rejects an unknown provider", () => {
    expect(() => loadConfig({ LLM_PROVIDER: "openai" })).toThrow(/provider/);
  });
});

describe("isFallbackOnly", () => {
  it("is true when the selected provider has no credential", () => {
    expect(isFallbackOnly(loadConfig({}))).toBe(true);
    expect(isFallbackOnly(loadConfig({ LLM_PROVIDER: "offline", GROQ_API_KEY: "test-key" }))).toBe(true);
  });

  it("is false when a credential or the mock is available", () => {
    expect(isFallbackOnly(loadConfig({ GROQ_API_KEY: "test-key" }))).toBe(false);
    expect(isFallbackOnly(loadConfig({ LLM_PROVIDER: "mock" }))).toBe(false);
  });
});
