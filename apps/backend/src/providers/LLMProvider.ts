import { InvalidInputError } from "../errors.js";

export type FailureKind = "service_unavailable" | "rate_limited" | "timeout";

export interface ModelFailure {
  kind: FailureKind;
  message: string;
}

export type FailedResult = { ok: false; failure: ModelFailure };
export type ModelResult = { ok: true; text: string } | FailedResult;

export interface CompletionRequest {
  prompt: string;
  system?: string;
  maxTokens: number;
  temperature: number;
}

export interface LLMProvider {
  readonly name: string;
  /** One attempt, never rejects for transport or API errors. */
  generate(request: CompletionRequest): Promise<ModelResult>;
}

export function failed(kind: FailureKind, message: string): FailedResult {
  return { ok: false, failure: { kind, message } };
}

/**
 * Clamp the token budget to the configured ceiling and temperature to [0, 1].
 * An empty prompt is a caller bug and throws.
 */
export function boundRequest(request: CompletionRequest, maxTokensCeiling: number): CompletionRequest {
  if (request.prompt.trim().length === 0) {
    throw new InvalidInputError("Prompt must not be empty");
  }
  const maxTokens = Math.min(Math.max(1, Math.floor(request.maxTokens)), maxTokensCeiling);
  const temperature = Math.min(Math.max(0, request.temperature), 1);
  return { ...request, maxTokens, temperature };
}

/**
 * Call a provider and turn an unexpected rejection into a failed result, so a
 * stage only ever has to look at the result.
 */
export async function attempt(provider: LLMProvider, request: CompletionRequest): Promise<ModelResult> {
  try {
    return await provider.generate(request);
  } catch (error) {
    return failed("service_unavailable", error instanceof Error ? error.message : String(error));
  }
}
