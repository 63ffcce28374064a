import { boundRequest, type CompletionRequest, type LLMProvider, type ModelResult } from "./LLMProvider.js";

/**
 * Answers every request with the same text. Used for local runs without a
 * credential.
 */
export class MockProvider implements LLMProvider {
  readonly name = "mock";

  constructor(
    private readonly response: string,
    private readonly maxTokens = Number.MAX_SAFE_INTEGER
  ) {}

  async generate(request: CompletionRequest): Promise<ModelResult> {
    boundRequest(request, this.maxTokens);
    return { ok: true, text: this.response };
  }
}
