import { failed, type CompletionRequest, type LLMProvider, type ModelResult } from "./LLMProvider.js";

/** Fallback-only mode: every call fails so each stage uses its template. */
export class OfflineProvider implements LLMProvider {
  readonly name = "offline";

  constructor(private readonly reason = "No model credential configured") {}

  async generate(_request: CompletionRequest): Promise<ModelResult> {
    return failed("service_unavailable", this.reason);
  }
}
