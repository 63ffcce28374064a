import type { Critique, CritiqueRequest } from "@draftcritic/shared";
import { fallbackCritique } from "../fallback/templates.js";
import type { Logger } from "../logging/index.js";
import { extractMetrics } from "../metrics.js";
import { CRITIQUE_MAX_TOKENS } from "../prompts/lengthTiers.js";
import { critiquePrompt } from "../prompts/templates.js";
import { attempt, type LLMProvider } from "../providers/index.js";
import type { StageOptions } from "./generatorAgent.js";

export class CriticAgent {
  constructor(
    private readonly provider: LLMProvider,
    private readonly logger: Logger
  ) {}

  async review(request: CritiqueRequest, options: Omit<StageOptions, "now">): Promise<Critique> {
    const { system, prompt } = critiquePrompt(request);
    const result = await attempt(this.provider, {
      system,
      prompt,
      maxTokens: options.maxTokens ?? CRITIQUE_MAX_TOKENS,
      temperature: options.temperature
    });

    if (!result.ok) {
      this.logger.warn("Critique failed, using template", {
        provider: this.provider.name,
        kind: result.failure.kind,
        reason: result.failure.message
      });
      return Object.freeze(fallbackCritique(request.content.text));
    }

    const { metrics, missing } = extractMetrics(result.text);
    if (missing.length > 0) {
      this.logger.debug("Critique scores not found, left unscored", { missing });
    }
    const critique: Critique = { text: result.text, source: "model", metrics };
    return Object.freeze(critique);
  }
}
