import type {
  GeneratedContent,
  GenerationRequest,
  ImprovementRequest,
  Provenance
} from "@draftcritic/shared";
import { fallbackContent, fallbackImprovement } from "../fallback/templates.js";
import type { Logger } from "../logging/index.js";
import { LENGTH_TIERS } from "../prompts/lengthTiers.js";
import { generationPrompt, improvementPrompt, type PromptPair } from "../prompts/templates.js";
import { attempt, type LLMProvider } from "../providers/index.js";

export interface StageOptions {
  temperature: number;
  /** Overrides the length tier's token budget */
  maxTokens?: number;
  now?: () => Date;
}

export class GeneratorAgent {
  constructor(
    private readonly provider: LLMProvider,
    private readonly logger: Logger
  ) {}

  async generate(request: GenerationRequest, options: StageOptions): Promise<GeneratedContent> {
    return this.run(
      "Generation",
      generationPrompt(request),
      LENGTH_TIERS[request.targetLength].maxTokens,
      () => fallbackContent(request.topic),
      options
    );
  }

  async improve(request: ImprovementRequest, options: StageOptions): Promise<GeneratedContent> {
    return this.run(
      "Improvement",
      improvementPrompt(request),
      LENGTH_TIERS[request.targetLength].maxTokens,
      () => fallbackImprovement(request.content.text, request.critique.text),
      options
    );
  }

  private async run(
    stage: string,
    { system, prompt }: PromptPair,
    tierMaxTokens: number,
    fallback: () => string,
    options: StageOptions
  ): Promise<GeneratedContent> {
    const result = await attempt(this.provider, {
      system,
      prompt,
      maxTokens: options.maxTokens ?? tierMaxTokens,
      temperature: options.temperature
    });

    if (result.ok) {
      return this.content(result.text, "model", options);
    }

    this.logger.warn(`${stage} failed, using template`, {
      provider: this.provider.name,
      kind: result.failure.kind,
      reason: result.failure.message
    });
    return this.content(fallback(), "fallback", options);
  }

  private content(text: string, source: Provenance, options: StageOptions): GeneratedContent {
    const now = options.now ?? (() => new Date());
    return Object.freeze({ text, source, timestamp: now().toISOString() });
  }
}
