import type {
  Critique,
  GeneratedContent,
  GenerationRequest,
  IterationRecord,
  PipelineSettings,
  RefinementSettings,
  TargetLength
} from "@draftcritic/shared";
import { CriticAgent } from "./agents/criticAgent.js";
import { GeneratorAgent, type StageOptions } from "./agents/generatorAgent.js";
import { InvalidInputError } from "./errors.js";
import type { Logger } from "./logging/index.js";
import type { LLMProvider } from "./providers/index.js";
import type { PipelineSession } from "./session.js";

export interface OrchestratorOptions {
  logger: Logger;
  defaults: {
    targetLength: TargetLength;
    temperature: number;
  };
  now?: () => Date;
}

export type ResolvedSettings = PipelineSettings & { temperature: number };

type RecordFlags = Pick<IterationRecord, "kind" | "thresholdMet" | "stoppedAtMax">;

export interface RefinementOutcome {
  iterations: IterationRecord[];
  thresholdMet: boolean;
}

export const REFINEMENT_LIMITS = {
  minThreshold: 1,
  maxThreshold: 10,
  minIterations: 1,
  maxIterations: 10
} as const;

export function requireTopic(topic: string): string {
  const trimmed = topic.trim();
  if (!trimmed) {
    throw new InvalidInputError("Topic must not be empty");
  }
  return trimmed;
}

function requireRefinement(refinement: RefinementSettings): RefinementSettings {
  const { qualityThreshold, maxIterations } = refinement;
  if (
    !(qualityThreshold >= REFINEMENT_LIMITS.minThreshold && qualityThreshold <= REFINEMENT_LIMITS.maxThreshold)
  ) {
    throw new InvalidInputError(
      `qualityThreshold must be between ${REFINEMENT_LIMITS.minThreshold} and ${REFINEMENT_LIMITS.maxThreshold}`
    );
  }
  if (
    !Number.isInteger(maxIterations) ||
    maxIterations < REFINEMENT_LIMITS.minIterations ||
    maxIterations > REFINEMENT_LIMITS.maxIterations
  ) {
    throw new InvalidInputError(
      `maxIterations must be an integer between ${REFINEMENT_LIMITS.minIterations} and ${REFINEMENT_LIMITS.maxIterations}`
    );
  }
  return refinement;
}

/** Agents and logger for one run, bound to the caller's request. */
interface RunContext {
  generator: GeneratorAgent;
  critic: CriticAgent;
  logger: Logger;
}

export class Orchestrator {
  constructor(
    private readonly provider: LLMProvider,
    private readonly options: OrchestratorOptions
  ) {}

  get providerName(): string {
    return this.provider.name;
  }

  resolveSettings(settings: Partial<PipelineSettings> = {}): ResolvedSettings {
    return {
      targetLength: settings.targetLength ?? this.options.defaults.targetLength,
      temperature: settings.temperature ?? this.options.defaults.temperature,
      maxTokens: settings.maxTokens,
      critiqueMaxTokens: settings.critiqueMaxTokens
    };
  }

  /**
   * One generate-then-critique cycle. Rejects only for an empty topic or a
   * busy session, both before any stage runs. `logger` defaults to the
   * orchestrator's own; pass a request-bound child to tag stage logs.
   */
  async runIteration(
    session: PipelineSession,
    topic: string,
    settings: Partial<PipelineSettings> = {},
    logger: Logger = this.options.logger
  ): Promise<IterationRecord> {
    const resolved = this.resolveSettings(settings);
    const request: GenerationRequest = Object.freeze({
      topic: requireTopic(topic),
      targetLength: resolved.targetLength
    });

    const run = this.context(logger);

    session.begin();
    try {
      const generation = await run.generator.generate(request, this.generationOptions(resolved));
      const { record } = await this.critique(run, session, request, resolved, generation, () => ({
        kind: "initial",
        thresholdMet: false,
        stoppedAtMax: false
      }));
      session.enter("complete");
      return record;
    } catch (error) {
      session.abort();
      throw error;
    }
  }

  /**
   * Generate, then keep improving the content from its own critique until the
   * overall score reaches the threshold or the iteration limit is hit.
   */
  async refine(
    session: PipelineSession,
    topic: string,
    settings: Partial<PipelineSettings>,
    refinement: RefinementSettings,
    logger: Logger = this.options.logger
  ): Promise<RefinementOutcome> {
    const resolved = this.resolveSettings(settings);
    const request: GenerationRequest = Object.freeze({
      topic: requireTopic(topic),
      targetLength: resolved.targetLength
    });
    const { qualityThreshold, maxIterations } = requireRefinement(refinement);
    const iterations: IterationRecord[] = [];
    const run = this.context(logger);

    session.begin();
    try {
      let previous: { generation: GeneratedContent; critique: Critique } | undefined;

      for (let round = 1; round <= maxIterations; round++) {
        if (previous) {
          session.enter("generating");
        }
        const generation = previous
          ? await run.generator.improve(
              { content: previous.generation, critique: previous.critique, targetLength: request.targetLength },
              this.generationOptions(resolved)
            )
          : await run.generator.generate(request, this.generationOptions(resolved));

        const kind = previous ? "improvement" : "initial";
        const { record, critique } = await this.critique(run, session, request, resolved, generation, (overall) => {
          const thresholdMet = overall !== null && overall >= qualityThreshold;
          return {
            kind,
            thresholdMet,
            stoppedAtMax: round === maxIterations && !thresholdMet
          };
        });
        iterations.push(record);

        if (record.thresholdMet) {
          break;
        }
        previous = { generation, critique };
      }

      session.enter("complete");
    } catch (error) {
      session.abort();
      throw error;
    }

    const last = iterations[iterations.length - 1];
    const thresholdMet = last?.thresholdMet ?? false;
    run.logger.info("Refinement finished", {
      session: session.id,
      rounds: iterations.length,
      thresholdMet,
      overall: last?.critique.metrics.overall ?? null
    });
    return { iterations, thresholdMet };
  }

  private context(logger: Logger): RunContext {
    return {
      generator: new GeneratorAgent(this.provider, logger),
      critic: new CriticAgent(this.provider, logger),
      logger
    };
  }

  private async critique(
    run: RunContext,
    session: PipelineSession,
    request: GenerationRequest,
    settings: ResolvedSettings,
    generation: GeneratedContent,
    flagsFor: (overall: number | null) => RecordFlags
  ): Promise<{ record: IterationRecord; critique: Critique }> {
    session.enter("critiquing");
    const critique = await run.critic.review(
      { content: generation, targetLength: request.targetLength },
      { temperature: settings.temperature, maxTokens: settings.critiqueMaxTokens }
    );
    const record = session.append({ topic: request.topic, generation, critique, ...flagsFor(critique.metrics.overall) });

    run.logger.info("Iteration recorded", {
      session: session.id,
      index: record.index,
      kind: record.kind,
      generation: generation.source,
      critique: critique.source,
      overall: critique.metrics.overall
    });
    return { record, critique };
  }

  private generationOptions(settings: ResolvedSettings): StageOptions {
    return {
      temperature: settings.temperature,
      maxTokens: settings.maxTokens,
      now: this.options.now
    };
  }
}
