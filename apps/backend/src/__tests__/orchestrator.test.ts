import { describe, expect, it } from "vitest";
import { InvalidInputError, SessionBusyError } from "../errors.js";
import { fallbackContent, fallbackCritique, fallbackImprovement } from "../fallback/templates.js";
import { silentLogger } from "../logging/index.js";
import type { Logger } from "../logging/index.js";
import { Orchestrator } from "../orchestrator.js";
import type { CompletionRequest, LLMProvider, ModelResult } from "../providers/index.js";
import { OfflineProvider } from "../providers/OfflineProvider.js";
import { RecordingProvider } from "./recordingProvider.js";
import { PipelineSession } from "../session.js";

/** Replies with the scripted texts in order and records every request. */
class ScriptedProvider implements LLMProvider {
  readonly name = "scripted";
  readonly requests: CompletionRequest[] = [];

  constructor(private readonly replies: string[]) {}

  async generate(request: CompletionRequest): Promise<ModelResult> {
    this.requests.push(request);
    const text: string | undefined = this.replies[this.requests.length - 1];
    return text === undefined
      ? { ok: false, failure: { kind: "service_unavailable", message: "script exhausted" } }
      : { ok: true, text };
  }
}

/** Collects `level [request-id] message` lines. */
function capturingLogger(lines: string[], requestId = "-"): Logger {
  const at = (level: string) => (message: string) => {
    lines.push(`${level} [${requestId}] ${message}`);
  };
  return {
    debug: at("debug"),
    info: at("info"),
    warn: at("warn"),
    error: at("error"),
    child: (id) => capturingLogger(lines, id)
  };
}

function orchestrator(provider: LLMProvider): Orchestrator {
  return new Orchestrator(provider, {
    logger: silentLogger,
    defaults: { targetLength: "medium", temperature: 0.7 },
    now: () => new Date("2026-03-01T12:00:00.000Z")
  });
}

describe("Orchestrator.runIteration", () => {
  it("uses the templates for both stages when the model always fails", async () => {
    const session = new PipelineSession();

    const record = await orchestrator(new OfflineProvider()).runIteration(session, "climate change");

    expect(record.generation.source).toBe("fallback");
    expect(record.critique.source).toBe("fallback");
    expect(record.generation.text).toBe(fallbackContent("climate change"));
    expect(record.critique).toEqual(fallbackCritique(record.generation.text));
    expect(record.critique.text.length).toBeGreaterThan(0);
    expect(session.history).toEqual([record]);
    expect(session.phase).toBe("complete");
  });

  it("uses the model text for both stages when the model always succeeds", async () => {
    const session = new PipelineSession();

    const record = await orchestrator(new RecordingProvider("Stub output")).runIteration(session, "AI in healthcare");

    expect(record).toMatchObject({
      index: 1,
      kind: "initial",
      topic: "AI in healthcare",
      thresholdMet: false,
      stoppedAtMax: false,
      generation: { text: "Stub output", source: "model", timestamp: "2026-03-01T12:00:00.000Z" },
      critique: { text: "Stub output", source: "model" }
    });
  });

  it("critiques the content it just generated", async () => {
    const provider = new ScriptedProvider(["Generated draft about tea", "Critique text"]);

    const record = await orchestrator(provider).runIteration(new PipelineSession(), "tea");

    expect(provider.requests).toHaveLength(2);
    expect(provider.requests[0]?.prompt).toContain("tea");
    expect(provider.requests[1]?.prompt).toContain(record.generation.text);
    expect(record.critique.text).toBe("Critique text");
  });

  it("rejects an empty topic before any stage runs", async () => {
    const provider = new RecordingProvider("unused");
    const session = new PipelineSession();

    await expect(orchestrator(provider).runIteration(session, "")).rejects.toThrow(InvalidInputError);
    await expect(orchestrator(provider).runIteration(session, "   ")).rejects.toThrow("Topic must not be empty");

    expect(session.history).toHaveLength(0);
    expect(session.phase).toBe("idle");
    expect(provider.requests).toHaveLength(0);
  });

  it("sends different length instructions for short and long", async () => {
    const provider = new RecordingProvider("ok");
    const pipeline = orchestrator(provider);
    const session = new PipelineSession();

    await pipeline.runIteration(session, "tea", { targetLength: "short" });
    await pipeline.runIteration(session, "tea", { targetLength: "long" });

    const shortPrompt = provider.requests[0]?.prompt;
    const longPrompt = provider.requests[2]?.prompt;
    expect(shortPrompt).not.toBe(longPrompt);
    expect(provider.requests[0]?.maxTokens).toBe(300);
    expect(provider.requests[2]?.maxTokens).toBe(1400);
  });

  it("applies settings to both stages", async () => {
    const provider = new RecordingProvider("ok");

    await orchestrator(provider).runIteration(new PipelineSession(), "tea", {
      temperature: 0.2,
      maxTokens: 250,
      critiqueMaxTokens: 150
    });

    expect(provider.requests.map((request) => [request.temperature, request.maxTokens])).toEqual([
      [0.2, 250],
      [0.2, 150]
    ]);
  });

  it("appends one record per iteration in order", async () => {
    const pipeline = orchestrator(new OfflineProvider());
    const session = new PipelineSession();

    await pipeline.runIteration(session, "tea");
    await pipeline.runIteration(session, "coffee");

    expect(session.history.map((record) => [record.index, record.topic])).toEqual([
      [1, "tea"],
      [2, "coffee"]
    ]);
  });

  it("logs the stages of a run under the caller's request id", async () => {
    const lines: string[] = [];

    await orchestrator(new OfflineProvider()).runIteration(
      new PipelineSession(),
      "tea",
      {},
      capturingLogger(lines).child("req-9")
    );

    expect(lines).toContain("warn [req-9] Generation failed, using template");
    expect(lines).toContain("warn [req-9] Critique failed, using template");
    expect(lines).toContain("info [req-9] Iteration recorded");
    expect(lines.every((line) => line.includes("[req-9]"))).toBe(true);
  });

  it("rejects a run on a busy session", async () => {
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const gated: LLMProvider = {
      name: "gated",
      generate: async () => {
        await gate;
        return { ok: true, text: "done" };
      }
    };
    const pipeline = orchestrator(gated);
    const session = new PipelineSession();

    const first = pipeline.runIteration(session, "tea");
    await expect(pipeline.runIteration(session, "coffee")).rejects.toThrow(SessionBusyError);

    release();
    await expect(first).resolves.toMatchObject({ index: 1, topic: "tea" });
    expect(session.history).toHaveLength(1);
  });
});

describe("Orchestrator.refine", () => {
  it("stops as soon as the overall score reaches the threshold", async () => {
    const provider = new ScriptedProvider([
      "Draft one",
      "Too thin.\nQUALITY SCORE: 5/10",
      "Draft two",
      "Much better.\nQUALITY SCORE: 8.5/10"
    ]);
    const session = new PipelineSession();

    const outcome = await orchestrator(provider).refine(session, "tea", {}, { qualityThreshold: 8, maxIterations: 5 });

    expect(outcome.thresholdMet).toBe(true);
    expect(outcome.iterations.map((record) => [record.kind, record.critique.metrics.overall])).toEqual([
      ["initial", 5],
      ["improvement", 8.5]
    ]);
    expect(outcome.iterations[1]).toMatchObject({ thresholdMet: true, stoppedAtMax: false });
    expect(provider.requests[2]?.prompt).toContain("Draft one");
    expect(provider.requests[2]?.prompt).toContain("QUALITY SCORE: 5/10");
    expect(session.history).toEqual(outcome.iterations);
    expect(session.phase).toBe("complete");
  });

  it("stops at the iteration limit and flags the last record", async () => {
    const session = new PipelineSession();

    const outcome = await orchestrator(new OfflineProvider()).refine(
      session,
      "climate change",
      {},
      { qualityThreshold: 10, maxIterations: 3 }
    );

    const [first, second, third] = outcome.iterations;
    expect(outcome.thresholdMet).toBe(false);
    expect(outcome.iterations.map((record) => record.kind)).toEqual(["initial", "improvement", "improvement"]);
    expect(outcome.iterations.map((record) => record.stoppedAtMax)).toEqual([false, false, true]);
    expect(second?.generation.text).toBe(fallbackImprovement(first?.generation.text ?? "", first?.critique.text ?? ""));
    expect(third?.generation.source).toBe("fallback");
  });

  it("finishes after one round when the first critique already passes", async () => {
    const outcome = await orchestrator(new OfflineProvider()).refine(
      new PipelineSession(),
      "climate change",
      {},
      { qualityThreshold: 1, maxIterations: 4 }
    );

    expect(outcome.iterations).toHaveLength(1);
    expect(outcome.iterations[0]).toMatchObject({ thresholdMet: true, stoppedAtMax: false });
  });

  it("never treats an unscored critique as passing", async () => {
    const outcome = await orchestrator(new RecordingProvider("No scores in here.")).refine(
      new PipelineSession(),
      "tea",
      {},
      { qualityThreshold: 1, maxIterations: 2 }
    );

    expect(outcome.thresholdMet).toBe(false);
    expect(outcome.iterations).toHaveLength(2);
  });

  it("validates the refinement limits before starting", async () => {
    const session = new PipelineSession();
    const pipeline = orchestrator(new OfflineProvider());

    await expect(pipeline.refine(session, "tea", {}, { qualityThreshold: 8, maxIterations: 0 })).rejects.toThrow(
      InvalidInputError
    );
    await expect(pipeline.refine(session, "tea", {}, { qualityThreshold: 11, maxIterations: 3 })).rejects.toThrow(
      "qualityThreshold must be between 1 and 10"
    );
    expect(session.history).toHaveLength(0);
    expect(session.phase).toBe("idle");
  });
});
