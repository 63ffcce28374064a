import type { MetricName, MetricScore } from "@draftcritic/shared";

export type Metrics = Record<MetricName, MetricScore>;

export interface MetricExtraction {
  metrics: Metrics;
  /** Metrics the text gave no usable score for */
  missing: MetricName[];
}

export const METRIC_NAMES: readonly MetricName[] = [
  "clarity",
  "structure",
  "engagement",
  "depth",
  "completeness",
  "overall"
];

const SCORE = String.raw`(\d+(?:\.\d+)?)`;

function rubricPattern(aliases: readonly string[]): RegExp {
  // Name, then up to 40 characters on the same line, then a whole number
  // "N/10". The gap may hold digits, as in "Clarity (1-10): 8/10".
  return new RegExp(String.raw`\b(?:${aliases.join("|")})\b[^\n]{0,40}?(?<![\d.])${SCORE}\s*/\s*10\b`, "gi");
}

const PATTERNS: Readonly<Record<MetricName, readonly RegExp[]>> = {
  clarity: [rubricPattern(["clarity", "readability"])],
  structure: [rubricPattern(["structure", "organization"])],
  engagement: [rubricPattern(["engagement", "tone"])],
  depth: [rubricPattern(["depth", "accuracy"])],
  completeness: [rubricPattern(["completeness"])],
  overall: [new RegExp(String.raw`QUALITY SCORE:?\s*${SCORE}`, "gi"), rubricPattern(["overall"])]
};

function firstScore(text: string, patterns: readonly RegExp[]): MetricScore {
  for (const pattern of patterns) {
    for (const match of text.matchAll(pattern)) {
      const value = Number(match[1]);
      if (value >= 0 && value <= 10) {
        return value;
      }
    }
  }
  return null;
}

export function unscoredMetrics(): Metrics {
  return {
    clarity: null,
    structure: null,
    engagement: null,
    depth: null,
    completeness: null,
    overall: null
  };
}

/**
 * Best-effort read of rubric scores from free-text critique. Every metric key
 * is always present; a metric that cannot be found is null.
 */
export function extractMetrics(text: string): MetricExtraction {
  const metrics = unscoredMetrics();
  const missing: MetricName[] = [];

  for (const name of METRIC_NAMES) {
    const score = firstScore(text, PATTERNS[name]);
    metrics[name] = score;
    if (score === null) {
      missing.push(name);
    }
  }

  return { metrics, missing };
}
