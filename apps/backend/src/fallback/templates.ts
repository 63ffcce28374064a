/**
 * Deterministic stand-ins for model output. Same input, same bytes: no clock,
 * no randomness, no environment.
 */

import type { Critique } from "@draftcritic/shared";
import { extractMetrics } from "../metrics.js";

type TemplateKind = "technology" | "business" | "general";

const TEMPLATE_KEYWORDS: Readonly<Record<Exclude<TemplateKind, "general">, readonly string[]>> = {
  technology: ["tech", "ai", "software", "digital", "computer", "algorithm", "data", "robot"],
  business: ["business", "market", "company", "strategy", "management", "startup", "finance"]
};

function tokens(text: string): string[] {
  return text.toLowerCase().split(/[^a-z0-9]+/).filter(Boolean);
}

// Short keywords must match a whole word ("ai" but not "maintain"); longer ones
// also match as a prefix ("tech" in "technology").
function mentions(words: readonly string[], keywords: readonly string[]): boolean {
  return keywords.some((keyword) =>
    words.some((word) => (keyword.length >= 4 ? word.startsWith(keyword) : word === keyword))
  );
}

export function selectTemplate(topic: string): TemplateKind {
  const words = tokens(topic);
  if (mentions(words, TEMPLATE_KEYWORDS.technology)) return "technology";
  if (mentions(words, TEMPLATE_KEYWORDS.business)) return "business";
  return "general";
}

function render(kind: TemplateKind, title: string): string {
  const subject = title.toLowerCase();
  switch (kind) {
    case "technology":
      return `# ${title}

Few subjects are moving as quickly as ${subject}. New tools arrive every year, and each one changes what teams can build and how they build it.

## Key Benefits
- Faster, more efficient work
- Better experiences for end users
- Solutions that scale with demand

## Challenges to Address
- Security and privacy
- Integration with existing systems
- Training and change management

## Looking Forward
Adopting ${subject} pays off when the benefits are weighed against the risks and the rollout is planned step by step.`;
    case "business":
      return `# ${title}

In a competitive market, ${subject} has become a deciding factor for organizations that want to grow and stay sustainable.

## Strategic Importance
- Differentiation from competitors
- Better use of resources
- Stronger long-term revenue

## Implementation Considerations
- Budget and staffing
- Timeline and milestones
- Risks and the metrics that track them

## Best Practices
Success with ${subject} depends on careful planning, support from stakeholders and steady measurement of results.`;
    case "general":
      return `# ${title}

${title} is a topic worth understanding. It touches many parts of everyday life and rewards a closer look.

## Key Points
- The core ideas behind it
- Where it shows up in practice
- What it makes possible
- Common challenges and how to handle them

## Why It Matters
Knowing more about ${subject} leads to better decisions in the situations where it comes up.

## Conclusion
The more closely ${subject} is examined, the more useful insights it offers.`;
  }
}

export function fallbackContent(topic: string): string {
  const title = topic.trim();
  return render(selectTemplate(title), title);
}

interface TextStats {
  words: number;
  paragraphs: number;
  sentences: number;
  hasHeaders: boolean;
}

function textStats(content: string): TextStats {
  return {
    words: content.split(/\s+/).filter(Boolean).length,
    paragraphs: content.split(/\n\s*\n/).filter((block) => block.trim().length > 0).length,
    sentences: content.split(/[.!?]+/).filter((sentence) => sentence.trim().length > 0).length,
    hasHeaders: /^#{1,6}\s/m.test(content)
  };
}

function score(value: number): string {
  return Math.min(10, value).toFixed(1);
}

export function fallbackCritique(content: string): Critique {
  const stats = textStats(content);
  const { words, paragraphs, hasHeaders } = stats;
  const typicalLength = words >= 100 && words <= 600;

  let overall = 5;
  if (words >= 150 && words <= 400) {
    overall += 1.5;
  } else if (typicalLength) {
    overall += 0.5;
  }
  if (hasHeaders) overall += 1;
  if (paragraphs >= 3) overall += 0.5;

  const clarity = words / Math.max(1, stats.sentences) <= 20 ? 7 : 6;
  const structure = 5 + (hasHeaders ? 2 : 0) + (paragraphs >= 3 ? 1 : 0);
  const engagement = 5 + (/[?!]|\byou\b/i.test(content) ? 1 : 0);
  const depth = 5 + (words >= 300 ? 2 : words >= 150 ? 1 : 0);
  const completeness = 5 + (/conclusion|in summary|looking forward/i.test(content) ? 1 : 0);

  const text = `## Content Analysis Report

### Overview
The content has ${words} words in ${paragraphs} paragraph(s), which is ${typicalLength ? "within" : "outside"} the usual 100-600 word range for a blog post.

### Strengths
- ${hasHeaders ? "Section headers make the content easy to scan" : "The text reads as one continuous piece"}
- The writing style is accessible

### Areas for Improvement
- Engagement: add specific examples or a short case study
- Depth: support the main claims with evidence or detail
- Call to action: tell readers what to do next

### Actionable Suggestions
1. Open with a sentence that states why the topic matters.
2. Add at least one concrete, real-world example.
3. End with a conclusion that restates the key takeaways.

### Scores
Clarity: ${score(clarity)}/10
Structure: ${score(structure)}/10
Engagement: ${score(engagement)}/10
Depth: ${score(depth)}/10
Completeness: ${score(completeness)}/10
QUALITY SCORE: ${score(overall)}/10`;

  return { text, source: "fallback", metrics: extractMetrics(text).metrics };
}

/**
 * Applies the edits the critique asks for. Each edit is added at most once,
 * so improving the same text again changes nothing.
 */
export function fallbackImprovement(content: string, critiqueText: string): string {
  const critique = critiqueText.toLowerCase();
  let improved = content.trim();

  if (/structure|organization/.test(critique) && !/^#{1,6}\s+conclusion\b/im.test(improved)) {
    improved += "\n\n## Conclusion\n\nIn summary, the points above are a solid starting place for going further.";
  }
  if (/example|specific/.test(critique) && !improved.includes("**Example:**")) {
    improved +=
      "\n\n**Example:** A small team that applies these ideas to one real project can measure the benefit within weeks.";
  }
  if (/engag/.test(critique) && !improved.includes("**Your turn:**")) {
    improved += "\n\n**Your turn:** Which of these points matters most in your own work?";
  }

  return improved;
}
