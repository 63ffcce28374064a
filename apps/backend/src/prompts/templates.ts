import type { CritiqueRequest, GenerationRequest, ImprovementRequest } from "@draftcritic/shared";
import { LENGTH_TIERS } from "./lengthTiers.js";

export interface PromptPair {
  system: string;
  prompt: string;
}

const WRITER_SYSTEM = `You are a professional blog writer. Generate well-structured, informative and engaging blog content on the user's topic.
- Organize it with a clear introduction, body and conclusion.
- Keep it accurate and give practical examples where relevant.
- Use a professional yet conversational tone.`;

const EDITOR_SYSTEM = `You are a professional content editor. Improve existing content so that it addresses every point of the criticism provided.
- Keep the original topic and intent.
- Keep the improved version close to the original length.`;

const CRITIC_SYSTEM = `You are an expert content critic. Give constructive, specific criticism across these dimensions:
1. Clarity and readability
2. Structure and organization
3. Engagement and tone
4. Depth and accuracy
5. Completeness
Finish with actionable suggestions, then a scores block in exactly this format:
Clarity: X/10
Structure: X/10
Engagement: X/10
Depth: X/10
Completeness: X/10
QUALITY SCORE: X/10`;

export function generationPrompt(request: GenerationRequest): PromptPair {
  const tier = LENGTH_TIERS[request.targetLength];
  return {
    system: WRITER_SYSTEM,
    prompt: `Write a blog post about: ${request.topic}\n\n${tier.instruction}`
  };
}

export function improvementPrompt(request: ImprovementRequest): PromptPair {
  const tier = LENGTH_TIERS[request.targetLength];
  return {
    system: EDITOR_SYSTEM,
    prompt: `Improve the following content based on the criticism.

ORIGINAL CONTENT:
${request.content.text}

CRITICISM TO ADDRESS:
${request.critique.text}

${tier.instruction}`
  };
}

export function critiquePrompt(request: CritiqueRequest): PromptPair {
  return {
    system: CRITIC_SYSTEM,
    prompt: `Analyze and critique this content:\n\n${request.content.text}`
  };
}
