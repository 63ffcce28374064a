import type { TargetLength } from "@draftcritic/shared";

export interface LengthTier {
  /** Instruction embedded in the generation prompt */
  instruction: string;
  /** Token budget requested for the generation call */
  maxTokens: number;
}

export const LENGTH_TIERS: Readonly<Record<TargetLength, LengthTier>> = {
  short: { instruction: "Keep it short: about 150 words.", maxTokens: 300 },
  medium: { instruction: "Aim for a medium-length post of about 400 words.", maxTokens: 700 },
  long: { instruction: "Write a long-form post of about 800 words.", maxTokens: 1400 }
};

export const CRITIQUE_MAX_TOKENS = 400;
