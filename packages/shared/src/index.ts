export type TargetLength = "short" | "medium" | "long";
export type Provenance = "model" | "fallback";
export type PipelinePhase = "idle" | "generating" | "critiquing" | "complete";
export type IterationKind = "initial" | "improvement";
export type MetricName = "clarity" | "structure" | "engagement" | "depth" | "completeness" | "overall";
/** `null` means the critic gave no usable score. */
export type MetricScore = number | null;

export interface GenerationRequest {
    readonly topic: string;
    readonly targetLength: TargetLength;
}
export interface GeneratedContent {
    readonly text: string;
    readonly source: Provenance;
    readonly timestamp: string;
}
export interface CritiqueRequest {
    readonly content: GeneratedContent;
    readonly targetLength: TargetLength;
}
export interface ImprovementRequest {
    readonly content: GeneratedContent;
    readonly critique: Critique;
    readonly targetLength: TargetLength;
}
export interface Critique {
    readonly text: string;
    readonly source: Provenance;
    readonly metrics: Readonly<Record<MetricName, MetricScore>>;
}
export interface IterationRecord {
    readonly index: number;
    readonly kind: IterationKind;
    readonly topic: string;
    readonly generation: GeneratedContent;
    readonly critique: Critique;
    readonly thresholdMet: boolean;
    readonly stoppedAtMax: boolean;
}
export interface PipelineSettings {
    targetLength: TargetLength;
    temperature?: number;
    maxTokens?: number;
    critiqueMaxTokens?: number;
}
export interface RefinementSettings {
    qualityThreshold: number;
    maxIterations: number;
}
export interface CreateSessionResponse {
    sessionId: string;
}
export interface IterationRequest {
    topic: string;
    settings?: Partial<PipelineSettings>;
}
export interface RefinementRequest extends IterationRequest {
    refinement: RefinementSettings;
}
export interface RefinementResponse {
    iterations: IterationRecord[];
    thresholdMet: boolean;
}
export interface HistoryResponse {
    sessionId: string;
    phase: PipelinePhase;
    iterations: readonly IterationRecord[];
}
export interface ErrorResponse {
    error: string;
    requestId?: string;
}
