import type { FailureKind } from "./errors.js";

export type ImageMediaType = "image/jpeg" | "image/png" | "image/gif" | "image/webp";

export type PipelineMode = "hybrid" | "staged";

export interface RgbRaster {
  width: number;
  height: number;
  /** Interleaved RGB, 3 bytes per pixel, row-major. */
  data: Uint8Array;
}

export interface ImageSample {
  ref: string;
  raster: RgbRaster | null;
  encoded: Buffer;
  mediaType: ImageMediaType;
  format: string;
}

export interface HueMatch {
  name: string;
  fraction: number;
}

export interface HeuristicSignal {
  hasBorder: boolean;
  confidence: number;
  explanation: string;
  matchedHues: readonly HueMatch[];
  edgeRatio: number;
}

export interface Interpretation {
  result: boolean;
  rationale: string;
}

export interface ModelVerdict extends Interpretation {
  rawText: string;
  backendId: string;
  promptId: string;
}

export type StageName = "heuristic" | "primary" | "secondary" | "error";

export interface DecisionRecord {
  readonly imageRef: string;
  readonly mode: PipelineMode;
  readonly finalResult: boolean;
  readonly finalRationale: string;
  readonly stageTrail: readonly StageName[];
  readonly verdicts: readonly ModelVerdict[];
  readonly heuristic: HeuristicSignal | null;
  readonly elapsedMs: number;
  readonly failureKind?: FailureKind;
  readonly failureMessage?: string;
  readonly completedAt: string;
}

export interface InspectionSubject {
  ref: string;
  load(): Promise<ImageSample>;
}
