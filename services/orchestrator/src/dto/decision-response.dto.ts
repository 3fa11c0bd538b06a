import type { FailureKind } from "../errors.js";
import type { HeuristicSignal, ModelVerdict, PipelineMode, StageName } from "../types.js";

export class PersistenceStatusDto {
  stored!: boolean;
  error?: string;
}

export class DecisionResponseDto {
  imageRef!: string;
  mode!: PipelineMode;
  finalResult!: boolean;
  finalRationale!: string;
  stageTrail!: readonly StageName[];
  verdicts!: readonly ModelVerdict[];
  heuristic!: HeuristicSignal | null;
  elapsedMs!: number;
  failureKind?: FailureKind;
  failureMessage?: string;
  completedAt!: string;
  storageId?: string;
  persistence!: PersistenceStatusDto;
}

export class BatchItemResponseDto {
  imageRef!: string;
  status!: "completed" | "skipped";
  decision?: DecisionResponseDto;
}

export class BatchResponseDto {
  total!: number;
  completed!: number;
  items!: BatchItemResponseDto[];
}
