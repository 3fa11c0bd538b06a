import { Inject, Injectable, Logger } from "@nestjs/common";

import type { AppConfig } from "../config.js";
import type { BatchItemResponseDto, BatchResponseDto, DecisionResponseDto } from "../dto/decision-response.dto.js";
import type { ReportResponseDto } from "../dto/report-response.dto.js";
import { errorMessage } from "../errors.js";
import { ImageLoader } from "../image/image-loader.js";
import { inspectBatch } from "../orchestrator/batch.js";
import { InspectionOrchestrator } from "../orchestrator/inspection.orchestrator.js";
import type { DecisionRepository, SaveOutcome, StoredDecision } from "../repository/decision.repository.js";
import { APP_CONFIG, DECISION_REPOSITORY, IMAGE_LOADER } from "../tokens.js";
import type { DecisionRecord, InspectionSubject } from "../types.js";

const UPLOAD_REF_PREFIX = "upload:";

export function toDecisionResponse(record: DecisionRecord, outcome: SaveOutcome): DecisionResponseDto {
  return {
    ...record,
    ...(outcome.stored ? { storageId: outcome.id } : {}),
    persistence: outcome.stored ? { stored: true } : { stored: false, error: outcome.error },
  };
}

export function toReportResponse(stored: StoredDecision): ReportResponseDto {
  return { id: stored.id, storedAt: stored.storedAt.toISOString(), decision: stored.record };
}

@Injectable()
export class InspectionService {
  private readonly logger = new Logger(InspectionService.name);

  constructor(
    @Inject(APP_CONFIG) private readonly config: AppConfig,
    @Inject(InspectionOrchestrator) private readonly orchestrator: InspectionOrchestrator,
    @Inject(IMAGE_LOADER) private readonly loader: ImageLoader,
    @Inject(DECISION_REPOSITORY) private readonly repository: DecisionRepository,
  ) {}

  async inspectUrl(url: string): Promise<DecisionResponseDto> {
    return this.inspectSubject(this.loader.fromUrl(url));
  }

  async inspectUpload(base64: string, reference?: string): Promise<DecisionResponseDto> {
    return this.inspectBytes(Buffer.from(base64, "base64"), reference);
  }

  async inspectBytes(bytes: Buffer, reference?: string): Promise<DecisionResponseDto> {
    const ref = reference ?? `${UPLOAD_REF_PREFIX}${bytes.length}b`;
    return this.inspectSubject(this.loader.fromBytes(ref, bytes));
  }

  async inspectUrls(urls: readonly string[], signal?: AbortSignal): Promise<BatchResponseDto> {
    const outcomes = await inspectBatch(
      this.orchestrator,
      urls.map((url) => this.loader.fromUrl(url)),
      { concurrency: this.config.pipeline.batchConcurrency, signal },
    );

    const records = outcomes.flatMap((outcome) => (outcome.status === "completed" ? [outcome.record] : []));
    const saved = await this.persistMany(records);

    let cursor = 0;
    const items = outcomes.map((outcome): BatchItemResponseDto => {
      if (outcome.status === "skipped") {
        return { imageRef: outcome.ref, status: "skipped" };
      }
      const decision = toDecisionResponse(outcome.record, saved[cursor]);
      cursor += 1;
      return { imageRef: outcome.ref, status: "completed", decision };
    });

    return { total: items.length, completed: records.length, items };
  }

  async getReport(id: string): Promise<ReportResponseDto | undefined> {
    const stored = await this.repository.find(id);
    return stored ? toReportResponse(stored) : undefined;
  }

  async listReports(limit: number): Promise<ReportResponseDto[]> {
    const rows = await this.repository.listRecent(limit);
    return rows.map(toReportResponse);
  }

  private async inspectSubject(subject: InspectionSubject): Promise<DecisionResponseDto> {
    const record = await this.orchestrator.inspect(subject);
    return toDecisionResponse(record, await this.persist(record));
  }

  private async persist(record: DecisionRecord): Promise<SaveOutcome> {
    try {
      return { stored: true, id: await this.repository.save(record) };
    } catch (error) {
      this.logger.error(`Failed to store decision for ${record.imageRef}: ${errorMessage(error)}`);
      return { stored: false, error: errorMessage(error) };
    }
  }

  private async persistMany(records: readonly DecisionRecord[]): Promise<SaveOutcome[]> {
    if (records.length === 0) {
      return [];
    }
    try {
      return await this.repository.saveMany(records);
    } catch (error) {
      const message = errorMessage(error);
      this.logger.error(`Failed to store batch of ${records.length} decisions: ${message}`);
      return records.map(() => ({ stored: false, error: message }));
    }
  }
}
