import { performance } from "node:perf_hooks";

import { Inject, Injectable, Logger } from "@nestjs/common";

import type { AppConfig, PipelineSettings, StageBinding } from "../config.js";
import { InputError, TransportError, errorMessage, type FailureKind } from "../errors.js";
import { arbitrate, assessPrimary, complianceLabel } from "../escalation.js";
import { detectBorder } from "../heuristic/border-detector.js";
import { interpretResponse } from "../interpreter/interpreter.js";
import type { PromptTable } from "../prompts.js";
import { APP_CONFIG, PROMPT_TABLE, VISION_CLIENTS } from "../tokens.js";
import type {
  DecisionRecord,
  HeuristicSignal,
  ImageSample,
  InspectionSubject,
  ModelVerdict,
  StageName,
} from "../types.js";
import type { VisionClientRegistry } from "../clients/vision-model.client.js";

interface Resolution {
  finalResult: boolean;
  finalRationale: string;
  failureKind?: FailureKind;
  failureMessage?: string;
}

class InspectionRun {
  readonly startedAt = performance.now();
  readonly trail: StageName[] = ["heuristic"];
  readonly verdicts: ModelVerdict[] = [];
  heuristic: HeuristicSignal | null = null;

  constructor(
    readonly subject: InspectionSubject,
    readonly mode: PipelineSettings["mode"],
  ) {}

  enter(stage: StageName): void {
    this.trail.push(stage);
  }

  resolve(resolution: Resolution): DecisionRecord {
    const record: DecisionRecord = {
      imageRef: this.subject.ref,
      mode: this.mode,
      finalResult: resolution.finalResult,
      finalRationale: resolution.finalRationale,
      stageTrail: Object.freeze([...this.trail]),
      verdicts: Object.freeze(this.verdicts.map((verdict) => Object.freeze({ ...verdict }))),
      heuristic: this.heuristic
        ? Object.freeze({ ...this.heuristic, matchedHues: Object.freeze([...this.heuristic.matchedHues]) })
        : null,
      elapsedMs: Math.round((performance.now() - this.startedAt) * 100) / 100,
      ...(resolution.failureKind ? { failureKind: resolution.failureKind } : {}),
      ...(resolution.failureMessage ? { failureMessage: resolution.failureMessage } : {}),
      completedAt: new Date().toISOString(),
    };
    return Object.freeze(record);
  }
}

/**
 * Runs one image through heuristic → primary model → secondary model,
 * stopping as soon as a stage is conclusive. Always resolves to a record.
 */
@Injectable()
export class InspectionOrchestrator {
  private readonly logger = new Logger(InspectionOrchestrator.name);
  private readonly settings: PipelineSettings;

  constructor(
    @Inject(APP_CONFIG) config: AppConfig,
    @Inject(PROMPT_TABLE) private readonly prompts: PromptTable,
    @Inject(VISION_CLIENTS) private readonly clients: VisionClientRegistry,
  ) {
    this.settings = config.pipeline;
    for (const [stage, binding] of Object.entries(this.settings.stages)) {
      if (!clients.has(binding.backend)) {
        throw new Error(`stage ${stage} references backend "${binding.backend}" with no client`);
      }
      if (!prompts.has(binding.promptId)) {
        throw new Error(`stage ${stage} references unknown prompt "${binding.promptId}"`);
      }
    }
  }

  get mode(): PipelineSettings["mode"] {
    return this.settings.mode;
  }

  async inspect(subject: InspectionSubject): Promise<DecisionRecord> {
    const run = new InspectionRun(subject, this.settings.mode);
    try {
      return run.resolve(await this.advance(run));
    } catch (error) {
      const failureKind: FailureKind =
        error instanceof TransportError || error instanceof InputError ? error.kind : "internal";
      const failureMessage = errorMessage(error);
      if (failureKind === "internal") {
        this.logger.error(`${subject.ref}: unexpected failure: ${failureMessage}`);
      } else {
        this.logger.warn(`${subject.ref}: inspection failed (${failureKind}): ${failureMessage}`);
      }
      run.enter("error");
      return run.resolve({
        finalResult: false,
        finalRationale: `inspection failed (${failureKind}): ${failureMessage}`,
        failureKind,
        failureMessage,
      });
    }
  }

  private async advance(run: InspectionRun): Promise<Resolution> {
    const sample = await run.subject.load();

    const signal = detectBorder(sample.raster, this.settings.heuristic);
    run.heuristic = signal;
    this.logger.log(
      `${sample.ref}: heuristic border=${signal.hasBorder} confidence=${signal.confidence} (${signal.explanation})`,
    );
    if (signal.hasBorder) {
      return {
        finalResult: false,
        finalRationale: `decorative border detected by pixel analysis: ${signal.explanation}`,
      };
    }

    if (this.settings.mode === "staged") {
      run.enter("primary");
      const verdict = await this.runStage(run, this.settings.stages.single, sample);
      return { finalResult: verdict.result, finalRationale: verdict.rationale };
    }

    run.enter("primary");
    const primary = await this.runStage(run, this.settings.stages.primary, sample);
    const assessment = assessPrimary(primary, this.settings.trust);
    if (!assessment.escalate) {
      this.logger.log(`${sample.ref}: primary verdict accepted (${assessment.reason})`);
      return { finalResult: primary.result, finalRationale: primary.rationale };
    }

    this.logger.log(`${sample.ref}: escalating to secondary review (${assessment.reason})`);
    run.enter("secondary");
    const secondary = await this.runStage(run, this.settings.stages.secondary, sample);
    const arbitration = arbitrate(primary, secondary);
    if (arbitration.overridden) {
      this.logger.log(
        `${sample.ref}: secondary ${complianceLabel(secondary.result)} overrides primary ${complianceLabel(primary.result)}`,
      );
    }
    return { finalResult: arbitration.finalResult, finalRationale: arbitration.finalRationale };
  }

  private async runStage(run: InspectionRun, binding: StageBinding, sample: ImageSample): Promise<ModelVerdict> {
    const client = this.clients.get(binding.backend);
    if (!client) {
      throw new Error(`no client registered for backend "${binding.backend}"`);
    }
    const prompt = this.prompts.get(binding.promptId);
    const response = await client.submit({
      imageBytes: sample.encoded,
      instructionText: prompt.text,
      mediaType: sample.mediaType,
    });
    const interpretation = interpretResponse(response.text);
    const verdict: ModelVerdict = {
      ...interpretation,
      rawText: response.text,
      backendId: binding.backend,
      promptId: binding.promptId,
    };
    run.verdicts.push(verdict);
    this.logger.log(
      `${sample.ref}: ${binding.backend} (${response.attempt}) says ${complianceLabel(verdict.result)}: ${verdict.rationale}`,
    );
    return verdict;
  }
}
