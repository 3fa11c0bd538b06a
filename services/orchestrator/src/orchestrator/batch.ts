import { Logger } from "@nestjs/common";

import type { DecisionRecord, InspectionSubject } from "../types.js";

export type BatchOutcome =
  | { status: "completed"; ref: string; record: DecisionRecord }
  | { status: "skipped"; ref: string };

export interface BatchOptions {
  concurrency: number;
  signal?: AbortSignal;
  onRecord?: (record: DecisionRecord, index: number) => void | Promise<void>;
}

export interface SubjectInspector {
  inspect(subject: InspectionSubject): Promise<DecisionRecord>;
}

const logger = new Logger("BatchRunner");

export async function runWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results: R[] = new Array<R>(items.length);
  let nextIndex = 0;

  async function worker() {
    while (true) {
      const i = nextIndex;
      nextIndex += 1;
      if (i >= items.length) return;
      results[i] = await fn(items[i], i);
    }
  }

  const workers = Array.from({ length: Math.max(1, Math.min(concurrency, items.length)) }, () => worker());
  await Promise.all(workers);
  return results;
}

/**
 * Inspects subjects through a bounded pool, keeping input order. Once the
 * signal aborts no new inspection starts; running ones finish and the rest
 * come back as `skipped`.
 */
export async function inspectBatch(
  inspector: SubjectInspector,
  subjects: readonly InspectionSubject[],
  options: BatchOptions,
): Promise<BatchOutcome[]> {
  const outcomes = await runWithConcurrency(subjects, options.concurrency, async (subject, index): Promise<BatchOutcome> => {
    if (options.signal?.aborted) {
      return { status: "skipped", ref: subject.ref };
    }
    const record = await inspector.inspect(subject);
    await options.onRecord?.(record, index);
    return { status: "completed", ref: subject.ref, record };
  });

  const skipped = outcomes.filter((outcome) => outcome.status === "skipped").length;
  logger.log(`batch finished: ${outcomes.length - skipped} inspected, ${skipped} skipped`);
  return outcomes;
}
