import { errorMessage } from "../errors.js";
import type { DecisionRecord } from "../types.js";

export interface StoredDecision {
  id: string;
  record: DecisionRecord;
  storedAt: Date;
}

export type SaveOutcome = { stored: true; id: string } | { stored: false; error: string };

/** Append-only store of decision records. Implementations raise `PersistenceError`. */
export interface DecisionRepository {
  save(record: DecisionRecord): Promise<string>;
  saveMany(records: readonly DecisionRecord[]): Promise<SaveOutcome[]>;
  find(id: string): Promise<StoredDecision | undefined>;
  listRecent(limit: number): Promise<StoredDecision[]>;
}

/** Saves one record at a time; a failed write is reported in its slot and does not stop the rest. */
export async function saveEach(
  records: readonly DecisionRecord[],
  save: (record: DecisionRecord) => Promise<string>,
  onError?: (error: unknown) => void,
): Promise<SaveOutcome[]> {
  const outcomes: SaveOutcome[] = [];
  for (const record of records) {
    try {
      outcomes.push({ stored: true, id: await save(record) });
    } catch (error) {
      onError?.(error);
      outcomes.push({ stored: false, error: errorMessage(error) });
    }
  }
  return outcomes;
}
