import { randomUUID } from "node:crypto";

import { Injectable } from "@nestjs/common";

import { PersistenceError } from "../errors.js";
import type { DecisionRecord } from "../types.js";
import { saveEach, type DecisionRepository, type SaveOutcome, type StoredDecision } from "./decision.repository.js";

@Injectable()
export class InMemoryDecisionRepository implements DecisionRepository {
  private readonly rows: StoredDecision[] = [];

  async save(record: DecisionRecord): Promise<string> {
    const id = randomUUID();
    this.rows.push({ id, record, storedAt: new Date() });
    return id;
  }

  async saveMany(records: readonly DecisionRecord[]): Promise<SaveOutcome[]> {
    return saveEach(records, (record) => this.save(record));
  }

  async find(id: string): Promise<StoredDecision | undefined> {
    const row = this.rows.find((candidate) => candidate.id === id);
    return row ? { ...row, storedAt: new Date(row.storedAt) } : undefined;
  }

  async listRecent(limit: number): Promise<StoredDecision[]> {
    if (!Number.isInteger(limit) || limit < 0) {
      throw new PersistenceError(`limit must be a non-negative integer, got ${limit}`);
    }
    return this.rows
      .slice()
      .reverse()
      .slice(0, limit)
      .map((row) => ({ ...row, storedAt: new Date(row.storedAt) }));
  }
}
