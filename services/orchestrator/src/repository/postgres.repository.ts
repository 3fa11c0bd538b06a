import { randomUUID } from "node:crypto";

import { Injectable, Logger, OnModuleDestroy } from "@nestjs/common";
import pg from "pg";

import { PersistenceError, errorMessage } from "../errors.js";
import type { DecisionRecord } from "../types.js";
import { saveEach, type DecisionRepository, type SaveOutcome, type StoredDecision } from "./decision.repository.js";

type DecisionRow = {
  id: string;
  record: DecisionRecord;
  stored_at: Date;
};

@Injectable()
export class PostgresDecisionRepository implements DecisionRepository, OnModuleDestroy {
  private readonly logger = new Logger(PostgresDecisionRepository.name);
  private readonly pool: pg.Pool;
  private initialized = false;

  constructor(databaseUrl: string) {
    this.pool = new pg.Pool({ connectionString: databaseUrl });
  }

  async init(): Promise<void> {
    if (this.initialized) {
      return;
    }
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS decision_records (
        id UUID PRIMARY KEY,
        image_ref TEXT NOT NULL,
        mode TEXT NOT NULL,
        final_result BOOLEAN NOT NULL,
        final_rationale TEXT NOT NULL,
        stage_trail JSONB NOT NULL,
        failure_kind TEXT,
        record JSONB NOT NULL,
        stored_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `);
    await this.pool.query(
      "CREATE INDEX IF NOT EXISTS decision_records_stored_at_idx ON decision_records (stored_at DESC)",
    );
    this.initialized = true;
    this.logger.log("Postgres decision repository ready");
  }

  async save(record: DecisionRecord): Promise<string> {
    const id = randomUUID();
    await this.run(`save decision for ${record.imageRef}`, async () => {
      await this.pool.query(
        `INSERT INTO decision_records (id, image_ref, mode, final_result, final_rationale, stage_trail, failure_kind, record)
         VALUES ($1, $2, $3, $4, $5, $6::jsonb, $7, $8::jsonb)`,
        [
          id,
          record.imageRef,
          record.mode,
          record.finalResult,
          record.finalRationale,
          JSON.stringify(record.stageTrail),
          record.failureKind ?? null,
          JSON.stringify(record),
        ],
      );
    });
    return id;
  }

  async saveMany(records: readonly DecisionRecord[]): Promise<SaveOutcome[]> {
    return saveEach(
      records,
      (record) => this.save(record),
      (error) => this.logger.error(errorMessage(error)),
    );
  }

  async find(id: string): Promise<StoredDecision | undefined> {
    const result = await this.run(`find decision ${id}`, () =>
      this.pool.query<DecisionRow>("SELECT id, record, stored_at FROM decision_records WHERE id = $1", [id]),
    );
    const row = result.rows[0];
    return row ? toStored(row) : undefined;
  }

  async listRecent(limit: number): Promise<StoredDecision[]> {
    const result = await this.run("list recent decisions", () =>
      this.pool.query<DecisionRow>(
        "SELECT id, record, stored_at FROM decision_records ORDER BY stored_at DESC LIMIT $1",
        [limit],
      ),
    );
    return result.rows.map(toStored);
  }

  async onModuleDestroy(): Promise<void> {
    await this.pool.end();
  }

  private async run<T>(operation: string, query: () => Promise<T>): Promise<T> {
    try {
      if (!this.initialized) {
        await this.init();
      }
      return await query();
    } catch (error) {
      throw new PersistenceError(`failed to ${operation}: ${errorMessage(error)}`, { cause: error });
    }
  }
}

function toStored(row: DecisionRow): StoredDecision {
  return { id: row.id, record: row.record, storedAt: new Date(row.stored_at) };
}
