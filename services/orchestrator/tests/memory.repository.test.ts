import "reflect-metadata";

import { describe, expect, it, vi } from "vitest";

import { PersistenceError } from "../src/errors.js";
import { saveEach } from "../src/repository/decision.repository.js";
import { InMemoryDecisionRepository } from "../src/repository/memory.repository.js";
import type { DecisionRecord } from "../src/types.js";

const record = (imageRef: string): DecisionRecord => ({
  imageRef,
  mode: "hybrid",
  finalResult: false,
  finalRationale: "border",
  stageTrail: ["heuristic"],
  verdicts: [],
  heuristic: null,
  elapsedMs: 1,
  completedAt: "2026-01-01T00:00:00.000Z",
});

describe("InMemoryDecisionRepository", () => {
  it("stores records under generated ids", async () => {
    const repository = new InMemoryDecisionRepository();

    const id = await repository.save(record("a.png"));
    const stored = await repository.find(id);

    expect(stored?.id).toBe(id);
    expect(stored?.record.imageRef).toBe("a.png");
    expect(stored?.storedAt).toBeInstanceOf(Date);
    await expect(repository.find("00000000-0000-4000-8000-000000000000")).resolves.toBeUndefined();
  });

  it("appends instead of overwriting the same image", async () => {
    const repository = new InMemoryDecisionRepository();

    const first = await repository.save(record("same.png"));
    const second = await repository.save(record("same.png"));

    expect(first).not.toBe(second);
    await expect(repository.listRecent(10)).resolves.toHaveLength(2);
  });

  it("lists newest first up to the limit", async () => {
    const repository = new InMemoryDecisionRepository();
    const outcomes = await repository.saveMany([record("1"), record("2"), record("3")]);

    expect(outcomes.map((outcome) => outcome.stored)).toEqual([true, true, true]);
    const recent = await repository.listRecent(2);
    expect(recent.map((row) => row.record.imageRef)).toEqual(["3", "2"]);
  });

  it("rejects a negative limit", async () => {
    await expect(new InMemoryDecisionRepository().listRecent(-1)).rejects.toBeInstanceOf(PersistenceError);
  });
});

describe("saveEach", () => {
  it("reports a failed write in its slot and keeps going", async () => {
    const repository = new InMemoryDecisionRepository();
    const onError = vi.fn();
    const save = vi.fn(async (candidate: DecisionRecord) => {
      if (candidate.imageRef === "2") {
        throw new PersistenceError("database unavailable");
      }
      return repository.save(candidate);
    });

    const outcomes = await saveEach([record("1"), record("2"), record("3")], save, onError);

    expect(outcomes.map((outcome) => outcome.stored)).toEqual([true, false, true]);
    expect(outcomes[1]).toEqual({ stored: false, error: "database unavailable" });
    expect(onError).toHaveBeenCalledTimes(1);
    expect(save).toHaveBeenCalledTimes(3);
    const recent = await repository.listRecent(10);
    expect(recent.map((row) => row.record.imageRef)).toEqual(["3", "1"]);
  });
});
