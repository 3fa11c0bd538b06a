import { readFileSync } from "node:fs";
import { z } from "zod";

import { errorMessage } from "./errors.js";

const promptVersionSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  description: z.string().default(""),
  text: z.string().min(1),
});

const promptFileSchema = z.object({
  versions: z.array(promptVersionSchema).min(1),
});

export type PromptVersion = Readonly<z.infer<typeof promptVersionSchema>>;

/**
 * Immutable lookup of instruction texts by id. Built once at startup;
 * stages bind to a prompt id in configuration rather than flipping a
 * shared "active" entry.
 */
export class PromptTable {
  private readonly entries: ReadonlyMap<string, PromptVersion>;

  constructor(versions: readonly PromptVersion[]) {
    const entries = new Map<string, PromptVersion>();
    for (const version of versions) {
      if (entries.has(version.id)) {
        throw new Error(`duplicate prompt id "${version.id}"`);
      }
      entries.set(version.id, Object.freeze({ ...version }));
    }
    this.entries = entries;
  }

  get(id: string): PromptVersion {
    const version = this.entries.get(id);
    if (!version) {
      throw new Error(`unknown prompt id "${id}"`);
    }
    return version;
  }

  has(id: string): boolean {
    return this.entries.has(id);
  }

  ids(): string[] {
    return Array.from(this.entries.keys());
  }
}

export function parsePromptTable(raw: unknown): PromptTable {
  const parsed = promptFileSchema.parse(raw);
  return new PromptTable(parsed.versions);
}

export function loadPromptTable(path: string): PromptTable {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (error) {
    throw new Error(`Failed to read prompts from ${path}: ${errorMessage(error)}`);
  }
  return parsePromptTable(raw);
}
