import type { Interpretation } from "../types.js";
import {
  RATIONALE_STRATEGIES,
  RESULT_STRATEGIES,
  type RationaleStrategy,
  type ResultStrategy,
} from "./strategies.js";

export const RATIONALE_FALLBACK = "model response could not be interpreted";
export const MAX_RATIONALE_LENGTH = 200;

const SCAFFOLDING: readonly RegExp[] = [
  /<thinking>[\s\S]*?<\/thinking>/gi,
  /Tool #\d+:[^\n]*(?:\n|$)/gi,
  /이미지를 분석하기 위해[^\n]*?불러오겠습니다\.?/g,
  /먼저 이미지를[^\n]*?불러오겠습니다\.?/g,
  /이미지 파일을[^\n]*?읽겠습니다\.?/g,
  /\b(?:let me|i will|i'll) (?:first )?(?:load|open|read) the image(?: file)?(?: first)?\.?/gi,
];

/** Strips tool echoes and preambles, collapses horizontal whitespace, keeps one line per non-empty line. */
export function cleanResponse(text: string): string {
  let cleaned = text;
  for (const pattern of SCAFFOLDING) {
    cleaned = cleaned.replace(pattern, "");
  }
  return cleaned
    .split(/\r?\n/)
    .map((line) => line.replace(/[^\S\n]+/g, " ").trim())
    .filter((line) => line.length > 0)
    .join("\n");
}

// Counts code points so a surrogate pair is never split.
const truncate = (text: string, max: number) => Array.from(text).slice(0, max).join("");

export function tidyRationale(raw: string): string {
  const collapsed = raw
    .replace(/\b(?:true|false)\b/gi, "")
    .replace(/\s+/g, " ")
    .replace(/^[\s\-–—:：*.,;]+/, "")
    .trim();
  const tidied = truncate(collapsed, MAX_RATIONALE_LENGTH).trim();
  return tidied || RATIONALE_FALLBACK;
}

function firstDefined<T, S extends { extract(cleaned: string): T | undefined }>(
  strategies: readonly S[],
  cleaned: string,
): T | undefined {
  for (const strategy of strategies) {
    const value = strategy.extract(cleaned);
    if (value !== undefined) {
      return value;
    }
  }
  return undefined;
}

/**
 * Maps free-form model output to a verdict. Total: any input, including an
 * empty string, yields a result; unreadable text resolves to `false`.
 */
export function interpretResponse(
  text: string,
  resultStrategies: readonly ResultStrategy[] = RESULT_STRATEGIES,
  rationaleStrategies: readonly RationaleStrategy[] = RATIONALE_STRATEGIES,
): Interpretation {
  const cleaned = cleanResponse(text);
  if (!cleaned) {
    return { result: false, rationale: RATIONALE_FALLBACK };
  }

  const result = firstDefined<boolean, ResultStrategy>(resultStrategies, cleaned) ?? false;
  const rationale = firstDefined<string, RationaleStrategy>(rationaleStrategies, cleaned);

  return { result, rationale: tidyRationale(rationale ?? RATIONALE_FALLBACK) };
}
