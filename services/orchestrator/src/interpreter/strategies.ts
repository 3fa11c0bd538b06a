export interface ResultStrategy {
  name: string;
  extract(cleaned: string): boolean | undefined;
}

export interface RationaleStrategy {
  name: string;
  extract(cleaned: string): string | undefined;
}

const MARKER = /(?:결과|result)\s*\**\s*[:：]\s*\**\s*(true|false)\b/i;
const MARKER_GLOBAL = new RegExp(MARKER.source, "gi");
const RESULT_LINE = /^\**\s*(?:결과|result)\s*\**\s*[:：]/i;
const REASON_FIELD = /(?:사유|reason)\s*\**\s*[:：]\s*\**\s*([^\n]+)/i;

const REJECTION_TERMS = [
  "부적합",
  "실패했",
  "위반",
  "테두리가 있",
  "문제가 있",
  "failed",
  "violation",
  "inappropriate",
  "has border",
];

const ACCEPTANCE_TERMS = [
  "통과",
  "문제없",
  "문제가 없",
  "기준 충족",
  "깔끔",
  "clean",
  "meets",
  "criteria",
  "appropriate",
  "no border",
];

export const markerResult: ResultStrategy = {
  name: "marker",
  extract(cleaned) {
    const match = MARKER.exec(cleaned);
    return match ? match[1].toLowerCase() === "true" : undefined;
  },
};

export const singleKeywordResult: ResultStrategy = {
  name: "single-keyword",
  extract(cleaned) {
    const hasTrue = /\btrue\b/i.test(cleaned);
    const hasFalse = /\bfalse\b/i.test(cleaned);
    if (hasTrue === hasFalse) {
      return undefined;
    }
    return hasTrue;
  },
};

// Rejection vocabulary is checked first so "inappropriate" never reads as "appropriate".
export const polarityResult: ResultStrategy = {
  name: "polarity",
  extract(cleaned) {
    const lower = cleaned.toLowerCase();
    if (REJECTION_TERMS.some((term) => lower.includes(term))) {
      return false;
    }
    if (ACCEPTANCE_TERMS.some((term) => lower.includes(term))) {
      return true;
    }
    return false;
  },
};

export const reasonFieldRationale: RationaleStrategy = {
  name: "reason-field",
  extract(cleaned) {
    const match = REASON_FIELD.exec(cleaned);
    const value = match?.[1].trim();
    return value ? value : undefined;
  },
};

export const firstLineRationale: RationaleStrategy = {
  name: "first-line",
  extract(cleaned) {
    return cleaned
      .split("\n")
      .map((line) => line.trim())
      .find((line) => line.length > 5 && !RESULT_LINE.test(line));
  },
};

export const markerStrippedRationale: RationaleStrategy = {
  name: "marker-stripped",
  extract(cleaned) {
    const remainder = cleaned.replace(MARKER_GLOBAL, "").trim();
    return remainder.length > 5 ? remainder : undefined;
  },
};

export const RESULT_STRATEGIES: readonly ResultStrategy[] = [markerResult, singleKeywordResult, polarityResult];

export const RATIONALE_STRATEGIES: readonly RationaleStrategy[] = [
  reasonFieldRationale,
  firstLineRationale,
  markerStrippedRationale,
];
