import type { TrustPhrases } from "./config.js";
import type { ModelVerdict } from "./types.js";

export type PrimaryAssessment = "trusted_rejection" | "trusted_acceptance" | "ambiguous";

export interface EscalationDecision {
  escalate: boolean;
  reason: PrimaryAssessment;
}

export interface Arbitration {
  finalResult: boolean;
  finalRationale: string;
  overridden: boolean;
}

const containsAny = (text: string, phrases: readonly string[]) => {
  const lower = text.toLowerCase();
  return phrases.some((phrase) => lower.includes(phrase.toLowerCase()));
};

export const complianceLabel = (result: boolean) => (result ? "compliant" : "non-compliant");

/**
 * A primary rejection is trusted only when it names a border; a primary
 * acceptance only when it is stated with absolute certainty. Anything else
 * goes to the secondary reviewer.
 */
export function assessPrimary(verdict: Pick<ModelVerdict, "result" | "rationale">, trust: TrustPhrases): EscalationDecision {
  if (!verdict.result && containsAny(verdict.rationale, trust.borderTerms)) {
    return { escalate: false, reason: "trusted_rejection" };
  }
  if (verdict.result && containsAny(verdict.rationale, trust.certaintyPhrases)) {
    return { escalate: false, reason: "trusted_acceptance" };
  }
  return { escalate: true, reason: "ambiguous" };
}

function describeVerdict(role: string, verdict: ModelVerdict): string {
  return `${role} ${verdict.backendId}: ${complianceLabel(verdict.result)} - ${verdict.rationale}`;
}

export function arbitrate(primary: ModelVerdict, secondary: ModelVerdict): Arbitration {
  const overridden = primary.result !== secondary.result;
  const parts = [describeVerdict("secondary", secondary), describeVerdict("primary", primary)];
  if (overridden) {
    parts.push("secondary overrides primary");
  }
  return {
    finalResult: secondary.result,
    finalRationale: parts.join(" | "),
    overridden,
  };
}
