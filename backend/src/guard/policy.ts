// guard/policy.ts
// GuardPolicy defaults, range checks, and attempt-cap rules

import { VALID_FINAL_OUTCOMES } from "../../../shared/types";
import type { RequestKind } from "../../../shared/types";
import { ConfigurationError } from "./errors";
import { normalizeIngredientSet } from "./normalize";
import { DEFAULT_WEIGHTS } from "./similarity";
import type { GuardPolicy } from "./types";

export const DEFAULT_POLICY: GuardPolicy = {
  similarityThreshold: 0.62,
  windowDays: 7,
  perComboCap: 20,
  maxAttemptsDefault: 1,
  maxAttemptsReroll: 2,
  lowEntropyIngredientCount: 3,
  lowEntropyMaxAttempts: 1,
  useEmbeddings: false,
  weights: DEFAULT_WEIGHTS,
  embeddingWeight: 0.5,
  finalOutcome: "surface_last",
};

const DAY_MS = 24 * 60 * 60 * 1000;

function requireInteger(field: string, value: number, min: number): void {
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigurationError(field, `must be an integer >= ${min} (got ${value})`);
  }
}

function requireUnitInterval(field: string, value: number): void {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new ConfigurationError(field, `must be between 0 and 1 (got ${value})`);
  }
}

/** Throw ConfigurationError on the first out-of-range value; return the policy otherwise. */
export function validatePolicy(policy: GuardPolicy): GuardPolicy {
  requireUnitInterval("similarityThreshold", policy.similarityThreshold);
  requireInteger("windowDays", policy.windowDays, 0);
  requireInteger("perComboCap", policy.perComboCap, 1);
  requireInteger("maxAttemptsDefault", policy.maxAttemptsDefault, 0);
  requireInteger("maxAttemptsReroll", policy.maxAttemptsReroll, 0);
  requireInteger("lowEntropyIngredientCount", policy.lowEntropyIngredientCount, 0);
  requireInteger("lowEntropyMaxAttempts", policy.lowEntropyMaxAttempts, 0);
  requireUnitInterval("embeddingWeight", policy.embeddingWeight);

  let weightSum = 0;
  for (const [name, weight] of Object.entries(policy.weights)) {
    if (!Number.isFinite(weight) || weight < 0) {
      throw new ConfigurationError(`weights.${name}`, `must be a non-negative number (got ${weight})`);
    }
    weightSum += weight;
  }
  if (weightSum <= 0) {
    throw new ConfigurationError("weights", "at least one similarity weight must be positive");
  }

  if (!VALID_FINAL_OUTCOMES.some((o) => o === policy.finalOutcome)) {
    throw new ConfigurationError("finalOutcome", `must be one of: ${VALID_FINAL_OUTCOMES.join(", ")}`);
  }
  return policy;
}

/**
 * Retries allowed after a duplicate: the request kind's own cap, lowered to
 * lowEntropyMaxAttempts for low-entropy requests.
 */
export function effectiveAttemptCap(policy: GuardPolicy, kind: RequestKind, lowEntropy = false): number {
  const base = kind === "reroll" ? policy.maxAttemptsReroll : policy.maxAttemptsDefault;
  return lowEntropy ? Math.min(base, policy.lowEntropyMaxAttempts) : base;
}

/** True when fewer distinct ingredients were requested than the low-entropy threshold. */
export function isLowEntropy(requestedIngredients: readonly string[], policy: GuardPolicy): boolean {
  return normalizeIngredientSet(requestedIngredients).length < policy.lowEntropyIngredientCount;
}

export function windowStart(now: Date, windowDays: number): Date {
  return new Date(now.getTime() - windowDays * DAY_MS);
}
