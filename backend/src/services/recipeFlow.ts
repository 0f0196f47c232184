// services/recipeFlow.ts
// Generate → admit loop. Owns the attempt counter; the guard only judges.

import type { DiversityReport, Recipe, RecipeRequest, RecipeResponse, RequestKind } from "../../../shared/types";
import type { DiversityGuard } from "../guard/diversityGuard";
import { InvalidRecipeError, describeError } from "../guard/errors";
import { fingerprint, titlePrint } from "../guard/fingerprint";
import { comboKeyOf } from "../guard/normalize";
import { effectiveAttemptCap, isLowEntropy } from "../guard/policy";
import { titleSimilarity } from "../guard/similarity";
import type { AdmissionOutcome, GuardPolicy, RejectedFinalOutcome, RejectedRetryOutcome } from "../guard/types";
import { GenerationError } from "./recipeGenerator";
import type { RecipeGenerator } from "./recipeGenerator";

const MAX_GENERATION_FAILURES = 2;

/** Raised when every allowed attempt was a duplicate and policy says not to surface it. */
export class DuplicateRecipeError extends Error {
  constructor(
    message: string,
    readonly report: DiversityReport,
  ) {
    super(message);
    this.name = "DuplicateRecipeError";
  }
}

export interface RecipeFlowDeps {
  guard: DiversityGuard;
  generator: RecipeGenerator;
  maxGenerationFailures?: number;
}

export interface RecipeFlowInput {
  userId: string;
  request: RecipeRequest;
  requestKind: RequestKind;
}

function toReport(outcome: AdmissionOutcome, attempts: number): DiversityReport {
  return {
    attempts,
    maxSimilarity: Number(outcome.maxSimilarity.toFixed(4)),
    closestTitle: outcome.closestTitle,
    duplicate: outcome.status !== "ADMITTED",
  };
}

interface AttemptContext {
  policy: GuardPolicy;
  requestKind: RequestKind;
  attemptIndex: number;
  lowEntropy: boolean;
}

/**
 * Rejection against the titles the caller asked to avoid, scored the way the
 * guard scores titles. Null when the candidate is clear of all of them.
 */
export function checkAvoidedTitles(
  candidate: Recipe,
  avoidTitles: readonly string[],
  { policy, requestKind, attemptIndex, lowEntropy }: AttemptContext,
): RejectedRetryOutcome | RejectedFinalOutcome | null {
  const print = fingerprint(candidate);
  let maxSimilarity = 0;
  let closestTitle: string | null = null;
  for (const title of avoidTitles) {
    const avoided = titlePrint(title);
    const score = titleSimilarity(print, avoided);
    if (closestTitle === null || score > maxSimilarity) {
      maxSimilarity = score;
      closestTitle = avoided.title;
    }
  }
  if (closestTitle === null || maxSimilarity < policy.similarityThreshold) return null;

  const attemptCap = effectiveAttemptCap(policy, requestKind, lowEntropy);
  const base = { fingerprint: print, maxSimilarity, closestTitle, attemptIndex, attemptCap };
  return attemptIndex < attemptCap
    ? { status: "REJECTED_RETRY", ...base }
    : { status: "REJECTED_FINAL", candidate, ...base };
}

export async function generateDiverseRecipe(
  deps: RecipeFlowDeps,
  { userId, request, requestKind }: RecipeFlowInput,
): Promise<RecipeResponse> {
  const { guard, generator } = deps;
  const maxFailures = deps.maxGenerationFailures ?? MAX_GENERATION_FAILURES;
  const comboKey = comboKeyOf(request.ingredients);
  const lowEntropy = isLowEntropy(request.ingredients, guard.policy);
  const avoidTitles = [...request.avoidTitles];

  let attemptIndex = 0;
  let failures = 0;

  for (;;) {
    let candidate: Recipe;
    let outcome: AdmissionOutcome;
    try {
      candidate = await generator.generate({ request, avoidTitles, attemptIndex });
      outcome =
        checkAvoidedTitles(candidate, avoidTitles, { policy: guard.policy, requestKind, attemptIndex, lowEntropy }) ??
        (await guard.evaluateCandidate({
          candidate,
          comboKey,
          userId,
          requestKind,
          attemptIndex,
          lowEntropy,
        }));
    } catch (err) {
      const regenerable = err instanceof GenerationError || err instanceof InvalidRecipeError;
      if (!regenerable || failures >= maxFailures) throw err;
      failures++;
      console.warn(`[recipeFlow] Unusable candidate (${failures}/${maxFailures}), regenerating: ${describeError(err)}`);
      continue;
    }

    switch (outcome.status) {
      case "ADMITTED":
        console.log(`[recipeFlow] Admitted "${candidate.title}" for combo=${comboKey} after ${attemptIndex + 1} attempt(s)`);
        return { recipe: outcome.candidate, diversity: toReport(outcome, attemptIndex + 1) };

      case "REJECTED_RETRY":
        if (!avoidTitles.includes(candidate.title)) avoidTitles.push(candidate.title);
        attemptIndex++;
        continue;

      case "REJECTED_FINAL": {
        const report = toReport(outcome, attemptIndex + 1);
        if (guard.policy.finalOutcome === "fail") {
          throw new DuplicateRecipeError(
            "Could not generate a sufficiently different recipe. Try adding or changing an ingredient.",
            report,
          );
        }
        console.log(`[recipeFlow] Surfacing near-duplicate "${candidate.title}" (sim=${report.maxSimilarity})`);
        return { recipe: outcome.candidate, diversity: report };
      }
    }
  }
}
