// guard/diversityGuard.ts
// Admission control: is a generated recipe new enough to hand back to the user?

import { ConfigurationError } from "./errors";
import { embeddingText, fingerprint } from "./fingerprint";
import { historyKey } from "./normalize";
import { effectiveAttemptCap, validatePolicy, windowStart } from "./policy";
import { createScorer } from "./similarity";
import type {
  AdmissionOutcome,
  AvoidListEntry,
  CandidateSubmission,
  EmbeddingProvider,
  GuardPolicy,
  HistoryStore,
  RecipeFingerprint,
  SimilarityScorer,
} from "./types";

export interface DiversityGuardOptions {
  policy: GuardPolicy;
  store: HistoryStore;
  embeddings?: EmbeddingProvider;
  scorer?: SimilarityScorer;
  now?: () => Date;
}

interface ClosestMatch {
  maxSimilarity: number;
  closestTitle: string | null;
}

/** Highest similarity against any active entry; 0 when there are none. */
export function closestMatch(
  candidate: RecipeFingerprint,
  active: readonly AvoidListEntry[],
  scorer: SimilarityScorer,
): ClosestMatch {
  let best: ClosestMatch = { maxSimilarity: 0, closestTitle: null };
  for (const entry of active) {
    const score = scorer.score(candidate, entry.fingerprint);
    if (best.closestTitle === null || score > best.maxSimilarity) {
      best = { maxSimilarity: score, closestTitle: entry.fingerprint.title };
    }
  }
  return best;
}

/**
 * Stateless over its store: attempt counts come in with each submission and the
 * caller decides whether to regenerate. For one user and combo, the read, the
 * comparison and the append run under the store's per-key lock. Stores report
 * their own I/O failures as StoreUnavailableError; anything else propagates as is.
 */
export class DiversityGuard {
  readonly policy: GuardPolicy;
  private readonly store: HistoryStore;
  private readonly embeddings?: EmbeddingProvider;
  private readonly scorer: SimilarityScorer;
  private readonly now: () => Date;

  constructor(options: DiversityGuardOptions) {
    this.policy = validatePolicy(options.policy);
    if (this.policy.useEmbeddings && !options.embeddings) {
      throw new ConfigurationError("useEmbeddings", "enabled but no embedding provider was configured");
    }
    this.store = options.store;
    this.embeddings = options.embeddings;
    this.scorer = options.scorer ?? createScorer(this.policy);
    this.now = options.now ?? (() => new Date());
  }

  async evaluateCandidate(submission: CandidateSubmission): Promise<AdmissionOutcome> {
    const { candidate, comboKey, userId, requestKind, attemptIndex, lowEntropy = false } = submission;

    // Fingerprint first so a malformed candidate never reaches the embedding provider.
    const lexicalPrint = fingerprint(candidate);
    const print = this.policy.useEmbeddings && this.embeddings
      ? fingerprint(candidate, { embedding: await this.embeddings.embed(embeddingText(candidate)) })
      : lexicalPrint;

    const key = historyKey(userId, comboKey);
    const attemptCap = effectiveAttemptCap(this.policy, requestKind, lowEntropy);

    return this.store.withKey<AdmissionOutcome>(key, async (session) => {
      const now = this.now();
      const active = await session.getActive(key, windowStart(now, this.policy.windowDays));
      const { maxSimilarity, closestTitle } = closestMatch(print, active, this.scorer);

      if (maxSimilarity < this.policy.similarityThreshold) {
        await session.append(key, print, now);
        return { status: "ADMITTED", candidate, fingerprint: print, maxSimilarity, closestTitle };
      }

      console.log(
        `[diversityGuard] "${candidate.title}" ~ "${closestTitle}" (sim=${maxSimilarity.toFixed(2)}, ` +
          `attempt ${attemptIndex}/${attemptCap}, kind=${requestKind}${lowEntropy ? ", low-entropy" : ""})`,
      );

      if (attemptIndex < attemptCap) {
        return { status: "REJECTED_RETRY", fingerprint: print, maxSimilarity, closestTitle, attemptIndex, attemptCap };
      }
      return { status: "REJECTED_FINAL", candidate, fingerprint: print, maxSimilarity, closestTitle, attemptIndex, attemptCap };
    });
  }

  /** Drop entries that have aged out of the window. */
  async evictExpired(): Promise<number> {
    return this.store.evictExpired(windowStart(this.now(), this.policy.windowDays));
  }
}
