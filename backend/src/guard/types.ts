import type { FinalOutcomePolicy, Recipe, RequestKind } from "../../../shared/types";

export const SIZE_BUCKETS = ["small", "medium", "large"] as const;
export type SizeBucket = (typeof SIZE_BUCKETS)[number];

export interface StructuralSignature {
  ingredientBucket: SizeBucket;
  stepBucket: SizeBucket;
}

/** Comparable summary of a recipe. Frozen once computed. */
export interface RecipeFingerprint {
  readonly title: string;
  readonly titleTokens: readonly string[];
  readonly ingredients: readonly string[];
  readonly tags: readonly string[];
  readonly structure: Readonly<StructuralSignature>;
  readonly embedding?: readonly number[];
}

/** Just the title fields of a fingerprint. */
export type TitlePrint = Pick<RecipeFingerprint, "title" | "titleTokens">;

export interface AvoidListEntry {
  key: string;
  fingerprint: RecipeFingerprint;
  createdAt: Date;
  seq: number;
}

export interface SimilarityWeights {
  ingredients: number;
  title: number;
  structure: number;
  tags: number;
}

export interface GuardPolicy {
  similarityThreshold: number;
  windowDays: number;
  perComboCap: number;
  maxAttemptsDefault: number;
  maxAttemptsReroll: number;
  lowEntropyIngredientCount: number;
  lowEntropyMaxAttempts: number;
  useEmbeddings: boolean;
  weights: SimilarityWeights;
  embeddingWeight: number;
  finalOutcome: FinalOutcomePolicy;
}

// ── Similarity strategy ──

export interface SimilarityScorer {
  readonly name: string;
  score(a: RecipeFingerprint, b: RecipeFingerprint): number;
}

export interface EmbeddingProvider {
  embed(text: string): Promise<number[]>;
}

// ── History store ──

/** Reads and writes scoped to one key, valid inside `HistoryStore.withKey`. */
export interface HistorySession {
  getActive(key: string, windowStart: Date): Promise<AvoidListEntry[]>;
  append(key: string, fingerprint: RecipeFingerprint, timestamp: Date): Promise<void>;
}

export interface HistoryStore extends HistorySession {
  /** Runs `fn` with every other `withKey` call on the same key held off until it settles. */
  withKey<T>(key: string, fn: (session: HistorySession) => Promise<T>): Promise<T>;
  /** Deletes entries created before `before`. Returns how many went. */
  evictExpired(before: Date): Promise<number>;
}

// ── Admission ──

export interface CandidateSubmission {
  candidate: Recipe;
  comboKey: string;
  userId: string;
  requestKind: RequestKind;
  attemptIndex: number;
  lowEntropy?: boolean;
}

interface OutcomeBase {
  maxSimilarity: number;
  closestTitle: string | null;
  fingerprint: RecipeFingerprint;
}

export interface AdmittedOutcome extends OutcomeBase {
  status: "ADMITTED";
  candidate: Recipe;
}

export interface RejectedRetryOutcome extends OutcomeBase {
  status: "REJECTED_RETRY";
  attemptIndex: number;
  attemptCap: number;
}

export interface RejectedFinalOutcome extends OutcomeBase {
  status: "REJECTED_FINAL";
  candidate: Recipe;
  attemptIndex: number;
  attemptCap: number;
}

export type AdmissionOutcome = AdmittedOutcome | RejectedRetryOutcome | RejectedFinalOutcome;
