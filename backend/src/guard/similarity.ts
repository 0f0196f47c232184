// guard/similarity.ts
// Fingerprint similarity: lexical, structural, and optional embedding scorers

import { SIZE_BUCKETS } from "./types";
import type {
  GuardPolicy,
  RecipeFingerprint,
  SimilarityScorer,
  SimilarityWeights,
  StructuralSignature,
  TitlePrint,
} from "./types";

export const DEFAULT_WEIGHTS: SimilarityWeights = {
  ingredients: 0.55,
  title: 0.25,
  structure: 0.1,
  tags: 0.1,
};

/** Jaccard index of two sets. Two empty sets are identical (1); one empty set shares nothing (0). */
export function jaccard(a: readonly string[], b: readonly string[]): number {
  const sa = new Set(a);
  const sb = new Set(b);
  if (sa.size === 0 && sb.size === 0) return 1;
  if (sa.size === 0 || sb.size === 0) return 0;
  let shared = 0;
  for (const item of sa) if (sb.has(item)) shared++;
  return shared / (sa.size + sb.size - shared);
}

export function trigrams(text: string): Map<string, number> {
  const t = text.toLowerCase().replace(/ /g, "_");
  const counts = new Map<string, number>();
  for (let i = 0; i + 3 <= t.length; i++) {
    const gram = t.slice(i, i + 3);
    counts.set(gram, (counts.get(gram) ?? 0) + 1);
  }
  return counts;
}

/** Cosine of two trigram count vectors. Keys are visited in sorted order so a·b and b·a agree bit for bit. */
export function trigramCosine(a: string, b: string): number {
  if (a === b) return a.length >= 3 ? 1 : 0;
  const ta = trigrams(a);
  const tb = trigrams(b);
  if (ta.size === 0 || tb.size === 0) return 0;

  const keys = [...new Set([...ta.keys(), ...tb.keys()])].sort();
  let dot = 0;
  let na = 0;
  let nb = 0;
  for (const k of keys) {
    const x = ta.get(k) ?? 0;
    const y = tb.get(k) ?? 0;
    dot += x * y;
    na += x * x;
    nb += y * y;
  }
  return clamp01(dot / (Math.sqrt(na) * Math.sqrt(nb)));
}

export function levenshteinDistance(a: string, b: string): number {
  if (a === b) return 0;
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  let prev = Array.from({ length: b.length + 1 }, (_, j) => j);
  for (let i = 1; i <= a.length; i++) {
    const curr = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      curr[j] = Math.min(prev[j] + 1, curr[j - 1] + 1, prev[j - 1] + cost);
    }
    prev = curr;
  }
  return prev[b.length];
}

/** 1 - edit distance / longer length. */
export function levenshteinSimilarity(a: string, b: string): number {
  if (a === b) return 1;
  if (a.length === 0 || b.length === 0) return 0;
  return 1 - levenshteinDistance(a, b) / Math.max(a.length, b.length);
}

/** Title similarity: trigram and token overlap weigh most, raw edit distance breaks ties. */
export function titleSimilarity(a: TitlePrint, b: TitlePrint): number {
  if (a.title === b.title) return 1;
  return blend([
    [0.45, trigramCosine(a.title, b.title)],
    [0.45, jaccard(a.titleTokens, b.titleTokens)],
    [0.1, levenshteinSimilarity(a.title, b.title)],
  ]);
}

function bucketAgreement(x: string, y: string): number {
  const distance = Math.abs(
    SIZE_BUCKETS.findIndex((b) => b === x) - SIZE_BUCKETS.findIndex((b) => b === y),
  );
  if (distance === 0) return 1;
  return distance === 1 ? 0.5 : 0;
}

export function structuralSimilarity(a: StructuralSignature, b: StructuralSignature): number {
  return (bucketAgreement(a.ingredientBucket, b.ingredientBucket) + bucketAgreement(a.stepBucket, b.stepBucket)) / 2;
}

export function cosine(a: readonly number[], b: readonly number[]): number {
  if (a.length === 0 || a.length !== b.length) return 0;
  if (a.every((v, i) => v === b[i])) return 1;
  let dot = 0;
  let na = 0;
  let nb = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    na += a[i] * a[i];
    nb += b[i] * b[i];
  }
  if (na === 0 || nb === 0) return 0;
  return clamp01(dot / (Math.sqrt(na) * Math.sqrt(nb)));
}

function clamp01(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

/**
 * Weighted mean of [weight, score] pairs. Numerator and denominator are summed in
 * the same order so all-ones input yields exactly 1.
 */
export function blend(parts: Array<[number, number]>): number {
  let total = 0;
  let weighted = 0;
  for (const [weight, score] of parts) {
    total += weight;
    weighted += weight * score;
  }
  return total > 0 ? clamp01(weighted / total) : 0;
}

/** Lexical and structural similarity of two fingerprints, in [0, 1]. */
export function similarity(
  a: RecipeFingerprint,
  b: RecipeFingerprint,
  weights: SimilarityWeights = DEFAULT_WEIGHTS,
): number {
  return blend([
    [weights.ingredients, jaccard(a.ingredients, b.ingredients)],
    [weights.title, titleSimilarity(a, b)],
    [weights.structure, structuralSimilarity(a.structure, b.structure)],
    [weights.tags, jaccard(a.tags, b.tags)],
  ]);
}

export function lexicalScorer(weights: SimilarityWeights = DEFAULT_WEIGHTS): SimilarityScorer {
  return {
    name: "lexical",
    score: (a, b) => similarity(a, b, weights),
  };
}

/**
 * Lexical score blended with embedding cosine. Falls back to the lexical score
 * when either side was fingerprinted without an embedding.
 */
export function embeddingScorer(
  weights: SimilarityWeights = DEFAULT_WEIGHTS,
  embeddingWeight = 0.5,
): SimilarityScorer {
  return {
    name: "embedding",
    score: (a, b) => {
      const lexical = similarity(a, b, weights);
      if (!a.embedding || !b.embedding) return lexical;
      return blend([
        [1 - embeddingWeight, lexical],
        [embeddingWeight, cosine(a.embedding, b.embedding)],
      ]);
    },
  };
}

export function createScorer(policy: Pick<GuardPolicy, "useEmbeddings" | "weights" | "embeddingWeight">): SimilarityScorer {
  return policy.useEmbeddings
    ? embeddingScorer(policy.weights, policy.embeddingWeight)
    : lexicalScorer(policy.weights);
}
