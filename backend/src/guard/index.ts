export { DiversityGuard, closestMatch } from "./diversityGuard";
export type { DiversityGuardOptions } from "./diversityGuard";
export { InMemoryHistoryStore } from "./memoryStore";
export { PgHistoryStore } from "./pgStore";
export { fingerprint } from "./fingerprint";
export { similarity, createScorer, lexicalScorer, embeddingScorer, DEFAULT_WEIGHTS } from "./similarity";
export { comboKeyOf, historyKey } from "./normalize";
export { DEFAULT_POLICY, effectiveAttemptCap, isLowEntropy, validatePolicy } from "./policy";
export * from "./errors";
export type * from "./types";
