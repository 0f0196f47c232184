// config.ts
// Environment → typed settings. Read once at startup; bad values fail before the server listens.

import { VALID_FINAL_OUTCOMES } from "../../shared/types";
import { ConfigurationError } from "./guard/errors";
import { DEFAULT_POLICY, validatePolicy } from "./guard/policy";
import type { GuardPolicy } from "./guard/types";

type Env = Record<string, string | undefined>;

// setInterval clamps delays above 2^31 - 1 ms to 1 ms
export const MAX_EVICTION_INTERVAL_MINUTES = Math.floor((2 ** 31 - 1) / 60_000);

export const VALID_STORES = ["memory", "postgres"] as const;
export type StoreKind = (typeof VALID_STORES)[number];

export interface EmbeddingsConfig {
  url: string;
  apiKey: string | undefined;
  model: string;
}

export interface ServiceConfig {
  port: number;
  store: StoreKind;
  databaseUrl: string | undefined;
  clerkSecretKey: string | undefined;
  anthropicApiKey: string | undefined;
  anthropicModel: string;
  temperature: number;
  embeddings: EmbeddingsConfig | undefined;
  evictionIntervalMinutes: number;
}

function raw(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

export function readNumber(env: Env, name: string, fallback: number): number {
  const value = raw(env, name);
  if (value === undefined) return fallback;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new ConfigurationError(name, `must be a number (got "${value}")`);
  }
  return parsed;
}

export function readBoolean(env: Env, name: string, fallback: boolean): boolean {
  const value = raw(env, name)?.toLowerCase();
  if (value === undefined) return fallback;
  if (["true", "1", "yes", "on"].includes(value)) return true;
  if (["false", "0", "no", "off"].includes(value)) return false;
  throw new ConfigurationError(name, `must be true or false (got "${value}")`);
}

export function readEnum<T extends string>(env: Env, name: string, allowed: readonly T[], fallback: T): T {
  const value = raw(env, name);
  if (value === undefined) return fallback;
  const match = allowed.find((a) => a === value);
  if (!match) {
    throw new ConfigurationError(name, `must be one of: ${allowed.join(", ")} (got "${value}")`);
  }
  return match;
}

export function loadGuardPolicy(env: Env = process.env): GuardPolicy {
  const d = DEFAULT_POLICY;
  return validatePolicy({
    similarityThreshold: readNumber(env, "DIVERSITY_SIMILARITY_THRESHOLD", d.similarityThreshold),
    windowDays: readNumber(env, "DIVERSITY_WINDOW_DAYS", d.windowDays),
    perComboCap: readNumber(env, "DIVERSITY_PER_COMBO_CAP", d.perComboCap),
    maxAttemptsDefault: readNumber(env, "DIVERSITY_MAX_ATTEMPTS_DEFAULT", d.maxAttemptsDefault),
    maxAttemptsReroll: readNumber(env, "DIVERSITY_MAX_ATTEMPTS_REROLL", d.maxAttemptsReroll),
    lowEntropyIngredientCount: readNumber(env, "LOW_ENTROPY_INGREDIENT_COUNT", d.lowEntropyIngredientCount),
    lowEntropyMaxAttempts: readNumber(env, "LOW_ENTROPY_MAX_ATTEMPTS", d.lowEntropyMaxAttempts),
    useEmbeddings: readBoolean(env, "USE_EMBEDDINGS", d.useEmbeddings),
    weights: {
      ingredients: readNumber(env, "DIVERSITY_WEIGHT_INGREDIENTS", d.weights.ingredients),
      title: readNumber(env, "DIVERSITY_WEIGHT_TITLE", d.weights.title),
      structure: readNumber(env, "DIVERSITY_WEIGHT_STRUCTURE", d.weights.structure),
      tags: readNumber(env, "DIVERSITY_WEIGHT_TAGS", d.weights.tags),
    },
    embeddingWeight: readNumber(env, "DIVERSITY_EMBEDDING_WEIGHT", d.embeddingWeight),
    finalOutcome: readEnum(env, "DIVERSITY_FINAL_OUTCOME", VALID_FINAL_OUTCOMES, d.finalOutcome),
  });
}

export function loadServiceConfig(env: Env = process.env): ServiceConfig {
  const store = readEnum(env, "DIVERSITY_STORE", VALID_STORES, "memory");
  const databaseUrl = raw(env, "DATABASE_URL");
  if (store === "postgres" && !databaseUrl) {
    throw new ConfigurationError("DATABASE_URL", "required when DIVERSITY_STORE=postgres");
  }

  const temperature = readNumber(env, "RECIPE_TEMPERATURE", 0.6);
  if (temperature < 0 || temperature > 1) {
    throw new ConfigurationError("RECIPE_TEMPERATURE", "must be between 0 and 1");
  }

  const evictionIntervalMinutes = readNumber(env, "DIVERSITY_EVICTION_INTERVAL_MINUTES", 60);
  if (evictionIntervalMinutes <= 0 || evictionIntervalMinutes > MAX_EVICTION_INTERVAL_MINUTES) {
    throw new ConfigurationError(
      "DIVERSITY_EVICTION_INTERVAL_MINUTES",
      `must be positive and at most ${MAX_EVICTION_INTERVAL_MINUTES} (got ${evictionIntervalMinutes})`,
    );
  }

  const embeddingsUrl = raw(env, "EMBEDDINGS_URL");

  return {
    port: readNumber(env, "PORT", 3001),
    store,
    databaseUrl,
    clerkSecretKey: raw(env, "CLERK_SECRET_KEY"),
    anthropicApiKey: raw(env, "ANTHROPIC_API_KEY"),
    anthropicModel: raw(env, "ANTHROPIC_MODEL") ?? "claude-sonnet-4-5-20250929",
    temperature,
    embeddings: embeddingsUrl
      ? {
        url: embeddingsUrl,
        apiKey: raw(env, "EMBEDDINGS_API_KEY"),
        model: raw(env, "EMBEDDINGS_MODEL") ?? "text-embedding-3-small",
      }
      : undefined,
    evictionIntervalMinutes,
  };
}
