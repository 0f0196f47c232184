import { SIZE_BUCKETS } from "./guard/types";
import type { AvoidListEntry, RecipeFingerprint, SizeBucket } from "./guard/types";

export interface AvoidListRow {
  id: string | number;
  history_key: string;
  fingerprint: unknown;
  created_at: Date | string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === "string");
}

function isNumberArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every((v) => typeof v === "number");
}

function isBucket(value: unknown): value is SizeBucket {
  return SIZE_BUCKETS.some((b) => b === value);
}

/** Validate a fingerprint read back from a JSONB column. */
export function parseFingerprint(value: unknown): RecipeFingerprint {
  const raw: unknown = typeof value === "string" ? JSON.parse(value) : value;
  if (!isRecord(raw)) {
    throw new Error("Stored fingerprint is not an object");
  }
  const { title, titleTokens, ingredients, tags, structure, embedding } = raw;
  if (
    !isRecord(structure) ||
    typeof title !== "string" ||
    !isStringArray(titleTokens) ||
    !isStringArray(ingredients) ||
    !isStringArray(tags) ||
    !isBucket(structure.ingredientBucket) ||
    !isBucket(structure.stepBucket) ||
    (embedding !== undefined && embedding !== null && !isNumberArray(embedding))
  ) {
    throw new Error("Stored fingerprint has an unexpected shape");
  }
  return {
    title,
    titleTokens,
    ingredients,
    tags,
    structure: { ingredientBucket: structure.ingredientBucket, stepBucket: structure.stepBucket },
    ...(isNumberArray(embedding) ? { embedding } : {}),
  };
}

/** Convert a raw avoid_list_entries row into a typed AvoidListEntry. */
export function rowToEntry(row: AvoidListRow): AvoidListEntry {
  return {
    key: row.history_key,
    fingerprint: parseFingerprint(row.fingerprint),
    createdAt: new Date(row.created_at),
    seq: Number(row.id),
  };
}
