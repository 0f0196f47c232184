// guard/fingerprint.ts
// Recipe → RecipeFingerprint

import type { Recipe } from "../../../shared/types";
import { InvalidRecipeError } from "./errors";
import {
  normalizeIngredientSet,
  normalizeTag,
  normalizeTitle,
  techniqueLabels,
  titleTokens,
} from "./normalize";
import type { RecipeFingerprint, SizeBucket, TitlePrint } from "./types";

const INGREDIENT_BUCKET_LIMITS = { small: 5, medium: 10 };
const STEP_BUCKET_LIMITS = { small: 3, medium: 7 };

function bucketOf(count: number, limits: { small: number; medium: number }): SizeBucket {
  if (count <= limits.small) return "small";
  if (count <= limits.medium) return "medium";
  return "large";
}

export function ingredientBucket(count: number): SizeBucket {
  return bucketOf(count, INGREDIENT_BUCKET_LIMITS);
}

export function stepBucket(count: number): SizeBucket {
  return bucketOf(count, STEP_BUCKET_LIMITS);
}

function collectTags(recipe: Recipe): string[] {
  const tags = new Set<string>();
  if (recipe.cuisine && recipe.cuisine !== "Any") tags.add(`cuisine:${normalizeTag(recipe.cuisine)}`);
  if (recipe.audience && recipe.audience !== "Everyone") tags.add(`audience:${normalizeTag(recipe.audience)}`);
  for (const tag of recipe.tags ?? []) {
    const normalized = normalizeTag(tag);
    if (normalized) tags.add(normalized);
  }
  for (const label of techniqueLabels(recipe.title)) tags.add(`method:${label}`);
  return [...tags].sort();
}

/**
 * Compute the fingerprint of a candidate recipe.
 * Throws InvalidRecipeError when the recipe has no usable ingredient or no step.
 */
export function fingerprint(recipe: Recipe, options: { embedding?: number[] } = {}): RecipeFingerprint {
  const ingredients = normalizeIngredientSet((recipe.ingredientsUsed ?? []).map((i) => i.name ?? ""));
  if (ingredients.length === 0) {
    throw new InvalidRecipeError(`Recipe "${recipe.title}" has no ingredients`);
  }

  const steps = (recipe.instructions ?? []).filter((s) => typeof s === "string" && s.trim());
  if (steps.length === 0) {
    throw new InvalidRecipeError(`Recipe "${recipe.title}" has no steps`);
  }

  const result: RecipeFingerprint = {
    title: normalizeTitle(recipe.title ?? ""),
    titleTokens: Object.freeze(titleTokens(recipe.title ?? "")),
    ingredients: Object.freeze(ingredients),
    tags: Object.freeze(collectTags(recipe)),
    structure: Object.freeze({
      ingredientBucket: ingredientBucket(ingredients.length),
      stepBucket: stepBucket(steps.length),
    }),
    ...(options.embedding ? { embedding: Object.freeze([...options.embedding]) } : {}),
  };
  return Object.freeze(result);
}

/** Text sent to an embedding provider for a recipe. */
/** The title half of a fingerprint, for comparing against bare titles. */
export function titlePrint(title: string): TitlePrint {
  return { title: normalizeTitle(title), titleTokens: Object.freeze(titleTokens(title)) };
}

export function embeddingText(recipe: Recipe): string {
  const names = (recipe.ingredientsUsed ?? []).map((i) => i.name).join(", ");
  return `${recipe.title}\nIngredients: ${names}\n${(recipe.instructions ?? []).join(" ")}`;
}
