import {
  MAX_REQUESTED_INGREDIENTS,
  MAX_SERVINGS,
  VALID_AUDIENCES,
  VALID_CUISINES,
} from "../../shared/types";
import type { Audience, Cuisine, Recipe, RecipeIngredient, RecipeRequest } from "../../shared/types";

export interface FieldError {
  field: string;
  message: string;
}

export type ValidationResult<T> =
  | { isValid: true; errors: FieldError[]; value: T }
  | { isValid: false; errors: FieldError[] };

function ok<T>(value: T): ValidationResult<T> {
  return { isValid: true, errors: [], value };
}

function fail(errors: FieldError[]): { isValid: false; errors: FieldError[] } {
  return { isValid: false, errors };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isNonBlankString(value: unknown): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

function pickEnum<T extends string>(allowed: readonly T[], value: unknown): T | undefined {
  return allowed.find((a) => a === value);
}

export function validateRecipeRequest(data: unknown): ValidationResult<RecipeRequest> {
  if (!isRecord(data)) return fail([{ field: "body", message: "Request body must be a JSON object" }]);
  const errors: FieldError[] = [];

  let ingredients: string[] = [];
  if (!Array.isArray(data.ingredients) || data.ingredients.length === 0) {
    errors.push({ field: "ingredients", message: "At least one ingredient is required" });
  } else if (data.ingredients.length > MAX_REQUESTED_INGREDIENTS) {
    errors.push({ field: "ingredients", message: `At most ${MAX_REQUESTED_INGREDIENTS} ingredients` });
  } else if (!data.ingredients.every(isNonBlankString)) {
    errors.push({ field: "ingredients", message: "Ingredients must be non-empty strings" });
  } else {
    ingredients = data.ingredients.map((i: string) => i.trim());
  }

  let cuisine: Cuisine = "Any";
  if (data.cuisine != null) {
    const picked = pickEnum(VALID_CUISINES, data.cuisine);
    if (picked) cuisine = picked;
    else errors.push({ field: "cuisine", message: `Must be one of: ${VALID_CUISINES.join(", ")}` });
  }

  let audience: Audience = "Everyone";
  if (data.audience != null) {
    const picked = pickEnum(VALID_AUDIENCES, data.audience);
    if (picked) audience = picked;
    else errors.push({ field: "audience", message: `Must be one of: ${VALID_AUDIENCES.join(", ")}` });
  }

  let servings = 1;
  if (data.servings != null) {
    if (typeof data.servings !== "number" || !Number.isInteger(data.servings) || data.servings < 1 || data.servings > MAX_SERVINGS) {
      errors.push({ field: "servings", message: `Must be an integer between 1 and ${MAX_SERVINGS}` });
    } else {
      servings = data.servings;
    }
  }

  let avoidTitles: string[] = [];
  if (data.avoidTitles != null) {
    if (!Array.isArray(data.avoidTitles) || !data.avoidTitles.every((t) => typeof t === "string")) {
      errors.push({ field: "avoidTitles", message: "Must be an array of strings" });
    } else {
      avoidTitles = data.avoidTitles.filter(isNonBlankString).map((t) => t.trim());
    }
  }

  if (errors.length > 0) return fail(errors);
  return ok({ ingredients, cuisine, audience, servings, avoidTitles });
}

function parseIngredient(value: unknown): RecipeIngredient | null {
  if (!isRecord(value) || !isNonBlankString(value.name)) return null;
  return {
    name: value.name.trim(),
    quantity: value.quantity == null ? "" : String(value.quantity),
    unit: value.unit == null ? "" : String(value.unit),
  };
}

/** Shape-check a recipe object parsed from model output. */
export function validateGeneratedRecipe(data: unknown): ValidationResult<Recipe> {
  if (!isRecord(data)) return fail([{ field: "recipe", message: "Expected a JSON object" }]);
  const errors: FieldError[] = [];

  if (!isNonBlankString(data.title)) errors.push({ field: "title", message: "Title is required" });

  const ingredientsUsed: RecipeIngredient[] = [];
  if (!Array.isArray(data.ingredientsUsed)) {
    errors.push({ field: "ingredientsUsed", message: "Must be an array" });
  } else {
    for (const item of data.ingredientsUsed) {
      const parsed = parseIngredient(item);
      if (parsed) ingredientsUsed.push(parsed);
      else errors.push({ field: "ingredientsUsed", message: "Each ingredient needs a name" });
    }
  }

  let instructions: string[] = [];
  if (!Array.isArray(data.instructions) || !data.instructions.every((s) => typeof s === "string")) {
    errors.push({ field: "instructions", message: "Must be an array of strings" });
  } else {
    instructions = data.instructions;
  }

  if (errors.length > 0 || !isNonBlankString(data.title)) return fail(errors);

  const text = (value: unknown) => (typeof value === "string" ? value : "");
  return ok({
    title: data.title.trim(),
    description: text(data.description),
    prepTime: text(data.prepTime),
    cookTime: text(data.cookTime),
    servings: text(data.servings),
    ingredientsUsed,
    instructions,
    notes: typeof data.notes === "string" ? data.notes : null,
  });
}
