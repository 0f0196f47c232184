// ── Validation Constants ──

export const VALID_CUISINES = [
  "Any", "Italian", "Mexican", "Korean", "Dessert", "American",
] as const;
export type Cuisine = (typeof VALID_CUISINES)[number];

export const VALID_AUDIENCES = [
  "Everyone",
  "Baby (6-8 months)",
  "Baby (9-12 months)",
  "Baby (12+ months)",
] as const;
export type Audience = (typeof VALID_AUDIENCES)[number];

export const VALID_REQUEST_KINDS = ["fresh", "reroll"] as const;
export type RequestKind = (typeof VALID_REQUEST_KINDS)[number];

export const VALID_FINAL_OUTCOMES = ["surface_last", "fail"] as const;
export type FinalOutcomePolicy = (typeof VALID_FINAL_OUTCOMES)[number];

export const MAX_REQUESTED_INGREDIENTS = 25;
export const MAX_SERVINGS = 12;

// ── Recipe ──

export interface RecipeIngredient {
  name: string;
  quantity: string;
  unit: string;
}

/** A generated recipe as the model returns it and the API hands it back. */
export interface Recipe {
  title: string;
  description: string;
  prepTime: string;
  cookTime: string;
  servings: string;
  ingredientsUsed: RecipeIngredient[];
  instructions: string[];
  notes?: string | null;
  cuisine?: Cuisine;
  audience?: Audience;
  tags?: string[];
}

// ── Requests ──

export interface RecipeRequest {
  ingredients: string[];
  cuisine: Cuisine;
  audience: Audience;
  servings: number;
  avoidTitles: string[];
}

// ── Responses ──

export interface DiversityReport {
  attempts: number;
  maxSimilarity: number;
  closestTitle: string | null;
  duplicate: boolean;
}

export interface RecipeResponse {
  recipe: Recipe;
  diversity: DiversityReport;
}

export interface ErrorResponse {
  error: string;
  details?: Array<{ field: string; message: string }>;
}
