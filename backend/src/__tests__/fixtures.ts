import type { Recipe, RecipeRequest } from "../../../shared/types";
import { DEFAULT_POLICY } from "../guard/policy";
import type { GuardPolicy } from "../guard/types";
import type { JsonReply } from "../middleware/auth";
import type { GenerationInput, RecipeGenerator } from "../services/recipeGenerator";

export const DEFAULT_STEPS = ["Prep the ingredients.", "Cook until done."];

/** Minimal generated recipe. Ingredient names are used as given. */
export function makeRecipe(
  title: string,
  ingredients: string[],
  overrides: Partial<Recipe> = {},
): Recipe {
  return {
    title,
    description: `${title} for tonight.`,
    prepTime: "10 minutes",
    cookTime: "20 minutes",
    servings: "2 adult servings",
    ingredientsUsed: ingredients.map((name) => ({ name, quantity: "1", unit: "cup" })),
    instructions: DEFAULT_STEPS,
    notes: null,
    ...overrides,
  };
}

export function makeRequest(ingredients: string[], overrides: Partial<RecipeRequest> = {}): RecipeRequest {
  return {
    ingredients,
    cuisine: "Any",
    audience: "Everyone",
    servings: 2,
    avoidTitles: [],
    ...overrides,
  };
}

/** Policy that scores on ingredient overlap alone, so similarities are plain Jaccard values. */
export function ingredientOnlyPolicy(overrides: Partial<GuardPolicy> = {}): GuardPolicy {
  return {
    ...DEFAULT_POLICY,
    weights: { ingredients: 1, title: 0, structure: 0, tags: 0 },
    ...overrides,
  };
}

/** Plays back recipes and errors in order, recording what it was asked for. */
export class ScriptedGenerator implements RecipeGenerator {
  readonly calls: GenerationInput[] = [];

  constructor(private readonly script: Array<Recipe | Error>) {}

  async generate(input: GenerationInput): Promise<Recipe> {
    this.calls.push({ ...input, avoidTitles: [...input.avoidTitles] });
    const next = this.script.shift();
    if (!next) throw new Error("generator script exhausted");
    if (next instanceof Error) throw next;
    return next;
  }
}

/** Response stand-in that keeps the last status and body. */
export class RecordingReply<Body> implements JsonReply<Body> {
  statusCode = 200;
  body: Body | undefined;

  status(code: number): this {
    this.statusCode = code;
    return this;
  }

  json(body: Body): this {
    this.body = body;
    return this;
  }
}
