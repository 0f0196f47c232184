// services/recipeGenerator.ts
// Claude-backed recipe generation: prompt, call, and response parsing

import type { Audience, Recipe, RecipeRequest } from "../../../shared/types";
import { describeError } from "../guard/errors";
import { validateGeneratedRecipe } from "../validation";
import { createWithRetry } from "./claudeRetry";
import type { MessagesClient } from "./claudeRetry";

export interface GenerationInput {
  request: RecipeRequest;
  avoidTitles: string[];
  attemptIndex: number;
}

export interface RecipeGenerator {
  generate(input: GenerationInput): Promise<Recipe>;
}

/** The model declined: the ingredients cannot make a sensible dish for this audience. */
export class ModelRefusalError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ModelRefusalError";
  }
}

/** The model answered, but not with a usable recipe object. */
export class GenerationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "GenerationError";
  }
}

const ASSUMED_STAPLES = "salt, black pepper, water, neutral cooking oil (e.g., vegetable, canola)";

const BABY_RULES: Partial<Record<Audience, string>> = {
  "Baby (6-8 months)": `- Texture: SMOOTH PUREE, completely free of lumps. Easily spoon-fed.
- Ingredients: simple combinations (1-2 ingredients are best) to monitor for allergies.
- Preparation: steam, boil, or bake until very soft before pureeing.`,
  "Baby (9-12 months)": `- Texture: mashed with some soft lumps, or small, soft, melt-in-the-mouth finger foods.
- Ingredients: more combinations are fine. Mild herbs (parsley, dill) are okay.
- Preparation: finger foods soft, grabbable, cut into safe shapes (pea-sized or thin strips).`,
  "Baby (12+ months)": `- Texture: soft, chopped, easily chewable. Can resemble family meals cut smaller and softer.
- Flavor: still mild. Minimal salt if any.
- Preparation: cook soft, chop small. Watch for choking hazards (halve grapes).`,
};

const GENERAL_BABY_RULES = `For ALL baby recipes:
- NO added salt, NO added sugar, NO honey (botulism risk under 1 year). Avoid hot spices.
- Prioritize avoiding choking hazards. Introduce common allergens one at a time.
- NO whole nuts or seeds. NO cow's milk as a main drink under 1 year. NO highly processed foods.`;

const SYSTEM_PROMPT = `You are a home-cooking recipe assistant. Your entire response MUST be a single JSON object and nothing else.

If a recipe can be made:
{
  "title": "Recipe Title",
  "description": "1-2 appealing sentences",
  "prepTime": "e.g. 15 minutes",
  "cookTime": "e.g. 25 minutes",
  "servings": "e.g. 2 adult servings",
  "ingredientsUsed": [{ "name": "Ingredient", "quantity": "Amount", "unit": "cups, grams, tbsp, or to taste" }],
  "instructions": ["Step one.", "Step two."],
  "notes": "Optional tips using only provided ingredients or staples"
}

If no sensible recipe can be made:
{ "error": "A polite explanation of why not" }

Rules:
- Use a subset or all of the user's ingredients. You may assume these staples: ${ASSUMED_STAPLES}. Any staple the recipe needs MUST appear in ingredientsUsed. Introduce nothing else.
- The dish must be edible with sensible combinations. If the ingredients cannot form a coherent dish, return the error object.
- NO markdown fences. NO text before or after the JSON.`;

/** Temperature for a given attempt: each retry runs 0.2 hotter, capped at 1.0. */
export function attemptTemperature(base: number, attemptIndex: number): number {
  return Math.min(base + 0.2 * attemptIndex, 1);
}

export function buildUserPrompt(request: RecipeRequest, avoidTitles: string[]): string {
  const lines = [
    `Ingredients: ${request.ingredients.join(", ")}`,
    request.cuisine === "Any"
      ? "Cuisine: no preference. Keep the dish coherent and appealing."
      : `Cuisine: ${request.cuisine}. Use flavor profiles and techniques authentic to this style.`,
    `Audience: ${request.audience}`,
    `Servings: about ${request.servings}. A baby or toddler serving is smaller than an adult's.`,
  ];

  const babyRules = BABY_RULES[request.audience];
  if (babyRules) {
    lines.push("", GENERAL_BABY_RULES, babyRules);
  }

  if (avoidTitles.length > 0) {
    lines.push(
      "",
      `For variety, AVOID recipes very similar to: "${avoidTitles.join("; ")}".`,
      "Offer a different dish or a new angle (another technique, another main ingredient). Prioritize novelty.",
    );
  }
  return lines.join("\n");
}

/**
 * Parse model text into a Recipe. Strips markdown fences, passes model-reported
 * errors through as ModelRefusalError, and stamps the request's cuisine and audience.
 */
export function parseRecipeResponse(text: string, request: RecipeRequest): Recipe {
  let cleaned = text.trim()
    .replace(/^```(?:json)?\s*\n?/, "")
    .replace(/\n?```\s*$/, "")
    .trim();

  const firstBrace = cleaned.indexOf("{");
  const lastBrace = cleaned.lastIndexOf("}");
  if (firstBrace === -1 || lastBrace <= firstBrace) {
    throw new GenerationError("No JSON object in model response");
  }
  cleaned = cleaned.slice(firstBrace, lastBrace + 1);

  let parsed: unknown;
  try {
    parsed = JSON.parse(cleaned);
  } catch (err) {
    throw new GenerationError(`Bad JSON from model: ${describeError(err)}`);
  }

  if (typeof parsed === "object" && parsed !== null && "error" in parsed && typeof parsed.error === "string") {
    throw new ModelRefusalError(parsed.error);
  }

  const result = validateGeneratedRecipe(parsed);
  if (!result.isValid) {
    throw new GenerationError(
      `Recipe failed validation: ${result.errors.map((e) => `${e.field}: ${e.message}`).join("; ")}`,
    );
  }
  return { ...result.value, cuisine: request.cuisine, audience: request.audience };
}

export interface ClaudeGeneratorOptions {
  model: string;
  temperature: number;
  maxTokens?: number;
}

export class ClaudeRecipeGenerator implements RecipeGenerator {
  constructor(
    private readonly client: MessagesClient,
    private readonly options: ClaudeGeneratorOptions,
  ) {}

  async generate({ request, avoidTitles, attemptIndex }: GenerationInput): Promise<Recipe> {
    const temperature = attemptTemperature(this.options.temperature, attemptIndex);
    const message = await createWithRetry(this.client, {
      model: this.options.model,
      max_tokens: this.options.maxTokens ?? 2048,
      temperature,
      system: SYSTEM_PROMPT,
      messages: [{ role: "user", content: buildUserPrompt(request, avoidTitles) }],
    });

    const textBlock = message.content.find((b) => b.type === "text");
    if (!textBlock || textBlock.type !== "text") {
      throw new GenerationError("No text in model response");
    }

    console.log(`[recipeGenerator] attempt=${attemptIndex} temp=${temperature.toFixed(2)} avoid=${avoidTitles.length}`);
    return parseRecipeResponse(textBlock.text, request);
  }
}
