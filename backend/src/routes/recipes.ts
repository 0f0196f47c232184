import { Router } from "express";
import type { ErrorResponse, RecipeResponse, RequestKind } from "../../../shared/types";
import { InvalidRecipeError, StoreUnavailableError, describeError } from "../guard/errors";
import type { AuthRequest, JsonReply, TokenVerifier } from "../middleware/auth";
import { requireAuth } from "../middleware/auth";
import { RateLimitError } from "../services/claudeRetry";
import { DuplicateRecipeError, generateDiverseRecipe } from "../services/recipeFlow";
import type { RecipeFlowDeps } from "../services/recipeFlow";
import { GenerationError, ModelRefusalError } from "../services/recipeGenerator";
import { validateRecipeRequest } from "../validation";

/** Map a failure from the recipe flow onto a status code and error envelope. */
export function errorResponse(err: unknown): { status: number; body: ErrorResponse } {
  if (err instanceof ModelRefusalError) return { status: 422, body: { error: err.message } };
  if (err instanceof DuplicateRecipeError) return { status: 409, body: { error: err.message } };
  if (err instanceof RateLimitError) return { status: 429, body: { error: err.message } };
  if (err instanceof StoreUnavailableError) {
    return { status: 503, body: { error: "Recipe history is temporarily unavailable. Please try again." } };
  }
  if (err instanceof GenerationError || err instanceof InvalidRecipeError) {
    return { status: 502, body: { error: "Sorry Chef, the recipe came back garbled. Give it another try." } };
  }
  return { status: 500, body: { error: "Failed to generate recipe" } };
}

interface RecipeHttpRequest extends AuthRequest {
  body: unknown;
}

/** Handler for one request kind: validate, run the flow, map failures. */
export function recipeHandler(deps: RecipeFlowDeps, requestKind: RequestKind) {
  return async (req: RecipeHttpRequest, res: JsonReply<RecipeResponse | ErrorResponse>): Promise<void> => {
    const validation = validateRecipeRequest(req.body);
    if (!validation.isValid) {
      res.status(400).json({ error: "Invalid recipe request", details: validation.errors });
      return;
    }
    if (!req.userId) {
      res.status(401).json({ error: "Authentication required" });
      return;
    }

    try {
      const result = await generateDiverseRecipe(deps, {
        userId: req.userId,
        request: validation.value,
        requestKind,
      });
      res.json(result);
    } catch (err: unknown) {
      const { status, body } = errorResponse(err);
      console.error(`[recipes] ${requestKind} request failed (${status}):`, describeError(err));
      res.status(status).json(body);
    }
  };
}

export function createRecipesRouter(deps: RecipeFlowDeps, verify: TokenVerifier): Router {
  const router = Router();
  router.use(requireAuth(verify));

  // POST /api/recipes generates a recipe the user has not seen recently
  router.post("/", recipeHandler(deps, "fresh"));

  // POST /api/recipes/reroll for "give me another one" for the same ingredients
  router.post("/reroll", recipeHandler(deps, "reroll"));

  return router;
}
