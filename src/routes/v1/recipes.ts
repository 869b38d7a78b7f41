import { Router } from "express";
import { z } from "zod";
import { invalidQueryError, missingInputError, recipeNotFoundError } from "../../middleware/error.js";
import type { RecipeAssistant } from "../../services/recipeAssistant.js";
import type { RecipeDifficulty } from "../../types/contracts.js";

const findRecipesSchema = z.object({
  ingredients: z.array(z.string()),
  minMatchScore: z.number().min(0).max(1).optional(),
  maxResults: z.number().int().min(1).optional(),
});

const suggestSubstitutionsSchema = z.object({
  ingredients: z.array(z.string()),
});

const DIFFICULTIES: readonly RecipeDifficulty[] = ["easy", "medium", "hard"];

export function createRecipesRouter(assistant: RecipeAssistant): Router {
  const router = Router();

  router.post("/recipes/find", (req, res) => {
    const body = findRecipesSchema.parse(req.body);
    const result = assistant.findRecipes(body.ingredients, {
      minMatchScore: body.minMatchScore,
      maxResults: body.maxResults,
    });
    if (result.status === "missing_input") {
      throw missingInputError(result.message);
    }
    res.json({ totalFound: result.totalFound, recipes: result.recipes });
  });

  router.get("/recipes/search", (req, res) => {
    const requested = toOptionalStringArray(req.query.difficulty);
    const difficulty = requested?.filter(isDifficulty);
    if (requested && difficulty?.length === 0) {
      throw invalidQueryError(`Unknown difficulty '${requested.join(",")}'. Expected one of: ${DIFFICULTIES.join(", ")}.`);
    }

    const items = assistant.searchRecipes({
      query: String(req.query.q ?? ""),
      cuisine: toOptionalStringArray(req.query.cuisine),
      difficulty,
      maxCookTime: toOptionalNumber(req.query.maxCookTime),
      limit: toOptionalNumber(req.query.limit),
    });
    res.json({ items, total: items.length });
  });

  router.get("/recipes/:id", (req, res) => {
    const result = assistant.getRecipeDetails(req.params.id);
    if (result.status === "not_found") {
      throw recipeNotFoundError(result.message);
    }
    res.json({ recipe: result.recipe });
  });

  router.post("/substitutions", (req, res) => {
    const body = suggestSubstitutionsSchema.parse(req.body);
    const result = assistant.suggestSubstitutions(body.ingredients);
    if (result.status === "missing_input") {
      throw missingInputError(result.message);
    }
    res.json({
      substitutions: result.substitutions,
      found: Object.keys(result.substitutions).length,
    });
  });

  return router;
}

function toOptionalNumber(value: unknown): number | undefined {
  if (typeof value !== "string" || value.trim() === "") {
    return undefined;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

function toOptionalStringArray(value: unknown): string[] | undefined {
  if (typeof value !== "string") {
    return undefined;
  }
  const items = value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
  return items.length > 0 ? items : undefined;
}

function isDifficulty(value: string): value is RecipeDifficulty {
  return DIFFICULTIES.some((difficulty) => difficulty === value);
}
