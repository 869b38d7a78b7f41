import { Router } from "express";
import type { RecipeAssistant } from "../../services/recipeAssistant.js";
import { createRecipesRouter } from "./recipes.js";

export function createV1Router(assistant: RecipeAssistant): Router {
  const router = Router();

  router.use("/", createRecipesRouter(assistant));

  return router;
}
