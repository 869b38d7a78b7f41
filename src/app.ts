import express from "express";
import type { Env } from "./config/env.js";
import { loadAliasTable, loadRecipeCatalog, loadSubstitutionTable } from "./data/catalog.js";
import { createHelmet } from "./middleware/helmet.js";
import { createCors } from "./middleware/cors.js";
import { createRateLimiter } from "./middleware/rateLimit.js";
import { errorHandler, notFoundHandler } from "./middleware/error.js";
import { IngredientMatcher } from "./services/ingredientMatcher.js";
import { RecipeAssistant } from "./services/recipeAssistant.js";
import { RecipeIndex } from "./services/recipeIndex.js";
import { logRequest, logResponse, logger } from "./utils/logger.js";
import { createHealthRouter } from "./routes/health.js";
import { createV1Router } from "./routes/v1/index.js";

declare global {
  namespace Express {
    interface Request {
      requestTime?: number;
    }
  }
}

export function createAssistantFromEnv(env: Env): RecipeAssistant {
  const recipes = loadRecipeCatalog(env.RECIPE_CATALOG_PATH);
  const substitutions = loadSubstitutionTable(env.SUBSTITUTIONS_PATH);
  const aliases = loadAliasTable(env.INGREDIENT_ALIASES_PATH);

  logger.info({
    msg: "Recipe data loaded",
    recipes: recipes.length,
    substitutions: substitutions.size,
    aliases: aliases.size,
  });

  const matcher = new IngredientMatcher({
    substitutions,
    aliases,
    thresholds: {
      ingredient: env.INGREDIENT_MATCH_THRESHOLD,
      substitution: env.SUBSTITUTION_MATCH_THRESHOLD,
    },
  });

  return new RecipeAssistant(new RecipeIndex(recipes), matcher, {
    minMatchScore: env.MIN_MATCH_SCORE,
    maxResults: env.MAX_RESULTS,
  });
}

export function createApp(assistant: RecipeAssistant) {
  const app = express();

  app.use(express.json({ limit: "256kb" }));

  app.use(createHelmet());
  app.use(createCors());

  app.use((req, res, next) => {
    req.requestTime = Date.now();
    logRequest(req);
    const done = logResponse(req);
    res.on("finish", () => done(res.statusCode, Date.now() - (req.requestTime ?? Date.now())));
    next();
  });

  app.use(createHealthRouter(assistant));
  app.use("/api/v1", createRateLimiter(), createV1Router(assistant));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
