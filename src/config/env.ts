import { z } from "zod";

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  PORT: z.coerce.number().min(1).max(65535).default(8080),

  // Rate limiting
  RECIPE_SEARCH_RATE_WINDOW_MS: z.coerce.number().default(60_000),
  RECIPE_SEARCH_RATE_MAX: z.coerce.number().default(60),

  // CORS
  CORS_ORIGIN: z.string().default("*"),

  // Logging
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
  LOG_PRETTY: z.string().transform((val) => val === "true").default("false"),

  // Data files
  RECIPE_CATALOG_PATH: z.string().default("data/recipes.json"),
  SUBSTITUTIONS_PATH: z.string().default("data/substitutions.json"),
  INGREDIENT_ALIASES_PATH: z.string().default("data/aliases.json"),

  // Matching
  MIN_MATCH_SCORE: z.coerce.number().min(0).max(1).default(0.3),
  MAX_RESULTS: z.coerce.number().int().min(1).default(10),
  INGREDIENT_MATCH_THRESHOLD: z.coerce.number().min(0).max(1).default(0.6),
  SUBSTITUTION_MATCH_THRESHOLD: z.coerce.number().min(0).max(1).default(0.8),
});

export type Env = z.infer<typeof envSchema>;

let env: Env | undefined;

export function getEnv(): Env {
  if (env) {
    return env;
  }

  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    console.error("Invalid environment variables:");
    console.error(result.error.flatten().fieldErrors);
    throw new Error("Invalid environment configuration");
  }

  env = result.data;
  return env;
}

export function initEnv(): Env {
  const e = getEnv();

  if (e.NODE_ENV === "development") {
    console.log("Running in development mode");
    console.log("Port:", e.PORT);
    console.log("Recipe catalog:", e.RECIPE_CATALOG_PATH);
  }

  return e;
}
