export type RecipeDifficulty = "easy" | "medium" | "hard";

export type Recipe = {
  id: string;
  name: string;
  description: string;
  /** Minutes. */
  cookTime: number;
  servings: number;
  cuisine: string;
  difficulty: RecipeDifficulty;
  ingredients: readonly string[];
  instructions: readonly string[];
};

export type RecipeSummary = Omit<Recipe, "instructions">;

/** Canonical ingredient key -> ordered substitutes. Iteration order is significant. */
export type SubstitutionTable = ReadonlyMap<string, readonly string[]>;

/** Canonical ingredient key -> ordered alternate names, all normalized. */
export type AliasTable = ReadonlyMap<string, readonly string[]>;

export type MatchThresholds = {
  /** `findMatch` fuzzy rule; a candidate must score strictly above it. */
  ingredient: number;
  /** `getSubstitutions` fuzzy key lookup; a key must score strictly above it. */
  substitution: number;
};

export type RecipeMatch = {
  recipe: Recipe;
  /** Fraction in [0, 1]. */
  matchScore: number;
  available: string[];
  missing: string[];
  substitutions: Record<string, string[]>;
};

export type RecipeMatchRecord = Recipe & {
  /** Percentage with one decimal place. */
  matchScore: number;
  availableIngredients: string[];
  missingIngredients: string[];
  substitutions: Record<string, string[]>;
};

export type FindRecipesOptions = {
  minMatchScore?: number;
  maxResults?: number;
};

export type RecipeSearchFilters = {
  query?: string;
  cuisine?: string[];
  difficulty?: RecipeDifficulty[];
  maxCookTime?: number;
  limit?: number;
};

export type MissingInput = {
  status: "missing_input";
  message: string;
};

export type FindRecipesResult =
  | MissingInput
  | {
      status: "ok";
      totalFound: number;
      recipes: RecipeMatchRecord[];
    };

export type RecipeDetailsResult =
  | { status: "found"; recipe: Recipe }
  | { status: "not_found"; recipeId: string; message: string };

export type SuggestSubstitutionsResult =
  | MissingInput
  | {
      status: "ok";
      substitutions: Record<string, string[]>;
    };
