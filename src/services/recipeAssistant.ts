import type {
  FindRecipesOptions,
  FindRecipesResult,
  MissingInput,
  RecipeDetailsResult,
  RecipeMatch,
  RecipeMatchRecord,
  RecipeSearchFilters,
  RecipeSummary,
  SuggestSubstitutionsResult
} from "../types/contracts.js";
import { createChildLogger } from "../utils/logger.js";
import type { IngredientMatcher } from "./ingredientMatcher.js";
import { DEFAULT_MIN_MATCH_SCORE, findRecipes } from "./recommendation.js";
import type { RecipeIndex } from "./recipeIndex.js";

const log = createChildLogger({ component: "recipe-assistant" });

export type RecipeAssistantDefaults = {
  minMatchScore: number;
  maxResults: number;
};

export class RecipeAssistant {
  private readonly defaults: RecipeAssistantDefaults;

  constructor(
    private readonly index: RecipeIndex,
    private readonly matcher: IngredientMatcher,
    defaults: Partial<RecipeAssistantDefaults> = {}
  ) {
    this.defaults = {
      minMatchScore: defaults.minMatchScore ?? DEFAULT_MIN_MATCH_SCORE,
      maxResults: defaults.maxResults ?? 10
    };
  }

  get catalogSize(): number {
    return this.index.size;
  }

  findRecipes(ingredients: readonly string[], options: FindRecipesOptions = {}): FindRecipesResult {
    const cleaned = cleanIngredientList(ingredients);
    if (cleaned.length === 0) {
      return missingInput("Please provide at least one ingredient you have available.");
    }

    const startedAt = Date.now();
    const minMatchScore = options.minMatchScore ?? this.defaults.minMatchScore;
    const maxResults = Math.max(1, Math.floor(options.maxResults ?? this.defaults.maxResults));
    const matches = findRecipes(cleaned, this.index.all(), this.matcher, minMatchScore);

    log.debug({
      msg: "Recipe search completed",
      ingredients: cleaned.length,
      minMatchScore,
      totalFound: matches.length,
      elapsedMs: Date.now() - startedAt
    });

    return {
      status: "ok",
      totalFound: matches.length,
      recipes: matches.slice(0, maxResults).map(toMatchRecord)
    };
  }

  getRecipeDetails(recipeId: string): RecipeDetailsResult {
    const id = recipeId.trim();
    const recipe = this.index.get(id);
    if (!recipe) {
      log.debug({ msg: "Recipe not found", recipeId: id });
      return { status: "not_found", recipeId: id, message: `Recipe with ID '${id}' not found.` };
    }
    return { status: "found", recipe };
  }

  suggestSubstitutions(ingredients: readonly string[]): SuggestSubstitutionsResult {
    const cleaned = cleanIngredientList(ingredients);
    if (cleaned.length === 0) {
      return missingInput("Please provide at least one ingredient to find substitutions for.");
    }

    const entries: Array<[string, string[]]> = [];
    for (const ingredient of cleaned) {
      const substitutes = this.matcher.getSubstitutions(ingredient);
      if (substitutes.length > 0) {
        entries.push([ingredient, substitutes]);
      }
    }

    log.debug({ msg: "Substitution lookup completed", ingredients: cleaned.length, found: entries.length });

    return { status: "ok", substitutions: Object.fromEntries(entries) };
  }

  searchRecipes(filters: RecipeSearchFilters): RecipeSummary[] {
    return this.index.search(filters).map(({ instructions: _instructions, ...summary }) => summary);
  }
}

/** Trims, drops blanks and drops case-insensitive repeats, keeping the first spelling. */
export function cleanIngredientList(ingredients: readonly string[]): string[] {
  const seen = new Set<string>();
  const cleaned: string[] = [];
  for (const raw of ingredients) {
    const ingredient = raw.trim();
    const key = ingredient.toLowerCase();
    if (!ingredient || seen.has(key)) continue;
    seen.add(key);
    cleaned.push(ingredient);
  }
  return cleaned;
}

export function toMatchRecord(match: RecipeMatch): RecipeMatchRecord {
  return {
    ...match.recipe,
    ingredients: [...match.recipe.ingredients],
    instructions: [...match.recipe.instructions],
    matchScore: toPercentage(match.matchScore),
    availableIngredients: match.available,
    missingIngredients: match.missing,
    substitutions: match.substitutions
  };
}

/** Percentage with one decimal; exact halves go to the even digit. */
export function toPercentage(score: number): number {
  const scaled = score * 1000;
  const floor = Math.floor(scaled);
  const fraction = scaled - floor;
  if (fraction > 0.5 || (fraction === 0.5 && floor % 2 !== 0)) {
    return (floor + 1) / 10;
  }
  return floor / 10;
}

function missingInput(message: string): MissingInput {
  return { status: "missing_input", message };
}
