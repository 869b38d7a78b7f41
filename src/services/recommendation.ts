import type { Recipe, RecipeMatch } from "../types/contracts.js";
import type { IngredientMatcher } from "./ingredientMatcher.js";

export const DEFAULT_MIN_MATCH_SCORE = 0.3;

export function scoreRecipe(
  recipe: Recipe,
  userIngredients: readonly string[],
  matcher: IngredientMatcher
): RecipeMatch {
  const available: string[] = [];
  const missing: string[] = [];

  for (const ingredient of recipe.ingredients) {
    const covered = userIngredients.some(
      (userIngredient) => matcher.findMatch(userIngredient, [ingredient]) !== undefined
    );
    if (covered) {
      available.push(ingredient);
    } else {
      missing.push(ingredient);
    }
  }

  const substitutions: Array<[string, string[]]> = [];
  for (const ingredient of missing) {
    const options = matcher.getSubstitutions(ingredient);
    if (options.length > 0) {
      substitutions.push([ingredient, options]);
    }
  }

  return {
    recipe,
    matchScore: recipe.ingredients.length === 0 ? 0 : available.length / recipe.ingredients.length,
    available,
    missing,
    substitutions: Object.fromEntries(substitutions)
  };
}

/**
 * Scores every recipe on its own, keeps those at or above `minMatchScore`
 * and orders them by score. `Array#sort` is stable, so equal scores keep
 * catalog order.
 */
export function findRecipes(
  userIngredients: readonly string[],
  catalog: readonly Recipe[],
  matcher: IngredientMatcher,
  minMatchScore: number = DEFAULT_MIN_MATCH_SCORE
): RecipeMatch[] {
  return catalog
    .map((recipe) => scoreRecipe(recipe, userIngredients, matcher))
    .filter((match) => match.matchScore >= minMatchScore)
    .sort((a, b) => b.matchScore - a.matchScore);
}
