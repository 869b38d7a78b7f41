import type { Recipe, RecipeSearchFilters } from "../types/contracts.js";

export class RecipeIndex {
  private readonly ordered: readonly Recipe[];
  private readonly byID = new Map<string, Recipe>();

  constructor(recipes: readonly Recipe[] = []) {
    for (const recipe of recipes) {
      if (!this.byID.has(recipe.id)) {
        this.byID.set(recipe.id, recipe);
      }
    }
    this.ordered = Array.from(this.byID.values());
  }

  get size(): number {
    return this.ordered.length;
  }

  all(): readonly Recipe[] {
    return this.ordered;
  }

  get(id: string): Recipe | undefined {
    return this.byID.get(id);
  }

  search(filters: RecipeSearchFilters): Recipe[] {
    const query = normalizeQuery(filters.query);
    const cuisines = (filters.cuisine ?? []).map((item) => item.toLowerCase());
    const difficulties = filters.difficulty ?? [];
    const limit = Math.max(1, Math.min(filters.limit ?? 50, 200));

    return this.ordered
      .filter((recipe) => {
        if (query.length > 0) {
          const haystack = [recipe.name, recipe.description, recipe.cuisine, ...recipe.ingredients]
            .join(" ")
            .toLowerCase();
          if (!haystack.includes(query)) {
            return false;
          }
        }

        if (cuisines.length > 0 && !cuisines.includes(recipe.cuisine.toLowerCase())) {
          return false;
        }

        if (difficulties.length > 0 && !difficulties.includes(recipe.difficulty)) {
          return false;
        }

        if (filters.maxCookTime !== undefined && recipe.cookTime > filters.maxCookTime) {
          return false;
        }

        return true;
      })
      .slice(0, limit);
  }
}

function normalizeQuery(value: string | undefined): string {
  return (value ?? "").trim().toLowerCase();
}
