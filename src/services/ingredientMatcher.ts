import type { AliasTable, MatchThresholds, SubstitutionTable } from "../types/contracts.js";
import { similarity } from "../utils/similarity.js";
import { normalize as defaultNormalize, type Normalizer } from "./ingredientNormalizer.js";

export const DEFAULT_THRESHOLDS: MatchThresholds = {
  ingredient: 0.6,
  substitution: 0.8
};

export type IngredientMatcherOptions = {
  substitutions?: SubstitutionTable;
  aliases?: AliasTable;
  thresholds?: Partial<MatchThresholds>;
  normalize?: Normalizer;
};

/**
 * Decides whether a user's ingredient covers a recipe ingredient and looks up
 * substitutes for the ones that are missing. Tables are read-only; one
 * instance can serve any number of concurrent queries.
 */
export class IngredientMatcher {
  private readonly substitutions: SubstitutionTable;
  private readonly aliases: AliasTable;
  private readonly thresholds: MatchThresholds;
  private readonly normalize: Normalizer;

  constructor(options: IngredientMatcherOptions = {}) {
    this.substitutions = options.substitutions ?? new Map();
    this.aliases = options.aliases ?? new Map();
    this.thresholds = { ...DEFAULT_THRESHOLDS, ...options.thresholds };
    this.normalize = options.normalize ?? defaultNormalize;
  }

  /**
   * Containment in either direction wins immediately, first candidate first.
   * Otherwise the best fuzzy candidate is returned if it scores strictly above
   * the ingredient threshold; equal scores keep the earlier candidate.
   */
  findMatch(userIngredient: string, candidates: readonly string[]): string | undefined {
    const needle = this.normalize(userIngredient);
    if (!needle) {
      return undefined;
    }

    const normalized = candidates.map((candidate) => this.normalize(candidate));

    for (let i = 0; i < candidates.length; i++) {
      const candidate = normalized[i];
      if (candidate && (candidate.includes(needle) || needle.includes(candidate))) {
        return candidates[i];
      }
    }

    let best: string | undefined;
    let bestScore = -1;
    for (let i = 0; i < candidates.length; i++) {
      const candidate = normalized[i];
      if (!candidate) continue;
      const score = similarity(needle, candidate);
      if (score > bestScore) {
        best = candidates[i];
        bestScore = score;
      }
    }

    return bestScore > this.thresholds.ingredient ? best : undefined;
  }

  getSubstitutions(ingredient: string): string[] {
    const key = this.normalize(ingredient);
    if (!key) {
      return [];
    }

    const direct = this.substitutions.get(key);
    if (direct && direct.length > 0) {
      return [...direct];
    }

    const base = this.resolveAlias(key);
    if (base !== undefined) {
      return [...(this.substitutions.get(base) ?? [])];
    }

    for (const [candidate, substitutes] of this.substitutions) {
      if (substitutes.length > 0 && similarity(key, candidate) > this.thresholds.substitution) {
        return [...substitutes];
      }
    }

    return [];
  }

  /** First base in table order whose alias equals the phrase or is contained in it. */
  resolveAlias(key: string): string | undefined {
    for (const [base, aliases] of this.aliases) {
      if (aliases.some((alias) => alias === key || (alias.length > 0 && key.includes(alias)))) {
        return base;
      }
    }
    return undefined;
  }
}
