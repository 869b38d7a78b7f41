import { readFileSync } from "node:fs";
import path from "node:path";
import { z } from "zod";
import type { AliasTable, Recipe, SubstitutionTable } from "../types/contracts.js";
import { normalize } from "../services/ingredientNormalizer.js";

export class CatalogError extends Error {
  public readonly filePath: string;

  constructor(message: string, filePath: string) {
    super(`${message} (${filePath})`);
    this.name = "CatalogError";
    this.filePath = filePath;
  }
}

const recipeSchema = z.object({
  id: z.string().trim().min(1),
  name: z.string().trim().min(1),
  description: z.string().default(""),
  cookTime: z.number().int().nonnegative(),
  servings: z.number().int().positive(),
  cuisine: z.string().default(""),
  difficulty: z.enum(["easy", "medium", "hard"]),
  ingredients: z.array(z.string()),
  instructions: z.array(z.string())
});

const catalogSchema = z.array(recipeSchema);

const substitutionsSchema = z.array(
  z.object({
    ingredient: z.string().trim().min(1),
    substitutes: z.array(z.string().trim().min(1))
  })
);

const aliasesSchema = z.array(
  z.object({
    ingredient: z.string().trim().min(1),
    aliases: z.array(z.string().trim().min(1))
  })
);

export function parseRecipeCatalog(input: unknown, source = "<inline>"): readonly Recipe[] {
  const result = catalogSchema.safeParse(input);
  if (!result.success) {
    throw new CatalogError(`Invalid recipe catalog: ${describeIssues(result.error)}`, source);
  }

  const seen = new Set<string>();
  for (const recipe of result.data) {
    if (seen.has(recipe.id)) {
      throw new CatalogError(`Duplicate recipe id "${recipe.id}"`, source);
    }
    seen.add(recipe.id);
  }

  return Object.freeze(
    result.data.map((recipe) =>
      Object.freeze({
        ...recipe,
        ingredients: Object.freeze([...recipe.ingredients]),
        instructions: Object.freeze([...recipe.instructions])
      })
    )
  );
}

/** Keys are normalized; a key listed twice keeps its first entry. */
export function parseSubstitutionTable(input: unknown, source = "<inline>"): SubstitutionTable {
  const result = substitutionsSchema.safeParse(input);
  if (!result.success) {
    throw new CatalogError(`Invalid substitution table: ${describeIssues(result.error)}`, source);
  }

  const table = new Map<string, readonly string[]>();
  for (const entry of result.data) {
    const key = normalize(entry.ingredient);
    if (key && !table.has(key)) {
      table.set(key, Object.freeze([...entry.substitutes]));
    }
  }
  return table;
}

export function parseAliasTable(input: unknown, source = "<inline>"): AliasTable {
  const result = aliasesSchema.safeParse(input);
  if (!result.success) {
    throw new CatalogError(`Invalid alias table: ${describeIssues(result.error)}`, source);
  }

  const table = new Map<string, readonly string[]>();
  for (const entry of result.data) {
    const key = normalize(entry.ingredient);
    if (!key) continue;
    const aliases = entry.aliases.map((alias) => normalize(alias)).filter((alias) => alias.length > 0);
    table.set(key, Object.freeze([...(table.get(key) ?? []), ...aliases]));
  }
  return table;
}

export function loadRecipeCatalog(filePath: string): readonly Recipe[] {
  const resolved = path.resolve(filePath);
  return parseRecipeCatalog(readJSON(resolved), resolved);
}

export function loadSubstitutionTable(filePath: string): SubstitutionTable {
  const resolved = path.resolve(filePath);
  return parseSubstitutionTable(readJSON(resolved), resolved);
}

export function loadAliasTable(filePath: string): AliasTable {
  const resolved = path.resolve(filePath);
  return parseAliasTable(readJSON(resolved), resolved);
}

function readJSON(filePath: string): unknown {
  let raw: string;
  try {
    raw = readFileSync(filePath, "utf8");
  } catch (error) {
    throw new CatalogError(`Cannot read file: ${errorMessage(error)}`, filePath);
  }

  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch (error) {
    throw new CatalogError(`Invalid JSON: ${errorMessage(error)}`, filePath);
  }
}

function describeIssues(error: z.ZodError): string {
  return error.errors.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`).join("; ");
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
