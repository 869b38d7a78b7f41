export const UNIT_WORDS = [
  "cups",
  "cup",
  "tbsp",
  "tsp",
  "oz",
  "lbs",
  "lb",
  "pounds",
  "pound",
  "grams",
  "gram",
  "kg",
  "g"
] as const;

export const MODIFIER_WORDS = [
  "fresh",
  "dried",
  "ground",
  "chopped",
  "diced",
  "sliced",
  "minced",
  "whole",
  "organic",
  "raw"
] as const;

const AMOUNT = String.raw`\d+(?:[.,]\d+)?(?:\s+\d+)?(?:\s*\/\s*\d+(?:[.,]\d+)?)?`;

export type Normalizer = (phrase: string) => string;

export type NormalizerOptions = {
  units?: readonly string[];
  modifiers?: readonly string[];
};

/**
 * Builds the function that turns an ingredient phrase into the canonical
 * lowercase form used for every comparison: `"2 tbsp Fresh parsley"` -> `"parsley"`.
 *
 * Stripping repeats until nothing changes, because removing one token can
 * line up another (`"2 fresh cups"`), so `normalize(normalize(x)) === normalize(x)`.
 */
export function createNormalizer(options: NormalizerOptions = {}): Normalizer {
  const units = options.units ?? UNIT_WORDS;
  const modifiers = options.modifiers ?? MODIFIER_WORDS;
  const patterns: RegExp[] = [];
  if (modifiers.length > 0) {
    patterns.push(new RegExp(String.raw`\b(?:${alternation(modifiers)})\b`, "gi"));
  }
  if (units.length > 0) {
    patterns.push(new RegExp(String.raw`\b${AMOUNT}\s*(?:${alternation(units)})\b`, "gi"));
  }

  return (phrase) => {
    let current = collapse(phrase);

    for (;;) {
      const next = collapse(patterns.reduce((value, re) => value.replace(re, " "), current));
      if (next === current) {
        return current;
      }
      current = next;
    }
  };
}

export const normalize: Normalizer = createNormalizer();

function collapse(value: string): string {
  return value.toLowerCase().replace(/\s+/g, " ").trim();
}

function alternation(words: readonly string[]): string {
  return words.map((word) => word.replace(/[.*+?^${}()|[\]\\]/g, "\\$&")).join("|");
}
