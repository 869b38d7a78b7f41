import test from "node:test";
import assert from "node:assert/strict";
import { createNormalizer, normalize } from "../src/services/ingredientNormalizer.js";

test("normalize strips quantities, units and modifiers", () => {
  assert.equal(normalize("2 tbsp fresh parsley"), "parsley");
  assert.equal(normalize("400g spaghetti"), "spaghetti");
  assert.equal(normalize("1/2 cup olive oil"), "olive oil");
  assert.equal(normalize("1 1/2 cups milk"), "milk");
  assert.equal(normalize("1.5 kg flour"), "flour");
  assert.equal(normalize("10 oz Whole Milk"), "milk");
  assert.equal(normalize("2 lbs chicken"), "chicken");
  assert.equal(normalize("3 pounds beef"), "beef");
  assert.equal(normalize("500 grams sugar"), "sugar");
  assert.equal(normalize("1 tsp dried oregano"), "oregano");
});

test("normalize lowercases and collapses whitespace", () => {
  assert.equal(normalize("  Chopped   Organic TOMATOES "), "tomatoes");
  assert.equal(normalize("Red\tPepper\n Flakes"), "red pepper flakes");
});

test("normalize keeps numbers without a unit and words that only contain a modifier", () => {
  assert.equal(normalize("6 cloves garlic"), "6 cloves garlic");
  assert.equal(normalize("grounded freshwater fish"), "grounded freshwater fish");
  assert.equal(normalize("cup of sugar"), "cup of sugar");
  assert.equal(normalize("salt and pepper to taste"), "salt and pepper to taste");
});

test("normalize reduces removable-only phrases to an empty string", () => {
  assert.equal(normalize(""), "");
  assert.equal(normalize("   "), "");
  assert.equal(normalize("1 cup"), "");
  assert.equal(normalize("2 fresh cups"), "");
  assert.equal(normalize("Fresh Chopped"), "");
});

test("normalize is idempotent", () => {
  const phrases = [
    "2 tbsp fresh parsley",
    "1 2 cups cups flour",
    "3 Fresh 2 cups minced garlic",
    "  Whole  RAW  almonds ",
    "1/2 tsp red pepper flakes",
    "salt and pepper to taste",
    ""
  ];

  for (const phrase of phrases) {
    const once = normalize(phrase);
    assert.equal(normalize(once), once, phrase);
  }
});

test("createNormalizer accepts custom unit and modifier lists", () => {
  const custom = createNormalizer({ units: ["cloves"], modifiers: ["ripe"] });

  assert.equal(custom("6 cloves garlic"), "garlic");
  assert.equal(custom("3 ripe bananas"), "3 bananas");
  assert.equal(custom("2 cups fresh basil"), "2 cups fresh basil");
});
