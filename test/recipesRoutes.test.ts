import test from "node:test";
import assert from "node:assert/strict";
import type { Server } from "node:http";
import { createApp } from "../src/app.js";
import { IngredientMatcher } from "../src/services/ingredientMatcher.js";
import { RecipeAssistant } from "../src/services/recipeAssistant.js";
import { RecipeIndex } from "../src/services/recipeIndex.js";
import type { Recipe } from "../src/types/contracts.js";

function makeRecipe(id: string, ingredients: string[]): Recipe {
  return {
    id,
    name: `Recipe ${id}`,
    description: "",
    cookTime: 15,
    servings: 2,
    cuisine: "test",
    difficulty: "easy",
    ingredients,
    instructions: ["Cook."]
  };
}

const assistant = new RecipeAssistant(
  new RecipeIndex([
    makeRecipe("r1", ["rice", "beans", "salsa", "cheese"]),
    makeRecipe("r2", ["rice", "beans"]),
    makeRecipe("r3", ["flour", "sugar"]),
    makeRecipe("r4", ["tortillas", "beans", "rice", "lime"])
  ]),
  new IngredientMatcher({ substitutions: new Map([["cheese", ["nutritional yeast"]]]) })
);

async function withServer<T>(run: (baseURL: string) => Promise<T>): Promise<T> {
  const app = createApp(assistant);

  const server = await new Promise<Server>((resolve, reject) => {
    const instance = app.listen(0, "127.0.0.1", () => resolve(instance));
    instance.on("error", reject);
  });

  const address = server.address();
  if (!address || typeof address === "string") {
    await new Promise<void>((resolve) => server.close(() => resolve()));
    throw new Error("Failed to resolve test server address");
  }

  const baseURL = `http://127.0.0.1:${address.port}`;
  try {
    return await run(baseURL);
  } finally {
    await new Promise<void>((resolve) => server.close(() => resolve()));
  }
}

type MatchPayload = {
  totalFound: number;
  recipes: Array<{
    id: string;
    matchScore: number;
    missingIngredients: string[];
    substitutions: Record<string, string[]>;
  }>;
};

type ErrorPayload = {
  error: string;
  message: string;
  details?: Array<{ path: string; message: string }>;
};

async function readJSON<T>(response: Response): Promise<T> {
  return (await response.json()) as T;
}

function postJSON(url: string, body: unknown): Promise<Response> {
  return fetch(url, {
    method: "POST",
    headers: { "content-type": "application/json" },
    body: JSON.stringify(body)
  });
}

test("POST /api/v1/recipes/find returns ranked matches", async () => {
  await withServer(async (baseURL) => {
    const response = await postJSON(`${baseURL}/api/v1/recipes/find`, { ingredients: ["rice", "beans"] });

    assert.equal(response.status, 200);
    const payload = await readJSON<MatchPayload>(response);
    assert.equal(payload.totalFound, 3);
    assert.deepEqual(
      payload.recipes.map((recipe) => [recipe.id, recipe.matchScore]),
      [
        ["r2", 100],
        ["r1", 50],
        ["r4", 50]
      ]
    );
    assert.deepEqual(payload.recipes[1]?.missingIngredients, ["salsa", "cheese"]);
    assert.deepEqual(payload.recipes[1]?.substitutions, { cheese: ["nutritional yeast"] });
  });
});

test("POST /api/v1/recipes/find honours minMatchScore and maxResults", async () => {
  await withServer(async (baseURL) => {
    const response = await postJSON(`${baseURL}/api/v1/recipes/find`, {
      ingredients: ["rice", "beans"],
      minMatchScore: 0.4,
      maxResults: 2
    });

    assert.equal(response.status, 200);
    const payload = await readJSON<MatchPayload>(response);
    assert.equal(payload.totalFound, 3);
    assert.deepEqual(
      payload.recipes.map((recipe) => recipe.id),
      ["r2", "r1"]
    );
  });
});

test("POST /api/v1/recipes/find separates missing input from no results", async () => {
  await withServer(async (baseURL) => {
    const missing = await postJSON(`${baseURL}/api/v1/recipes/find`, { ingredients: [] });
    assert.equal(missing.status, 400);
    assert.equal((await readJSON<ErrorPayload>(missing)).error, "missing_input");

    const empty = await postJSON(`${baseURL}/api/v1/recipes/find`, { ingredients: ["chocolate"] });
    assert.equal(empty.status, 200);
    assert.deepEqual(await readJSON<MatchPayload>(empty), { totalFound: 0, recipes: [] });
  });
});

test("POST /api/v1/recipes/find rejects malformed payloads", async () => {
  await withServer(async (baseURL) => {
    const wrongType = await postJSON(`${baseURL}/api/v1/recipes/find`, { ingredients: "rice" });
    assert.equal(wrongType.status, 400);
    const payload = await readJSON<ErrorPayload>(wrongType);
    assert.equal(payload.error, "validation_error");
    assert.equal(payload.details?.[0]?.path, "ingredients");

    const outOfRange = await postJSON(`${baseURL}/api/v1/recipes/find`, { ingredients: ["rice"], minMatchScore: 2 });
    assert.equal(outOfRange.status, 400);
    assert.equal((await readJSON<ErrorPayload>(outOfRange)).error, "validation_error");

    const brokenJSON = await fetch(`${baseURL}/api/v1/recipes/find`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: "{ ingredients: "
    });
    assert.equal(brokenJSON.status, 400);
    assert.equal((await readJSON<ErrorPayload>(brokenJSON)).error, "invalid_json");
  });
});

test("POST /api/v1/recipes/find answers oversized or undecodable bodies with client errors", async () => {
  await withServer(async (baseURL) => {
    const oversized = await postJSON(`${baseURL}/api/v1/recipes/find`, {
      ingredients: Array.from({ length: 40_000 }, () => "garlic")
    });
    assert.equal(oversized.status, 413);
    assert.equal((await readJSON<ErrorPayload>(oversized)).error, "payload_too_large");

    const wrongCharset = await fetch(`${baseURL}/api/v1/recipes/find`, {
      method: "POST",
      headers: { "content-type": "application/json; charset=latin1" },
      body: JSON.stringify({ ingredients: ["rice"] })
    });
    assert.equal(wrongCharset.status, 415);
    assert.equal((await readJSON<ErrorPayload>(wrongCharset)).error, "unsupported_media_type");
  });
});

test("GET /api/v1/recipes/:id returns details or 404", async () => {
  await withServer(async (baseURL) => {
    const found = await fetch(`${baseURL}/api/v1/recipes/r2`);
    assert.equal(found.status, 200);
    const payload = await readJSON<{ recipe: Recipe }>(found);
    assert.equal(payload.recipe.id, "r2");
    assert.deepEqual(payload.recipe.ingredients, ["rice", "beans"]);

    const missing = await fetch(`${baseURL}/api/v1/recipes/unknown`);
    assert.equal(missing.status, 404);
    assert.deepEqual(await readJSON<ErrorPayload>(missing), {
      error: "recipe_not_found",
      message: "Recipe with ID 'unknown' not found."
    });
  });
});

test("GET /api/v1/recipes/search filters the catalog", async () => {
  await withServer(async (baseURL) => {
    const response = await fetch(`${baseURL}/api/v1/recipes/search?q=beans&limit=2`);

    assert.equal(response.status, 200);
    const payload = await readJSON<{ items: Array<Record<string, unknown>>; total: number }>(response);
    assert.equal(payload.total, 2);
    assert.deepEqual(
      payload.items.map((item) => item.id),
      ["r1", "r2"]
    );
    assert.equal("instructions" in (payload.items[0] ?? {}), false);
  });
});

test("GET /api/v1/recipes/search rejects a difficulty filter with no known value", async () => {
  await withServer(async (baseURL) => {
    const unknown = await fetch(`${baseURL}/api/v1/recipes/search?difficulty=expert`);
    assert.equal(unknown.status, 400);
    assert.deepEqual(await readJSON<ErrorPayload>(unknown), {
      error: "invalid_query",
      message: "Unknown difficulty 'expert'. Expected one of: easy, medium, hard."
    });

    const mixed = await fetch(`${baseURL}/api/v1/recipes/search?difficulty=expert,easy`);
    assert.equal(mixed.status, 200);
    assert.equal((await readJSON<{ items: unknown[]; total: number }>(mixed)).total, 4);
  });
});

test("POST /api/v1/substitutions omits ingredients without substitutes", async () => {
  await withServer(async (baseURL) => {
    const response = await postJSON(`${baseURL}/api/v1/substitutions`, { ingredients: ["cheese", "flour"] });

    assert.equal(response.status, 200);
    assert.deepEqual(await readJSON<{ substitutions: Record<string, string[]>; found: number }>(response), {
      substitutions: { cheese: ["nutritional yeast"] },
      found: 1
    });

    const missing = await postJSON(`${baseURL}/api/v1/substitutions`, { ingredients: [" "] });
    assert.equal(missing.status, 400);
    assert.equal((await readJSON<ErrorPayload>(missing)).error, "missing_input");
  });
});

test("health routes and unknown paths", async () => {
  await withServer(async (baseURL) => {
    const ready = await fetch(`${baseURL}/health/ready`);
    assert.equal(ready.status, 200);
    const payload = await readJSON<{ ready: boolean; recipes: number }>(ready);
    assert.equal(payload.ready, true);
    assert.equal(payload.recipes, 4);

    const unknown = await fetch(`${baseURL}/api/v1/nothing-here`);
    assert.equal(unknown.status, 404);
    assert.equal((await readJSON<ErrorPayload>(unknown)).error, "not_found");
  });
});
