import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { RecipeValidationError } from "../src/errors";
import {
  formatIngredient,
  mergeIngredients,
  normalizeIngredients,
  normalizeQuantity,
  scaleIngredients,
} from "../src/pipeline/ingredientService";
import type { Ingredient } from "../src/pipeline/types";

describe("normalizeIngredients", () => {
  it("accepts Spanish and English keyed records", () => {
    const result = normalizeIngredients([
      { nombre: "  Harina   de trigo ", cantidad: 500, unidad: " G " },
      { name: "Eggs", unit: null },
    ]);

    assert.deepEqual(result, [
      { name: "Harina de trigo", quantity: 500, unit: "g" },
      { name: "Eggs", quantity: 1, unit: "unidad" },
    ]);
  });

  it("fills a blank unit with the filler unit", () => {
    assert.deepEqual(normalizeIngredients([{ nombre: "sal", cantidad: 1, unidad: "" }]), [
      { name: "sal", quantity: 1, unit: "unidad" },
    ]);
  });

  it("drops empty and overlong names", () => {
    const result = normalizeIngredients([
      { name: "", quantity: 1, unit: "g" },
      { name: "x".repeat(101), quantity: 1, unit: "g" },
      { name: "y".repeat(100), quantity: 1, unit: "g" },
    ]);

    assert.equal(result.length, 1);
    assert.equal(result[0].name.length, 100);
  });

  it("honours the configured filler unit and name limit", () => {
    const result = normalizeIngredients(
      [
        { name: "Limón", quantity: Number.NaN },
        { name: "Pimienta negra", quantity: 1 },
      ],
      { defaultUnit: "pieza", maxNameLength: 10 },
    );

    assert.deepEqual(result, [{ name: "Limón", quantity: 1, unit: "pieza" }]);
  });
});

describe("normalizeQuantity", () => {
  it("promotes and demotes metric units", () => {
    assert.deepEqual(normalizeQuantity(1500, "ml"), { quantity: 1.5, unit: "l" });
    assert.deepEqual(normalizeQuantity(0.25, "l"), { quantity: 250, unit: "ml" });
    assert.deepEqual(normalizeQuantity(2500, "G"), { quantity: 2.5, unit: "kg" });
    assert.deepEqual(normalizeQuantity(0.5, "kg"), { quantity: 500, unit: "g" });
  });

  it("canonicalises pieces and lowercases everything else", () => {
    assert.deepEqual(normalizeQuantity(3, "Pieces"), { quantity: 3, unit: "pcs" });
    assert.deepEqual(normalizeQuantity(2, "Taza"), { quantity: 2, unit: "taza" });
    assert.deepEqual(normalizeQuantity(1 / 3, "cup"), { quantity: 0.333333, unit: "cup" });
  });
});

describe("scaleIngredients", () => {
  const ingredients: Ingredient[] = [
    { name: "harina", quantity: 600, unit: "g" },
    { name: "huevos", quantity: 2, unit: "u" },
  ];

  it("multiplies and renormalises without touching the input", () => {
    assert.deepEqual(scaleIngredients(ingredients, 2), [
      { name: "harina", quantity: 1.2, unit: "kg" },
      { name: "huevos", quantity: 4, unit: "u" },
    ]);
    assert.deepEqual(ingredients[0], { name: "harina", quantity: 600, unit: "g" });
  });

  it("rejects factors that are not positive", () => {
    for (const factor of [0, -1, Number.NaN]) {
      assert.throws(() => scaleIngredients(ingredients, factor), RecipeValidationError);
    }
    assert.throws(() => scaleIngredients(ingredients, 0), /Scaling factor must be positive/);
  });
});

describe("mergeIngredients", () => {
  it("sums entries with the same name and unit", () => {
    assert.deepEqual(
      mergeIngredients([
        { name: "harina", quantity: 100, unit: "g" },
        { name: "harina", quantity: 200, unit: "g" },
      ]),
      [{ name: "harina", quantity: 300, unit: "g" }],
    );
  });

  it("sums case-insensitive duplicates and rescales large totals", () => {
    const merged = mergeIngredients([
      { name: "Harina", quantity: 600, unit: "g" },
      { name: "azúcar", quantity: 100, unit: "g" },
      { name: "harina", quantity: 500, unit: "g" },
    ]);

    assert.deepEqual(merged, [
      { name: "Harina", quantity: 1.1, unit: "kg" },
      { name: "azúcar", quantity: 100, unit: "g" },
    ]);
  });

  it("keeps different units apart", () => {
    const merged = mergeIngredients([
      { name: "sal", quantity: 1, unit: "cdta" },
      { name: "sal", quantity: 5, unit: "g" },
    ]);

    assert.equal(merged.length, 2);
  });
});

describe("formatIngredient", () => {
  it("renders fractions and hides empty quantities", () => {
    assert.equal(formatIngredient({ name: "harina", quantity: 1.5, unit: "taza" }), "1 1/2 taza harina");
    assert.equal(formatIngredient({ name: "huevos", quantity: 8, unit: "u" }), "8 u huevos");
    assert.equal(formatIngredient({ name: "sal", quantity: 0, unit: "unidad" }), "sal");
  });
});
