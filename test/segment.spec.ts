import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { headerSection, segment } from "../src/pipeline/segment";

describe("segment", () => {
  it("returns three empty sections for empty text", () => {
    assert.deepEqual(segment(""), { ingredients: [], instructions: [], notes: [] });
  });

  it("always returns exactly the three section keys", () => {
    for (const text of ["random\nlines", "Ingredientes:", "1. solo un paso", "\n\n\n"]) {
      assert.deepEqual(Object.keys(segment(text)), ["ingredients", "instructions", "notes"]);
    }
  });

  it("splits on headers, ignoring the preamble and duplicate lines", () => {
    const text = [
      "Tortilla de patatas",
      "Ingredientes:",
      "- 4 huevos",
      "- 500 g de patatas",
      "- 4 huevos",
      "",
      "Preparación:",
      "1. Pelar las patatas.",
      "2. Freír.",
      "Notas:",
      "Mejor al día siguiente.",
    ].join("\n");

    assert.deepEqual(segment(text), {
      ingredients: ["- 4 huevos", "- 500 g de patatas"],
      instructions: ["1. Pelar las patatas.", "2. Freír."],
      notes: ["Mejor al día siguiente."],
    });
  });

  it("keeps labelled values such as a preparation time as content", () => {
    const text = [
      "Ingredientes (para 4 personas):",
      "2 huevos",
      "Preparación: 20 min",
      "Pasos",
      "Batir.",
    ].join("\n");

    assert.deepEqual(segment(text), {
      ingredients: ["2 huevos", "Preparación: 20 min"],
      instructions: ["Batir."],
      notes: [],
    });
  });

  it("accepts a qualifier without a colon after the header keyword", () => {
    const text = [
      "Tarta",
      "Ingredientes para 4 personas",
      "200 g harina",
      "3 huevos",
      "Preparación",
      "1. Mezclar.",
    ].join("\n");

    assert.deepEqual(segment(text), {
      ingredients: ["200 g harina", "3 huevos"],
      instructions: ["1. Mezclar."],
      notes: [],
    });
  });

  it("recognises singular section headers", () => {
    const text = ["Sopa", "Ingredientes:", "1 l agua", "Paso:", "Hervir.", "Nota:", "Servir caliente."].join("\n");

    assert.deepEqual(segment(text), {
      ingredients: ["1 l agua"],
      instructions: ["Hervir."],
      notes: ["Servir caliente."],
    });
  });

  it("falls back to layout when no header is present", () => {
    const text = [
      "Sopa",
      "200 g fideos",
      "1. Hervir agua",
      "2. Añadir fideos",
      "Nota: servir caliente",
    ].join("\n");

    assert.deepEqual(segment(text), {
      ingredients: ["Sopa", "200 g fideos"],
      instructions: ["1. Hervir agua", "2. Añadir fideos"],
      notes: ["Nota: servir caliente"],
    });
  });
});

describe("headerSection", () => {
  it("recognises decorated and qualified headers", () => {
    assert.equal(headerSection("=== INGREDIENTS ==="), "ingredients");
    assert.equal(headerSection("Ingredientes para la masa:"), "ingredients");
    assert.equal(headerSection("## Steps ##"), "instructions");
    assert.equal(headerSection("Método"), "instructions");
    assert.equal(headerSection("Tips"), "notes");
    assert.equal(headerSection("Ingredientes para 4 personas"), "ingredients");
    assert.equal(headerSection("Step"), "instructions");
    assert.equal(headerSection("Instrucción:"), "instructions");
    assert.equal(headerSection("Note"), "notes");
    assert.equal(headerSection("Tip:"), "notes");
    assert.equal(headerSection("Consejo"), "notes");
  });

  it("does not treat labelled values as headers", () => {
    assert.equal(headerSection("Tipo: cena"), undefined);
    assert.equal(headerSection("Preparación: 20 min"), undefined);
    assert.equal(headerSection("- 2 huevos"), undefined);
    assert.equal(headerSection("Paso 1: Precalentar el horno"), undefined);
    assert.equal(headerSection("Notas de vainilla en el vino."), undefined);
    assert.equal(headerSection(""), undefined);
  });
});
