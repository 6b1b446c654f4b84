import assert from "node:assert/strict";
import { describe, it } from "node:test";

import { matchBands, validateBandInputs } from "../src/band-matcher.js";
import { catalog, createCatalog } from "../src/catalog.js";
import { buildExpression } from "../src/expression-builder.js";
import { evaluateExpression } from "../src/expression-probe.js";
import { normalizeExpression } from "../src/normalizer.js";

const redNir = validateBandInputs(["b_red", "b_nir"], [665, 850]);

function built(name: string) {
  const index = catalog.lookup(name);
  return { index, computed: buildExpression(index, matchBands(index, redNir)) };
}

describe("normalizeExpression", () => {
  it("rescales a [-1, 1] index to [0, 1]", () => {
    const { index, computed } = built("NDVI");
    const normalized = normalizeExpression(computed, index);
    assert.strictEqual(
      normalized.expression,
      "((b_nir - b_red) / (b_nir + b_red + 1e-6) - (-1)) / (1 - (-1))"
    );
    assert.strictEqual(normalized.normalized, true);
    assert.deepStrictEqual(normalized.warnings, []);
    assert.strictEqual(normalized.outputName, "NDVI");
  });

  it("maps the midpoint of the range to one half", () => {
    const { index, computed } = built("NDVI");
    const { expression } = normalizeExpression(computed, index);
    assert.strictEqual(evaluateExpression(expression, { b_red: 0.3, b_nir: 0.3 }), 0.5);
  });

  it("uses the catalog range as given", () => {
    const index = createCatalog({
      roles: { a: { centerNm: 665 }, b: { centerNm: 850 } },
      indices: [
        {
          name: "RATIO",
          theme: "soil",
          description: "Bounded ratio",
          roles: ["a", "b"],
          formula: "a / b",
          outputRange: [0, 2],
          citation: "Placeholder 2000",
        },
      ],
    }).lookup("RATIO");
    const computed = buildExpression(index, matchBands(index, redNir));
    assert.strictEqual(
      normalizeExpression(computed, index).expression,
      "(b_red / (b_nir + 1e-6) - 0) / (2 - 0)"
    );
  });

  it("passes indices without a range through with a warning", () => {
    const { index, computed } = built("DVI");
    const result = normalizeExpression(computed, index);
    assert.strictEqual(result.expression, "b_nir - b_red");
    assert.strictEqual(result.normalized, false);
    assert.deepStrictEqual(result.warnings, [
      "index DVI has no defined range; normalization skipped",
    ]);
  });
});
