import assert from "node:assert/strict";
import { describe, it } from "node:test";

import { ExpressionError } from "../src/errors.js";
import { evaluateExpression } from "../src/expression-probe.js";

describe("evaluateExpression", () => {
  it("follows arithmetic precedence", () => {
    assert.strictEqual(evaluateExpression("a + b * 2", { a: 1, b: 3 }), 7);
    assert.strictEqual(evaluateExpression("(a + b) * 2", { a: 1, b: 3 }), 8);
    assert.strictEqual(evaluateExpression("-a^2", { a: 3 }), -9);
  });

  it("applies the supported functions", () => {
    assert.strictEqual(evaluateExpression("sqrt(a)", { a: 16 }), 4);
    assert.strictEqual(evaluateExpression("abs(-a)", { a: 2 }), 2);
    assert.strictEqual(evaluateExpression("log(a)", { a: 1 }), 0);
  });

  it("accepts band names with dots and at-signs", () => {
    assert.strictEqual(evaluateExpression("lsat.B5@plot - 1", { "lsat.B5@plot": 3 }), 2);
  });

  it("requires a value for every band", () => {
    assert.throws(
      () => evaluateExpression("a + c", { a: 1 }),
      (error: unknown) =>
        error instanceof ExpressionError && error.message === "No value supplied for band 'c'"
    );
    assert.throws(() => evaluateExpression("toString", {}), ExpressionError);
  });
});
