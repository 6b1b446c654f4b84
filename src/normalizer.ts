import type { IndexDefinition } from "./catalog.js";
import type { ComputedExpression } from "./expression-builder.js";
import { formatLiteral } from "./utils.js";

/**
 * Rescale an expression from the index's theoretical range to [0, 1]. Clamping
 * is left to the evaluation engine. Indices without a known range come back
 * unchanged with a warning.
 */
export function normalizeExpression(
  computed: ComputedExpression,
  index: IndexDefinition
): ComputedExpression {
  if (!index.outputRange) {
    return Object.freeze({
      ...computed,
      warnings: Object.freeze([
        ...computed.warnings,
        `index ${index.name} has no defined range; normalization skipped`,
      ]),
    });
  }

  const [min, max] = index.outputRange;
  const low = formatLiteral(min);
  return Object.freeze({
    ...computed,
    expression: `(${computed.expression} - ${low}) / (${formatLiteral(max)} - ${low})`,
    normalized: true,
  });
}
