/**
 * Expression building: substitute matched bands into an index formula
 */

import type { MatchResult } from "./band-matcher.js";
import type { IndexDefinition } from "./catalog.js";
import { ExpressionError } from "./errors.js";
import { renderFormula } from "./formula.js";
import { formatRoleLabel, SAFE_DIVISION_EPSILON } from "./utils.js";

export interface ComputedExpression {
  readonly indexName: string;
  /** Raster name the evaluation engine should write the result to */
  readonly outputName: string;
  readonly expression: string;
  readonly normalized: boolean;
  readonly warnings: readonly string[];
}

export interface BuildOptions {
  /** Prefix for the output raster name; `{prefix}_{NAME}` when set */
  outputPrefix?: string;
}

const GUARD_LITERAL = SAFE_DIVISION_EPSILON.toExponential();

export function outputNameFor(indexName: string, outputPrefix?: string): string {
  return outputPrefix ? `${outputPrefix}_${indexName}` : indexName;
}

/**
 * Render the index formula over the bound band names.
 * @throws ExpressionError when the match does not bind every role
 */
export function buildExpression(
  index: IndexDefinition,
  match: MatchResult,
  options: BuildOptions = {}
): ComputedExpression {
  if (match.indexName !== index.name) {
    throw new ExpressionError(`Match for ${match.indexName} cannot build index ${index.name}`);
  }
  if (match.status !== "FULLY_MATCHED") {
    throw new ExpressionError(describeSkip(match));
  }

  const expression = renderFormula(index.tree, {
    resolve: (roleId) => {
      const band = match.bindings[roleId];
      if (band === undefined) {
        throw new ExpressionError(`index ${index.name}: role '${roleId}' is not bound`);
      }
      return band;
    },
    guard: GUARD_LITERAL,
  });

  return Object.freeze({
    indexName: index.name,
    outputName: outputNameFor(index.name, options.outputPrefix),
    expression,
    normalized: false,
    warnings: Object.freeze([]),
  });
}

/**
 * Warning recorded in place of an expression for an incompletely matched index
 */
export function describeSkip(match: MatchResult): string {
  const roles = match.missing.map(formatRoleLabel).join(", ");
  return `index ${match.indexName} skipped: missing role(s) ${roles}`;
}
