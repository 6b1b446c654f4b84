/**
 * Batch computation: validate a request, then match, build and optionally
 * normalize each requested index independently.
 */

import { type MatchResult, matchBands, type BandInput, validateBandInputs } from "./band-matcher.js";
import { catalog as defaultCatalog, type IndexCatalog, type IndexDefinition, type RoleSpec } from "./catalog.js";
import { buildExpression, type ComputedExpression, describeSkip } from "./expression-builder.js";
import { normalizeExpression } from "./normalizer.js";
import { ALL_THEMES, DEFAULT_INDICES } from "./utils.js";

export interface IndexRequest {
  bands: readonly string[];
  wavelengths: readonly number[];
  /** Explicit index names; a single "all" selects the whole catalog */
  indices?: readonly string[];
  /** Theme name or "all"; takes precedence over `indices` */
  theme?: string;
  normalize?: boolean;
  outputPrefix?: string;
}

export interface SkippedIndex {
  readonly indexName: string;
  readonly reason: string;
  readonly missingRoles: readonly RoleSpec[];
}

export interface IndexComputation {
  readonly inputs: readonly BandInput[];
  readonly requested: readonly string[];
  readonly expressions: readonly ComputedExpression[];
  readonly skipped: readonly SkippedIndex[];
  readonly warnings: readonly string[];
  readonly summary: { readonly computed: number; readonly skipped: number };
}

/**
 * Resolve which catalog entries a request selects. Unknown names and themes
 * throw before any matching happens.
 */
export function resolveRequestedIndices(
  request: Pick<IndexRequest, "indices" | "theme">,
  catalog: IndexCatalog = defaultCatalog
): IndexDefinition[] {
  if (request.theme) {
    return [...catalog.listByTheme(request.theme.trim().toLowerCase())];
  }

  const names = request.indices && request.indices.length > 0 ? request.indices : DEFAULT_INDICES;
  if (names.length === 1 && names[0].trim().toLowerCase() === ALL_THEMES) {
    return [...catalog.listAll()];
  }

  const selected: IndexDefinition[] = [];
  const seen = new Set<string>();
  for (const name of names) {
    const definition = catalog.lookup(name);
    if (seen.has(definition.name)) continue;
    seen.add(definition.name);
    selected.push(definition);
  }
  return selected;
}

type IndexOutcome =
  | { kind: "computed"; expression: ComputedExpression }
  | { kind: "skipped"; skipped: SkippedIndex };

function computeOne(
  index: IndexDefinition,
  inputs: readonly BandInput[],
  request: IndexRequest
): IndexOutcome {
  const match: MatchResult = matchBands(index, inputs);
  if (match.status !== "FULLY_MATCHED") {
    return {
      kind: "skipped",
      skipped: { indexName: index.name, reason: describeSkip(match), missingRoles: match.missing },
    };
  }
  const built = buildExpression(index, match, { outputPrefix: request.outputPrefix });
  return {
    kind: "computed",
    expression: request.normalize ? normalizeExpression(built, index) : built,
  };
}

/**
 * Compute expressions for every requested index. Input and lookup errors are
 * fatal to the request; incomplete coverage only skips the affected index.
 */
export function computeIndices(
  request: IndexRequest,
  catalog: IndexCatalog = defaultCatalog
): IndexComputation {
  const inputs = validateBandInputs(request.bands, request.wavelengths);
  const selected = resolveRequestedIndices(request, catalog);

  const expressions: ComputedExpression[] = [];
  const skipped: SkippedIndex[] = [];
  const warnings: string[] = [];

  for (const index of selected) {
    const outcome = computeOne(index, inputs, request);
    if (outcome.kind === "computed") {
      expressions.push(outcome.expression);
      warnings.push(...outcome.expression.warnings);
    } else {
      skipped.push(outcome.skipped);
      warnings.push(outcome.skipped.reason);
    }
  }

  return {
    inputs,
    requested: selected.map((index) => index.name),
    expressions,
    skipped,
    warnings,
    summary: { computed: expressions.length, skipped: skipped.length },
  };
}
