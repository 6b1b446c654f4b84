/**
 * Band matching: resolve an index's abstract spectral roles to caller bands
 */

import type { IndexDefinition, RoleSpec } from "./catalog.js";
import { InvalidInputError } from "./errors.js";
import { BAND_NAME_PATTERN } from "./utils.js";

export interface BandInput {
  readonly name: string;
  readonly wavelengthNm: number;
}

export type MatchStatus = "FULLY_MATCHED" | "PARTIALLY_MATCHED" | "UNMATCHED";

export interface MatchResult {
  readonly indexName: string;
  /** role id -> band name, resolved roles only */
  readonly bindings: Readonly<Record<string, string>>;
  /** Unresolved roles in declaration order */
  readonly missing: readonly RoleSpec[];
  readonly status: MatchStatus;
}

/**
 * Zip parallel band-name and wavelength lists into validated inputs
 * @throws InvalidInputError on empty, mismatched, malformed or duplicate input
 */
export function validateBandInputs(
  names: readonly string[],
  wavelengths: readonly number[]
): BandInput[] {
  if (names.length !== wavelengths.length) {
    throw new InvalidInputError(
      `Number of input bands (${names.length}) must match number of wavelengths (${wavelengths.length})`
    );
  }
  const inputs = names.map((rawName, i) => {
    const name = rawName.trim();
    const wavelengthNm = wavelengths[i];
    if (!BAND_NAME_PATTERN.test(name)) {
      throw new InvalidInputError(`Invalid band name '${rawName}'`);
    }
    if (!Number.isFinite(wavelengthNm) || wavelengthNm <= 0) {
      throw new InvalidInputError(`Invalid wavelength ${wavelengthNm} for band '${name}'`);
    }
    return { name, wavelengthNm };
  });
  assertUsableInputs(inputs);
  return inputs;
}

function assertUsableInputs(inputs: readonly BandInput[]): void {
  if (inputs.length === 0) {
    throw new InvalidInputError("At least one input band is required");
  }
  const seen = new Set<string>();
  for (const input of inputs) {
    if (seen.has(input.name)) {
      throw new InvalidInputError(`Duplicate band name '${input.name}'`);
    }
    seen.add(input.name);
  }
}

/**
 * Bind each role, in declaration order, to the nearest unused input within the
 * role's tolerance. Equal distances go to the input listed first.
 */
export function matchBands(index: IndexDefinition, inputs: readonly BandInput[]): MatchResult {
  assertUsableInputs(inputs);

  const used = new Set<number>();
  const bindings: Record<string, string> = {};
  const missing: RoleSpec[] = [];

  for (const role of index.roles) {
    let bestIndex = -1;
    let bestDistance = Number.POSITIVE_INFINITY;
    inputs.forEach((input, i) => {
      if (used.has(i)) return;
      const distance = Math.abs(input.wavelengthNm - role.centerNm);
      // strict comparison keeps the earliest input on ties
      if (distance < bestDistance) {
        bestDistance = distance;
        bestIndex = i;
      }
    });

    if (bestIndex >= 0 && bestDistance <= role.toleranceNm) {
      used.add(bestIndex);
      bindings[role.id] = inputs[bestIndex].name;
    } else {
      missing.push(role);
    }
  }

  const status: MatchStatus =
    missing.length === 0
      ? "FULLY_MATCHED"
      : missing.length === index.roles.length
        ? "UNMATCHED"
        : "PARTIALLY_MATCHED";

  return Object.freeze({
    indexName: index.name,
    bindings: Object.freeze(bindings),
    missing: Object.freeze(missing),
    status,
  });
}
