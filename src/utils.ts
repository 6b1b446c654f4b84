export const THEMES = [
  "vegetation",
  "pigments",
  "metabolism",
  "biochemical",
  "water",
  "soil",
  "urban",
  "stress",
  "materials",
] as const;

export type Theme = (typeof THEMES)[number];

/**
 * Pseudo-theme accepted wherever a theme filter is: the union of every theme
 */
export const ALL_THEMES = "all";

/**
 * Catalog-wide wavelength tolerance (nm) for roles that do not declare their own
 */
export const DEFAULT_TOLERANCE_NM = 20;

/**
 * Additive guard appended to every rendered denominator
 */
export const SAFE_DIVISION_EPSILON = 1e-6;

/**
 * Indices computed when a request names neither indices nor a theme
 */
export const DEFAULT_INDICES: readonly string[] = ["NDVI"];

/**
 * Band identifiers are substituted verbatim into expressions, so they are
 * restricted to raster-map-name characters.
 */
export const BAND_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_.@]*$/;

export function isTheme(value: string): value is Theme {
  return (THEMES as readonly string[]).includes(value);
}

/**
 * Render a numeric literal for an expression, parenthesizing negatives so the
 * result can sit on either side of a binary operator.
 */
export function formatLiteral(value: number): string {
  const text = String(value);
  return value < 0 ? `(${text})` : text;
}

/**
 * Compact "role@center±tolerance" label used in warnings and listings
 */
export function formatRoleLabel(role: {
  id: string;
  centerNm: number;
  toleranceNm: number;
}): string {
  return `${role.id}@${role.centerNm}±${role.toleranceNm}nm`;
}
