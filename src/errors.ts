/**
 * Error types raised by the catalog, matcher and expression layers
 */

export type SpectralIndexErrorCode =
  | "UNKNOWN_INDEX"
  | "UNKNOWN_THEME"
  | "INVALID_INPUT"
  | "CATALOG"
  | "FORMULA_SYNTAX"
  | "EXPRESSION";

export class SpectralIndexError extends Error {
  public readonly code: SpectralIndexErrorCode;

  constructor(code: SpectralIndexErrorCode, message: string) {
    super(message);
    this.name = "SpectralIndexError";
    this.code = code;
  }
}

export class UnknownIndexError extends SpectralIndexError {
  public readonly indexName: string;

  constructor(indexName: string) {
    super("UNKNOWN_INDEX", `Unknown index '${indexName}'`);
    this.name = "UnknownIndexError";
    this.indexName = indexName;
  }
}

export class UnknownThemeError extends SpectralIndexError {
  public readonly theme: string;

  constructor(theme: string, validThemes: readonly string[]) {
    super("UNKNOWN_THEME", `Unknown theme '${theme}'. Valid themes: ${validThemes.join(", ")}`);
    this.name = "UnknownThemeError";
    this.theme = theme;
  }
}

/**
 * Malformed band/wavelength input. Fatal to the whole batch.
 */
export class InvalidInputError extends SpectralIndexError {
  constructor(message: string) {
    super("INVALID_INPUT", message);
    this.name = "InvalidInputError";
  }
}

export class CatalogError extends SpectralIndexError {
  constructor(message: string) {
    super("CATALOG", message);
    this.name = "CatalogError";
  }
}

export class FormulaSyntaxError extends SpectralIndexError {
  public readonly position: number;

  constructor(message: string, source: string, position: number) {
    super("FORMULA_SYNTAX", `${message} at position ${position} in '${source}'`);
    this.name = "FormulaSyntaxError";
    this.position = position;
  }
}

export class ExpressionError extends SpectralIndexError {
  constructor(message: string) {
    super("EXPRESSION", message);
    this.name = "ExpressionError";
  }
}
