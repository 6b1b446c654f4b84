/**
 * Index catalog: the read-only registry of spectral index definitions.
 *
 * Definitions are declarative records loaded from data/indices.json. Adding an
 * index means adding an entry there; nothing in the matcher or the expression
 * builder branches on index names.
 */

import { readFileSync } from "fs";
import { z } from "zod";
import { CatalogError, UnknownIndexError, UnknownThemeError } from "./errors.js";
import { FORMULA_FUNCTIONS, type FormulaNode, formulaIdentifiers, parseFormula } from "./formula.js";
import { ALL_THEMES, DEFAULT_TOLERANCE_NM, isTheme, type Theme, THEMES } from "./utils.js";

export interface RoleSpec {
  readonly id: string;
  readonly centerNm: number;
  readonly toleranceNm: number;
}

export interface IndexDefinition {
  readonly name: string;
  readonly description: string;
  readonly theme: Theme;
  readonly roles: readonly RoleSpec[];
  /** Template text over role ids, as written in the catalog */
  readonly formula: string;
  readonly tree: FormulaNode;
  readonly outputRange?: readonly [number, number];
  readonly citation: string;
}

const ROLE_ID_PATTERN = /^[a-z][a-z0-9_]*$/;

const RoleDefaultsSchema = z.object({
  centerNm: z.number().positive(),
  toleranceNm: z.number().positive().optional(),
});

const RoleRefSchema = z.union([
  z.string(),
  z.object({
    id: z.string(),
    centerNm: z.number().positive().optional(),
    toleranceNm: z.number().positive().optional(),
  }),
]);

const IndexEntrySchema = z.object({
  name: z.string().min(1),
  theme: z.enum(THEMES),
  description: z.string(),
  roles: z.array(RoleRefSchema).min(1),
  formula: z.string().min(1),
  outputRange: z.tuple([z.number(), z.number()]).optional(),
  citation: z.string(),
});

export const CatalogDataSchema = z.object({
  roles: z.record(z.string(), RoleDefaultsSchema),
  indices: z.array(IndexEntrySchema),
});

export type CatalogData = z.infer<typeof CatalogDataSchema>;
type IndexEntry = z.infer<typeof IndexEntrySchema>;

function resolveRoles(entry: IndexEntry, vocabulary: CatalogData["roles"]): RoleSpec[] {
  const seen = new Set<string>();
  return entry.roles.map((ref) => {
    const id = typeof ref === "string" ? ref : ref.id;
    if (!ROLE_ID_PATTERN.test(id) || (FORMULA_FUNCTIONS as readonly string[]).includes(id)) {
      throw new CatalogError(`Index ${entry.name}: invalid role id '${id}'`);
    }
    if (seen.has(id)) {
      throw new CatalogError(`Index ${entry.name}: role '${id}' declared twice`);
    }
    seen.add(id);

    const defaults = vocabulary[id];
    const centerNm = (typeof ref === "string" ? undefined : ref.centerNm) ?? defaults?.centerNm;
    if (centerNm === undefined) {
      throw new CatalogError(`Index ${entry.name}: role '${id}' has no center wavelength`);
    }
    const toleranceNm =
      (typeof ref === "string" ? undefined : ref.toleranceNm) ??
      defaults?.toleranceNm ??
      DEFAULT_TOLERANCE_NM;
    return Object.freeze({ id, centerNm, toleranceNm });
  });
}

function buildDefinition(entry: IndexEntry, vocabulary: CatalogData["roles"]): IndexDefinition {
  const roles = resolveRoles(entry, vocabulary);

  let tree: FormulaNode;
  try {
    tree = parseFormula(entry.formula);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new CatalogError(`Index ${entry.name}: ${message}`);
  }

  const roleIds = new Set(roles.map((role) => role.id));
  const referenced = formulaIdentifiers(tree);
  const undeclared = referenced.filter((id) => !roleIds.has(id));
  if (undeclared.length > 0) {
    throw new CatalogError(
      `Index ${entry.name}: formula references undeclared role(s) ${undeclared.join(", ")}`
    );
  }
  const unused = roles.filter((role) => !referenced.includes(role.id));
  if (unused.length > 0) {
    throw new CatalogError(
      `Index ${entry.name}: role(s) ${unused.map((r) => r.id).join(", ")} not used by the formula`
    );
  }

  if (entry.outputRange && !(entry.outputRange[0] < entry.outputRange[1])) {
    throw new CatalogError(`Index ${entry.name}: output range minimum must be below maximum`);
  }

  return Object.freeze({
    name: entry.name,
    description: entry.description,
    theme: entry.theme,
    roles: Object.freeze(roles),
    formula: entry.formula,
    tree,
    outputRange: entry.outputRange
      ? Object.freeze<[number, number]>([entry.outputRange[0], entry.outputRange[1]])
      : undefined,
    citation: entry.citation,
  });
}

function byName(a: IndexDefinition, b: IndexDefinition): number {
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

export class IndexCatalog {
  private readonly byKey = new Map<string, IndexDefinition>();
  private readonly byTheme = new Map<Theme, readonly IndexDefinition[]>();
  private readonly everything: readonly IndexDefinition[];

  constructor(definitions: readonly IndexDefinition[]) {
    for (const definition of definitions) {
      const key = definition.name.toLowerCase();
      if (this.byKey.has(key)) {
        throw new CatalogError(`Duplicate index name '${definition.name}'`);
      }
      this.byKey.set(key, definition);
    }
    for (const theme of THEMES) {
      const members = definitions.filter((d) => d.theme === theme).sort(byName);
      this.byTheme.set(theme, Object.freeze(members));
    }
    this.everything = Object.freeze(THEMES.flatMap((theme) => this.byTheme.get(theme) ?? []));
    Object.freeze(this);
  }

  get size(): number {
    return this.byKey.size;
  }

  /**
   * Case-insensitive lookup by index name
   */
  lookup(name: string): IndexDefinition {
    const definition = this.byKey.get(name.trim().toLowerCase());
    if (!definition) {
      throw new UnknownIndexError(name);
    }
    return definition;
  }

  has(name: string): boolean {
    return this.byKey.has(name.trim().toLowerCase());
  }

  /**
   * Entries of one theme sorted by name, or every entry for the "all" pseudo-theme
   */
  listByTheme(theme: string): readonly IndexDefinition[] {
    if (theme === ALL_THEMES) {
      return this.everything;
    }
    if (!isTheme(theme)) {
      throw new UnknownThemeError(theme, [...THEMES, ALL_THEMES]);
    }
    return this.byTheme.get(theme) ?? [];
  }

  listAll(): readonly IndexDefinition[] {
    return this.everything;
  }

  themes(): readonly Theme[] {
    return THEMES;
  }
}

/**
 * Validate raw catalog data and build an immutable catalog from it
 */
export function createCatalog(data: unknown): IndexCatalog {
  const parsed = CatalogDataSchema.safeParse(data);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new CatalogError(`Invalid catalog data: ${details}`);
  }
  const { roles, indices } = parsed.data;
  return new IndexCatalog(indices.map((entry) => buildDefinition(entry, roles)));
}

function loadDefaultCatalog(): IndexCatalog {
  const dataUrl = new URL("./data/indices.json", import.meta.url);
  const raw: unknown = JSON.parse(readFileSync(dataUrl, "utf-8"));
  return createCatalog(raw);
}

/**
 * Process-wide catalog, built once when this module is first imported
 */
export const catalog: IndexCatalog = loadDefaultCatalog();
