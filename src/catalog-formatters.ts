/**
 * Catalog listing and detail projections, plus their text rendering
 */

import { catalog as defaultCatalog, type IndexCatalog, type RoleSpec } from "./catalog.js";
import { ALL_THEMES, formatRoleLabel, type Theme } from "./utils.js";

export interface CatalogListingSection {
  theme: Theme;
  indices: Array<{ name: string; description: string }>;
}

export interface IndexDetail {
  name: string;
  description: string;
  theme: Theme;
  formula: string;
  citation: string;
  roles: RoleSpec[];
  outputRange: [number, number] | null;
}

/**
 * Indices grouped by theme in catalog theme order. Themes without entries are
 * left out.
 */
export function catalogListing(
  theme?: string,
  catalog: IndexCatalog = defaultCatalog
): CatalogListingSection[] {
  const filter = theme ? theme.trim().toLowerCase() : ALL_THEMES;
  const entries = catalog.listByTheme(filter);
  const sections: CatalogListingSection[] = [];
  for (const current of catalog.themes()) {
    const indices = entries
      .filter((entry) => entry.theme === current)
      .map((entry) => ({ name: entry.name, description: entry.description }));
    if (indices.length > 0) {
      sections.push({ theme: current, indices });
    }
  }
  return sections;
}

export function indexDetail(name: string, catalog: IndexCatalog = defaultCatalog): IndexDetail {
  const definition = catalog.lookup(name);
  return {
    name: definition.name,
    description: definition.description,
    theme: definition.theme,
    formula: definition.formula,
    citation: definition.citation,
    roles: definition.roles.map((role) => ({ ...role })),
    outputRange: definition.outputRange
      ? [definition.outputRange[0], definition.outputRange[1]]
      : null,
  };
}

/**
 * Format the catalog listing for display. Detailed mode adds formula, roles
 * and reference under every index.
 */
export function formatCatalogListing(
  theme?: string,
  detailed = false,
  catalog: IndexCatalog = defaultCatalog
): string {
  const sections = catalogListing(theme, catalog);
  const lines: string[] = [];
  let total = 0;

  lines.push("# Available Spectral Indices");

  for (const section of sections) {
    total += section.indices.length;
    lines.push("");
    lines.push(`## ${section.theme.toUpperCase()} (${section.indices.length})`);
    lines.push("");
    for (const entry of section.indices) {
      if (!detailed) {
        lines.push(`- **${entry.name}**: ${entry.description}`);
        continue;
      }
      const detail = indexDetail(entry.name, catalog);
      lines.push(`### ${detail.name}`);
      lines.push(detail.description);
      lines.push(`- **Formula**: \`${detail.formula}\``);
      lines.push(`- **Roles**: ${detail.roles.map(formatRoleLabel).join(", ")}`);
      lines.push(`- **Reference**: ${detail.citation}`);
      lines.push("");
    }
  }

  lines.push("");
  lines.push(`Total indices: ${total}`);
  return lines.join("\n");
}

/**
 * Format a single index's details for display
 */
export function formatIndexDetail(detail: IndexDetail): string {
  const lines: string[] = [];

  lines.push(`# ${detail.name}`);
  lines.push("");
  lines.push(`**Description**: ${detail.description}`);
  lines.push(`**Theme**: ${detail.theme}`);
  lines.push(`**Formula**: \`${detail.formula}\``);
  if (detail.outputRange) {
    lines.push(`**Output Range**: [${detail.outputRange.join(", ")}]`);
  }
  lines.push(`**Reference**: ${detail.citation}`);

  lines.push("");
  lines.push("## Spectral Roles");
  lines.push("");
  for (const role of detail.roles) {
    lines.push(`- **${role.id}**: ${role.centerNm} nm ± ${role.toleranceNm} nm`);
  }

  return lines.join("\n");
}
