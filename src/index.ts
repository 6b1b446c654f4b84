#!/usr/bin/env node

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  type CallToolResult,
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type Tool,
} from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { formatCatalogListing, formatIndexDetail, indexDetail } from "./catalog-formatters.js";
import { InvalidInputError } from "./errors.js";
import { evaluateExpression } from "./expression-probe.js";
import { computeIndices, type IndexComputation } from "./index-request.js";
import { formatRoleLabel, THEMES } from "./utils.js";

const SERVER_NAME = "spectral-indices-mcp";
const SERVER_VERSION = "0.1.0";

// Comma-separated form of a list argument ("b1,b2,b3"); every entry must be non-empty
const commaList = z
  .string()
  .transform((value) => value.split(",").map((part) => part.trim()))
  .refine((parts) => parts.every((part) => part.length > 0), {
    message: "Empty entry in comma-separated list",
  });

const stringList = z.union([z.array(z.string()), commaList]);

const numberList = z.union([z.array(z.number()), commaList.transform((parts) => parts.map(Number))]);

const ListIndicesArgsSchema = z.object({
  theme: z.string().optional(),
  detailed: z.boolean().default(false),
});

const DescribeIndexArgsSchema = z.object({
  name: z.string().min(1),
});

const ComputeIndicesArgsSchema = z.object({
  bands: stringList,
  wavelengths: numberList,
  indices: stringList.optional(),
  theme: z.string().optional(),
  normalize: z.boolean().default(false),
  output_prefix: z.string().optional(),
});

const ProbeIndexArgsSchema = z.object({
  index: z.string().min(1),
  bands: stringList,
  wavelengths: numberList,
  values: numberList,
  normalize: z.boolean().default(false),
});

const THEME_CHOICES = [...THEMES, "all"];

const LIST_INDICES_TOOL: Tool = {
  name: "list_indices",
  description:
    "List the available spectral indices grouped by theme (vegetation, pigments, metabolism, biochemical, water, soil, urban, stress, materials). Use detailed=true to include formulas, spectral roles and references.",
  inputSchema: {
    type: "object",
    properties: {
      theme: {
        type: "string",
        enum: THEME_CHOICES,
        description: "Optional theme filter. Default: all themes.",
      },
      detailed: {
        type: "boolean",
        description: "Include formula, roles and reference for every index. Default: false.",
        default: false,
      },
    },
  },
};

const DESCRIBE_INDEX_TOOL: Tool = {
  name: "describe_index",
  description:
    "Show the formula, required spectral roles (center wavelength and tolerance in nm), output range and reference for one spectral index.",
  inputSchema: {
    type: "object",
    properties: {
      name: {
        type: "string",
        description: "Index name, case-insensitive (e.g., 'NDVI', 'MCARI2', 'PLASTIC').",
      },
    },
    required: ["name"],
  },
};

const COMPUTE_INDICES_TOOL: Tool = {
  name: "compute_indices",
  description:
    "Match input bands to the spectral roles of the requested indices by wavelength and build a raster-algebra expression for each index that can be computed. Every division in the result is guarded against zero denominators. Indices without band coverage are skipped with a warning naming the missing roles.\n\nExample: bands=['b_red','b_nir'], wavelengths=[665,850], indices=['NDVI'].",
  inputSchema: {
    type: "object",
    properties: {
      bands: {
        type: "array",
        description: "Input raster band names, in the same order as wavelengths.",
        items: { type: "string" },
      },
      wavelengths: {
        type: "array",
        description: "Center wavelength of each input band in nm.",
        items: { type: "number" },
      },
      indices: {
        type: "array",
        description: "Index names to compute, or ['all']. Default: ['NDVI'].",
        items: { type: "string" },
      },
      theme: {
        type: "string",
        enum: THEME_CHOICES,
        description: "Compute every index of a theme. Takes precedence over indices.",
      },
      normalize: {
        type: "boolean",
        description: "Rescale indices with a known range to 0-1. Default: false.",
        default: false,
      },
      output_prefix: {
        type: "string",
        description: "Prefix for output raster names ({prefix}_{INDEX}).",
      },
    },
    required: ["bands", "wavelengths"],
  },
};

const PROBE_INDEX_TOOL: Tool = {
  name: "probe_index",
  description:
    "Build the expression for one index and evaluate it for a single pixel, given one reflectance value per input band. Useful to sanity-check an index before running it over a raster.",
  inputSchema: {
    type: "object",
    properties: {
      index: {
        type: "string",
        description: "Index name (e.g., 'NDVI').",
      },
      bands: {
        type: "array",
        description: "Input band names.",
        items: { type: "string" },
      },
      wavelengths: {
        type: "array",
        description: "Center wavelength of each input band in nm.",
        items: { type: "number" },
      },
      values: {
        type: "array",
        description: "Reflectance of each input band at the probed pixel.",
        items: { type: "number" },
      },
      normalize: {
        type: "boolean",
        description: "Evaluate the normalized expression. Default: false.",
        default: false,
      },
    },
    required: ["index", "bands", "wavelengths", "values"],
  },
};

export const TOOLS: Tool[] = [
  LIST_INDICES_TOOL,
  DESCRIBE_INDEX_TOOL,
  COMPUTE_INDICES_TOOL,
  PROBE_INDEX_TOOL,
];

function describeError(error: unknown): string {
  if (error instanceof z.ZodError) {
    return error.issues
      .map((issue) => `${issue.path.join(".") || "arguments"}: ${issue.message}`)
      .join("; ");
  }
  return error instanceof Error ? error.message : String(error);
}

function errorResult(action: string, error: unknown): CallToolResult {
  return {
    content: [{ type: "text", text: `Error ${action}: ${describeError(error)}` }],
    isError: true,
  };
}

/**
 * Human-readable summary of a computation followed by the expression list
 */
export function formatComputation(result: IndexComputation): string {
  const lines: string[] = [];
  lines.push(
    `Computed ${result.summary.computed} of ${result.requested.length} requested indices (${result.summary.skipped} skipped)`
  );
  if (result.expressions.length > 0) {
    lines.push("");
    for (const computed of result.expressions) {
      const suffix = computed.normalized ? " (normalized)" : "";
      lines.push(`- ${computed.indexName} -> ${computed.outputName}${suffix}: \`${computed.expression}\``);
    }
  }
  if (result.warnings.length > 0) {
    lines.push("");
    lines.push("Warnings:");
    lines.push(...result.warnings.map((warning) => `- ${warning}`));
  }
  return lines.join("\n");
}

export function computationMetadata(result: IndexComputation) {
  return {
    inputs: result.inputs.map((input) => ({ band: input.name, wavelength_nm: input.wavelengthNm })),
    requested: result.requested,
    expressions: result.expressions.map((computed) => ({
      index: computed.indexName,
      output: computed.outputName,
      expression: computed.expression,
      statement: `${computed.outputName} = ${computed.expression}`,
      normalized: computed.normalized,
    })),
    skipped: result.skipped.map((skip) => ({
      index: skip.indexName,
      reason: skip.reason,
      missing_roles: skip.missingRoles.map(formatRoleLabel),
    })),
    warnings: result.warnings,
    summary: result.summary,
  };
}

/**
 * Dispatch a tool call. Failures of a known tool come back as an error result;
 * an unknown tool name throws.
 */
export function handleToolCall(name: string, args: unknown): CallToolResult {
  if (name === "list_indices") {
    try {
      const { theme, detailed } = ListIndicesArgsSchema.parse(args ?? {});
      return { content: [{ type: "text", text: formatCatalogListing(theme, detailed) }] };
    } catch (error) {
      return errorResult("listing indices", error);
    }
  }

  if (name === "describe_index") {
    try {
      const { name: indexName } = DescribeIndexArgsSchema.parse(args ?? {});
      const detail = indexDetail(indexName);
      return {
        content: [
          { type: "text", text: formatIndexDetail(detail) },
          { type: "text", text: `JSON metadata:\n${JSON.stringify(detail, null, 2)}` },
        ],
      };
    } catch (error) {
      return errorResult("describing index", error);
    }
  }

  if (name === "compute_indices") {
    try {
      const parsed = ComputeIndicesArgsSchema.parse(args ?? {});
      notifyProgress(
        `Matching ${parsed.bands.length} band(s) against ${parsed.theme ? `theme '${parsed.theme}'` : "requested indices"}`
      );
      const result = computeIndices({
        bands: parsed.bands,
        wavelengths: parsed.wavelengths,
        indices: parsed.indices,
        theme: parsed.theme,
        normalize: parsed.normalize,
        outputPrefix: parsed.output_prefix,
      });
      if (result.summary.skipped > 0) {
        notifyProgress(`${result.summary.skipped} index(es) skipped for missing bands`, "warn");
      }
      return {
        content: [
          { type: "text", text: formatComputation(result) },
          {
            type: "text",
            text: `JSON metadata:\n${JSON.stringify(computationMetadata(result), null, 2)}`,
          },
        ],
      };
    } catch (error) {
      return errorResult("computing indices", error);
    }
  }

  if (name === "probe_index") {
    try {
      const parsed = ProbeIndexArgsSchema.parse(args ?? {});
      if (parsed.values.length !== parsed.bands.length) {
        throw new InvalidInputError(
          `Number of values (${parsed.values.length}) must match number of input bands (${parsed.bands.length})`
        );
      }
      const result = computeIndices({
        bands: parsed.bands,
        wavelengths: parsed.wavelengths,
        indices: [parsed.index],
        normalize: parsed.normalize,
      });
      const computed = result.expressions[0];
      if (!computed) {
        return {
          content: [
            {
              type: "text",
              text: `Cannot evaluate ${result.requested.join(", ")}:\n${result.warnings.join("\n")}`,
            },
          ],
        };
      }
      const pixel: Record<string, number> = {};
      result.inputs.forEach((input, i) => {
        pixel[input.name] = parsed.values[i];
      });
      const value = evaluateExpression(computed.expression, pixel);
      const lines = [`${computed.indexName} = ${value}`, "", `Expression: \`${computed.expression}\``];
      if (computed.warnings.length > 0) {
        lines.push("", "Warnings:", ...computed.warnings.map((warning) => `- ${warning}`));
      }
      return { content: [{ type: "text", text: lines.join("\n") }] };
    } catch (error) {
      return errorResult("probing index", error);
    }
  }

  throw new Error(`Unknown tool: ${name}`);
}

// Create and configure the MCP server
const server = new Server(
  {
    name: SERVER_NAME,
    version: SERVER_VERSION,
  },
  {
    capabilities: {
      tools: {},
      logging: {},
    },
  }
);

let _transportInstance: StdioServerTransport | null = null;
let _serverStarted = false;

function notifyProgress(message: string, level: "info" | "warn" | "error" = "info") {
  if (!_serverStarted) return;
  server
    .notification({
      method: "notifications/message",
      params: { level: level === "warn" ? "warning" : level, data: message },
    })
    .catch((error: unknown) => {
      console.error("Warn: failed to send log notification:", error);
    });
}

server.setRequestHandler(ListToolsRequestSchema, async () => {
  return { tools: TOOLS };
});

server.setRequestHandler(CallToolRequestSchema, async (request) => {
  return handleToolCall(request.params.name, request.params.arguments);
});

/**
 * Start the MCP server
 * @param transport - Optional transport instance, defaults to StdioServerTransport
 */
export async function startServer(transport?: StdioServerTransport) {
  if (_serverStarted) return;
  const t = transport ?? new StdioServerTransport();
  _transportInstance = t;
  await server.connect(t);
  _serverStarted = true;
  console.error("Spectral Indices MCP Server running on stdio");
}

/**
 * Stop the MCP server
 */
export async function stopServer() {
  if (!_serverStarted) return;
  try {
    await _transportInstance?.close();
  } finally {
    _serverStarted = false;
    _transportInstance = null;
  }
}

// Start when executed directly: src/index.ts under tsx, dist/src/index.js after
// a build, or the spectral-indices-mcp bin link
const scriptPath = process.argv[1] ?? "";
const isDirectExecution =
  scriptPath.endsWith("src/index.ts") ||
  scriptPath.endsWith("src/index.js") ||
  scriptPath.endsWith("spectral-indices-mcp");

if (isDirectExecution) {
  startServer().catch((error) => {
    console.error("Fatal error:", error);
    process.exit(1);
  });
}
