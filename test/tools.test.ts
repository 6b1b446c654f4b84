import assert from "node:assert/strict";
import { describe, it } from "node:test";

import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";

import { handleToolCall, TOOLS } from "../src/index.js";

function textOf(result: CallToolResult, position = 0): string {
  const item = result.content[position];
  assert(item !== undefined && item.type === "text");
  return item.text;
}

function metadataOf(result: CallToolResult): unknown {
  const text = textOf(result, 1);
  assert(text.startsWith("JSON metadata:\n"));
  return JSON.parse(text.slice("JSON metadata:\n".length));
}

const NDVI_EXPRESSION = "(b_nir - b_red) / (b_nir + b_red + 1e-6)";

describe("tool registry", () => {
  it("exposes the four spectral index tools", () => {
    assert.deepStrictEqual(
      TOOLS.map((tool) => tool.name),
      ["list_indices", "describe_index", "compute_indices", "probe_index"]
    );
  });

  it("throws for unknown tools", () => {
    assert.throws(() => handleToolCall("download_data", {}), /Unknown tool: download_data/);
  });
});

describe("list_indices", () => {
  it("lists a single theme", () => {
    const result = handleToolCall("list_indices", { theme: "water" });
    assert.strictEqual(result.isError, undefined);
    assert.ok(textOf(result).includes("## WATER (3)"));
  });

  it("reports an unknown theme as a tool error", () => {
    const result = handleToolCall("list_indices", { theme: "forest" });
    assert.strictEqual(result.isError, true);
    assert.ok(textOf(result).startsWith("Error listing indices: Unknown theme 'forest'."));
  });
});

describe("describe_index", () => {
  it("returns text and metadata", () => {
    const result = handleToolCall("describe_index", { name: "ndvi" });
    assert.ok(textOf(result).startsWith("# NDVI\n"));
    assert.deepStrictEqual(metadataOf(result), {
      name: "NDVI",
      description: "Normalized Difference Vegetation Index",
      theme: "vegetation",
      formula: "(nir - red) / (nir + red)",
      citation: "Rouse et al. 1974",
      roles: [
        { id: "red", centerNm: 665, toleranceNm: 20 },
        { id: "nir", centerNm: 850, toleranceNm: 20 },
      ],
      outputRange: [-1, 1],
    });
  });

  it("reports unknown indices", () => {
    const result = handleToolCall("describe_index", { name: "NOPE" });
    assert.strictEqual(result.isError, true);
    assert.strictEqual(textOf(result), "Error describing index: Unknown index 'NOPE'");
  });
});

describe("compute_indices", () => {
  it("builds the NDVI expression", () => {
    const result = handleToolCall("compute_indices", {
      bands: ["b_red", "b_nir"],
      wavelengths: [665, 850],
      indices: ["NDVI"],
    });
    assert.strictEqual(
      textOf(result),
      `Computed 1 of 1 requested indices (0 skipped)\n\n- NDVI -> NDVI: \`${NDVI_EXPRESSION}\``
    );
    assert.deepStrictEqual(metadataOf(result), {
      inputs: [
        { band: "b_red", wavelength_nm: 665 },
        { band: "b_nir", wavelength_nm: 850 },
      ],
      requested: ["NDVI"],
      expressions: [
        {
          index: "NDVI",
          output: "NDVI",
          expression: NDVI_EXPRESSION,
          statement: `NDVI = ${NDVI_EXPRESSION}`,
          normalized: false,
        },
      ],
      skipped: [],
      warnings: [],
      summary: { computed: 1, skipped: 0 },
    });
  });

  it("accepts comma-separated lists", () => {
    const result = handleToolCall("compute_indices", {
      bands: "b_red, b_nir",
      wavelengths: "665,850",
      indices: "NDVI",
      output_prefix: "field",
    });
    assert.strictEqual(
      textOf(result),
      `Computed 1 of 1 requested indices (0 skipped)\n\n- NDVI -> field_NDVI: \`${NDVI_EXPRESSION}\``
    );
  });

  it("rejects empty entries in comma-separated lists", () => {
    const result = handleToolCall("compute_indices", {
      bands: "b_red,b_nir,b_swir",
      wavelengths: "665,,850,1610",
    });
    assert.strictEqual(result.isError, true);
    assert.strictEqual(
      textOf(result),
      "Error computing indices: wavelengths: Empty entry in comma-separated list"
    );

    const trailing = handleToolCall("compute_indices", { bands: "b_red,", wavelengths: [665] });
    assert.strictEqual(trailing.isError, true);
    assert.strictEqual(
      textOf(trailing),
      "Error computing indices: bands: Empty entry in comma-separated list"
    );
  });

  it("reports skipped indices as warnings", () => {
    const result = handleToolCall("compute_indices", {
      bands: ["b1"],
      wavelengths: [480],
      indices: ["NDVI"],
    });
    assert.strictEqual(result.isError, undefined);
    assert.strictEqual(
      textOf(result),
      [
        "Computed 0 of 1 requested indices (1 skipped)",
        "",
        "Warnings:",
        "- index NDVI skipped: missing role(s) red@665±20nm, nir@850±20nm",
      ].join("\n")
    );
  });

  it("covers a whole theme", () => {
    const result = handleToolCall("compute_indices", {
      bands: ["b1"],
      wavelengths: [480],
      theme: "vegetation",
    });
    assert.ok(textOf(result).startsWith("Computed 0 of 15 requested indices (15 skipped)\n"));
  });

  it("reports malformed input as a tool error", () => {
    const mismatch = handleToolCall("compute_indices", { bands: ["b1", "b2"], wavelengths: [480] });
    assert.strictEqual(mismatch.isError, true);
    assert.strictEqual(
      textOf(mismatch),
      "Error computing indices: Number of input bands (2) must match number of wavelengths (1)"
    );

    const badWavelength = handleToolCall("compute_indices", { bands: "b1", wavelengths: "abc" });
    assert.strictEqual(badWavelength.isError, true);
    assert.strictEqual(
      textOf(badWavelength),
      "Error computing indices: Invalid wavelength NaN for band 'b1'"
    );

    const missing = handleToolCall("compute_indices", {});
    assert.strictEqual(missing.isError, true);
    assert.ok(textOf(missing).startsWith("Error computing indices: bands: "));
  });
});

describe("probe_index", () => {
  it("evaluates an index for one pixel", () => {
    const result = handleToolCall("probe_index", {
      index: "NDVI",
      bands: ["b_red", "b_nir"],
      wavelengths: [665, 850],
      values: [0.3, 0.3],
    });
    assert.strictEqual(
      textOf(result),
      ["NDVI = 0", "", `Expression: \`${NDVI_EXPRESSION}\``].join("\n")
    );
  });

  it("evaluates the normalized expression on request", () => {
    const result = handleToolCall("probe_index", {
      index: "NDVI",
      bands: ["b_red", "b_nir"],
      wavelengths: [665, 850],
      values: [0.3, 0.3],
      normalize: true,
    });
    assert.ok(textOf(result).startsWith("NDVI = 0.5\n"));
  });

  it("explains why an index cannot be evaluated", () => {
    const result = handleToolCall("probe_index", {
      index: "NDVI",
      bands: ["b1"],
      wavelengths: [480],
      values: [0.2],
    });
    assert.strictEqual(
      textOf(result),
      "Cannot evaluate NDVI:\nindex NDVI skipped: missing role(s) red@665±20nm, nir@850±20nm"
    );
  });

  it("requires one value per band", () => {
    const result = handleToolCall("probe_index", {
      index: "NDVI",
      bands: ["b_red", "b_nir"],
      wavelengths: [665, 850],
      values: [0.3],
    });
    assert.strictEqual(result.isError, true);
    assert.strictEqual(
      textOf(result),
      "Error probing index: Number of values (1) must match number of input bands (2)"
    );
  });
});
