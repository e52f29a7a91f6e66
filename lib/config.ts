import fs from "node:fs";
import yaml from "js-yaml";
import { z } from "zod/v4";
import { ConfigError, errorMessage } from "./annotations/errors.js";

const rgbSchema = z.tuple([
  z.number().min(0).max(1),
  z.number().min(0).max(1),
  z.number().min(0).max(1),
]);

const documentConfigSchema = z.object({
  page_size: z.enum(["letter", "a4"]),
  margin: z.number().min(0),
  font_size: z.number().positive(),
  leading: z.number().positive(),
  heading_size: z.number().positive(),
  heading_gap: z.number().min(0),
  cell_padding: z.number().min(0),
  header_padding_bottom: z.number().min(0),
  grid_width: z.number().positive(),
  column_ratios: z.tuple([
    z.number().positive(),
    z.number().positive(),
    z.number().positive(),
  ]),
  colors: z.object({
    text: rgbSchema,
    header_background: rgbSchema,
    header_text: rgbSchema,
    row_background: rgbSchema,
    row_alternate_background: rgbSchema,
    grid: rgbSchema,
  }),
});

export type DocumentConfig = z.infer<typeof documentConfigSchema>;
export type Rgb = DocumentConfig["colors"]["text"];

export const PAGE_SIZES: Record<DocumentConfig["page_size"], [number, number]> = {
  letter: [612, 792],
  a4: [595.28, 841.89],
};

export const DEFAULT_DOCUMENT_CONFIG: DocumentConfig = {
  page_size: "letter",
  margin: 72,
  font_size: 10,
  leading: 12,
  heading_size: 18,
  heading_gap: 18,
  cell_padding: 6,
  header_padding_bottom: 12,
  grid_width: 1,
  column_ratios: [1, 3, 3],
  colors: {
    text: [0, 0, 0],
    header_background: [0.5, 0.5, 0.5],
    header_text: [0.96, 0.96, 0.96],
    row_background: [0.96, 0.96, 0.86],
    row_alternate_background: [1, 1, 1],
    grid: [0, 0, 0],
  },
};

/**
 * Deep-merge two plain objects. Plain objects recurse;
 * arrays and primitives: override wins.
 */
export function deepMerge<T extends Record<string, unknown>>(
  base: T,
  overrides: Record<string, unknown>
): T {
  const result: Record<string, unknown> = { ...base };
  for (const key of Object.keys(overrides)) {
    const baseVal = result[key];
    const overVal = overrides[key];
    if (isPlainObject(baseVal) && isPlainObject(overVal)) {
      result[key] = deepMerge(baseVal, overVal);
    } else {
      result[key] = overVal;
    }
  }
  return result as T;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Document layout settings: the defaults, with the YAML file at
 * `configPath` merged over them when one is given.
 */
export function loadDocumentConfig(configPath?: string): DocumentConfig {
  if (!configPath) return DEFAULT_DOCUMENT_CONFIG;

  let overrides: unknown;
  try {
    overrides = yaml.load(fs.readFileSync(configPath, "utf-8"));
  } catch (err) {
    throw new ConfigError(configPath, errorMessage(err), { cause: err });
  }
  // An empty file loads as undefined
  if (overrides === undefined || overrides === null) return DEFAULT_DOCUMENT_CONFIG;
  if (!isPlainObject(overrides)) {
    throw new ConfigError(configPath, "expected a mapping at the top level");
  }

  const result = documentConfigSchema.safeParse(
    deepMerge(DEFAULT_DOCUMENT_CONFIG, overrides)
  );
  if (!result.success) {
    throw new ConfigError(configPath, z.prettifyError(result.error), {
      cause: result.error,
    });
  }
  return result.data;
}

export function getPageSize(cfg: DocumentConfig): [number, number] {
  return PAGE_SIZES[cfg.page_size];
}
