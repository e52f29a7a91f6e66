/**
 * Default-resolving accessors for the export's loosely shaped documents.
 *
 * Every read from a document or citation goes through one of these, so
 * each default lives in exactly one place.
 */

export const UNKNOWN_TITLE = "Unknown Book";
export const MISSING_PAGE = "N/A";

export type JsonObject = Record<string, unknown>;

export function isObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Nested object under `key`, or undefined when absent or not an object. */
export function readObject(source: unknown, key: string): JsonObject | undefined {
  if (!isObject(source)) return undefined;
  const value = source[key];
  return isObject(value) ? value : undefined;
}

/** Array under `key`, or an empty array when absent or not an array. */
export function readList(source: unknown, key: string): unknown[] {
  if (!isObject(source)) return [];
  const value = source[key];
  return Array.isArray(value) ? value : [];
}

/** Display text of a scalar; undefined for null and absent values. */
export function toDisplayText(value: unknown): string | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean" || typeof value === "bigint") {
    return String(value);
  }
  return JSON.stringify(value);
}

/** Text under `key`, or `fallback` when absent, null or empty. */
export function readText(source: unknown, key: string, fallback = ""): string {
  if (!isObject(source)) return fallback;
  const text = toDisplayText(source[key]);
  return text === undefined || text === "" ? fallback : text;
}

/** `doc_title`, then `doc_file_name_title`, then the placeholder. */
export function resolveTitle(metadata: JsonObject): string {
  const title = readText(metadata, "doc_title");
  if (title.trim() !== "") return title;
  const fileTitle = readText(metadata, "doc_file_name_title");
  if (fileTitle.trim() !== "") return fileTitle;
  return UNKNOWN_TITLE;
}

export function resolvePage(citation: unknown): string {
  return readText(citation, "note_page", MISSING_PAGE);
}

export function resolveQuote(citation: unknown): string {
  return readText(citation, "note_body");
}

export function resolveNote(citation: unknown): string {
  return readText(citation, "note_extra");
}
