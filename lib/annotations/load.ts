import fs from "node:fs";
import { FileNotFoundError, MalformedInputError, errorMessage } from "./errors.js";

/**
 * Read and parse a reading-app export. Throws FileNotFoundError when the
 * file can't be read and MalformedInputError when it isn't JSON.
 */
export function loadExport(filePath: string): unknown {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, "utf-8");
  } catch (err) {
    throw new FileNotFoundError(filePath, { cause: err });
  }

  // Exports saved by some editors start with a byte-order mark
  const text = raw.charCodeAt(0) === 0xfeff ? raw.slice(1) : raw;

  try {
    return JSON.parse(text) as unknown;
  } catch (err) {
    throw new MalformedInputError(filePath, errorMessage(err), { cause: err });
  }
}
