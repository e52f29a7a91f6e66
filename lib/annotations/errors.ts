export type AnnotationErrorCode =
  | "FileNotFound"
  | "MalformedInput"
  | "SchemaError"
  | "ConfigError"
  | "DocumentWriteError";

/**
 * Base class for every failure the exporter reports to the user.
 *
 * `message` is meant to be printed as is; `cause` keeps the underlying
 * error for debugging.
 */
export class AnnotationExportError extends Error {
  constructor(
    public readonly code: AnnotationErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "AnnotationExportError";
  }
}

export class FileNotFoundError extends AnnotationExportError {
  constructor(public readonly filePath: string, options?: { cause?: unknown }) {
    super("FileNotFound", `File not found or not readable: ${filePath}`, options);
    this.name = "FileNotFoundError";
  }
}

export class MalformedInputError extends AnnotationExportError {
  constructor(
    public readonly filePath: string,
    detail: string,
    options?: { cause?: unknown }
  ) {
    super("MalformedInput", `Could not parse JSON from ${filePath}: ${detail}`, options);
    this.name = "MalformedInputError";
  }
}

export class SchemaError extends AnnotationExportError {
  constructor(detail: string) {
    super("SchemaError", `Unexpected export structure: ${detail}`);
    this.name = "SchemaError";
  }
}

export class ConfigError extends AnnotationExportError {
  constructor(
    public readonly configPath: string,
    detail: string,
    options?: { cause?: unknown }
  ) {
    super("ConfigError", `Invalid config ${configPath}: ${detail}`, options);
    this.name = "ConfigError";
  }
}

export class DocumentWriteError extends AnnotationExportError {
  constructor(
    public readonly bookTitle: string,
    detail: string,
    options?: { cause?: unknown }
  ) {
    super("DocumentWriteError", `Failed to generate PDF for "${bookTitle}": ${detail}`, options);
    this.name = "DocumentWriteError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
