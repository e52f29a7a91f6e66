import { lastValueFrom, toArray } from "rxjs";
import { AnnotationExportError, errorMessage } from "../annotations/errors.js";
import { extractAnnotations } from "../annotations/extract.js";
import { groupByBook } from "../annotations/group.js";
import { loadExport } from "../annotations/load.js";
import { loadDocumentConfig } from "../config.js";
import { NO_ANNOTATIONS_MESSAGE, renderConsole } from "../render/console.js";
import { renderDocuments } from "../render/document.js";
import { createConsoleProgress } from "../render/progress.js";

export const USAGE = `Usage: annotation-export <json_path> [options]

Prints the annotations in a reading-app JSON export, or writes one PDF
table per book.

Options:
  --pdf                 Write one PDF per book instead of printing
  --out-dir <dir>       Directory for the PDFs (default: current directory)
  --config <file>       YAML file overriding the PDF layout
  --complete-only       Skip annotations without both a quote and a note
  -h, --help            Show this help`;

export interface CliIO {
  /** Raw text for standard output. */
  write(text: string): void;
  out(line: string): void;
  err(line: string): void;
}

export const consoleIO: CliIO = {
  write: (text) => process.stdout.write(text),
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

export interface ParsedArgs {
  jsonPath: string;
  pdf: boolean;
  outDir?: string;
  configPath?: string;
  completeOnly: boolean;
}

export type ParseResult =
  | { kind: "run"; args: ParsedArgs }
  | { kind: "help" }
  | { kind: "usage-error"; message: string };

export function parseArgs(argv: string[]): ParseResult {
  const positional: string[] = [];
  let pdf = false;
  let completeOnly = false;
  let outDir: string | undefined;
  let configPath: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "-h" || arg === "--help") {
      return { kind: "help" };
    } else if (arg === "--pdf") {
      pdf = true;
    } else if (arg === "--complete-only") {
      completeOnly = true;
    } else if (arg === "--out-dir" || arg === "--config") {
      const value = argv[i + 1];
      if (value === undefined || value.startsWith("--")) {
        return { kind: "usage-error", message: `Missing value for ${arg}` };
      }
      i++;
      if (arg === "--out-dir") outDir = value;
      else configPath = value;
    } else if (arg.startsWith("-") && arg !== "-") {
      return { kind: "usage-error", message: `Unknown option: ${arg}` };
    } else {
      positional.push(arg);
    }
  }

  if (positional.length === 0) {
    return { kind: "usage-error", message: "Missing <json_path>" };
  }
  if (positional.length > 1) {
    return { kind: "usage-error", message: `Unexpected argument: ${positional[1]}` };
  }
  return {
    kind: "run",
    args: { jsonPath: positional[0], pdf, outDir, configPath, completeOnly },
  };
}

/**
 * Run the exporter and return the process exit code. Failures to read or
 * understand the input are fatal; a PDF that fails to write is reported
 * and does not change the exit code.
 */
export async function runCli(argv: string[], io: CliIO = consoleIO): Promise<number> {
  const parsed = parseArgs(argv);
  if (parsed.kind === "help") {
    io.out(USAGE);
    return 0;
  }
  if (parsed.kind === "usage-error") {
    io.err(parsed.message);
    io.err(USAGE);
    return 1;
  }
  const { args } = parsed;

  try {
    const config = args.pdf ? loadDocumentConfig(args.configPath) : undefined;
    const records = extractAnnotations(loadExport(args.jsonPath), {
      completeOnly: args.completeOnly,
    });
    const groups = groupByBook(records);

    if (!args.pdf) {
      io.write(renderConsole(groups));
      return 0;
    }

    if (groups.length === 0) {
      io.out(NO_ANNOTATIONS_MESSAGE);
      return 0;
    }

    const progress = createConsoleProgress(io);
    const outcomes = await lastValueFrom(
      renderDocuments(groups, { outDir: args.outDir, config, progress }).pipe(toArray())
    );
    const failed = outcomes.filter((o) => o.status === "failed").length;
    progress.emit({ type: "batch-complete", written: outcomes.length - failed, failed });
    return 0;
  } catch (err) {
    if (err instanceof AnnotationExportError) {
      io.err(`Error: ${err.message}`);
    } else {
      io.err(`Unexpected error: ${errorMessage(err)}`);
    }
    return 1;
  }
}
