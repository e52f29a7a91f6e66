import fs from "node:fs";
import path from "node:path";
import { from, map, type Observable } from "rxjs";
import { DocumentWriteError, errorMessage } from "../annotations/errors.js";
import type { BookGroup } from "../annotations/types.js";
import { DEFAULT_DOCUMENT_CONFIG, type DocumentConfig } from "../config.js";
import { renderTablePdf } from "../pdf/table-pdf.js";
import { documentFileName, uniqueFileNames } from "./filename.js";
import { nullProgress, type Progress } from "./progress.js";

export const TABLE_HEADER = ["Page No.", "Quote", "Annotation"];

export interface DocumentOptions {
  /** Directory the PDFs are written to. Defaults to the working directory. */
  outDir?: string;
  config?: DocumentConfig;
  progress?: Progress;
}

export type DocumentOutcome =
  | { title: string; status: "written"; path: string }
  | { title: string; status: "failed"; error: DocumentWriteError };

/**
 * Write one book's annotation table. Returns the path written; any
 * failure comes back as a DocumentWriteError naming the book.
 */
export function renderBookDocument(
  group: BookGroup,
  options: DocumentOptions = {},
  fileName = documentFileName(group.title)
): string {
  const outDir = path.resolve(options.outDir ?? process.cwd());
  const filePath = path.join(outDir, fileName);
  try {
    const pdf = renderTablePdf(
      {
        title: group.title,
        header: TABLE_HEADER,
        rows: group.records.map((r) => [r.page, r.quote, r.note]),
      },
      options.config ?? DEFAULT_DOCUMENT_CONFIG
    );
    fs.mkdirSync(outDir, { recursive: true });
    fs.writeFileSync(filePath, pdf);
  } catch (err) {
    throw new DocumentWriteError(group.title, errorMessage(err), { cause: err });
  }
  return filePath;
}

/**
 * Write one PDF per book, in order. A failing book becomes a "failed"
 * outcome and the remaining books are still written. Books whose titles
 * sanitize to the same file name get numbered copies instead of
 * overwriting each other.
 */
export function renderDocuments(
  groups: readonly BookGroup[],
  options: DocumentOptions = {}
): Observable<DocumentOutcome> {
  const progress = options.progress ?? nullProgress;
  const books = groups.filter((g) => g.records.length > 0);
  const fileNames = uniqueFileNames(books.map((g) => g.title));

  return from(books).pipe(
    map((group, index): DocumentOutcome => {
      progress.emit({ type: "book-start", title: group.title, index, total: books.length });
      let outcome: DocumentOutcome;
      try {
        outcome = {
          title: group.title,
          status: "written",
          path: renderBookDocument(group, options, fileNames[index]),
        };
      } catch (err) {
        const error =
          err instanceof DocumentWriteError
            ? err
            : new DocumentWriteError(group.title, errorMessage(err), { cause: err });
        outcome = { title: group.title, status: "failed", error };
      }
      progress.emit({ type: "book-done", outcome });
      return outcome;
    })
  );
}
