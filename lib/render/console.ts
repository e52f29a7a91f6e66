import type { BookGroup } from "../annotations/types.js";

export const CONSOLE_BANNER = "Extracted Annotations (Console Output):";
export const RECORD_SEPARATOR = "-".repeat(20);
export const NO_ANNOTATIONS_MESSAGE = "No annotations found.";

/**
 * Plain-text listing of every annotation under CONSOLE_BANNER. Each record
 * is four indented lines followed by RECORD_SEPARATOR; the last record gets
 * one too.
 */
export function renderConsole(groups: readonly BookGroup[]): string {
  const lines: string[] = [];
  for (const group of groups) {
    for (const record of group.records) {
      lines.push(
        `  Book: ${record.bookTitle}`,
        `  Page: ${record.page}`,
        `  Quote: "${record.quote}"`,
        `  Annotation: "${record.note}"`,
        RECORD_SEPARATOR
      );
    }
  }
  if (lines.length === 0) return `${NO_ANNOTATIONS_MESSAGE}\n`;
  return [CONSOLE_BANNER, ...lines].join("\n") + "\n";
}
