import type { AnnotationRecord, BookGroup } from "./types.js";

/**
 * Group records by book title. Books keep the order of their first
 * record; records keep their input order. Duplicates are kept.
 */
export function groupByBook(records: readonly AnnotationRecord[]): BookGroup[] {
  const byTitle = new Map<string, AnnotationRecord[]>();
  for (const record of records) {
    const existing = byTitle.get(record.bookTitle);
    if (existing) {
      existing.push(record);
    } else {
      byTitle.set(record.bookTitle, [record]);
    }
  }
  return [...byTitle].map(([title, grouped]) => ({ title, records: grouped }));
}
