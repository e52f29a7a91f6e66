import { z } from "zod/v4";
import { SchemaError } from "./errors.js";
import {
  readList,
  readObject,
  resolveNote,
  resolvePage,
  resolveQuote,
  resolveTitle,
} from "./fields.js";
import type { AnnotationRecord } from "./types.js";

// Only the top level is validated; documents are read through the accessors
const exportSchema = z.object({
  docs: z.array(z.unknown()),
});

export interface ExtractOptions {
  /** Skip citations that lack either a quote or a note. */
  completeOnly?: boolean;
}

export function extractAnnotations(
  root: unknown,
  options: ExtractOptions = {}
): AnnotationRecord[] {
  const parsed = exportSchema.safeParse(root);
  if (!parsed.success) {
    throw new SchemaError("expected an object with a 'docs' array");
  }

  const records: AnnotationRecord[] = [];
  for (const doc of parsed.data.docs) {
    const metadata = readObject(doc, "data");
    if (!metadata) continue;

    const bookTitle = resolveTitle(metadata);
    for (const citation of readList(doc, "citations")) {
      const record: AnnotationRecord = Object.freeze({
        bookTitle,
        page: resolvePage(citation),
        quote: resolveQuote(citation),
        note: resolveNote(citation),
      });
      if (options.completeOnly && (!record.quote || !record.note)) continue;
      records.push(record);
    }
  }
  return records;
}
