export const DOCUMENT_SUFFIX = "_Annotations";
export const DOCUMENT_EXTENSION = ".pdf";

// Bytes, leaving room for the suffix within the usual 255-byte name limit
const MAX_STEM_BYTES = 200;

/**
 * Filesystem-safe stem for a book title: whitespace runs become `_`,
 * anything outside letters and digits of any script, `_` and `-` is
 * dropped.
 */
export function sanitizeTitle(title: string): string {
  const stem = title
    .trim()
    .replace(/\s+/g, "_")
    .replace(/[^\p{L}\p{M}\p{N}_-]/gu, "");
  let truncated = "";
  for (const ch of stem) {
    if (Buffer.byteLength(truncated + ch, "utf-8") > MAX_STEM_BYTES) break;
    truncated += ch;
  }
  return truncated || "Untitled";
}

/** `<Stem>_Annotations.pdf`, or `<Stem>_<copy>_Annotations.pdf` past the first copy. */
export function documentFileName(title: string, copy = 1): string {
  const stem = copy > 1 ? `${sanitizeTitle(title)}_${copy}` : sanitizeTitle(title);
  return `${stem}${DOCUMENT_SUFFIX}${DOCUMENT_EXTENSION}`;
}

/**
 * One file name per title, in order. Titles that sanitize to a name
 * already taken (compared case-insensitively) get the next free copy number.
 */
export function uniqueFileNames(titles: readonly string[]): string[] {
  const taken = new Set<string>();
  return titles.map((title) => {
    let copy = 1;
    let name = documentFileName(title);
    while (taken.has(name.toLowerCase())) {
      name = documentFileName(title, ++copy);
    }
    taken.add(name.toLowerCase());
    return name;
  });
}
