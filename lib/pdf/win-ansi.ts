// Characters of Windows-1252 that sit outside Latin-1 (0x80-0x9F)
const WIN_ANSI_EXTRAS: Record<number, number> = {
  0x20ac: 0x80,
  0x201a: 0x82,
  0x0192: 0x83,
  0x201e: 0x84,
  0x2026: 0x85,
  0x2020: 0x86,
  0x2021: 0x87,
  0x02c6: 0x88,
  0x2030: 0x89,
  0x0160: 0x8a,
  0x2039: 0x8b,
  0x0152: 0x8c,
  0x017d: 0x8e,
  0x2018: 0x91,
  0x2019: 0x92,
  0x201c: 0x93,
  0x201d: 0x94,
  0x2022: 0x95,
  0x2013: 0x96,
  0x2014: 0x97,
  0x02dc: 0x98,
  0x2122: 0x99,
  0x0161: 0x9a,
  0x203a: 0x9b,
  0x0153: 0x9c,
  0x017e: 0x9e,
  0x0178: 0x9f,
};

export const REPLACEMENT_CHAR = "?";

/** WinAnsiEncoding byte for a code point, or undefined when it has none. */
export function winAnsiByte(codePoint: number): number | undefined {
  if (codePoint >= 0x20 && codePoint < 0x7f) return codePoint;
  if (codePoint >= 0xa0 && codePoint <= 0xff) return codePoint;
  return WIN_ANSI_EXTRAS[codePoint];
}

/**
 * Restrict text to what the standard PDF fonts can show. Newlines are
 * kept, tabs and other control characters become spaces, everything else
 * without a WinAnsi byte becomes REPLACEMENT_CHAR.
 */
export function toWinAnsiText(text: string): string {
  let out = "";
  for (const ch of text.replace(/\r\n?/g, "\n")) {
    const cp = ch.codePointAt(0) ?? 0;
    if (ch === "\n") out += ch;
    else if (cp < 0x20 || cp === 0x7f) out += " ";
    else out += winAnsiByte(cp) === undefined ? REPLACEMENT_CHAR : ch;
  }
  return out;
}

/**
 * PDF literal string for `text`, ASCII only: delimiters are escaped and
 * bytes above 0x7E are written as octal escapes.
 */
export function pdfLiteral(text: string): string {
  let out = "(";
  for (const ch of text) {
    const byte = winAnsiByte(ch.codePointAt(0) ?? 0) ?? REPLACEMENT_CHAR.charCodeAt(0);
    if (byte === 0x28 || byte === 0x29 || byte === 0x5c) {
      out += `\\${String.fromCharCode(byte)}`;
    } else if (byte > 0x7e) {
      out += `\\${byte.toString(8).padStart(3, "0")}`;
    } else {
      out += String.fromCharCode(byte);
    }
  }
  return out + ")";
}
