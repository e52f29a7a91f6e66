/**
 * Table Layout
 *
 * Wraps cell text and paginates a titled table. Pure geometry: all
 * coordinates are in points measured from the top-left corner of the page,
 * and text widths come from the caller's MeasureText.
 */

// ============================================================================
// Types
// ============================================================================

export type FontWeight = "regular" | "bold";
export type Align = "left" | "center";

/** Width in points of `text` set in the given weight and size. */
export type MeasureText = (text: string, weight: FontWeight, size: number) => number;

export interface TableLayoutOptions {
  pageWidth: number;
  pageHeight: number;
  margin: number;
  columnWidths: number[];
  columnAlign: Align[];
  fontSize: number;
  leading: number;
  headingSize: number;
  headingGap: number;
  cellPadding: number;
  headerPaddingBottom: number;
}

export interface TableInput {
  title: string;
  header: string[];
  rows: string[][];
}

export interface PlacedLine {
  text: string;
  x: number;
  baseline: number;
}

export interface PlacedCell {
  x: number;
  width: number;
  lines: PlacedLine[];
}

export interface PlacedRow {
  kind: "header" | "body";
  /** Position among body rows, used for alternating shading. -1 for the header. */
  rowIndex: number;
  y: number;
  height: number;
  cells: PlacedCell[];
}

export interface PageLayout {
  heading: PlacedLine[];
  rows: PlacedRow[];
}

// ============================================================================
// Wrapping
// ============================================================================

/**
 * Greedy word wrap. Explicit newlines start a new line; words wider than
 * `maxWidth` are broken between characters. Always returns at least one line.
 */
export function wrapText(
  text: string,
  maxWidth: number,
  measure: (text: string) => number
): string[] {
  const lines: string[] = [];

  for (const paragraph of text.split(/\r\n|\r|\n/)) {
    const words = paragraph.split(/\s+/).filter(Boolean);
    if (words.length === 0) {
      lines.push("");
      continue;
    }

    let line = "";
    for (const word of words) {
      const candidate = line ? `${line} ${word}` : word;
      if (measure(candidate) <= maxWidth) {
        line = candidate;
        continue;
      }
      if (line) lines.push(line);
      line = "";
      if (measure(word) <= maxWidth) {
        line = word;
        continue;
      }
      for (const ch of word) {
        if (line && measure(line + ch) > maxWidth) {
          lines.push(line);
          line = ch;
        } else {
          line += ch;
        }
      }
    }
    lines.push(line);
  }

  return lines.length > 0 ? lines : [""];
}

// ============================================================================
// Pagination
// ============================================================================

interface PendingRow {
  kind: PlacedRow["kind"];
  rowIndex: number;
  cellLines: string[][];
}

export function layoutTable(
  input: TableInput,
  measure: MeasureText,
  options: TableLayoutOptions
): PageLayout[] {
  const {
    pageWidth,
    pageHeight,
    margin,
    columnWidths,
    columnAlign,
    fontSize,
    leading,
    headingSize,
    headingGap,
    cellPadding,
    headerPaddingBottom,
  } = options;

  const contentWidth = pageWidth - margin * 2;
  const bottom = pageHeight - margin;
  const padTop = cellPadding / 2;
  const padBottom = cellPadding / 2;
  const innerWidths = columnWidths.map((w) => Math.max(w - cellPadding * 2, 1));

  const wrapCells = (cells: string[], weight: FontWeight): string[][] =>
    cells.map((cell, i) =>
      wrapText(cell, innerWidths[i], (t) => measure(t, weight, fontSize))
    );

  const header: PendingRow = {
    kind: "header",
    rowIndex: -1,
    cellLines: wrapCells(input.header, "bold"),
  };

  const pages: PageLayout[] = [];
  let page: PageLayout = { heading: [], rows: [] };
  let y = margin;
  let bodyRowsOnPage = 0;

  const rowHeight = (row: PendingRow, lineCount: number) =>
    padTop +
    lineCount * leading +
    (row.kind === "header" ? headerPaddingBottom : padBottom);

  const place = (row: PendingRow, lineCount: number) => {
    const height = rowHeight(row, lineCount);
    const weight: FontWeight = row.kind === "header" ? "bold" : "regular";
    let x = margin;
    const cells: PlacedCell[] = row.cellLines.map((lines, i) => {
      const width = columnWidths[i];
      const cell: PlacedCell = {
        x,
        width,
        lines: lines.slice(0, lineCount).map((text, lineIndex) => {
          const textWidth = measure(text, weight, fontSize);
          const left =
            columnAlign[i] === "center"
              ? x + (width - textWidth) / 2
              : x + cellPadding;
          return {
            text,
            x: left,
            baseline: y + padTop + lineIndex * leading + fontSize,
          };
        }),
      };
      x += width;
      return cell;
    });
    page.rows.push({ kind: row.kind, rowIndex: row.rowIndex, y, height, cells });
    y += height;
  };

  const startPage = (withHeading: boolean) => {
    page = { heading: [], rows: [] };
    pages.push(page);
    y = margin;
    bodyRowsOnPage = 0;
    if (withHeading) {
      const headingLeading = headingSize * 1.2;
      for (const text of wrapText(input.title, contentWidth, (t) =>
        measure(t, "bold", headingSize)
      )) {
        const width = measure(text, "bold", headingSize);
        page.heading.push({
          text,
          x: margin + (contentWidth - width) / 2,
          baseline: y + headingSize,
        });
        y += headingLeading;
      }
      y += headingGap;
    }
    place(header, lineCountOf(header));
  };

  startPage(true);

  input.rows.forEach((cells, rowIndex) => {
    let pending: PendingRow = {
      kind: "body",
      rowIndex,
      cellLines: wrapCells(cells, "regular"),
    };

    for (;;) {
      const lineCount = lineCountOf(pending);
      if (y + rowHeight(pending, lineCount) <= bottom) {
        place(pending, lineCount);
        bodyRowsOnPage++;
        return;
      }
      if (bodyRowsOnPage > 0) {
        startPage(false);
        continue;
      }
      // Taller than a whole page: fill this one and carry the rest over
      const fits = Math.max(
        1,
        Math.floor((bottom - y - padTop - padBottom) / leading)
      );
      place(pending, fits);
      pending = {
        ...pending,
        cellLines: pending.cellLines.map((lines) => lines.slice(fits)),
      };
      if (pending.cellLines.every((lines) => lines.length === 0)) return;
      startPage(false);
    }
  });

  return pages;
}

function lineCountOf(row: PendingRow): number {
  return Math.max(1, ...row.cellLines.map((lines) => lines.length));
}
