/**
 * Table PDF Writer
 *
 * Draws a laid-out table with mupdf: one content stream per page, the
 * standard Helvetica fonts in WinAnsiEncoding.
 */

import mupdf from "mupdf";
import { getPageSize, type DocumentConfig, type Rgb } from "../config.js";
import {
  layoutTable,
  type FontWeight,
  type MeasureText,
  type PageLayout,
  type PlacedLine,
  type TableInput,
  type TableLayoutOptions,
} from "./table-layout.js";
import { pdfLiteral, toWinAnsiText } from "./win-ansi.js";

type MupdfFont = InstanceType<typeof mupdf.Font>;

const FONT_NAMES: Record<FontWeight, string> = {
  regular: "Helvetica",
  bold: "Helvetica-Bold",
};

const FONT_RESOURCES: Record<FontWeight, string> = {
  regular: "F1",
  bold: "F2",
};

export const TABLE_COLUMN_ALIGN = ["center", "left", "left"] as const;

export function tableLayoutOptions(cfg: DocumentConfig): TableLayoutOptions {
  const [pageWidth, pageHeight] = getPageSize(cfg);
  const contentWidth = pageWidth - cfg.margin * 2;
  const ratioTotal = cfg.column_ratios.reduce((sum, r) => sum + r, 0);
  return {
    pageWidth,
    pageHeight,
    margin: cfg.margin,
    columnWidths: cfg.column_ratios.map((r) => (contentWidth * r) / ratioTotal),
    columnAlign: [...TABLE_COLUMN_ALIGN],
    fontSize: cfg.font_size,
    leading: cfg.leading,
    headingSize: cfg.heading_size,
    headingGap: cfg.heading_gap,
    cellPadding: cfg.cell_padding,
    headerPaddingBottom: cfg.header_padding_bottom,
  };
}

/**
 * Text width from the font's own glyph advances. Expects text already
 * passed through toWinAnsiText.
 */
export function createFontMeasure(fonts: Record<FontWeight, MupdfFont>): MeasureText {
  const cache: Record<FontWeight, Map<string, number>> = {
    regular: new Map(),
    bold: new Map(),
  };
  return (text, weight, size) => {
    const font = fonts[weight];
    const advances = cache[weight];
    let width = 0;
    for (const ch of text) {
      let advance = advances.get(ch);
      if (advance === undefined) {
        advance = font.advanceGlyph(font.encodeCharacter(ch.codePointAt(0) ?? 0), 0);
        advances.set(ch, advance);
      }
      width += advance;
    }
    return width * size;
  };
}

/**
 * Render a titled table to PDF bytes.
 */
export function renderTablePdf(input: TableInput, cfg: DocumentConfig): Buffer {
  const fonts: Record<FontWeight, MupdfFont> = {
    regular: new mupdf.Font(FONT_NAMES.regular),
    bold: new mupdf.Font(FONT_NAMES.bold),
  };
  const options = tableLayoutOptions(cfg);
  const pages = layoutTable(
    {
      title: toWinAnsiText(input.title),
      header: input.header.map(toWinAnsiText),
      rows: input.rows.map((row) => row.map(toWinAnsiText)),
    },
    createFontMeasure(fonts),
    options
  );

  const doc = new mupdf.PDFDocument();
  const fontDict = doc.newDictionary();
  fontDict.put(FONT_RESOURCES.regular, doc.addSimpleFont(fonts.regular, "Latin"));
  fontDict.put(FONT_RESOURCES.bold, doc.addSimpleFont(fonts.bold, "Latin"));
  const resourcesDict = doc.newDictionary();
  resourcesDict.put("Font", fontDict);
  const resources = doc.addObject(resourcesDict);

  for (const page of pages) {
    const contents = pageContents(page, options.pageHeight, cfg);
    doc.insertPage(
      -1,
      doc.addPage([0, 0, options.pageWidth, options.pageHeight], 0, resources, contents)
    );
  }
  doc.setMetaData("info:Title", input.title);

  return Buffer.from(doc.saveToBuffer("compress").asUint8Array());
}

// ============================================================================
// Content streams
// ============================================================================

/**
 * Content stream for one laid-out page: row fills first (header grey, body
 * rows alternating), then the cell grid, then the text.
 */
export function pageContents(page: PageLayout, pageHeight: number, cfg: DocumentConfig): string {
  const { colors } = cfg;
  const ops: string[] = [];
  // Layout runs top-down; PDF user space runs bottom-up
  const flip = (y: number) => pageHeight - y;

  const rect = (x: number, y: number, w: number, h: number) =>
    `${num(x)} ${num(flip(y + h))} ${num(w)} ${num(h)} re`;

  const text = (lines: PlacedLine[], weight: FontWeight, size: number, color: Rgb) => {
    if (lines.length === 0) return;
    ops.push("BT", `${rgb(color)} rg`, `/${FONT_RESOURCES[weight]} ${num(size)} Tf`);
    for (const line of lines) {
      if (!line.text) continue;
      ops.push(`1 0 0 1 ${num(line.x)} ${num(flip(line.baseline))} Tm`, `${pdfLiteral(line.text)} Tj`);
    }
    ops.push("ET");
  };

  text(page.heading, "bold", cfg.heading_size, colors.text);

  for (const row of page.rows) {
    const background =
      row.kind === "header"
        ? colors.header_background
        : row.rowIndex % 2 === 0
          ? colors.row_background
          : colors.row_alternate_background;
    const left = row.cells[0]?.x ?? 0;
    const width = row.cells.reduce((sum, cell) => sum + cell.width, 0);
    ops.push("q", `${rgb(background)} rg`, `${rect(left, row.y, width, row.height)} f`, "Q");

    ops.push("q", `${rgb(colors.grid)} RG`, `${num(cfg.grid_width)} w`);
    for (const cell of row.cells) {
      ops.push(`${rect(cell.x, row.y, cell.width, row.height)} S`);
    }
    ops.push("Q");

    const weight: FontWeight = row.kind === "header" ? "bold" : "regular";
    const color = row.kind === "header" ? colors.header_text : colors.text;
    text(
      row.cells.flatMap((cell) => cell.lines),
      weight,
      cfg.font_size,
      color
    );
  }

  return ops.join("\n");
}

function num(n: number): string {
  return Number(n.toFixed(2)).toString();
}

function rgb(color: Rgb): string {
  return color.map(num).join(" ");
}
