import { describe, it, expect } from "vitest";
import { DEFAULT_DOCUMENT_CONFIG } from "../../config.js";
import { pageContents } from "../table-pdf.js";
import type { PageLayout, PlacedRow } from "../table-layout.js";

const PAGE_HEIGHT = 100;

function row(kind: PlacedRow["kind"], rowIndex: number, y: number): PlacedRow {
  return {
    kind,
    rowIndex,
    y,
    height: 20,
    cells: [
      { x: 10, width: 30, lines: [] },
      { x: 40, width: 30, lines: [] },
    ],
  };
}

const page: PageLayout = {
  heading: [],
  rows: [row("header", -1, 10), row("body", 0, 30), row("body", 1, 50)],
};

describe("pageContents", () => {
  it("fills the header grey and alternates body row shading", () => {
    const ops = pageContents(page, PAGE_HEIGHT, DEFAULT_DOCUMENT_CONFIG).split("\n");
    const fills = ops.filter((op) => op.endsWith(" rg"));
    expect(fills).toEqual(["0.5 0.5 0.5 rg", "0.96 0.96 0.86 rg", "1 1 1 rg"]);
    expect(ops.filter((op) => op.endsWith(" re f"))).toEqual([
      "10 70 60 20 re f",
      "10 50 60 20 re f",
      "10 30 60 20 re f",
    ]);
  });

  it("strokes every cell of every row", () => {
    const contents = pageContents(page, PAGE_HEIGHT, DEFAULT_DOCUMENT_CONFIG);
    const ops = contents.split("\n");
    expect(ops.filter((op) => op.endsWith(" re S"))).toEqual([
      "10 70 30 20 re S",
      "40 70 30 20 re S",
      "10 50 30 20 re S",
      "40 50 30 20 re S",
      "10 30 30 20 re S",
      "40 30 30 20 re S",
    ]);
    expect(ops.filter((op) => op === "0 0 0 RG")).toHaveLength(3);
    expect(ops.filter((op) => op === "1 w")).toHaveLength(3);
  });

  it("draws each row as fill, then grid, in saved graphics states", () => {
    const contents = pageContents(
      { heading: [], rows: [row("body", 0, 30)] },
      PAGE_HEIGHT,
      { ...DEFAULT_DOCUMENT_CONFIG, grid_width: 0.5 }
    );
    expect(contents).toBe(
      [
        "q",
        "0.96 0.96 0.86 rg",
        "10 50 60 20 re f",
        "Q",
        "q",
        "0 0 0 RG",
        "0.5 w",
        "10 50 30 20 re S",
        "40 50 30 20 re S",
        "Q",
      ].join("\n")
    );
  });
});
