import { describe, it, expect } from "vitest";
import {
  CONSOLE_BANNER,
  NO_ANNOTATIONS_MESSAGE,
  RECORD_SEPARATOR,
  renderConsole,
} from "../console.js";
import type { BookGroup } from "../../annotations/types.js";

const groups: BookGroup[] = [
  {
    title: "Dune",
    records: [
      { bookTitle: "Dune", page: "12", quote: "Fear is the mind-killer.", note: "Mantra" },
      { bookTitle: "Dune", page: "N/A", quote: "", note: "" },
    ],
  },
  {
    title: "Emma",
    records: [{ bookTitle: "Emma", page: "3", quote: "q", note: "n" }],
  },
];

describe("renderConsole", () => {
  it("prints a banner, then four lines and a separator per record", () => {
    expect(renderConsole(groups)).toBe(
      [
        "Extracted Annotations (Console Output):",
        "  Book: Dune",
        "  Page: 12",
        '  Quote: "Fear is the mind-killer."',
        '  Annotation: "Mantra"',
        "--------------------",
        "  Book: Dune",
        "  Page: N/A",
        '  Quote: ""',
        '  Annotation: ""',
        "--------------------",
        "  Book: Emma",
        "  Page: 3",
        '  Quote: "q"',
        '  Annotation: "n"',
        "--------------------",
        "",
      ].join("\n")
    );
  });

  it("ends with the separator after the final record", () => {
    const lines = renderConsole(groups).trimEnd().split("\n");
    expect(lines[lines.length - 1]).toBe(RECORD_SEPARATOR);
    expect(lines.filter((l) => l === RECORD_SEPARATOR)).toHaveLength(3);
  });

  it("prints the banner once, as the first line", () => {
    const lines = renderConsole(groups).split("\n");
    expect(lines[0]).toBe(CONSOLE_BANNER);
    expect(lines.filter((l) => l === CONSOLE_BANNER)).toHaveLength(1);
  });

  it("prints a single message when there is nothing to show", () => {
    expect(renderConsole([])).toBe(`${NO_ANNOTATIONS_MESSAGE}\n`);
    expect(NO_ANNOTATIONS_MESSAGE).toBe("No annotations found.");
  });
});
