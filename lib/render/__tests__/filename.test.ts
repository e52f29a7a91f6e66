import { describe, it, expect } from "vitest";
import { documentFileName, sanitizeTitle, uniqueFileNames } from "../filename.js";

describe("documentFileName", () => {
  it("replaces spaces with underscores", () => {
    expect(documentFileName("The Great Gatsby")).toBe("The_Great_Gatsby_Annotations.pdf");
  });

  it("drops punctuation outside the allow-list", () => {
    expect(documentFileName("Sci-Fi: Vol. 2!")).toBe("Sci-Fi_Vol_2_Annotations.pdf");
  });

  it("collapses whitespace runs", () => {
    expect(sanitizeTitle("A \t  B\nC")).toBe("A_B_C");
  });

  it("ignores surrounding whitespace", () => {
    expect(sanitizeTitle("  Emma  ")).toBe("Emma");
  });

  it("strips path separators and keeps accented letters", () => {
    expect(sanitizeTitle("../etc/Café")).toBe("etcCafé");
  });

  it("keeps letters and digits of other scripts", () => {
    expect(documentFileName("Война и мир")).toBe("Война_и_мир_Annotations.pdf");
    expect(documentFileName("Мать и дочь")).toBe("Мать_и_дочь_Annotations.pdf");
    expect(sanitizeTitle("三体 ２")).toBe("三体_２");
  });

  it("truncates long titles to 200 bytes", () => {
    expect(sanitizeTitle("x".repeat(250))).toHaveLength(200);
    // Two bytes per Cyrillic letter
    expect(sanitizeTitle("ж".repeat(150))).toBe("ж".repeat(100));
  });

  it("numbers later copies", () => {
    expect(documentFileName("Emma", 2)).toBe("Emma_2_Annotations.pdf");
  });

  it("falls back when nothing survives", () => {
    expect(documentFileName("???")).toBe("Untitled_Annotations.pdf");
  });
});

describe("uniqueFileNames", () => {
  it("keeps distinct names as they are", () => {
    expect(uniqueFileNames(["Война и мир", "Мать и дочь"])).toEqual([
      "Война_и_мир_Annotations.pdf",
      "Мать_и_дочь_Annotations.pdf",
    ]);
  });

  it("numbers titles that sanitize to the same name", () => {
    expect(uniqueFileNames(["Война и мир", "Война и мир!", "Война: и мир"])).toEqual([
      "Война_и_мир_Annotations.pdf",
      "Война_и_мир_2_Annotations.pdf",
      "Война_и_мир_3_Annotations.pdf",
    ]);
  });

  it("treats names differing only in case as taken", () => {
    expect(uniqueFileNames(["Emma", "emma"])).toEqual([
      "Emma_Annotations.pdf",
      "emma_2_Annotations.pdf",
    ]);
  });
});
