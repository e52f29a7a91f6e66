import { describe, it, expect } from "vitest";
import { createConsoleProgress } from "../progress.js";
import { DocumentWriteError } from "../../annotations/errors.js";

function capture() {
  const out: string[] = [];
  const err: string[] = [];
  const progress = createConsoleProgress({
    out: (line) => out.push(line),
    err: (line) => err.push(line),
  });
  return { out, err, progress };
}

describe("createConsoleProgress", () => {
  it("prints written files to out and failures to err", () => {
    const { out, err, progress } = capture();
    progress.emit({ type: "book-start", title: "A", index: 0, total: 2 });
    progress.emit({
      type: "book-done",
      outcome: { title: "A", status: "written", path: "/tmp/A_Annotations.pdf" },
    });
    progress.emit({
      type: "book-done",
      outcome: { title: "B", status: "failed", error: new DocumentWriteError("B", "disk full") },
    });

    expect(out).toEqual(["Saved /tmp/A_Annotations.pdf"]);
    expect(err).toEqual(['Failed to generate PDF for "B": disk full']);
  });

  it("summarizes the batch", () => {
    const { out, progress } = capture();
    progress.emit({ type: "batch-complete", written: 1, failed: 0 });
    progress.emit({ type: "batch-complete", written: 2, failed: 1 });
    expect(out).toEqual(["Generated 1 PDF.", "Generated 2 PDFs, 1 failed."]);
  });
});
