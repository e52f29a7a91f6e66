import type { DocumentOutcome } from "./document.js";

export type ProgressEvent =
  | { type: "book-start"; title: string; index: number; total: number }
  | { type: "book-done"; outcome: DocumentOutcome }
  | { type: "batch-complete"; written: number; failed: number };

/**
 * Progress emitter interface.
 *
 * Implementations can log to console, collect events in tests, etc.
 */
export interface Progress {
  emit(event: ProgressEvent): void;
}

/**
 * No-op progress emitter for when progress tracking isn't needed.
 */
export const nullProgress: Progress = {
  emit: () => {},
};

export interface ProgressSink {
  out(line: string): void;
  err(line: string): void;
}

/**
 * Console-based progress emitter for CLI usage.
 */
export function createConsoleProgress(
  sink: ProgressSink = {
    out: (line) => console.log(line),
    err: (line) => console.error(line),
  }
): Progress {
  return {
    emit(event) {
      switch (event.type) {
        case "book-start":
          break;
        case "book-done":
          if (event.outcome.status === "written") {
            sink.out(`Saved ${event.outcome.path}`);
          } else {
            sink.err(event.outcome.error.message);
          }
          break;
        case "batch-complete":
          if (event.failed === 0) {
            sink.out(`Generated ${event.written} PDF${event.written === 1 ? "" : "s"}.`);
          } else {
            sink.out(`Generated ${event.written} PDF${event.written === 1 ? "" : "s"}, ${event.failed} failed.`);
          }
          break;
      }
    },
  };
}
