import type { StageError } from "@importline/core";
import type { ImportCounters } from "./events";

export interface ImportSummary {
  runId: string;
  importedCount: number;
  counters: ImportCounters;
  errors: StageError[];
  message: string;
}

export interface ImportObserver {
  onProgress?(progress: number): void;
  onFinished?(summary: ImportSummary): void;
  /** Only called when the run produced at least one error. */
  onErrors?(errors: readonly StageError[]): void;
  onSummary?(message: string, importedCount: number): void;
}

export function formatSummary(importedCount: number): string {
  if (importedCount === 0) return "No new items found";
  if (importedCount === 1) return "1 item imported";
  return `${importedCount} items imported`;
}
