import type { RunReport } from "@pequant/core";

export type CommandName = "quantify" | "run-sheet" | "oligo-order";

/** What a finished command wrote and what it left out */
export interface CommandOutcome {
  readonly command: CommandName;
  readonly outputPath: string;
  /** Rows or oligos written */
  readonly written: number;
  /** Plural noun for `written`, e.g. "summary rows" */
  readonly unit: string;
  readonly reportPath?: string;
  readonly report: RunReport;
}

export interface OutcomeReporter {
  readonly name: string;
  report(outcome: CommandOutcome): string;
}
