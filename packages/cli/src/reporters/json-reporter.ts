import type { CommandOutcome, OutcomeReporter } from "./types.js";

/**
 * Renders the outcome, run report included, as formatted JSON.
 */
export class JsonReporter implements OutcomeReporter {
  readonly name = "json";

  report(outcome: CommandOutcome): string {
    return JSON.stringify(
      {
        command: outcome.command,
        outputPath: outcome.outputPath,
        written: outcome.written,
        ...(outcome.reportPath !== undefined ? { reportPath: outcome.reportPath } : {}),
        report: outcome.report.toJSON(),
      },
      null,
      2,
    );
  }
}
