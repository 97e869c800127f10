import pc from "picocolors";

import type { CommandOutcome, OutcomeReporter } from "./types.js";

const RULE = "─".repeat(50);

/**
 * Human-readable summary of a command run.
 */
export class TerminalReporter implements OutcomeReporter {
  readonly name = "terminal";

  report(outcome: CommandOutcome): string {
    const lines: string[] = [];

    lines.push("");
    lines.push(pc.bold(`pequant ${outcome.command}`));
    lines.push(RULE);
    lines.push(`  ${pc.green("✓")} Wrote ${outcome.written} ${outcome.unit} to ${outcome.outputPath}`);
    if (outcome.reportPath !== undefined) {
      lines.push(`  ${pc.dim(`Report: ${outcome.reportPath}`)}`);
    }

    const { issues } = outcome.report;
    if (issues.length > 0) {
      lines.push("");
      for (const issue of issues) {
        lines.push(`  ${pc.yellow("!")} ${pc.yellow(`[${issue.code}]`)} ${issue.message}`);
      }
    }

    lines.push(RULE);
    if (issues.length === 0) {
      lines.push(`  ${pc.green(pc.bold("No issues"))}`);
    } else {
      const counts = Object.entries(outcome.report.countByCode())
        .map(([code, count]) => `${count} ${code}`)
        .join(", ");
      lines.push(`  ${pc.bold("Issues:")} ${counts}`);
    }
    lines.push("");

    return lines.join("\n");
  }
}
