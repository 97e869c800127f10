import type { ErrorCode, ErrorJSON, PequantError } from "@pequant/errors";

export interface RunReportJSON {
  readonly issueCount: number;
  readonly counts: Readonly<Partial<Record<ErrorCode, number>>>;
  readonly issues: readonly ErrorJSON[];
}

/**
 * Accumulates the per-record problems of one run (unresolved samples,
 * ambiguous matches, invalid identifiers, unknown categories).
 *
 * A report is created by the caller and passed explicitly to every stage
 * that may add to it. Fatal errors are thrown, never recorded.
 */
export class RunReport {
  private readonly entries: PequantError[] = [];

  record(error: PequantError): void {
    if (error.fatal) {
      throw error;
    }
    this.entries.push(error);
  }

  get issues(): readonly PequantError[] {
    return this.entries;
  }

  get hasIssues(): boolean {
    return this.entries.length > 0;
  }

  /** Issues carrying the given code, in the order they were recorded */
  withCode(code: ErrorCode): readonly PequantError[] {
    return this.entries.filter((entry) => entry.code === code);
  }

  countByCode(): Readonly<Partial<Record<ErrorCode, number>>> {
    const counts: Partial<Record<ErrorCode, number>> = {};
    for (const entry of this.entries) {
      counts[entry.code] = (counts[entry.code] ?? 0) + 1;
    }
    return counts;
  }

  toJSON(): RunReportJSON {
    return {
      issueCount: this.entries.length,
      counts: this.countByCode(),
      issues: this.entries.map((entry) => entry.toJSON()),
    };
  }
}

/** The report as written to a `--report` file: indented JSON with a final newline */
export function formatRunReport(report: RunReport): string {
  return `${JSON.stringify(report.toJSON(), null, 2)}\n`;
}
