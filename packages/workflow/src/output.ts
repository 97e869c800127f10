import { formatRunReport, type Logger, type RunReport } from "@pequant/core";
import { type AtomicFile, writeFilesAtomic } from "@pequant/io";

export interface CommitOutputOptions {
  readonly reportPath?: string;
  readonly signal?: AbortSignal;
  readonly logger: Logger;
}

/**
 * Writes a generated file, and the run report when `reportPath` is set,
 * as one commit. The report is renamed into place first.
 */
export async function commitOutput(
  outputPath: string,
  content: string,
  report: RunReport,
  options: CommitOutputOptions,
): Promise<void> {
  const files: AtomicFile[] = [
    ...(options.reportPath !== undefined
      ? [{ path: options.reportPath, content: formatRunReport(report) }]
      : []),
    { path: outputPath, content },
  ];
  await writeFilesAtomic(files, {
    logger: options.logger,
    ...(options.signal ? { signal: options.signal } : {}),
  });
}
