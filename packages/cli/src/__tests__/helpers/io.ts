import type { CliIO } from "../../cli.js";

// Strip ANSI escape codes for assertions
export function stripAnsi(str: string): string {
  // biome-ignore lint/suspicious/noControlCharactersInRegex: needed for ANSI stripping
  return str.replace(/\x1b\[[0-9;]*m/g, "");
}

export interface CapturedIO extends CliIO {
  readonly out: string[];
  readonly err: string[];
}

export function captureIO(env?: Readonly<Record<string, string | undefined>>): CapturedIO {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    stdout: (text) => out.push(stripAnsi(text)),
    stderr: (text) => err.push(stripAnsi(text)),
    ...(env ? { env } : {}),
  };
}
