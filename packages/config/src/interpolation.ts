/**
 * `${VAR}` and `${VAR:default}` substitution in configuration text,
 * applied line by line before the YAML is parsed.
 *
 * Lines whose first non-blank character is `#` are YAML comments and
 * are copied unchanged, so a commented-out reference never needs a
 * value. A substituted value is inserted as-is; it is not scanned again.
 */

import { ConfigInterpolationError, type MissingEnvVar } from "@pequant/errors";

const REFERENCE = /\$\{([^}:]+?)(?::([^}]*))?\}/g;
const COMMENT_LINE = /^\s*#/;

export type EnvMap = Readonly<Record<string, string | undefined>>;

export interface InterpolateOptions {
  /** Default: `process.env` */
  readonly env?: EnvMap;
  /** Named in the error when a variable is missing */
  readonly source?: string;
}

/**
 * Substitutes every reference. An empty string counts as set; a
 * reference without a default whose variable is unset is an error.
 *
 * @throws {ConfigInterpolationError} naming each unset variable and its line
 */
export function interpolateEnvVars(text: string, options?: InterpolateOptions): string {
  const env = options?.env ?? process.env;
  const missing: MissingEnvVar[] = [];

  const lines = text.split("\n").map((content, index) => {
    if (COMMENT_LINE.test(content)) return content;
    return content.replace(REFERENCE, (_match, name: string, fallback?: string) => {
      const value = env[name] ?? fallback;
      if (value === undefined) {
        missing.push({ name, line: index + 1 });
        return "";
      }
      return value;
    });
  });

  if (missing.length > 0) {
    throw new ConfigInterpolationError(missing, options?.source);
  }
  return lines.join("\n");
}
