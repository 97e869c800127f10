/**
 * Synchronous YAML configuration parser.
 * Interpolates env vars, parses YAML, validates with Zod, applies
 * defaults and deep-freezes.
 */

import { deepFreeze } from "@pequant/core";
import { ConfigParseError, ConfigSchemaError } from "@pequant/errors";
import { parse as parseYaml, YAMLParseError } from "yaml";

import { type EnvMap, interpolateEnvVars } from "./interpolation.js";
import { resolveConfig } from "./normalize.js";
import { PequantConfigFileSchema } from "./schema.js";
import type { PequantConfig } from "./types.js";

export interface ParseConfigOptions {
  readonly env?: EnvMap;
  readonly skipInterpolation?: boolean;
  /** The file the text came from, named in interpolation errors */
  readonly source?: string;
}

/**
 * Parses a YAML string into a validated, frozen PequantConfig.
 * An empty document yields the defaults.
 */
export function parseConfigYaml(yamlString: string, options?: ParseConfigOptions): PequantConfig {
  const interpolated =
    options?.skipInterpolation === true
      ? yamlString
      : interpolateEnvVars(yamlString, {
          ...(options?.env ? { env: options.env } : {}),
          ...(options?.source !== undefined ? { source: options.source } : {}),
        });

  let parsed: unknown;
  try {
    parsed = parseYaml(interpolated);
  } catch (error: unknown) {
    if (error instanceof YAMLParseError) {
      const pos = error.linePos?.[0];
      throw new ConfigParseError(error.message, pos?.line, pos?.col, error);
    }
    throw new ConfigParseError(String(error));
  }

  return validateConfig(parsed ?? {});
}

/**
 * Validates an already-parsed configuration object.
 *
 * @throws {ConfigSchemaError} listing every issue as `path: message`
 */
export function validateConfig(value: unknown): PequantConfig {
  const result = PequantConfigFileSchema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new ConfigSchemaError(issues, result.error);
  }
  return deepFreeze(resolveConfig(result.data));
}

/** The configuration used when no file is given */
export function defaultConfig(): PequantConfig {
  return validateConfig({});
}
