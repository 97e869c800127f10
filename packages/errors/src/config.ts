import { PequantError } from "./base.js";
import { ERROR_CATALOG, type ErrorDomain } from "./catalog.js";

/**
 * Abstract base class for configuration errors.
 */
export abstract class ConfigError extends PequantError {}

/**
 * Thrown when the configuration file does not exist.
 */
export class ConfigFileNotFoundError extends ConfigError {
  readonly _tag = "NotFoundError" as const;
  readonly code = "CONFIG_FILE_NOT_FOUND" as const;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly fatal: boolean;
  readonly filePath: string;

  constructor(filePath: string) {
    super(`Config file not found: ${filePath}`);
    const entry = ERROR_CATALOG.CONFIG_FILE_NOT_FOUND;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.fatal = entry.fatal;
    this.filePath = filePath;
  }
}

/**
 * Thrown when the configuration file cannot be read: a directory, a
 * permission problem or binary content.
 */
export class ConfigReadError extends ConfigError {
  readonly _tag = "ExternalError" as const;
  readonly code = "CONFIG_READ_FAILED" as const;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly fatal: boolean;
  readonly filePath: string;

  constructor(filePath: string, reason: string, cause?: Error) {
    super(`Cannot read config ${filePath}: ${reason}`, undefined, cause ? { cause } : undefined);
    const entry = ERROR_CATALOG.CONFIG_READ_FAILED;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.fatal = entry.fatal;
    this.filePath = filePath;
  }
}

/**
 * Thrown when the configuration is not valid YAML.
 */
export class ConfigParseError extends ConfigError {
  readonly _tag = "ValidationError" as const;
  readonly code = "CONFIG_PARSE_FAILED" as const;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly fatal: boolean;
  readonly line?: number;
  readonly column?: number;

  constructor(message: string, line?: number, column?: number, cause?: Error) {
    const location =
      line !== undefined ? ` at line ${line}${column !== undefined ? `:${column}` : ""}` : "";
    super(`Config parse failed${location}: ${message}`, undefined, cause ? { cause } : undefined);
    const entry = ERROR_CATALOG.CONFIG_PARSE_FAILED;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.fatal = entry.fatal;
    if (line !== undefined) this.line = line;
    if (column !== undefined) this.column = column;
  }
}

/**
 * Thrown when the parsed configuration fails schema validation.
 */
export class ConfigSchemaError extends ConfigError {
  readonly _tag = "ValidationError" as const;
  readonly code = "CONFIG_VALIDATION_FAILED" as const;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly fatal: boolean;
  readonly issues: readonly string[];

  constructor(issues: readonly string[], cause?: Error) {
    super(
      `Config validation failed:\n${issues.map((i) => `  - ${i}`).join("\n")}`,
      undefined,
      cause ? { cause } : undefined,
    );
    const entry = ERROR_CATALOG.CONFIG_VALIDATION_FAILED;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.fatal = entry.fatal;
    this.issues = issues;
  }
}

/** One unset `${VAR}` reference and the line it sits on */
export interface MissingEnvVar {
  readonly name: string;
  readonly line: number;
}

/**
 * Thrown when `${VAR}` references in the configuration have no value.
 * The message names every reference with its line, and the file when
 * the text came from one.
 */
export class ConfigInterpolationError extends ConfigError {
  readonly _tag = "ValidationError" as const;
  readonly code = "CONFIG_INTERPOLATION_FAILED" as const;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly fatal: boolean;
  /** Distinct variable names, in order of first reference */
  readonly missingVars: readonly string[];
  readonly references: readonly MissingEnvVar[];
  readonly filePath?: string;

  constructor(references: readonly MissingEnvVar[], filePath?: string) {
    const where = filePath !== undefined ? ` in ${filePath}` : "";
    const listed = references.map((ref) => `${ref.name} (line ${ref.line})`).join(", ");
    super(`Missing environment variables${where}: ${listed}`);
    const entry = ERROR_CATALOG.CONFIG_INTERPOLATION_FAILED;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.fatal = entry.fatal;
    this.missingVars = [...new Set(references.map((ref) => ref.name))];
    this.references = references;
    if (filePath !== undefined) this.filePath = filePath;
  }
}
