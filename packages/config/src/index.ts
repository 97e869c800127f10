/**
 * @pequant/config
 *
 * Loads `pequant.yaml`: `${VAR}` interpolation, YAML parsing, Zod
 * validation and defaults.
 */

export {
  DEFAULT_CATEGORY_TABLE,
  DEFAULT_RESOLVER_RULES,
  DEFAULT_STRIP_SUFFIXES,
  DEFAULT_UNDEFINED_MARKER,
} from "./defaults.js";
export { type EnvMap, type InterpolateOptions, interpolateEnvVars } from "./interpolation.js";
export { type LoadConfigOptions, loadConfig } from "./loader.js";
export { resolveConfig } from "./normalize.js";
export { defaultConfig, type ParseConfigOptions, parseConfigYaml, validateConfig } from "./parser.js";
export {
  CategoryTableSchema,
  type PequantConfigFile,
  PequantConfigFileSchema,
  ResolverConfigSchema,
  ResolverPatternSchema,
} from "./schema.js";
export { fillTemplate, namedGroups, templatePlaceholders } from "./template.js";
export type {
  CategoryTable,
  InputConfig,
  OutputConfig,
  PequantConfig,
  ResolverPattern,
  ResolverRules,
  WorkflowConfig,
} from "./types.js";

export const PACKAGE_NAME = "@pequant/config" as const;
