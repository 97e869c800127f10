import { DEFAULT_CATEGORY_TABLE, DEFAULT_RESOLVER_RULES, DEFAULT_UNDEFINED_MARKER } from "./defaults.js";
import type { PequantConfigFile } from "./schema.js";
import type { CategoryTable, PequantConfig } from "./types.js";

/**
 * Applies defaults to a validated configuration file.
 *
 * A `categories` table replaces the default table unless
 * `extendDefaultCategories` is set, in which case it is merged over it.
 */
export function resolveConfig(file: PequantConfigFile): PequantConfig {
  const resolver = file.resolver ?? {};
  const input = file.input ?? {};
  const output = file.output ?? {};
  const workflow = file.workflow ?? {};

  return {
    resolver: {
      caseSensitive: resolver.caseSensitive ?? DEFAULT_RESOLVER_RULES.caseSensitive,
      stripSuffixes: resolver.stripSuffixes ?? DEFAULT_RESOLVER_RULES.stripSuffixes,
      patterns: (resolver.patterns ?? []).map(({ match, key }) => ({ match, key })),
    },
    categories: resolveCategories(file),
    input: {
      layout: input.layout ?? "wide",
      ...(input.designDelimiter !== undefined ? { designDelimiter: input.designDelimiter } : {}),
      ...(input.quantificationDelimiter !== undefined
        ? { quantificationDelimiter: input.quantificationDelimiter }
        : {}),
    },
    output: {
      undefinedMarker: output.undefinedMarker ?? DEFAULT_UNDEFINED_MARKER,
      delimiter: output.delimiter ?? "\t",
      ...(output.fractionDigits !== undefined ? { fractionDigits: output.fractionDigits } : {}),
    },
    workflow: {
      scaffold2: workflow.scaffold2 ?? false,
      ...(workflow.oligoPrefix !== undefined ? { oligoPrefix: workflow.oligoPrefix } : {}),
      ...(workflow.amplicon !== undefined ? { amplicon: workflow.amplicon } : {}),
      ...(workflow.scaffold !== undefined ? { scaffold: workflow.scaffold } : {}),
    },
  };
}

function resolveCategories(file: PequantConfigFile): CategoryTable {
  if (file.categories === undefined) {
    return { ...DEFAULT_CATEGORY_TABLE };
  }
  return file.extendDefaultCategories === true
    ? { ...DEFAULT_CATEGORY_TABLE, ...file.categories }
    : { ...file.categories };
}
