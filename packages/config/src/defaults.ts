import type { CategoryTable, ResolverRules } from "./types.js";

/**
 * Replicate (`_rep2`, `_Rep2`) and plate-well (`_A1` … `_H12`, `_B07`)
 * suffixes.
 */
export const DEFAULT_STRIP_SUFFIXES: readonly string[] = [
  "_[Rr][Ee][Pp]\\d+",
  "_[A-Ha-h](?:1[0-2]|0?[1-9])",
];

export const DEFAULT_RESOLVER_RULES: ResolverRules = {
  caseSensitive: false,
  stripSuffixes: DEFAULT_STRIP_SUFFIXES,
  patterns: [],
};

/**
 * Canonical category names, their short aliases, and the
 * `<Amplicon>:<column>` labels of the amplicon layout.
 */
export const DEFAULT_CATEGORY_TABLE: CategoryTable = {
  intended_edit: "intended_edit",
  intended: "intended_edit",
  unintended_edit: "unintended_edit",
  unintended: "unintended_edit",
  indel: "indel",
  unmodified: "unmodified",
  unclassified: "unclassified",

  "Prime-edited:Unmodified": "intended_edit",
  "Prime-edited:Modified": "unintended_edit",
  "Prime-edited:Discarded": "unclassified",
  // Every read on the scaffold-incorporated amplicon is an unintended edit,
  // with or without further changes.
  "Scaffold-incorporated:Unmodified": "unintended_edit",
  "Scaffold-incorporated:Modified": "unintended_edit",
  "Scaffold-incorporated:Discarded": "unclassified",
  "Reference:Unmodified": "unmodified",
  "Reference:Modified": "indel",
  "Reference:Discarded": "unclassified",
};

export const DEFAULT_UNDEFINED_MARKER = "NA";
