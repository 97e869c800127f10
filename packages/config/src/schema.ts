/**
 * Zod schema for pequant.yaml. Every field is optional; defaults are
 * applied by `resolveConfig()`.
 */

import { OUTCOME_CATEGORIES } from "@pequant/core";
import { QUANTIFICATION_LAYOUTS } from "@pequant/io";
import { z } from "zod";

import { namedGroups, templatePlaceholders } from "./template.js";
import type { PequantConfig } from "./types.js";

const isValidRegex = (source: string): boolean => {
  try {
    new RegExp(source);
    return true;
  } catch {
    return false;
  }
};

export const RegexSourceSchema = z
  .string()
  .min(1)
  .refine(isValidRegex, { message: "Invalid regular expression" });

export const ResolverPatternSchema = z
  .object({
    match: RegexSourceSchema,
    key: z.string().min(1),
  })
  .superRefine((pattern, ctx) => {
    const groups = namedGroups(pattern.match);
    for (const name of templatePlaceholders(pattern.key)) {
      if (!groups.has(name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["key"],
          message: `Placeholder {${name}} has no named group in match`,
        });
      }
    }
  });

export const ResolverConfigSchema = z.object({
  caseSensitive: z.boolean().optional(),
  stripSuffixes: z.array(RegexSourceSchema).optional(),
  patterns: z.array(ResolverPatternSchema).optional(),
});

export const OutcomeCategorySchema = z.enum(OUTCOME_CATEGORIES);

/**
 * Labels that differ only in case must map to the same category, since
 * lookup falls back to a case-insensitive match.
 */
export const CategoryTableSchema = z
  .record(z.string().min(1), OutcomeCategorySchema)
  .superRefine((table, ctx) => {
    const folded = new Map<string, { label: string; category: string }>();
    for (const [label, category] of Object.entries(table)) {
      const key = label.toLowerCase();
      const previous = folded.get(key);
      if (previous && previous.category !== category) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [label],
          message: `Conflicts with "${previous.label}" (${previous.category}) when case is ignored`,
        });
      } else if (!previous) {
        folded.set(key, { label, category });
      }
    }
  });

const DelimiterSchema = z.string().length(1, "Delimiter must be a single character");

export const InputConfigSchema = z.object({
  layout: z.enum(QUANTIFICATION_LAYOUTS).optional(),
  designDelimiter: DelimiterSchema.optional(),
  quantificationDelimiter: DelimiterSchema.optional(),
});

export const OutputConfigSchema = z.object({
  undefinedMarker: z.string().optional(),
  fractionDigits: z.number().int().min(0).max(15).optional(),
  delimiter: DelimiterSchema.optional(),
});

export const SequenceSchema = z
  .string()
  .regex(/^[ACGTUNacgtun]+$/, "Must be a nucleotide sequence");

export const WorkflowConfigSchema = z.object({
  oligoPrefix: z.string().min(1).optional(),
  scaffold2: z.boolean().optional(),
  amplicon: SequenceSchema.optional(),
  scaffold: SequenceSchema.optional(),
});

export const PequantConfigFileSchema = z
  .object({
    resolver: ResolverConfigSchema.optional(),
    categories: CategoryTableSchema.optional(),
    extendDefaultCategories: z.boolean().optional(),
    input: InputConfigSchema.optional(),
    output: OutputConfigSchema.optional(),
    workflow: WorkflowConfigSchema.optional(),
  })
  .strict();

export type PequantConfigFile = z.infer<typeof PequantConfigFileSchema>;

/**
 * Compile-time assertion: every section of PequantConfig has a schema
 * counterpart. `extendDefaultCategories` only exists in the file form.
 */
type _FileKeys = Exclude<keyof PequantConfigFile, "extendDefaultCategories">;
type _KeyCheck = _FileKeys extends keyof PequantConfig ? true : never;
type _ReverseKeyCheck = keyof PequantConfig extends _FileKeys ? true : never;
const _assertKeys: _KeyCheck & _ReverseKeyCheck = true;
void _assertKeys;
