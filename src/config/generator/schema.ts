/**
 * Generator configuration schema.
 *
 * Controls how a generation run enumerates pipelines and which CSV outputs
 * it writes. Every field has a default, so `{}` is a valid configuration.
 */

import { z } from "zod";

export const EnumerationConfigSchema = z
  .object({
    /** Shortest pipeline emitted */
    minDepth: z.number().int().min(1).default(2),

    /** Longest pipeline explored; search cost grows steeply with this */
    maxDepth: z.number().int().min(1).max(12).default(4),

    /** Emit only pipelines ending in an entropy coder */
    requireTerminalCategory: z.boolean().default(true),
  })
  .strict();

export type EnumerationConfig = z.infer<typeof EnumerationConfigSchema>;

export const ExportConfigSchema = z
  .object({
    /** One component row per parameter variation instead of per component */
    includeVariations: z.boolean().default(true),

    /** Write pipeline_combinations.csv */
    includePipelines: z.boolean().default(true),

    /** Write classic_algorithms.csv */
    includeClassics: z.boolean().default(true),
  })
  .strict();

export type ExportConfig = z.infer<typeof ExportConfigSchema>;

export const GeneratorConfigSchema = z
  .object({
    enumeration: EnumerationConfigSchema.default({}),
    export: ExportConfigSchema.default({}),
  })
  .strict()
  .superRefine((config, ctx) => {
    if (config.enumeration.minDepth > config.enumeration.maxDepth) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["enumeration", "minDepth"],
        message: `minDepth (${config.enumeration.minDepth}) must not exceed maxDepth (${config.enumeration.maxDepth})`,
      });
    }
  });

export type GeneratorConfig = z.infer<typeof GeneratorConfigSchema>;

/**
 * Partial configuration accepted by the loader (defaults not yet applied).
 */
export type GeneratorConfigInput = z.input<typeof GeneratorConfigSchema>;
