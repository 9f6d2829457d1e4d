/**
 * Component schema and type definitions.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * COMPONENTS: THE ALPHABET OF THE GRAMMAR
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * A component is one compression building block: a transform, a predictor,
 * an entropy coder and so on. Each one declares:
 *
 *   1. Where it may sit in a pipeline (validStages, 0–3)
 *   2. What must come before it (prerequisites, by component name)
 *   3. What it cannot share a pipeline with (incompatibleWith, by name)
 *   4. Which parameter values it can be instantiated with (parameterRanges)
 *
 * Cost fields (timeCost, spaceCost) are informal asymptotic labels such as
 * "O(n log n)". They are annotations, never measured or computed.
 *
 * The catalog is loaded from JSON, validated once, then frozen:
 *
 *   {
 *     "catalogVersion": "1.0.0",
 *     "components": [ { "category": "transform", "name": "XOR Delta", ... } ]
 *   }
 *
 * ═══════════════════════════════════════════════════════════════════════════
 */

import { z } from "zod";
import { ComponentCategory, PipelineStage } from "./enums.js";

/**
 * A single candidate value for a component parameter.
 *
 * JSON has no infinity, so unbounded values are written as strings ("inf").
 */
export const ParameterValue = z.union([z.number(), z.string(), z.boolean()]);
export type ParameterValue = z.infer<typeof ParameterValue>;

/**
 * Parameter names keep their declared order only as non-index string keys:
 * JavaScript lists integer-like keys first, and "__proto__" does not survive
 * parsing. Both are rejected.
 */
export const ParameterName = z
  .string()
  .min(1)
  .refine((name) => !/^\d+$/.test(name) && name !== "__proto__", {
    message: 'Parameter name must not be an integer or "__proto__"',
  });

/**
 * Component names, wherever they appear, are compared after trimming.
 */
export const ComponentName = z.string().trim().min(1, "Component name must not be empty");

/**
 * Ordered candidate values per parameter.
 * Each list must hold at least one value; an empty list is a configuration
 * error reported by the loader.
 */
export const ParameterRangesSchema = z.record(ParameterName, z.array(ParameterValue));
export type ParameterRanges = z.infer<typeof ParameterRangesSchema>;

export const ComponentSchema = z
  .object({
    category: ComponentCategory,

    /**
     * Unique identifier within a catalog. Prerequisites, incompatibilities and
     * classic bindings all refer to components by this name.
     */
    name: ComponentName,

    /** Formula in LaTeX notation (documentation only) */
    formulaLatex: z.string().default(""),

    /** Plain-text formula, used when pipelines are rendered as text */
    formulaAscii: z.string().default(""),

    description: z.string().default(""),

    /** Parameter name → human-readable description */
    parameters: z.record(z.string(), z.string()).default({}),

    parameterRanges: ParameterRangesSchema.default({}),

    timeCost: z.string().min(1).default("O(n)"),

    spaceCost: z.string().min(1).default("O(n)"),

    /** Stages this component may be inserted under */
    validStages: z.array(PipelineStage).min(1, "Component must be valid in at least one stage"),

    lossless: z.boolean().default(true),

    /** Names that must already appear earlier in the pipeline */
    prerequisites: z.array(ComponentName).default([]),

    /** Names that must not already appear in the pipeline */
    incompatibleWith: z.array(ComponentName).default([]),
  })
  .strict();

export type Component = z.infer<typeof ComponentSchema>;

/**
 * Raw component shape accepted by the loader (defaults not yet applied).
 */
export type ComponentInput = z.input<typeof ComponentSchema>;

export const CatalogFileSchema = z
  .object({
    catalogVersion: z
      .string()
      .regex(/^\d+\.\d+\.\d+$/, "catalogVersion must be a semantic version"),
    components: z.array(ComponentSchema),
  })
  .strict();

export type CatalogFile = z.infer<typeof CatalogFileSchema>;
