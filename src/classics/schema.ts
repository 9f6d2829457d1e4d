/**
 * Classic algorithm bindings.
 *
 * A binding names a well-known compressor and lists, in order, the catalog
 * components that make it up:
 *
 *   { "algorithmName": "DEFLATE",
 *     "componentNames": ["LZ77 (Sliding Window)", "Canonical Huffman"] }
 *
 * Bindings are data, not code. Names are resolved against a registry at use
 * time; a name the registry does not know is skipped, not rejected.
 */

import { z } from "zod";
import { ComponentName } from "../catalog/schema.js";

export const ClassicBindingSchema = z
  .object({
    algorithmName: z.string().trim().min(1, "algorithmName must not be empty"),
    componentNames: z.array(ComponentName).min(1, "A binding must list at least one component"),
  })
  .strict();

export type ClassicBinding = z.infer<typeof ClassicBindingSchema>;

export const ClassicBindingFileSchema = z
  .object({
    bindings: z.array(ClassicBindingSchema),
  })
  .strict()
  .refine(
    (file) =>
      new Set(file.bindings.map((binding) => binding.algorithmName)).size === file.bindings.length,
    { message: "algorithmName values must be unique", path: ["bindings"] }
  );

export type ClassicBindingFile = z.infer<typeof ClassicBindingFileSchema>;
