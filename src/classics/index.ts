/**
 * Classic algorithm bindings.
 */

export {
  ClassicBindingSchema,
  ClassicBindingFileSchema,
  type ClassicBinding,
  type ClassicBindingFile,
} from "./schema.js";

export {
  DEFAULT_CLASSICS_PATH,
  ClassicBindingError,
  loadClassicBindings,
  loadClassicBindingsFile,
  loadDefaultClassicBindings,
  resolveClassicBinding,
  resolveClassicBindings,
  summarizeClassic,
  type NameIndex,
  type ResolvedClassic,
  type ClassicSummary,
} from "./resolver.js";
