/**
 * Parametric variation module.
 */

export {
  expandVariations,
  expandCatalog,
  countVariations,
  VariationError,
  type Variation,
} from "./expander.js";
