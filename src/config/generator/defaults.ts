/**
 * Default generator configuration.
 *
 * maxDepth is 4 here: the enumerator itself allows 6, but at 6 the bundled
 * catalog yields far more pipelines than a CSV export is useful for.
 */

import type { GeneratorConfig } from "./schema.js";

export const DEFAULT_GENERATOR_CONFIG: GeneratorConfig = {
  enumeration: {
    minDepth: 2,
    maxDepth: 4,
    requireTerminalCategory: true,
  },

  export: {
    includeVariations: true,
    includePipelines: true,
    includeClassics: true,
  },
};
