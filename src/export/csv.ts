/**
 * CSV export.
 *
 * Rows are pulled from the builders in rows.ts and streamed through
 * csv-stringify into the file, so pipeline output is never held in memory.
 */

import { createWriteStream } from "node:fs";
import { mkdir } from "node:fs/promises";
import { join } from "node:path";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { stringify } from "csv-stringify";
import type { ComponentRegistry } from "../catalog/registry.js";
import type { ClassicBinding } from "../classics/schema.js";
import { resolveClassicBindings } from "../classics/resolver.js";
import type { GeneratorConfig } from "../config/generator/schema.js";
import { enumeratePipelines } from "../grammar/enumerator.js";
import {
  CLASSIC_COLUMNS,
  COMPONENT_COLUMNS,
  PIPELINE_COLUMNS,
  SUMMARY_COLUMNS,
  classicRows,
  componentRows,
  pipelineRows,
  summaryRows,
  type CsvRow,
} from "./rows.js";

export const OUTPUT_FILES = {
  components: "compression_components.csv",
  classics: "classic_algorithms.csv",
  pipelines: "pipeline_combinations.csv",
  summary: "generation_summary.csv",
} as const;

export type OutputKind = keyof typeof OUTPUT_FILES;

export interface ExportedFile {
  kind: OutputKind;
  path: string;
  /** Data rows written, header excluded */
  rows: number;
}

export interface ExportResult {
  files: ExportedFile[];
  counts: {
    components: number;
    variations: number;
    classics: number;
    pipelines: number;
  };
  generatedAt: string;
}

export interface ExportOptions {
  /** Timestamp recorded in generation_summary.csv. Default: now */
  now?: Date;
  /** Called after each file is written */
  onFile?: (file: ExportedFile) => void;
}

/**
 * Write rows to a CSV file with a header line.
 *
 * Booleans are written as true/false.
 *
 * @returns Number of data rows written
 */
export async function writeCsv<C extends string>(
  path: string,
  rows: Iterable<CsvRow<C>>,
  columns: ReadonlyArray<C>
): Promise<number> {
  let count = 0;
  function* counted(): Generator<CsvRow<C>> {
    for (const row of rows) {
      count++;
      yield row;
    }
  }

  await pipeline(
    Readable.from(counted()),
    stringify({
      header: true,
      columns: [...columns],
      cast: { boolean: (value) => String(value) },
    }),
    createWriteStream(path, { encoding: "utf-8" })
  );

  return count;
}

/**
 * Write every CSV output of a generation run into outputDir.
 *
 * Files are written in order: components, classics (when enabled),
 * pipelines (when enabled), summary.
 */
export async function exportCatalog(
  registry: ComponentRegistry,
  bindings: ReadonlyArray<ClassicBinding>,
  config: Readonly<GeneratorConfig>,
  outputDir: string,
  options: ExportOptions = {}
): Promise<ExportResult> {
  const generatedAt = options.now ?? new Date();
  await mkdir(outputDir, { recursive: true });

  const files: ExportedFile[] = [];
  async function write<C extends string>(
    kind: OutputKind,
    rows: Iterable<CsvRow<C>>,
    columns: ReadonlyArray<C>
  ): Promise<number> {
    const path = join(outputDir, OUTPUT_FILES[kind]);
    const count = await writeCsv(path, rows, columns);
    const file: ExportedFile = { kind, path, rows: count };
    files.push(file);
    options.onFile?.(file);
    return count;
  }

  await write(
    "components",
    componentRows(registry.components, {
      includeVariations: config.export.includeVariations,
    }),
    COMPONENT_COLUMNS
  );

  const variations = registry.getStats().totalVariations;

  let classics = 0;
  if (config.export.includeClassics) {
    classics = await write(
      "classics",
      classicRows(resolveClassicBindings(registry, bindings)),
      CLASSIC_COLUMNS
    );
  }

  let pipelines = 0;
  if (config.export.includePipelines) {
    pipelines = await write(
      "pipelines",
      pipelineRows(enumeratePipelines(registry, config.enumeration)),
      PIPELINE_COLUMNS
    );
  }

  await write(
    "summary",
    summaryRows({
      components: registry.size,
      variations,
      classics,
      pipelines,
      maxDepth: config.enumeration.maxDepth,
      generatedAt,
    }),
    SUMMARY_COLUMNS
  );

  return {
    files,
    counts: { components: registry.size, variations, classics, pipelines },
    generatedAt: generatedAt.toISOString(),
  };
}
