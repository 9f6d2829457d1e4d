/**
 * CSV export of components, classic algorithms and pipelines.
 */

export {
  COMPONENT_COLUMNS,
  PIPELINE_COLUMNS,
  CLASSIC_COLUMNS,
  SUMMARY_COLUMNS,
  componentRows,
  pipelineRows,
  classicRows,
  summaryRows,
  type CsvValue,
  type CsvRow,
  type ComponentRow,
  type PipelineRow,
  type ClassicRow,
  type SummaryRow,
  type ComponentRowOptions,
  type GenerationCounts,
} from "./rows.js";

export {
  OUTPUT_FILES,
  writeCsv,
  exportCatalog,
  type OutputKind,
  type ExportedFile,
  type ExportResult,
  type ExportOptions,
} from "./csv.js";
