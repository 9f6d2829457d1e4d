/**
 * Manifest serialization.
 *
 * Manifests are saved as manifest-{runId}.json beside the CSV files they
 * describe, so a file set can be matched with its log lines by run ID.
 */

import { writeFileSync, readFileSync, mkdirSync, existsSync } from "node:fs";
import { join } from "node:path";
import {
  type GenerationManifest,
  GenerationManifestSchema,
  MANIFEST_VERSION,
} from "./schema.js";
import { ManifestError } from "./factory.js";
import { deepFreeze } from "../utils/freeze.js";

export function serializeManifest(manifest: GenerationManifest, pretty = true): string {
  return JSON.stringify(manifest, null, pretty ? 2 : undefined);
}

/**
 * Parse and validate a manifest.
 *
 * @throws ManifestError if the JSON is malformed, fails the schema or has an
 *         incompatible major version
 */
export function deserializeManifest(json: string): Readonly<GenerationManifest> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (err) {
    throw new ManifestError(
      `Failed to parse manifest JSON: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  const result = GenerationManifestSchema.safeParse(parsed);
  if (!result.success) {
    const errors = result.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new ManifestError(`Invalid manifest format: ${errors}`);
  }

  const manifest = result.data;
  if (!isVersionCompatible(manifest.manifestVersion)) {
    throw new ManifestError(
      `Incompatible manifest version: ${manifest.manifestVersion} ` +
        `(current: ${MANIFEST_VERSION}).`
    );
  }

  return deepFreeze(manifest);
}

/**
 * Versions are compatible when their major versions match.
 */
export function isVersionCompatible(version: string): boolean {
  const [major] = version.split(".").map(Number);
  const [currentMajor] = MANIFEST_VERSION.split(".").map(Number);
  return major === currentMajor;
}

export function getManifestFilename(runId: string): string {
  return `manifest-${runId}.json`;
}

/**
 * Save a manifest to a file.
 *
 * @returns Full path to the saved file
 */
export function saveManifest(
  manifest: GenerationManifest,
  directory: string,
  filename?: string
): string {
  const name = filename ?? getManifestFilename(manifest.runMetadata.runId);
  const filePath = join(directory, name);

  if (!existsSync(directory)) {
    mkdirSync(directory, { recursive: true });
  }

  writeFileSync(filePath, serializeManifest(manifest), "utf-8");
  return filePath;
}

/**
 * @throws ManifestError if the file cannot be read or is not a valid manifest
 */
export function loadManifest(filePath: string): Readonly<GenerationManifest> {
  let json: string;
  try {
    json = readFileSync(filePath, "utf-8");
  } catch (err) {
    throw new ManifestError(
      `Failed to read manifest file: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  return deserializeManifest(json);
}

/**
 * Human-readable manifest summary for logs and the CLI.
 */
export function summarizeManifest(manifest: GenerationManifest): string {
  const { runMetadata, catalogStats, generatorConfig } = manifest;
  const lines: string[] = [
    "=== Generation Manifest ===",
    `Version: ${manifest.manifestVersion}`,
    "",
    "--- Run Metadata ---",
    `Run ID: ${runMetadata.runId}`,
    `Started: ${runMetadata.startedAt}`,
  ];

  if (runMetadata.hostname) {
    lines.push(`Hostname: ${runMetadata.hostname}`);
  }

  if (runMetadata.git) {
    lines.push("");
    lines.push("--- Git State ---");
    lines.push(`Commit: ${runMetadata.git.commitShort} (${runMetadata.git.branch})`);
    lines.push(`Dirty: ${runMetadata.git.isDirty ? "yes" : "no"}`);
  }

  lines.push("");
  lines.push("--- Catalog ---");
  lines.push(`Catalog version: ${manifest.catalogVersion}`);
  lines.push(`Components: ${catalogStats.totalComponents}`);
  lines.push(`Variations: ${catalogStats.totalVariations}`);
  lines.push(`Lint warnings: ${catalogStats.lintWarnings}`);

  lines.push("");
  lines.push("--- Enumeration ---");
  lines.push(
    `Depth: ${generatorConfig.enumeration.minDepth}-${generatorConfig.enumeration.maxDepth}`
  );
  lines.push(
    `Require entropy coder: ${generatorConfig.enumeration.requireTerminalCategory ? "yes" : "no"}`
  );

  if (manifest.outputs.length > 0) {
    lines.push("");
    lines.push("--- Outputs ---");
    for (const output of manifest.outputs) {
      lines.push(`  - ${output.kind}: ${output.path} (${output.rows} rows)`);
    }
  }

  return lines.join("\n");
}
