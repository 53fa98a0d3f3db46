/**
 * Run manifests
 *
 * Plain `KEY=VALUE` text files written next to each frozen script. The
 * frozen directory doubles as the registry of past runs.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { ProvenanceError } from "./errors.js";
import { isDirectory } from "./fs-utils.js";
import { compareNames } from "./pattern.js";
import { versionedName } from "./version-tag.js";
import type { ManifestOutputEntry, ManifestSummary, RunManifest } from "./types.js";

export const MANIFEST_FILE_NAME = "MANIFEST.txt";
export const NOT_AVAILABLE = "NA";

const VERSIONED_SUFFIX = "_VERSIONED";
const FIXED_KEYS = new Set([
  "VERSION",
  "TIMESTAMP",
  "PROJECT_DIR",
  "FROZEN_SCRIPT",
  "GIT_HASH",
  "FROZEN_SCRIPT_SHA256",
]);

export function manifestFileName(version: string): string {
  return versionedName(version, MANIFEST_FILE_NAME);
}

export function formatManifest(manifest: RunManifest): string {
  const lines = [
    `VERSION=${manifest.version}`,
    `TIMESTAMP=${manifest.timestamp}`,
    `PROJECT_DIR=${manifest.projectDir}`,
    `FROZEN_SCRIPT=${manifest.frozenScript}`,
    ...manifest.outputs.map(
      (output) => `${output.key}${VERSIONED_SUFFIX}=${output.path ?? NOT_AVAILABLE}`,
    ),
    `GIT_HASH=${manifest.gitHash}`,
  ];
  if (manifest.scriptSha256) {
    lines.push(`FROZEN_SCRIPT_SHA256=${manifest.scriptSha256}`);
  }
  return `${lines.join("\n")}\n`;
}

export function parseManifest(text: string, source = "manifest"): RunManifest {
  const values = new Map<string, string>();
  const outputs: ManifestOutputEntry[] = [];

  const lines = text.split(/\r?\n/);
  for (const [index, line] of lines.entries()) {
    if (line.trim() === "") continue;

    const separator = line.indexOf("=");
    if (separator <= 0) {
      throw new ProvenanceError(
        "MANIFEST_INVALID",
        `${source}: line ${index + 1} is not a KEY=VALUE pair`,
      );
    }

    const key = line.slice(0, separator).trim();
    const value = line.slice(separator + 1);

    if (!FIXED_KEYS.has(key) && key.endsWith(VERSIONED_SUFFIX)) {
      outputs.push({
        key: key.slice(0, -VERSIONED_SUFFIX.length),
        path: value === NOT_AVAILABLE ? null : value,
      });
    } else {
      values.set(key, value);
    }
  }

  const version = values.get("VERSION");
  if (!version) {
    throw new ProvenanceError("MANIFEST_INVALID", `${source}: missing VERSION`);
  }

  return {
    version,
    timestamp: values.get("TIMESTAMP") ?? "",
    projectDir: values.get("PROJECT_DIR") ?? "",
    frozenScript: values.get("FROZEN_SCRIPT") ?? "",
    outputs,
    gitHash: values.get("GIT_HASH") ?? NOT_AVAILABLE,
    scriptSha256: values.get("FROZEN_SCRIPT_SHA256") ?? null,
  };
}

export async function writeManifest(frozenDir: string, manifest: RunManifest): Promise<string> {
  const manifestPath = path.join(frozenDir, manifestFileName(manifest.version));
  await fs.promises.writeFile(manifestPath, formatManifest(manifest), "utf-8");
  return manifestPath;
}

/**
 * Every manifest in `frozenDir`, oldest version first. Files that do not
 * parse are left out of the listing and noted on stderr.
 */
export async function listManifests(frozenDir: string): Promise<ManifestSummary[]> {
  if (!(await isDirectory(frozenDir))) {
    return [];
  }

  const entries = await fs.promises.readdir(frozenDir, { withFileTypes: true });
  const summaries: ManifestSummary[] = [];

  for (const entry of entries) {
    if (!entry.isFile()) continue;
    if (!entry.name.endsWith(manifestFileName(""))) continue;

    const manifestPath = path.join(frozenDir, entry.name);
    let manifest: RunManifest;
    try {
      manifest = parseManifest(await fs.promises.readFile(manifestPath, "utf-8"), manifestPath);
    } catch (error) {
      if (!(error instanceof ProvenanceError && error.code === "MANIFEST_INVALID")) {
        throw error;
      }
      console.error(`[manifest] Skipping ${error.message}`);
      continue;
    }
    summaries.push({
      version: manifest.version,
      timestamp: manifest.timestamp,
      git_hash: manifest.gitHash,
      path: manifestPath,
    });
  }

  return summaries.sort((a, b) => compareNames(a.version, b.version));
}

export async function readManifest(frozenDir: string, version: string): Promise<RunManifest> {
  const manifestPath = path.join(frozenDir, manifestFileName(path.basename(version)));

  let text: string;
  try {
    text = await fs.promises.readFile(manifestPath, "utf-8");
  } catch (error) {
    if (!(error instanceof Error && "code" in error && error.code === "ENOENT")) {
      throw error;
    }
    throw new ProvenanceError(
      "MANIFEST_NOT_FOUND",
      `No manifest for version ${version} in ${frozenDir}`,
      { cause: error },
    );
  }

  return parseManifest(text, manifestPath);
}
