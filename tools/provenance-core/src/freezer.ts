/**
 * Run Freezer
 *
 * Freezes a processing script under a timestamped version tag, runs the
 * frozen copy, versions its outputs and records a manifest.
 */

import * as path from "node:path";
import { ProvenanceError } from "./errors.js";
import { copyPreserving, ensureDir, isFile, sha256File } from "./fs-utils.js";
import { resolveCommitHash } from "./git.js";
import { writeManifest } from "./manifest.js";
import { runScript } from "./runner.js";
import { buildVersionTag, formatTimestamp, versionedName } from "./version-tag.js";
import type {
  CommitResolver,
  EventBus,
  FreezeConfig,
  FreezeRunResult,
  ScriptOutputMode,
  ScriptRunner,
  VersionedOutput,
} from "./types.js";

export const RUN_LOG_NAME = "RUN.out.txt";

export interface FreezeRunOptions extends FreezeConfig {
  projectDir: string;
  scriptOutput?: ScriptOutputMode;
  now?: () => Date;
  events?: EventBus;
  runner?: ScriptRunner;
  resolveCommit?: CommitResolver;
}

export async function freezeRun(options: FreezeRunOptions): Promise<FreezeRunResult> {
  const projectDir = path.resolve(options.projectDir);
  const outputDir = path.resolve(projectDir, options.outputDir);
  const frozenDir = path.resolve(projectDir, options.frozenDir);
  const runner = options.runner ?? runScript;
  const resolveCommit = options.resolveCommit ?? resolveCommitHash;
  const scriptOutput = options.scriptOutput ?? "inherit";

  const timestamp = formatTimestamp((options.now ?? (() => new Date()))());
  const version = buildVersionTag(options.versionPrefix, timestamp);

  await ensureDir(frozenDir);
  await ensureDir(outputDir);

  options.events?.publish({ type: "freeze.started", version });

  // Freeze the script (exact copy)
  const sourceScript = path.join(projectDir, options.scriptName);
  const frozenScript = path.join(frozenDir, versionedName(version, path.basename(options.scriptName)));

  if (!(await isFile(sourceScript))) {
    throw new ProvenanceError("SOURCE_SCRIPT_MISSING", `Cannot find ${sourceScript}`);
  }

  await copyPreserving(sourceScript, frozenScript);
  options.events?.publish({ type: "freeze.script_frozen", frozenScript });

  const gitHash = await resolveCommit(projectDir);

  // Run the frozen copy, never the working one
  options.events?.publish({
    type: "freeze.script_running",
    frozenScript,
    interpreter: options.interpreter,
  });
  const run = await runner({
    interpreter: options.interpreter,
    script: frozenScript,
    cwd: projectDir,
    output: scriptOutput,
    logFile:
      scriptOutput === "capture" ? path.join(frozenDir, versionedName(version, RUN_LOG_NAME)) : undefined,
  });

  const outputs: VersionedOutput[] = [];
  for (const spec of options.outputs) {
    const source = path.join(outputDir, spec.file);
    const versioned = path.join(outputDir, versionedName(version, spec.file));

    if (await isFile(source)) {
      await copyPreserving(source, versioned);
      outputs.push({ key: spec.key, file: spec.file, source, versioned, status: "versioned" });
      options.events?.publish({ type: "freeze.output_versioned", key: spec.key, versioned });
      continue;
    }

    if (spec.required) {
      throw new ProvenanceError(
        "REQUIRED_OUTPUT_MISSING",
        `Expected ${spec.key.toLowerCase()} not found: ${source}`,
      );
    }

    outputs.push({ key: spec.key, file: spec.file, source, versioned: null, status: "skipped" });
    options.events?.publish({ type: "freeze.output_skipped", key: spec.key, source });
  }

  const manifest = await writeManifest(frozenDir, {
    version,
    timestamp,
    projectDir,
    frozenScript,
    outputs: outputs.map((output) => ({ key: output.key, path: output.versioned })),
    gitHash,
    scriptSha256: await sha256File(frozenScript),
  });
  options.events?.publish({ type: "freeze.manifest_written", manifest });
  options.events?.publish({ type: "freeze.completed", version });

  return {
    version,
    timestamp,
    frozen_script: frozenScript,
    outputs,
    git_hash: gitHash,
    manifest,
    run_log: run.logFile,
  };
}
