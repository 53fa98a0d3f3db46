/**
 * Shared type definitions for the provenance tools, the MCP server and the CLI.
 */

export type OutputStatus = "versioned" | "skipped";

export interface OutputSpec {
  file: string;
  key: string;
  required: boolean;
}

export interface CombineConfig {
  logDir: string;
  pattern: string;
  outputName: string;
}

export interface FreezeConfig {
  scriptName: string;
  interpreter: string;
  outputDir: string;
  frozenDir: string;
  versionPrefix: string;
  outputs: OutputSpec[];
}

export interface PackConfig {
  sourceDir: string;
  packDir: string;
  required: string[];
  optional: string[];
}

export interface ProvenanceConfig {
  projectDir: string;
  combine: CombineConfig;
  freeze: FreezeConfig;
  pack: PackConfig;
}

export interface CombineLogsResult {
  [key: string]: unknown;
  output_file: string;
  files: string[];
  bytes_written: number;
  created_at: string;
}

export interface VersionedOutput {
  key: string;
  file: string;
  source: string;
  versioned: string | null;
  status: OutputStatus;
}

export type ScriptOutputMode = "inherit" | "capture";

export interface FreezeRunResult {
  [key: string]: unknown;
  version: string;
  timestamp: string;
  frozen_script: string;
  outputs: VersionedOutput[];
  git_hash: string;
  manifest: string;
  run_log: string | null;
}

export interface FreezePackResult {
  [key: string]: unknown;
  pack_dir: string;
  copied: string[];
  missing_optional: string[];
}

export interface ManifestOutputEntry {
  key: string;
  path: string | null;
}

export interface RunManifest {
  version: string;
  timestamp: string;
  projectDir: string;
  frozenScript: string;
  outputs: ManifestOutputEntry[];
  gitHash: string;
  scriptSha256: string | null;
}

export interface ManifestSummary {
  version: string;
  timestamp: string;
  git_hash: string;
  path: string;
}

export interface ScriptRunRequest {
  interpreter: string;
  script: string;
  cwd: string;
  output: ScriptOutputMode;
  logFile?: string;
}

export interface ScriptRunResult {
  exitCode: number;
  logFile: string | null;
}

export type ScriptRunner = (request: ScriptRunRequest) => Promise<ScriptRunResult>;

export type CommitResolver = (projectDir: string) => Promise<string>;

// ============ Events ============

export type ProvenanceEvent =
  | { type: "combine.started"; logDir: string; pattern: string; outputFile: string }
  | { type: "combine.file_appended"; file: string; bytes: number }
  | { type: "combine.no_matches"; logDir: string; pattern: string }
  | { type: "combine.completed"; outputFile: string; files: number }
  | { type: "freeze.started"; version: string }
  | { type: "freeze.script_frozen"; frozenScript: string }
  | { type: "freeze.script_running"; frozenScript: string; interpreter: string }
  | { type: "freeze.output_versioned"; key: string; versioned: string }
  | { type: "freeze.output_skipped"; key: string; source: string }
  | { type: "freeze.manifest_written"; manifest: string }
  | { type: "freeze.completed"; version: string }
  | { type: "pack.started"; packDir: string }
  | { type: "pack.file_copied"; file: string }
  | { type: "pack.optional_missing"; files: string[] }
  | { type: "pack.completed"; packDir: string; copied: number };

export type EventListener = (event: ProvenanceEvent) => void;

export interface EventBus {
  publish(event: ProvenanceEvent): void;
  subscribe(listener: EventListener): () => void;
}
