/**
 * Configuration loading
 *
 * A JSON file validated with zod, then environment overrides. Relative
 * directories resolve against `projectDir`.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { z } from "zod";
import { ProvenanceError } from "./errors.js";
import type { ProvenanceConfig } from "./types.js";

export const DEFAULT_CONFIG_FILE = "provenance.config.json";

const outputSpecSchema = z.object({
  file: z.string().min(1),
  key: z
    .string()
    .regex(/^[A-Z][A-Z0-9_]*$/, "Output key must be an upper-case identifier"),
  required: z.boolean().default(false),
});

const combineSchema = z.object({
  logDir: z.string().min(1).default("QA_DEID_BUNDLES/logs"),
  pattern: z.string().min(1).default("*.out.txt"),
  outputName: z.string().min(1).default("ALL_OUT_COMBINED.txt"),
});

const freezeSchema = z.object({
  scriptName: z.string().min(1).default("build_stage12_WITH_AUDIT.py"),
  interpreter: z.string().min(1).default("python"),
  outputDir: z.string().min(1).default("_outputs"),
  frozenDir: z.string().min(1).default("_frozen_rules"),
  versionPrefix: z.string().min(1).default("stage2_rules"),
  outputs: z
    .array(outputSpecSchema)
    .default([
      { file: "patient_stage_summary.csv", key: "SUMMARY", required: true },
      { file: "stage2_event_hits.csv", key: "HITS", required: false },
    ])
    .superRefine((outputs, ctx) => {
      const seen = new Set<string>();
      for (const output of outputs) {
        if (seen.has(output.key)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `Duplicate output key: ${output.key}`,
          });
        }
        seen.add(output.key);
      }
    }),
});

const packSchema = z.object({
  sourceDir: z.string().min(1).default("_outputs"),
  packDir: z.string().min(1).default("_frozen_stage2"),
  required: z
    .array(z.string().min(1))
    .default(["patient_stage_summary.csv", "stage_event_level.csv"]),
  optional: z
    .array(z.string().min(1))
    .default([
      "validation_metrics.txt",
      "validation_mismatches.csv",
      "validation_merged.csv",
    ]),
});

export const configFileSchema = z.object({
  projectDir: z.string().min(1).optional(),
  combine: combineSchema.default({}),
  freeze: freezeSchema.default({}),
  pack: packSchema.default({}),
});

export type ConfigFile = z.input<typeof configFileSchema>;

export interface LoadConfigOptions {
  /** Explicit config file; must exist when given. */
  configPath?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

function readConfigFile(filePath: string): unknown {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new ProvenanceError("CONFIG_INVALID", `Cannot read config file ${filePath}`, {
      cause: error,
    });
  }

  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new ProvenanceError("CONFIG_INVALID", `Config file ${filePath} is not valid JSON`, {
      cause: error,
    });
  }
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Validate a raw config object and resolve every directory to an absolute path.
 */
export function resolveConfig(
  input: unknown,
  options: { cwd?: string; fileDir?: string; env?: NodeJS.ProcessEnv; source?: string } = {},
): ProvenanceConfig {
  const cwd = options.cwd ?? process.cwd();
  const fileDir = options.fileDir ?? cwd;
  const env = options.env ?? process.env;

  const parsed = configFileSchema.safeParse(input ?? {});
  if (!parsed.success) {
    const where = options.source ? ` in ${options.source}` : "";
    throw new ProvenanceError(
      "CONFIG_INVALID",
      `Invalid configuration${where}: ${formatIssues(parsed.error)}`,
    );
  }
  const file = parsed.data;

  const envProjectDir = nonEmpty(env.PROVENANCE_PROJECT_DIR);
  const projectDir = envProjectDir
    ? path.resolve(cwd, envProjectDir)
    : path.resolve(fileDir, file.projectDir ?? ".");
  const inProject = (p: string) => path.resolve(projectDir, p);

  return {
    projectDir,
    combine: {
      ...file.combine,
      logDir: inProject(nonEmpty(env.PROVENANCE_LOG_DIR) ?? file.combine.logDir),
    },
    freeze: {
      ...file.freeze,
      scriptName: nonEmpty(env.PROVENANCE_SCRIPT) ?? file.freeze.scriptName,
      interpreter: nonEmpty(env.PROVENANCE_INTERPRETER) ?? file.freeze.interpreter,
      outputDir: inProject(file.freeze.outputDir),
      frozenDir: inProject(file.freeze.frozenDir),
    },
    pack: {
      ...file.pack,
      sourceDir: inProject(file.pack.sourceDir),
      packDir: inProject(file.pack.packDir),
    },
  };
}

/**
 * Load configuration from `configPath`, `PROVENANCE_CONFIG`, or
 * `provenance.config.json` in the working directory. Only the implicit
 * default file may be absent.
 */
export function loadConfig(options: LoadConfigOptions = {}): ProvenanceConfig {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;

  const explicit = options.configPath ?? nonEmpty(env.PROVENANCE_CONFIG);
  const configPath = path.resolve(cwd, explicit ?? DEFAULT_CONFIG_FILE);

  if (!explicit && !fs.existsSync(configPath)) {
    return resolveConfig({}, { cwd, env });
  }

  const raw = readConfigFile(configPath);
  // A relative projectDir in a file is relative to the file itself.
  return resolveConfig(raw, {
    cwd,
    fileDir: path.dirname(configPath),
    env,
    source: configPath,
  });
}
