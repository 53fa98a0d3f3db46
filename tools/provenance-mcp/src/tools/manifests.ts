/**
 * Manifest Tools
 *
 * Read-only views over the manifests a freeze has written.
 */

import { z } from "zod";
import * as path from "node:path";
import { listManifests, readManifest } from "@run-provenance/core";
import type {
	ListManifestsInput,
	ListManifestsOutput,
	ReadManifestInput,
	ReadManifestOutput,
	ToolContext,
} from "../types.js";
import { errorResult, jsonResult } from "./results.js";

function frozenDirFor(ctx: ToolContext, override?: string): string {
	return override ? path.resolve(ctx.config.projectDir, override) : ctx.config.freeze.frozenDir;
}

export function createListManifestsTool(ctx: ToolContext) {
	return {
		name: "list_manifests",
		schema: {
			title: "List Manifests",
			description: "List the frozen runs recorded in the frozen directory, oldest first",
			inputSchema: {
				frozen_dir: z
					.string()
					.optional()
					.describe("Directory holding frozen scripts and manifests. Default: the configured '_frozen_rules'."),
			},
		},
		handler: async (args: ListManifestsInput) => {
			try {
				const frozenDir = frozenDirFor(ctx, args.frozen_dir);
				const result: ListManifestsOutput = {
					frozen_dir: frozenDir,
					manifests: await listManifests(frozenDir),
				};
				return jsonResult(result);
			} catch (error) {
				return errorResult(error);
			}
		},
	};
}

export function createReadManifestTool(ctx: ToolContext) {
	return {
		name: "read_manifest",
		schema: {
			title: "Read Manifest",
			description: "Read the manifest of one frozen run",
			inputSchema: {
				version: z
					.string()
					.describe("Version tag of the run (e.g., 'stage2_rules_20260105_090307'), as returned by list_manifests."),
				frozen_dir: z
					.string()
					.optional()
					.describe("Directory holding frozen scripts and manifests. Default: the configured '_frozen_rules'."),
			},
		},
		handler: async (args: ReadManifestInput) => {
			try {
				const manifest = await readManifest(frozenDirFor(ctx, args.frozen_dir), args.version);
				const result: ReadManifestOutput = {
					version: manifest.version,
					timestamp: manifest.timestamp,
					project_dir: manifest.projectDir,
					frozen_script: manifest.frozenScript,
					outputs: manifest.outputs,
					git_hash: manifest.gitHash,
					frozen_script_sha256: manifest.scriptSha256,
				};
				return jsonResult(result);
			} catch (error) {
				return errorResult(error);
			}
		},
	};
}
