/**
 * Freeze Run Tool
 *
 * Script output is always captured to the run log: stdout belongs to the
 * MCP transport.
 */

import { z } from "zod";
import { freezeRun } from "@run-provenance/core";
import type { ScriptRunner } from "@run-provenance/core";
import type { FreezeRunInput, ToolContext } from "../types.js";
import { errorResult, jsonResult } from "./results.js";

export function createFreezeRunTool(ctx: ToolContext, runner?: ScriptRunner) {
	return {
		name: "freeze_run",
		schema: {
			title: "Freeze Run",
			description:
				"Freeze the processing script under a timestamped version, run the frozen copy, version its outputs and write a manifest",
			inputSchema: {
				script_name: z
					.string()
					.optional()
					.describe(
						"Script to freeze, relative to the project directory (e.g., 'build_stage12_WITH_AUDIT.py'). Default: the configured script."
					),
				interpreter: z
					.string()
					.optional()
					.describe("Command that runs the script (e.g., 'python3'). Default: the configured interpreter."),
				version_prefix: z
					.string()
					.optional()
					.describe(
						"Prefix of the version tag; the tag is '<prefix>_<YYYYMMDD_HHMMSS>'. Default: 'stage2_rules'."
					),
			},
		},
		handler: async (args: FreezeRunInput) => {
			try {
				const { freeze, projectDir } = ctx.config;
				const result = await freezeRun({
					...freeze,
					projectDir,
					scriptName: args.script_name || freeze.scriptName,
					interpreter: args.interpreter || freeze.interpreter,
					versionPrefix: args.version_prefix || freeze.versionPrefix,
					scriptOutput: "capture",
					now: ctx.now,
					events: ctx.events,
					runner,
				});
				return jsonResult(result);
			} catch (error) {
				return errorResult(error);
			}
		},
	};
}
