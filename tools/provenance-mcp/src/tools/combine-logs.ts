/**
 * Combine Logs Tool
 */

import { z } from "zod";
import * as path from "node:path";
import { combineLogs } from "@run-provenance/core";
import type { CombineLogsInput, ToolContext } from "../types.js";
import { errorResult, jsonResult } from "./results.js";

export function createCombineLogsTool(ctx: ToolContext) {
	return {
		name: "combine_logs",
		schema: {
			title: "Combine Logs",
			description: "Concatenate a directory's log files into one combined report",
			inputSchema: {
				log_dir: z
					.string()
					.optional()
					.describe(
						"Directory holding the log files. Relative paths resolve against the project directory. Default: the configured log directory."
					),
				pattern: z
					.string()
					.optional()
					.describe(
						"File name pattern using wildcards: * (any chars) and ? (single char). Default: '*.out.txt'."
					),
				output_name: z
					.string()
					.optional()
					.describe(
						"Name of the combined report, written inside the log directory. Default: 'ALL_OUT_COMBINED.txt'."
					),
			},
		},
		handler: async (args: CombineLogsInput) => {
			try {
				const { combine, projectDir } = ctx.config;
				const result = await combineLogs({
					logDir: args.log_dir ? path.resolve(projectDir, args.log_dir) : combine.logDir,
					pattern: args.pattern || combine.pattern,
					outputName: args.output_name || combine.outputName,
					now: ctx.now,
					events: ctx.events,
				});
				return jsonResult(result);
			} catch (error) {
				return errorResult(error);
			}
		},
	};
}
