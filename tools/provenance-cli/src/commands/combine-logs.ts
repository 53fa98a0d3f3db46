import * as path from "node:path";
import type { Command } from "commander";
import { combineLogs } from "@run-provenance/core";
import { prepareCommand, printResult } from "../context.js";
import type { ProgramDeps } from "../context.js";

interface CombineLogsFlags {
	logDir?: string;
	pattern?: string;
	outputName?: string;
}

export function attachCombineLogsCommand(root: Command, deps: ProgramDeps): void {
	root
		.command("combine-logs")
		.description("Concatenate the log directory's files into one combined report")
		.option("--log-dir <dir>", "Directory holding the logs (relative to the project)")
		.option("--pattern <glob>", "File name pattern, * and ? wildcards")
		.option("--output-name <name>", "Combined report file name")
		.action(async (opts: CombineLogsFlags) => {
			const ctx = prepareCommand(root, deps);
			const { combine, projectDir } = ctx.config;
			const result = await combineLogs({
				logDir: opts.logDir ? path.resolve(projectDir, opts.logDir) : combine.logDir,
				pattern: opts.pattern ?? combine.pattern,
				outputName: opts.outputName ?? combine.outputName,
				now: deps.now,
				events: ctx.events,
			});
			printResult(ctx, result);
		});
}
