import type { Command } from "commander";
import { freezeRun } from "@run-provenance/core";
import { prepareCommand, printResult } from "../context.js";
import type { ProgramDeps } from "../context.js";

interface FreezeFlags {
	script?: string;
	interpreter?: string;
	prefix?: string;
	captureLog?: boolean;
}

export function attachFreezeCommand(root: Command, deps: ProgramDeps): void {
	root
		.command("freeze")
		.description("Freeze the processing script, run the frozen copy, version its outputs and write a manifest")
		.option("--script <name>", "Script to freeze, relative to the project directory")
		.option("--interpreter <command>", "Command that runs the script")
		.option("--prefix <prefix>", "Version tag prefix")
		.option("--capture-log", "Write the script's output to a run log instead of the terminal", false)
		.action(async (opts: FreezeFlags) => {
			const ctx = prepareCommand(root, deps);
			const { freeze, projectDir } = ctx.config;
			const result = await freezeRun({
				...freeze,
				projectDir,
				scriptName: opts.script ?? freeze.scriptName,
				interpreter: opts.interpreter ?? freeze.interpreter,
				versionPrefix: opts.prefix ?? freeze.versionPrefix,
				// JSON mode keeps stdout for the result
				scriptOutput: opts.captureLog || ctx.json ? "capture" : "inherit",
				now: deps.now,
				events: ctx.events,
				runner: deps.runner,
			});
			printResult(ctx, result, () => (result.run_log ? [`Run log: ${result.run_log}`] : []));
		});
}
