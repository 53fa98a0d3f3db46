import { Command } from "commander";
import { attachCombineLogsCommand } from "./commands/combine-logs.js";
import { attachFreezeCommand } from "./commands/freeze.js";
import { attachManifestsCommand } from "./commands/manifests.js";
import { attachPackCommand } from "./commands/pack.js";
import type { ProgramDeps } from "./context.js";

export type { ProgramDeps, RootOptions } from "./context.js";

export function buildProgram(deps: ProgramDeps): Command {
	const program = new Command();

	program
		.name("provenance")
		.description("Combine pipeline logs and freeze processing runs under versioned tags")
		.version("0.1.0")
		.option("--config <path>", "Config file (default: ./provenance.config.json)")
		.option("--json", "Print the result as JSON", false);

	attachCombineLogsCommand(program, deps);
	attachFreezeCommand(program, deps);
	attachPackCommand(program, deps);
	attachManifestsCommand(program, deps);

	return program;
}
