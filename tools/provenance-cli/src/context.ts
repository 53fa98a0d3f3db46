import type { Command } from "commander";
import { createEventBus, loadConfig } from "@run-provenance/core";
import type { EventBus, ProvenanceConfig, ScriptRunner } from "@run-provenance/core";
import type { CliIO } from "./io.js";
import { createConsoleReporter } from "./reporter.js";

export type RootOptions = {
	config?: string;
	json?: boolean;
};

export interface ProgramDeps {
	io: CliIO;
	cwd?: string;
	env?: NodeJS.ProcessEnv;
	now?: () => Date;
	runner?: ScriptRunner;
}

export interface CommandContext {
	config: ProvenanceConfig;
	events: EventBus;
	json: boolean;
	deps: ProgramDeps;
}

/**
 * Load configuration for a subcommand. In JSON mode progress lines are
 * suppressed so stdout holds only the result.
 */
export function prepareCommand(root: Command, deps: ProgramDeps): CommandContext {
	const flags = root.opts<RootOptions>();
	const config = loadConfig({ configPath: flags.config, cwd: deps.cwd, env: deps.env });
	const events = createEventBus();
	const json = flags.json === true;
	if (!json) {
		events.subscribe(createConsoleReporter(deps.io));
	}
	return { config, events, json, deps };
}

export function printResult(ctx: CommandContext, result: unknown, lines: () => string[] = () => []): void {
	if (ctx.json) {
		ctx.deps.io.out(JSON.stringify(result, null, 2));
		return;
	}
	for (const line of lines()) {
		ctx.deps.io.out(line);
	}
}
