import * as path from "node:path";
import type { Command } from "commander";
import { freezePack } from "@run-provenance/core";
import { prepareCommand, printResult } from "../context.js";
import type { ProgramDeps } from "../context.js";

interface PackFlags {
	sourceDir?: string;
	packDir?: string;
}

export function attachPackCommand(root: Command, deps: ProgramDeps): void {
	root
		.command("pack")
		.description("Snapshot existing output artifacts into a timestamped directory")
		.option("--source-dir <dir>", "Directory holding the artifacts (relative to the project)")
		.option("--pack-dir <dir>", "Directory receiving the snapshot (relative to the project)")
		.action(async (opts: PackFlags) => {
			const ctx = prepareCommand(root, deps);
			const { pack, projectDir } = ctx.config;
			const result = await freezePack({
				...pack,
				sourceDir: opts.sourceDir ? path.resolve(projectDir, opts.sourceDir) : pack.sourceDir,
				packDir: opts.packDir ? path.resolve(projectDir, opts.packDir) : pack.packDir,
				now: deps.now,
				events: ctx.events,
			});
			printResult(ctx, result);
		});
}
