import type { Command } from "commander";
import { formatManifest, listManifests, readManifest } from "@run-provenance/core";
import { prepareCommand, printResult } from "../context.js";
import type { ProgramDeps } from "../context.js";

export function attachManifestsCommand(root: Command, deps: ProgramDeps): void {
	root
		.command("manifests")
		.description("List frozen runs, or print the manifest of one version")
		.argument("[version]", "Version tag to show")
		.action(async (version: string | undefined) => {
			const ctx = prepareCommand(root, deps);
			const frozenDir = ctx.config.freeze.frozenDir;

			if (version) {
				const manifest = await readManifest(frozenDir, version);
				printResult(ctx, manifest, () => formatManifest(manifest).trimEnd().split("\n"));
				return;
			}

			const manifests = await listManifests(frozenDir);
			printResult(ctx, manifests, () =>
				manifests.length === 0
					? [`No manifests in ${frozenDir}`]
					: manifests.map((m) => `${m.version}\t${m.git_hash}\t${m.path}`),
			);
		});
}
