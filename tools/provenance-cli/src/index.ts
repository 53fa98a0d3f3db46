#!/usr/bin/env node
import { errorMessage } from "@run-provenance/core";
import { consoleIO } from "./io.js";
import { buildProgram } from "./program.js";

async function main() {
	const program = buildProgram({ io: consoleIO });
	await program.parseAsync(process.argv);
}

main().catch((error) => {
	console.error(`ERROR: ${errorMessage(error)}`);
	process.exit(1);
});
