#!/usr/bin/env node

/**
 * Provenance MCP Server
 *
 * Exposes log combining, run freezing and manifest lookup over stdio.
 */

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { LOG_PREFIX, createServer } from "./create-server.js";

// ============ Start Server ============

async function main() {
	const { server, unsubscribe } = createServer();
	const transport = new StdioServerTransport();

	const shutdown = () => {
		unsubscribe();
		server
			.close()
			.catch((error: unknown) => {
				console.error(`${LOG_PREFIX} Error while closing:`, error);
			})
			.finally(() => process.exit(0));
	};
	process.on("SIGINT", shutdown);
	process.on("SIGTERM", shutdown);

	await server.connect(transport);

	console.error(`${LOG_PREFIX} Server running`);
	console.error(`${LOG_PREFIX} Tools: combine_logs, freeze_run, freeze_pack, list_manifests, read_manifest`);
}

main().catch((error) => {
	console.error(`${LOG_PREFIX} Server error:`, error);
	process.exit(1);
});
