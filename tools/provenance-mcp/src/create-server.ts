/**
 * Provenance MCP Server setup
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { createEventBus, loadConfig } from "@run-provenance/core";
import type { ProvenanceEvent } from "@run-provenance/core";
import { createTools } from "./tools/index.js";

export const LOG_PREFIX = "[provenance-mcp]";

export function describeEvent(event: ProvenanceEvent): string {
	const { type, ...details } = event;
	return `${LOG_PREFIX} ${type} ${JSON.stringify(details)}`;
}

export function createServer(configPath?: string): { server: McpServer; unsubscribe: () => void } {
	const config = loadConfig({ configPath });
	const events = createEventBus();

	// stdout carries the protocol; everything else goes to stderr
	const unsubscribe = events.subscribe((event) => {
		console.error(describeEvent(event));
	});

	const server = new McpServer({
		name: "provenance-mcp",
		version: "0.1.0",
	});

	const tools = createTools({ config, events });

	server.registerTool(tools.combineLogs.name, tools.combineLogs.schema, tools.combineLogs.handler);
	server.registerTool(tools.freezeRun.name, tools.freezeRun.schema, tools.freezeRun.handler);
	server.registerTool(tools.freezePack.name, tools.freezePack.schema, tools.freezePack.handler);
	server.registerTool(tools.listManifests.name, tools.listManifests.schema, tools.listManifests.handler);
	server.registerTool(tools.readManifest.name, tools.readManifest.schema, tools.readManifest.handler);

	console.error(`${LOG_PREFIX} Project: ${config.projectDir}`);

	return { server, unsubscribe };
}
