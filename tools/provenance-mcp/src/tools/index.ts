/**
 * Tools Index
 *
 * Exports all MCP tools for the Provenance server.
 */

import type { ScriptRunner } from "@run-provenance/core";
import type { ToolContext } from "../types.js";
import { createCombineLogsTool } from "./combine-logs.js";
import { createFreezePackTool } from "./freeze-pack.js";
import { createFreezeRunTool } from "./freeze-run.js";
import { createListManifestsTool, createReadManifestTool } from "./manifests.js";

export function createTools(ctx: ToolContext, runner?: ScriptRunner) {
	return {
		combineLogs: createCombineLogsTool(ctx),
		freezeRun: createFreezeRunTool(ctx, runner),
		freezePack: createFreezePackTool(ctx),
		listManifests: createListManifestsTool(ctx),
		readManifest: createReadManifestTool(ctx),
	};
}

export type ProvenanceTools = ReturnType<typeof createTools>;
