/**
 * Freeze Pack Tool
 */

import { z } from "zod";
import * as path from "node:path";
import { freezePack } from "@run-provenance/core";
import type { FreezePackInput, ToolContext } from "../types.js";
import { errorResult, jsonResult } from "./results.js";

export function createFreezePackTool(ctx: ToolContext) {
	return {
		name: "freeze_pack",
		schema: {
			title: "Freeze Pack",
			description: "Snapshot existing output artifacts into a timestamped directory without running anything",
			inputSchema: {
				source_dir: z
					.string()
					.optional()
					.describe("Directory holding the artifacts. Default: the configured outputs directory ('_outputs')."),
				pack_dir: z
					.string()
					.optional()
					.describe(
						"Directory receiving the timestamped snapshot folders. Default: the configured pack directory ('_frozen_stage2')."
					),
			},
		},
		handler: async (args: FreezePackInput) => {
			try {
				const { pack, projectDir } = ctx.config;
				const result = await freezePack({
					...pack,
					sourceDir: args.source_dir ? path.resolve(projectDir, args.source_dir) : pack.sourceDir,
					packDir: args.pack_dir ? path.resolve(projectDir, args.pack_dir) : pack.packDir,
					now: ctx.now,
					events: ctx.events,
				});
				return jsonResult(result);
			} catch (error) {
				return errorResult(error);
			}
		},
	};
}
