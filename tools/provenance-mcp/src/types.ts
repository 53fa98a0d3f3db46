/**
 * Type definitions for the Provenance MCP Server
 */

import type { EventBus, ProvenanceConfig } from "@run-provenance/core";

// Shared by every tool handler
export interface ToolContext {
	config: ProvenanceConfig;
	events: EventBus;
	now?: () => Date;
}

export interface ToolResult {
	[key: string]: unknown;
	content: Array<{ type: "text"; text: string }>;
	structuredContent?: Record<string, unknown>;
	isError?: boolean;
}

// Tool input schemas

export interface CombineLogsInput {
	log_dir?: string;
	pattern?: string;
	output_name?: string;
}

export interface FreezeRunInput {
	script_name?: string;
	interpreter?: string;
	version_prefix?: string;
}

export interface FreezePackInput {
	source_dir?: string;
	pack_dir?: string;
}

export interface ListManifestsInput {
	frozen_dir?: string;
}

export interface ReadManifestInput {
	version: string;
	frozen_dir?: string;
}

export interface ListManifestsOutput {
	[key: string]: unknown;
	frozen_dir: string;
	manifests: Array<{
		version: string;
		timestamp: string;
		git_hash: string;
		path: string;
	}>;
}

export interface ReadManifestOutput {
	[key: string]: unknown;
	version: string;
	timestamp: string;
	project_dir: string;
	frozen_script: string;
	outputs: Array<{ key: string; path: string | null }>;
	git_hash: string;
	frozen_script_sha256: string | null;
}
