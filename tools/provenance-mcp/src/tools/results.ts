import { errorMessage } from "@run-provenance/core";
import type { ToolResult } from "../types.js";

export function jsonResult(result: Record<string, unknown>): ToolResult {
	return {
		content: [
			{
				type: "text" as const,
				text: JSON.stringify(result, null, 2),
			},
		],
		structuredContent: result,
	};
}

export function errorResult(error: unknown): ToolResult {
	return {
		content: [
			{
				type: "text" as const,
				text: `Error: ${errorMessage(error)}`,
			},
		],
		isError: true,
	};
}
