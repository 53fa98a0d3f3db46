import type { EventListener, ProvenanceEvent } from "@run-provenance/core";
import type { CliIO } from "./io.js";

function lowerLabel(key: string): string {
	return key.toLowerCase().replaceAll("_", " ");
}

function titleLabel(key: string): string {
	const label = lowerLabel(key);
	return label.charAt(0).toUpperCase() + label.slice(1);
}

/**
 * Terminal lines for one event; empty when the event is not worth showing.
 */
export function formatEvent(event: ProvenanceEvent): Array<{ stream: "out" | "err"; line: string }> {
	switch (event.type) {
		case "combine.started":
			return [{ stream: "out", line: `Combining ${event.pattern} files...` }];
		case "combine.file_appended":
			return [];
		case "combine.no_matches":
			return [{ stream: "err", line: `WARN: No files matching ${event.pattern} in ${event.logDir}` }];
		case "combine.completed":
			return [
				{ stream: "out", line: "" },
				{ stream: "out", line: "Done." },
				{ stream: "out", line: `Combined file: ${event.outputFile}` },
			];
		case "freeze.started":
			return [{ stream: "out", line: `==> Freezing ruleset as: ${event.version}` }];
		case "freeze.script_frozen":
			return [{ stream: "out", line: `==> Saved frozen script: ${event.frozenScript}` }];
		case "freeze.script_running":
			return [{ stream: "out", line: "==> Running frozen script..." }];
		case "freeze.output_versioned":
			return [{ stream: "out", line: `==> Versioned ${lowerLabel(event.key)}: ${event.versioned}` }];
		case "freeze.output_skipped":
			return [
				{ stream: "err", line: `WARN: ${titleLabel(event.key)} file not found (skipping): ${event.source}` },
			];
		case "freeze.manifest_written":
			return [{ stream: "out", line: `==> Manifest: ${event.manifest}` }];
		case "freeze.completed":
			return [{ stream: "out", line: "==> Done." }];
		case "pack.started":
			return [{ stream: "out", line: `Freezing artifacts to: ${event.packDir}` }];
		case "pack.file_copied":
			return [];
		case "pack.optional_missing":
			return [
				{ stream: "out", line: `Optional artifacts not found (that is OK): ${event.files.join(", ")}` },
			];
		case "pack.completed":
			return [{ stream: "out", line: `Done. ${event.copied} files frozen.` }];
	}
}

export function createConsoleReporter(io: CliIO): EventListener {
	return (event) => {
		for (const { stream, line } of formatEvent(event)) {
			io[stream](line);
		}
	};
}
