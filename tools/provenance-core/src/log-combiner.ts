/**
 * Log Combiner
 *
 * Concatenates a directory's log files into one report, with a boundary
 * block naming each file.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { ProvenanceError } from "./errors.js";
import { isDirectory } from "./fs-utils.js";
import { listMatchingFiles } from "./pattern.js";
import type { CombineLogsResult, EventBus } from "./types.js";

export const DELIMITER = "=".repeat(45);

export interface CombineLogsOptions {
  logDir: string;
  pattern: string;
  outputName: string;
  now?: () => Date;
  events?: EventBus;
}

export function formatHeader(createdAt: string): string {
  return `Created: ${createdAt}\n${DELIMITER}\n`;
}

export function formatFileBanner(fileName: string): string {
  return `\n${DELIMITER}\nFILE: ${fileName}\n${DELIMITER}\n`;
}

export async function combineLogs(options: CombineLogsOptions): Promise<CombineLogsResult> {
  const logDir = path.resolve(options.logDir);
  const outputFile = path.join(logDir, options.outputName);
  const createdAt = (options.now ?? (() => new Date()))().toISOString();

  if (!(await isDirectory(logDir))) {
    throw new ProvenanceError("LOG_DIR_MISSING", `Log directory not found: ${logDir}`);
  }

  options.events?.publish({
    type: "combine.started",
    logDir,
    pattern: options.pattern,
    outputFile,
  });

  const files = (await listMatchingFiles(logDir, options.pattern)).filter(
    (name) => name !== options.outputName,
  );

  const header = formatHeader(createdAt);
  await fs.promises.writeFile(outputFile, header, "utf-8");
  let bytesWritten = Buffer.byteLength(header);

  for (const name of files) {
    const banner = formatFileBanner(name);
    const content = await fs.promises.readFile(path.join(logDir, name));
    await fs.promises.appendFile(outputFile, banner, "utf-8");
    await fs.promises.appendFile(outputFile, content);
    bytesWritten += Buffer.byteLength(banner) + content.length;
    options.events?.publish({
      type: "combine.file_appended",
      file: name,
      bytes: content.length,
    });
  }

  if (files.length === 0) {
    options.events?.publish({
      type: "combine.no_matches",
      logDir,
      pattern: options.pattern,
    });
  }

  options.events?.publish({
    type: "combine.completed",
    outputFile,
    files: files.length,
  });

  return {
    output_file: outputFile,
    files,
    bytes_written: bytesWritten,
    created_at: createdAt,
  };
}
