/**
 * Script Runner
 *
 * Runs a frozen script under its interpreter and waits for it to exit.
 */

import { spawn } from "node:child_process";
import * as fs from "node:fs";
import { once } from "node:events";
import { ProvenanceError, errorMessage } from "./errors.js";
import type { ScriptRunner, ScriptRunRequest, ScriptRunResult } from "./types.js";

function closeLog(log: fs.WriteStream): Promise<void> {
  return new Promise((resolve) => {
    if (log.closed) {
      resolve();
      return;
    }
    log.once("close", () => resolve());
    if (!log.destroyed) {
      log.end();
    }
  });
}

function describeCommand(request: ScriptRunRequest): string {
  return `${request.interpreter} ${request.script}`;
}

/**
 * Spawn `<interpreter> <script>` in `cwd`. With `output: "inherit"` the
 * child shares the caller's terminal; with `"capture"` stdout and stderr
 * are appended to `logFile`. Rejects with `SCRIPT_FAILED` on a spawn error,
 * a log write failure or a non-zero exit.
 */
export const runScript: ScriptRunner = async (request) => {
  if (request.output === "capture" && !request.logFile) {
    throw new Error("A log file is required to capture script output");
  }

  const log =
    request.output === "capture" && request.logFile
      ? fs.createWriteStream(request.logFile, { flags: "a" })
      : null;

  if (log) {
    try {
      await once(log, "open");
    } catch (error) {
      throw new ProvenanceError(
        "SCRIPT_FAILED",
        `Cannot open log file ${request.logFile}: ${errorMessage(error)}`,
        { cause: error },
      );
    }
  }

  const child = spawn(request.interpreter, [request.script], {
    cwd: request.cwd,
    env: process.env,
    stdio: log ? ["ignore", "pipe", "pipe"] : "inherit",
  });

  const logFailure: { error?: Error } = {};
  if (log) {
    // A failed write stops the run; the error is reported once the child exits.
    log.on("error", (error) => {
      logFailure.error ??= error;
      child.stdout?.resume();
      child.stderr?.resume();
      child.kill();
    });
    child.stdout?.pipe(log, { end: false });
    child.stderr?.pipe(log, { end: false });
  }

  let exitCode: number;
  try {
    exitCode = await new Promise<number>((resolve, reject) => {
      child.once("error", reject);
      child.once("close", (code, signal) => {
        resolve(code ?? (signal ? 128 : 1));
      });
    });
  } catch (error) {
    throw new ProvenanceError(
      "SCRIPT_FAILED",
      `Cannot start ${describeCommand(request)}: ${errorMessage(error)}`,
      { cause: error },
    );
  } finally {
    if (log) {
      await closeLog(log);
    }
  }

  if (logFailure.error) {
    throw new ProvenanceError(
      "SCRIPT_FAILED",
      `Cannot write script output to ${request.logFile}: ${logFailure.error.message}`,
      { cause: logFailure.error },
    );
  }

  if (exitCode !== 0) {
    throw new ProvenanceError(
      "SCRIPT_FAILED",
      `Command failed (${exitCode}): ${describeCommand(request)}`,
    );
  }

  const result: ScriptRunResult = {
    exitCode,
    logFile: log ? request.logFile ?? null : null,
  };
  return result;
};
