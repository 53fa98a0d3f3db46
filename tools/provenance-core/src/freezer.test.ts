import assert from "node:assert/strict";
import crypto from "node:crypto";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import test from "node:test";

import { createEventBus, recordEvents } from "./event-bus.js";
import { ProvenanceError } from "./errors.js";
import { freezeRun } from "./freezer.js";
import type { FreezeRunOptions } from "./freezer.js";
import type { ScriptRunRequest, ScriptRunner } from "./types.js";

const VERSION = "stage2_rules_20260105_090307";
const SCRIPT_SOURCE = "print('stage 2')\n";

interface Fixture {
  projectDir: string;
  outputDir: string;
  frozenDir: string;
  requests: ScriptRunRequest[];
  options(overrides?: Partial<FreezeRunOptions>): FreezeRunOptions;
  cleanup(): void;
}

function createFixture(produce: { summary?: boolean; hits?: boolean } = {}): Fixture {
  const projectDir = fs.mkdtempSync(path.join(os.tmpdir(), "provenance-freeze-"));
  const outputDir = path.join(projectDir, "_outputs");
  const frozenDir = path.join(projectDir, "_frozen_rules");
  fs.writeFileSync(path.join(projectDir, "build.py"), SCRIPT_SOURCE);

  const requests: ScriptRunRequest[] = [];
  const runner: ScriptRunner = async (request) => {
    requests.push(request);
    if (produce.summary ?? true) {
      fs.writeFileSync(path.join(outputDir, "patient_stage_summary.csv"), "patient_id,stage\n1,2\n");
    }
    if (produce.hits ?? true) {
      fs.writeFileSync(path.join(outputDir, "stage2_event_hits.csv"), "patient_id,hit\n1,1\n");
    }
    return { exitCode: 0, logFile: request.logFile ?? null };
  };

  return {
    projectDir,
    outputDir,
    frozenDir,
    requests,
    options: (overrides = {}) => ({
      projectDir,
      scriptName: "build.py",
      interpreter: "python",
      outputDir: "_outputs",
      frozenDir: "_frozen_rules",
      versionPrefix: "stage2_rules",
      outputs: [
        { file: "patient_stage_summary.csv", key: "SUMMARY", required: true },
        { file: "stage2_event_hits.csv", key: "HITS", required: false },
      ],
      now: () => new Date(2026, 0, 5, 9, 3, 7),
      runner,
      resolveCommit: async () => "0123456789abcdef0123456789abcdef01234567",
      ...overrides,
    }),
    cleanup: () => fs.rmSync(projectDir, { recursive: true, force: true }),
  };
}

function sha256(text: string): string {
  return crypto.createHash("sha256").update(text).digest("hex");
}

test("freezeRun freezes the script, runs the copy and versions every output", async () => {
  const fixture = createFixture();
  try {
    const bus = createEventBus();
    const recorder = recordEvents(bus);

    const result = await freezeRun(fixture.options({ events: bus }));

    const frozenScript = path.join(fixture.frozenDir, `${VERSION}__build.py`);
    const summary = path.join(fixture.outputDir, `${VERSION}__patient_stage_summary.csv`);
    const hits = path.join(fixture.outputDir, `${VERSION}__stage2_event_hits.csv`);
    const manifest = path.join(fixture.frozenDir, `${VERSION}__MANIFEST.txt`);

    assert.deepEqual(result, {
      version: VERSION,
      timestamp: "20260105_090307",
      frozen_script: frozenScript,
      outputs: [
        {
          key: "SUMMARY",
          file: "patient_stage_summary.csv",
          source: path.join(fixture.outputDir, "patient_stage_summary.csv"),
          versioned: summary,
          status: "versioned",
        },
        {
          key: "HITS",
          file: "stage2_event_hits.csv",
          source: path.join(fixture.outputDir, "stage2_event_hits.csv"),
          versioned: hits,
          status: "versioned",
        },
      ],
      git_hash: "0123456789abcdef0123456789abcdef01234567",
      manifest,
      run_log: null,
    });

    assert.deepEqual(fixture.requests, [
      {
        interpreter: "python",
        script: frozenScript,
        cwd: fixture.projectDir,
        output: "inherit",
        logFile: undefined,
      },
    ]);
    assert.equal(fs.readFileSync(frozenScript, "utf-8"), SCRIPT_SOURCE);
    assert.equal(fs.readFileSync(summary, "utf-8"), "patient_id,stage\n1,2\n");
    assert.equal(fs.readFileSync(hits, "utf-8"), "patient_id,hit\n1,1\n");
    assert.equal(
      fs.readFileSync(manifest, "utf-8"),
      [
        `VERSION=${VERSION}`,
        "TIMESTAMP=20260105_090307",
        `PROJECT_DIR=${fixture.projectDir}`,
        `FROZEN_SCRIPT=${frozenScript}`,
        `SUMMARY_VERSIONED=${summary}`,
        `HITS_VERSIONED=${hits}`,
        "GIT_HASH=0123456789abcdef0123456789abcdef01234567",
        `FROZEN_SCRIPT_SHA256=${sha256(SCRIPT_SOURCE)}`,
        "",
      ].join("\n"),
    );
    assert.deepEqual(
      recorder.events.map((event) => event.type),
      [
        "freeze.started",
        "freeze.script_frozen",
        "freeze.script_running",
        "freeze.output_versioned",
        "freeze.output_versioned",
        "freeze.manifest_written",
        "freeze.completed",
      ],
    );
  } finally {
    fixture.cleanup();
  }
});

test("freezeRun skips a missing optional output and records NA", async () => {
  const fixture = createFixture({ hits: false });
  try {
    const bus = createEventBus();
    const recorder = recordEvents(bus);

    const result = await freezeRun(fixture.options({ events: bus }));

    const hitsSource = path.join(fixture.outputDir, "stage2_event_hits.csv");
    assert.deepEqual(result.outputs[1], {
      key: "HITS",
      file: "stage2_event_hits.csv",
      source: hitsSource,
      versioned: null,
      status: "skipped",
    });
    assert.ok(recorder.events.some((event) => event.type === "freeze.output_skipped" && event.source === hitsSource));

    const lines = fs.readFileSync(result.manifest, "utf-8").split("\n");
    assert.ok(lines.includes("HITS_VERSIONED=NA"));
    assert.equal(fs.existsSync(path.join(fixture.outputDir, `${VERSION}__stage2_event_hits.csv`)), false);
  } finally {
    fixture.cleanup();
  }
});

test("freezeRun aborts without a manifest when a required output is missing", async () => {
  const fixture = createFixture({ summary: false });
  try {
    const expectedPath = path.join(fixture.outputDir, "patient_stage_summary.csv");

    await assert.rejects(freezeRun(fixture.options()), (error: unknown) => {
      assert.ok(error instanceof ProvenanceError);
      assert.equal(error.code, "REQUIRED_OUTPUT_MISSING");
      assert.equal(error.message, `Expected summary not found: ${expectedPath}`);
      return true;
    });
    assert.equal(fs.existsSync(path.join(fixture.frozenDir, `${VERSION}__MANIFEST.txt`)), false);
    assert.equal(fs.existsSync(path.join(fixture.frozenDir, `${VERSION}__build.py`)), true);
  } finally {
    fixture.cleanup();
  }
});

test("freezeRun fails before running anything when the source script is missing", async () => {
  const fixture = createFixture();
  try {
    await assert.rejects(freezeRun(fixture.options({ scriptName: "missing.py" })), (error: unknown) => {
      assert.ok(error instanceof ProvenanceError);
      assert.equal(error.code, "SOURCE_SCRIPT_MISSING");
      assert.equal(error.message, `Cannot find ${path.join(fixture.projectDir, "missing.py")}`);
      return true;
    });
    assert.deepEqual(fixture.requests, []);
    assert.deepEqual(fs.readdirSync(fixture.frozenDir), []);
    assert.equal(fs.statSync(fixture.outputDir).isDirectory(), true);
  } finally {
    fixture.cleanup();
  }
});

test("freezeRun stops when the frozen script fails", async () => {
  const fixture = createFixture();
  try {
    const failing: ScriptRunner = async () => {
      throw new ProvenanceError("SCRIPT_FAILED", "Command failed (1): python build.py");
    };

    await assert.rejects(freezeRun(fixture.options({ runner: failing })), /Command failed \(1\)/);
    assert.deepEqual(fs.readdirSync(fixture.outputDir), []);
    assert.deepEqual(fs.readdirSync(fixture.frozenDir), [`${VERSION}__build.py`]);
  } finally {
    fixture.cleanup();
  }
});

test("freezeRun captures script output beside the frozen script", async () => {
  const fixture = createFixture();
  try {
    const result = await freezeRun(fixture.options({ scriptOutput: "capture" }));

    const runLog = path.join(fixture.frozenDir, `${VERSION}__RUN.out.txt`);
    assert.equal(fixture.requests[0]?.output, "capture");
    assert.equal(fixture.requests[0]?.logFile, runLog);
    assert.equal(result.run_log, runLog);
  } finally {
    fixture.cleanup();
  }
});

test("freezeRun runs a real interpreter against the frozen copy", async () => {
  const projectDir = fs.mkdtempSync(path.join(os.tmpdir(), "provenance-freeze-"));
  try {
    fs.writeFileSync(
      path.join(projectDir, "build.mjs"),
      [
        "import { writeFileSync } from 'node:fs';",
        "writeFileSync('_outputs/summary.csv', 'n\\n3\\n');",
        "console.log('wrote summary');",
        "",
      ].join("\n"),
    );

    const result = await freezeRun({
      projectDir,
      scriptName: "build.mjs",
      interpreter: process.execPath,
      outputDir: "_outputs",
      frozenDir: "_frozen",
      versionPrefix: "nightly",
      outputs: [{ file: "summary.csv", key: "SUMMARY", required: true }],
      scriptOutput: "capture",
      now: () => new Date(2026, 1, 1, 12, 0, 0),
      resolveCommit: async () => "NA",
    });

    assert.equal(result.version, "nightly_20260201_120000");
    assert.equal(
      fs.readFileSync(path.join(projectDir, "_outputs", "nightly_20260201_120000__summary.csv"), "utf-8"),
      "n\n3\n",
    );
    assert.equal(fs.readFileSync(path.join(projectDir, "_frozen", "nightly_20260201_120000__RUN.out.txt"), "utf-8"), "wrote summary\n");
  } finally {
    fs.rmSync(projectDir, { recursive: true, force: true });
  }
});
