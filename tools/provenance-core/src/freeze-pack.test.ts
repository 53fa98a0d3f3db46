import assert from "node:assert/strict";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import test from "node:test";

import { createEventBus, recordEvents } from "./event-bus.js";
import { ProvenanceError } from "./errors.js";
import { freezePack } from "./freeze-pack.js";

const now = () => new Date(2026, 2, 14, 8, 30, 0);

function setup(files: Record<string, string>): { root: string; sourceDir: string; packDir: string } {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), "provenance-pack-"));
  const sourceDir = path.join(root, "_outputs");
  fs.mkdirSync(sourceDir);
  for (const [name, content] of Object.entries(files)) {
    fs.writeFileSync(path.join(sourceDir, name), content);
  }
  return { root, sourceDir, packDir: path.join(root, "_frozen_stage2") };
}

test("freezePack copies required and present optional artifacts into a timestamped directory", async () => {
  const { root, sourceDir, packDir } = setup({
    "patient_stage_summary.csv": "summary\n",
    "stage_event_level.csv": "events\n",
    "validation_metrics.txt": "precision=0.9\n",
  });
  try {
    const bus = createEventBus();
    const recorder = recordEvents(bus);

    const result = await freezePack({
      sourceDir,
      packDir,
      required: ["patient_stage_summary.csv", "stage_event_level.csv"],
      optional: ["validation_metrics.txt", "validation_merged.csv"],
      now,
      events: bus,
    });

    const expectedDir = path.join(packDir, "20260314_083000");
    assert.deepEqual(result, {
      pack_dir: expectedDir,
      copied: ["patient_stage_summary.csv", "stage_event_level.csv", "validation_metrics.txt"],
      missing_optional: ["validation_merged.csv"],
    });
    assert.deepEqual(fs.readdirSync(expectedDir).sort(), [
      "patient_stage_summary.csv",
      "stage_event_level.csv",
      "validation_metrics.txt",
    ]);
    assert.equal(fs.readFileSync(path.join(expectedDir, "validation_metrics.txt"), "utf-8"), "precision=0.9\n");
    assert.deepEqual(recorder.events.at(-2), {
      type: "pack.optional_missing",
      files: ["validation_merged.csv"],
    });
  } finally {
    fs.rmSync(root, { recursive: true, force: true });
  }
});

test("freezePack refuses to create a pack when a required artifact is missing", async () => {
  const { root, sourceDir, packDir } = setup({ "patient_stage_summary.csv": "summary\n" });
  try {
    await assert.rejects(
      freezePack({
        sourceDir,
        packDir,
        required: ["patient_stage_summary.csv", "stage_event_level.csv"],
        optional: [],
        now,
      }),
      (error: unknown) => {
        assert.ok(error instanceof ProvenanceError);
        assert.equal(error.code, "REQUIRED_OUTPUT_MISSING");
        assert.equal(error.message, `Missing required artifact: ${path.join(sourceDir, "stage_event_level.csv")}`);
        return true;
      },
    );
    assert.equal(fs.existsSync(packDir), false);
  } finally {
    fs.rmSync(root, { recursive: true, force: true });
  }
});
