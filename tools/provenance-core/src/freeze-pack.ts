import * as path from "node:path";
import { ProvenanceError } from "./errors.js";
import { copyPreserving, ensureDir, isFile } from "./fs-utils.js";
import { formatTimestamp } from "./version-tag.js";
import type { EventBus, FreezePackResult, PackConfig } from "./types.js";

export interface FreezePackOptions extends PackConfig {
  now?: () => Date;
  events?: EventBus;
}

/**
 * Snapshot already-produced artifacts into `<packDir>/<timestamp>/` so a
 * later run cannot overwrite them. Required artifacts are checked before
 * the pack directory is created.
 */
export async function freezePack(options: FreezePackOptions): Promise<FreezePackResult> {
  const sourceDir = path.resolve(options.sourceDir);
  const stamp = formatTimestamp((options.now ?? (() => new Date()))());
  const packDir = path.join(path.resolve(options.packDir), stamp);

  for (const name of options.required) {
    const source = path.join(sourceDir, name);
    if (!(await isFile(source))) {
      throw new ProvenanceError("REQUIRED_OUTPUT_MISSING", `Missing required artifact: ${source}`);
    }
  }

  await ensureDir(packDir);
  options.events?.publish({ type: "pack.started", packDir });

  const copied: string[] = [];
  const missingOptional: string[] = [];

  const copy = async (name: string) => {
    await copyPreserving(path.join(sourceDir, name), path.join(packDir, path.basename(name)));
    copied.push(path.basename(name));
    options.events?.publish({ type: "pack.file_copied", file: path.basename(name) });
  };

  for (const name of options.required) {
    await copy(name);
  }

  for (const name of options.optional) {
    if (await isFile(path.join(sourceDir, name))) {
      await copy(name);
    } else {
      missingOptional.push(name);
    }
  }

  if (missingOptional.length > 0) {
    options.events?.publish({ type: "pack.optional_missing", files: missingOptional });
  }
  options.events?.publish({ type: "pack.completed", packDir, copied: copied.length });

  return {
    pack_dir: packDir,
    copied,
    missing_optional: missingOptional,
  };
}
