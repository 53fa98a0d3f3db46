export * from "./types.js";
export { ProvenanceEventBus, createEventBus, recordEvents } from "./event-bus.js";
export { ProvenanceError, errorMessage } from "./errors.js";
export type { ProvenanceErrorCode } from "./errors.js";
export { DEFAULT_CONFIG_FILE, configFileSchema, loadConfig, resolveConfig } from "./config.js";
export type { ConfigFile, LoadConfigOptions } from "./config.js";
export { buildVersionTag, formatTimestamp, versionedName } from "./version-tag.js";
export { createPatternRegex, listMatchingFiles } from "./pattern.js";
export { NO_COMMIT, resolveCommitHash } from "./git.js";
export { runScript } from "./runner.js";
export { DELIMITER, combineLogs, formatFileBanner, formatHeader } from "./log-combiner.js";
export type { CombineLogsOptions } from "./log-combiner.js";
export {
  MANIFEST_FILE_NAME,
  NOT_AVAILABLE,
  formatManifest,
  listManifests,
  manifestFileName,
  parseManifest,
  readManifest,
  writeManifest,
} from "./manifest.js";
export { RUN_LOG_NAME, freezeRun } from "./freezer.js";
export type { FreezeRunOptions } from "./freezer.js";
export { freezePack } from "./freeze-pack.js";
export type { FreezePackOptions } from "./freeze-pack.js";
