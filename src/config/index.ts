export { loadConfig, writeDefaultConfig, validateConfig, getConfigHome, jobLabel } from "./loader.js";
export type { PatternSyncConfig, SyncJob } from "./types.js";
export { CONFIG_DEFAULTS } from "./types.js";
