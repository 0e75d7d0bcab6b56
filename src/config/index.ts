export { loadConfig } from "./config-loader.js";
export { emptyConfig, validateConfig } from "./config-validator.js";
export { DEFAULT_CONFIG_FILE } from "./types.js";
export type { LoadedConfig, ScannerConfig } from "./types.js";
