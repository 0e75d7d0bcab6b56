export * from "./taxonomy/index.js";
export * from "./scanner/index.js";
export * from "./providers/index.js";
export * from "./suppression/index.js";
export * from "./scoring/index.js";
export * from "./orchestrator/index.js";
export * from "./report/index.js";
export * from "./config/index.js";
export * from "./errors/index.js";
export * from "./logger/index.js";
export * from "./ingest/index.js";
