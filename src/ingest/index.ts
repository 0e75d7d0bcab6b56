export { loadTargetFile, parseTargetDocument } from "./target-loader.js";
export type { LoadedTarget } from "./target-loader.js";
