export { isInspectionProvider, isProviderConstructor } from "./contract.js";
export {
  PLUGIN_GROUP,
  discoverPluginProviders,
  importPlugin,
  manifestSource,
  packageJsonSource,
  parsePluginSpecifier,
  readPackagePlugins,
} from "./plugin-loader.js";
export type {
  DiscoveryOptions,
  PluginEntry,
  PluginSource,
  PluginSpecifier,
} from "./plugin-loader.js";
export {
  createBuiltinProviders,
  defaultPluginSources,
  loadProviders,
} from "./registry.js";
export type { ProviderSettings } from "./registry.js";
export type {
  AnalysisOptions,
  InspectionProvider,
  ProviderConstructor,
} from "./types.js";
export * from "./heuristic/index.js";
export * from "./opa/index.js";
