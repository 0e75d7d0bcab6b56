export { OpaProvider, OPA_PROVIDER_NAME, findExecutable } from "./opa-provider.js";
export type { OpaProviderOptions } from "./opa-provider.js";
export { execFileRunner } from "./command-runner.js";
export type { CommandOptions, CommandResult, CommandRunner } from "./command-runner.js";
