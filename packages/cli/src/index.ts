/**
 * @argwise/cli - command implementations of the argwise executable
 */
export { runDocument } from "./cmd-document.js";
export type { DocumentCommandOptions } from "./cmd-document.js";
export { runStatic } from "./cmd-static.js";
export { runCheck } from "./cmd-check.js";
export { runHelp } from "./cmd-help.js";
export { loadCli } from "./load.js";
export { resolveConfig, configSchema, PROJECT_CONFIG_FILE } from "./config.js";
export type { Config, ConfigSource, ResolvedConfig } from "./config.js";
