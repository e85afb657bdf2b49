/**
 * @argwise/core - declarative command-line framework
 */
export * from "./types.js";
export * from "./errors.js";
export * from "./converters.js";
export { arg, resolveArgument, multiplicity, displayType } from "./resolver.js";
export type { ArgHint, ArgumentSpec, ResolvedType, Multiplicity, ConverterLookup } from "./resolver.js";
export { Command, defineFunction, DEFAULT_EXTRA_KEY } from "./command.js";
export type { ParamDecl, CommandFn, CommandFunction, CommandValues, CommandInit } from "./command.js";
export { CommandRegistry } from "./registry.js";
export { joinStrings, formatTable, formatArgHelp } from "./format.js";
export { formatHelp, formatInfo } from "./help.js";
export { Cli, SUBCOMMAND_KEY } from "./cli.js";
export type { CliOptions, ErrorClass, ErrorHandler, Hints, ParseOptions } from "./cli.js";
export { toStaticJson, parseStaticData, staticDataSchema, UNSET_MARKER } from "./snapshot.js";
export type { StaticData, StaticCommand, StaticArg } from "./snapshot.js";
export { StaticCli, DEBUG_START, DEBUG_END } from "./static.js";
export type { StaticOptions } from "./static.js";
export { documentCli, DEFAULT_DOCS_COMMENT } from "./document.js";
export type { DocumentOptions } from "./document.js";
export { runMain } from "./main.js";
