/**
 * @argwise/argv - argument-vector parsing on commander
 */
export { parseArgv, displayName, formatChoice, negatedFlag } from "./parser.js";
export type { ArgvAction, ArgvArgument, ArgvGrammar, ArgvResult, Choice } from "./parser.js";
export { ArgvError, ArgvConversionError } from "./errors.js";
