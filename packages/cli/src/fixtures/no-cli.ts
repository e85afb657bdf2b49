/**
 * Module without a Cli export.
 */
export const cli = { prog: "demo" };
