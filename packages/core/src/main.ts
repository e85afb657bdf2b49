/**
 * Process entry point for CLIs built with this package.
 */
import type { Cli } from "./cli.js";
import { CliError } from "./errors.js";

/**
 * Runs the CLI on the process arguments and sets the exit code.
 * Framework errors are printed; anything else propagates.
 */
export async function runMain(cli: Cli, argv: readonly string[] = process.argv.slice(2)): Promise<void> {
  try {
    process.exitCode = await cli.run(argv);
  } catch (e) {
    if (!(e instanceof CliError)) throw e;
    console.error(`error: ${e.message}`);
    process.exitCode = 1;
  }
}
