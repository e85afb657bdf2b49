/**
 * argwise check - validate a static snapshot and summarize it
 */
import * as fs from "node:fs";
import { StaticCli } from "@argwise/core";

export async function runCheck(snapshot: string, opts: { json?: boolean } = {}): Promise<number> {
  if (!fs.existsSync(snapshot)) {
    console.error(`Error reading file: ${snapshot} does not exist`);
    return 4;
  }

  let cli: StaticCli;
  try {
    cli = StaticCli.load(snapshot);
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    console.error(`Error: ${msg}`);
    return 2;
  }

  const commands = [...cli.commands.keys()];
  const subcommands = [...cli.subcommands].flatMap(([parent, subs]) => [...subs.keys()].map((n) => `${parent} ${n}`));

  if (opts.json) {
    console.log(
      JSON.stringify(
        { ok: true, path: snapshot, prog: cli.prog ?? null, version: cli.version ?? null, commands, subcommands },
        null,
        2
      )
    );
    return 0;
  }

  const formatList = (items: string[]): string => (items.length > 0 ? items.join(", ") : "(none)");

  console.log("Static snapshot OK");
  console.log(`  Path:        ${snapshot}`);
  console.log(`  Program:     ${cli.prog ?? "(none)"}`);
  console.log(`  Version:     ${cli.version ?? "(none)"}`);
  console.log(`  Commands:    ${formatList(commands)}`);
  console.log(`  Subcommands: ${formatList(subcommands)}`);
  return 0;
}
