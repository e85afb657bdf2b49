#!/usr/bin/env -S node --import tsx
/**
 * argwise - tooling for argwise CLIs
 */
import * as fs from "node:fs";
import { Command } from "commander";
import { z } from "zod";
import { runDocument } from "./cmd-document.js";
import { runStatic } from "./cmd-static.js";
import { runCheck } from "./cmd-check.js";
import { runHelp, QUICKREF } from "./cmd-help.js";

const pkg = z
  .object({ version: z.string() })
  .parse(JSON.parse(fs.readFileSync(new URL("../package.json", import.meta.url), "utf-8")));

const program = new Command();

program
  .name("argwise")
  .description("argwise: document, snapshot and check declarative CLIs")
  .version(pkg.version)
  .addHelpText("after", "\n" + QUICKREF);

program
  .command("document")
  .description("Render Markdown documentation for a CLI module")
  .argument("<module>", "Module exporting a Cli as 'default' or 'cli'")
  .option("--title <title>", "Document title")
  .option("--description <text>", "Text below the title")
  .option("--comment <text>", "Header comment")
  .option("--no-comment", "Leave out the header comment")
  .option("--path-root <dir>", "Show path defaults relative to this directory")
  .option("-o, --output <path>", "Write to a file instead of stdout")
  .action(
    async (
      module: string,
      opts: { title?: string; description?: string; comment?: string | false; pathRoot?: string; output?: string }
    ) => {
      const code = await runDocument(module, opts);
      process.exit(code);
    }
  );

program
  .command("static")
  .description("Write the static snapshot of a CLI module")
  .argument("<module>", "Module exporting a Cli as 'default' or 'cli'")
  .argument("<output>", "Snapshot JSON file to write")
  .action(async (module: string, output: string) => {
    const code = await runStatic(module, output);
    process.exit(code);
  });

program
  .command("check")
  .description("Validate a static snapshot")
  .argument("<snapshot>", "Snapshot JSON file")
  .option("--json", "Output as JSON", false)
  .action(async (snapshot: string, opts: { json?: boolean }) => {
    const code = await runCheck(snapshot, opts);
    process.exit(code);
  });

program
  .command("help")
  .description("Reference - run 'argwise help <topic>' for details")
  .argument("[topic]", "Topic: types, converters, static, config")
  .action((topic: string | undefined) => {
    runHelp(topic);
  });

// Reject unknown commands before Commander parses (prevents --help from masking exit code)
const knownCommands = new Set(["document", "static", "check", "help"]);
const userArgs = process.argv.slice(2);
const firstPositional = userArgs.find((a) => !a.startsWith("-"));
if (firstPositional && !knownCommands.has(firstPositional)) {
  console.error(`Unknown command: ${firstPositional}`);
  process.exit(1);
}

await program.parseAsync();
