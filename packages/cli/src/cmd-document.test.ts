/**
 * Tests for argwise document.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import * as fs from "node:fs";
import * as path from "node:path";
import { runDocument } from "./cmd-document.js";
import { DEMO_CLI, NO_CLI, capture, withTmpDir } from "./test-helpers.js";

const GREET_TABLE = [
  "| Argument | Type | Description | Default |",
  "| --- | --- | --- | --- |",
  "| `name` | `str` | Who to greet |  |",
  "| `--shout`, `-s` | `bool` | Shout it | `false` |",
].join("\n");

function migrateTable(target: string): string {
  return [
    "| Argument | Type | Description | Default |",
    "| --- | --- | --- | --- |",
    `| \`--target\` | \`Path\` |  | \`${target}\` |`,
  ].join("\n");
}

describe("argwise document", () => {
  it("prints Markdown for the module's CLI", async () => {
    await withTmpDir("doc", async (dir) => {
      const { result, stdout, stderr } = await capture(() => runDocument(DEMO_CLI, { cwd: dir, homeDir: dir }));
      assert.equal(result, 0);
      assert.equal(stderr, "");
      const expected = [
        "<!-- This file is auto-generated -->",
        "# `demo`",
        "Demo tools.",
        "## `demo greet`",
        "Say hello.",
        GREET_TABLE,
        "## `demo db`",
        "Database commands",
        "### `demo db migrate`",
        "Run migrations.",
        migrateTable("/srv/demo/data"),
      ].join("\n\n");
      assert.equal(stdout, expected);
    });
  });

  it("takes defaults from the project config and lets options override them", async () => {
    await withTmpDir("doc", async (dir) => {
      fs.writeFileSync(
        path.join(dir, "argwise.config.json"),
        JSON.stringify({ title: "Config title", comment: "From config", pathRoot: "/srv/demo" })
      );
      const { result, stdout } = await capture(() =>
        runDocument(DEMO_CLI, { cwd: dir, homeDir: dir, title: "Demo docs" })
      );
      assert.equal(result, 0);
      const blocks = stdout.split("\n\n");
      assert.deepEqual(blocks.slice(0, 3), ["<!-- From config -->", "# Demo docs", "## `demo`"]);
      assert.equal(blocks[blocks.length - 1], migrateTable("data"));
    });
  });

  it("drops the header comment", async () => {
    await withTmpDir("doc", async (dir) => {
      const { stdout } = await capture(() => runDocument(DEMO_CLI, { cwd: dir, homeDir: dir, comment: false }));
      assert.equal(stdout.split("\n\n")[0], "# `demo`");
    });
  });

  it("writes the output file", async () => {
    await withTmpDir("doc", async (dir) => {
      const output = path.join(dir, "docs", "cli.md");
      const { result, stdout, stderr } = await capture(() =>
        runDocument(DEMO_CLI, { cwd: dir, homeDir: dir, output, description: "All commands." })
      );
      assert.equal(result, 0);
      assert.equal(stdout, "");
      assert.equal(stderr, `Wrote ${output}`);
      const written = fs.readFileSync(output, "utf-8");
      assert.ok(written.startsWith("<!-- This file is auto-generated -->\n\nAll commands.\n\n# `demo`\n\n"));
      assert.ok(written.endsWith(migrateTable("/srv/demo/data") + "\n"));
    });
  });

  it("returns 4 for a missing module", async () => {
    const missing = path.join(path.dirname(DEMO_CLI), "missing.ts");
    const { result, stderr } = await capture(() => runDocument(missing));
    assert.equal(result, 4);
    assert.equal(stderr, `Error loading module: Module not found: ${missing}`);
  });

  it("returns 2 for a module without a Cli", async () => {
    const { result, stderr } = await capture(() => runDocument(NO_CLI));
    assert.equal(result, 2);
    assert.equal(stderr, `Error loading module: Module ${NO_CLI} does not export a Cli as 'default' or 'cli'`);
  });
});
