/**
 * Tests for command registration, parsing and dispatch.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import { Cli, SUBCOMMAND_KEY } from "./cli.js";
import { Command, defineFunction } from "./command.js";
import type { CommandValues } from "./command.js";
import { arg } from "./resolver.js";
import { t, UNSET } from "./types.js";
import {
  CliParserError,
  CommandExistsError,
  CommandNotFoundError,
  ParserConfigError,
} from "./errors.js";

enum Color {
  Red = "red",
  Green = "green",
}

function noop(): void {}

function commandOf(cli: Cli, name: string): Command {
  const command = cli.commands.get(name);
  assert.ok(command);
  return command;
}

function parserError(message: string): (err: unknown) => boolean {
  return (err: unknown) => err instanceof CliParserError && err.message === message;
}

async function captureRun(
  run: () => Promise<number>
): Promise<{ code: number; stdout: string; stderr: string }> {
  const out: string[] = [];
  const err: string[] = [];
  const origLog = console.log;
  const origError = console.error;
  console.log = (...args: unknown[]) => out.push(args.map(String).join(" "));
  console.error = (...args: unknown[]) => err.push(args.map(String).join(" "));

  try {
    const code = await run();
    return { code, stdout: out.join("\n"), stderr: err.join("\n") };
  } finally {
    console.log = origLog;
    console.error = origError;
  }
}

function greetCli(calls: CommandValues[] = []): Cli {
  const cli = new Cli({ prog: "demo", help: "Demo CLI" });
  cli.command(
    "greet",
    {
      name: arg(undefined, undefined, { help: "Name" }),
      shout: arg("--shout", "-s", { help: "Shout it" }),
    },
    defineFunction(
      {
        description: "Say hello.",
        params: [
          { name: "name", type: t.str },
          { name: "shout", type: t.bool, default: false },
        ],
      },
      (values) => {
        calls.push(values);
      }
    )
  );
  cli.command(
    "build",
    { tag: arg("--tag") },
    defineFunction(
      { description: "Build the project.", params: [{ name: "tag", type: t.list(t.str), default: [] }] },
      (values) => {
        calls.push(values);
      }
    )
  );
  return cli;
}

describe("Cli.parse", () => {
  it("parses the greet command", () => {
    const cli = greetCli();
    const greet = commandOf(cli, "greet");
    assert.deepEqual(cli.parse(["Ada", "--shout"], greet), { name: "Ada", shout: true });
    assert.deepEqual(cli.parse(["Ada"], greet), { name: "Ada", shout: false });
    assert.deepEqual(cli.parse(["-s", "Ada"], greet), { name: "Ada", shout: true });
  });

  it("names a missing positional as required", () => {
    const cli = greetCli();
    assert.throws(
      () => cli.parse(["--shout"], commandOf(cli, "greet")),
      parserError("the following arguments are required: name")
    );
  });

  it("keeps repeated options in order", () => {
    const cli = greetCli();
    assert.deepEqual(cli.parse(["--tag", "a", "--tag", "b"], commandOf(cli, "build")), { tag: ["a", "b"] });
    assert.deepEqual(cli.parse([], commandOf(cli, "build")), { tag: [] });
  });

  it("uses defaults for options that were not given", () => {
    const cli = new Cli();
    cli.command(
      "test",
      { b: arg("--b") },
      defineFunction({ params: [{ name: "a" }, { name: "b", default: "yo" }] }, noop)
    );
    const test = commandOf(cli, "test");
    assert.throws(() => cli.parse(["--b", "x"], test), parserError("the following arguments are required: a"));
    assert.deepEqual(cli.parse(["hello"], test), { a: "hello", b: "yo" });
  });

  it("converts typed values", () => {
    const cli = new Cli();
    cli.command(
      "test",
      { b: arg("--b", "-B"), c: arg("--c") },
      defineFunction(
        {
          params: [
            { name: "a", type: t.int },
            { name: "b", type: t.float },
            { name: "c", type: t.optional(t.int) },
          ],
        },
        noop
      )
    );
    assert.deepEqual(cli.parse(["1", "-B", "2.5"], commandOf(cli, "test")), { a: 1, b: 2.5, c: null });
  });

  it("reports conversion failures with the argument, converter and value", () => {
    const cli = new Cli();
    cli.command("test", { n: arg("--n") }, defineFunction({ params: [{ name: "n", type: t.int }] }, noop));
    assert.throws(
      () => cli.parse(["--n", "x"], commandOf(cli, "test")),
      parserError("argument --n: error encountered in int for value: x\ninvalid int value: 'x'")
    );
  });

  it("rejects integers outside the safe range", () => {
    const cli = new Cli();
    cli.command("test", { n: arg("--n") }, defineFunction({ params: [{ name: "n", type: t.int }] }, noop));
    assert.throws(
      () => cli.parse(["--n", "9007199254740993"], commandOf(cli, "test")),
      parserError(
        "argument --n: error encountered in int for value: 9007199254740993\ninvalid int value: '9007199254740993'"
      )
    );
  });

  it("matches numeric literal choices after conversion", () => {
    const cli = new Cli();
    cli.command("test", { n: arg("--n") }, defineFunction({ params: [{ name: "n", type: t.literal(1, 2) }] }, noop));
    const test = commandOf(cli, "test");
    assert.deepEqual(cli.parse(["--n", "01"], test), { n: 1 });
    assert.deepEqual(cli.parse(["--n", "2"], test), { n: 2 });
    assert.throws(
      () => cli.parse(["--n", "3"], test),
      parserError("argument --n: invalid choice: '3' (choose from 1, 2)")
    );
  });

  it("rejects enum names outside the members", () => {
    const cli = new Cli();
    cli.command(
      "paint",
      { color: arg("--color") },
      defineFunction({ params: [{ name: "color", type: t.enumOf("Color", Color) }] }, noop)
    );
    const paint = commandOf(cli, "paint");
    assert.deepEqual(cli.parse(["--color", "Green"], paint), { color: Color.Green });
    assert.throws(
      () => cli.parse(["--color", "Blue"], paint),
      parserError("argument --color: invalid choice: 'Blue' (choose from 'Red', 'Green')")
    );
  });

  it("rejects unrecognized arguments", () => {
    const cli = greetCli();
    assert.throws(
      () => cli.parse(["Ada", "--loud", "x"], commandOf(cli, "greet")),
      parserError("unrecognized arguments: --loud x")
    );
  });

  it("delivers extra arguments under the extra key", () => {
    const cli = new Cli();
    cli.commandWithExtra(
      "test",
      {},
      defineFunction({ params: [{ name: "a" }, { name: "_extra", type: t.list(t.str) }] }, noop)
    );
    assert.deepEqual(cli.parse(["x", "--foo", "bar"], commandOf(cli, "test")), {
      a: "x",
      _extra: ["--foo", "bar"],
    });
  });

  it("leaves missing values unset when partial results are allowed", () => {
    const cli = greetCli();
    const values = cli.parse([], commandOf(cli, "greet"), undefined, { allowPartial: true });
    assert.equal(values["name"], UNSET);
    assert.equal(values["shout"], false);
  });

  it("leaves unset values out without filled defaults", () => {
    const cli = new Cli({ fillDefaults: false });
    cli.command(
      "task",
      { b: arg("--b"), c: arg("--c") },
      defineFunction(
        { params: [{ name: "a" }, { name: "b", default: "yo" }, { name: "c", type: t.int }] },
        noop
      )
    );
    const task = commandOf(cli, "task");
    assert.deepEqual(cli.parse(["x", "--c", "1"], task), { a: "x", c: 1 });
    assert.throws(() => cli.parse(["x"], task), parserError("the following arguments are required: --c"));
    const help = cli.formatHelp(task).split("\n");
    assert.equal(help[0], "usage: task [-h] [--b B] --c C a");
    assert.ok(help.includes("  --b B" + " ".repeat(7) + "(str) (default: yo)"));
  });

  it("returns the chosen subcommand under the marker key", () => {
    const cli = new Cli();
    cli.placeholder("db");
    cli.subcommand(
      "db",
      "migrate",
      { target: arg("--target") },
      defineFunction({ params: [{ name: "target", default: "head" }] }, noop)
    );
    const values = cli.parse(["migrate", "--target", "v2"], commandOf(cli, "db"), cli.subcommands.get("db"));
    assert.deepEqual(values, { target: "v2", [SUBCOMMAND_KEY]: "migrate" });
  });
});

describe("Cli registration", () => {
  it("rejects duplicate commands", () => {
    const cli = greetCli();
    const fn = defineFunction({ params: [] }, noop);
    assert.throws(() => cli.command("greet", {}, fn), CommandExistsError);
    cli.subcommand("greet", "child", {}, fn);
    assert.throws(
      () => cli.subcommand("greet", "child", {}, fn),
      (err: unknown) => err instanceof CommandExistsError && err.message === "Command 'child' already exists"
    );
    assert.throws(() => cli.placeholder("build"), CommandExistsError);
  });

  it("rejects hints for undeclared parameters", () => {
    const cli = new Cli();
    assert.throws(
      () => cli.subcommand("db", "migrate", { c: arg("--c") }, defineFunction({ params: [{ name: "a" }] }, noop)),
      (err: unknown) =>
        err instanceof ParserConfigError && err.message === "argument not found in function for 'db migrate': c"
    );
  });

  it("keeps the declared parameter order", () => {
    const cli = new Cli();
    cli.command(
      "test",
      { c: arg("--c"), a: arg("--a") },
      defineFunction({ params: [{ name: "a" }, { name: "b" }, { name: "c" }] }, noop)
    );
    assert.deepEqual(
      commandOf(cli, "test").args.map((a) => a.id),
      ["a", "b", "c"]
    );
  });
});

describe("Cli.run", () => {
  it("dispatches to the matched command", async () => {
    const calls: CommandValues[] = [];
    const cli = greetCli(calls);
    const result = await captureRun(() => cli.run(["greet", "Ada", "--shout"]));
    assert.equal(result.code, 0);
    assert.deepEqual(calls, [{ name: "Ada", shout: true }]);
  });

  it("dispatches subcommands to their own function only", async () => {
    const calls: string[] = [];
    const cli = new Cli();
    cli.command("parent", {}, defineFunction({ params: [] }, () => {
      calls.push("parent");
    }));
    cli.subcommand("parent", "child", { x: arg("--x") }, defineFunction({ params: [{ name: "x", type: t.int }] }, (values) => {
      calls.push(`child:${String(values["x"])}`);
    }));
    cli.command("other", {}, defineFunction({ params: [] }, noop));

    assert.equal(await cli.run(["parent", "child", "--x", "1"]), 0);
    assert.deepEqual(calls, ["child:1"]);
    await assert.rejects(
      cli.run(["child", "--x", "1"]),
      (err: unknown) =>
        err instanceof CommandNotFoundError && err.message === "Can't find command 'child'. Available: parent, other"
    );
  });

  it("runs single-command CLIs without the command name", async () => {
    const calls: CommandValues[] = [];
    const cli = new Cli();
    cli.command("greet", {}, defineFunction({ params: [{ name: "name" }] }, (values) => {
      calls.push(values);
    }));
    assert.equal(await cli.run(["Ada"]), 0);
    assert.equal(await cli.run(["greet", "Bob"]), 0);
    assert.deepEqual(calls, [{ name: "Ada" }, { name: "Bob" }]);
  });

  it("awaits async command functions", async () => {
    const calls: string[] = [];
    const cli = new Cli();
    cli.command("wait", {}, defineFunction({ params: [] }, async () => {
      await Promise.resolve();
      calls.push("done");
    }));
    assert.equal(await cli.run(["wait"]), 0);
    assert.deepEqual(calls, ["done"]);
  });

  it("prints the command overview", async () => {
    const cli = greetCli();
    for (const argv of [[], ["--help"]]) {
      const result = await captureRun(() => cli.run(argv));
      assert.equal(result.code, 0);
      assert.equal(
        result.stdout,
        "Demo CLI\n\nAvailable commands:\n\n  greet   Say hello.\n  build   Build the project.\n"
      );
    }
  });

  it("lists subcommands in the overview", () => {
    const cli = new Cli();
    cli.command("a", {}, defineFunction({ description: "First.", params: [] }, noop));
    cli.subcommand("a", "x", {}, defineFunction({ params: [] }, noop));
    cli.subcommand("b", "y", {}, defineFunction({ params: [] }, noop));
    assert.equal(
      cli.formatInfo(),
      "\nAvailable commands:\n\n  a   First.\n      Subcommands: x\n  b   Subcommands: y\n"
    );
  });

  it("prints command help", async () => {
    const cli = greetCli();
    const result = await captureRun(() => cli.run(["greet", "--help"]));
    assert.equal(result.code, 0);
    assert.equal(
      result.stdout,
      [
        "usage: demo greet [-h] [--shout] name",
        "",
        "Say hello.",
        "",
        "positional arguments:",
        "  name  Name (str)",
        "",
        "options:",
        "  -h, --help   show this help message and exit",
        "  --shout, -s  Shout it (bool)",
      ].join("\n")
    );
  });

  it("prints the version", async () => {
    const cli = new Cli({ version: "1.2.3" });
    cli.command("a", {}, defineFunction({ params: [] }, noop));
    cli.command("b", {}, defineFunction({ params: [] }, noop));
    const result = await captureRun(() => cli.run(["--version"]));
    assert.equal(result.code, 0);
    assert.equal(result.stdout, "1.2.3");
    const single = new Cli({ version: "2.0.0" });
    single.command("a", {}, defineFunction({ params: [] }, noop));
    assert.equal((await captureRun(() => single.run(["--version"]))).stdout, "2.0.0");
  });

  it("shows subcommand help for placeholders", async () => {
    const cli = new Cli();
    cli.placeholder("db", { description: "Database commands" });
    cli.subcommand("db", "migrate", {}, defineFunction({ description: "Run migrations.", params: [] }, noop));
    const result = await captureRun(() => cli.run(["db"]));
    assert.equal(result.code, 0);
    assert.equal(
      result.stdout,
      [
        "usage: db [-h] {migrate} ...",
        "",
        "Database commands",
        "",
        "options:",
        "  -h, --help  show this help message and exit",
        "",
        "subcommands:",
        "  migrate  Run migrations.",
      ].join("\n")
    );
  });

  it("adds a placeholder for subcommand groups without a parent", async () => {
    const calls: string[] = [];
    const cli = new Cli();
    cli.command("other", {}, defineFunction({ params: [] }, noop));
    cli.command("more", {}, defineFunction({ params: [] }, noop));
    cli.subcommand("db", "migrate", {}, defineFunction({ params: [] }, () => {
      calls.push("migrate");
    }));
    assert.equal(await cli.run(["db", "migrate"]), 0);
    assert.deepEqual(calls, ["migrate"]);
    assert.equal(commandOf(cli, "db").isPlaceholder, true);
    await assert.rejects(cli.run(["db", "nope"]), parserError("invalid subcommand: 'nope'"));
  });

  it("routes errors to the handler of the nearest ancestor class", async () => {
    class CustomError extends Error {}
    class SpecificError extends CustomError {}
    const seen: string[] = [];
    const cli = new Cli({
      errors: [
        [Error, () => 9],
        [
          CustomError,
          (e) => {
            seen.push(e.message);
            return 3;
          },
        ],
      ],
    });
    cli.command("fail", {}, defineFunction({ params: [] }, () => {
      throw new SpecificError("boom");
    }));
    assert.equal(await cli.run(["fail"]), 3);
    assert.deepEqual(seen, ["boom"]);
  });

  it("lets handlers intercept parser errors", async () => {
    const messages: string[] = [];
    const cli = new Cli({
      errors: [
        [
          CliParserError,
          (e) => {
            messages.push(e.message);
          },
        ],
      ],
    });
    cli.command("test", {}, defineFunction({ params: [{ name: "a" }] }, noop));
    assert.equal(await cli.run(["test"]), 0);
    assert.deepEqual(messages, ["the following arguments are required: a"]);
  });

  it("propagates errors without a handler", async () => {
    const cli = new Cli();
    cli.command("fail", {}, defineFunction({ params: [] }, () => {
      throw new RangeError("out of range");
    }));
    await assert.rejects(cli.run(["fail"]), RangeError);
  });

  it("calls a single command directly", async () => {
    const calls: CommandValues[] = [];
    const cli = greetCli(calls);
    const greet = commandOf(cli, "greet");
    assert.equal(await cli.call(greet, ["Ada"]), 0);
    assert.deepEqual(calls, [{ name: "Ada", shout: false }]);
    const result = await captureRun(() => cli.call(greet, ["--help"]));
    assert.equal(result.stdout.split("\n")[0], "usage: demo [-h] [--shout] name");
  });
});
