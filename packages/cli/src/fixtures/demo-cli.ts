/**
 * Small CLI module loaded by the argwise command tests.
 */
import { Cli, arg, defineFunction, t } from "@argwise/core";

const cli = new Cli({ prog: "demo", help: "Demo tools.", version: "1.2.0" });

cli.command(
  "greet",
  {
    name: arg(undefined, undefined, { help: "Who to greet" }),
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
    ({ name }) => {
      console.log(`hello ${String(name)}`);
    }
  )
);

cli.placeholder("db", { description: "Database commands" });

cli.subcommand(
  "db",
  "migrate",
  { target: arg("--target") },
  defineFunction(
    {
      description: "Run migrations.",
      params: [{ name: "target", type: t.path, default: "/srv/demo/data" }],
    },
    () => {}
  )
);

export default cli;
