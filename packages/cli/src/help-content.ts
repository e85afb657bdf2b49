/**
 * argwise help content
 * Dense reference for terminal output.
 */

export const QUICKREF = `
ARGWISE QUICK REFERENCE (v0.4)
==============================

DECLARING A CLI
  const cli = new Cli({ prog: "tool", help: "My tool", version: "1.0.0" })
  cli.command("greet", { name: arg() }, defineFunction({
    params: [{ name: "name", type: t.str }],
  }, ({ name }) => console.log(\`hi \${name}\`)))
  export default cli;  await runMain(cli)

ARG HINTS
  arg()                         positional
  arg("--name", "-n")           option with shorthand
  arg("--v", "-v", { count: true })   repeatable counter
  arg("--p", undefined, { help, converter })

EXECUTABLE
  argwise document <module> [--output docs.md]   Markdown docs
  argwise static <module> <out.json>             static snapshot
  argwise check <out.json>                       validate snapshot
  argwise help [topic]                           this reference

EXIT CODES: 0=ok  1=usage  2=invalid input  4=I/O

HELP TOPICS
  argwise help types
  argwise help converters
  argwise help static
  argwise help config
`.trimStart();

export const TOPICS: Record<string, string> = {

// --- TYPES -----------------------------------------------------------------
types: `
ARGWISE TYPES
=============

PRIMITIVES
  t.str  t.int  t.float  t.path  t.bool  t.none

COMPOSITES
  t.optional(T)            default null, resolves T
  t.union(A, B)            resolves A only
  t.literal("a", "b")      choices, converted by the value type
  t.enumOf("Color", Color) choices are member names
  t.list(T) t.iterable(T)  repeatable option, one value each
  t.generic("Box", T)      needs a registered converter
  t.named("Foo")           opaque, needs a converter
  t.newType("Id", t.str)   named alias

BOOLEANS
  bool params must be options: default false -> --flag,
  default true -> --flag / --no-flag
`.trimStart(),

// --- CONVERTERS ------------------------------------------------------------
converters: `
ARGWISE CONVERTERS
==================

LOOKUP ORDER
  1. arg(..., { converter })         per argument
  2. registry key: "Box[str]"        exact type string
  3. registry key: "Box"             generic origin

BUILTIN
  ExistingPath  ExistingFilePath  ExistingDirPath
  PathOrDash  ExistingFilePathOrDash  UUID  Union[str, UUID]
  getListConverter(convertInt, ",")  "1,2,3" -> [1, 2, 3]

REGISTERING
  new Cli({ converters: { Box: (raw) => new Box(raw) } })
`.trimStart(),

// --- STATIC ----------------------------------------------------------------
static: `
ARGWISE STATIC SNAPSHOTS
========================

  cli.toStatic("static.json")             or: argwise static mod.ts static.json
  StaticCli.load("static.json", { converters, debug })

  Commands of a static CLI do nothing; help, parsing and
  conversion behave like the live CLI.
  debug: true prints "===== STATIC =====" markers around run.
`.trimStart(),

// --- CONFIG ----------------------------------------------------------------
config: `
ARGWISE CONFIG
==============

FILES (first valid one wins)
  ./argwise.config.json
  ~/.argwise/config.json

FIELDS (defaults for "argwise document")
  title        document title
  description  text under the title
  comment      header comment, null to omit
  pathRoot     path defaults are shown relative to it
`.trimStart(),

};

export const TOPIC_LIST = Object.keys(TOPICS);
