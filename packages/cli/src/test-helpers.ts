/**
 * Shared helpers for the argwise command tests.
 */
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { fileURLToPath } from "node:url";

export const DEMO_CLI = fileURLToPath(new URL("./fixtures/demo-cli.ts", import.meta.url));
export const NO_CLI = fileURLToPath(new URL("./fixtures/no-cli.ts", import.meta.url));

export interface Captured<T> {
  result: T;
  stdout: string;
  stderr: string;
}

export async function capture<T>(run: () => Promise<T> | T): Promise<Captured<T>> {
  const out: string[] = [];
  const err: string[] = [];
  const origLog = console.log;
  const origError = console.error;
  console.log = (...args: unknown[]) => out.push(args.map(String).join(" "));
  console.error = (...args: unknown[]) => err.push(args.map(String).join(" "));

  try {
    const result = await run();
    return { result, stdout: out.join("\n"), stderr: err.join("\n") };
  } finally {
    console.log = origLog;
    console.error = origError;
  }
}

export function withTmpDir<T>(prefix: string, body: (dir: string) => Promise<T>): Promise<T> {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), `argwise-cli-${prefix}-`));
  return body(dir).finally(() => fs.rmSync(dir, { recursive: true, force: true }));
}
