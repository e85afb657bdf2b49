/**
 * Text helpers shared by help output, the command overview and docs.
 */
import { UNSET } from "./types.js";

/** Joins the non-empty strings. */
export function joinStrings(...parts: Array<string | null | undefined>): string {
  return joinWith(" ", ...parts);
}

export function joinWith(separator: string, ...parts: Array<string | null | undefined>): string {
  return parts.filter((p): p is string => typeof p === "string" && p.length > 0).join(separator);
}

/** Two-column table, columns capped at 50 characters and separated by three spaces. */
export function formatTable(rows: ReadonlyArray<readonly [string, string]>): string {
  const widths = [0, 1].map((col) => Math.min(Math.max(0, ...rows.map((row) => row[col].length)), 50));
  const lines = rows.map((row) =>
    row
      .map((cell, col) => cell.padEnd(widths[col]))
      .join("   ")
      .trimEnd()
  );
  return "\n" + lines.join("\n") + "\n";
}

/**
 * Shortens a description for the command overview: text over the limit is
 * cut at its last sentence end, or at the last word with an ellipsis.
 */
export function formatArgHelp(text: string | null | undefined, maxWidth: number = 70): string {
  const trimmed = (text ?? "").trim();
  if (trimmed.length <= maxWidth) return trimmed;
  const head = trimmed.slice(0, maxWidth);
  const period = head.lastIndexOf(".");
  if (period > 0) return head.slice(0, period) + ".";
  const space = head.lastIndexOf(" ");
  return (space > 0 ? head.slice(0, space) : head) + "...";
}

/** Renders a default value for help text. */
export function formatValue(value: unknown): string {
  if (value === UNSET) return "";
  if (typeof value === "string") return value;
  if (value === null || value === undefined) return "null";
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return JSON.stringify(value);
}

/** Collapses runs of whitespace. */
export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}
