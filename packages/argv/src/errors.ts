/**
 * Errors raised while matching an argument vector.
 */

export class ArgvError extends Error {
  code: string;

  constructor(message: string, code: string = "E_ARGV", options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ArgvError";
    this.code = code;
  }
}

/**
 * A token matched its argument but the argument's converter rejected it.
 * Kept apart from syntax errors so callers can tell the two apart.
 */
export class ArgvConversionError extends ArgvError {
  argument: string;
  converter: string;
  value: string;

  constructor(argument: string, converter: string, value: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(
      `argument ${argument}: error encountered in ${converter} for value: ${value}\n${detail}`,
      "E_ARGV_CONVERT",
      { cause }
    );
    this.name = "ArgvConversionError";
    this.argument = argument;
    this.converter = converter;
    this.value = value;
  }
}
