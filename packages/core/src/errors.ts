/**
 * Error types raised by the framework.
 *
 * Registration-time errors (unsupported types, invalid hints, duplicate
 * commands) are programming errors. CliParserError and CommandNotFoundError
 * surface from `run` and can be intercepted by the error handler table.
 */

export class CliError extends Error {
  code: string;

  constructor(message: string, code: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CliError";
    this.code = code;
  }
}

/** Invalid command-line input: bad values, missing or unknown arguments. */
export class CliParserError extends CliError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "E_PARSER", options);
    this.name = "CliParserError";
  }
}

export class UnsupportedTypeError extends CliError {
  arg: string;
  annotation: string;

  constructor(arg: string, annotation: string) {
    super(`Unsupported type for '${arg}': ${annotation}`, "E_UNSUPPORTED_TYPE");
    this.name = "UnsupportedTypeError";
    this.arg = arg;
    this.annotation = annotation;
  }
}

export class InvalidArgumentError extends CliError {
  id: string;

  constructor(id: string, detail: string) {
    super(`Invalid argument '${id}': ${detail}`, "E_INVALID_ARG");
    this.name = "InvalidArgumentError";
    this.id = id;
  }
}

export class CommandNotFoundError extends CliError {
  command: string;
  available: string[];

  constructor(command: string, available: string[]) {
    super(`Can't find command '${command}'. Available: ${available.join(", ")}`, "E_COMMAND_NOT_FOUND");
    this.name = "CommandNotFoundError";
    this.command = command;
    this.available = available;
  }
}

export class CommandExistsError extends CliError {
  command: string;

  constructor(command: string) {
    super(`Command '${command}' already exists`, "E_COMMAND_EXISTS");
    this.name = "CommandExistsError";
    this.command = command;
  }
}

/** A hint names a parameter the command function does not declare. */
export class ParserConfigError extends CliError {
  constructor(message: string) {
    super(message, "E_PARSER_CONFIG");
    this.name = "ParserConfigError";
  }
}

/**
 * Control-flow signal for help and version output. Not an error condition:
 * `run` prints the output and resolves to the exit code.
 */
export class CliExit extends Error {
  output: string;
  exitCode: number;

  constructor(output: string, exitCode: number = 0) {
    super(`exit ${exitCode}`);
    this.name = "CliExit";
    this.output = output;
    this.exitCode = exitCode;
  }
}
