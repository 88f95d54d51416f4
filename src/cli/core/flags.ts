import { SiteScriptError } from "../../core/errors.js";
import type { WriteLine } from "../../core/logger.js";

export interface ParsedFlags {
  values: Record<string, string>;
}

export const makeCliError = (code: string, message: string): SiteScriptError => new SiteScriptError(code, message);

/** Parses `--name value` pairs. */
export const parseFlags = (args: string[]): ParsedFlags => {
  const values: Record<string, string> = {};
  for (let i = 0; i < args.length; i += 1) {
    const token = args[i];
    if (!token.startsWith("--")) {
      throw makeCliError("CLI_ARG_FORMAT", `Unexpected argument: ${token}`);
    }
    const name = token.slice(2);
    const value = args[i + 1];
    if (value === undefined || value.startsWith("--")) {
      throw makeCliError("CLI_ARG_MISSING", `Missing value for --${name}`);
    }
    values[name] = value;
    i += 1;
  }
  return { values };
};

export const getRequiredFlag = (flags: ParsedFlags, name: string): string => {
  const value = flags.values[name];
  if (value === undefined) {
    throw makeCliError("CLI_ARG_REQUIRED", `Missing required argument --${name}`);
  }
  return value;
};

export const emitError = (writeLine: WriteLine, error: unknown): number => {
  const code = error instanceof SiteScriptError ? error.code : "CLI_ERROR";
  const message = error instanceof Error ? error.message : "Unknown CLI error.";
  writeLine("RESULT:ERROR");
  writeLine(`ERROR_CODE:${code}`);
  writeLine(`ERROR_MSG_JSON:${JSON.stringify(message)}`);
  return 1;
};

export const defaultWriteLine: WriteLine = (line) => {
  process.stdout.write(`${line}\n`);
};
