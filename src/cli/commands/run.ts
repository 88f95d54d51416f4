import { createSiteRuntimeFromConfig } from "../../api.js";
import { createLogger, type Logger, type WriteLine } from "../../core/logger.js";
import { defaultWriteLine, emitError, getRequiredFlag, makeCliError, parseFlags } from "../core/flags.js";

export interface RunCommandOptions {
  writeLine?: WriteLine;
  logger?: Logger;
  env?: NodeJS.ProcessEnv;
}

const parseContextJson = (raw: string | undefined): unknown => {
  if (raw === undefined) {
    return {};
  }
  try {
    return JSON.parse(raw);
  } catch {
    throw makeCliError("CLI_CONTEXT_JSON", `--context-json is not valid JSON: ${raw}`);
  }
};

/**
 * `run --config <file> --path <virtual path> [--entry <name>] [--context-json <json>]`
 */
export const runRunCommand = async (argv: string[], options: RunCommandOptions = {}): Promise<number> => {
  const writeLine = options.writeLine ?? defaultWriteLine;
  try {
    const flags = parseFlags(argv);
    const configPath = getRequiredFlag(flags, "config");
    const virtualPath = getRequiredFlag(flags, "path");
    const context = parseContextJson(flags.values["context-json"]);

    const runtime = await createSiteRuntimeFromConfig(configPath, {
      logger: options.logger ?? createLogger({ level: "warn", timestamps: false }),
      env: options.env,
    });
    try {
      const result = await runtime.run(virtualPath, context, { entry: flags.values.entry });
      writeLine("RESULT:OK");
      writeLine(`PATH:${result.path}`);
      writeLine(`LAYER:${result.layer}`);
      writeLine(`VALUE_JSON:${JSON.stringify(result.value ?? null)}`);
      return 0;
    } finally {
      await runtime.close();
    }
  } catch (error) {
    return emitError(writeLine, error);
  }
};
