import { DEFAULT_SCRIPT_EXTENSION } from "../../compiler/compiler.js";
import { compilePrimaryTrees } from "../../api.js";
import { createLogger, type WriteLine } from "../../core/logger.js";
import { defaultWriteLine, emitError, getRequiredFlag, parseFlags } from "../core/flags.js";

/**
 * `check --root <dir> [--extension .js]`: compiles the primary trees of a site
 * and lists the virtual paths that would be published.
 */
export const runCheckCommand = (argv: string[], writeLine: WriteLine = defaultWriteLine): number => {
  try {
    const flags = parseFlags(argv);
    const root = getRequiredFlag(flags, "root");
    const extension = flags.values.extension ?? DEFAULT_SCRIPT_EXTENSION;
    const logger = createLogger({ level: "warn", timestamps: false });
    const registry = compilePrimaryTrees(root, extension, logger);

    writeLine("RESULT:OK");
    writeLine(`UNITS:${registry.size}`);
    for (const virtualPath of registry.paths()) {
      writeLine(`UNIT:${virtualPath}`);
    }
    return 0;
  } catch (error) {
    return emitError(writeLine, error);
  }
};
