import fs from "node:fs";
import path from "node:path";

import { parse } from "yaml";
import { z } from "zod";

import { loadVocationsFile } from "../compiler/xml.js";
import { ConfigError } from "../core/errors.js";
import type { WorldData } from "../core/types.js";

const TownSchema = z.object({
  id: z.number().int(),
  name: z.string().min(1),
  templePosition: z
    .object({ x: z.number().int(), y: z.number().int(), z: z.number().int() })
    .nullable()
    .default(null),
});

export const SiteConfigSchema = z
  .object({
    siteRoot: z.string().min(1).default("."),
    tablePrefix: z
      .string()
      .regex(/^[a-z_][a-z0-9_]*$/, "must be a lowercase SQL identifier")
      .default("site"),
    scriptExtension: z
      .string()
      .regex(/^\.[A-Za-z0-9]+$/, "must look like .js")
      .default(".js"),
    logLevel: z.enum(["debug", "info", "warn", "error"]).default("info"),
    database: z
      .object({
        url: z.string().min(1).optional(),
      })
      .strict()
      .default({}),
    pool: z
      .object({
        maxIdlePerPath: z.number().int().min(0).default(0),
        idleTimeoutMs: z.number().int().min(0).default(0),
      })
      .strict()
      .default({}),
    dispatch: z
      .object({
        timeoutMs: z.number().int().min(0).default(0),
      })
      .strict()
      .default({}),
    world: z
      .object({
        vocationsFile: z.string().min(1).optional(),
        towns: z.array(TownSchema).default([]),
      })
      .strict()
      .default({}),
  })
  .strict();

export type SiteConfig = z.infer<typeof SiteConfigSchema>;

export interface ParseConfigOptions {
  /** Directory relative paths are resolved against. */
  baseDir: string;
  env?: NodeJS.ProcessEnv;
}

export const parseConfig = (source: string, options: ParseConfigOptions): SiteConfig => {
  let raw: unknown;
  try {
    raw = parse(source);
  } catch (error) {
    throw new ConfigError("CONFIG_PARSE", `Configuration is not valid YAML: ${String(error)}`, error);
  }
  const result = SiteConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError("CONFIG_INVALID", `Invalid configuration: ${details}`, result.error);
  }

  const config = result.data;
  const env = options.env ?? process.env;
  const siteRoot = path.resolve(options.baseDir, config.siteRoot);
  return {
    ...config,
    siteRoot,
    database: { url: config.database.url ?? env.DATABASE_URL },
    world: {
      ...config.world,
      vocationsFile: config.world.vocationsFile
        ? path.resolve(options.baseDir, config.world.vocationsFile)
        : undefined,
    },
  };
};

export const loadConfig = (configPath: string, env?: NodeJS.ProcessEnv): SiteConfig => {
  const resolved = path.resolve(configPath);
  if (!fs.existsSync(resolved)) {
    throw new ConfigError("CONFIG_NOT_FOUND", `Configuration file does not exist: ${resolved}`);
  }
  return parseConfig(fs.readFileSync(resolved, "utf8"), { baseDir: path.dirname(resolved), env });
};

export const loadWorldData = (config: SiteConfig): WorldData => {
  return {
    vocations: config.world.vocationsFile ? loadVocationsFile(config.world.vocationsFile) : [],
    towns: config.world.towns.map((town) => ({
      ...town,
      templePosition: town.templePosition ? { ...town.templePosition } : null,
    })),
  };
};
