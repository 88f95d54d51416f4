import fs from "node:fs";
import path from "node:path";
import vm from "node:vm";

import { CompileError, SiteScriptError } from "../core/errors.js";
import { joinVirtualPath, normalizeVirtualPath, toPosixPath } from "../core/paths.js";

export const DEFAULT_SCRIPT_EXTENSION = ".js";

/**
 * Pre-parsed form of one script file. The wrapped `vm.Script` is not bound to
 * any context, so a single unit is shared read-only by every interpreter
 * instance that executes it.
 */
export interface CompiledUnit {
  readonly virtualPath: string;
  readonly sourcePath: string;
  readonly script: vm.Script;
}

export interface CompileAllOptions {
  prefix: string;
  extension?: string;
}

export const compileSource = (
  source: string,
  sourcePath: string,
  virtualPath: string
): CompiledUnit => {
  const normalizedPath = normalizeVirtualPath(virtualPath);
  let script: vm.Script;
  try {
    // lineOffset keeps stack traces aligned with the file once the pragma line is prepended.
    script = new vm.Script(`"use strict";\n${source}`, {
      filename: sourcePath,
      lineOffset: -1,
    });
  } catch (error) {
    throw new CompileError(normalizedPath, sourcePath, error);
  }
  return Object.freeze({ virtualPath: normalizedPath, sourcePath, script });
};

export const compileOne = (filePath: string, virtualPath: string = filePath): CompiledUnit => {
  let source: string;
  try {
    source = fs.readFileSync(filePath, "utf8");
  } catch (error) {
    throw new CompileError(normalizeVirtualPath(virtualPath), filePath, error);
  }
  return compileSource(source, filePath, virtualPath);
};

export const isDirectory = (dir: string): boolean => {
  try {
    return fs.statSync(dir).isDirectory();
  } catch {
    return false;
  }
};

export const listScriptFiles = (
  rootDir: string,
  extension: string = DEFAULT_SCRIPT_EXTENSION
): string[] => {
  const collectFiles = (relativeDir = ""): string[] => {
    const fullDir = relativeDir ? path.join(rootDir, relativeDir) : rootDir;
    const entries = fs.readdirSync(fullDir, { withFileTypes: true });
    entries.sort((a, b) => a.name.localeCompare(b.name));
    const collected: string[] = [];
    for (let i = 0; i < entries.length; i += 1) {
      const entry = entries[i];
      const relativePath = relativeDir ? path.join(relativeDir, entry.name) : entry.name;
      if (entry.isDirectory()) {
        collected.push(...collectFiles(relativePath));
        continue;
      }
      if (!entry.isFile()) {
        continue;
      }
      if (entry.name.endsWith(extension)) {
        collected.push(toPosixPath(relativePath));
      }
    }
    return collected;
  };

  return collectFiles().sort();
};

/**
 * Compiles every script below `rootDir` into a fresh map keyed by
 * `<prefix>/<relative path>`. The first failure aborts the walk; nothing
 * partial is returned.
 */
export const compileAll = (
  rootDir: string,
  options: CompileAllOptions
): Map<string, CompiledUnit> => {
  if (!isDirectory(rootDir)) {
    throw new SiteScriptError("COMPILE_ROOT_NOT_FOUND", `Script directory does not exist: ${rootDir}`);
  }
  const extension = options.extension ?? DEFAULT_SCRIPT_EXTENSION;
  const units = new Map<string, CompiledUnit>();
  for (const relativePath of listScriptFiles(rootDir, extension)) {
    const virtualPath = joinVirtualPath(options.prefix, relativePath);
    const fullPath = path.join(rootDir, ...relativePath.split("/"));
    units.set(virtualPath, compileOne(fullPath, virtualPath));
  }
  return units;
};
