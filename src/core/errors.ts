import { types } from "node:util";

import type { ExtensionKind } from "./types.js";

export interface SiteScriptErrorOptions {
  cause?: unknown;
  details?: Record<string, unknown>;
}

/** Errors thrown inside a script context come from another realm, so `instanceof Error` misses them. */
export const describeCause = (cause: unknown): string => {
  if (types.isNativeError(cause)) {
    return cause.message;
  }
  return String(cause);
};

export class SiteScriptError extends Error {
  readonly code: string;
  readonly details?: Record<string, unknown>;

  constructor(code: string, message: string, options: SiteScriptErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "SiteScriptError";
    this.code = code;
    this.details = options.details;
  }
}

export class CompileError extends SiteScriptError {
  readonly virtualPath: string;
  readonly sourcePath: string;

  constructor(virtualPath: string, sourcePath: string, cause: unknown) {
    super("COMPILE_ERROR", `Cannot compile "${virtualPath}" (${sourcePath}): ${describeCause(cause)}`, {
      cause,
    });
    this.name = "CompileError";
    this.virtualPath = virtualPath;
    this.sourcePath = sourcePath;
  }
}

export class PoolColdStartError extends SiteScriptError {
  readonly virtualPath: string;

  constructor(virtualPath: string, cause: unknown) {
    super("POOL_COLD_START", `Cannot initialize "${virtualPath}": ${describeCause(cause)}`, { cause });
    this.name = "PoolColdStartError";
    this.virtualPath = virtualPath;
  }
}

export class BindingNotFoundError extends SiteScriptError {
  readonly entity: string;
  readonly key: string | number;

  constructor(entity: string, key: string | number) {
    super("BINDING_NOT_FOUND", `Cannot find ${entity} ${JSON.stringify(key)}`);
    this.name = "BindingNotFoundError";
    this.entity = entity;
    this.key = key;
  }
}

export type DataAccessReason = "query" | "disabled" | "row";

export class DataAccessError extends SiteScriptError {
  readonly reason: DataAccessReason;

  constructor(reason: DataAccessReason, message: string, cause?: unknown) {
    super("DATA_ACCESS", message, { cause });
    this.name = "DataAccessError";
    this.reason = reason;
  }
}

export class ArgumentTypeError extends SiteScriptError {
  readonly method: string;
  readonly position: number;

  constructor(method: string, position: number, expected: string, received: string) {
    super(
      "ARGUMENT_TYPE",
      `Invalid argument #${position} to ${method}: expected ${expected}, got ${received}`
    );
    this.name = "ArgumentTypeError";
    this.method = method;
    this.position = position;
  }
}

export class FieldNotAllowedError extends SiteScriptError {
  readonly table: string;
  readonly field: string;

  constructor(table: string, field: string) {
    super("FIELD_NOT_ALLOWED", `Field "${field}" is not accessible on table "${table}"`);
    this.name = "FieldNotAllowedError";
    this.table = table;
    this.field = field;
  }
}

export class ExtensionLoadError extends SiteScriptError {
  readonly extensionId: string;
  readonly kind: ExtensionKind;

  constructor(extensionId: string, kind: ExtensionKind, cause: unknown) {
    super("EXTENSION_LOAD", `extension: ${extensionId} ${describeCause(cause)}`, { cause });
    this.name = "ExtensionLoadError";
    this.extensionId = extensionId;
    this.kind = kind;
  }
}

export class DispatchTimeoutError extends SiteScriptError {
  readonly virtualPath: string;
  readonly timeoutMs: number;

  constructor(virtualPath: string, timeoutMs: number) {
    super("DISPATCH_TIMEOUT", `Script "${virtualPath}" did not finish within ${timeoutMs}ms`);
    this.name = "DispatchTimeoutError";
    this.virtualPath = virtualPath;
    this.timeoutMs = timeoutMs;
  }
}

export type ConfigErrorCode = "CONFIG_NOT_FOUND" | "CONFIG_PARSE" | "CONFIG_INVALID";

export class ConfigError extends SiteScriptError {
  constructor(code: ConfigErrorCode, message: string, cause?: unknown) {
    super(code, message, { cause });
    this.name = "ConfigError";
  }
}
