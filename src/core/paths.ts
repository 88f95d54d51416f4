import path from "node:path";

import type { ExtensionKind } from "./types.js";

export const toPosixPath = (filePath: string): string => filePath.split(path.sep).join("/");

/** Virtual paths are posix, relative and lowercase; lookups accept any case. */
export const normalizeVirtualPath = (virtualPath: string): string => {
  return toPosixPath(virtualPath)
    .replace(/\\/g, "/")
    .replace(/^(\.\/|\/)+/, "")
    .replace(/\/{2,}/g, "/")
    .toLowerCase();
};

export const joinVirtualPath = (prefix: string, relativePath: string): string => {
  if (!prefix) {
    return normalizeVirtualPath(relativePath);
  }
  return normalizeVirtualPath(`${prefix}/${relativePath}`);
};

export const kindDirectory = (kind: ExtensionKind): string => `${kind}s`;

const stripExtension = (fileName: string): string => {
  const dot = fileName.lastIndexOf(".");
  return dot > 0 ? fileName.slice(0, dot) : fileName;
};

export const baseNameOf = (virtualPath: string): string => {
  const normalized = normalizeVirtualPath(virtualPath);
  const slash = normalized.lastIndexOf("/");
  return stripExtension(slash >= 0 ? normalized.slice(slash + 1) : normalized);
};

export const widgetIdFromPath = (virtualPath: string): string => baseNameOf(virtualPath);

export const defaultEntryName = (virtualPath: string): string => {
  if (normalizeVirtualPath(virtualPath).startsWith("widgets/")) {
    return "widget";
  }
  return baseNameOf(virtualPath);
};
