import fs from "node:fs";

import { SaxesParser } from "saxes";

import { SiteScriptError } from "../core/errors.js";
import type { Vocation } from "../core/types.js";

export interface XmlLocation {
  line: number;
  column: number;
}

export interface XmlTextNode {
  kind: "text";
  value: string;
  location: XmlLocation;
}

export interface XmlElementNode {
  kind: "element";
  name: string;
  attributes: Record<string, string>;
  children: XmlNode[];
  location: XmlLocation;
}

export type XmlNode = XmlElementNode | XmlTextNode;

export interface XmlDocument {
  root: XmlElementNode;
}

const normalizeLoc = (line: number, column: number): XmlLocation => {
  return {
    line: Math.max(1, line),
    column: Math.max(1, column),
  };
};

export const parseXmlDocument = (source: string): XmlDocument => {
  const parser = new SaxesParser({ xmlns: false });
  const stack: XmlElementNode[] = [];
  let root: XmlElementNode | null = null;
  let parseErrorMessage: string | null = null;

  parser.on("error", (error) => {
    parseErrorMessage ??= error.message;
  });

  parser.on("opentag", (tag) => {
    stack.push({
      kind: "element",
      name: tag.name,
      attributes: Object.fromEntries(
        Object.entries(tag.attributes).map(([key, value]) => [key, String(value)])
      ),
      children: [],
      location: normalizeLoc(parser.line, parser.column),
    });
  });

  parser.on("text", (value) => {
    if (stack.length === 0 || value.trim().length === 0) {
      return;
    }
    stack[stack.length - 1].children.push({
      kind: "text",
      value,
      location: normalizeLoc(parser.line, parser.column),
    });
  });

  parser.on("closetag", () => {
    const node = stack.pop();
    if (!node) {
      return;
    }
    if (stack.length === 0) {
      root = node;
      return;
    }
    stack[stack.length - 1].children.push(node);
  });

  try {
    parser.write(source).close();
  } catch (error) {
    parseErrorMessage ??= error instanceof Error ? error.message : String(error);
  }

  if (parseErrorMessage) {
    throw new SiteScriptError("XML_PARSE_ERROR", parseErrorMessage);
  }
  if (!root) {
    throw new SiteScriptError("XML_EMPTY", "XML document has no root element.");
  }
  return { root };
};

const readIntAttr = (node: XmlElementNode, name: string, fallback?: number): number => {
  const raw = node.attributes[name];
  if (raw === undefined || raw === "") {
    if (fallback !== undefined) {
      return fallback;
    }
    throw new SiteScriptError(
      "XML_MISSING_ATTR",
      `Missing required attribute "${name}" on <${node.name}> at line ${node.location.line}.`
    );
  }
  const value = Number.parseInt(raw, 10);
  if (Number.isNaN(value)) {
    throw new SiteScriptError(
      "XML_INVALID_ATTR",
      `Attribute "${name}" on <${node.name}> at line ${node.location.line} must be an integer.`
    );
  }
  return value;
};

/** Reads the datapack vocation list (`<vocations><vocation id=".." name=".."/></vocations>`). */
export const loadVocations = (source: string): Vocation[] => {
  const { root } = parseXmlDocument(source);
  if (root.name !== "vocations") {
    throw new SiteScriptError("XML_UNEXPECTED_ROOT", `Expected <vocations> root, found <${root.name}>.`);
  }
  const vocations: Vocation[] = [];
  for (const child of root.children) {
    if (child.kind !== "element" || child.name !== "vocation") {
      continue;
    }
    const id = readIntAttr(child, "id");
    vocations.push({
      id,
      clientId: readIntAttr(child, "clientid", id),
      name: child.attributes.name ?? "",
      description: child.attributes.description ?? "",
      fromVocation: readIntAttr(child, "fromvoc", id),
    });
  }
  return vocations;
};

export const loadVocationsFile = (filePath: string): Vocation[] => {
  if (!fs.existsSync(filePath)) {
    throw new SiteScriptError("XML_FILE_NOT_FOUND", `Vocations file does not exist: ${filePath}`);
  }
  return loadVocations(fs.readFileSync(filePath, "utf8"));
};
