import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import type { WorldData } from "../../src/core/types.js";
import type { Row } from "../../src/data/database.js";

export const makeTempDir = (name: string): string => fs.mkdtempSync(path.join(os.tmpdir(), `sitescript-${name}-`));

/** Writes `files` (relative posix path -> content) below `root`. */
export const writeTree = (root: string, files: Record<string, string>): string => {
  for (const [relativePath, content] of Object.entries(files)) {
    const fullPath = path.join(root, ...relativePath.split("/"));
    fs.mkdirSync(path.dirname(fullPath), { recursive: true });
    fs.writeFileSync(fullPath, content);
  }
  return root;
};

/** Values produced inside a script context carry that context's prototypes. */
export const plain = (value: unknown): unknown => JSON.parse(JSON.stringify(value));

export const playerRow = (overrides: Row = {}): Row => ({
  id: 1,
  name: "Alice",
  account_id: 10,
  level: 8,
  vocation: 1,
  health: 185,
  healthmax: 185,
  experience: 4200,
  maglevel: 3,
  mana: 90,
  manamax: 90,
  town_id: 1,
  sex: 0,
  cap: 470,
  lastlogin: 1700000000,
  balance: 500,
  ...overrides,
});

export const accountRow = (overrides: Row = {}): Row => ({
  id: 10,
  name: "alice-account",
  email: "alice@example.test",
  premium_ends_at: 0,
  creation: 1600000000,
  ...overrides,
});

export const testWorld = (): WorldData => ({
  vocations: [
    { id: 0, clientId: 0, name: "None", description: "none", fromVocation: 0 },
    { id: 1, clientId: 3, name: "Sorcerer", description: "a sorcerer", fromVocation: 1 },
  ],
  towns: [{ id: 1, name: "Thais", templePosition: { x: 100, y: 200, z: 7 } }],
});
