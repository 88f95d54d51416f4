import assert from "node:assert/strict";
import path from "node:path";

import { test } from "vitest";

import { loadConfig, loadWorldData, parseConfig } from "../../../src/config/config.js";
import { SiteScriptError } from "../../../src/core/errors.js";
import { makeTempDir, writeTree } from "../../support/fixtures.js";

const hasCode = (code: string) => (error: unknown) => error instanceof SiteScriptError && error.code === code;

test("an empty configuration takes every default", () => {
  const config = parseConfig("", { baseDir: "/srv/site", env: {} });
  assert.equal(config.siteRoot, "/srv/site");
  assert.equal(config.tablePrefix, "site");
  assert.equal(config.scriptExtension, ".js");
  assert.equal(config.logLevel, "info");
  assert.equal(config.database.url, undefined);
  assert.deepEqual(config.pool, { maxIdlePerPath: 0, idleTimeoutMs: 0 });
  assert.deepEqual(config.dispatch, { timeoutMs: 0 });
  assert.equal(config.world.vocationsFile, undefined);
  assert.deepEqual(config.world.towns, []);
});

test("relative paths resolve against the config directory", () => {
  const config = parseConfig(
    ["siteRoot: public", "world:", "  vocationsFile: data/vocations.xml"].join("\n"),
    { baseDir: "/srv/site", env: {} }
  );
  assert.equal(config.siteRoot, "/srv/site/public");
  assert.equal(config.world.vocationsFile, "/srv/site/data/vocations.xml");
});

test("database.url falls back to DATABASE_URL", () => {
  const env = { DATABASE_URL: "postgres://tester@localhost/site" };
  assert.equal(parseConfig("", { baseDir: "/srv", env }).database.url, "postgres://tester@localhost/site");
  assert.equal(
    parseConfig("database:\n  url: postgres://other@localhost/db", { baseDir: "/srv", env }).database.url,
    "postgres://other@localhost/db"
  );
});

test("invalid configurations are rejected with the offending path", () => {
  assert.throws(
    () => parseConfig("tablePrefix: Bad-Name", { baseDir: "/srv", env: {} }),
    (error: unknown) =>
      error instanceof SiteScriptError &&
      error.code === "CONFIG_INVALID" &&
      error.message === "Invalid configuration: tablePrefix: must be a lowercase SQL identifier"
  );
  assert.throws(() => parseConfig("extra: 1", { baseDir: "/srv", env: {} }), hasCode("CONFIG_INVALID"));
  assert.throws(() => parseConfig("pool:\n  maxIdlePerPath: -1", { baseDir: "/srv", env: {} }), hasCode("CONFIG_INVALID"));
  assert.throws(() => parseConfig("siteRoot: [unclosed", { baseDir: "/srv", env: {} }), hasCode("CONFIG_PARSE"));
});

test("loadConfig reads a file and loadWorldData loads vocations and towns", () => {
  const dir = writeTree(makeTempDir("config"), {
    "site.config.yaml": [
      "world:",
      "  vocationsFile: data/vocations.xml",
      "  towns:",
      "    - id: 1",
      "      name: Thais",
      "      templePosition: { x: 100, y: 200, z: 7 }",
      "    - id: 2",
      "      name: Carlin",
    ].join("\n"),
    "data/vocations.xml": '<vocations><vocation id="1" name="Sorcerer" /></vocations>',
  });

  const config = loadConfig(path.join(dir, "site.config.yaml"), {});
  assert.equal(config.siteRoot, dir);

  const world = loadWorldData(config);
  assert.deepEqual(world.vocations, [
    { id: 1, clientId: 1, name: "Sorcerer", description: "", fromVocation: 1 },
  ]);
  assert.deepEqual(world.towns, [
    { id: 1, name: "Thais", templePosition: { x: 100, y: 200, z: 7 } },
    { id: 2, name: "Carlin", templePosition: null },
  ]);

  assert.throws(() => loadConfig(path.join(dir, "missing.yaml")), hasCode("CONFIG_NOT_FOUND"));
});
