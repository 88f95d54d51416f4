import assert from "node:assert/strict";
import path from "node:path";

import { test } from "vitest";

import { runRunCommand } from "../../../../src/cli/commands/run.js";
import { silentLogger } from "../../../../src/core/logger.js";
import { makeTempDir, writeTree } from "../../../support/fixtures.js";

const makeSite = (): string => {
  const root = writeTree(makeTempDir("cli-run"), {
    "site.config.yaml": "siteRoot: .\n",
    "pages/index/get.js": "function get(http) { return { user: http.user }; }\nfunction head() { return null; }",
    "widgets/online.js": 'function widget() { return ["Alice"]; }',
  });
  return path.join(root, "site.config.yaml");
};

const runWithCapture = async (argv: string[]) => {
  const lines: string[] = [];
  const code = await runRunCommand(argv, { writeLine: (line) => lines.push(line), logger: silentLogger, env: {} });
  return { code, lines };
};

test("run dispatches one script and prints its value", async () => {
  const config = makeSite();
  const result = await runWithCapture([
    "--config",
    config,
    "--path",
    "Pages/Index/Get.js",
    "--context-json",
    '{"user":"alice"}',
  ]);
  assert.equal(result.code, 0);
  assert.deepEqual(result.lines, [
    "RESULT:OK",
    "PATH:pages/index/get.js",
    "LAYER:primary",
    'VALUE_JSON:{"user":"alice"}',
  ]);
});

test("run accepts an explicit entry and prints null for no value", async () => {
  const result = await runWithCapture(["--config", makeSite(), "--path", "pages/index/get.js", "--entry", "head"]);
  assert.equal(result.lines[3], "VALUE_JSON:null");
});

test("run reports bad input as errors", async () => {
  const config = makeSite();

  const badJson = await runWithCapture(["--config", config, "--path", "pages/index/get.js", "--context-json", "{"]);
  assert.equal(badJson.code, 1);
  assert.equal(badJson.lines[1], "ERROR_CODE:CLI_CONTEXT_JSON");

  const missingPath = await runWithCapture(["--config", config, "--path", "pages/nope.js"]);
  assert.equal(missingPath.lines[1], "ERROR_CODE:DISPATCH_PATH_NOT_FOUND");

  const missingConfig = await runWithCapture(["--config", path.join(path.dirname(config), "none.yaml"), "--path", "x"]);
  assert.equal(missingConfig.lines[1], "ERROR_CODE:CONFIG_NOT_FOUND");
});
