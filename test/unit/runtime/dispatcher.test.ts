import assert from "node:assert/strict";

import { test } from "vitest";

import { DispatchTimeoutError, PoolColdStartError, SiteScriptError } from "../../../src/core/errors.js";
import { plain } from "../../support/fixtures.js";
import { compileUnits, createTestRuntime } from "../../support/runtime.js";

const hasCode = (code: string) => (error: unknown) => error instanceof SiteScriptError && error.code === code;

test("run invokes the default entry and returns the instance", async () => {
  const { dispatcher, context } = createTestRuntime({
    "pages/index/get.js": "function get(http) { return { user: http.user, served: true }; }",
  });

  const result = await dispatcher.run("Pages/Index/Get.js", { user: "alice" });
  assert.equal(result.path, "pages/index/get.js");
  assert.equal(result.layer, "primary");
  assert.deepEqual(plain(result.value), { user: "alice", served: true });
  assert.equal(context.pool.activeCount, 0);
  assert.equal(context.pool.idleCount("pages/index/get.js"), 1);
});

test("run awaits async entries that use the database", async () => {
  const { dispatcher, db } = createTestRuntime({
    "pages/stats/get.js": 'async function get() { const rows = await db.query("SELECT 1 AS one"); return rows[0].one; }',
  });
  db.onQuery("SELECT 1 AS one", [{ one: 1 }]);

  const result = await dispatcher.run("pages/stats/get.js", {});
  assert.equal(result.value, 1);
});

test("run honours an explicit entry name", async () => {
  const { dispatcher } = createTestRuntime({
    "widgets/online.js": 'function widget() { return "list"; }\nfunction render() { return "card"; }',
  });
  assert.equal((await dispatcher.run("widgets/online.js", {})).value, "list");
  assert.equal((await dispatcher.run("widgets/online.js", {}, { entry: "render" })).value, "card");
});

test("script failures are wrapped and the instance is still checked in", async () => {
  const { dispatcher, context } = createTestRuntime({
    "pages/fail/get.js": 'function get() { throw new Error("kaput"); }',
  });

  await assert.rejects(
    dispatcher.run("pages/fail/get.js", {}),
    (error: unknown) =>
      error instanceof SiteScriptError &&
      error.code === "SCRIPT_FAILED" &&
      error.message === 'Script "pages/fail/get.js" failed: kaput' &&
      error.details?.entry === "get"
  );
  assert.equal(context.pool.activeCount, 0);
  assert.equal(context.pool.idleCount("pages/fail/get.js"), 1);
});

test("a top-level throw at cold start reaches the caller unchanged", async () => {
  const { dispatcher, context } = createTestRuntime({
    "pages/boom/get.js": 'throw new Error("no config");\nfunction get() { return 1; }',
  });

  await assert.rejects(
    dispatcher.run("pages/boom/get.js", {}),
    (error: unknown) =>
      error instanceof PoolColdStartError &&
      error.code === "POOL_COLD_START" &&
      error.virtualPath === "pages/boom/get.js" &&
      error.message === 'Cannot initialize "pages/boom/get.js": no config'
  );
  assert.equal(context.pool.activeCount, 0);
  assert.equal(context.pool.idleCount("pages/boom/get.js"), 0);
});

test("a timed out instance is discarded instead of returned", async () => {
  const { dispatcher, context, lines } = createTestRuntime({
    "pages/slow/get.js": "function get() { return new Promise(() => {}); }",
  });

  await assert.rejects(
    dispatcher.run("pages/slow/get.js", {}, { timeoutMs: 20 }),
    (error: unknown) => error instanceof DispatchTimeoutError && error.timeoutMs === 20
  );
  assert.equal(context.pool.activeCount, 0);
  assert.equal(context.pool.idleCount("pages/slow/get.js"), 0);
  assert.equal(lines.filter((line) => line.startsWith("[WARN] Discarding instance")).length, 1);
});

test("unknown paths and missing entries are reported", async () => {
  const { dispatcher, context } = createTestRuntime({
    "pages/odd.js": "function other() {}",
  });

  await assert.rejects(dispatcher.run("pages/missing.js", {}), hasCode("DISPATCH_PATH_NOT_FOUND"));
  await assert.rejects(dispatcher.run("pages/odd.js", {}), hasCode("DISPATCH_ENTRY_NOT_FOUND"));
  assert.equal(context.pool.idleCount("pages/odd.js"), 1);
});

test("run reports the extension layer when an override answers", async () => {
  const { dispatcher, context } = createTestRuntime({
    "pages/index/get.js": 'function get() { return "primary"; }',
  });
  context.registry.replaceExtensions(
    "page",
    compileUnits({ "pages/index/get.js": 'function get() { return "extension"; }' })
  );

  const result = await dispatcher.run("pages/index/get.js", {});
  assert.equal(result.layer, "extension");
  assert.equal(result.value, "extension");
});
