import assert from "node:assert/strict";

import { test } from "vitest";

import { compileSource, type CompiledUnit } from "../../../src/compiler/compiler.js";
import { PoolColdStartError, SiteScriptError } from "../../../src/core/errors.js";
import { InterpreterInstance } from "../../../src/runtime/instance.js";
import { StatePool, type StatePoolOptions } from "../../../src/runtime/pool.js";

const COUNTER_SOURCE = "let calls = 0;\nfunction hit() { calls += 1; return calls; }";

const counterUnit = (): CompiledUnit => compileSource(COUNTER_SOURCE, "/site/pages/counter.js", "pages/counter.js");

const makePool = (options: Partial<StatePoolOptions> = {}) => {
  const created: InterpreterInstance[] = [];
  const pool = new StatePool({
    createInstance: (unit) => {
      const instance = new InterpreterInstance(unit, () => ({}));
      created.push(instance);
      return instance;
    },
    ...options,
  });
  return { pool, created };
};

const hit = (instance: InterpreterInstance): unknown => {
  const entry = instance.entry("hit");
  assert.ok(entry, "hit() should be defined");
  return entry();
};

const hasCode = (code: string) => (error: unknown) => error instanceof SiteScriptError && error.code === code;

test("checkout after checkin reuses the warmed instance", () => {
  const { pool, created } = makePool();
  const unit = counterUnit();

  const first = pool.checkout("pages/counter.js", unit);
  assert.equal(hit(first), 1);
  pool.checkin(first, "pages/counter.js");

  const second = pool.checkout("pages/counter.js", unit);
  assert.equal(second, first);
  assert.equal(hit(second), 2);
  assert.equal(created.length, 1);
});

test("paths differing only in case share one bucket", () => {
  const { pool } = makePool();
  const unit = counterUnit();

  const instance = pool.checkout("Pages/Counter.js", unit);
  pool.checkin(instance, "pages/counter.js");
  assert.equal(pool.idleCount("PAGES/COUNTER.JS"), 1);
  assert.equal(pool.checkout("pages/counter.js", unit), instance);
});

test("concurrent checkouts receive distinct instances", () => {
  const { pool, created } = makePool();
  const unit = counterUnit();

  const a = pool.checkout("pages/counter.js", unit);
  const b = pool.checkout("pages/counter.js", unit);
  assert.notEqual(a, b);
  assert.equal(pool.activeCount, 2);
  assert.equal(created.length, 2);
  assert.equal(hit(a), 1);
  assert.equal(hit(b), 1);
});

test("checkin clears the open transaction marker", () => {
  const { pool } = makePool();
  const instance = pool.checkout("pages/counter.js", counterUnit());
  instance.transactionOpen = true;
  pool.checkin(instance, "pages/counter.js");
  assert.equal(instance.transactionOpen, false);
});

test("checkin rejects instances that are not checked out", () => {
  const { pool } = makePool();
  const unit = counterUnit();
  const instance = pool.checkout("pages/counter.js", unit);
  pool.checkin(instance, "pages/counter.js");
  assert.throws(() => pool.checkin(instance, "pages/counter.js"), hasCode("POOL_NOT_CHECKED_OUT"));
  assert.throws(
    () => pool.checkin(new InterpreterInstance(unit, () => ({})), "pages/counter.js"),
    hasCode("POOL_NOT_CHECKED_OUT")
  );
  assert.equal(pool.idleCount("pages/counter.js"), 1);
});

test("cold start failures surface as PoolColdStartError", () => {
  const { pool } = makePool();
  const unit = compileSource('throw new Error("init failed");', "/site/pages/bad.js", "pages/bad.js");
  assert.throws(
    () => pool.checkout("pages/bad.js", unit),
    (error: unknown) =>
      error instanceof PoolColdStartError && error.message === 'Cannot initialize "pages/bad.js": init failed'
  );
  assert.equal(pool.activeCount, 0);
});

test("maxIdlePerPath bounds the idle stack", () => {
  const { pool } = makePool({ maxIdlePerPath: 1 });
  const unit = counterUnit();
  const a = pool.checkout("pages/counter.js", unit);
  const b = pool.checkout("pages/counter.js", unit);
  pool.checkin(a, "pages/counter.js");
  pool.checkin(b, "pages/counter.js");
  assert.equal(pool.idleCount("pages/counter.js"), 1);
  assert.equal(pool.activeCount, 0);
  assert.equal(pool.checkout("pages/counter.js", unit), a);
});

test("idle instances expire after idleTimeoutMs", () => {
  let clock = 1_000;
  const { pool, created } = makePool({ idleTimeoutMs: 500, now: () => clock });
  const unit = counterUnit();

  const first = pool.checkout("pages/counter.js", unit);
  pool.checkin(first, "pages/counter.js");
  clock = 1_400;
  assert.equal(pool.evictIdle(), 0);

  clock = 1_500;
  const second = pool.checkout("pages/counter.js", unit);
  assert.notEqual(second, first);
  assert.equal(created.length, 2);

  pool.checkin(second, "pages/counter.js");
  assert.equal(pool.evictIdle(2_000), 1);
  assert.equal(pool.idleCount(), 0);
});

test("instances of a replaced unit are not reused", () => {
  const { pool } = makePool();
  const oldUnit = counterUnit();
  const newUnit = counterUnit();

  const stale = pool.checkout("pages/counter.js", oldUnit);
  pool.checkin(stale, "pages/counter.js");
  const fresh = pool.checkout("pages/counter.js", newUnit);
  assert.notEqual(fresh, stale);
  assert.equal(fresh.unit, newUnit);
  assert.equal(pool.idleCount("pages/counter.js"), 0);
});

test("seed, retain and discard manage instances outside checkout", () => {
  const { pool } = makePool();
  const unit = counterUnit();
  const warmed = new InterpreterInstance(unit, () => ({}));
  warmed.initialize();

  pool.seed("Pages/Counter.js", warmed);
  assert.equal(pool.idleCount("pages/counter.js"), 1);

  const leased = pool.checkout("pages/counter.js", unit);
  assert.equal(leased, warmed);
  assert.throws(() => pool.seed("pages/counter.js", leased), hasCode("POOL_SEED_CHECKED_OUT"));

  pool.discard(leased);
  assert.equal(pool.activeCount, 0);
  assert.equal(pool.isCheckedOut(leased), false);

  pool.seed("pages/counter.js", leased);
  assert.equal(pool.retain(() => false), 1);
  assert.equal(pool.idleCount(), 0);
});
