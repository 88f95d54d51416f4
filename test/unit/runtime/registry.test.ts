import assert from "node:assert/strict";

import { test } from "vitest";

import { compileSource } from "../../../src/compiler/compiler.js";
import { CompiledUnitRegistry, RegistryHolder } from "../../../src/runtime/registry.js";

const unitAt = (virtualPath: string) => compileSource("function get() {}", `/site/${virtualPath}`, virtualPath);

test("CompiledUnitRegistry looks paths up in any case", () => {
  const unit = unitAt("pages/index.js");
  const registry = new CompiledUnitRegistry([["Pages/Index.js", unit]]);
  assert.equal(registry.get("pages/index.js"), unit);
  assert.equal(registry.has("PAGES/INDEX.JS"), true);
  assert.deepEqual(registry.paths(), ["pages/index.js"]);
  assert.equal(registry.size, 1);
});

test("RegistryHolder prefers extension layers and swaps snapshots", () => {
  const holder = new RegistryHolder();
  const primary = unitAt("pages/index.js");
  const extension = unitAt("pages/index.js");

  assert.equal(holder.replacePrimary(new CompiledUnitRegistry([["pages/index.js", primary]])).version, 1);
  assert.deepEqual(holder.lookup("Pages/Index.js"), { unit: primary, layer: "primary" });

  holder.replaceExtensions("page", new CompiledUnitRegistry([["pages/index.js", extension]]));
  assert.deepEqual(holder.lookup("pages/index.js"), { unit: extension, layer: "extension" });
  assert.equal(holder.isCurrent(primary), false);
  assert.equal(holder.isCurrent(extension), true);

  const before = holder.current();
  holder.replaceExtensions("page", new CompiledUnitRegistry());
  assert.equal(before.extensions.page.get("pages/index.js"), extension);
  assert.equal(holder.current().version, 3);
  assert.deepEqual(holder.lookup("pages/index.js"), { unit: primary, layer: "primary" });
  assert.equal(holder.lookup("pages/missing.js"), undefined);
});
