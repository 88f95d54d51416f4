import assert from "node:assert/strict";

import { test } from "vitest";

import { WidgetList } from "../../../src/extensions/widgets.js";

test("the active list is primary plus loaded minus failed", () => {
  const widgets = new WidgetList();
  widgets.loadPrimary(["widgets/online.js", "widgets/News/Latest.js"]);
  assert.deepEqual(widgets.list(), ["latest", "online"]);

  widgets.applyExtensionResolution(["servertime"], ["online"]);
  assert.deepEqual(widgets.list(), ["latest", "servertime"]);
  assert.equal(widgets.has("Online"), false);
  assert.equal(widgets.has("ServerTime"), true);

  widgets.applyExtensionResolution([], []);
  assert.deepEqual(widgets.list(), ["latest", "online"]);
});
