import assert from "node:assert/strict";
import test from "node:test";

import {
  createLogger,
  formatDebugLine,
  parseDebugEnv,
  resolveDebugFlags,
  type DebugFlag,
} from "../src/debug.ts";

test("parseDebugEnv accepts lists and wildcards", () => {
  assert.deepEqual([...parseDebugEnv("net, proxy,bogus")].sort(), ["net", "proxy"]);
  assert.deepEqual([...parseDebugEnv("all")].sort(), ["conn", "echo", "net", "proxy"]);
  assert.equal(parseDebugEnv("").size, 0);
  assert.equal(parseDebugEnv(" , ").size, 0);
});

test("resolveDebugFlags prefers explicit config over the environment", () => {
  const env = new Set<DebugFlag>(["net"]);
  assert.deepEqual([...resolveDebugFlags(undefined, env)], ["net"]);
  assert.equal(resolveDebugFlags(false, env).size, 0);
  assert.equal(resolveDebugFlags(true, env).size, 4);
  assert.deepEqual([...resolveDebugFlags(["conn"], env)], ["conn"]);
});

test("formatDebugLine tags the component and drops the trailing newline", () => {
  assert.equal(formatDebugLine("net", "accepted 127.0.0.1:5000\r\n"), "[net] accepted 127.0.0.1:5000");
});

test("createLogger only forwards enabled components", () => {
  const lines: string[] = [];
  const log = createLogger({
    debug: ["proxy"],
    debugLog: (component, message) => lines.push(`${component}:${message}`),
  });
  log("net", "dropped");
  log("proxy", "kept");
  assert.deepEqual(lines, ["proxy:kept"]);
});
