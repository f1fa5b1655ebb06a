import assert from "node:assert/strict";
import test from "node:test";

import { serveEcho } from "../src/echo.ts";
import { EOFError } from "../src/errors.ts";
import { listen } from "../src/listener.ts";
import { connectServer } from "../src/proxy.ts";

test("echo service answers lines until quit", async () => {
  const listener = await listen("127.0.0.1", 0);
  const serving = serveEcho(listener);

  const conn = await connectServer(listener.addr);
  await conn.writeString("hello\n");
  assert.equal(await conn.readLine(), "Echo: hello\n");
  await conn.writeString("two\nlines\n");
  assert.equal(await conn.readLine(), "Echo: two\n");
  assert.equal(await conn.readLine(), "Echo: lines\n");
  await conn.writeString("quit\n");
  assert.equal(await conn.readLine(), "Bye.\n");
  await assert.rejects(conn.readLine(), EOFError);
  assert.equal(conn.isClosed(), true);

  listener.close();
  await serving;
});

test("echo service serves clients concurrently", async () => {
  const listener = await listen("127.0.0.1", 0);
  const serving = serveEcho(listener);

  const first = await connectServer(listener.addr);
  const second = await connectServer(listener.addr);
  await second.writeString("b\n");
  assert.equal(await second.readLine(), "Echo: b\n");
  await first.writeString("a\n");
  assert.equal(await first.readLine(), "Echo: a\n");

  // clients that leave without quit are dropped quietly
  first.close();
  second.close();
  listener.close();
  await serving;
});
