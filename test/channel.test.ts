import assert from "node:assert/strict";
import test from "node:test";

import { Channel } from "../src/channel.ts";
import { ChannelClosedError } from "../src/errors.ts";

test("Channel delivers queued values in order", async () => {
  const ch = new Channel<number>();
  assert.equal(ch.send(1), true);
  assert.equal(ch.send(2), true);
  assert.equal(ch.pending, 2);
  assert.equal(await ch.receive(), 1);
  assert.equal(await ch.receive(), 2);
});

test("Channel hands values to waiting receivers first come first served", async () => {
  const ch = new Channel<string>();
  const first = ch.receive();
  const second = ch.receive();
  ch.send("a");
  ch.send("b");
  assert.equal(await first, "a");
  assert.equal(await second, "b");
  assert.equal(ch.pending, 0);
});

test("Channel close rejects waiters and returns undelivered values", async () => {
  const ch = new Channel<string>();
  const waiting = ch.receive();
  assert.deepEqual(ch.close(), []);
  await assert.rejects(waiting, ChannelClosedError);

  const other = new Channel<string>();
  other.send("left over");
  assert.deepEqual(other.close(), ["left over"]);
  assert.deepEqual(other.close(), []);
  assert.equal(other.isClosed, true);
  assert.equal(other.send("late"), false);
  await assert.rejects(other.receive(), ChannelClosedError);
});
