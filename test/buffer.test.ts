import assert from "node:assert/strict";
import test from "node:test";

import { bufCut, bufPop, bufPush, bufTake, newBuf } from "../src/buffer.ts";

test("bufPush grows the capacity by doubling", () => {
  const buf = newBuf();
  bufPush(buf, Buffer.from("abc"));
  assert.equal(buf.length, 3);
  assert.equal(buf.data.length, 32);

  bufPush(buf, Buffer.alloc(40, 0x61));
  assert.equal(buf.length, 43);
  assert.equal(buf.data.length, 64);
  assert.equal(buf.data.subarray(0, 4).toString(), "abca");
});

test("bufPop drops a prefix", () => {
  const buf = newBuf();
  bufPush(buf, Buffer.from("hello world"));
  bufPop(buf, 6);
  assert.equal(buf.data.subarray(0, buf.length).toString(), "world");
});

test("bufTake copies out at most the buffered bytes", () => {
  const buf = newBuf();
  bufPush(buf, Buffer.from("abcdef"));
  assert.equal(bufTake(buf, 2).toString(), "ab");
  assert.equal(bufTake(buf, 100).toString(), "cdef");
  assert.equal(buf.length, 0);
});

test("bufCut returns complete messages only", () => {
  const buf = newBuf();
  bufPush(buf, Buffer.from("one\ntw"));
  assert.equal(bufCut(buf, "\n")?.toString(), "one\n");
  assert.equal(bufCut(buf, "\n"), null);
  bufPush(buf, Buffer.from("o\r\n\r\nrest"));
  assert.equal(bufCut(buf, "\r\n\r\n")?.toString(), "two\r\n\r\n");
  assert.equal(bufTake(buf).toString(), "rest");
});
