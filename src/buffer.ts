import type { DynBuf } from "./types.ts";

export function newBuf(): DynBuf {
  return { data: Buffer.alloc(0), length: 0 };
}

// append data to the end of the buffer, growing the capacity if needed
export function bufPush(buf: DynBuf, data: Buffer): void {
  const newLen = buf.length + data.length;
  if (buf.data.length < newLen) {
    let cap = Math.max(buf.data.length, 32);
    while (cap < newLen) {
      cap *= 2;
    }
    const grown = Buffer.alloc(cap);
    buf.data.copy(grown, 0, 0, buf.length);
    buf.data = grown;
  }
  data.copy(buf.data, buf.length, 0);
  buf.length = newLen;
}

// remove data from the front
export function bufPop(buf: DynBuf, len: number): void {
  buf.data.copyWithin(0, len, buf.length);
  buf.length -= len;
}

// remove and return up to `len` bytes from the front
export function bufTake(buf: DynBuf, len: number = buf.length): Buffer {
  const n = Math.min(len, buf.length);
  const data = Buffer.from(buf.data.subarray(0, n));
  bufPop(buf, n);
  return data;
}

// cut a message ending with `delim` (included) from the front, if complete
export function bufCut(buf: DynBuf, delim: string): null | Buffer {
  const idx = buf.data.subarray(0, buf.length).indexOf(delim);
  if (idx < 0) {
    return null;
  }
  return bufTake(buf, idx + Buffer.byteLength(delim));
}
