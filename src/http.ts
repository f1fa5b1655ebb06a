import type { Conn } from "./conn.ts";
import { HTTPError, LineTooLongError } from "./errors.ts";
import type { BodyReader, HTTPReq, HTTPRes } from "./types.ts";

// the maximum length of an HTTP header
export const kMaxHeaderLen = 1024 * 8;

// serialize the request line and header fields
export function encodeHTTPReq(req: HTTPReq): Buffer {
  let headerStr = `${req.method} ${req.uri.toString("latin1")} ${req.version}\r\n`;
  for (const header of req.headers) {
    headerStr += header.toString() + "\r\n";
  }
  headerStr += "\r\n";
  return Buffer.from(headerStr);
}

// the status line is `VERSION CODE [REASON]`
export function parseStatusLine(line: string): [string, number, string] {
  const first = line.indexOf(" ");
  if (first < 0) {
    throw new HTTPError(502, "malformed HTTP status line.");
  }
  const version = line.substring(0, first);
  const rest = line.substring(first + 1);
  const second = rest.indexOf(" ");
  const codeStr = second < 0 ? rest : rest.substring(0, second);
  const reason = second < 0 ? "" : rest.substring(second + 1);
  if (!version.startsWith("HTTP/") || !/^\d{3}$/.test(codeStr)) {
    throw new HTTPError(502, "malformed HTTP status line.");
  }
  return [version, parseInt(codeStr, 10), reason];
}

export function validateHeader(header: Buffer): boolean {
  return header.indexOf(":") > 0;
}

export function fieldGet(headers: Buffer[], key: string): null | Buffer {
  const lowerKey = key.toLowerCase();
  for (const h of headers) {
    const idx = h.indexOf(":");
    if (idx > 0) {
      const name = h.subarray(0, idx).toString().toLowerCase();
      if (name === lowerKey) {
        const value = h
          .subarray(idx + 1)
          .toString()
          .trim();
        return Buffer.from(value);
      }
    }
  }
  return null;
}

function stripCRLF(line: string): string {
  if (line.endsWith("\r\n")) return line.slice(0, -2);
  if (line.endsWith("\n")) return line.slice(0, -1);
  return line;
}

/**
 * Read one response header from `conn` and set up its body reader.
 *
 * Bytes following the header stay in the connection's read buffer.
 */
export async function readHTTPResp(
  conn: Conn,
  req: HTTPReq,
  maxHeaderLen: number = kMaxHeaderLen,
): Promise<HTTPRes> {
  const lines: string[] = [];
  let total = 0;
  while (true) {
    let line: string;
    try {
      line = await conn.readLine(maxHeaderLen - total);
    } catch (err) {
      if (err instanceof LineTooLongError) {
        throw new HTTPError(413, "header is too large");
      }
      throw err;
    }
    total += Buffer.byteLength(line);
    const field = stripCRLF(line);
    // the header ends by an empty line
    if (field.length === 0) {
      break;
    }
    lines.push(field);
  }

  const statusLine = lines[0];
  if (statusLine === undefined) {
    throw new HTTPError(502, "missing status line.");
  }
  const [version, code, reason] = parseStatusLine(statusLine);
  const headers: Buffer[] = [];
  for (const line of lines.slice(1)) {
    const h = Buffer.from(line);
    if (!validateHeader(h)) {
      throw new HTTPError(502, "bad field.");
    }
    headers.push(h);
  }
  const body = readerFromResp(conn, req, code, headers);
  return { version, code, reason, headers, body };
}

function readerFromResp(
  conn: Conn,
  req: HTTPReq,
  code: number,
  headers: Buffer[],
): BodyReader {
  // a successful CONNECT switches the connection to the tunnel
  if (req.method === "CONNECT" && code >= 200 && code < 300) {
    return readerFromMemory(Buffer.from(""));
  }
  const bodyAllowed = !(
    req.method === "HEAD" ||
    (code >= 100 && code < 200) ||
    code === 204 ||
    code === 304
  );
  if (!bodyAllowed) {
    return readerFromMemory(Buffer.from(""));
  }
  const contentLen = fieldGet(headers, "Content-Length");
  if (contentLen) {
    const bodyLen = parseInt(contentLen.toString(), 10);
    if (isNaN(bodyLen) || bodyLen < 0) {
      throw new HTTPError(502, "Invalid Content-Length.");
    }
    return readerFromConnLength(conn, bodyLen);
  }
  // no framing; the body runs until the connection ends
  return readerFromConnEOF(conn);
}

function readerFromConnLength(conn: Conn, remain: number): BodyReader {
  return {
    length: remain,
    read: async (): Promise<Buffer> => {
      if (remain === 0) {
        return Buffer.from("");
      }
      const data = await conn.read(remain);
      if (data.length === 0) {
        throw new Error("Unexpected EOF from HTTP body");
      }
      remain -= data.length;
      return data;
    },
    // stop reading; unread body bytes are left on the connection
    close: async () => {
      remain = 0;
    },
  };
}

function readerFromConnEOF(conn: Conn): BodyReader {
  let done = false;
  return {
    length: -1,
    read: async (): Promise<Buffer> => {
      if (done) {
        return Buffer.from("");
      }
      const data = await conn.read();
      done = data.length === 0;
      return data;
    },
    close: async () => {
      done = true;
    },
  };
}

export function readerFromMemory(data: Buffer): BodyReader {
  let done = false;
  return {
    length: data.length,
    read: async (): Promise<Buffer> => {
      if (done) {
        return Buffer.from("");
      } else {
        done = true;
        return data;
      }
    },
  };
}
