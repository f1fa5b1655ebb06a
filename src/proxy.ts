import net from "node:net";
import { joinHostPort, splitHostPort } from "./addr.ts";
import { Conn, type ConnOptions } from "./conn.ts";
import { createLogger } from "./debug.ts";
import {
  ConnectError,
  ProtocolSchemeError,
  ProxyHandshakeError,
  ProxyURLError,
  ResolutionError,
  isResolutionError,
} from "./errors.ts";
import { encodeHTTPReq, kMaxHeaderLen, readHTTPResp } from "./http.ts";
import type { HTTPReq } from "./types.ts";

export const kUserAgent = "Mozilla/5.0";

export type ProxyOptions = ConnOptions & {
  userAgent?: string;
  maxHeaderLen?: number;
};

function dial(addr: string): Promise<net.Socket> {
  const { host, port } = splitHostPort(addr);
  return new Promise((resolve, reject) => {
    const socket = net.connect({ host, port, allowHalfOpen: true, noDelay: true });
    const onError = (err: Error) => {
      socket.destroy();
      if (isResolutionError(err)) {
        reject(new ResolutionError(host, err));
      } else {
        reject(new ConnectError(addr, err));
      }
    };
    socket.once("error", onError);
    socket.once("connect", () => {
      socket.off("error", onError);
      resolve(socket);
    });
  });
}

// dial `host:port` directly
export async function connectServer(addr: string, options: ConnOptions = {}): Promise<Conn> {
  const socket = await dial(addr);
  return new Conn(socket, options);
}

// `Basic base64(user:password)` from the URL's user info, if any
export function proxyAuthorization(proxyUrl: URL): null | string {
  if (!proxyUrl.username && !proxyUrl.password) {
    return null;
  }
  const user = decodeURIComponent(proxyUrl.username);
  const password = decodeURIComponent(proxyUrl.password);
  return "Basic " + Buffer.from(`${user}:${password}`).toString("base64");
}

/**
 * Open a tunnel to `serverAddr` through the HTTP proxy at `httpProxy` with a
 * CONNECT request.
 *
 * On success the returned connection carries the tunneled byte stream; any
 * bytes the proxy sent after its response header are already buffered. On
 * failure the proxy connection is closed before the error is thrown.
 */
export async function connectServerByHttpProxy(
  httpProxy: string,
  serverAddr: string,
  options: ProxyOptions = {},
): Promise<Conn> {
  let proxyUrl: URL;
  try {
    proxyUrl = new URL(httpProxy);
  } catch (err) {
    throw new ProxyURLError(httpProxy, err);
  }
  if (proxyUrl.protocol !== "http:") {
    throw new ProtocolSchemeError(proxyUrl.protocol.replace(/:$/, ""));
  }
  // the target must be a plain `host:port`
  splitHostPort(serverAddr);

  let proxyAuth: null | string;
  try {
    proxyAuth = proxyAuthorization(proxyUrl);
  } catch (err) {
    // malformed percent-encoding in the user info
    throw new ProxyURLError(httpProxy, err);
  }
  const log = createLogger(options);
  // URL keeps IPv6 hosts in brackets and drops the default port
  const proxyHost = proxyUrl.hostname.replace(/^\[(.*)\]$/, "$1");
  const proxyAddr = joinHostPort(proxyHost, proxyUrl.port ? parseInt(proxyUrl.port, 10) : 80);

  const conn = await connectServer(proxyAddr, options);
  log("proxy", `CONNECT ${serverAddr} via ${proxyAddr}`);

  const headers = [
    Buffer.from(`Host: ${serverAddr}`),
    Buffer.from(`User-Agent: ${options.userAgent ?? kUserAgent}`),
  ];
  if (proxyAuth) {
    headers.push(Buffer.from(`Proxy-Authorization: ${proxyAuth}`));
  }
  const req: HTTPReq = {
    method: "CONNECT",
    uri: Buffer.from(serverAddr),
    version: "HTTP/1.1",
    headers,
  };

  try {
    await conn.write(encodeHTTPReq(req));
    const res = await readHTTPResp(conn, req, options.maxHeaderLen ?? kMaxHeaderLen);
    await res.body.close?.();
    log("proxy", `${proxyAddr} answered ${res.code} ${res.reason}`);
    if (res.code !== 200) {
      throw new ProxyHandshakeError(res.code);
    }
  } catch (err) {
    conn.close();
    throw err;
  }
  return conn;
}
