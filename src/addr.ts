import net from "node:net";
import { AddressError } from "./errors.ts";

export type HostPort = {
  host: string;
  port: number;
};

// split `host:port` or `[ipv6]:port`
export function splitHostPort(addr: string): HostPort {
  let host: string;
  let portStr: string;
  if (addr.startsWith("[")) {
    const end = addr.indexOf("]");
    if (end < 0) {
      throw new AddressError(addr, "missing ']' in address");
    }
    if (addr[end + 1] !== ":") {
      throw new AddressError(addr, "missing port in address");
    }
    host = addr.slice(1, end);
    portStr = addr.slice(end + 2);
  } else {
    const idx = addr.lastIndexOf(":");
    if (idx < 0) {
      throw new AddressError(addr, "missing port in address");
    }
    host = addr.slice(0, idx);
    if (host.includes(":")) {
      throw new AddressError(addr, "too many colons in address");
    }
    portStr = addr.slice(idx + 1);
  }
  if (!/^\d{1,5}$/.test(portStr)) {
    throw new AddressError(addr, "invalid port");
  }
  const port = parseInt(portStr, 10);
  if (port > 65535) {
    throw new AddressError(addr, "invalid port");
  }
  return { host, port };
}

export function joinHostPort(host: string, port: number): string {
  return net.isIPv6(host) ? `[${host}]:${port}` : `${host}:${port}`;
}
