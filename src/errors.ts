export class HTTPError extends Error {
  code: number;

  constructor(code: number, message: string) {
    super(message);
    this.name = "HTTPError";
    this.code = code;
  }
}

// the connection was closed locally
export class ClosedError extends Error {
  constructor(message = "use of closed network connection") {
    super(message);
    this.name = "ClosedError";
  }
}

export class DeadlineError extends Error {
  readonly code = "ETIMEDOUT";

  constructor(message = "i/o timeout") {
    super(message);
    this.name = "DeadlineError";
  }
}

// end of stream reached before the expected delimiter
export class EOFError extends Error {
  // whatever was read before the end of the stream
  partial: string;

  constructor(partial = "") {
    super("EOF");
    this.name = "EOFError";
    this.partial = partial;
  }
}

// no `\n` within the allowed number of bytes
export class LineTooLongError extends Error {
  limit: number;

  constructor(limit: number) {
    super(`line exceeds ${limit} bytes`);
    this.name = "LineTooLongError";
    this.limit = limit;
  }
}

export class ChannelClosedError extends Error {
  constructor() {
    super("channel close");
    this.name = "ChannelClosedError";
  }
}

export class AddressError extends Error {
  address: string;

  constructor(address: string, reason: string) {
    super(`address ${address}: ${reason}`);
    this.name = "AddressError";
    this.address = address;
  }
}

export class ResolutionError extends Error {
  host: string;

  constructor(host: string, cause: Error) {
    super(`lookup ${host}: ${cause.message}`, { cause });
    this.name = "ResolutionError";
    this.host = host;
  }
}

export class ConnectError extends Error {
  address: string;

  constructor(address: string, cause: Error) {
    super(`dial tcp ${address}: ${cause.message}`, { cause });
    this.name = "ConnectError";
    this.address = address;
  }
}

export class ProxyURLError extends Error {
  url: string;

  constructor(url: string, cause: unknown) {
    super(`invalid proxy URL [${url}]`, { cause });
    this.name = "ProxyURLError";
    this.url = url;
  }
}

export class ProtocolSchemeError extends Error {
  scheme: string;

  constructor(scheme: string) {
    super(`Proxy URL scheme must be http, not [${scheme}]`);
    this.name = "ProtocolSchemeError";
    this.scheme = scheme;
  }
}

export class ProxyHandshakeError extends Error {
  code: number;

  constructor(code: number) {
    super(`ConnectServer using proxy error, StatusCode [${code}]`);
    this.name = "ProxyHandshakeError";
    this.code = code;
  }
}

export function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

// the peer dropped the connection without a clean shutdown
export function isResetError(err: unknown): boolean {
  const code = errnoCode(err);
  return code === "ECONNRESET" || code === "EPIPE" || code === "ECONNABORTED";
}

export function isResolutionError(err: unknown): boolean {
  const code = errnoCode(err);
  return (
    code === "ENOTFOUND" ||
    code === "EAI_AGAIN" ||
    code === "EAI_FAIL" ||
    code === "EAI_NONAME"
  );
}
