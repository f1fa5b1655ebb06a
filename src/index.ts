export { joinHostPort, splitHostPort } from "./addr.ts";
export type { HostPort } from "./addr.ts";
export { bufCut, bufPop, bufPush, bufTake, newBuf } from "./buffer.ts";
export { Channel } from "./channel.ts";
export { Conn, kProbeTimeoutMs, newConn } from "./conn.ts";
export type { ConnOptions } from "./conn.ts";
export {
  ALL_DEBUG_FLAGS,
  createLogger,
  defaultDebugLog,
  formatDebugLine,
  parseDebugEnv,
  resolveDebugFlags,
} from "./debug.ts";
export type { DebugConfig, DebugFlag, DebugLogFn, DebugOptions, Logger } from "./debug.ts";
export { serveEcho } from "./echo.ts";
export {
  AddressError,
  ChannelClosedError,
  ClosedError,
  ConnectError,
  DeadlineError,
  EOFError,
  HTTPError,
  LineTooLongError,
  ProtocolSchemeError,
  ProxyHandshakeError,
  ProxyURLError,
  ResolutionError,
  errnoCode,
  isResetError,
  isResolutionError,
} from "./errors.ts";
export {
  encodeHTTPReq,
  fieldGet,
  kMaxHeaderLen,
  parseStatusLine,
  readHTTPResp,
  readerFromMemory,
  validateHeader,
} from "./http.ts";
export { Listener, listen } from "./listener.ts";
export type { ListenOptions } from "./listener.ts";
export {
  connectServer,
  connectServerByHttpProxy,
  kUserAgent,
  proxyAuthorization,
} from "./proxy.ts";
export type { ProxyOptions } from "./proxy.ts";
export type { BodyReader, DynBuf, HTTPReq, HTTPRes, TCPConn } from "./types.ts";
