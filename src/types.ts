import type { Socket } from "node:net";

export type HTTPReq = {
  method: string;
  // request-target; the `host:port` authority for CONNECT
  uri: Buffer;
  // e.g. "HTTP/1.1"
  version: string;
  headers: Buffer[];
};

export type HTTPRes = {
  version: string;
  code: number;
  reason: string;
  headers: Buffer[];
  body: BodyReader;
};

export type BodyReader = {
  // the 'Content-Length', -1 if unknown.
  length: number;
  // read data. returns an empty buffer after EOF
  read: () => Promise<Buffer>;
  // optional cleanups
  close?: () => Promise<void>;
};

export type PendingRead = {
  resolve: (value: Buffer) => void;
  reject: (reason: Error) => void;
  timer: null | NodeJS.Timeout;
};

export type TCPConn = {
  socket: Socket;
  err: null | Error;
  // the peer has sent FIN
  ended: boolean;
  // closed locally by soClose
  closed: boolean;
  // chunks that arrived without a pending read
  queue: Buffer[];
  reader: null | PendingRead;
  readDeadline: null | Date;
  writeDeadline: null | Date;
};

export type DynBuf = {
  data: Buffer;
  length: number;
};
