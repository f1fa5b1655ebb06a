import type net from "node:net";
import { bufCut, bufPush, bufTake, newBuf } from "./buffer.ts";
import { type DebugOptions, type Logger, createLogger } from "./debug.ts";
import { DeadlineError, EOFError, LineTooLongError, isResetError } from "./errors.ts";
import {
  soClose,
  soInit,
  soLocalAddr,
  soRead,
  soRemoteAddr,
  soSetDeadline,
  soSetReadDeadline,
  soSetWriteDeadline,
  soWrite,
} from "./socket.ts";
import type { DynBuf, TCPConn } from "./types.ts";

// how long checkClosed waits for the peer's FIN
export const kProbeTimeoutMs = 10;

export type ConnOptions = DebugOptions & {
  probeTimeoutMs?: number;
};

type ConnState = "open" | "closed";

/**
 * A TCP connection with a read buffer and an idempotent close.
 *
 * Reads go through the buffer, writes go straight to the socket. At most one
 * read and one write may be pending at a time.
 */
export class Conn {
  private conn: TCPConn;
  private buf: DynBuf;
  private state: ConnState = "open";
  private readonly probeTimeoutMs: number;
  private readonly log: Logger;

  constructor(socket: net.Socket, options: ConnOptions = {}) {
    this.conn = soInit(socket);
    this.buf = newBuf();
    this.probeTimeoutMs = options.probeTimeoutMs ?? kProbeTimeoutMs;
    this.log = createLogger(options);
  }

  /**
   * Rebind to another socket and mark the connection open again.
   *
   * The current socket is not closed here; call {@link Conn.close} first if it
   * is still live.
   */
  setTcpConn(socket: net.Socket): void {
    this.conn = soInit(socket);
    this.buf = newBuf();
    this.state = "open";
  }

  getRemoteAddr(): string {
    return soRemoteAddr(this.conn);
  }

  getLocalAddr(): string {
    return soLocalAddr(this.conn);
  }

  // read up to `max` bytes; an empty buffer means EOF
  async read(max?: number): Promise<Buffer> {
    if (max !== undefined && !(max > 0)) {
      throw new RangeError(`read: max must be positive, got ${max}`);
    }
    if (this.buf.length === 0) {
      const data = await soRead(this.conn);
      if (data.length === 0) {
        return data;
      }
      bufPush(this.buf, data);
    }
    return bufTake(this.buf, max ?? this.buf.length);
  }

  /**
   * Read until and including the next `\n`.
   *
   * EOF or a connection reset closes the connection before the error is
   * thrown; EOF is reported as {@link EOFError} carrying the partial line.
   * A line longer than `maxLen` bytes fails with {@link LineTooLongError} as
   * soon as that many bytes are buffered without a `\n`.
   */
  async readLine(maxLen: number = Infinity): Promise<string> {
    try {
      while (true) {
        const line = bufCut(this.buf, "\n");
        if (line) {
          if (line.length > maxLen) {
            throw new LineTooLongError(maxLen);
          }
          return line.toString("utf8");
        }
        if (this.buf.length >= maxLen) {
          throw new LineTooLongError(maxLen);
        }
        const data = await soRead(this.conn);
        if (data.length === 0) {
          throw new EOFError(bufTake(this.buf).toString("utf8"));
        }
        bufPush(this.buf, data);
      }
    } catch (err) {
      if (err instanceof EOFError || isResetError(err)) {
        this.log("conn", `${this.getRemoteAddr()} disconnected while reading a line`);
        this.close();
      }
      throw err;
    }
  }

  // returns the number of bytes written
  async write(content: Buffer | string): Promise<number> {
    const data = typeof content === "string" ? Buffer.from(content) : content;
    await soWrite(this.conn, data);
    return data.length;
  }

  async writeString(content: string): Promise<void> {
    await soWrite(this.conn, Buffer.from(content));
  }

  setDeadline(deadline: null | Date): void {
    soSetDeadline(this.conn, deadline);
  }

  setReadDeadline(deadline: null | Date): void {
    soSetReadDeadline(this.conn, deadline);
  }

  setWriteDeadline(deadline: null | Date): void {
    soSetWriteDeadline(this.conn, deadline);
  }

  // only the first call reaches the socket
  close(): void {
    if (this.state === "closed") {
      return;
    }
    this.state = "closed";
    soClose(this.conn);
  }

  isClosed(): boolean {
    return this.state === "closed";
  }

  /**
   * Probe whether the peer has gone away.
   *
   * Only call this when the peer is not expected to send anything: the probe
   * reads from the socket directly. Bytes that do arrive are kept in the read
   * buffer for the next read.
   */
  async checkClosed(): Promise<boolean> {
    if (this.state === "closed") {
      return true;
    }

    try {
      soSetReadDeadline(this.conn, new Date(Date.now() + this.probeTimeoutMs));
    } catch {
      this.close();
      return true;
    }

    try {
      const data = await soRead(this.conn);
      if (data.length === 0) {
        this.log("conn", `${this.getRemoteAddr()} half-closed`);
        this.close();
        return true;
      }
      bufPush(this.buf, data);
    } catch (err) {
      // a timeout means the peer is idle; a dead socket fails the reset below
      if (!(err instanceof DeadlineError)) {
        this.log("conn", `probe ${this.getRemoteAddr()}: ${String(err)}`);
      }
    }

    try {
      soSetReadDeadline(this.conn, null);
    } catch {
      this.close();
      return true;
    }
    return false;
  }
}

export function newConn(socket: net.Socket, options?: ConnOptions): Conn {
  return new Conn(socket, options);
}
