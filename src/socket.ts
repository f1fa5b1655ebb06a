import type net from "node:net";
import { joinHostPort } from "./addr.ts";
import { ClosedError, DeadlineError } from "./errors.ts";
import type { PendingRead, TCPConn } from "./types.ts";

// create a wrapper from net.Socket
export function soInit(socket: net.Socket): TCPConn {
  const conn: TCPConn = {
    socket: socket,
    err: null,
    ended: false,
    closed: false,
    queue: [],
    reader: null,
    readDeadline: null,
    writeDeadline: null,
  };
  // only read from the socket while a read is pending
  socket.pause();
  socket.on("data", (data: Buffer) => {
    conn.socket.pause();
    const reader = takeReader(conn);
    if (reader) {
      reader.resolve(data);
    } else {
      conn.queue.push(data);
    }
  });
  socket.on("end", () => {
    conn.ended = true;
    takeReader(conn)?.resolve(Buffer.from(""));
  });
  socket.on("error", (err: Error) => {
    conn.err = err;
    takeReader(conn)?.reject(err);
  });
  socket.on("close", () => {
    takeReader(conn)?.reject(conn.err ?? new ClosedError());
  });
  return conn;
}

function takeReader(conn: TCPConn): null | PendingRead {
  const reader = conn.reader;
  if (reader) {
    if (reader.timer) {
      clearTimeout(reader.timer);
    }
    conn.reader = null;
  }
  return reader;
}

// setTimeout fires after 1 ms for any longer delay
const kMaxTimerMs = 2 ** 31 - 1;

function timerDelay(deadline: Date): number {
  return Math.min(Math.max(deadline.getTime() - Date.now(), 0), kMaxTimerMs);
}

function armReadTimer(conn: TCPConn, reader: PendingRead): void {
  if (reader.timer) {
    clearTimeout(reader.timer);
    reader.timer = null;
  }
  const deadline = conn.readDeadline;
  if (!deadline) {
    return;
  }
  reader.timer = setTimeout(() => {
    if (conn.reader !== reader) {
      return;
    }
    // a far deadline takes several timers
    if (!conn.readDeadline || conn.readDeadline.getTime() > Date.now()) {
      armReadTimer(conn, reader);
      return;
    }
    conn.reader = null;
    conn.socket.pause();
    reader.reject(new DeadlineError());
  }, timerDelay(deadline));
}

// returns an empty `Buffer` after EOF.
export function soRead(conn: TCPConn): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    if (conn.reader) {
      reject(new Error("soRead: another read is pending"));
      return;
    }
    if (conn.closed) {
      reject(new ClosedError());
      return;
    }
    const queued = conn.queue.shift();
    if (queued) {
      resolve(queued);
      return;
    }
    if (conn.err) {
      reject(conn.err);
      return;
    }
    if (conn.ended) {
      resolve(Buffer.from(""));
      return;
    }
    if (conn.socket.destroyed) {
      reject(new ClosedError());
      return;
    }
    if (conn.readDeadline && conn.readDeadline.getTime() <= Date.now()) {
      reject(new DeadlineError());
      return;
    }
    const reader: PendingRead = { resolve, reject, timer: null };
    armReadTimer(conn, reader);
    conn.reader = reader;
    conn.socket.resume();
  });
}

export function soWrite(conn: TCPConn, data: Buffer): Promise<void> {
  return new Promise((resolve, reject) => {
    if (conn.closed || conn.socket.destroyed) {
      reject(conn.err ?? new ClosedError());
      return;
    }
    if (conn.err) {
      reject(conn.err);
      return;
    }
    if (data.length === 0) {
      resolve();
      return;
    }
    let timer: null | NodeJS.Timeout = null;
    const deadline = conn.writeDeadline;
    if (deadline) {
      if (deadline.getTime() <= Date.now()) {
        reject(new DeadlineError());
        return;
      }
      const arm = (): void => {
        timer = setTimeout(() => {
          if (deadline.getTime() > Date.now()) {
            arm();
          } else {
            reject(new DeadlineError());
          }
        }, timerDelay(deadline));
      };
      arm();
    }
    conn.socket.write(data, (err) => {
      if (timer) {
        clearTimeout(timer);
      }
      if (err) {
        reject(err);
      } else {
        resolve();
      }
    });
  });
}

// destroy the socket; a pending read fails with ClosedError
export function soClose(conn: TCPConn): void {
  if (conn.closed) {
    return;
  }
  conn.closed = true;
  takeReader(conn)?.reject(new ClosedError());
  conn.socket.destroy();
}

function checkOpen(conn: TCPConn): void {
  if (conn.closed || conn.socket.destroyed) {
    throw new ClosedError();
  }
}

// `null` clears the deadline
export function soSetReadDeadline(conn: TCPConn, deadline: null | Date): void {
  checkOpen(conn);
  conn.readDeadline = deadline;
  if (conn.reader) {
    armReadTimer(conn, conn.reader);
  }
}

export function soSetWriteDeadline(conn: TCPConn, deadline: null | Date): void {
  checkOpen(conn);
  conn.writeDeadline = deadline;
}

export function soSetDeadline(conn: TCPConn, deadline: null | Date): void {
  soSetReadDeadline(conn, deadline);
  soSetWriteDeadline(conn, deadline);
}

export function soRemoteAddr(conn: TCPConn): string {
  return joinHostPort(conn.socket.remoteAddress ?? "", conn.socket.remotePort ?? 0);
}

export function soLocalAddr(conn: TCPConn): string {
  return joinHostPort(conn.socket.localAddress ?? "", conn.socket.localPort ?? 0);
}
