import net from "node:net";
import { joinHostPort } from "./addr.ts";
import { Channel } from "./channel.ts";
import { Conn, type ConnOptions } from "./conn.ts";
import { type DebugOptions, type Logger, createLogger } from "./debug.ts";
import { ResolutionError, isResolutionError } from "./errors.ts";

export type ListenOptions = DebugOptions & {
  // options for every accepted connection
  conn?: ConnOptions;
};

/**
 * Accepts TCP connections in the background and hands them out through
 * {@link Listener.accept} in the order they were accepted.
 */
export class Listener {
  private closed = false;
  private readonly accepted = new Channel<Conn>();
  private readonly log: Logger;

  constructor(
    private readonly server: net.Server,
    private readonly options: ListenOptions = {},
  ) {
    this.log = createLogger(options);
    server.on("connection", (socket: net.Socket) => this.onConnection(socket));
    server.on("error", (err: Error) => this.onError(err));
  }

  // the bound local address, e.g. "127.0.0.1:41234"
  get addr(): string {
    const addr = this.server.address();
    if (!addr || typeof addr === "string") {
      return addr ?? "";
    }
    return joinHostPort(addr.address, addr.port);
  }

  get port(): number {
    const addr = this.server.address();
    return addr && typeof addr !== "string" ? addr.port : 0;
  }

  private onConnection(socket: net.Socket): void {
    if (this.closed) {
      socket.destroy();
      return;
    }
    const { conn: connOptions, ...debugOptions } = this.options;
    const conn = new Conn(socket, { ...debugOptions, ...connOptions });
    this.log("net", `accepted ${conn.getRemoteAddr()} on ${this.addr}`);
    this.accepted.send(conn);
  }

  // accept errors are transient until the listener is closed
  private onError(err: Error): void {
    if (this.closed) {
      return;
    }
    this.log("net", `accept on ${this.addr}: ${err.message}`);
  }

  // wait until a new connection arrives or the listener is closed
  async accept(): Promise<Conn> {
    return await this.accepted.receive();
  }

  /**
   * Stop listening. Pending and later {@link Listener.accept} calls fail with
   * ChannelClosedError; connections nobody accepted yet are closed.
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    if (this.server.listening) {
      this.server.close();
    }
    for (const conn of this.accepted.close()) {
      conn.close();
    }
    this.log("net", "listener closed");
  }

  isClosed(): boolean {
    return this.closed;
  }
}

export async function listen(
  bindAddr: string,
  bindPort: number,
  options: ListenOptions = {},
): Promise<Listener> {
  const server = net.createServer({
    allowHalfOpen: true,
    pauseOnConnect: true,
    noDelay: true,
  });
  const listener = new Listener(server, options);
  try {
    await new Promise<void>((resolve, reject) => {
      server.once("error", reject);
      server.listen({ host: bindAddr || undefined, port: bindPort }, () => {
        server.off("error", reject);
        resolve();
      });
    });
  } catch (err) {
    listener.close();
    if (err instanceof Error && isResolutionError(err)) {
      throw new ResolutionError(bindAddr, err);
    }
    throw err;
  }
  return listener;
}
