import type { Conn } from "./conn.ts";
import { type DebugOptions, type Logger, createLogger } from "./debug.ts";
import { ChannelClosedError, EOFError } from "./errors.ts";
import type { Listener } from "./listener.ts";

// answer every line with `Echo: <line>` until the client says `quit`
async function serveClient(conn: Conn): Promise<void> {
  while (true) {
    const msg = await conn.readLine();
    if (msg === "quit\n") {
      await conn.writeString("Bye.\n");
      return;
    }
    await conn.writeString("Echo: " + msg);
  }
}

async function newConn(conn: Conn, log: Logger): Promise<void> {
  log("echo", `new connection ${conn.getRemoteAddr()}`);
  try {
    await serveClient(conn);
  } catch (error) {
    if (!(error instanceof EOFError)) {
      console.error("exception:", error);
    }
  } finally {
    conn.close();
  }
}

/**
 * Run a line echo service on `listener` until it is closed. Resolves once
 * every client has been served.
 */
export async function serveEcho(listener: Listener, options: DebugOptions = {}): Promise<void> {
  const log = createLogger(options);
  const clients = new Set<Promise<void>>();
  while (true) {
    let conn: Conn;
    try {
      conn = await listener.accept();
    } catch (error) {
      if (error instanceof ChannelClosedError) {
        break;
      }
      throw error;
    }
    const client: Promise<void> = newConn(conn, log).then(() => {
      clients.delete(client);
    });
    clients.add(client);
  }
  await Promise.all(clients);
}
