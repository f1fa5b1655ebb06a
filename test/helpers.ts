import assert from "node:assert/strict";
import { once } from "node:events";
import net from "node:net";

// a connected loopback pair; `server` starts paused like an accepted socket
export async function socketPair(): Promise<{ client: net.Socket; server: net.Socket }> {
  const srv = net.createServer({ allowHalfOpen: true, pauseOnConnect: true });
  await new Promise<void>((resolve) => srv.listen(0, "127.0.0.1", resolve));
  const addr = srv.address();
  assert.ok(addr && typeof addr !== "string");

  const accepted = once(srv, "connection");
  const client = net.connect({ host: "127.0.0.1", port: addr.port, allowHalfOpen: true });
  await once(client, "connect");
  const [server] = await accepted;
  srv.close();
  assert.ok(server instanceof net.Socket);
  return { client, server };
}

export function readAll(socket: net.Socket): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    socket.on("data", (chunk: Buffer) => chunks.push(chunk));
    socket.on("end", () => resolve(Buffer.concat(chunks).toString("utf8")));
    socket.on("error", reject);
  });
}

// a port nobody listens on
export async function closedPort(): Promise<number> {
  const srv = net.createServer();
  await new Promise<void>((resolve) => srv.listen(0, "127.0.0.1", resolve));
  const addr = srv.address();
  assert.ok(addr && typeof addr !== "string");
  await new Promise<void>((resolve) => srv.close(() => resolve()));
  return addr.port;
}
