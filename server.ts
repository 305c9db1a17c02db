import * as net from "net";
import type { Duplex } from "stream";

import type { Cache } from "./cache";
import { ListenerClosedError } from "./errors";
import { handleHttpRequest } from "./router";
import { soAccept, soClose, soInit, type TCPListener } from "./tcp";
import type { ServeContext } from "./types";

function peerAddress(socket: Duplex): string {
  if (socket instanceof net.Socket && socket.remoteAddress) return socket.remoteAddress;
  return "unknown";
}

// ----------------------------------------------------
// One request/response cycle, then close
// ----------------------------------------------------
async function newConn(socket: Duplex, cache: Cache, ctx: ServeContext): Promise<void> {
  const conn = soInit(socket);
  try {
    await handleHttpRequest(conn, cache, ctx);
  } catch (err) {
    ctx.log.error("connection error:", err);
  } finally {
    await soClose(conn);
  }
}

/**
 * Accept connections one at a time until the listener is stopped. The next
 * connection is taken off the backlog only after the current one is closed.
 */
export async function serve(listener: TCPListener, cache: Cache, ctx: ServeContext): Promise<void> {
  while (true) {
    let socket: Duplex;
    try {
      socket = await soAccept(listener);
    } catch (err) {
      if (err instanceof ListenerClosedError) return;
      ctx.log.error("accept:", err);
      continue;
    }

    ctx.log.log(`server: got connection from ${peerAddress(socket)}`);
    await newConn(socket, cache, ctx);
  }
}
