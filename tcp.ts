import * as net from "net";
import type { Duplex } from "stream";

import { ListenerClosedError } from "./errors";

/* ==================== CONNECTION ==================== */

// ----------------------------------------------------
// A stream plus the callbacks of the one pending read
// ----------------------------------------------------
export type TCPConn = {
  socket: Duplex;
  reader: null | {
    resolve: (value: Buffer) => void;
    reject: (reason: Error) => void;
  };
};

export function soInit(socket: Duplex): TCPConn {
  const conn: TCPConn = { socket, reader: null };

  // nothing is consumed until someone asks for it
  socket.pause();

  socket.on("data", (data: Buffer) => {
    const reader = conn.reader;
    console.assert(reader, "data without a pending read");
    if (!reader) return;
    conn.socket.pause();
    conn.reader = null;
    reader.resolve(data);
  });

  // EOF resolves the pending read with an empty buffer
  socket.on("end", () => {
    if (conn.reader) {
      conn.reader.resolve(Buffer.alloc(0));
      conn.reader = null;
    }
  });

  socket.on("error", (err: Error) => {
    if (conn.reader) {
      conn.reader.reject(err);
      conn.reader = null;
    }
  });

  return conn;
}

// ----------------------------------------------------
// Resolves with the next chunk, or an empty buffer at EOF
// ----------------------------------------------------
export function soRead(conn: TCPConn): Promise<Buffer> {
  console.assert(!conn.reader, "concurrent reads");
  return new Promise((resolve, reject) => {
    if (conn.socket.readableEnded) {
      resolve(Buffer.alloc(0));
      return;
    }
    if (conn.socket.destroyed) {
      reject(new Error("read on a destroyed socket"));
      return;
    }
    conn.reader = { resolve, reject };
    conn.socket.resume();
  });
}

export function soWrite(conn: TCPConn, data: Buffer): Promise<void> {
  return new Promise((resolve, reject) => {
    conn.socket.write(data, (err?: Error | null) => {
      if (err) reject(err);
      else resolve();
    });
  });
}

// ----------------------------------------------------
// Flush what was written, then tear the stream down
// ----------------------------------------------------
export function soClose(conn: TCPConn): Promise<void> {
  return new Promise((resolve) => {
    if (conn.socket.destroyed) {
      resolve();
      return;
    }
    conn.socket.end(() => {
      conn.socket.destroy();
      resolve();
    });
  });
}

/* ==================== LISTENER ==================== */

// ----------------------------------------------------
// A server whose connections are handed out one accept at a time
// ----------------------------------------------------
export type TCPListener = {
  server: net.Server;
  backlog: Duplex[];
  // errors raised while nobody was waiting in soAccept
  failed: Error[];
  closed: boolean;
  acceptor: null | {
    resolve: (socket: Duplex) => void;
    reject: (reason: Error) => void;
  };
};

export function soListenerInit(server: net.Server): TCPListener {
  const listener: TCPListener = {
    server,
    backlog: [],
    failed: [],
    closed: false,
    acceptor: null,
  };

  // sockets stay paused (pauseOnConnect) while they wait in the backlog
  server.on("connection", (socket: Duplex) => {
    if (listener.closed) {
      socket.destroy();
      return;
    }
    if (listener.acceptor) {
      listener.acceptor.resolve(socket);
      listener.acceptor = null;
    } else {
      listener.backlog.push(socket);
    }
  });

  server.on("error", (err: Error) => {
    if (listener.acceptor) {
      listener.acceptor.reject(err);
      listener.acceptor = null;
    } else {
      listener.failed.push(err);
    }
  });

  return listener;
}

export function soListen(port: number, host: string): Promise<TCPListener> {
  const server = net.createServer({ pauseOnConnect: true });
  const listener = soListenerInit(server);
  return new Promise((resolve, reject) => {
    const onError = (err: Error) => reject(err);
    server.once("error", onError);
    server.listen({ port, host }, () => {
      server.removeListener("error", onError);
      resolve(listener);
    });
  });
}

// ----------------------------------------------------
// Next queued connection; waits when the backlog is empty
// ----------------------------------------------------
export function soAccept(listener: TCPListener): Promise<Duplex> {
  console.assert(!listener.acceptor, "concurrent accepts");
  return new Promise((resolve, reject) => {
    if (listener.closed) {
      reject(new ListenerClosedError());
      return;
    }
    const err = listener.failed.shift();
    if (err) {
      reject(err);
      return;
    }
    const socket = listener.backlog.shift();
    if (socket) {
      resolve(socket);
      return;
    }
    listener.acceptor = { resolve, reject };
  });
}

export function soStop(listener: TCPListener): Promise<void> {
  listener.closed = true;
  if (listener.acceptor) {
    listener.acceptor.reject(new ListenerClosedError());
    listener.acceptor = null;
  }
  for (const socket of listener.backlog.splice(0)) {
    socket.destroy();
  }
  if (!listener.server.listening) return Promise.resolve();
  return new Promise((resolve, reject) => {
    listener.server.close((err?: Error) => {
      if (err) reject(err);
      else resolve();
    });
  });
}
