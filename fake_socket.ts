import { Duplex } from "stream";
import { fileURLToPath } from "url";

import type { Logger, ServeContext } from "./types";

// ----------------------------------------------------
// In-memory stand-in for a client socket
// ----------------------------------------------------
export type FakeSocket = {
  socket: Duplex;
  // bytes the server wrote
  written: () => Buffer;
  // what a client sends
  send: (data: string | Buffer) => void;
  hangUp: () => void;
};

export function fakeSocket(options: { failWrites?: boolean } = {}): FakeSocket {
  const chunks: Buffer[] = [];
  const socket = new Duplex({
    read() {},
    write(chunk: Buffer, _encoding, callback) {
      if (options.failWrites) {
        callback(new Error("EPIPE"));
        return;
      }
      chunks.push(Buffer.from(chunk));
      callback();
    },
  });
  return {
    socket,
    written: () => Buffer.concat(chunks),
    send: (data) => {
      socket.push(typeof data === "string" ? Buffer.from(data, "latin1") : data);
    },
    hangUp: () => {
      socket.push(null);
    },
  };
}

export type ParsedResponse = {
  status: string;
  headers: [string, string][];
  body: Buffer;
};

// splits a response on the bare-\n layout the serializer writes
export function parseResponse(raw: Buffer): ParsedResponse {
  const sep = raw.indexOf("\n\n");
  if (sep < 0) throw new Error(`no header terminator in ${JSON.stringify(raw.toString("latin1"))}`);
  const [status, ...lines] = raw.subarray(0, sep).toString("latin1").split("\n");
  const headers = lines.map((line): [string, string] => {
    const colon = line.indexOf(": ");
    return [line.slice(0, colon), line.slice(colon + 2)];
  });
  return { status, headers, body: raw.subarray(sep + 2) };
}

export function header(res: ParsedResponse, name: string): string | undefined {
  return res.headers.find(([key]) => key === name)?.[1];
}

export const SERVER_ROOT = fileURLToPath(new URL("./serverroot", import.meta.url));
export const SERVER_FILES = fileURLToPath(new URL("./serverfiles", import.meta.url));

export function quietLogger(): Logger & { lines: string[] } {
  const lines: string[] = [];
  return {
    lines,
    log: (...args: unknown[]) => {
      lines.push(args.map(String).join(" "));
    },
    error: (...args: unknown[]) => {
      lines.push(args.map(String).join(" "));
    },
  };
}

export function testContext(overrides: Partial<ServeContext> = {}): ServeContext {
  return {
    serverRoot: SERVER_ROOT,
    serverFiles: SERVER_FILES,
    useCache: false,
    log: quietLogger(),
    now: () => new Date(2026, 9, 4, 7, 5, 9),
    ...overrides,
  };
}
