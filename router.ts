import type { Cache } from "./cache";
import { resp404, respFile } from "./static_files";
import { soRead, type TCPConn } from "./tcp";
import type { ServeContext } from "./types";

export const REQUEST_BUFFER_SIZE = 65536; // 64K
export const MAX_METHOD_LEN = 9;
export const MAX_PATH_LEN = 106;

export type RequestLine = { method: string; path: string };

// the C locale's isspace set; no-break space and the like are token bytes
const SPACE = /[ \t\n\v\f\r]+/;
const LEADING_SPACE = /^[ \t\n\v\f\r]+/;
const PROFILE = /^\/profile\/([^ \t\n\v\f\r]+)/;

/**
 * First two whitespace-delimited tokens of the request.
 * The text ends at the first NUL byte. Returns null when there are fewer
 * than two tokens or either one is longer than its field allows.
 */
export function parseRequestLine(raw: Buffer): RequestLine | null {
  const nul = raw.indexOf(0);
  const text = raw.subarray(0, nul < 0 ? raw.length : nul).toString("latin1");
  const [method, path] = text.replace(LEADING_SPACE, "").split(SPACE, 2);
  if (!method || !path) return null;
  if (method.length > MAX_METHOD_LEN || path.length > MAX_PATH_LEN) return null;
  return { method, path };
}

export async function handleGetRequest(
  conn: TCPConn,
  cache: Cache,
  path: string,
  ctx: ServeContext,
): Promise<void> {
  ctx.log.log(`GET: ${path}`);

  if (PROFILE.test(path)) {
    await respFile(conn, cache, "/profile.html", ctx);
  } else {
    await respFile(conn, cache, "/index.html", ctx);
  }
}

// nothing is saved; the body is only logged
export async function handlePostRequest(
  conn: TCPConn,
  _cache: Cache,
  _path: string,
  request: string,
  ctx: ServeContext,
): Promise<void> {
  ctx.log.log(`POST: ${request}`);
  await resp404(conn, ctx);
}

// ----------------------------------------------------
// Read one request and send its response
// ----------------------------------------------------
export async function handleHttpRequest(conn: TCPConn, cache: Cache, ctx: ServeContext): Promise<void> {
  let data: Buffer;
  try {
    data = await soRead(conn);
  } catch (err) {
    ctx.log.error("recv:", err);
    return;
  }

  if (data.length === 0) {
    ctx.log.error("recv: connection closed before a request arrived");
    return;
  }

  const request = data.subarray(0, REQUEST_BUFFER_SIZE - 1);
  const line = parseRequestLine(request);

  if (line === null) {
    await resp404(conn, ctx);
  } else if (line.method === "GET") {
    await handleGetRequest(conn, cache, line.path, ctx);
  } else if (line.method === "POST") {
    await handlePostRequest(conn, cache, line.path, request.toString("latin1"), ctx);
  } else {
    await resp404(conn, ctx);
  }
}
