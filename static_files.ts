import * as path from "path";

import type { Cache } from "./cache";
import { fileLoad, type FileLoadResult } from "./file";
import { mimeTypeGet } from "./mime";
import { sendResponse } from "./response";
import type { TCPConn } from "./tcp";
import type { ServeContext } from "./types";

export const NOT_FOUND_STATUS = "HTTP/1.1 404 NOT FOUND";
export const OK_STATUS = "HTTP/1.1 200 OK";

// used only when the system 404 page itself is gone
export const FALLBACK_404_PAGE = Buffer.from(
  "<!DOCTYPE html><html><body><h1>404 Not Found</h1></body></html>\n",
);

/**
 * Map a request path to a file under `root`. Returns null when the
 * normalized result would leave the root, e.g. through `..` segments.
 */
export function resolvePath(root: string, requestPath: string): string | null {
  const base = path.resolve(root);
  const full = path.resolve(base, `.${path.posix.sep}${requestPath}`);
  const rel = path.relative(base, full);
  if (rel === "" || rel === ".." || rel.startsWith(`..${path.sep}`) || path.isAbsolute(rel)) {
    return null;
  }
  return full;
}

// ----------------------------------------------------
// Send a 404 response
// ----------------------------------------------------
export async function resp404(conn: TCPConn, ctx: ServeContext): Promise<void> {
  const filepath = path.join(ctx.serverFiles, "404.html");
  const filedata = await fileLoad(filepath);

  if (filedata.kind === "notFound") {
    ctx.log.error("cannot find system 404 file");
    await sendResponse(conn, NOT_FOUND_STATUS, "text/html", FALLBACK_404_PAGE, FALLBACK_404_PAGE.length, ctx);
    return;
  }

  await sendResponse(conn, NOT_FOUND_STATUS, mimeTypeGet(filepath), filedata.data, filedata.size, ctx);
}

async function loadUnderRoot(ctx: ServeContext, requestPath: string): Promise<FileLoadResult> {
  const filepath = resolvePath(ctx.serverRoot, requestPath);
  if (filepath === null) return { kind: "notFound", path: requestPath };
  return fileLoad(filepath);
}

// ----------------------------------------------------
// Serve a file from the document root, from disk or cache
// ----------------------------------------------------
export async function respFile(
  conn: TCPConn,
  cache: Cache,
  requestPath: string,
  ctx: ServeContext,
): Promise<void> {
  if (ctx.useCache) {
    const hit = cache.get(requestPath);
    if (hit) {
      await sendResponse(conn, OK_STATUS, hit.contentType, hit.content, hit.content.length, ctx);
      return;
    }
  }

  const filedata = await loadUnderRoot(ctx, requestPath);
  if (filedata.kind === "notFound") {
    ctx.log.error(`cannot find ${requestPath}`);
    await resp404(conn, ctx);
    return;
  }

  const mimeType = mimeTypeGet(requestPath);
  if (ctx.useCache) cache.put(requestPath, mimeType, filedata.data);

  await sendResponse(conn, OK_STATUS, mimeType, filedata.data, filedata.size, ctx);
}
