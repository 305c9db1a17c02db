import mime from "mime-types";

export const DEFAULT_MIME_TYPE = "application/octet-stream";

// ----------------------------------------------------
// MIME type from the file extension
// ----------------------------------------------------
export function mimeTypeGet(filename: string): string {
  return mime.lookup(filename) || DEFAULT_MIME_TYPE;
}
