import { ResponseTooLargeError } from "./errors";
import { soWrite, type TCPConn } from "./tcp";
import type { Logger } from "./types";

export const MAX_RESPONSE_SIZE = 262144; // 2**18

const DAYS = ["Sun", "Mon", "Tue", "Wed", "Thu", "Fri", "Sat"];
const MONTHS = ["Jan", "Feb", "Mar", "Apr", "May", "Jun", "Jul", "Aug", "Sep", "Oct", "Nov", "Dec"];

const pad2 = (n: number) => String(n).padStart(2, "0");

/**
 * Local time in the fixed `Www Mmm dd hh:mm:ss yyyy\n` layout.
 * The trailing newline ends the Date header line.
 */
export function formatDate(date: Date): string {
  const day = String(date.getDate()).padStart(2, " ");
  const time = `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`;
  return `${DAYS[date.getDay()]} ${MONTHS[date.getMonth()]} ${day} ${time} ${date.getFullYear()}\n`;
}

export type SendOptions = {
  log: Logger;
  now?: () => Date;
};

/**
 * Send an HTTP response.
 *
 * @param header - status line, e.g. "HTTP/1.1 404 NOT FOUND" or "HTTP/1.1 200 OK"
 * @param contentType - "text/plain", etc.
 * @param body - only the first `contentLength` bytes are sent
 * @returns the number of bytes written
 */
export async function sendResponse(
  conn: TCPConn,
  header: string,
  contentType: string,
  body: Uint8Array,
  contentLength: number,
  { log, now = () => new Date() }: SendOptions,
): Promise<number> {
  const head =
    `${header}\n` +
    `Date: ${formatDate(now())}` +
    `Connection: close\n` +
    `Content-Length: ${contentLength}\n` +
    `Content-Type: ${contentType}\n` +
    `\n`;

  const headBytes = Buffer.from(head, "latin1");
  const total = headBytes.length + contentLength;
  if (total > MAX_RESPONSE_SIZE) {
    throw new ResponseTooLargeError(total, MAX_RESPONSE_SIZE);
  }

  const response = Buffer.alloc(total);
  headBytes.copy(response, 0);
  response.set(body.subarray(0, contentLength), headBytes.length);

  try {
    await soWrite(conn, response);
  } catch (err) {
    log.error("send:", err);
    throw err;
  }
  return response.length;
}
