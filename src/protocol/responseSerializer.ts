/**
 * Response Serializer
 *
 * Format: "HTTP/1.1 <status>\r\nContent-Length: <n>\r\n\r\n" followed by the body.
 * The body is never copied into the header buffer; it is written separately.
 */

import type { ResponseStatus } from "@/types/index.ts";

export const STATUS_OK: ResponseStatus = "200 OK";
export const STATUS_NOT_FOUND: ResponseStatus = "404 NOT FOUND";

export const FALLBACK_NOT_FOUND_BODY = "404 NOT FOUND";

export class ResponseSerializer {
  static header(status: ResponseStatus, contentLength: number): Buffer {
    if (!Number.isSafeInteger(contentLength) || contentLength < 0) {
      throw new Error(`Invalid Content-Length: ${contentLength}`);
    }
    return Buffer.from(`HTTP/1.1 ${status}\r\nContent-Length: ${contentLength}\r\n\r\n`, "latin1");
  }

  /** Built-in 404, used when even the configured not-found route is missing. */
  static fallbackNotFound(): Buffer {
    const body = Buffer.from(FALLBACK_NOT_FOUND_BODY, "latin1");
    return Buffer.concat([this.header(STATUS_NOT_FOUND, body.length), body]);
  }
}
