/**
 * Request Parser
 *
 * Nothing in a request is parsed beyond the literal method and the path token:
 *   "GET" SP <path> <delimiter> [anything...]
 * Headers, version and body are never looked at.
 */

import { ExitCode } from "@/diagnostics/exitCodes.ts";
import { ConnectionFatalError } from "@/diagnostics/errors.ts";

export const GET_LITERAL = Buffer.from("GET ", "latin1");

/** "GET " plus one delimiter after the path. */
export const REQUEST_FRAMING_OVERHEAD = 5;

/** Shortest request that can carry a path: "GET /". */
export const MIN_REQUEST_SIZE = 5;

export interface ParsedRequest {
  method: "GET";
  path: string;
}

// Whitespace and control bytes end the path token
const isDelimiter = (byte: number) => byte <= 0x20 || byte === 0x7f;

export class RequestParser {
  static parse(raw: Uint8Array): ParsedRequest {
    if (raw.length < GET_LITERAL.length || !GET_LITERAL.equals(raw.subarray(0, GET_LITERAL.length))) {
      throw new ConnectionFatalError(ExitCode.NON_GET_REQUEST, "Got a non-GET request. Aborting.");
    }

    let start = GET_LITERAL.length;
    while (start < raw.length && isDelimiter(raw[start])) start++;
    let end = start;
    while (end < raw.length && !isDelimiter(raw[end])) end++;

    const path = Buffer.from(raw.subarray(start, end)).toString("utf8");
    if (path.length < 1 || !path.startsWith("/")) {
      throw new ConnectionFatalError(ExitCode.WEIRD_REQUEST_PATH, "Got a weird request path. Aborting.");
    }
    return { method: "GET", path };
  }

  /** Largest request worth reading when the longest route is `maxRouteLength` bytes. */
  static maxRequestSize(maxRouteLength: number): number {
    return Math.max(MIN_REQUEST_SIZE, maxRouteLength + REQUEST_FRAMING_OVERHEAD);
  }
}
