/**
 * Core types for the static file server
 */

import type { ContentBlob } from "@/routes/ContentBlob.ts";
import type { FatalError } from "@/diagnostics/errors.ts";
import type { LogLevel } from "@/diagnostics/logger.ts";

// Route storage
export interface RouteEntry {
  readonly path: string;
  readonly blob: ContentBlob;
}

// Configuration, as loaded from FROST_* environment variables
export interface ServerConfig {
  listen_backlog: number;
  listen_port: number;
  listen_host: string;
  rx_timeout_s: number;
  tx_timeout_s: number;
  web_root: string;
  /** Empty string means no not-found route is configured. */
  notfound_route: string;
  log_level: LogLevel;
  require_sandbox: boolean;
}

// Connection protocol
export type ConnectionState = "AWAIT_REQUEST" | "PARSE" | "ROUTE_LOOKUP" | "RESPOND" | "CLOSED" | "FATAL";

export type ResponseStatus = "200 OK" | "404 NOT FOUND";

export type ConnectionResult =
  | { ok: true; path: string; status: ResponseStatus; bytes: number }
  | { ok: false; state: ConnectionState; error: FatalError };

/** Read-only inputs every connection handler shares. */
export interface ConnectionContext {
  max_route_length: number;
  rx_timeout_ms: number;
  tx_timeout_ms: number;
  notfound_route: string;
}

export interface ServerStats {
  accepted: number;
  served: number;
  not_found: number;
  failed: number;
}
