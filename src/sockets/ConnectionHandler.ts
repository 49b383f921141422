/**
 * Connection Handler - one request, one response, then close
 *
 * AWAIT_REQUEST -> PARSE -> ROUTE_LOOKUP -> RESPOND -> CLOSED, with FATAL
 * reachable from every state. `run()` never rejects: failures come back as a
 * ConnectionResult for the dispatcher to classify.
 */

import type { Socket } from "node:net";
import { ExitCode } from "@/diagnostics/exitCodes.ts";
import { ConnectionFatalError, describeError, toConnectionFailure } from "@/diagnostics/errors.ts";
import type { Logger } from "@/diagnostics/logger.ts";
import { MIN_REQUEST_SIZE, RequestParser } from "@/protocol/requestParser.ts";
import { ResponseSerializer, STATUS_NOT_FOUND, STATUS_OK } from "@/protocol/responseSerializer.ts";
import type { ReadonlyRouteTable } from "@/routes/RouteTable.ts";
import type { ConnectionContext, ConnectionResult, ConnectionState, RouteEntry, ResponseStatus } from "@/types/index.ts";
import { readBounded, writeAll } from "./boundedIO.ts";

const discard = () => undefined;

export class ConnectionHandler {
  private socket: Socket;
  private table: ReadonlyRouteTable;
  private context: ConnectionContext;
  private logger: Logger;
  private state: ConnectionState = "AWAIT_REQUEST";
  readonly id: string;

  constructor(socket: Socket, table: ReadonlyRouteTable, context: ConnectionContext, logger: Logger, id: string) {
    this.socket = socket;
    this.table = table;
    this.context = context;
    this.logger = logger;
    this.id = id;

    // Errors between reads and writes still need a listener, or they crash the process
    this.socket.on("error", (error) => {
      this.logger.debug(`[${this.id}] socket error in ${this.state}: ${describeError(error)}`);
    });
  }

  getState(): ConnectionState {
    return this.state;
  }

  async run(): Promise<ConnectionResult> {
    try {
      const raw = await readBounded(this.socket, {
        min: MIN_REQUEST_SIZE,
        max: RequestParser.maxRequestSize(this.context.max_route_length),
        timeoutMs: this.context.rx_timeout_ms,
      });

      this.transition("PARSE");
      const { path } = RequestParser.parse(raw);

      this.transition("ROUTE_LOOKUP");
      const { status, entry } = await this.lookup(path);

      this.transition("RESPOND");
      const body = entry.blob.view();
      await writeAll(this.socket, ResponseSerializer.header(status, body.length), { timeoutMs: this.context.tx_timeout_ms });
      await writeAll(this.socket, body, { timeoutMs: this.context.tx_timeout_ms });

      return { ok: true, path, status, bytes: body.length };
    } catch (error) {
      const failedIn = this.state;
      this.transition("FATAL");
      return { ok: false, state: failedIn, error: toConnectionFailure(error, "handle connection") };
    }
  }

  /**
   * Half-close our side, drain whatever the client sent past the read bound,
   * and release the descriptor once the peer closes or the send timeout lapses.
   */
  close(): Promise<void> {
    if (this.state !== "FATAL") this.transition("CLOSED");
    const socket = this.socket;
    return new Promise<void>((resolve) => {
      if (socket.destroyed) {
        resolve();
        return;
      }
      socket.once("close", () => resolve());
      if (!socket.writable) {
        socket.destroy();
        return;
      }
      // Closing with unread input would reset the connection and could drop the response
      socket.on("data", discard);
      socket.setTimeout(this.context.tx_timeout_ms, () => socket.destroy());
      socket.end();
      socket.resume();
    });
  }

  private async lookup(path: string): Promise<{ status: ResponseStatus; entry: RouteEntry }> {
    const hit = this.table.lookup(path);
    if (hit) return { status: STATUS_OK, entry: hit };

    this.logger.info(`[${this.id}] NOT FOUND path: ${path}`);
    const notFound = this.context.notfound_route ? this.table.lookup(this.context.notfound_route) : undefined;
    if (notFound) return { status: STATUS_NOT_FOUND, entry: notFound };

    // 404 twice over: the not-found route is missing too
    await writeAll(this.socket, ResponseSerializer.fallbackNotFound(), { timeoutMs: this.context.tx_timeout_ms });
    throw new ConnectionFatalError(
      ExitCode.NOTFOUND_ROUTE_MISSING,
      `The FROST_NOTFOUND_ROUTE (${this.context.notfound_route || "unset"}) wasn't found.`,
    );
  }

  private transition(next: ConnectionState): void {
    this.logger.debug(`[${this.id}] ${this.state} -> ${next}`);
    this.state = next;
  }
}
