/**
 * Connection dispatch
 *
 * The single place where a finished connection is classified: connection-scoped
 * failures are logged and forgotten, process-scoped ones are handed upward.
 */

import type { Socket } from "node:net";
import type { FatalError } from "@/diagnostics/errors.ts";
import type { Logger } from "@/diagnostics/logger.ts";
import type { ReadonlyRouteTable } from "@/routes/RouteTable.ts";
import type { ConnectionContext, ConnectionResult, ServerStats } from "@/types/index.ts";
import { ConnectionHandler } from "./ConnectionHandler.ts";

export interface DispatchOptions {
  table: ReadonlyRouteTable;
  context: ConnectionContext;
  logger: Logger;
  stats: ServerStats;
  onProcessFatal: (error: FatalError) => void;
}

let nextConnectionId = 0;

export const peerLabel = (socket: Socket): string =>
  `${socket.remoteAddress ?? "unknown"}:${socket.remotePort ?? 0}`;

export async function dispatchConnection(socket: Socket, options: DispatchOptions): Promise<ConnectionResult> {
  const { table, context, logger, stats, onProcessFatal } = options;
  const id = `conn-${++nextConnectionId}`;
  stats.accepted++;
  logger.info(`[${id}] accepted new client: ${peerLabel(socket)}`);

  const handler = new ConnectionHandler(socket, table, context, logger, id);
  const result = await handler.run();

  if (result.ok) {
    stats.served++;
    if (result.status !== "200 OK") stats.not_found++;
    logger.info(`[${id}] GET ${result.path} -> ${result.status} (${result.bytes} bytes)`);
  } else {
    stats.failed++;
    const { error } = result;
    if (error.scope === "process") {
      logger.error(`[${id}] process-fatal failure in ${result.state}: ${error.message}`);
      onProcessFatal(error);
    } else {
      logger.error(`[${id}] connection ended in ${result.state} (${error.code} ${error.codeName}): ${error.message}`);
    }
  }

  await handler.close();
  return result;
}
