/**
 * FrostServer - scan once, listen, restrict, serve
 *
 * The route table is built and frozen before the socket is opened; every
 * connection after that shares it read-only.
 */

import { createServer, type AddressInfo, type Server, type Socket } from "node:net";
import { ExitCode } from "@/diagnostics/exitCodes.ts";
import { FatalError, ProcessFatalError, describeError } from "@/diagnostics/errors.ts";
import type { Logger } from "@/diagnostics/logger.ts";
import type { ReadonlyRouteTable } from "@/routes/RouteTable.ts";
import { createWebRootScanner, type WebRootScanner } from "@/services/WebRootScanner.ts";
import type { PrivilegeRestrictor } from "@/services/SandboxService.ts";
import { dispatchConnection } from "@/sockets/index.ts";
import type { ConnectionContext, ServerConfig, ServerStats } from "@/types/index.ts";

export interface FrostServerOptions {
  config: ServerConfig;
  logger: Logger;
  sandbox: PrivilegeRestrictor;
  scanner?: WebRootScanner;
  /** Called when a connection surfaces a process-scoped failure. */
  onProcessFatal?: (error: FatalError) => void;
}

const BIND_ERRORS = new Set(["EADDRINUSE", "EACCES", "EADDRNOTAVAIL"]);

const errnoCode = (error: unknown): string | null =>
  error instanceof Error && "code" in error && typeof error.code === "string" ? error.code : null;

export class FrostServer {
  private config: ServerConfig;
  private logger: Logger;
  private sandbox: PrivilegeRestrictor;
  private scanner: WebRootScanner;
  private onProcessFatal: (error: FatalError) => void;
  private server: Server | null = null;
  private table: ReadonlyRouteTable | null = null;
  private context: ConnectionContext | null = null;
  private sockets = new Set<Socket>();
  private inflight = new Set<Promise<unknown>>();
  private stats: ServerStats = { accepted: 0, served: 0, not_found: 0, failed: 0 };

  constructor(options: FrostServerOptions) {
    this.config = options.config;
    this.logger = options.logger;
    this.sandbox = options.sandbox;
    this.scanner = options.scanner ?? createWebRootScanner(options.logger);
    this.onProcessFatal = options.onProcessFatal ?? ((error) => {
      this.logger.fatal(`${error.codeName}: ${error.message}`);
    });
  }

  async start(): Promise<AddressInfo> {
    if (this.server) throw new Error("FrostServer already started");

    const scan = await this.scanner.scan(this.config.web_root);
    this.table = scan.table;
    this.context = {
      max_route_length: scan.max_route_length,
      rx_timeout_ms: this.config.rx_timeout_s * 1000,
      tx_timeout_ms: this.config.tx_timeout_s * 1000,
      notfound_route: this.config.notfound_route,
    };

    const address = await this.listen();
    this.logger.info(`listening on: ${address.address}:${address.port}`);
    return address;
  }

  private listen(): Promise<AddressInfo> {
    let server: Server;
    try {
      server = createServer({ allowHalfOpen: true });
    } catch (error) {
      throw new ProcessFatalError(ExitCode.SOCKET_FAILED, `socket(): ${describeError(error)}`, { cause: error });
    }

    return new Promise<AddressInfo>((resolve, reject) => {
      const onListenError = (error: Error) => {
        const code = errnoCode(error);
        const exit = code && BIND_ERRORS.has(code) ? ExitCode.BIND_FAILED : ExitCode.LISTEN_FAILED;
        reject(new ProcessFatalError(exit, `${exit === ExitCode.BIND_FAILED ? "bind()" : "listen()"}: ${describeError(error)}`, { cause: error }));
      };
      server.once("error", onListenError);

      server.listen({ port: this.config.listen_port, host: this.config.listen_host, backlog: this.config.listen_backlog }, () => {
        server.off("error", onListenError);

        // Runs before any queued connection event can be delivered
        try {
          this.sandbox.enter();
        } catch (error) {
          server.close();
          reject(error instanceof ProcessFatalError
            ? error
            : new ProcessFatalError(ExitCode.SANDBOX_FAILED, `sandbox: ${describeError(error)}`, { cause: error }));
          return;
        }
        this.logger.info("entered sandbox.");

        server.on("connection", (socket) => this.accept(socket));
        server.on("error", (error) => {
          this.logger.error(`accept(): ${describeError(error)}`);
        });
        this.server = server;

        const address = server.address();
        if (address === null || typeof address === "string") {
          reject(new ProcessFatalError(ExitCode.LISTEN_FAILED, `listen(): unexpected address ${String(address)}`));
          return;
        }
        resolve(address);
      });
    });
  }

  private accept(socket: Socket): void {
    const { table, context } = this;
    if (!table || !context) {
      socket.destroy();
      return;
    }
    this.sockets.add(socket);
    const task = dispatchConnection(socket, {
      table,
      context,
      logger: this.logger,
      stats: this.stats,
      onProcessFatal: this.onProcessFatal,
    })
      .catch((error: unknown) => {
        this.logger.error(`dispatch: ${describeError(error)}`);
        socket.destroy();
      })
      .finally(() => {
        this.sockets.delete(socket);
        this.inflight.delete(task);
      });
    this.inflight.add(task);
  }

  /** Stop accepting, drop in-flight connections and wait for their handlers to settle. */
  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;
    const closed = new Promise<void>((resolve) => server.close(() => resolve()));
    for (const socket of this.sockets) socket.destroy();
    await Promise.allSettled(Array.from(this.inflight));
    await closed;
    this.logger.info("server stopped");
  }

  isRunning(): boolean {
    return this.server !== null;
  }

  /** The bound address while listening. */
  address(): AddressInfo | null {
    const address = this.server?.address();
    return address && typeof address !== "string" ? address : null;
  }

  getRouteTable(): ReadonlyRouteTable | null {
    return this.table;
  }

  getStats(): ServerStats {
    return { ...this.stats };
  }
}
