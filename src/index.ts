#!/usr/bin/env node
/**
 * frost-httpd entry point
 *
 * Static files, loaded once, served over the smallest HTTP-shaped protocol we
 * could get away with. Any process-fatal condition exits with its own code.
 */

import { describeConfig, loadConfig } from "@/config.ts";
import { ExitCode } from "@/diagnostics/exitCodes.ts";
import { FatalError, describeError } from "@/diagnostics/errors.ts";
import { createLogger, isLogLevel, type Logger } from "@/diagnostics/logger.ts";
import { assertNotRoot, createSandbox } from "@/services/SandboxService.ts";
import { FrostServer } from "@/server.ts";

/** Log and exit with the failure's code; unknown errors exit with DISPATCH_FAILED. */
function terminate(logger: Logger, error: unknown): never {
  if (error instanceof FatalError) {
    logger.fatal(`${error.message} (exit ${error.code} ${error.codeName})`);
    process.exit(error.code);
  }
  logger.fatal(`unexpected failure: ${describeError(error)}`);
  process.exit(ExitCode.DISPATCH_FAILED);
}

async function main() {
  const envLevel = process.env.FROST_LOG_LEVEL ?? "";
  let logger = createLogger({ level: isLogLevel(envLevel) ? envLevel : "info" });

  try {
    assertNotRoot();
    logger.notice("frost-httpd STARTING UP");

    const config = loadConfig();
    logger = createLogger({ level: config.log_level });
    for (const line of describeConfig(config)) logger.info(line);

    const server = new FrostServer({
      config,
      logger,
      sandbox: createSandbox(logger, { require_permission_model: config.require_sandbox }),
      onProcessFatal: (error) => terminate(logger, error),
    });
    await server.start();

    const shutdown = (signal: string) => {
      logger.notice(`received ${signal}, shutting down`);
      server.stop().then(
        () => process.exit(ExitCode.OK),
        (error: unknown) => terminate(logger, error),
      );
    };
    process.once("SIGINT", () => shutdown("SIGINT"));
    process.once("SIGTERM", () => shutdown("SIGTERM"));
  } catch (error) {
    terminate(logger, error);
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(ExitCode.DISPATCH_FAILED);
});
