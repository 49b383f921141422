import { z } from "zod";
import { ExitCode } from "@/diagnostics/exitCodes.ts";
import { ProcessFatalError } from "@/diagnostics/errors.ts";
import { LOG_LEVELS } from "@/diagnostics/logger.ts";
import type { ServerConfig } from "@/types/index.ts";

export const DEFAULT_LISTEN_BACKLOG = 16;
export const MAX_LISTEN_BACKLOG = 128;
export const DEFAULT_LISTEN_PORT = 80;
export const DEFAULT_TIMEOUT_S = 1;
export const DEFAULT_WEB_ROOT = "public_html";
export const DEFAULT_NOTFOUND_ROUTE = "/404.html";

const intVar = (fallback: number, min: number, max: number) =>
  z
    .string()
    .regex(/^-?\d+$/, { message: "must be a decimal integer" })
    .default(String(fallback))
    .transform(Number)
    .pipe(z.number().int().min(min).max(max));

const boolVar = z
  .enum(["1", "0", "true", "false", "yes", "no"])
  .default("0")
  .transform((v) => v === "1" || v === "true" || v === "yes");

const EnvSchema = z.object({
  FROST_LISTEN_BACKLOG: intVar(DEFAULT_LISTEN_BACKLOG, 1, MAX_LISTEN_BACKLOG),
  FROST_LISTEN_PORT: intVar(DEFAULT_LISTEN_PORT, 0, 65535),
  FROST_LISTEN_HOST: z.string().min(1).default("0.0.0.0"),
  FROST_RX_TIMEOUT: intVar(DEFAULT_TIMEOUT_S, 1, 65535),
  FROST_TX_TIMEOUT: intVar(DEFAULT_TIMEOUT_S, 1, 65535),
  FROST_WEB_ROOT: z.string().min(1).default(DEFAULT_WEB_ROOT),
  FROST_NOTFOUND_ROUTE: z
    .string()
    .default(DEFAULT_NOTFOUND_ROUTE)
    .refine((v) => v === "" || v.startsWith("/"), { message: "must be empty or begin with /" }),
  FROST_LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
  FROST_REQUIRE_SANDBOX: boolVar,
});

/** Read and validate FROST_* variables. Throws a process-fatal INVALID_ENV error. */
export function loadConfig(env: Record<string, string | undefined> = process.env): ServerConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new ProcessFatalError(ExitCode.INVALID_ENV, `invalid environment: ${detail}`);
  }
  const e = parsed.data;
  return {
    listen_backlog: e.FROST_LISTEN_BACKLOG,
    listen_port: e.FROST_LISTEN_PORT,
    listen_host: e.FROST_LISTEN_HOST,
    rx_timeout_s: e.FROST_RX_TIMEOUT,
    tx_timeout_s: e.FROST_TX_TIMEOUT,
    web_root: e.FROST_WEB_ROOT,
    notfound_route: e.FROST_NOTFOUND_ROUTE,
    log_level: e.FROST_LOG_LEVEL,
    require_sandbox: e.FROST_REQUIRE_SANDBOX,
  };
}

/** One line per setting, in the order they are logged at startup. */
export const describeConfig = (config: ServerConfig): string[] => [
  `listen backlog length (FROST_LISTEN_BACKLOG): ${config.listen_backlog}`,
  `listen address (FROST_LISTEN_HOST, FROST_LISTEN_PORT): ${config.listen_host}:${config.listen_port}`,
  `receive timeout (FROST_RX_TIMEOUT): ${config.rx_timeout_s}s`,
  `transmit timeout (FROST_TX_TIMEOUT): ${config.tx_timeout_s}s`,
  `server root (FROST_WEB_ROOT): ${config.web_root}`,
  `404 not found route (FROST_NOTFOUND_ROUTE): ${config.notfound_route || "(none)"}`,
];
