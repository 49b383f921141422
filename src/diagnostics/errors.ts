import { ExitCode, exitCodeName } from "./exitCodes.ts";

export type FatalScope = "process" | "connection";

/**
 * A failure that ends either the whole server or a single connection.
 * The message names the failing operation, followed by any system detail.
 */
export class FatalError extends Error {
  readonly code: ExitCode;
  readonly scope: FatalScope;

  constructor(scope: FatalScope, code: ExitCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.scope = scope;
    this.code = code;
  }

  get codeName(): string {
    return exitCodeName(this.code);
  }
}

export class ProcessFatalError extends FatalError {
  constructor(code: ExitCode, message: string, options?: { cause?: unknown }) {
    super("process", code, message, options);
  }
}

export class ConnectionFatalError extends FatalError {
  constructor(code: ExitCode, message: string, options?: { cause?: unknown }) {
    super("connection", code, message, options);
  }
}

export const isFatalError = (error: unknown): error is FatalError => error instanceof FatalError;

/** Render an error's message, prefixed with its errno-style code when it carries one. */
export const describeError = (error: unknown): string => {
  if (error instanceof Error) {
    const code = "code" in error && typeof error.code === "string" ? error.code : null;
    return code && !error.message.startsWith(code) ? `${code}: ${error.message}` : error.message;
  }
  return String(error);
};

/** Wrap anything thrown by a connection handler into a connection-scoped failure. */
export const toConnectionFailure = (error: unknown, operation: string): FatalError => {
  if (isFatalError(error)) return error;
  return new ConnectionFatalError(ExitCode.HANDLER_FAILED, `${operation}: ${describeError(error)}`, { cause: error });
};
