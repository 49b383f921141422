/**
 * Privilege restriction
 *
 * `assertNotRoot()` runs before anything else. `enter()` runs exactly once,
 * after the route table is built and the socket is listening, and before the
 * first connection is handled.
 */

import { ExitCode } from "@/diagnostics/exitCodes.ts";
import { ProcessFatalError, describeError } from "@/diagnostics/errors.ts";
import type { Logger } from "@/diagnostics/logger.ts";

export interface PrivilegeRestrictor {
  enter(): void;
}

export interface SandboxOptions {
  /** Fail unless Node's permission model is active and denies writes and child processes. */
  require_permission_model: boolean;
}

type PermissionCheck = (scope: string) => boolean;

/** Node's permission model, when the process was started under it. */
export function permissionModel(proc: object = process): PermissionCheck | null {
  if (!("permission" in proc)) return null;
  const model: unknown = proc.permission;
  if (typeof model !== "object" || model === null || !("has" in model)) return null;
  const has: unknown = model.has;
  if (typeof has !== "function") return null;
  return (scope) => Reflect.apply(has, model, [scope]) === true;
}

const describeGrants = (granted: string[]) =>
  granted.length > 0 ? `permission model still grants ${granted.join(", ")}` : null;

export function assertNotRoot(uid: number | undefined = process.getuid?.()): void {
  if (uid === 0) {
    throw new ProcessFatalError(ExitCode.DONT_USE_ROOT, "Do not run an HTTP server as root.");
  }
}

export class ProcessSandbox implements PrivilegeRestrictor {
  private logger: Logger;
  private options: SandboxOptions;
  private entered = false;

  constructor(logger: Logger, options: SandboxOptions) {
    this.logger = logger;
    this.options = options;
  }

  enter(): void {
    if (this.entered) return;

    try {
      // Nothing this process creates from here on is readable or writable by anyone
      process.umask(0o777);
    } catch (error) {
      throw new ProcessFatalError(ExitCode.SANDBOX_FAILED, `umask(): ${describeError(error)}`, { cause: error });
    }

    const check = permissionModel();
    const problem = !check
      ? "Node permission model is not active (start with --experimental-permission)"
      : describeGrants(["fs.write", "child", "worker"].filter((scope) => check(scope)));

    if (problem) {
      if (this.options.require_permission_model) {
        throw new ProcessFatalError(ExitCode.SANDBOX_FAILED, `sandbox: ${problem}.`);
      }
      this.logger.warn(`sandbox: ${problem}; only umask was restricted.`);
    }

    this.entered = true;
  }
}

export function createSandbox(logger: Logger, options: SandboxOptions): PrivilegeRestrictor {
  return new ProcessSandbox(logger, options);
}
