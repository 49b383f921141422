/**
 * Bounded socket I/O
 *
 * Promise wrappers around a net.Socket that read at most `max` bytes and write
 * a whole buffer, each under the socket's idle timeout. Every failure is a
 * ConnectionFatalError whose code tells a hard transport error apart from a
 * short or oversized transfer.
 */

import type { Socket } from "node:net";
import { ExitCode } from "@/diagnostics/exitCodes.ts";
import { ConnectionFatalError, describeError } from "@/diagnostics/errors.ts";

export interface ReadBounds {
  min: number;
  max: number;
  timeoutMs: number;
}

/**
 * Collect bytes until `max` have arrived or the peer ends its side.
 * Bytes past `max` in the final chunk are dropped.
 */
export function readBounded(socket: Socket, bounds: ReadBounds): Promise<Buffer> {
  const { min, max, timeoutMs } = bounds;

  return new Promise<Buffer>((resolve, reject) => {
    const chunks: Buffer[] = [];
    let received = 0;
    let settled = false;

    const cleanup = () => {
      settled = true;
      socket.off("data", onData);
      socket.off("end", onEnd);
      socket.off("close", onEnd);
      socket.off("error", onError);
      socket.off("timeout", onTimeout);
      socket.setTimeout(0);
      socket.pause();
    };

    const finish = () => {
      if (settled) return;
      cleanup();
      if (received < min || received > max) {
        reject(new ConnectionFatalError(ExitCode.WEIRD_RX_LENGTH, `Weird receive length (${received}, want ${min}..${max}). Aborting.`));
        return;
      }
      resolve(Buffer.concat(chunks, received));
    };

    const onData = (chunk: Buffer) => {
      const take = Math.min(chunk.length, max - received);
      chunks.push(chunk.subarray(0, take));
      received += take;
      if (received >= max) finish();
    };

    const onEnd = () => finish();

    const onError = (error: Error) => {
      if (settled) return;
      cleanup();
      reject(new ConnectionFatalError(ExitCode.SOCKET_READ_FAILED, `read(): ${describeError(error)}`, { cause: error }));
    };

    const onTimeout = () => {
      if (settled) return;
      cleanup();
      reject(new ConnectionFatalError(ExitCode.SOCKET_READ_FAILED, `read(): timed out after ${timeoutMs}ms`));
    };

    if (socket.readableEnded || socket.destroyed) {
      finish();
      return;
    }

    socket.on("data", onData);
    socket.on("end", onEnd);
    socket.on("close", onEnd);
    socket.on("error", onError);
    socket.on("timeout", onTimeout);
    socket.setTimeout(timeoutMs);
    socket.resume();
  });
}

export interface WriteBounds {
  timeoutMs: number;
}

/** Write every byte of `bytes`, resolving with the count once Node has flushed it. */
export function writeAll(socket: Socket, bytes: Uint8Array, bounds: WriteBounds): Promise<number> {
  const { timeoutMs } = bounds;

  return new Promise<number>((resolve, reject) => {
    let settled = false;

    const settle = (error: ConnectionFatalError | null) => {
      if (settled) return;
      settled = true;
      socket.off("close", onClose);
      socket.off("error", onError);
      socket.off("timeout", onTimeout);
      socket.setTimeout(0);
      if (error) reject(error);
      else resolve(bytes.length);
    };

    const onClose = () =>
      settle(new ConnectionFatalError(ExitCode.WEIRD_TX_LENGTH, "Didn't manage to send enough bytes to the client."));

    const onError = (error: Error) =>
      settle(new ConnectionFatalError(ExitCode.SOCKET_SEND_FAILED, `send(): ${describeError(error)}`, { cause: error }));

    const onTimeout = () =>
      settle(new ConnectionFatalError(ExitCode.SOCKET_SEND_FAILED, `send(): timed out after ${timeoutMs}ms`));

    if (socket.destroyed || !socket.writable) {
      onClose();
      return;
    }

    socket.on("close", onClose);
    socket.on("error", onError);
    socket.on("timeout", onTimeout);
    socket.setTimeout(timeoutMs);

    if (bytes.length === 0) {
      settle(null);
      return;
    }

    socket.write(bytes, (error) => {
      if (error) onError(error);
      else settle(null);
    });
  });
}
