/**
 * ContentBlob - one file's bytes, held in memory for the life of the process.
 *
 * A blob is zero-filled on creation, written exactly once through `fillView()`,
 * then sealed. After sealing, connections only ever borrow `view()`.
 */

import { ExitCode } from "@/diagnostics/exitCodes.ts";
import { ProcessFatalError, describeError } from "@/diagnostics/errors.ts";

export class ContentBlob {
  private bytes: Uint8Array | null;
  private sealed = false;

  private constructor(bytes: Uint8Array) {
    this.bytes = bytes;
  }

  /** Allocate a zero-filled blob of exactly `size` bytes. */
  static create(size: number): ContentBlob {
    if (!Number.isSafeInteger(size) || size < 0) {
      throw new ProcessFatalError(ExitCode.ALLOCATION_FAILED, `allocate(): invalid blob size ${size}`);
    }
    try {
      return new ContentBlob(new Uint8Array(size));
    } catch (error) {
      throw new ProcessFatalError(ExitCode.ALLOCATION_FAILED, `allocate(${size}): ${describeError(error)}`, { cause: error });
    }
  }

  /** Length of a possibly absent blob; absent and released blobs are empty. */
  static lengthOf(blob: ContentBlob | null | undefined): number {
    return blob ? blob.length : 0;
  }

  static release(blob: ContentBlob | null | undefined): void {
    blob?.release();
  }

  get length(): number {
    return this.bytes ? this.bytes.length : 0;
  }

  isSealed(): boolean {
    return this.sealed;
  }

  /** Writable view, only available before `seal()`. */
  fillView(): Uint8Array {
    if (this.sealed) throw new Error("ContentBlob is sealed");
    return this.bytes ?? new Uint8Array(0);
  }

  /** Borrowed view of the contents. Callers must not write to it. */
  view(): Uint8Array {
    return this.bytes ?? new Uint8Array(0);
  }

  seal(): void {
    this.sealed = true;
  }

  release(): void {
    this.bytes = null;
    this.sealed = true;
  }
}
