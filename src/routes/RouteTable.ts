/**
 * Route table: exact path -> file contents.
 *
 * Sized once from the number of files the scan discovered, filled during the
 * scan, then frozen before the first connection is accepted. There is no
 * delete; the table lives as long as the process.
 */

import { ExitCode } from "@/diagnostics/exitCodes.ts";
import { ProcessFatalError } from "@/diagnostics/errors.ts";
import type { RouteEntry } from "@/types/index.ts";
import type { ContentBlob } from "./ContentBlob.ts";

/** What connection handlers get to see. */
export interface ReadonlyRouteTable {
  readonly size: number;
  lookup(path: string): RouteEntry | undefined;
}

export class RouteTable implements ReadonlyRouteTable {
  readonly capacity: number;
  private entries: Map<string, RouteEntry>;
  private frozen = false;

  constructor(capacity: number) {
    if (!Number.isSafeInteger(capacity) || capacity < 0) {
      throw new ProcessFatalError(ExitCode.ALLOCATION_FAILED, `route table: invalid capacity ${capacity}`);
    }
    this.capacity = capacity;
    this.entries = new Map();
  }

  get size(): number {
    return this.entries.size;
  }

  insert(path: string, blob: ContentBlob): RouteEntry {
    if (this.frozen) {
      throw new ProcessFatalError(ExitCode.ROUTE_TABLE_FULL, `route table: insert of ${path} after freeze`);
    }
    if (this.entries.has(path)) {
      throw new ProcessFatalError(ExitCode.DUPLICATE_ROUTE, `route table: duplicate route ${path}`);
    }
    if (this.entries.size >= this.capacity) {
      throw new ProcessFatalError(ExitCode.ROUTE_TABLE_FULL, `route table: table is full (capacity ${this.capacity})`);
    }
    const entry: RouteEntry = Object.freeze({ path, blob });
    this.entries.set(path, entry);
    return entry;
  }

  lookup(path: string): RouteEntry | undefined {
    return this.entries.get(path);
  }

  paths(): string[] {
    return Array.from(this.entries.keys());
  }

  freeze(): ReadonlyRouteTable {
    this.frozen = true;
    return this;
  }

  isFrozen(): boolean {
    return this.frozen;
  }

  /** Release every blob of a table that never made it to serving. */
  dispose(): void {
    if (this.frozen) throw new Error("cannot dispose a frozen route table");
    for (const entry of this.entries.values()) entry.blob.release();
    this.entries.clear();
  }
}
