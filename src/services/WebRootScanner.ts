/**
 * Web Root Scanner - loads every servable file into memory, once
 *
 * Walks the web root physically (symlinks are never followed) and depth-first,
 * refusing anything that could point outside the root or change under us:
 * symlinks, other devices, cycles and special files all abort the scan. Dot
 * files and dot directories are skipped. Whatever survives is read in full and
 * frozen into a RouteTable.
 */

import { lstat, open, readdir } from "node:fs/promises";
import { join } from "node:path";
import { ExitCode } from "@/diagnostics/exitCodes.ts";
import { ProcessFatalError, describeError } from "@/diagnostics/errors.ts";
import type { Logger } from "@/diagnostics/logger.ts";
import { ContentBlob } from "@/routes/ContentBlob.ts";
import { RouteTable, type ReadonlyRouteTable } from "@/routes/RouteTable.ts";
import { routeForSegments } from "@/routes/index.ts";

// The subset of fs.Stats the walk relies on
export interface EntryStats {
  dev: number;
  ino: number;
  size: number;
  isFile(): boolean;
  isDirectory(): boolean;
  isSymbolicLink(): boolean;
}

export interface ScanFileHandle {
  /** Read into `target` starting at `offset`; resolves to the byte count, 0 at EOF. */
  read(target: Uint8Array, offset: number): Promise<number>;
  close(): Promise<void>;
}

export interface ScanFileSystem {
  lstat(path: string): Promise<EntryStats>;
  readdir(path: string): Promise<string[]>;
  open(path: string): Promise<ScanFileHandle>;
}

export const nodeScanFileSystem: ScanFileSystem = {
  lstat: (path) => lstat(path),
  readdir: (path) => readdir(path),
  async open(path) {
    const handle = await open(path, "r");
    return {
      read: async (target, offset) =>
        (await handle.read(target, offset, target.length - offset, offset)).bytesRead,
      close: () => handle.close(),
    };
  },
};

export interface ScanResult {
  table: ReadonlyRouteTable;
  /** Longest route, in UTF-8 bytes. */
  max_route_length: number;
  file_count: number;
}

interface PlannedFile {
  fs_path: string;
  route: string;
  size: number;
}

const isDotName = (name: string) => name.startsWith(".");

export class WebRootScanner {
  private logger: Logger;
  private fs: ScanFileSystem;

  constructor(logger: Logger, fs: ScanFileSystem = nodeScanFileSystem) {
    this.logger = logger;
    this.fs = fs;
  }

  /**
   * Scan `root` and return the frozen table plus the longest route seen.
   * Every failure is a ProcessFatalError; no partial table ever escapes.
   */
  async scan(root: string): Promise<ScanResult> {
    const rootStats = await this.statRoot(root);
    const planned: PlannedFile[] = [];
    await this.walk(root, [], rootStats.dev, [`${rootStats.dev}:${rootStats.ino}`], planned);

    const table = new RouteTable(planned.length);
    let maxRouteLength = 0;
    try {
      for (const file of planned) {
        this.logger.debug(`routing ${file.route} -> ${file.fs_path}`);
        // Requests are bounded in bytes, not UTF-16 units
        maxRouteLength = Math.max(maxRouteLength, Buffer.byteLength(file.route, "utf8"));
        const blob = await this.load(file);
        try {
          table.insert(file.route, blob);
        } catch (error) {
          blob.release();
          throw error;
        }
      }
    } catch (error) {
      table.dispose();
      throw error;
    }

    this.logger.info(`loaded ${table.size} routes from ${root} (longest route: ${maxRouteLength})`);
    return { table: table.freeze(), max_route_length: maxRouteLength, file_count: table.size };
  }

  private async statRoot(root: string): Promise<EntryStats> {
    let stats: EntryStats;
    try {
      stats = await this.fs.lstat(root);
    } catch (error) {
      throw new ProcessFatalError(ExitCode.SCAN_OPEN_FAILED, `open web root: ${root}: ${describeError(error)}`, { cause: error });
    }
    if (stats.isSymbolicLink()) {
      throw new ProcessFatalError(ExitCode.SYMLINK_IN_WEB_ROOT, `encountered a symbolic link in the web root: ${root}`);
    }
    if (!stats.isDirectory()) {
      throw new ProcessFatalError(ExitCode.UNUSUAL_FILE, `web root is not a directory: ${root}`);
    }
    return stats;
  }

  private async walk(dir: string, segments: string[], rootDev: number, ancestry: string[], planned: PlannedFile[]): Promise<void> {
    this.logger.debug(`scanning path for web root: ${dir}`);

    let names: string[];
    try {
      names = await this.fs.readdir(dir);
    } catch (error) {
      throw new ProcessFatalError(ExitCode.SCAN_READ_FAILED, `readdir(): ${dir}: ${describeError(error)}`, { cause: error });
    }
    names.sort();

    for (const name of names) {
      const path = join(dir, name);
      let stats: EntryStats;
      try {
        stats = await this.fs.lstat(path);
      } catch (error) {
        throw new ProcessFatalError(ExitCode.SCAN_READ_FAILED, `lstat(): ${path}: ${describeError(error)}`, { cause: error });
      }

      if (stats.isSymbolicLink()) {
        throw new ProcessFatalError(ExitCode.SYMLINK_IN_WEB_ROOT, `encountered a symbolic link in the web root: ${path}`);
      }

      if (stats.isDirectory()) {
        if (isDotName(name)) {
          this.logger.debug(`skipping dotfolder ${path}`);
          continue;
        }
        if (stats.dev !== rootDev) {
          throw new ProcessFatalError(ExitCode.CROSS_DEVICE_IN_WEB_ROOT, `encountered a different device in the web root: ${path}`);
        }
        const key = `${stats.dev}:${stats.ino}`;
        if (ancestry.includes(key)) {
          throw new ProcessFatalError(ExitCode.CYCLE_IN_WEB_ROOT, `encountered a filesystem cycle in the web root: ${path}`);
        }
        await this.walk(path, [...segments, name], rootDev, [...ancestry, key], planned);
        continue;
      }

      if (!stats.isFile()) {
        throw new ProcessFatalError(ExitCode.UNUSUAL_FILE, `encountered a non-regular file in the web root: ${path}`);
      }

      if (isDotName(name)) {
        this.logger.debug(`skipping dotfile ${path}`);
        continue;
      }

      this.logger.debug(`found file for web root: ${path}`);
      planned.push({ fs_path: path, route: routeForSegments([...segments, name]), size: stats.size });
    }
  }

  /** Read a planned file into a fresh blob of exactly the size seen during the walk. */
  private async load(file: PlannedFile): Promise<ContentBlob> {
    const blob = ContentBlob.create(file.size);
    let handle: ScanFileHandle;
    try {
      handle = await this.fs.open(file.fs_path);
    } catch (error) {
      blob.release();
      throw new ProcessFatalError(ExitCode.FILE_OPEN_FAILED, `open(): ${file.fs_path}: ${describeError(error)}`, { cause: error });
    }

    try {
      const target = blob.fillView();
      let total = 0;
      while (total < target.length) {
        const n = await handle.read(target, total);
        if (n === 0) break;
        total += n;
      }
      if (total !== file.size) {
        throw new ProcessFatalError(
          ExitCode.FILE_READ_FAILED,
          `read(): ${file.fs_path}: file size was mismatched, or was changed between scan and read. expected ${file.size}, read ${total}`,
        );
      }
    } catch (error) {
      blob.release();
      await handle.close().catch((closeError: unknown) => {
        this.logger.warn(`close(): ${file.fs_path}: ${describeError(closeError)}`);
      });
      if (error instanceof ProcessFatalError) throw error;
      throw new ProcessFatalError(ExitCode.FILE_READ_FAILED, `read(): ${file.fs_path}: ${describeError(error)}`, { cause: error });
    }

    try {
      await handle.close();
    } catch (error) {
      blob.release();
      throw new ProcessFatalError(ExitCode.FILE_READ_FAILED, `close(): ${file.fs_path}: ${describeError(error)}`, { cause: error });
    }
    blob.seal();
    return blob;
  }
}

export function createWebRootScanner(logger: Logger, fs?: ScanFileSystem): WebRootScanner {
  return new WebRootScanner(logger, fs);
}
