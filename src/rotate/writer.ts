import fs from 'fs';
import type { FileHandle } from 'fs/promises';
import { EventEmitter } from 'events';
import { archiveName } from '../utils/format.js';
import {
  ConstructionError,
  RotationRenameError,
  RotationReopenError,
  UnderlyingWriteError
} from './errors.js';

/** 10 MiB */
export const DEFAULT_MAX_SIZE = 10 * 1024 * 1024;

const FILE_MODE = 0o666;

export interface RotatingWriterOptions {
  /** Clock used for archive names. */
  now?: () => Date;
}

export function normalizeMaxSize(maxSize?: number): number {
  const size = maxSize === undefined ? 0 : Math.floor(maxSize);
  if (!Number.isFinite(size) || size <= 0) return DEFAULT_MAX_SIZE;
  return size;
}

/**
 * Append-only file writer that rotates on size.
 *
 * Before every write the size of the open file is checked; once it is strictly
 * greater than `maxSize` the file is closed, renamed to
 * `<base>-<YYYYMMDD-HHMMSS><ext>` and a fresh file is opened at `path`.
 * Writes are queued, so a check-rotate-write sequence never overlaps another.
 *
 * Events:
 * - `rotate` (archivePath) after a completed rotation
 * - `closeError` (err) when closing the old file during rotation fails
 */
export class RotatingWriter extends EventEmitter {
  readonly path: string;
  readonly maxSize: number;

  private handle: FileHandle | null;
  private queue: Promise<void> = Promise.resolve();
  private closed = false;
  private readonly now: () => Date;

  private constructor(filePath: string, maxSize: number, handle: FileHandle, opts: RotatingWriterOptions) {
    super();
    this.path = filePath;
    this.maxSize = maxSize;
    this.handle = handle;
    this.now = opts.now ?? (() => new Date());
  }

  static async open(filePath: string, maxSize?: number, opts: RotatingWriterOptions = {}): Promise<RotatingWriter> {
    let handle: FileHandle;
    try {
      handle = await fs.promises.open(filePath, 'a', FILE_MODE);
    } catch (err) {
      throw new ConstructionError(`cannot open ${filePath}`, filePath, err);
    }
    return new RotatingWriter(filePath, normalizeMaxSize(maxSize), handle, opts);
  }

  /** True while a file is open; false after a failed rotation or close(). */
  get usable(): boolean {
    return this.handle !== null;
  }

  write(data: Uint8Array | string): Promise<number> {
    const buf = typeof data === 'string' ? Buffer.from(data, 'utf8') : data;
    return this.exclusive(() => this.checkAndWrite(buf));
  }

  /** Waits for queued writes, then releases the file. Idempotent. */
  close(): Promise<void> {
    return this.exclusive(async () => {
      this.closed = true;
      const current = this.handle;
      this.handle = null;
      if (current) await current.close();
    });
  }

  private exclusive<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.queue.then(fn);
    // the chain only orders calls; the outcome belongs to `run`'s caller
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async checkAndWrite(buf: Uint8Array): Promise<number> {
    const size = await this.currentSize();
    if (size !== null && size > this.maxSize) {
      await this.rotate();
    }
    return this.writeAll(buf);
  }

  /** Size of the open file, or null when it cannot be determined. */
  private async currentSize(): Promise<number | null> {
    if (!this.handle) return null;
    try {
      const st = await this.handle.stat();
      return st.size;
    } catch {
      // an unknown size never triggers rotation
      return null;
    }
  }

  private async rotate(): Promise<void> {
    const current = this.handle;
    this.handle = null;
    if (current) {
      try {
        await current.close();
      } catch (err) {
        this.emit('closeError', err);
      }
    }

    const when = this.now();
    let archive = archiveName(this.path, when);
    try {
      archive = await this.freeArchiveName(when);
      await fs.promises.rename(this.path, archive);
    } catch (err) {
      throw new RotationRenameError(this.path, archive, err);
    }

    try {
      this.handle = await fs.promises.open(this.path, 'a', FILE_MODE);
    } catch (err) {
      throw new RotationReopenError(this.path, archive, err);
    }
    this.emit('rotate', archive);
  }

  private async freeArchiveName(when: Date): Promise<string> {
    for (let n = 0; ; n++) {
      const candidate = archiveName(this.path, when, n);
      if (!(await exists(candidate))) return candidate;
    }
  }

  private async writeAll(buf: Uint8Array): Promise<number> {
    const handle = this.handle;
    if (!handle) {
      const reason = this.closed ? 'writer is closed' : 'no open file after a failed rotation';
      throw new UnderlyingWriteError(this.path, 0, new Error(reason));
    }

    let written = 0;
    try {
      while (written < buf.length) {
        const { bytesWritten } = await handle.write(buf, written, buf.length - written);
        if (bytesWritten === 0) throw new Error('short write');
        written += bytesWritten;
      }
    } catch (err) {
      throw new UnderlyingWriteError(this.path, written, err);
    }
    return written;
  }
}

async function exists(p: string): Promise<boolean> {
  try {
    await fs.promises.lstat(p);
    return true;
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ENOENT') return false;
    throw err;
  }
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

export function createRotatingWriter(filePath: string, maxSize?: number, opts?: RotatingWriterOptions) {
  return RotatingWriter.open(filePath, maxSize, opts);
}
