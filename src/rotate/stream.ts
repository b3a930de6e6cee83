import { Writable } from 'stream';
import { RotatingWriter, type RotatingWriterOptions } from './writer.js';

/**
 * Node Writable over a RotatingWriter, for piping into a size-rotated file.
 * Re-emits the writer's `rotate` event.
 */
export class RotatingFileStream extends Writable {
  private writer: RotatingWriter | null = null;

  constructor(
    readonly filePath: string,
    readonly maxSize?: number,
    private readonly opts: RotatingWriterOptions = {}
  ) {
    super({ decodeStrings: true });
  }

  override _construct(callback: (error?: Error | null) => void): void {
    RotatingWriter.open(this.filePath, this.maxSize, this.opts).then(
      (writer) => {
        writer.on('rotate', (archive: string) => this.emit('rotate', archive));
        this.writer = writer;
        callback();
      },
      (err: Error) => callback(err)
    );
  }

  override _write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    if (!this.writer) {
      callback(new Error('rotating stream is not open'));
      return;
    }
    this.writer.write(chunk).then(
      () => callback(),
      (err: Error) => callback(err)
    );
  }

  override _final(callback: (error?: Error | null) => void): void {
    this.release(callback);
  }

  override _destroy(error: Error | null, callback: (error?: Error | null) => void): void {
    this.release((closeErr) => callback(error ?? closeErr));
  }

  private release(callback: (error?: Error | null) => void) {
    const writer = this.writer;
    this.writer = null;
    if (!writer) {
      callback();
      return;
    }
    writer.close().then(
      () => callback(),
      (err: Error) => callback(err)
    );
  }
}

export function createRotatingStream(filePath: string, maxSize?: number, opts?: RotatingWriterOptions) {
  return new RotatingFileStream(filePath, maxSize, opts);
}
