import path from 'path';
import fs from 'fs';
import { EventEmitter } from 'events';
import { RotatingWriter } from '../rotate/writer.js';

/**
 * JSON-lines file sink. Every target file is a size-rotated RotatingWriter:
 * the main file, and one file per topic when a `%TOPIC%` pattern is set.
 * Rotations are re-emitted as `rotate` (archivePath, activePath).
 */
export class FileSink extends EventEmitter {
  private mainWriter: Promise<RotatingWriter> | null = null;
  private topicWriters: Map<string, Promise<RotatingWriter>> = new Map();
  private readonly basePath?: string;
  private readonly topicPattern?: string;
  private readonly maxSize?: number;
  private readonly ready: Promise<void>;

  /**
   * `ready` holds back every file open until it settles, so a sink replacing
   * another on the same paths starts only after the old one has closed.
   */
  constructor(filePath?: string, topicFilePath?: string, maxSize?: number, ready: Promise<void> = Promise.resolve()) {
    super();
    this.basePath = filePath || undefined;
    this.topicPattern = topicFilePath || undefined;
    this.maxSize = maxSize;
    this.ready = ready;

    if (this.basePath) {
      this.mainWriter = this.openWriter(this.basePath);
    }
  }

  /** Resolves once the line reached every target file; rejects with the first writer error. */
  async write(topic: string, line: string): Promise<void> {
    const targets: Array<Promise<RotatingWriter>> = [];
    if (this.mainWriter) targets.push(this.mainWriter);

    if (this.topicPattern) {
      const p = topicPath(this.topicPattern, topic);
      let w = this.topicWriters.get(p);
      if (!w) {
        w = this.openWriter(p);
        this.topicWriters.set(p, w);
      }
      targets.push(w);
    }

    await Promise.all(targets.map(async (t) => (await t).write(line)));
  }

  async close(): Promise<void> {
    const all = [...(this.mainWriter ? [this.mainWriter] : []), ...this.topicWriters.values()];
    this.mainWriter = null;
    this.topicWriters.clear();
    const results = await Promise.allSettled(all.map(async (w) => (await w).close()));
    const failed = results.find((r): r is PromiseRejectedResult => r.status === 'rejected');
    if (failed) throw failed.reason;
  }

  private openWriter(target: string): Promise<RotatingWriter> {
    const opened = (async () => {
      await this.ready;
      await fs.promises.mkdir(path.dirname(target), { recursive: true });
      const writer = await RotatingWriter.open(target, this.maxSize);
      writer.on('rotate', (archive: string) => this.emit('rotate', archive, target));
      return writer;
    })();
    // an unopened writer is reported through the first write() that needs it
    void opened.catch(() => undefined);
    return opened;
  }
}

/* --------------------------------- helpers -------------------------------- */

export function topicPath(pattern: string, topic: string): string {
  return pattern.replace(/%TOPIC%/g, sanitizeTopic(topic));
}

export function sanitizeTopic(t: string): string {
  return t.replace(/[^\w.-]+/g, '_');
}
