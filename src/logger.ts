import { EventEmitter } from 'events';
import { levelAtLeast, normalizeLevel } from './logging/levels.js';
import { stdoutWrite } from './sinks/stdout.js';
import { FileSink } from './sinks/file.js';
import { topicAllowed } from './utils/topicFilter.js';
import type { LogConfig, LevelName, Topic } from './types.js';

/**
 * Topic logger with a stdout sink and a size-rotated JSON-lines file sink.
 *
 * Events:
 * - `stdout` (block, topic, level, msg, data) for every line printed
 * - `sinkError` (err, topic) when a file write fails; `log()` never throws for it
 * - `rotate` (archivePath, activePath) when a log file was rotated
 */
export class Logger extends EventEmitter {
  private cfg: LogConfig;
  private fileSink?: FileSink;
  private meta: { serviceName: string; routerName?: string; instanceId?: string };
  private pending: Set<Promise<void>> = new Set();

  constructor(serviceName: string, cfg: LogConfig, routerName?: string, instanceId?: string) {
    super();
    this.meta = { serviceName, routerName, instanceId };
    this.cfg = this.normalize(cfg);
    this.setupSinks();
  }

  update(next: Partial<LogConfig>) {
    const merged: LogConfig = {
      globalLevel: normalizeLevel(next.globalLevel ?? this.cfg.globalLevel),
      topicLevels: { ...this.cfg.topicLevels, ...(next.topicLevels || {}) },
      sinks: { ...this.cfg.sinks, ...(next.sinks || {}) }
    };
    this.cfg = this.normalize(merged);
    this.setupSinks(this.retireFileSink());
  }

  getConfig(): LogConfig { return this.cfg; }

  /** Resolves once every file write issued so far has settled. */
  async flush(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.allSettled([...this.pending]);
    }
  }

  async close(): Promise<void> {
    this.retireFileSink();
    await this.flush();
  }

  private normalize(cfg: LogConfig): LogConfig {
    return {
      ...cfg,
      globalLevel: normalizeLevel(cfg.globalLevel),
      topicLevels: Object.fromEntries(Object.entries(cfg.topicLevels || {}).map(([k, v]) => [k, normalizeLevel(v)])),
      sinks: {
        ...cfg.sinks,
        stdout: { ...cfg.sinks.stdout, minLevel: normalizeLevel(cfg.sinks.stdout.minLevel) },
        file: { ...cfg.sinks.file, minLevel: normalizeLevel(cfg.sinks.file.minLevel) }
      }
    };
  }

  private setupSinks(previousClosed?: Promise<void>) {
    const file = this.cfg.sinks.file;
    this.fileSink = file.enabled
      ? new FileSink(file.filePath, file.topicFilePath, file.maxSize, previousClosed)
      : undefined;
    this.fileSink?.on('rotate', (archive: string, active: string) => this.emit('rotate', archive, active));
  }

  /**
   * Close the current file sink once its queued writes are done.
   * The returned promise settles after the close and never rejects.
   */
  private retireFileSink(): Promise<void> | undefined {
    const sink = this.fileSink;
    this.fileSink = undefined;
    if (!sink) return undefined;
    return this.track(sink.close(), 'logger');
  }

  private track(p: Promise<void>, topic: Topic): Promise<void> {
    const tracked = p
      .catch((err: unknown) => { this.emit('sinkError', err, topic); })
      .finally(() => { this.pending.delete(tracked); });
    this.pending.add(tracked);
    return tracked;
  }

  private minLevelFor(topic: Topic): LevelName {
    const t = this.cfg.topicLevels?.[topic];
    if (t) return t;
    return this.cfg.globalLevel;
  }

  private allowedFor(topic: Topic, level: LevelName) {
    return levelAtLeast(level, this.minLevelFor(topic));
  }

  log(level: LevelName, topic: Topic, msg: string, data: Record<string, unknown> = {}) {
    if (!this.allowedFor(topic, level)) return;

    // stdout
    const stdout = this.cfg.sinks.stdout;
    if (stdout.enabled && levelAtLeast(level, stdout.minLevel) && topicAllowed(topic, stdout.topics)) {
      const devPretty = stdout.pretty && process.env.NODE_ENV === 'development';
      const outData = { script: this.meta.serviceName, router: this.meta.routerName, instance: this.meta.instanceId, ...data };
      const outBlock = stdoutWrite(devPretty, topic, level, msg, outData);
      this.emit('stdout', outBlock, topic, level, msg, outData);
    }

    // file (JSON lines)
    const file = this.cfg.sinks.file;
    if (this.fileSink && levelAtLeast(level, file.minLevel) && topicAllowed(topic, file.topics)) {
      const base = { ts: Math.floor(Date.now() / 1000), level, topic, msg, ...data };
      this.track(this.fileSink.write(topic, JSON.stringify(base) + '\n'), topic);
    }
  }

  // convenience wrappers
  fatal(topic: Topic, msg: string, data?: Record<string, unknown>) { this.log('fatal', topic, msg, data); }
  error(topic: Topic, msg: string, data?: Record<string, unknown>) { this.log('error', topic, msg, data); }
  warn(topic: Topic, msg: string, data?: Record<string, unknown>) { this.log('warn', topic, msg, data); }
  info(topic: Topic, msg: string, data?: Record<string, unknown>) { this.log('info', topic, msg, data); }
  debug(topic: Topic, msg: string, data?: Record<string, unknown>) { this.log('debug', topic, msg, data); }
  trace(topic: Topic, msg: string, data?: Record<string, unknown>) { this.log('trace', topic, msg, data); }
  verbose(topic: Topic, msg: string, data?: Record<string, unknown>) { this.log('verbose', topic, msg, data); }
}
