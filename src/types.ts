export type LevelName = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'verbose';

export type Topic = string;

export interface SinkTopics {
  allow?: string[];
  deny?: string[];
}

export interface StdoutSink {
  enabled: boolean;
  minLevel: LevelName;
  pretty: boolean;
  topics?: SinkTopics;
}

export interface FileSink {
  enabled: boolean;
  minLevel: LevelName;
  filePath: string;
  /** Per-topic file pattern, `%TOPIC%` is replaced by the sanitized topic. */
  topicFilePath?: string;
  /** Rotation threshold in bytes; non-positive means the writer default. */
  maxSize?: number;
  topics?: SinkTopics;
}

export interface LogConfig {
  globalLevel: LevelName;
  topicLevels: Record<string, LevelName>;
  sinks: {
    stdout: StdoutSink;
    file: FileSink;
  };
}

export interface LoggerInitOptions {
  serviceName: string;
  routerName?: string;
  instanceId?: string;
  initialConfig?: LogConfig;
  configProvider?: ConfigProvider;
}

export interface ConfigProvider {
  load(): Promise<LogConfig>;
}
