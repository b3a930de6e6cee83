import { normalizeLevel, coerceTopicLevels } from '../logging/levels.js';
import { parseSize } from '../utils/format.js';
import type { ConfigProvider, LogConfig, LevelName } from '../types.js';

const parseList = (s?: string) => (s || '').split(',').map(x => x.trim()).filter(Boolean);

export class EnvConfigProvider implements ConfigProvider {
  constructor(private env: NodeJS.ProcessEnv = process.env) {}

  async load(): Promise<LogConfig> {
    const env = this.env;
    const globalLevel = normalizeLevel(env.LOG_LEVEL || 'info');
    const pretty = (env.LOG_STDOUT_PRETTY || 'true') === 'true';

    // topicLevels: either JSON string or csv topic=level
    let topicLevels: Record<string, LevelName> = {};
    const tl = env.LOG_TOPIC_LEVELS;
    if (tl) {
      try {
        topicLevels = coerceTopicLevels(JSON.parse(tl));
      } catch {
        const obj: Record<string, string> = {};
        for (const pair of parseList(tl)) {
          const [k, v] = pair.split('=');
          if (k && v) obj[k.trim()] = v.trim();
        }
        topicLevels = coerceTopicLevels(obj);
      }
    }

    return {
      globalLevel,
      topicLevels,
      sinks: {
        stdout: {
          enabled: (env.LOG_STDOUT_ENABLED || 'true') === 'true',
          minLevel: normalizeLevel(env.LOG_STDOUT_MIN_LEVEL || globalLevel),
          pretty
        },
        file: {
          enabled: (env.LOG_FILE_ENABLED || 'false') === 'true',
          minLevel: normalizeLevel(env.LOG_FILE_MIN_LEVEL || globalLevel),
          filePath: env.LOG_FILE_PATH || './logs/app.log',
          topicFilePath: env.LOG_TOPIC_FILE_PATH || undefined,
          // 0 lets the writer fall back to its default
          maxSize: parseSize(env.LOG_FILE_MAX_SIZE)
        }
      }
    };
  }
}
