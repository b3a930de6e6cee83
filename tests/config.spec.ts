import { describe, it, expect } from 'vitest';
import { EnvConfigProvider } from '../src/config/envProvider.js';
import { normalizeLevel, coerceTopicLevels, levelAtLeast } from '../src/logging/levels.js';
import { topicAllowed } from '../src/utils/topicFilter.js';

describe('EnvConfigProvider', () => {
  it('uses defaults for an empty environment', async () => {
    const cfg = await new EnvConfigProvider({}).load();
    expect(cfg).toEqual({
      globalLevel: 'info',
      topicLevels: {},
      sinks: {
        stdout: { enabled: true, minLevel: 'info', pretty: true },
        file: {
          enabled: false,
          minLevel: 'info',
          filePath: './logs/app.log',
          topicFilePath: undefined,
          maxSize: 0
        }
      }
    });
  });

  it('reads file rotation settings', async () => {
    const cfg = await new EnvConfigProvider({
      LOG_LEVEL: 'DEBUG',
      LOG_FILE_ENABLED: 'true',
      LOG_FILE_MIN_LEVEL: 'warn',
      LOG_FILE_PATH: '/var/log/svc/app.log',
      LOG_TOPIC_FILE_PATH: '/var/log/svc/%TOPIC%.log',
      LOG_FILE_MAX_SIZE: '5M'
    }).load();

    expect(cfg.globalLevel).toBe('debug');
    expect(cfg.sinks.stdout.minLevel).toBe('debug');
    expect(cfg.sinks.file).toEqual({
      enabled: true,
      minLevel: 'warn',
      filePath: '/var/log/svc/app.log',
      topicFilePath: '/var/log/svc/%TOPIC%.log',
      maxSize: 5 * 1024 * 1024
    });
  });

  it('parses topic levels as JSON or topic=level pairs', async () => {
    const json = await new EnvConfigProvider({ LOG_TOPIC_LEVELS: '{"http":"debug","db":"nope"}' }).load();
    expect(json.topicLevels).toEqual({ http: 'debug', db: 'info' });

    const csv = await new EnvConfigProvider({ LOG_TOPIC_LEVELS: 'http=trace, auth = error' }).load();
    expect(csv.topicLevels).toEqual({ http: 'trace', auth: 'error' });
  });
});

describe('levels', () => {
  it('normalizes names and falls back to info', () => {
    expect(normalizeLevel('WARN')).toBe('warn');
    expect(normalizeLevel('loud')).toBe('info');
    expect(normalizeLevel('toString')).toBe('info');
    expect(normalizeLevel()).toBe('info');
  });

  it('coerces maps and objects', () => {
    expect(coerceTopicLevels(new Map([['a', 'ERROR']]))).toEqual({ a: 'error' });
    expect(coerceTopicLevels({ b: 'verbose' })).toEqual({ b: 'verbose' });
    expect(coerceTopicLevels(null)).toEqual({});
  });

  it('orders levels by severity', () => {
    expect(levelAtLeast('error', 'warn')).toBe(true);
    expect(levelAtLeast('debug', 'info')).toBe(false);
  });
});

describe('topicAllowed', () => {
  it('passes everything without a filter', () => {
    expect(topicAllowed('any')).toBe(true);
  });

  it('lets deny win over allow', () => {
    const filter = { allow: ['http.*'], deny: ['http.health'] };
    expect(topicAllowed('http.request', filter)).toBe(true);
    expect(topicAllowed('http.health', filter)).toBe(false);
    expect(topicAllowed('db', filter)).toBe(false);
  });
});
