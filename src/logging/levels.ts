import type { LevelName } from '../types.js';

export const LEVELS: Record<LevelName, number> = {
  fatal: 60,
  error: 50,
  warn: 40,
  info: 30,
  debug: 20,
  trace: 10,
  verbose: 5
};

function isLevelName(name: string): name is LevelName {
  return Object.prototype.hasOwnProperty.call(LEVELS, name);
}

export function normalizeLevel(name?: string): LevelName {
  const n = (name ?? 'info').toLowerCase();
  return isLevelName(n) ? n : 'info';
}

/** Coerce a persisted topicLevels (object or Map) to Record<string, LevelName> */
export function coerceTopicLevels(input: unknown): Record<string, LevelName> {
  const out: Record<string, LevelName> = {};
  if (!input || typeof input !== 'object') return out;
  const entries: Array<[unknown, unknown]> = input instanceof Map ? Array.from(input.entries()) : Object.entries(input);
  for (const [k, v] of entries) {
    out[String(k)] = normalizeLevel(typeof v === 'string' ? v : String(v));
  }
  return out;
}

export function levelAtLeast(level: LevelName, min: LevelName): boolean {
  return LEVELS[level] >= LEVELS[min];
}
