import type { SinkTopics } from '../types.js';

/** `name` matches exactly; `name.*` matches `name` and every `name.` sub-topic. */
function matches(topic: string, pattern: string): boolean {
  if (pattern.endsWith('.*')) {
    const prefix = pattern.slice(0, -2);
    return topic === prefix || topic.startsWith(prefix + '.');
  }
  return topic === pattern;
}

export function topicAllowed(topic: string, filter?: SinkTopics): boolean {
  if (!filter) return true;
  if (filter.deny?.some((p) => matches(topic, p))) return false;
  if (filter.allow && filter.allow.length > 0) return filter.allow.some((p) => matches(topic, p));
  return true;
}
