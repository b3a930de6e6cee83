import { describe, it, expect, vi, beforeEach } from 'vitest';
import { stdoutWrite } from '../src/sinks/stdout.js';

let written: string[];

beforeEach(() => {
  written = [];
  vi.spyOn(process.stdout, 'write').mockImplementation((chunk: string | Uint8Array) => {
    written.push(typeof chunk === 'string' ? chunk : Buffer.from(chunk).toString('utf8'));
    return true;
  });
});

describe('stdoutWrite', () => {
  it('writes one JSON line by default', () => {
    vi.spyOn(Date, 'now').mockReturnValue(1_700_000_000_123);
    const out = stdoutWrite(false, 'http', 'warn', 'slow request', { ms: 812 });

    expect(out).toBe('{"ts":1700000000,"level":"warn","topic":"http","msg":"slow request","ms":812}\n');
    expect(written).toEqual([out]);
  });

  it('renders extras as a YAML tree in pretty mode', () => {
    const out = stdoutWrite(true, 'http', 'info', 'request done', { script: 'svc', status: 202 });
    const [head, tree] = out.split('\n');

    expect(head).toContain('svc/http');
    expect(head.endsWith('request done')).toBe(true);
    expect(tree).toBe('  ─ status: 202');
  });

  it('prints a single line in pretty mode when there are no extras', () => {
    const out = stdoutWrite(true, 'boot', 'info', 'ready', { script: 'svc' });
    expect(out.split('\n')).toHaveLength(2);
    expect(out.endsWith('ready\n')).toBe(true);
  });
});
