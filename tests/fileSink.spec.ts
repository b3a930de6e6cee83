import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { FileSink, sanitizeTopic, topicPath } from '../src/sinks/file.js';
import { ConstructionError } from '../src/rotate/errors.js';

let dir: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'rotolog-sink-'));
});
afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe('FileSink', () => {
  it('writes to the main file and the per-topic file, creating directories', async () => {
    const main = path.join(dir, 'logs', 'app.log');
    const sink = new FileSink(main, path.join(dir, 'logs', 'topics', 'app-%TOPIC%.log'));

    await sink.write('http/in', 'first\n');
    await sink.write('db', 'second\n');
    await sink.close();

    expect(fs.readFileSync(main, 'utf8')).toBe('first\nsecond\n');
    expect(fs.readFileSync(path.join(dir, 'logs', 'topics', 'app-http_in.log'), 'utf8')).toBe('first\n');
    expect(fs.readFileSync(path.join(dir, 'logs', 'topics', 'app-db.log'), 'utf8')).toBe('second\n');
  });

  it('rotates each file on its own size', async () => {
    const main = path.join(dir, 'app.log');
    const sink = new FileSink(main, undefined, 8);
    const events: Array<[string, string]> = [];
    sink.on('rotate', (archive: string, active: string) => events.push([archive, active]));

    await sink.write('t', '0123456789\n');
    await sink.write('t', 'next\n');
    await sink.close();

    expect(events).toHaveLength(1);
    const [archive, active] = events[0];
    expect(active).toBe(main);
    expect(path.basename(archive)).toMatch(/^app-\d{8}-\d{6}\.log$/);
    expect(fs.readFileSync(archive, 'utf8')).toBe('0123456789\n');
    expect(fs.readFileSync(main, 'utf8')).toBe('next\n');
  });

  it('rejects writes when the file cannot be opened', async () => {
    const blocker = path.join(dir, 'blocker');
    fs.writeFileSync(blocker, '');
    const sink = new FileSink(path.join(blocker, 'app.log'));

    await expect(sink.write('t', 'line\n')).rejects.toBeInstanceOf(Error);
    await expect(sink.close()).rejects.toBeInstanceOf(Error);
  });

  it('surfaces writer open failures as ConstructionError', async () => {
    fs.mkdirSync(path.join(dir, 'taken.log'));
    const sink = new FileSink(path.join(dir, 'taken.log'));
    await expect(sink.write('t', 'line\n')).rejects.toBeInstanceOf(ConstructionError);
  });
});

describe('topic paths', () => {
  it('replaces unsafe characters in topics', () => {
    expect(sanitizeTopic('http/in bound')).toBe('http_in_bound');
    expect(sanitizeTopic('db.pool-1')).toBe('db.pool-1');
  });

  it('fills every %TOPIC% placeholder', () => {
    expect(topicPath('/var/log/%TOPIC%/%TOPIC%.log', 'a:b')).toBe('/var/log/a_b/a_b.log');
  });
});
