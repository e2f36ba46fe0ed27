import fs from 'node:fs/promises';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { EventLog } from '../eventLog';
import { createLogger } from '../logger';
import { makeTempDir, removeDir } from './helpers';

describe('createLogger', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  const linesOf = async (file: string) => (await fs.readFile(file, 'utf8')).split('\n').filter((line) => line.length > 0);

  it('appends one whole line per record after the existing content', async () => {
    const file = path.join(dir, 'transcoding.log');
    await fs.writeFile(file, 'earlier run\n');
    const log = new EventLog(createLogger({ level: 'info', file }));

    for (let i = 1; i <= 50; i++) {
      log.record({ type: 'batch.started', inputPath: `/in/${i}`, total: i, concurrency: 4 });
    }

    await vi.waitFor(async () => {
      expect(await linesOf(file)).toHaveLength(51);
    });
    const lines = await linesOf(file);
    expect(lines[0]).toBe('earlier run');
    expect(lines[1]).toContain('Batch started: 1 item(s) from /in/1');
    expect(lines[50]).toContain('Batch started: 50 item(s) from /in/50');
    expect(lines.slice(1).every((line) => line.includes('INFO'))).toBe(true);
  });

  it('creates missing parent directories', async () => {
    const file = path.join(dir, 'logs', 'nested', 'transcoding.log');

    createLogger({ level: 'info', file }).info('first record');

    await vi.waitFor(async () => {
      expect(await linesOf(file)).toHaveLength(1);
    });
  });

  it('writes records below the configured level to neither stream', async () => {
    const file = path.join(dir, 'transcoding.log');
    const log = createLogger({ level: 'warn', file });

    log.info('not written');
    log.warn('written');

    await vi.waitFor(async () => {
      expect(await linesOf(file)).toHaveLength(1);
    });
    expect((await linesOf(file))[0]).toContain('written');
    expect((await linesOf(file))[0]).not.toContain('not written');
  });

  it('writes nothing when silent', () => {
    const log = createLogger({ level: 'silent' });

    expect(log.level).toBe('silent');
    expect(log.isLevelEnabled('fatal')).toBe(false);
  });

  it('throws when the file cannot be opened', async () => {
    const blocker = path.join(dir, 'not-a-directory');
    await fs.writeFile(blocker, '');

    expect(() => createLogger({ level: 'info', file: path.join(blocker, 'transcoding.log') })).toThrow();
  });
});
