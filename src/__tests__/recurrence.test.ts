import fs from 'node:fs/promises';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { RegistrationError, ValidationError } from '../errors';
import { EventLog } from '../eventLog';
import {
  buildScheduleExpression,
  CrontabRegistrar,
  parseTimeOfDay,
  quoteArg,
  register,
} from '../recurrence';
import { makeTempDir, MemoryRegistrar, removeDir, silentLogger } from './helpers';

describe('parseTimeOfDay', () => {
  it('parses HH:MM', () => {
    expect(parseTimeOfDay('06:30')).toEqual({ hour: 6, minute: 30 });
    expect(parseTimeOfDay('7:05')).toEqual({ hour: 7, minute: 5 });
  });

  it.each(['24:00', '12:60', '7am', '', '12:5'])('rejects %j', (value) => {
    expect(() => parseTimeOfDay(value)).toThrow(ValidationError);
  });
});

describe('buildScheduleExpression', () => {
  it('runs daily for 24 hours', () => {
    expect(buildScheduleExpression('22:00', 24)).toBe('0 22 * * *');
  });

  it('runs weekly on Sunday for 168 hours', () => {
    expect(buildScheduleExpression('03:00', 168)).toBe('0 3 * * 0');
  });

  it('spreads divisors of a day around the start hour', () => {
    expect(buildScheduleExpression('06:00', 12)).toBe('0 6,18 * * *');
    expect(buildScheduleExpression('22:30', 6)).toBe('30 4,10,16,22 * * *');
    expect(buildScheduleExpression('00:15', 1)).toBe('15 * * * *');
  });

  it('restarts other short intervals from the start hour each day', () => {
    expect(buildScheduleExpression('08:00', 5)).toBe('0 8-23/5 * * *');
  });

  it('steps over days for whole-day intervals', () => {
    expect(buildScheduleExpression('07:45', 48)).toBe('45 7 */2 * *');
  });

  it.each([0, -24, 1.5, 30])('rejects an interval of %d hours', (hours) => {
    expect(() => buildScheduleExpression('06:00', hours)).toThrow(ValidationError);
  });
});

describe('quoteArg', () => {
  it('leaves plain paths alone', () => {
    expect(quoteArg('/usr/local/bin/node')).toBe('/usr/local/bin/node');
    expect(quoteArg('--config')).toBe('--config');
  });

  it('quotes spaces, quotes and percent signs', () => {
    expect(quoteArg('/opt/my app/run')).toBe("'/opt/my app/run'");
    expect(quoteArg("it's")).toBe("'it'\\''s'");
    expect(quoteArg('50%')).toBe("'50\\%'");
  });
});

describe('register', () => {
  it('appends a rule after the existing ones', async () => {
    const registrar = new MemoryRegistrar(['0 1 * * * /usr/bin/backup']);

    const { rule, added } = await register('06:00', 12, '/opt/app/run', { registrar });

    expect(added).toBe(true);
    expect(rule).toEqual({
      timeOfDay: '06:00',
      intervalHours: 12,
      scheduleExpression: '0 6,18 * * *',
      command: ['/opt/app/run'],
    });
    expect(registrar.rules).toEqual(['0 1 * * * /usr/bin/backup', '0 6,18 * * * /opt/app/run']);
  });

  it('places arguments after the invocation path', async () => {
    const registrar = new MemoryRegistrar();

    await register('22:00', 24, '/usr/bin/node', {
      registrar,
      args: ['/opt/transcode-batch/dist/index.js', 'run', '--config', '/etc/transcode batch.json'],
    });

    expect(registrar.rules).toEqual([
      "0 22 * * * /usr/bin/node /opt/transcode-batch/dist/index.js run --config '/etc/transcode batch.json'",
    ]);
  });

  it('does not write the same rule twice', async () => {
    const registrar = new MemoryRegistrar();
    const writeRules = vi.spyOn(registrar, 'writeRules');

    await register('03:00', 168, '/opt/app/run', { registrar });
    const second = await register('03:00', 168, '/opt/app/run', { registrar });

    expect(second.added).toBe(false);
    expect(writeRules).toHaveBeenCalledTimes(1);
    expect(registrar.rules).toEqual(['0 3 * * 0 /opt/app/run']);
  });

  it('keeps rules for other intervals side by side', async () => {
    const registrar = new MemoryRegistrar();

    await register('03:00', 168, '/opt/app/run', { registrar });
    await register('03:00', 24, '/opt/app/run', { registrar });

    expect(registrar.rules).toEqual(['0 3 * * 0 /opt/app/run', '0 3 * * * /opt/app/run']);
  });

  it('rejects a relative invocation path and records the failure', async () => {
    const registrar = new MemoryRegistrar();
    const eventLog = new EventLog(silentLogger());
    const record = vi.spyOn(eventLog, 'record');

    await expect(register('06:00', 12, 'run', { registrar, eventLog })).rejects.toBeInstanceOf(RegistrationError);
    expect(record).toHaveBeenCalledWith({
      type: 'schedule.failed',
      timeOfDay: '06:00',
      intervalHours: 12,
      error: 'Cannot register schedule: invocationPath: must be absolute, got "run"',
    });
    expect(registrar.rules).toEqual([]);
  });

  it.each([30, 36])('reports an interval of %d hours as a registration error', async (hours) => {
    const registrar = new MemoryRegistrar();

    const result = register('06:00', hours, '/opt/app/run', { registrar });

    await expect(result).rejects.toBeInstanceOf(RegistrationError);
    await expect(result).rejects.toThrow(
      `Cannot register schedule: intervalHours: ${hours} cannot be scheduled, use 1-23, 168, or a whole number of days (24, 48, ...)`
    );
    expect(registrar.rules).toEqual([]);
  });

  it('passes registrar failures through', async () => {
    const registrar = new MemoryRegistrar();
    vi.spyOn(registrar, 'writeRules').mockRejectedValue(new RegistrationError('crontab - exited with code 1: permission denied'));

    await expect(register('06:00', 12, '/opt/app/run', { registrar })).rejects.toThrow(
      'crontab - exited with code 1: permission denied'
    );
  });
});

// Shell stand-in for crontab keeping its rules in a file next to the script
const STUB_CRONTAB = `#!/bin/sh
state="$(dirname "$0")/rules"
if [ "$1" = "-l" ]; then
  if [ -f "$state" ]; then cat "$state"; exit 0; fi
  echo "no crontab for tester" >&2
  exit 1
fi
cat > "$state"
`;

describe('CrontabRegistrar', () => {
  let dir: string;
  let binary: string;

  beforeEach(async () => {
    dir = await makeTempDir();
    binary = path.join(dir, 'crontab');
    await fs.writeFile(binary, STUB_CRONTAB, { mode: 0o755 });
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('reads an empty crontab as no rules, every time', async () => {
    const registrar = new CrontabRegistrar(binary);

    for (let i = 0; i < 40; i++) {
      await expect(registrar.readRules()).resolves.toEqual([]);
    }
  });

  it('writes rules through stdin and reads them back', async () => {
    const registrar = new CrontabRegistrar(binary);

    await registrar.writeRules(['0 1 * * * /usr/bin/backup', '0 6,18 * * * /opt/app/run']);

    expect(await fs.readFile(path.join(dir, 'rules'), 'utf8')).toBe(
      '0 1 * * * /usr/bin/backup\n0 6,18 * * * /opt/app/run\n'
    );
    await expect(registrar.readRules()).resolves.toEqual(['0 1 * * * /usr/bin/backup', '0 6,18 * * * /opt/app/run']);
  });

  it('registers against the crontab binary end to end', async () => {
    const registrar = new CrontabRegistrar(binary);

    const first = await register('06:00', 12, '/opt/app/run', { registrar });
    const second = await register('06:00', 12, '/opt/app/run', { registrar });

    expect([first.added, second.added]).toEqual([true, false]);
    await expect(registrar.readRules()).resolves.toEqual(['0 6,18 * * * /opt/app/run']);
  });

  it('reports a missing crontab binary as a registration error', async () => {
    const registrar = new CrontabRegistrar('/nonexistent/crontab');

    await expect(registrar.readRules()).rejects.toThrow(
      new RegistrationError('Task registrar unavailable: /nonexistent/crontab is not installed')
    );
  });
});
