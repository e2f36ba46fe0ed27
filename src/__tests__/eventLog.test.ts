import { describe, expect, it } from 'vitest';
import { EventLog } from '../eventLog';
import { BatchReportBuilder } from '../report';
import type { WorkItem } from '../types';
import { captureLogger } from './helpers';

const item: WorkItem = {
  sourcePath: '/in/a.mkv',
  displayName: 'a',
  sizeBytes: 100,
  discoveredAt: new Date('2024-01-01T00:00:00Z'),
};

describe('EventLog', () => {
  it('writes one line per event', () => {
    const { logger, lines } = captureLogger();
    const log = new EventLog(logger);

    log.record({ type: 'batch.started', inputPath: '/in', total: 1, concurrency: 4 });
    log.record({ type: 'item.started', item, position: 1, total: 1 });
    log.record({ type: 'batch.cancelled', reason: 'signal', pending: 0 });

    expect(lines).toHaveLength(3);
    expect(lines.every((line) => line.endsWith('\n') && line.indexOf('\n') === line.length - 1)).toBe(true);
  });

  it('records a failed item with its diagnostic at error level', () => {
    const { logger, records } = captureLogger();

    new EventLog(logger).record({
      type: 'item.finished',
      result: { item, outcome: 'failed', diagnostic: 'Engine exited with code 1', exitCode: 1, durationMs: 7 },
    });

    expect(records()[0]).toMatchObject({
      level: 50,
      event: 'item.finished',
      item: '/in/a.mkv',
      outcome: 'failed',
      exitCode: 1,
      diagnostic: 'Engine exited with code 1',
      msg: 'Transcoding failed: a',
    });
  });

  it('records a succeeded item with its destination', () => {
    const { logger, records } = captureLogger();

    new EventLog(logger).record({
      type: 'item.finished',
      result: { item, outcome: 'succeeded', destinationPath: '/out/a.mkv', outputBytes: 40, originalDeleted: false, durationMs: 7 },
    });

    expect(records()[0]).toMatchObject({ level: 30, outcome: 'succeeded', msg: 'Transcoding complete: a -> /out/a.mkv' });
  });

  it('warns when classification degraded', () => {
    const { logger, records } = captureLogger();

    new EventLog(logger).record({
      type: 'item.classified',
      item,
      classification: { kind: 'unknown', normalizedTitle: 'a', confidence: 0, reason: 'timeout' },
    });

    expect(records()[0]).toMatchObject({ level: 40, kind: 'unknown', reason: 'timeout', msg: 'Media type unknown for a' });
  });

  it('summarizes a finished batch', () => {
    const { logger, records } = captureLogger();
    const builder = new BatchReportBuilder(1, new Date('2024-01-01T10:00:00Z'));
    builder.record({ item, outcome: 'succeeded', destinationPath: '/out/a.mkv', outputBytes: 40, originalDeleted: true, durationMs: 7 });

    new EventLog(logger).record({ type: 'batch.finished', report: builder.finalize('completed', new Date('2024-01-01T10:00:01Z')) });

    expect(records()[0]).toMatchObject({
      level: 30,
      event: 'batch.finished',
      state: 'completed',
      succeeded: 1,
      bytesSaved: 60,
      msg: 'Batch completed: 1 succeeded, 0 failed, 0 skipped, 60.00 B saved',
    });
  });

  it('records registrar outcomes', () => {
    const { logger, records } = captureLogger();
    const log = new EventLog(logger);
    const rule = { timeOfDay: '22:00', intervalHours: 24, scheduleExpression: '0 22 * * *', command: ['/opt/app/run'] };

    log.record({ type: 'schedule.registered', rule, added: true });
    log.record({ type: 'schedule.registered', rule, added: false });
    log.record({ type: 'schedule.failed', timeOfDay: '22:00', intervalHours: 24, error: 'crontab is not installed' });

    expect(records().map((r) => r.msg)).toEqual([
      'Scheduled to run at 22:00 every 24 hour(s)',
      'Schedule already registered: 0 22 * * *',
      'Failed to schedule task: crontab is not installed',
    ]);
  });
});
