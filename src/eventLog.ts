import { formatBytes } from './report';
import { logger as defaultLogger, type Logger } from './logger';
import type { BatchReport, ClassificationResult, JobResult, RecurrenceRule, WorkItem } from './types';

export type OrchestrationEvent =
  | { type: 'batch.started'; inputPath: string; total: number; concurrency: number }
  | { type: 'batch.cancelled'; reason: 'timeout' | 'signal'; pending: number }
  | { type: 'batch.finished'; report: BatchReport }
  | { type: 'item.started'; item: WorkItem; position: number; total: number }
  | { type: 'item.classified'; item: WorkItem; classification: ClassificationResult }
  | { type: 'item.finished'; result: JobResult }
  | { type: 'schedule.registered'; rule: RecurrenceRule; added: boolean }
  | { type: 'schedule.failed'; timeOfDay: string; intervalHours: number; error: string }
  | { type: 'notify.failed'; url: string; attempts: number; error: string };

// Append-only record of orchestration events, one line per event
export class EventLog {
  constructor(private readonly logger: Logger = defaultLogger) {}

  record(event: OrchestrationEvent): void {
    const log = this.logger;
    switch (event.type) {
      case 'batch.started':
        log.info(
          { event: event.type, inputPath: event.inputPath, total: event.total, concurrency: event.concurrency },
          `Batch started: ${event.total} item(s) from ${event.inputPath}`
        );
        return;
      case 'batch.cancelled':
        log.warn(
          { event: event.type, reason: event.reason, pending: event.pending },
          `Batch stopped dispatching (${event.reason}); ${event.pending} item(s) not started`
        );
        return;
      case 'batch.finished': {
        const { report } = event;
        log.info(
          {
            event: event.type,
            state: report.state,
            succeeded: report.counts.succeeded,
            failed: report.counts.failed,
            skipped: report.counts.skipped,
            durationMs: report.durationMs,
            bytesSaved: report.bytesSaved,
          },
          `Batch ${report.state}: ${report.counts.succeeded} succeeded, ${report.counts.failed} failed, ` +
            `${report.counts.skipped} skipped, ${formatBytes(report.bytesSaved)} saved`
        );
        return;
      }
      case 'item.started':
        log.info(
          { event: event.type, item: event.item.sourcePath },
          `Transcoding [${event.position}/${event.total}]: ${event.item.displayName}`
        );
        return;
      case 'item.classified': {
        const { classification: c } = event;
        const fields = { event: event.type, item: event.item.sourcePath, kind: c.kind, title: c.normalizedTitle };
        if (c.kind === 'unknown') {
          log.warn({ ...fields, reason: c.reason }, `Media type unknown for ${event.item.displayName}`);
        } else {
          log.info(fields, `Detected ${c.kind}: ${c.normalizedTitle}`);
        }
        return;
      }
      case 'item.finished':
        this.recordResult(event.result);
        return;
      case 'schedule.registered':
        log.info(
          { event: event.type, expression: event.rule.scheduleExpression, added: event.added },
          event.added
            ? `Scheduled to run at ${event.rule.timeOfDay} every ${event.rule.intervalHours} hour(s)`
            : `Schedule already registered: ${event.rule.scheduleExpression}`
        );
        return;
      case 'schedule.failed':
        log.error(
          { event: event.type, timeOfDay: event.timeOfDay, intervalHours: event.intervalHours, error: event.error },
          `Failed to schedule task: ${event.error}`
        );
        return;
      case 'notify.failed':
        log.error(
          { event: event.type, url: event.url, attempts: event.attempts, error: event.error },
          `Batch notification failed after ${event.attempts} attempt(s)`
        );
        return;
    }
  }

  private recordResult(result: JobResult): void {
    const base = { event: 'item.finished', item: result.item.sourcePath, outcome: result.outcome, durationMs: result.durationMs };
    switch (result.outcome) {
      case 'succeeded':
        this.logger.info(
          { ...base, destination: result.destinationPath, outputBytes: result.outputBytes },
          `Transcoding complete: ${result.item.displayName} -> ${result.destinationPath}`
        );
        return;
      case 'failed':
        this.logger.error(
          { ...base, exitCode: result.exitCode, exitSignal: result.exitSignal, diagnostic: result.diagnostic },
          `Transcoding failed: ${result.item.displayName}`
        );
        return;
      case 'skipped':
        this.logger.warn({ ...base, reason: result.reason }, `Skipped: ${result.item.displayName}`);
        return;
    }
  }
}
