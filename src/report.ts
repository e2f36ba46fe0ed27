import type { BatchFailure, BatchReport, BatchState, JobOutcome, JobResult } from './types';

// Accumulates one JobResult per item while a batch runs, then freezes into a BatchReport.
export class BatchReportBuilder {
  private readonly results: JobResult[] = [];
  private readonly seen = new Set<string>();
  private finalized = false;

  constructor(
    private readonly total: number,
    private readonly startedAt: Date = new Date()
  ) {}

  get size(): number {
    return this.results.length;
  }

  // One result per source path, none after finalize
  record(result: JobResult): void {
    if (this.finalized) throw new Error('Batch report is already finalized');
    const key = result.item.sourcePath;
    if (this.seen.has(key)) throw new Error(`Duplicate result for ${key}`);
    this.seen.add(key);
    this.results.push(Object.freeze(result));
  }

  // Counts and byte totals over succeeded items only
  finalize(state: BatchState, finishedAt: Date = new Date()): BatchReport {
    this.finalized = true;
    const counts: Record<JobOutcome, number> = { succeeded: 0, failed: 0, skipped: 0 };
    const failures: BatchFailure[] = [];
    let bytesIn = 0;
    let bytesOut = 0;

    for (const result of this.results) {
      counts[result.outcome] += 1;
      if (result.outcome === 'failed') {
        failures.push({ sourcePath: result.item.sourcePath, diagnostic: result.diagnostic });
      } else if (result.outcome === 'succeeded') {
        bytesIn += result.item.sizeBytes;
        bytesOut += result.outputBytes;
      }
    }

    return Object.freeze({
      state,
      startedAt: this.startedAt,
      finishedAt,
      durationMs: finishedAt.getTime() - this.startedAt.getTime(),
      total: this.total,
      counts: Object.freeze(counts),
      results: Object.freeze([...this.results]),
      failures: Object.freeze(failures),
      bytesIn,
      bytesOut,
      bytesSaved: bytesIn - bytesOut,
    });
  }
}

// Binary units, two decimals
export function formatBytes(bytes: number): string {
  const units = ['B', 'KB', 'MB', 'GB', 'TB'];
  let value = Math.abs(bytes);
  let unit = 0;
  while (value >= 1024 && unit < units.length - 1) {
    value /= 1024;
    unit += 1;
  }
  return `${bytes < 0 ? '-' : ''}${value.toFixed(2)} ${units[unit]}`;
}

// Webhook payload
export function summarize(report: BatchReport) {
  return {
    state: report.state,
    total: report.total,
    succeeded: report.counts.succeeded,
    failed: report.counts.failed,
    skipped: report.counts.skipped,
    durationMs: report.durationMs,
    bytesSaved: report.bytesSaved,
    failures: report.failures.map((f) => ({ sourcePath: f.sourcePath, diagnostic: f.diagnostic })),
  };
}
