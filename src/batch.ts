import { unknownResult, type Classifier } from './classifier';
import type { Configuration } from './config';
import { errorMessage } from './errors';
import { EventLog } from './eventLog';
import { logger as defaultLogger, type Logger } from './logger';
import { BatchReportBuilder } from './report';
import { execute } from './transcodeJob';
import type { BatchReport, ClassificationResult, JobResult, TranscodeEngine, WorkItem } from './types';

export type BatchDeps = {
  engine: TranscodeEngine;
  classifier?: Classifier; // consulted only when media detection is enabled
  eventLog?: EventLog;
  logger?: Logger;
  signal?: AbortSignal; // stops dispatch; running jobs finish
};

// Classification bounded on our side too, so a stalled lookup cannot hold a worker.
async function classifyWithDeadline(
  classifier: Classifier,
  item: WorkItem,
  config: Configuration
): Promise<ClassificationResult> {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<ClassificationResult>((resolve) => {
    timer = setTimeout(() => resolve(unknownResult(item.displayName, 'timeout')), config.classificationTimeoutMs);
  });
  try {
    return await Promise.race([classifier.classify(item.displayName, config.apiKey), deadline]);
  } catch (err) {
    return unknownResult(item.displayName, errorMessage(err));
  } finally {
    clearTimeout(timer);
  }
}

// Runs every item through classification (optional) and the job executor on a
// pool of `maxConcurrentJobs` workers.
// Workers claim items in discovery order. Each item yields exactly one JobResult:
// jobs that throw are recorded as failed, and items never dispatched because of a
// timeout or an abort are recorded as skipped. Running jobs are always awaited.
export async function runBatch(items: readonly WorkItem[], config: Configuration, deps: BatchDeps): Promise<BatchReport> {
  const log = deps.logger ?? defaultLogger;
  const events = deps.eventLog ?? new EventLog(log);
  const report = new BatchReportBuilder(items.length);
  const total = items.length;

  events.record({ type: 'batch.started', inputPath: config.inputPath, total, concurrency: config.maxConcurrentJobs });

  // Shared dispatch cursor; stopping only prevents further claims
  let nextIndex = 0;
  let stopReason: 'timeout' | 'signal' | undefined;
  const stop = (reason: 'timeout' | 'signal') => {
    if (stopReason !== undefined) return;
    stopReason = reason;
    events.record({ type: 'batch.cancelled', reason, pending: Math.max(0, total - nextIndex) });
  };

  // Abort signal and optional batch deadline
  const onAbort = () => stop('signal');
  if (deps.signal?.aborted) stop('signal');
  deps.signal?.addEventListener('abort', onAbort, { once: true });
  const timer = config.batchTimeoutMs !== undefined ? setTimeout(() => stop('timeout'), config.batchTimeoutMs) : undefined;

  // Classify (when enabled) then execute; a throw becomes a failed result
  const processItem = async (item: WorkItem, position: number): Promise<JobResult> => {
    const startTime = Date.now();
    try {
      events.record({ type: 'item.started', item, position, total });
      let classification: ClassificationResult | undefined;
      if (config.mediaDetectionEnabled && deps.classifier) {
        classification = await classifyWithDeadline(deps.classifier, item, config);
        events.record({ type: 'item.classified', item, classification });
      }
      return await execute(item, config, classification, { engine: deps.engine, logger: log });
    } catch (err) {
      return { item, outcome: 'failed', diagnostic: errorMessage(err), durationMs: Date.now() - startTime };
    }
  };

  // Each worker claims the next index until the list runs out or dispatch stops
  const worker = async () => {
    while (stopReason === undefined) {
      const current = nextIndex++;
      if (current >= total) break;
      const item = items[current];
      if (item === undefined) break;
      const result = await processItem(item, current + 1);
      report.record(result);
      events.record({ type: 'item.finished', result });
    }
  };

  // Start the pool and wait for every running job
  const workers: Promise<void>[] = [];
  const workerCount = Math.min(config.maxConcurrentJobs, total);
  for (let i = 0; i < workerCount; i++) workers.push(worker());
  try {
    await Promise.all(workers);
  } finally {
    clearTimeout(timer);
    deps.signal?.removeEventListener('abort', onAbort);
  }

  // Items never claimed are recorded as skipped
  for (const item of items.slice(Math.min(nextIndex, total))) {
    const result: JobResult = {
      item,
      outcome: 'skipped',
      reason: stopReason === 'timeout' ? 'batch timed out before dispatch' : 'batch cancelled before dispatch',
      durationMs: 0,
    };
    report.record(result);
    events.record({ type: 'item.finished', result });
  }

  const state = stopReason === 'timeout' ? 'timedOut' : stopReason === 'signal' ? 'cancelled' : 'completed';
  const finalReport = report.finalize(state);
  events.record({ type: 'batch.finished', report: finalReport });
  return finalReport;
}

// In short, this file:
// 1) Claims items in discovery order on a pool of maxConcurrentJobs workers
// 2) Classifies each item under a deadline when media detection is on
// 3) Runs the job executor and records one result per item
// 4) Stops dispatching on a signal or the batch timeout, recording the rest as skipped
