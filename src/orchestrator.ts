import type { AxiosInstance } from 'axios';
import { runBatch } from './batch';
import type { Classifier } from './classifier';
import type { Configuration } from './config';
import { discover } from './discovery';
import { DiscoveryError } from './errors';
import { EventLog } from './eventLog';
import type { Logger } from './logger';
import { notifyBatchReport } from './notify';
import type { BatchReport, TranscodeEngine, WorkItem } from './types';

export const ExitCode = {
  Success: 0,
  ItemsFailed: 1,
  SetupFailed: 2,
  Incomplete: 3,
  Unexpected: 70, // a bug rather than a bad setup or a failed item
} as const;
export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

// Item failures outrank an incomplete batch
export function exitCodeFor(report: BatchReport): ExitCode {
  if (report.counts.failed > 0) return ExitCode.ItemsFailed;
  if (report.state !== 'completed') return ExitCode.Incomplete;
  return ExitCode.Success;
}

export type RunDeps = {
  engine: TranscodeEngine;
  classifier?: Classifier;
  logger: Logger;
  eventLog?: EventLog;
  signal?: AbortSignal;
  http?: AxiosInstance; // webhook transport
  notifyBaseDelayMs?: number;
};

export type RunOutcome = { exitCode: ExitCode; report?: BatchReport };

// One batch: discover, transcode, notify. Only a discovery failure stops the run
// before a report exists; configuration errors are raised before this point.
export async function runOnce(config: Configuration, deps: RunDeps): Promise<RunOutcome> {
  const { logger } = deps;
  const eventLog = deps.eventLog ?? new EventLog(logger);

  // Snapshot the input directory
  let items: WorkItem[];
  try {
    items = await discover(config.inputPath, { extensions: config.fileExtensions, logger });
  } catch (err) {
    if (err instanceof DiscoveryError) {
      logger.error({ err, inputPath: err.inputPath }, err.message);
      return { exitCode: ExitCode.SetupFailed };
    }
    throw err;
  }

  if (items.length === 0) logger.info({ inputPath: config.inputPath }, 'No video files found');

  // Transcode the snapshot on the worker pool
  const report = await runBatch(items, config, {
    engine: deps.engine,
    classifier: deps.classifier,
    eventLog,
    logger,
    signal: deps.signal,
  });

  // Webhook delivery never changes the exit code
  if (config.notifyUrl) {
    await notifyBatchReport(report, {
      url: config.notifyUrl,
      token: config.notifyToken,
      http: deps.http,
      baseDelayMs: deps.notifyBaseDelayMs,
      logger,
      eventLog,
    });
  }

  return { exitCode: exitCodeFor(report), report };
}
