import axios, { type AxiosInstance } from 'axios';
import { errorMessage } from './errors';
import type { EventLog } from './eventLog';
import { logger as defaultLogger, type Logger } from './logger';
import { summarize } from './report';
import type { BatchReport } from './types';

export type NotifyOptions = {
  url: string;
  token?: string;
  http?: AxiosInstance;
  maxAttempts?: number;
  baseDelayMs?: number; // doubles after every failed attempt
  timeoutMs?: number;
  logger?: Logger;
  eventLog?: EventLog;
};

// POSTs the batch summary to a webhook. Returns whether it was delivered;
// a notification problem never changes the outcome of the batch.
export async function notifyBatchReport(report: BatchReport, options: NotifyOptions): Promise<boolean> {
  const http = options.http ?? axios;
  const log = options.logger ?? defaultLogger;
  const maxAttempts = Math.max(1, options.maxAttempts ?? 3);
  const baseDelayMs = options.baseDelayMs ?? 1000;
  const body = summarize(report);

  // Retry with exponential backoff
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      await http.post(options.url, body, {
        headers: options.token ? { Authorization: `Bearer ${options.token}` } : undefined,
        timeout: options.timeoutMs ?? 30_000,
      });
      log.info({ url: options.url, attempt }, 'Batch notification sent');
      return true;
    } catch (err) {
      // Out of attempts: record it and move on
      if (attempt === maxAttempts) {
        options.eventLog?.record({ type: 'notify.failed', url: options.url, attempts: attempt, error: errorMessage(err) });
        if (!options.eventLog) log.error({ err, url: options.url, attempt }, 'Batch notification failed');
        return false;
      }
      const retryDelay = baseDelayMs * Math.pow(2, attempt - 1);
      log.warn({ err, url: options.url, attempt, retryDelay }, `Batch notification failed, retrying... (${attempt}/${maxAttempts})`);
      await new Promise((resolve) => setTimeout(resolve, retryDelay));
    }
  }
  return false;
}
