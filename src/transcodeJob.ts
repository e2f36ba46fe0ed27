import fs from 'node:fs/promises';
import path from 'node:path';
import type { Configuration } from './config';
import { errorMessage } from './errors';
import { logger as defaultLogger, type Logger } from './logger';
import type {
  ClassificationResult,
  EngineRun,
  FailedJob,
  JobResult,
  TranscodeEngine,
  TranscodeProgress,
  WorkItem,
} from './types';

const DIAGNOSTIC_LINES = 20;

export type JobDeps = {
  engine: TranscodeEngine;
  logger?: Logger;
};

type RoutingConfig = Pick<Configuration, 'outputPath' | 'movieOutputPath' | 'tvOutputPath'>;

// Movies and series go to their own trees; unclassified items to the default output.
export function routeDestination(config: RoutingConfig, classification?: ClassificationResult): string {
  switch (classification?.kind) {
    case 'movie':
      return config.movieOutputPath;
    case 'series':
      return config.tvOutputPath;
    default:
      return config.outputPath;
  }
}

// Last lines of the engine's error stream, where ffmpeg puts the reason it stopped
export function tailLines(text: string, count: number = DIAGNOSTIC_LINES): string {
  const lines = text.split(/\r?\n/).filter((line) => line.trim().length > 0);
  return lines.slice(-count).join('\n');
}

// Size of a regular file at the path, 0 otherwise
async function outputSize(filePath: string): Promise<number> {
  try {
    const stats = await fs.stat(filePath);
    return stats.isFile() ? stats.size : 0;
  } catch {
    // missing output reads as empty
    return 0;
  }
}

// Debug line every 10%
function progressLogger(item: WorkItem, log: Logger) {
  let lastStep = -1;
  return (progress: TranscodeProgress) => {
    if (progress.percent === undefined) return;
    const step = Math.floor(progress.percent / 10);
    if (step <= lastStep) return;
    lastStep = step;
    log.debug(
      { item: item.sourcePath, percent: Math.round(progress.percent), timemark: progress.timemark },
      `ffmpeg progress ${item.displayName}`
    );
  };
}

// Transcode one item and apply the post-action. Never throws and never retries.
// The source is removed only when `deleteOriginal` is set and the destination has been
// confirmed present and non-empty, and verified when the engine can verify.
export async function execute(
  item: WorkItem,
  config: Configuration,
  classification: ClassificationResult | undefined,
  deps: JobDeps
): Promise<JobResult> {
  const log = deps.logger ?? defaultLogger;
  const startTime = Date.now();
  const kind = classification?.kind;
  const destinationDir = routeDestination(config, classification);
  const destinationPath = path.join(destinationDir, path.basename(item.sourcePath));

  const fail = (diagnostic: string, extra: Partial<Pick<FailedJob, 'exitCode' | 'exitSignal'>> = {}): JobResult => ({
    item,
    outcome: 'failed',
    diagnostic,
    ...extra,
    kind,
    durationMs: Date.now() - startTime,
  });

  // Writing over the source would destroy it
  if (path.resolve(destinationPath) === path.resolve(item.sourcePath)) {
    return fail('Destination is the source file; refusing to overwrite it');
  }

  try {
    await fs.mkdir(destinationDir, { recursive: true });
  } catch (err) {
    return fail(`Cannot create output directory ${destinationDir}: ${errorMessage(err)}`);
  }

  // Run the engine
  let run: EngineRun;
  try {
    run = await deps.engine.transcode({
      sourcePath: item.sourcePath,
      destinationPath,
      codec: config.codec,
      quality: config.quality,
      hwaccel: config.hwaccel,
      audioBitrateKbps: config.audioBitrateKbps,
      onProgress: progressLogger(item, log),
    });
  } catch (err) {
    await removePartial(destinationPath, log);
    return fail(errorMessage(err));
  }

  if (run.exitCode !== 0) {
    await removePartial(destinationPath, log);
    const reason = run.exitSignal
      ? `Engine was killed with signal ${run.exitSignal}`
      : `Engine exited with code ${run.exitCode}`;
    const stderr = tailLines(run.stderr);
    return fail(stderr ? `${reason}\n${stderr}` : reason, {
      exitCode: run.exitCode ?? undefined,
      exitSignal: run.exitSignal,
    });
  }

  // Confirm the output exists before anything touches the source
  const outputBytes = await outputSize(destinationPath);
  if (outputBytes === 0) {
    await removePartial(destinationPath, log);
    return fail(`Output file is missing or empty: ${destinationPath}`, { exitCode: 0 });
  }

  if (config.verifyDuration && deps.engine.verify) {
    let problem: string | undefined;
    try {
      problem = await deps.engine.verify(item.sourcePath, destinationPath);
    } catch (err) {
      problem = `Verification failed: ${errorMessage(err)}`;
    }
    if (problem) {
      await removePartial(destinationPath, log);
      return fail(problem, { exitCode: 0 });
    }
  }

  // Delete the original last
  let originalDeleted = false;
  if (config.deleteOriginal) {
    try {
      await fs.rm(item.sourcePath);
      originalDeleted = true;
    } catch (err) {
      log.error({ err, item: item.sourcePath }, 'Error deleting original file');
    }
  }

  return {
    item,
    outcome: 'succeeded',
    destinationPath,
    outputBytes,
    originalDeleted,
    kind,
    durationMs: Date.now() - startTime,
  };
}

// A failed job leaves no destination file behind
async function removePartial(filePath: string, log: Logger): Promise<void> {
  try {
    await fs.rm(filePath, { force: true });
  } catch (err) {
    log.warn({ err, file: filePath }, 'Could not remove partial output');
  }
}

// In short, this file:
// 1) Picks the destination tree from the classification
// 2) Runs the engine and turns its exit into a result
// 3) Confirms and verifies the output, removing it when the job fails
// 4) Deletes the original only after all of that succeeded
