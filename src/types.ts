export const CODECS = ['h264', 'hevc', 'av1'] as const;
export type Codec = (typeof CODECS)[number];

export const HW_ACCELS = ['none', 'nvidia', 'intel', 'amd'] as const;
export type HwAccel = (typeof HW_ACCELS)[number];

export type MediaKind = 'movie' | 'series' | 'unknown';
export type JobOutcome = 'succeeded' | 'failed' | 'skipped';
export type BatchState = 'completed' | 'timedOut' | 'cancelled';

export type WorkItem = Readonly<{
  sourcePath: string; // absolute, identity of the item
  displayName: string; // file name without extension and release noise
  sizeBytes: number;
  discoveredAt: Date;
}>;

export type ClassificationResult = Readonly<{
  kind: MediaKind;
  normalizedTitle: string;
  confidence: number; // informational only, 0..1
  reason?: string; // why the lookup degraded to unknown
}>;

type JobResultBase = {
  item: WorkItem;
  durationMs: number;
  kind?: MediaKind;
};

export type SucceededJob = JobResultBase & {
  outcome: 'succeeded';
  destinationPath: string;
  outputBytes: number;
  originalDeleted: boolean;
};

export type FailedJob = JobResultBase & {
  outcome: 'failed';
  diagnostic: string;
  exitCode?: number;
  exitSignal?: string;
};

export type SkippedJob = JobResultBase & {
  outcome: 'skipped';
  reason: string;
};

export type JobResult = Readonly<SucceededJob> | Readonly<FailedJob> | Readonly<SkippedJob>;

export type BatchFailure = Readonly<{
  sourcePath: string;
  diagnostic: string;
}>;

export type BatchReport = Readonly<{
  state: BatchState;
  startedAt: Date;
  finishedAt: Date;
  durationMs: number;
  total: number;
  counts: Readonly<Record<JobOutcome, number>>;
  results: readonly JobResult[];
  failures: readonly BatchFailure[];
  bytesIn: number; // source bytes of succeeded items
  bytesOut: number; // destination bytes of succeeded items
  bytesSaved: number;
}>;

export type RecurrenceRule = Readonly<{
  timeOfDay: string; // HH:MM
  intervalHours: number;
  scheduleExpression: string; // five-field cron expression
  command: readonly string[]; // absolute invocation path followed by its arguments
}>;

export type TranscodeProgress = {
  percent?: number;
  timemark?: string;
};

export type TranscodeRequest = {
  sourcePath: string;
  destinationPath: string;
  codec: Codec;
  quality: number;
  hwaccel: HwAccel;
  audioBitrateKbps: number; // 0 copies every audio stream
  onProgress?: (progress: TranscodeProgress) => void;
};

export type EngineRun = {
  exitCode: number | null;
  exitSignal?: string;
  stderr: string;
};

// Anything that accepts source + destination + codec + quality and exits 0 on success.
export interface TranscodeEngine {
  transcode(request: TranscodeRequest): Promise<EngineRun>;
  // Returns a problem description when the destination does not match the source.
  verify?(sourcePath: string, destinationPath: string): Promise<string | undefined>;
}
