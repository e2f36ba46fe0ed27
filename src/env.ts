import { z } from 'zod';
import type { ConfigLayer } from './config';
import { ValidationError } from './errors';

// Empty variables count as unset so `FOO=` in a .env file does not override the config file.
const optional = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((v) => (typeof v === 'string' && v.trim() === '' ? undefined : v), schema.optional());

const flag = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(['true', 'false', '1', '0', 'yes', 'no']))
  .transform((v) => v === 'true' || v === '1' || v === 'yes');

const list = z
  .string()
  .transform((v) => v.split(',').map((part) => part.trim()).filter((part) => part.length > 0));

const schema = z.object({
  TRANSCODE_INPUT_PATH: optional(z.string()),
  TRANSCODE_OUTPUT_PATH: optional(z.string()),
  TRANSCODE_CODEC: optional(z.string()),
  TRANSCODE_QUALITY: optional(z.coerce.number()),
  TRANSCODE_MEDIA_DETECTION: optional(flag),
  TRANSCODE_API_KEY: optional(z.string()),
  TRANSCODE_MOVIE_OUTPUT_PATH: optional(z.string()),
  TRANSCODE_TV_OUTPUT_PATH: optional(z.string()),
  TRANSCODE_DELETE_ORIGINAL: optional(flag),
  TRANSCODE_MAX_CONCURRENT_JOBS: optional(z.coerce.number()),
  TRANSCODE_FILE_EXTENSIONS: optional(list),
  TRANSCODE_HWACCEL: optional(z.string()),
  TRANSCODE_AUDIO_BITRATE_KBPS: optional(z.coerce.number()),
  TRANSCODE_CLASSIFICATION_TIMEOUT_MS: optional(z.coerce.number()),
  TRANSCODE_BATCH_TIMEOUT_MS: optional(z.coerce.number()),
  TRANSCODE_VERIFY_DURATION: optional(flag),
  TRANSCODE_FFMPEG_PATH: optional(z.string()),
  TRANSCODE_FFPROBE_PATH: optional(z.string()),
  TRANSCODE_LOG_FILE: optional(z.string()),
  LOG_LEVEL: optional(z.string()),

  // Optional webhook receiving the batch summary
  TRANSCODE_NOTIFY_URL: optional(z.string()),
  TRANSCODE_NOTIFY_TOKEN: optional(z.string()),
});

export function readEnvLayer(env: NodeJS.ProcessEnv): ConfigLayer {
  const parsed = schema.safeParse(env);
  if (!parsed.success) {
    throw new ValidationError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      { cause: parsed.error }
    );
  }
  const e = parsed.data;
  return {
    inputPath: e.TRANSCODE_INPUT_PATH,
    outputPath: e.TRANSCODE_OUTPUT_PATH,
    codec: e.TRANSCODE_CODEC,
    quality: e.TRANSCODE_QUALITY,
    mediaDetectionEnabled: e.TRANSCODE_MEDIA_DETECTION,
    apiKey: e.TRANSCODE_API_KEY,
    movieOutputPath: e.TRANSCODE_MOVIE_OUTPUT_PATH,
    tvOutputPath: e.TRANSCODE_TV_OUTPUT_PATH,
    deleteOriginal: e.TRANSCODE_DELETE_ORIGINAL,
    maxConcurrentJobs: e.TRANSCODE_MAX_CONCURRENT_JOBS,
    fileExtensions: e.TRANSCODE_FILE_EXTENSIONS,
    hwaccel: e.TRANSCODE_HWACCEL,
    audioBitrateKbps: e.TRANSCODE_AUDIO_BITRATE_KBPS,
    classificationTimeoutMs: e.TRANSCODE_CLASSIFICATION_TIMEOUT_MS,
    batchTimeoutMs: e.TRANSCODE_BATCH_TIMEOUT_MS,
    verifyDuration: e.TRANSCODE_VERIFY_DURATION,
    ffmpegPath: e.TRANSCODE_FFMPEG_PATH,
    ffprobePath: e.TRANSCODE_FFPROBE_PATH,
    logFile: e.TRANSCODE_LOG_FILE,
    logLevel: e.LOG_LEVEL,
    notifyUrl: e.TRANSCODE_NOTIFY_URL,
    notifyToken: e.TRANSCODE_NOTIFY_TOKEN,
  };
}
