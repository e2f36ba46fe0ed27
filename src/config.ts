import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { z } from 'zod';
import { readEnvLayer } from './env';
import { hasErrorCode, ValidationError } from './errors';
import { CODECS, HW_ACCELS, type Codec } from './types';

// pino's level names
export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;
export const DEFAULT_CONFIG_FILE = 'transcode.config.json';

export const DEFAULT_VIDEO_EXTENSIONS = [
  '.mp4', '.mkv', '.avi', '.mov', '.m4v', '.wmv', '.flv', '.webm', '.mpg', '.mpeg', '.ts',
];

// CRF-style scale accepted by each software encoder
export const QUALITY_RANGE: Record<Codec, { min: number; max: number }> = {
  h264: { min: 0, max: 51 },
  hevc: { min: 0, max: 51 },
  av1: { min: 0, max: 63 },
};

const CODEC_ALIASES: Record<string, Codec> = {
  x264: 'h264',
  'h.264': 'h264',
  avc: 'h264',
  x265: 'hevc',
  h265: 'hevc',
  'h.265': 'hevc',
};

const requiredPath = z.string().trim().min(1, 'must not be empty');

const configObject = z.object({
  inputPath: requiredPath,
  outputPath: requiredPath,
  codec: z
    .string()
    .trim()
    .toLowerCase()
    .transform((v) => CODEC_ALIASES[v] ?? v)
    .pipe(z.enum(CODECS)),
  quality: z.number().int(),
  mediaDetectionEnabled: z.boolean(),
  apiKey: z.string().trim(),
  movieOutputPath: z.string().trim(),
  tvOutputPath: z.string().trim(),
  deleteOriginal: z.boolean(),
  maxConcurrentJobs: z.number().int().min(1, 'must be at least 1'),
  fileExtensions: z
    .array(z.string().trim().min(1))
    .min(1)
    .transform((exts) => [...new Set(exts.map((e) => (e.startsWith('.') ? e : `.${e}`).toLowerCase()))]),
  hwaccel: z.string().trim().toLowerCase().pipe(z.enum(HW_ACCELS)),
  audioBitrateKbps: z.number().int().min(0),
  classificationTimeoutMs: z.number().int().positive(),
  batchTimeoutMs: z.number().int().positive().optional(),
  verifyDuration: z.boolean(),
  durationToleranceSeconds: z.number().nonnegative(),
  ffmpegPath: z.string().trim().min(1).optional(),
  ffprobePath: z.string().trim().min(1).optional(),
  logFile: z.string().trim().min(1),
  logLevel: z.string().trim().toLowerCase().pipe(z.enum(LOG_LEVELS)),
  notifyUrl: z.string().url().optional(),
  notifyToken: z.string().optional(),
});

export type ConfigLayer = Partial<z.input<typeof configObject>>;

export const DEFAULTS = {
  inputPath: '~/media/trans_in',
  outputPath: '~/media/trans_out',
  codec: 'h264',
  quality: 18,
  mediaDetectionEnabled: false,
  apiKey: '',
  movieOutputPath: '',
  tvOutputPath: '',
  deleteOriginal: false,
  maxConcurrentJobs: 4,
  fileExtensions: DEFAULT_VIDEO_EXTENSIONS,
  hwaccel: 'none',
  audioBitrateKbps: 0,
  classificationTimeoutMs: 10_000,
  verifyDuration: true,
  durationToleranceSeconds: 1,
  logFile: 'logs/transcoding.log',
  logLevel: 'info',
} satisfies ConfigLayer;

// "~" and relative paths become absolute
export function expandPath(p: string): string {
  const home = p === '~' || p.startsWith('~/') ? path.join(os.homedir(), p.slice(1)) : p;
  return path.resolve(home);
}

const configurationSchema = configObject
  .superRefine((cfg, ctx) => {
    const range = QUALITY_RANGE[cfg.codec];
    if (cfg.quality < range.min || cfg.quality > range.max) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['quality'],
        message: `must be between ${range.min} and ${range.max} for ${cfg.codec}`,
      });
    }
    if (cfg.mediaDetectionEnabled) {
      for (const key of ['apiKey', 'movieOutputPath', 'tvOutputPath'] as const) {
        if (cfg[key].length === 0) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [key],
            message: 'is required when media detection is enabled',
          });
        }
      }
    }
  })
  .transform((cfg) => {
    const outputPath = expandPath(cfg.outputPath);
    return {
      ...cfg,
      inputPath: expandPath(cfg.inputPath),
      outputPath,
      movieOutputPath: cfg.movieOutputPath ? expandPath(cfg.movieOutputPath) : outputPath,
      tvOutputPath: cfg.tvOutputPath ? expandPath(cfg.tvOutputPath) : outputPath,
      logFile: expandPath(cfg.logFile),
    };
  });

type ConfigurationOutput = z.output<typeof configurationSchema>;
export type Configuration = Readonly<
  Omit<ConfigurationOutput, 'fileExtensions'> & { fileExtensions: readonly string[] }
>;

export type ConfigSources = {
  file?: unknown; // parsed JSON of the config file
  env?: NodeJS.ProcessEnv;
  overrides?: ConfigLayer; // command-line flags
};

// "path: message" per zod issue
function issuesOf(error: z.ZodError, prefix = ''): string[] {
  return error.issues.map((issue) => `${prefix}${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

// Build the immutable configuration snapshot.
// Layers in increasing precedence: built-in defaults, config file, environment, overrides.
// Unknown keys are dropped; a value of `undefined` in any layer leaves the lower layer in place.
export function load(sources: ConfigSources = {}): Configuration {
  let fileLayer: ConfigLayer = {};
  if (sources.file !== undefined) {
    const parsed = configObject.partial().safeParse(sources.file);
    if (!parsed.success) throw new ValidationError(issuesOf(parsed.error, 'config file '), { cause: parsed.error });
    fileLayer = parsed.data;
  }
  const envLayer = sources.env ? readEnvLayer(sources.env) : {};

  const merged: Record<string, unknown> = {};
  for (const layer of [DEFAULTS, fileLayer, envLayer, sources.overrides ?? {}]) {
    for (const [key, value] of Object.entries(layer)) {
      if (value !== undefined) merged[key] = value;
    }
  }

  // Validate the merged layers as a whole
  const result = configurationSchema.safeParse(merged);
  if (!result.success) throw new ValidationError(issuesOf(result.error), { cause: result.error });
  return Object.freeze({ ...result.data, fileExtensions: Object.freeze([...result.data.fileExtensions]) });
}

// Read the JSON config file. A missing file is only an error when the caller asked for it by name.
export function readConfigFile(filePath: string, options: { required: boolean }): unknown {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, 'utf8');
  } catch (err) {
    if (!options.required && hasErrorCode(err, 'ENOENT')) return undefined;
    throw new ValidationError([`config file ${filePath}: cannot be read`], { cause: err });
  }
  try {
    return JSON.parse(raw);
  } catch (err) {
    throw new ValidationError([`config file ${filePath}: invalid JSON`], { cause: err });
  }
}
