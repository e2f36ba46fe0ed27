import ffmpegInstaller from '@ffmpeg-installer/ffmpeg';
import ffprobeInstaller from '@ffprobe-installer/ffprobe';
import ffmpeg, { type FfprobeData } from 'fluent-ffmpeg';
import { buildOutputOptions, resolveEncoder, selectEncoder } from './encoders';
import { EngineError } from './errors';
import { logger as defaultLogger, type Logger } from './logger';
import type { Codec, EngineRun, HwAccel, TranscodeEngine, TranscodeRequest } from './types';

export type ProbeInfo = {
  durationSeconds: number;
  videoCodec?: string;
  width?: number;
  height?: number;
  hasAudio: boolean;
};

// Reads container/stream info with ffprobe
export async function probe(filePath: string, ffprobePath: string = ffprobeInstaller.path): Promise<ProbeInfo> {
  return new Promise((resolve, reject) => {
    ffmpeg(filePath)
      .setFfprobePath(ffprobePath)
      .ffprobe((err: unknown, data: FfprobeData) => {
        if (err) return reject(err);
        const vStream = data.streams.find((s) => s.codec_type === 'video');
        const aStream = data.streams.find((s) => s.codec_type === 'audio');
        resolve({
          durationSeconds: Number(data.format.duration ?? 0) || 0,
          videoCodec: vStream?.codec_name,
          width: vStream?.width,
          height: vStream?.height,
          hasAudio: aStream !== undefined,
        });
      });
  });
}

// fluent-ffmpeg reports process exits only through the error message
export function parseExit(message: string): Pick<EngineRun, 'exitCode' | 'exitSignal'> | undefined {
  const code = /exited with code (\d+)/.exec(message);
  if (code) return { exitCode: Number(code[1]) };
  const signal = /killed with signal (\w+)/.exec(message);
  if (signal) return { exitCode: null, exitSignal: signal[1] };
  return undefined;
}

// Encoder names the ffmpeg binary was built with (`ffmpeg -encoders`)
export function listEncoders(ffmpegPath: string): Promise<ReadonlySet<string>> {
  return new Promise((resolve, reject) => {
    ffmpeg()
      .setFfmpegPath(ffmpegPath)
      .availableEncoders((err, encoders) => {
        if (err) return reject(err);
        resolve(new Set(Object.keys(encoders)));
      });
  });
}

export type FfmpegEngineOptions = {
  ffmpegPath?: string;
  ffprobePath?: string;
  toleranceSeconds?: number; // allowed duration drift between source and output
  logger?: Logger;
  listEncoders?: () => Promise<ReadonlySet<string>>;
};

// ffmpeg as the transcoding engine. Arguments are passed as a list to the
// spawned process; nothing goes through a shell.
export class FfmpegEngine implements TranscodeEngine {
  private readonly ffmpegPath: string;
  private readonly ffprobePath: string;
  private readonly toleranceSeconds: number;
  private readonly logger: Logger;
  private readonly listEncoders: () => Promise<ReadonlySet<string>>;
  private encoders?: Promise<ReadonlySet<string> | undefined>;
  private readonly reportedFallbacks = new Set<string>();

  constructor(options: FfmpegEngineOptions = {}) {
    this.ffmpegPath = options.ffmpegPath ?? ffmpegInstaller.path;
    this.ffprobePath = options.ffprobePath ?? ffprobeInstaller.path;
    this.toleranceSeconds = options.toleranceSeconds ?? 1;
    this.logger = options.logger ?? defaultLogger;
    this.listEncoders = options.listEncoders ?? (() => listEncoders(this.ffmpegPath));
  }

  // Queried once per engine; a failed query disables hardware encoding
  private availableEncoders(): Promise<ReadonlySet<string> | undefined> {
    if (!this.encoders) {
      this.encoders = this.listEncoders().catch((err: unknown) => {
        this.logger.warn({ err }, 'Could not list ffmpeg encoders, using software encoding');
        return undefined;
      });
    }
    return this.encoders;
  }

  // Hardware encoder for the accelerator when ffmpeg has it, software encoder otherwise.
  // Each fallback is logged once.
  async encoderFor(codec: Codec, hwaccel: HwAccel): Promise<string> {
    if (hwaccel === 'none') return resolveEncoder(codec, hwaccel);
    const { encoder, fellBack } = selectEncoder(codec, hwaccel, await this.availableEncoders());
    const requested = resolveEncoder(codec, hwaccel);
    if (fellBack && !this.reportedFallbacks.has(requested)) {
      this.reportedFallbacks.add(requested);
      this.logger.warn({ requested, encoder }, `Encoder ${requested} not available, falling back to ${encoder}`);
    }
    return encoder;
  }

  async transcode(request: TranscodeRequest): Promise<EngineRun> {
    const encoder = await this.encoderFor(request.codec, request.hwaccel);
    return new Promise<EngineRun>((resolve, reject) => {
      const command = ffmpeg(request.sourcePath)
        .setFfmpegPath(this.ffmpegPath)
        .outputOptions(buildOutputOptions(request, encoder))
        .output(request.destinationPath);

      command
        .on('start', (cmd: string) => this.logger.debug({ cmd, source: request.sourcePath }, 'ffmpeg start'))
        .on('progress', (p: { timemark?: string; percent?: number }) => {
          request.onProgress?.({ percent: p.percent, timemark: p.timemark });
        })
        .on('error', (err: Error, _stdout: string | null, stderr: string | null) => {
          const exit = parseExit(err.message);
          if (!exit) {
            reject(new EngineError(`ffmpeg could not run: ${err.message}`, { cause: err }));
            return;
          }
          resolve({ ...exit, stderr: stderr ?? '' });
        })
        .on('end', (_stdout: string | null, stderr: string | null) => {
          resolve({ exitCode: 0, stderr: stderr ?? '' });
        });

      command.run();
    });
  }

  // Compare durations of source and output
  async verify(sourcePath: string, destinationPath: string): Promise<string | undefined> {
    const [input, output] = await Promise.all([
      probe(sourcePath, this.ffprobePath),
      probe(destinationPath, this.ffprobePath),
    ]);
    const drift = Math.abs(input.durationSeconds - output.durationSeconds);
    if (drift > this.toleranceSeconds) {
      return `Duration mismatch: input ${input.durationSeconds.toFixed(2)}s, output ${output.durationSeconds.toFixed(2)}s`;
    }
    this.logger.debug({ input, output }, 'Output verified');
    return undefined;
  }
}
