import type { Codec, HwAccel, TranscodeRequest } from './types';

type EncoderTable = Record<Codec, { software: string } & Partial<Record<Exclude<HwAccel, 'none'>, string>>>;

const ENCODERS: EncoderTable = {
  h264: { software: 'libx264', nvidia: 'h264_nvenc', intel: 'h264_qsv', amd: 'h264_amf' },
  hevc: { software: 'libx265', nvidia: 'hevc_nvenc', intel: 'hevc_qsv', amd: 'hevc_amf' },
  av1: { software: 'libaom-av1', nvidia: 'av1_nvenc', intel: 'av1_qsv' },
};

// Hardware encoder when the accelerator has one for the codec, software encoder otherwise
export function resolveEncoder(codec: Codec, hwaccel: HwAccel): string {
  const table = ENCODERS[codec];
  if (hwaccel === 'none') return table.software;
  return table[hwaccel] ?? table.software;
}

export type EncoderChoice = { encoder: string; fellBack: boolean };

// A hardware encoder is only used when the engine lists it. Without a list
// (the query failed) hardware encoding is not attempted.
export function selectEncoder(codec: Codec, hwaccel: HwAccel, available?: ReadonlySet<string>): EncoderChoice {
  const preferred = resolveEncoder(codec, hwaccel);
  const software = ENCODERS[codec].software;
  if (preferred === software || available?.has(preferred)) return { encoder: preferred, fellBack: false };
  return { encoder: software, fellBack: true };
}

// Each encoder family spells constant quality differently
function qualityOptions(encoder: string, quality: number): string[] {
  if (encoder.endsWith('_nvenc')) return ['-rc vbr', `-cq ${quality}`];
  if (encoder.endsWith('_qsv')) return [`-global_quality ${quality}`];
  if (encoder.endsWith('_amf')) return ['-rc cqp', `-qp_i ${quality}`, `-qp_p ${quality}`];
  // libaom only honours -crf as constant quality when the bitrate target is zero
  if (encoder === 'libaom-av1') return [`-crf ${quality}`, '-b:v 0'];
  return [`-crf ${quality}`];
}

// Output options for one transcode, in the order ffmpeg receives them.
// Every stream is mapped; audio and subtitles are copied unless an audio bitrate is set,
// in which case only the first audio stream is re-encoded to AAC.
export function buildOutputOptions(
  request: Pick<TranscodeRequest, 'codec' | 'hwaccel' | 'quality' | 'audioBitrateKbps'>,
  encoder: string = resolveEncoder(request.codec, request.hwaccel)
): string[] {
  const opts: string[] = [];
  opts.push('-map 0');
  opts.push(`-c:v ${encoder}`);
  opts.push(...qualityOptions(encoder, request.quality));
  opts.push('-c:a copy');
  if (request.audioBitrateKbps > 0) {
    opts.push('-c:a:0 aac');
    opts.push(`-b:a:0 ${request.audioBitrateKbps}k`);
  }
  opts.push('-c:s copy');
  return opts;
}
