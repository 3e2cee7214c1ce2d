import { readFile } from 'node:fs/promises';
import type { FfprobeData } from 'fluent-ffmpeg';
import { FFPROBE_INSTALL_HINT, ensureFfprobe } from './ffprobe-path.js';

export interface AudioInfo {
  durationSeconds: number;
  sampleRate: number;
}

export interface AudioProbe {
  probe(filePath: string): Promise<AudioInfo>;
}

/** Reads duration and sample rate straight from a RIFF/WAVE header. */
export function parseWavHeader(buf: Uint8Array): AudioInfo {
  const view = new DataView(buf.buffer, buf.byteOffset, buf.byteLength);
  const tag = (offset: number) => String.fromCharCode(...buf.subarray(offset, offset + 4));

  if (buf.byteLength < 12 || tag(0) !== 'RIFF' || tag(8) !== 'WAVE') {
    throw new Error('Not a WAV file');
  }

  let sampleRate = 0;
  let byteRate = 0;
  let dataBytes: number | null = null;
  let offset = 12;
  while (offset + 8 <= buf.byteLength) {
    const id = tag(offset);
    const size = view.getUint32(offset + 4, true);
    if (id === 'fmt ' && offset + 20 <= buf.byteLength) {
      sampleRate = view.getUint32(offset + 12, true);
      byteRate = view.getUint32(offset + 16, true);
    } else if (id === 'data') {
      dataBytes = Math.min(size, buf.byteLength - offset - 8);
      break;
    }
    offset += 8 + size + (size % 2);
  }

  if (!sampleRate || !byteRate || dataBytes === null) {
    throw new Error('WAV header is missing fmt or data chunk');
  }
  return { durationSeconds: dataBytes / byteRate, sampleRate };
}

export class WavHeaderProbe implements AudioProbe {
  async probe(filePath: string): Promise<AudioInfo> {
    try {
      return parseWavHeader(await readFile(filePath));
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new Error(`Failed to probe audio file: ${message}`, { cause: err });
    }
  }
}

export class FfprobeAudioProbe implements AudioProbe {
  constructor(private readonly ffprobePath: string) {}

  async probe(filePath: string): Promise<AudioInfo> {
    const ffmpeg = (await import('fluent-ffmpeg')).default;
    ffmpeg.setFfprobePath(this.ffprobePath);

    const metadata = await new Promise<FfprobeData>((resolve, reject) => {
      ffmpeg.ffprobe(filePath, (err: Error | null, data: FfprobeData) => {
        if (err) {
          reject(new Error(`Failed to probe audio file: ${err.message}`));
          return;
        }
        resolve(data);
      });
    });

    const duration: unknown = metadata.format.duration;
    if (typeof duration !== 'number' || Number.isNaN(duration)) {
      throw new Error(`Could not determine duration for: ${filePath}`);
    }
    const stream = metadata.streams.find(s => s.codec_type === 'audio');
    return { durationSeconds: duration, sampleRate: Number(stream?.sample_rate ?? 0) };
  }
}

/** ffprobe when it can be found, otherwise the WAV header reader. */
export async function createAudioProbe(): Promise<AudioProbe> {
  const ffprobePath = await ensureFfprobe();
  if (ffprobePath) return new FfprobeAudioProbe(ffprobePath);
  console.warn(`[probe] ${FFPROBE_INSTALL_HINT}\n  Falling back to WAV header parsing.`);
  return new WavHeaderProbe();
}
