import { execFile } from 'node:child_process';
import { randomUUID } from 'node:crypto';
import { readFile, unlink } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';
import { SynthesisError, TaskCancelledError, messageFromCause } from './errors.js';
import type { DevicePreference, EngineConfig, GenerationRequest } from './types.js';

export type SynthesisParams = GenerationRequest;

export interface SynthesisOutput {
  audio: Uint8Array;
  /** Device that actually produced the audio, as reported by the engine. */
  deviceInfo: string;
  sampleRate?: number;
}

export interface SynthesisOptions {
  signal?: AbortSignal;
  /** Engine-relative progress, 0-100. */
  onProgress?: (percent: number) => void;
}

/**
 * The model boundary: text and voice parameters in, audio bytes out. Device
 * fallback (GPU to CPU) happens behind this interface.
 */
export interface SpeechEngine {
  readonly name: string;
  init?(): Promise<void>;
  generate(params: SynthesisParams, options?: SynthesisOptions): Promise<SynthesisOutput>;
  close?(): Promise<void>;
}

export const MOCK_SAMPLE_RATE = 24000;

/** 16-bit mono PCM silence with a canonical 44-byte header. */
export function encodeSilentWav(seconds: number, sampleRate = MOCK_SAMPLE_RATE): Buffer {
  const samples = Math.max(0, Math.round(seconds * sampleRate));
  const dataBytes = samples * 2;
  const buf = Buffer.alloc(44 + dataBytes);
  buf.write('RIFF', 0, 'ascii');
  buf.writeUInt32LE(36 + dataBytes, 4);
  buf.write('WAVE', 8, 'ascii');
  buf.write('fmt ', 12, 'ascii');
  buf.writeUInt32LE(16, 16);          // fmt chunk size
  buf.writeUInt16LE(1, 20);           // PCM
  buf.writeUInt16LE(1, 22);           // mono
  buf.writeUInt32LE(sampleRate, 24);
  buf.writeUInt32LE(sampleRate * 2, 28);
  buf.writeUInt16LE(2, 32);           // block align
  buf.writeUInt16LE(16, 34);          // bits per sample
  buf.write('data', 36, 'ascii');
  buf.writeUInt32LE(dataBytes, 40);
  return buf;
}

function abortReason(signal: AbortSignal): Error {
  return signal.reason instanceof Error ? signal.reason : new TaskCancelledError();
}

function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal ? abortReason(signal) : new TaskCancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export interface MockEngineOptions {
  hasGpu?: boolean;
  delayMs?: number;
  secondsPerChar?: number;
  maxSeconds?: number;
}

/**
 * Stand-in model for development: produces silence whose length follows the
 * text, and reports device selection the way the real model does.
 */
export class MockSpeechEngine implements SpeechEngine {
  readonly name = 'mock';
  private readonly hasGpu: boolean;
  private readonly delayMs: number;
  private readonly secondsPerChar: number;
  private readonly maxSeconds: number;

  constructor(options: MockEngineOptions = {}) {
    this.hasGpu = options.hasGpu ?? false;
    this.delayMs = options.delayMs ?? 500;
    this.secondsPerChar = options.secondsPerChar ?? 0.06;
    this.maxSeconds = options.maxSeconds ?? 30;
  }

  resolveDevice(requested: DevicePreference): string {
    if (requested === 'cpu') return 'cpu';
    if (this.hasGpu) return 'cuda:0';
    return requested === 'cuda' ? 'cpu (fallback from cuda: no GPU available)' : 'cpu';
  }

  async generate(params: SynthesisParams, options: SynthesisOptions = {}): Promise<SynthesisOutput> {
    const deviceInfo = this.resolveDevice(params.device);
    await delay(this.delayMs / 2, options.signal);
    options.onProgress?.(50);
    await delay(this.delayMs / 2, options.signal);
    const seconds = Math.min(this.maxSeconds, Math.max(0.5, params.text.length * this.secondsPerChar));
    return { audio: encodeSilentWav(seconds), deviceInfo, sampleRate: MOCK_SAMPLE_RATE };
  }
}

const CommandReplySchema = z.object({
  device: z.string().min(1).optional(),
  sample_rate: z.number().positive().optional(),
});

type CommandReply = z.infer<typeof CommandReplySchema>;

// The program may log freely; only its last stdout line is the reply.
function parseReply(stdout: string): CommandReply {
  const lines = stdout.split('\n').map(l => l.trim()).filter(Boolean);
  const last = lines[lines.length - 1];
  if (!last) return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(last);
  } catch {
    return {};
  }
  const reply = CommandReplySchema.safeParse(parsed);
  return reply.success ? reply.data : {};
}

/**
 * Runs an external synthesis program once per request. The program reads a
 * JSON request on stdin, writes a WAV to `output_path` and prints
 * `{"device": "...", "sample_rate": n}` as its last stdout line.
 */
export class CommandSpeechEngine implements SpeechEngine {
  readonly name = 'command';

  constructor(
    private readonly command: string,
    private readonly args: string[] = [],
    private readonly scratchDir: string = tmpdir(),
  ) {}

  async generate(params: SynthesisParams, options: SynthesisOptions = {}): Promise<SynthesisOutput> {
    const outputPath = join(this.scratchDir, `synth_${randomUUID()}.wav`);
    const payload = JSON.stringify({
      text: params.text,
      speaker_id: params.speakerId,
      temperature: params.temperature,
      top_k: params.topK,
      style: params.style,
      device: params.device,
      output_path: outputPath,
    });

    try {
      const stdout = await this.exec(payload, params.device, options.signal);
      const reply = parseReply(stdout);
      const deviceInfo = reply.device ?? params.device;
      let audio: Buffer;
      try {
        audio = await readFile(outputPath);
      } catch (err) {
        throw new SynthesisError(`Synthesis program produced no audio: ${messageFromCause(err)}`, deviceInfo);
      }
      options.onProgress?.(100);
      return {
        audio,
        deviceInfo,
        sampleRate: reply.sample_rate,
      };
    } finally {
      await unlink(outputPath).catch(() => {});
    }
  }

  private exec(payload: string, device: string, signal?: AbortSignal): Promise<string> {
    return new Promise((resolve, reject) => {
      const child = execFile(
        this.command,
        this.args,
        { signal, maxBuffer: 4 * 1024 * 1024, encoding: 'utf-8' },
        (err, stdout, stderr) => {
          if (!err) {
            resolve(stdout);
            return;
          }
          if (signal?.aborted) {
            reject(abortReason(signal));
            return;
          }
          const detail = stderr.trim().split('\n').pop() || err.message;
          reject(new SynthesisError(`Synthesis program failed: ${detail}`, device, { cause: err }));
        },
      );
      child.stdin?.end(payload);
    });
  }
}

export function createSpeechEngine(config: EngineConfig): SpeechEngine {
  switch (config.kind) {
    case 'mock':
      return new MockSpeechEngine({ delayMs: config.mockDelayMs });
    case 'command':
      return new CommandSpeechEngine(config.command, config.commandArgs);
  }
}
