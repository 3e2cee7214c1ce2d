import { resolve } from 'node:path';
import { z } from 'zod';
import { DEFAULT_CONFIG, DEVICE_PREFERENCES, type ServiceConfig } from './types.js';

const positiveInt = z.coerce.number().int().positive();
const positiveNumber = z.coerce.number().positive();

const EnvSchema = z.object({
  HOST: z.string().optional(),
  PORT: z.coerce.number().int().min(0).max(65535).optional(),
  OUTPUT_DIR: z.string().optional(),
  PUBLIC_AUDIO_PATH: z.string().regex(/^\/[\w\-/]*$/, 'must be an absolute URL path').optional(),
  VOICES_FILE: z.string().optional(),
  TASK_STORE_PATH: z.string().optional(),
  MAX_STORED_TASKS: positiveInt.optional(),
  TASK_CLEANUP_KEEP_NEWEST: positiveInt.optional(),
  VOICE_FILE_MAX_AGE_HOURS: positiveNumber.optional(),
  SWEEP_INTERVAL_MINUTES: positiveNumber.optional(),
  MAX_PENDING_TASKS: positiveInt.optional(),
  GENERATION_WORKERS: positiveInt.optional(),
  TASK_TIMEOUT_SECONDS: positiveNumber.optional(),
  GENERATION_MODE: z.enum(['fork', 'inline']).optional(),
  TTS_ENGINE: z.enum(['mock', 'command']).optional(),
  TTS_COMMAND: z.string().optional(),
  TTS_COMMAND_ARGS: z.string().optional(),
  TTS_MOCK_DELAY_MS: z.coerce.number().int().nonnegative().optional(),
  MAX_TEXT_LENGTH: positiveInt.optional(),
  DEFAULT_SPEAKER_ID: positiveInt.optional(),
  DEFAULT_TEMPERATURE: positiveNumber.optional(),
  DEFAULT_TOP_K: positiveInt.optional(),
  DEFAULT_STYLE: z.string().optional(),
  DEFAULT_DEVICE: z.enum(['auto', 'cuda', 'cpu']).optional(),
});

export type ConfigEnv = Record<string, string | undefined>;

/** Blank variables count as unset. */
function compactEnv(env: ConfigEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') out[key] = value.trim();
  }
  return out;
}

/**
 * Builds the service configuration from environment variables on top of
 * DEFAULT_CONFIG. Relative paths resolve against `cwd`.
 */
export function loadConfig(env: ConfigEnv = process.env, cwd: string = process.cwd()): ServiceConfig {
  const parsed = EnvSchema.safeParse(compactEnv(env));
  if (!parsed.success) {
    const details = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }
  const e = parsed.data;
  const d = DEFAULT_CONFIG;

  const maxStoredTasks = e.MAX_STORED_TASKS ?? d.maxStoredTasks;
  const keepNewest = e.TASK_CLEANUP_KEEP_NEWEST ?? Math.min(d.keepNewest, Math.max(1, Math.floor(maxStoredTasks / 2)));
  if (keepNewest > maxStoredTasks) {
    throw new Error(
      `Invalid configuration: TASK_CLEANUP_KEEP_NEWEST (${keepNewest}) exceeds MAX_STORED_TASKS (${maxStoredTasks})`,
    );
  }

  const engineKind = e.TTS_ENGINE ?? d.engine.kind;
  if (engineKind === 'command' && !e.TTS_COMMAND) {
    throw new Error('Invalid configuration: TTS_ENGINE=command requires TTS_COMMAND');
  }

  const temperature = e.DEFAULT_TEMPERATURE ?? d.defaults.temperature;
  const [tMin, tMax] = d.temperatureRange;
  if (temperature < tMin || temperature > tMax) {
    throw new Error(`Invalid configuration: DEFAULT_TEMPERATURE must be within ${tMin}-${tMax}`);
  }
  const topK = e.DEFAULT_TOP_K ?? d.defaults.topK;
  const [kMin, kMax] = d.topKRange;
  if (topK < kMin || topK > kMax) {
    throw new Error(`Invalid configuration: DEFAULT_TOP_K must be within ${kMin}-${kMax}`);
  }

  return {
    ...d,
    host: e.HOST ?? d.host,
    port: e.PORT ?? d.port,
    outputDir: resolve(cwd, e.OUTPUT_DIR ?? d.outputDir),
    publicAudioPath: (e.PUBLIC_AUDIO_PATH ?? d.publicAudioPath).replace(/\/+$/, '') || d.publicAudioPath,
    voicesFile: resolve(cwd, e.VOICES_FILE ?? d.voicesFile),
    taskStorePath: e.TASK_STORE_PATH ? resolve(cwd, e.TASK_STORE_PATH) : undefined,
    maxStoredTasks,
    keepNewest,
    fileMaxAgeMs: e.VOICE_FILE_MAX_AGE_HOURS !== undefined ? e.VOICE_FILE_MAX_AGE_HOURS * 3_600_000 : d.fileMaxAgeMs,
    sweepIntervalMs: e.SWEEP_INTERVAL_MINUTES !== undefined ? e.SWEEP_INTERVAL_MINUTES * 60_000 : d.sweepIntervalMs,
    maxPendingTasks: e.MAX_PENDING_TASKS ?? d.maxPendingTasks,
    workers: e.GENERATION_WORKERS ?? d.workers,
    taskTimeoutMs: e.TASK_TIMEOUT_SECONDS !== undefined ? e.TASK_TIMEOUT_SECONDS * 1000 : d.taskTimeoutMs,
    generationMode: e.GENERATION_MODE ?? d.generationMode,
    engine: {
      kind: engineKind,
      command: e.TTS_COMMAND ?? d.engine.command,
      commandArgs: e.TTS_COMMAND_ARGS ? e.TTS_COMMAND_ARGS.split(/\s+/) : d.engine.commandArgs,
      ...(e.TTS_MOCK_DELAY_MS !== undefined && { mockDelayMs: e.TTS_MOCK_DELAY_MS }),
    },
    maxTextLength: e.MAX_TEXT_LENGTH ?? d.maxTextLength,
    defaults: {
      speakerId: e.DEFAULT_SPEAKER_ID ?? d.defaults.speakerId,
      temperature,
      topK,
      style: e.DEFAULT_STYLE ?? d.defaults.style,
      device: e.DEFAULT_DEVICE ?? d.defaults.device,
    },
  };
}

export function describeConfig(config: ServiceConfig): string[] {
  return [
    `Output:      ${config.outputDir} (served at ${config.publicAudioPath})`,
    `Voices:      ${config.voicesFile}`,
    `Task store:  ${config.taskStorePath ?? 'in-memory'}`,
    `Engine:      ${config.engine.kind} (${config.generationMode}, ${config.workers} worker${config.workers === 1 ? '' : 's'})`,
    `Queue limit: ${config.maxPendingTasks} outstanding, timeout ${config.taskTimeoutMs / 1000}s`,
    `Retention:   keep ${config.keepNewest}/${config.maxStoredTasks} tasks, files ${config.fileMaxAgeMs / 3_600_000}h`,
    `Devices:     ${DEVICE_PREFERENCES.join(', ')} (default ${config.defaults.device})`,
  ];
}
