import { ArtifactStorage } from './artifacts.js';
import { createAudioProbe, type AudioProbe } from './audio-probe.js';
import { GenerationWorker } from './generation-worker.js';
import { createJsonTaskPersistence } from './persistence.js';
import { RetentionSweeper } from './retention.js';
import { TaskScheduler } from './scheduler.js';
import { StatusQueryService } from './status.js';
import { SynthesisPool } from './synthesis-pool.js';
import { TaskStore } from './task-store.js';
import { createSpeechEngine, type SpeechEngine } from './tts.js';
import { createRequestValidator } from './validation.js';
import { loadVoiceCatalog, type VoiceCatalog } from './voices.js';
import type { ServiceConfig } from './types.js';

export interface VoiceService {
  config: ServiceConfig;
  voices: VoiceCatalog;
  store: TaskStore;
  artifacts: ArtifactStorage;
  scheduler: TaskScheduler;
  status: StatusQueryService;
  retention: RetentionSweeper;
  engine: SpeechEngine;
  close(): Promise<void>;
}

export interface ServiceOverrides {
  engine?: SpeechEngine;
  probe?: AudioProbe;
  voices?: VoiceCatalog;
  now?: () => number;
  /** Start the periodic retention sweep. */
  sweep?: boolean;
}

function buildEngine(config: ServiceConfig): SpeechEngine {
  if (config.generationMode === 'fork') return new SynthesisPool(config.engine, config.workers);
  return createSpeechEngine(config.engine);
}

/** Wires every component for one process. */
export async function createVoiceService(config: ServiceConfig, overrides: ServiceOverrides = {}): Promise<VoiceService> {
  const voices = overrides.voices ?? (await loadVoiceCatalog(config.voicesFile));
  const validate = createRequestValidator(config, voices);
  const artifacts = new ArtifactStorage(config.outputDir, config.publicAudioPath);
  await artifacts.ensureDir();

  const store = new TaskStore({
    now: overrides.now,
    persistence: config.taskStorePath ? createJsonTaskPersistence(config.taskStorePath) : undefined,
  });

  const engine = overrides.engine ?? buildEngine(config);
  try {
    await engine.init?.();
  } catch (err) {
    await engine.close?.();
    throw err;
  }
  const probe = overrides.probe ?? (await createAudioProbe());

  const retention = new RetentionSweeper(store, artifacts, {
    keepNewest: config.keepNewest,
    fileMaxAgeMs: config.fileMaxAgeMs,
    now: overrides.now,
  });
  const worker = new GenerationWorker({ store, engine, artifacts, probe, timeoutMs: config.taskTimeoutMs });
  const scheduler = new TaskScheduler(
    { store, worker, validate, retention },
    { workers: config.workers, maxPendingTasks: config.maxPendingTasks, maxStoredTasks: config.maxStoredTasks },
  );
  const status = new StatusQueryService(store, artifacts);

  if (overrides.sweep ?? true) retention.start(config.sweepIntervalMs);

  return {
    config,
    voices,
    store,
    artifacts,
    scheduler,
    status,
    retention,
    engine,
    async close() {
      retention.stop();
      await scheduler.close();
      await engine.close?.();
    },
  };
}
