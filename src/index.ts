#!/usr/bin/env node

import { Command, InvalidArgumentError } from 'commander';
import { copyFile, mkdir } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { createRequire } from 'node:module';
import { ArtifactStorage } from './artifacts.js';
import { loadConfig } from './config.js';
import { InvalidRequestError, messageFromCause } from './errors.js';
import { createJsonTaskPersistence } from './persistence.js';
import { RetentionSweeper } from './retention.js';
import { serve } from './server.js';
import { createVoiceService } from './service.js';
import { TaskStore } from './task-store.js';
import { loadVoiceCatalog } from './voices.js';
import type { ServiceConfig } from './types.js';

const require = createRequire(import.meta.url);
const pkg: { version: string } = require('../package.json');

const program = new Command();

program
  .name('charvox')
  .description('Character voice generation service.\n\nQueue text-to-speech jobs for a set of speaker profiles and poll for the audio.')
  .version(pkg.version);

function intArg(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n)) throw new InvalidArgumentError('Not an integer.');
  return n;
}

function numberArg(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n)) throw new InvalidArgumentError('Not a number.');
  return n;
}

function fail(err: unknown): never {
  console.error(`\nError: ${messageFromCause(err)}`);
  if (err instanceof InvalidRequestError) {
    for (const issue of err.issues) console.error(`  ${issue.path || '(body)'}: ${issue.message}`);
  }
  if (process.env.DEBUG && err instanceof Error) console.error(err.stack);
  process.exit(1);
}

interface ServeOptions {
  port?: number;
  host?: string;
}

program
  .command('serve')
  .description('Start the HTTP API')
  .option('-p, --port <port>', 'Port to listen on (default: $PORT or 8765)', intArg)
  .option('--host <host>', 'Interface to bind (default: $HOST or 127.0.0.1)')
  .action(async (opts: ServeOptions) => {
    try {
      const base = loadConfig();
      const config: ServiceConfig = { ...base, host: opts.host ?? base.host };
      await serve(config, opts.port);
    } catch (err) {
      fail(err);
    }
  });

interface GenerateOptions {
  speaker?: number;
  temperature?: number;
  topK?: number;
  style?: string;
  device?: string;
  output?: string;
  timeout: number;
}

program
  .command('generate')
  .description('Generate one clip in-process and wait for it')
  .argument('<text>', 'Text to speak')
  .option('-s, --speaker <id>', 'Speaker id (see `charvox voices`)', intArg)
  .option('-t, --temperature <value>', 'Sampling temperature', numberArg)
  .option('-k, --top-k <value>', 'Top-k sampling', intArg)
  .option('--style <name>', 'Speaking style')
  .option('--device <device>', 'auto, cuda or cpu')
  .option('-o, --output <path>', 'Copy the generated WAV here')
  .option('--timeout <seconds>', 'Give up waiting after this many seconds', numberArg, 600)
  .action(async (text: string, opts: GenerateOptions) => {
    try {
      const config: ServiceConfig = { ...loadConfig(), generationMode: 'inline' };
      const service = await createVoiceService(config, { sweep: false });
      try {
        const taskId = service.scheduler.submit({
          text,
          speaker_id: opts.speaker,
          temperature: opts.temperature,
          top_k: opts.topK,
          style: opts.style,
          device: opts.device,
        });
        console.log(`Task ${taskId} queued`);

        const record = await service.store.waitForTerminal(taskId, opts.timeout * 1000);
        if (record.status === 'failed') {
          throw new Error(`Generation failed at ${record.error.stage}: ${record.error.message}`);
        }

        let outPath = record.result.filePath;
        if (opts.output) {
          outPath = resolve(opts.output);
          await mkdir(dirname(outPath), { recursive: true });
          await copyFile(record.result.filePath, outPath);
        }
        console.log(`\nDone: ${outPath}`);
        console.log(`  Duration: ${record.result.durationSeconds.toFixed(2)}s @ ${record.result.sampleRate} Hz`);
        console.log(`  Device:   ${record.deviceInfo ?? 'unknown'}`);
      } finally {
        await service.close();
      }
    } catch (err) {
      fail(err);
    }
  });

program
  .command('sweep')
  .description('Evict old task records and delete stale audio files once')
  .action(async () => {
    try {
      const config = loadConfig();
      const store = new TaskStore({
        persistence: config.taskStorePath ? createJsonTaskPersistence(config.taskStorePath) : undefined,
      });
      const artifacts = new ArtifactStorage(config.outputDir, config.publicAudioPath);
      const sweeper = new RetentionSweeper(store, artifacts, {
        keepNewest: config.keepNewest,
        fileMaxAgeMs: config.fileMaxAgeMs,
      });
      const report = await sweeper.sweep();
      console.log(`Evicted ${report.evicted} records (${report.skippedActive} active kept)`);
      console.log(`Deleted ${report.filesDeleted} files (${report.fileErrors} errors)`);
      if (report.fileErrors > 0) process.exit(1);
    } catch (err) {
      fail(err);
    }
  });

program
  .command('voices')
  .description('List the speaker profiles')
  .action(async () => {
    try {
      const catalog = await loadVoiceCatalog(loadConfig().voicesFile);
      console.log('\nAvailable voices:\n');
      for (const v of catalog.list()) {
        console.log(`  ${String(v.speakerId).padStart(3)}  ${v.name.padEnd(20)} ${v.gender.padEnd(8)} ${v.description}`);
      }
      console.log('');
    } catch (err) {
      fail(err);
    }
  });

program.parse();
