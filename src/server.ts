import express from 'express';
import cors from 'cors';
import type { Server } from 'node:http';
import { createServer, type AddressInfo } from 'node:net';
import { z } from 'zod';
import { loadConfig, describeConfig } from './config.js';
import { BusyError, InvalidRequestError, messageFromCause } from './errors.js';
import { createVoiceService, type VoiceService } from './service.js';
import { toTaskResponse } from './status.js';
import type { ServiceConfig } from './types.js';

const RETRY_AFTER_SECONDS = 5;

const TaskListQuerySchema = z.object({
  status: z.enum(['pending', 'processing', 'completed', 'failed']).optional(),
  limit: z.coerce.number().int().min(1).max(1000).optional(),
});

function httpStatusOf(err: unknown): number {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status >= 400 && err.status < 600 ? err.status : 500;
  }
  return 500;
}

export function createApp(service: VoiceService): express.Express {
  const { scheduler, status, voices, config } = service;
  const app = express();

  app.use(cors());
  app.use(express.json({ limit: '256kb' }));

  // ── Health ──

  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok', tasks: scheduler.stats() });
  });

  // ── Voices ──

  app.get('/api/voices', (_req, res) => {
    res.json({
      voices: voices.list().map(v => ({
        speaker_id: v.speakerId,
        name: v.name,
        gender: v.gender,
        description: v.description,
        sample_url: v.sampleUrl ?? null,
      })),
    });
  });

  // ── Generation ──

  app.post('/api/generate', (req, res, next) => {
    try {
      const taskId = scheduler.submit(req.body);
      res.status(202).json({ task_id: taskId, status: 'pending' });
    } catch (err) {
      next(err);
    }
  });

  // ── Tasks ──

  app.get('/api/tasks', (req, res, next) => {
    const query = TaskListQuerySchema.safeParse(req.query);
    if (!query.success) {
      next(new InvalidRequestError(query.error.issues.map(i => ({ path: i.path.join('.'), message: i.message }))));
      return;
    }
    res.json({ tasks: status.list(query.data).map(toTaskResponse) });
  });

  app.get('/api/tasks/:taskId', (req, res) => {
    const { taskId } = req.params;
    const record = status.get(taskId);
    if (!record) {
      res.status(404).json({ error: `Task ${taskId} not found`, file_url: status.locateArtifact(taskId) });
      return;
    }
    res.json(toTaskResponse(record));
  });

  app.post('/api/tasks/:taskId/cancel', (req, res) => {
    const { taskId } = req.params;
    const outcome = scheduler.cancel(taskId);
    if (outcome === 'not_found') {
      res.status(404).json({ error: `Task ${taskId} not found` });
      return;
    }
    if (outcome === 'already_terminal') {
      res.status(409).json({ error: `Task ${taskId} has already finished`, status: status.get(taskId)?.status ?? null });
      return;
    }
    res.status(202).json({ task_id: taskId, outcome });
  });

  app.delete('/api/tasks/:taskId', (req, res) => {
    const { taskId } = req.params;
    const outcome = scheduler.remove(taskId);
    if (outcome === 'not_found') {
      res.status(404).json({ error: `Task ${taskId} not found` });
      return;
    }
    if (outcome === 'active') {
      res.status(409).json({ error: `Task ${taskId} is still running; cancel it first`, status: status.get(taskId)?.status ?? null });
      return;
    }
    res.json({ task_id: taskId, deleted: true });
  });

  // ── Audio ──

  app.use(config.publicAudioPath, express.static(config.outputDir, { index: false }));

  app.use((err: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    if (err instanceof InvalidRequestError) {
      res.status(400).json({ error: err.message, issues: err.issues });
      return;
    }
    if (err instanceof BusyError) {
      res.set('Retry-After', String(RETRY_AFTER_SECONDS));
      res.status(503).json({ error: err.message });
      return;
    }
    const code = httpStatusOf(err);
    if (code >= 500) console.error('API Error:', messageFromCause(err));
    res.status(code).json({ error: messageFromCause(err) || 'Internal server error' });
  });

  return app;
}

function isPortAvailable(port: number, host: string): Promise<boolean> {
  return new Promise((resolve) => {
    const server = createServer();
    server.once('error', () => resolve(false));
    server.once('listening', () => { server.close(); resolve(true); });
    server.listen(port, host);
  });
}

async function findAvailablePort(startPort: number, host: string, maxAttempts = 20): Promise<number> {
  for (let i = 0; i < maxAttempts; i++) {
    const port = startPort + i;
    if (await isPortAvailable(port, host)) return port;
    console.log(`Port ${port} is in use, trying another one...`);
  }
  throw new Error(`No available port found after trying ${startPort}–${startPort + maxAttempts - 1}`);
}

export interface RunningServer {
  server: Server;
  port: number;
}

/** Listens on `port` (or the next free one); port 0 picks any free port. */
export async function startServer(service: VoiceService, port = service.config.port): Promise<RunningServer> {
  const { host } = service.config;
  const listenPort = port === 0 ? 0 : await findAvailablePort(port, host);
  const app = createApp(service);
  return new Promise((resolve, reject) => {
    const server = app.listen(listenPort, host, () => {
      const address: AddressInfo | string | null = server.address();
      const actual = typeof address === 'object' && address ? address.port : listenPort;
      resolve({ server, port: actual });
    });
    server.once('error', reject);
  });
}

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close(err => (err ? reject(err) : resolve()));
  });
}

/** Builds the service, serves it and shuts both down on SIGINT/SIGTERM. */
export async function serve(config: ServiceConfig, port?: number): Promise<RunningServer> {
  const service = await createVoiceService(config);
  const running = await startServer(service, port);
  console.log(`Voice API running on http://${config.host}:${running.port}`);
  for (const line of describeConfig(config)) console.log(`  ${line}`);

  let stopping = false;
  const shutdown = (signal: string) => {
    if (stopping) return;
    stopping = true;
    console.log(`\nReceived ${signal}, shutting down...`);
    closeServer(running.server)
      .then(() => service.close())
      .then(() => process.exit(0))
      .catch(err => {
        console.error(`Shutdown failed: ${messageFromCause(err)}`);
        process.exit(1);
      });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  return running;
}

// Run directly (tsx src/server.ts)
if (process.argv[1]?.endsWith('server.ts') || process.argv[1]?.endsWith('server.js')) {
  serve(loadConfig()).catch(err => {
    console.error(`Error: ${messageFromCause(err)}`);
    process.exit(1);
  });
}
