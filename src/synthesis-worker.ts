// Runs as a child process (via fork). Hosts one speech engine and talks to
// the parent over process IPC.
import { z } from 'zod';
import { SynthesisError, messageFromCause } from './errors.js';
import { createSpeechEngine } from './tts.js';

const EngineConfigSchema = z.object({
  kind: z.enum(['mock', 'command']),
  command: z.string(),
  commandArgs: z.array(z.string()),
  mockDelayMs: z.number().int().nonnegative().optional(),
});

const RequestSchema = z.object({
  text: z.string(),
  speakerId: z.number().int(),
  temperature: z.number(),
  topK: z.number().int(),
  style: z.string(),
  device: z.enum(['auto', 'cuda', 'cpu']),
});

const ParentMessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('generate'), id: z.number().int(), params: RequestSchema }),
  z.object({ type: z.literal('abort'), id: z.number().int() }),
]);

export type ParentMessage = z.infer<typeof ParentMessageSchema>;

export type ChildMessage =
  | { type: 'ready' }
  | { type: 'init-error'; error: string }
  | { type: 'progress'; id: number; percent: number }
  | { type: 'done'; id: number; audio: string; deviceInfo: string; sampleRate?: number }
  | { type: 'error'; id: number; error: string; device?: string };

function send(msg: ChildMessage): void {
  if (process.send) process.send(msg);
}

async function main() {
  const rawConfig = process.env.SYNTH_ENGINE;
  if (!rawConfig) throw new Error('SYNTH_ENGINE env var required');
  const engine = createSpeechEngine(EngineConfigSchema.parse(JSON.parse(rawConfig)));
  await engine.init?.();

  const inFlight = new Map<number, AbortController>();

  process.on('message', (raw: unknown) => {
    const parsed = ParentMessageSchema.safeParse(raw);
    if (!parsed.success) return;
    const msg = parsed.data;

    if (msg.type === 'abort') {
      inFlight.get(msg.id)?.abort();
      return;
    }

    const controller = new AbortController();
    inFlight.set(msg.id, controller);
    engine
      .generate(msg.params, {
        signal: controller.signal,
        onProgress: percent => send({ type: 'progress', id: msg.id, percent }),
      })
      .then(output => {
        send({
          type: 'done',
          id: msg.id,
          audio: Buffer.from(output.audio).toString('base64'),
          deviceInfo: output.deviceInfo,
          sampleRate: output.sampleRate,
        });
      })
      .catch((err: unknown) => {
        const device = err instanceof SynthesisError ? err.device : undefined;
        send({ type: 'error', id: msg.id, error: messageFromCause(err), device });
      })
      .finally(() => inFlight.delete(msg.id));
  });

  process.on('disconnect', () => {
    for (const controller of inFlight.values()) controller.abort();
    process.exit(0);
  });

  send({ type: 'ready' });
}

main().catch((err) => {
  send({ type: 'init-error', error: messageFromCause(err) });
  process.exit(1);
});
