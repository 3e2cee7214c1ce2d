import assert from 'node:assert/strict';
import { existsSync } from 'node:fs';
import test from 'node:test';
import { ArtifactStorage } from './artifacts.js';
import { GenerationWorker, type GenerationWorkerDeps } from './generation-worker.js';
import type { AudioProbe } from './audio-probe.js';
import { FakeEngine, FakeProbe, makeRequest, makeStoreWithClock, withTempDir } from './test-fixtures.js';

function setup(dir: string, overrides: Partial<GenerationWorkerDeps> = {}) {
  const { store } = makeStoreWithClock();
  const engine = new FakeEngine();
  const artifacts = new ArtifactStorage(dir, '/voices');
  const worker = new GenerationWorker({
    store,
    engine,
    artifacts,
    probe: new FakeProbe(),
    timeoutMs: 0,
    ...overrides,
  });
  return { store, engine, artifacts, worker };
}

test('runs a task through to completed', async () => {
  await withTempDir(async dir => {
    const { store, engine, artifacts, worker } = setup(dir);
    const { id } = store.create(makeRequest({ device: 'cuda' }));

    const running = worker.run(id);
    assert.equal(store.get(id)?.status, 'processing');
    assert.equal(store.get(id)?.progress, 5);
    assert.equal(engine.last.params.device, 'cuda');

    engine.progress(50);
    assert.equal(store.get(id)?.progress, 42.5);

    engine.succeed('cuda:0');
    await running;

    const done = store.get(id);
    assert.equal(done?.status, 'completed');
    assert.equal(done?.progress, 100);
    assert.equal(done?.deviceInfo, 'cuda:0');
    assert.equal(done?.error, null);
    assert.deepEqual(done?.result, {
      fileUrl: '/voices/voice_task-1.wav',
      filePath: artifacts.pathFor(id),
      sizeBytes: 4,
      durationSeconds: 1.25,
      sampleRate: 24000,
    });
    assert.equal(existsSync(artifacts.pathFor(id)), true);
  });
});

test('records engine failures with the device attempted', async () => {
  await withTempDir(async dir => {
    const { store, engine, worker } = setup(dir);
    const { id } = store.create(makeRequest());
    const running = worker.run(id);
    engine.progress(20);
    engine.fail('CUDA out of memory', 'cuda:0');
    await running;

    const failed = store.get(id);
    assert.equal(failed?.status, 'failed');
    assert.deepEqual(failed?.error, { message: 'CUDA out of memory', stage: 'synthesis', device: 'cuda:0' });
    assert.equal(failed?.deviceInfo, 'cuda:0');
    assert.equal(failed?.progress, 20);
    assert.equal(failed?.result, null);
  });
});

test('fails with timeout when the engine overruns and ignores its late result', async () => {
  await withTempDir(async dir => {
    const { store, engine, worker } = setup(dir, { timeoutMs: 20 });
    const { id } = store.create(makeRequest());
    await worker.run(id);

    const failed = store.get(id);
    assert.equal(failed?.status, 'failed');
    assert.equal(failed?.error?.stage, 'timeout');
    assert.match(failed?.error?.message ?? '', /^Generation timed out after/);

    engine.succeed();
    await new Promise(resolve => setImmediate(resolve));
    assert.equal(store.get(id)?.status, 'failed');
  });
});

test('fails with cancelled when the caller aborts', async () => {
  await withTempDir(async dir => {
    const { store, worker } = setup(dir);
    const { id } = store.create(makeRequest());
    const controller = new AbortController();
    const running = worker.run(id, controller.signal);
    controller.abort();
    await running;
    assert.deepEqual(store.get(id)?.error, { message: 'Cancelled by request', stage: 'cancelled' });
  });
});

test('storage and probe failures are recorded at the storage stage', async () => {
  await withTempDir(async dir => {
    const brokenProbe: AudioProbe = {
      probe: async () => {
        throw new Error('Failed to probe audio file: truncated');
      },
    };
    const { store, engine, worker } = setup(dir, { probe: brokenProbe });
    const { id } = store.create(makeRequest());
    const running = worker.run(id);
    engine.succeed('cpu');
    await running;

    const failed = store.get(id);
    assert.deepEqual(failed?.error, { message: 'Failed to probe audio file: truncated', stage: 'storage' });
    assert.equal(failed?.progress, 95);
  });
});

test('skips tasks that are missing or no longer pending', async () => {
  await withTempDir(async dir => {
    const { store, engine, worker } = setup(dir);
    await worker.run('missing');

    const { id } = store.create(makeRequest());
    store.fail(id, { message: 'Cancelled by request', stage: 'cancelled' });
    await worker.run(id);

    assert.equal(engine.calls.length, 0);
    assert.equal(store.get(id)?.error?.stage, 'cancelled');
  });
});
