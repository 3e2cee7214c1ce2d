import assert from 'node:assert/strict';
import { writeFileSync } from 'node:fs';
import test from 'node:test';
import { ArtifactStorage } from './artifacts.js';
import { StatusQueryService, toTaskResponse } from './status.js';
import { makeRequest, makeStoreWithClock, withTempDir } from './test-fixtures.js';

test('unknown ids read as undefined', () => {
  const { store } = makeStoreWithClock();
  const status = new StatusQueryService(store, new ArtifactStorage('/nowhere', '/voices'));
  assert.equal(status.get('f47ac10b-58cc-4372-a567-0e02b2c3d479'), undefined);
});

test('terminal reads are stable snapshots', () => {
  const { store, clock } = makeStoreWithClock();
  const status = new StatusQueryService(store, new ArtifactStorage('/nowhere', '/voices'));
  const { id } = store.create(makeRequest());
  store.fail(id, { message: 'Cancelled by request', stage: 'cancelled' });

  const first = status.get(id);
  clock.advance(60_000);
  const second = status.get(id);
  assert.equal(first, second);
  assert.equal(Object.isFrozen(first), true);
});

test('projects completed records onto the API shape', () => {
  const { store, clock } = makeStoreWithClock();
  clock.set(Date.UTC(2024, 0, 2, 3, 4, 5));
  const { id } = store.create(makeRequest());
  store.markProcessing(id, 5);
  const done = store.complete(
    id,
    { fileUrl: '/voices/voice_task-1.wav', filePath: '/out/voice_task-1.wav', sizeBytes: 4096, durationSeconds: 2.5, sampleRate: 24000 },
    'cuda:0',
  );

  assert.deepEqual(toTaskResponse(done), {
    task_id: 'task-1',
    status: 'completed',
    progress: 100,
    result: { file_url: '/voices/voice_task-1.wav', duration: 2.5, sample_rate: 24000, size_bytes: 4096 },
    error: null,
    error_stage: null,
    device_info: 'cuda:0',
    created_at: '2024-01-02T03:04:05.000Z',
    updated_at: '2024-01-02T03:04:05.002Z',
  });
});

test('projects failed records with message and stage', () => {
  const { store } = makeStoreWithClock();
  const { id } = store.create(makeRequest());
  const failed = store.fail(id, { message: 'Generation timed out after 5.0s', stage: 'timeout' });
  const response = toTaskResponse(failed);
  assert.equal(response.result, null);
  assert.equal(response.error, 'Generation timed out after 5.0s');
  assert.equal(response.error_stage, 'timeout');
});

test('list delegates filters to the store', () => {
  const { store, clock } = makeStoreWithClock();
  const status = new StatusQueryService(store, new ArtifactStorage('/nowhere', '/voices'));
  const a = store.create(makeRequest());
  clock.advance(5);
  store.create(makeRequest());
  store.fail(a.id, { message: 'x', stage: 'cancelled' });
  assert.deepEqual(status.list({ status: 'failed' }).map(r => r.id), [a.id]);
  assert.equal(status.list({ limit: 1 }).length, 1);
});

test('locates the conventional artifact only when it exists', async () => {
  await withTempDir(dir => {
    const { store } = makeStoreWithClock();
    const status = new StatusQueryService(store, new ArtifactStorage(dir, '/voices'));
    assert.equal(status.locateArtifact('task-9'), null);
    writeFileSync(`${dir}/voice_task-9.wav`, '');
    assert.equal(status.locateArtifact('task-9'), '/voices/voice_task-9.wav');
    assert.equal(status.locateArtifact('../task-9'), null);
  });
});
