import assert from 'node:assert/strict';
import test from 'node:test';
import { DeadlineExceededError, IllegalTransitionError, TaskNotFoundError } from './errors.js';
import { TaskStore, type TaskStorePersistence } from './task-store.js';
import type { TaskRecord, TaskResult } from './types.js';
import { makeRequest, makeStoreWithClock } from './test-fixtures.js';

const RESULT: TaskResult = {
  fileUrl: '/voices/voice_task-1.wav',
  filePath: '/tmp/voice_task-1.wav',
  sizeBytes: 4,
  durationSeconds: 1,
  sampleRate: 24000,
};

test('create returns a frozen pending record', () => {
  const { store, clock } = makeStoreWithClock();
  const task = store.create(makeRequest());
  assert.equal(task.id, 'task-1');
  assert.equal(task.status, 'pending');
  assert.equal(task.progress, 0);
  assert.equal(task.createdAt, clock.now());
  assert.equal(task.updatedAt, clock.now());
  assert.equal(task.deviceInfo, null);
  assert.equal(Object.isFrozen(task), true);
  assert.equal(Object.isFrozen(task.request), true);
  assert.equal(store.get('task-1'), task);
});

test('create refuses an id that is already taken', () => {
  const store = new TaskStore({ newId: () => 'x' });
  store.create(makeRequest());
  assert.throws(() => store.create(makeRequest()), /Task id x is already in use/);
});

test('walks pending -> processing -> completed', () => {
  const { store, clock } = makeStoreWithClock();
  const { id } = store.create(makeRequest());
  clock.advance(10);
  const running = store.markProcessing(id, 5);
  assert.equal(running.status, 'processing');
  assert.equal(running.progress, 5);
  assert.equal(running.startedAt, clock.now());

  clock.advance(10);
  const done = store.complete(id, RESULT, 'cuda:0');
  assert.equal(done.status, 'completed');
  assert.equal(done.progress, 100);
  assert.equal(done.deviceInfo, 'cuda:0');
  assert.deepEqual(done.result, RESULT);
  assert.equal(done.finishedAt, clock.now());
});

test('progress is monotonic and stays below 100 while running', () => {
  const { store } = makeStoreWithClock();
  const { id } = store.create(makeRequest());
  store.markProcessing(id);
  assert.equal(store.updateProgress(id, 40).progress, 40);
  assert.equal(store.updateProgress(id, 20).progress, 40);
  assert.equal(store.updateProgress(id, 150).progress, 99);
  assert.equal(store.updateProgress(id, Number.NaN).progress, 99);
});

test('updatedAt strictly increases even when the clock stands still', () => {
  const { store } = makeStoreWithClock();
  const created = store.create(makeRequest());
  const running = store.markProcessing(created.id);
  const updated = store.updateProgress(created.id, 30);
  assert.ok(running.updatedAt > created.updatedAt);
  assert.ok(updated.updatedAt > running.updatedAt);
});

test('rejects transitions the state machine does not allow', () => {
  const { store } = makeStoreWithClock();
  const { id } = store.create(makeRequest());
  assert.throws(() => store.complete(id, RESULT, 'cpu'), IllegalTransitionError);
  assert.throws(() => store.updateProgress(id, 10), IllegalTransitionError);

  store.markProcessing(id);
  assert.throws(() => store.markProcessing(id), /Illegal transition for task task-1: processing -> processing/);

  store.fail(id, { message: 'boom', stage: 'synthesis' });
  assert.throws(() => store.complete(id, RESULT, 'cpu'), /failed -> completed/);
  assert.throws(() => store.fail(id, { message: 'again', stage: 'synthesis' }), /failed -> failed/);
  assert.throws(() => store.markProcessing('nope'), TaskNotFoundError);
});

test('fail keeps the recorded device unless a new one is given', () => {
  const { store } = makeStoreWithClock();
  const a = store.create(makeRequest());
  store.markProcessing(a.id);
  assert.equal(store.fail(a.id, { message: 'x', stage: 'timeout' }).deviceInfo, null);

  const b = store.create(makeRequest());
  store.markProcessing(b.id);
  const failed = store.fail(b.id, { message: 'out of memory', stage: 'synthesis', device: 'cuda' }, 'cuda');
  assert.equal(failed.deviceInfo, 'cuda');
  assert.deepEqual(failed.error, { message: 'out of memory', stage: 'synthesis', device: 'cuda' });
  assert.equal(failed.result, null);
});

test('a pending task can be failed before it is dispatched', () => {
  const { store } = makeStoreWithClock();
  const { id } = store.create(makeRequest());
  const failed = store.fail(id, { message: 'Cancelled by request', stage: 'cancelled' });
  assert.equal(failed.status, 'failed');
  assert.equal(failed.startedAt, undefined);
});

test('list orders by last update and filters by status', () => {
  const { store, clock } = makeStoreWithClock();
  const a = store.create(makeRequest());
  clock.advance(1000);
  const b = store.create(makeRequest());
  clock.advance(1000);
  store.markProcessing(a.id);

  assert.deepEqual(store.list().map(r => r.id), [a.id, b.id]);
  assert.deepEqual(store.list({ status: 'pending' }).map(r => r.id), [b.id]);
  assert.deepEqual(store.list({ limit: 1 }).map(r => r.id), [a.id]);
  assert.equal(store.countActive(), 2);
});

test('evict removes terminal records only', () => {
  const { store } = makeStoreWithClock();
  const a = store.create(makeRequest());
  const b = store.create(makeRequest());
  store.fail(a.id, { message: 'x', stage: 'cancelled' });
  assert.deepEqual(store.evict([a.id, b.id, 'missing']), [a.id]);
  assert.equal(store.get(a.id), undefined);
  assert.equal(store.get(b.id)?.status, 'pending');
  assert.equal(store.size, 1);
});

test('listeners see every committed record until unsubscribed', () => {
  const { store } = makeStoreWithClock();
  const seen: string[] = [];
  const off = store.onChange(r => seen.push(`${r.id}:${r.status}`));
  const { id } = store.create(makeRequest());
  store.markProcessing(id);
  off();
  store.updateProgress(id, 50);
  assert.deepEqual(seen, ['task-1:pending', 'task-1:processing']);
});

test('waitForTerminal resolves on the terminal transition', async () => {
  const { store } = makeStoreWithClock();
  const { id } = store.create(makeRequest());
  const waiting = store.waitForTerminal(id);
  store.markProcessing(id);
  store.complete(id, RESULT, 'cpu');
  const record = await waiting;
  assert.equal(record.status, 'completed');
});

test('waitForTerminal rejects for unknown ids and on timeout', async () => {
  const { store } = makeStoreWithClock();
  await assert.rejects(store.waitForTerminal('missing'), TaskNotFoundError);
  const { id } = store.create(makeRequest());
  await assert.rejects(store.waitForTerminal(id, 5), DeadlineExceededError);
});

function memoryPersistence(initial: TaskRecord[] = []): TaskStorePersistence & { saved: TaskRecord[][] } {
  const saved: TaskRecord[][] = [];
  return {
    saved,
    load: () => initial,
    save: records => {
      saved.push([...records]);
    },
  };
}

test('persists lifecycle transitions but not progress ticks', () => {
  const persistence = memoryPersistence();
  const { store } = makeStoreWithClock({ persistence });
  const { id } = store.create(makeRequest());
  store.markProcessing(id);
  store.updateProgress(id, 50);
  store.updateProgress(id, 60);
  store.complete(id, RESULT, 'cpu');
  assert.deepEqual(persistence.saved.map(batch => batch.map(r => r.status)), [['pending'], ['processing'], ['completed']]);
});

test('a failing save does not break the transition', () => {
  const { store } = makeStoreWithClock({
    persistence: {
      load: () => [],
      save: () => {
        throw new Error('disk full');
      },
    },
  });
  const task = store.create(makeRequest());
  assert.equal(store.get(task.id)?.status, 'pending');
});

test('interrupted work is failed on load', () => {
  const request = makeRequest();
  const persistence = memoryPersistence([
    { id: 'old-1', status: 'pending', request, progress: 0, createdAt: 1, updatedAt: 1, deviceInfo: null, result: null, error: null },
    {
      id: 'old-2', status: 'processing', request, progress: 42, createdAt: 1, updatedAt: 5, startedAt: 2,
      deviceInfo: null, result: null, error: null,
    },
    {
      id: 'old-3', status: 'completed', request, progress: 100, createdAt: 1, updatedAt: 9, startedAt: 2, finishedAt: 9,
      deviceInfo: 'cpu', result: RESULT, error: null,
    },
  ]);
  const { store } = makeStoreWithClock({ persistence });

  const pending = store.get('old-1');
  assert.equal(pending?.status, 'failed');
  assert.deepEqual(pending?.error, { message: 'Interrupted while pending by a server restart', stage: 'recovery' });
  const running = store.get('old-2');
  assert.equal(running?.status, 'failed');
  assert.equal(running?.progress, 42);
  assert.equal(store.get('old-3')?.status, 'completed');
  assert.equal(store.countActive(), 0);
  assert.equal(persistence.saved.length, 1);
});

test('listByCreation keeps submission order for tasks created in the same millisecond', () => {
  const { store, clock } = makeStoreWithClock();
  const first = store.create(makeRequest());
  const second = store.create(makeRequest());
  store.fail(second.id, { message: 'x', stage: 'cancelled' });
  clock.advance(5);
  store.fail(first.id, { message: 'x', stage: 'cancelled' });

  assert.deepEqual(store.list().map(r => r.id), [first.id, second.id]);
  assert.deepEqual(store.listByCreation().map(r => r.id), [second.id, first.id]);
});
