import assert from 'node:assert/strict';
import { existsSync, utimesSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import test from 'node:test';
import { ArtifactStorage, type ArtifactEntry } from './artifacts.js';
import { RetentionSweeper } from './retention.js';
import { isTerminal } from './state-machine.js';
import { makeRequest, makeStoreWithClock, withTempDir } from './test-fixtures.js';

const HOUR = 60 * 60 * 1000;

const noFiles = {
  listArtifacts: async (): Promise<ArtifactEntry[]> => [],
  remove: async () => {},
};

test('evicts terminal records past the newest keepNewest', () => {
  const { store, clock } = makeStoreWithClock();
  const ids: string[] = [];
  for (let i = 0; i < 6; i++) {
    const { id } = store.create(makeRequest());
    store.fail(id, { message: 'x', stage: 'cancelled' });
    ids.push(id);
    clock.advance(1000);
  }
  const sweeper = new RetentionSweeper(store, noFiles, { keepNewest: 4, fileMaxAgeMs: HOUR });

  assert.deepEqual(sweeper.evictRecords(), { evicted: 2, skippedActive: 0 });
  assert.equal(store.get(ids[0] ?? ''), undefined);
  assert.equal(store.get(ids[1] ?? ''), undefined);
  assert.deepEqual(store.list().map(r => r.id).sort(), ids.slice(2).sort());
});

test('evicts the earlier of two tasks created in the same millisecond', () => {
  const { store, clock } = makeStoreWithClock();
  const earlier = store.create(makeRequest());
  const later = store.create(makeRequest());
  store.fail(later.id, { message: 'x', stage: 'cancelled' });
  clock.advance(5);
  store.fail(earlier.id, { message: 'x', stage: 'cancelled' });

  const sweeper = new RetentionSweeper(store, noFiles, { keepNewest: 1, fileMaxAgeMs: HOUR });
  assert.deepEqual(sweeper.evictRecords(), { evicted: 1, skippedActive: 0 });
  assert.equal(store.get(earlier.id), undefined);
  assert.equal(store.get(later.id)?.status, 'failed');
});

test('never evicts active records even past the limit', () => {
  const { store, clock } = makeStoreWithClock();
  const oldPending = store.create(makeRequest());
  clock.advance(1000);
  const oldRunning = store.create(makeRequest());
  store.markProcessing(oldRunning.id);
  clock.advance(1000);
  const oldDone = store.create(makeRequest());
  store.fail(oldDone.id, { message: 'x', stage: 'cancelled' });
  clock.advance(1000);
  store.create(makeRequest());

  const sweeper = new RetentionSweeper(store, noFiles, { keepNewest: 1, fileMaxAgeMs: HOUR });
  assert.deepEqual(sweeper.evictRecords(), { evicted: 1, skippedActive: 2 });
  assert.equal(store.get(oldPending.id)?.status, 'pending');
  assert.equal(store.get(oldRunning.id)?.status, 'processing');
  assert.equal(store.get(oldDone.id), undefined);
});

test('leaves at most keepNewest terminal records', () => {
  const { store, clock } = makeStoreWithClock();
  for (let i = 0; i < 20; i++) {
    const { id } = store.create(makeRequest());
    if (i % 3 !== 0) store.fail(id, { message: 'x', stage: 'cancelled' });
    clock.advance(10);
  }
  new RetentionSweeper(store, noFiles, { keepNewest: 5, fileMaxAgeMs: HOUR }).evictRecords();
  assert.ok(store.list().filter(isTerminal).length <= 5);
  assert.equal(store.countActive(), 7);
});

test('deletes artifacts and partial writes older than the age limit', async () => {
  await withTempDir(async dir => {
    const now = Date.UTC(2024, 5, 1);
    const files = new ArtifactStorage(dir, '/voices');
    const old = join(dir, 'voice_old.wav');
    const fresh = join(dir, 'voice_fresh.wav');
    const partial = join(dir, 'voice_crashed.wav.part');
    const other = join(dir, 'keep.txt');
    for (const path of [old, fresh, partial, other]) writeFileSync(path, '');
    utimesSync(old, (now - 25 * HOUR) / 1000, (now - 25 * HOUR) / 1000);
    utimesSync(partial, (now - 25 * HOUR) / 1000, (now - 25 * HOUR) / 1000);
    utimesSync(other, (now - 25 * HOUR) / 1000, (now - 25 * HOUR) / 1000);
    utimesSync(fresh, (now - HOUR) / 1000, (now - HOUR) / 1000);

    const { store } = makeStoreWithClock();
    const sweeper = new RetentionSweeper(store, files, { keepNewest: 10, fileMaxAgeMs: 24 * HOUR, now: () => now });
    assert.deepEqual(await sweeper.deleteStaleFiles(), { filesDeleted: 2, fileErrors: 0 });
    assert.equal(existsSync(old), false);
    assert.equal(existsSync(partial), false);
    assert.equal(existsSync(fresh), true);
    assert.equal(existsSync(other), true);
  });
});

test('a failed deletion is counted and the rest continue', async () => {
  const removed: string[] = [];
  const files = {
    listArtifacts: async (): Promise<ArtifactEntry[]> => [
      { name: 'voice_a.wav', path: '/x/voice_a.wav', mtimeMs: 0 },
      { name: 'voice_b.wav', path: '/x/voice_b.wav', mtimeMs: 0 },
    ],
    remove: async (path: string) => {
      if (path.endsWith('voice_a.wav')) throw new Error('EACCES');
      removed.push(path);
    },
  };
  const { store } = makeStoreWithClock();
  const sweeper = new RetentionSweeper(store, files, { keepNewest: 1, fileMaxAgeMs: 1000, now: () => 10_000 });
  assert.deepEqual(await sweeper.deleteStaleFiles(), { filesDeleted: 1, fileErrors: 1 });
  assert.deepEqual(removed, ['/x/voice_b.wav']);
});

test('sweep runs both passes even when file listing fails', async () => {
  const { store, clock } = makeStoreWithClock();
  const a = store.create(makeRequest());
  store.fail(a.id, { message: 'x', stage: 'cancelled' });
  clock.advance(1);
  store.create(makeRequest());

  const files = {
    listArtifacts: async (): Promise<ArtifactEntry[]> => {
      throw new Error('EIO');
    },
    remove: async () => {},
  };
  const sweeper = new RetentionSweeper(store, files, { keepNewest: 1, fileMaxAgeMs: HOUR });
  assert.deepEqual(await sweeper.sweep(), { evicted: 1, skippedActive: 0, filesDeleted: 0, fileErrors: 1 });
});

test('concurrent sweeps share one run', async () => {
  let listings = 0;
  const files = {
    listArtifacts: async (): Promise<ArtifactEntry[]> => {
      listings++;
      return [];
    },
    remove: async () => {},
  };
  const { store } = makeStoreWithClock();
  const sweeper = new RetentionSweeper(store, files, { keepNewest: 1, fileMaxAgeMs: HOUR });
  const first = sweeper.sweep();
  const second = sweeper.sweep();
  assert.equal(first, second);
  await first;
  assert.equal(listings, 1);
  await sweeper.sweep();
  assert.equal(listings, 2);
});

test('start and stop manage one timer', () => {
  const { store } = makeStoreWithClock();
  const sweeper = new RetentionSweeper(store, noFiles, { keepNewest: 1, fileMaxAgeMs: HOUR });
  sweeper.start(60_000);
  sweeper.start(60_000);
  sweeper.stop();
  sweeper.stop();
});
