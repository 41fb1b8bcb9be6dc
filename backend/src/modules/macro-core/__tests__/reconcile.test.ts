import { describe, it, expect, vi, beforeEach } from 'vitest';
import { NotFoundError, StorageUnavailableError } from '../../../common/errors.js';
import { silentLogger } from '../../../core/logger.js';
import type { ChangeSet } from '../contracts/macro.contracts.js';
import { isEmptyChangeSet, mergeChangeSets, ReconciliationEngine } from '../reconcile/reconcile.service.js';
import { MemoryHistoryStore } from '../storage/memory.store.js';
import { obs, rejectionOf, sequentialIds, TestClock, testCatalog } from './fixtures.js';

const T1 = new Date('2024-02-13T13:30:00.000Z');
const T2 = new Date('2024-03-12T12:30:00.000Z');
const T3 = new Date('2024-04-10T12:30:00.000Z');

describe('ReconciliationEngine', () => {
  let store: MemoryHistoryStore;
  let engine: ReconciliationEngine;
  let clock: TestClock;

  beforeEach(() => {
    store = new MemoryHistoryStore();
    clock = new TestClock('2024-02-15T12:00:00.000Z');
    engine = new ReconciliationEngine(store, testCatalog(), {
      now: clock.now,
      newId: sequentialIds('cs'),
      logger: silentLogger(),
    });
  });

  // ═══════════════════════════════════════════════════════════════
  // TESTS: new / revised / unchanged
  // ═══════════════════════════════════════════════════════════════

  it('should record a first observation as new at revision 0', async () => {
    const changeSet = await engine.reconcile('CPIAUCSL', [obs('CPIAUCSL', '2024-01', 308.417, T1)]);

    expect(changeSet).toEqual({
      id: 'cs-1',
      createdAt: new Date('2024-02-15T12:00:00.000Z'),
      entries: [{ seriesKey: 'CPIAUCSL', period: '2024-01', newValue: 308.417, changeKind: 'new', revision: 0 }],
      unchangedCount: 0,
      skipped: [],
    });
    expect(await store.readHistory('CPIAUCSL')).toEqual([
      { seriesKey: 'CPIAUCSL', period: '2024-01', value: 308.417, fetchedAt: T1, revision: 0 },
    ]);
  });

  it('should keep both revisions when a value is revised and serve the latest', async () => {
    await engine.reconcile('CPIAUCSL', [obs('CPIAUCSL', '2024-01', 308.417, T1)]);
    const changeSet = await engine.reconcile('CPIAUCSL', [obs('CPIAUCSL', '2024-01', 308.5, T2)]);

    expect(changeSet.entries).toEqual([
      { seriesKey: 'CPIAUCSL', period: '2024-01', oldValue: 308.417, newValue: 308.5, changeKind: 'revised', revision: 1 },
    ]);
    expect((await store.readRevisions('CPIAUCSL', '2024-01')).map((r) => [r.revision, r.value])).toEqual([
      [0, 308.417],
      [1, 308.5],
    ]);
    const latest = await store.readLatest('CPIAUCSL', ['2024-01']);
    expect(latest.get('2024-01')?.value).toBe(308.5);
  });

  it('should produce an empty change-set for an identical refetch', async () => {
    await engine.reconcile('CPIAUCSL', [obs('CPIAUCSL', '2024-01', 308.417, T1)]);
    await engine.reconcile('CPIAUCSL', [obs('CPIAUCSL', '2024-01', 308.5, T2)]);
    const changeSet = await engine.reconcile('CPIAUCSL', [obs('CPIAUCSL', '2024-01', 308.5, T3)]);

    expect(changeSet.entries).toEqual([]);
    expect(changeSet.unchangedCount).toBe(1);
    expect(isEmptyChangeSet(changeSet)).toBe(true);
    expect(await store.readRevisions('CPIAUCSL', '2024-01')).toHaveLength(2);
  });

  it('should be idempotent for a repeated batch', async () => {
    const batch = [obs('CPIAUCSL', '2023-12', 306.746, T1), obs('CPIAUCSL', '2024-01', 308.417, T1)];
    const first = await engine.reconcile('CPIAUCSL', batch);
    const second = await engine.reconcile('CPIAUCSL', batch);

    expect(first.entries).toHaveLength(2);
    expect(second.entries).toEqual([]);
    expect(second.unchangedCount).toBe(2);
    expect(await store.readRevisions('CPIAUCSL', '2023-12')).toHaveLength(1);
  });

  it('should order entries by period and keep the last duplicate in a batch', async () => {
    const changeSet = await engine.reconcile('CPIAUCSL', [
      obs('CPIAUCSL', '2024-01', 1, T1),
      obs('CPIAUCSL', '2023-12', 2, T1),
      obs('CPIAUCSL', '2024-01', 3, T1),
    ]);
    expect(changeSet.entries.map((e) => [e.period, e.newValue])).toEqual([
      ['2023-12', 2],
      ['2024-01', 3],
    ]);
  });

  // ═══════════════════════════════════════════════════════════════
  // TESTS: integrity
  // ═══════════════════════════════════════════════════════════════

  it('should skip a row fetched before the stored revision', async () => {
    await engine.reconcile('CPIAUCSL', [obs('CPIAUCSL', '2024-01', 308.5, T2)]);
    const changeSet = await engine.reconcile('CPIAUCSL', [obs('CPIAUCSL', '2024-01', 308.417, T1)]);

    expect(changeSet.entries).toEqual([]);
    expect(changeSet.skipped).toEqual([
      {
        seriesKey: 'CPIAUCSL',
        period: '2024-01',
        reason: 'Fetched at 2024-02-13T13:30:00.000Z, before stored revision 0 (2024-03-12T12:30:00.000Z)',
      },
    ]);
    expect(await store.readRevisions('CPIAUCSL', '2024-01')).toHaveLength(1);
  });

  it('should skip invalid rows and still store the valid ones', async () => {
    const changeSet = await engine.reconcile('CPIAUCSL', [
      obs('CPIAUCSL', '2024-13', 1, T1),
      obs('CPIAUCSL', '2024-01', Number.NaN, T1),
      obs('GDP', '2024-Q1', 28_000, T1),
      obs('CPIAUCSL', '2024-02', 310.326, T1),
    ]);

    expect(changeSet.entries.map((e) => e.period)).toEqual(['2024-02']);
    expect(changeSet.skipped).toEqual([
      { seriesKey: 'CPIAUCSL', period: '2024-13', reason: 'Period is not a valid monthly key' },
      { seriesKey: 'CPIAUCSL', period: '2024-01', reason: 'Value is not a finite number' },
      { seriesKey: 'CPIAUCSL', period: '2024-Q1', reason: 'Row belongs to GDP' },
    ]);
  });

  it('should reject an unknown series', async () => {
    expect(await rejectionOf(engine.reconcile('NOPE', []))).toBeInstanceOf(NotFoundError);
  });

  // ═══════════════════════════════════════════════════════════════
  // TESTS: concurrency / atomicity
  // ═══════════════════════════════════════════════════════════════

  it('should serialize concurrent batches for one series', async () => {
    const [a, b] = await Promise.all([
      engine.reconcile('CPIAUCSL', [obs('CPIAUCSL', '2024-01', 308.417, T1)]),
      engine.reconcile('CPIAUCSL', [obs('CPIAUCSL', '2024-01', 308.5, T2)]),
    ]);

    expect(a.entries[0]).toMatchObject({ changeKind: 'new', revision: 0 });
    expect(b.entries[0]).toMatchObject({ changeKind: 'revised', revision: 1, oldValue: 308.417 });
    expect((await store.readRevisions('CPIAUCSL', '2024-01')).map((r) => r.revision)).toEqual([0, 1]);
  });

  it('should write nothing when the store rejects the batch', async () => {
    vi.spyOn(store, 'appendObservations').mockRejectedValueOnce(
      new StorageUnavailableError('appendObservations', new Error('connection reset')),
    );

    const err = await rejectionOf(
      engine.reconcile('CPIAUCSL', [obs('CPIAUCSL', '2023-12', 306.746, T1), obs('CPIAUCSL', '2024-01', 308.417, T1)]),
    );
    expect(err).toBeInstanceOf(StorageUnavailableError);
    expect(await store.readHistory('CPIAUCSL')).toEqual([]);

    const retry = await engine.reconcile('CPIAUCSL', [obs('CPIAUCSL', '2024-01', 308.417, T1)]);
    expect(retry.entries).toHaveLength(1);
  });
});

describe('mergeChangeSets', () => {
  it('should combine entries in series then period order', () => {
    const at = new Date('2024-02-15T12:00:00.000Z');
    const gdp: ChangeSet = {
      id: 'a',
      createdAt: at,
      entries: [{ seriesKey: 'GDP', period: '2023-Q4', newValue: 28_000, changeKind: 'new', revision: 0 }],
      unchangedCount: 2,
      skipped: [],
    };
    const cpi: ChangeSet = {
      id: 'b',
      createdAt: at,
      entries: [
        { seriesKey: 'CPIAUCSL', period: '2024-01', newValue: 308.417, changeKind: 'new', revision: 0 },
        { seriesKey: 'CPIAUCSL', period: '2023-12', oldValue: 306.7, newValue: 306.746, changeKind: 'revised', revision: 1 },
      ],
      unchangedCount: 1,
      skipped: [{ seriesKey: 'CPIAUCSL', period: '2024-13', reason: 'bad' }],
    };

    const merged = mergeChangeSets([gdp, cpi], 'merged', at);
    expect(merged.id).toBe('merged');
    expect(merged.entries.map((e) => `${e.seriesKey}:${e.period}`)).toEqual([
      'CPIAUCSL:2023-12',
      'CPIAUCSL:2024-01',
      'GDP:2023-Q4',
    ]);
    expect(merged.unchangedCount).toBe(3);
    expect(merged.skipped).toHaveLength(1);
  });
});
