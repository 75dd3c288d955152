import { describe, expect, it } from 'vitest';
import { dayDeltas } from '../policies';
import { reconcile } from '../reconcile';
import type { RawEventRecord } from '../types';
import { makeRecord, REFERENCE } from './helpers';

const options = { reference: REFERENCE };

const daftPunkA = makeRecord({
  sourceId: 'sg-1',
  displayName: 'Daft Punk',
  artistName: 'Daft Punk',
  venueName: 'Accor Arena',
  eventTime: '2025-10-10T20:00:00+02:00',
  ticketsSold: 120,
});
const daftPunkB = makeRecord({
  sourceId: 'dice-1',
  displayName: 'DAFT PUNK',
  artistName: 'Daft Punk',
  venueName: 'Accor Arena',
  eventTime: '2025-10-10T20:00:00+02:00',
  ticketsSold: 80,
});

function idsOf(rows: ReturnType<typeof reconcile>['rows']) {
  return {
    a: rows.flatMap(row => (row.sourceAId ? [row.sourceAId] : [])),
    b: rows.flatMap(row => (row.sourceBId ? [row.sourceBId] : [])),
  };
}

describe('reconcile', () => {
  it('merges a live billing with the plain artist name on the same day', () => {
    const a = makeRecord({ sourceId: 'sg-0', displayName: 'Daft Punk', eventTime: '2025-10-10', ticketsSold: 500 });
    const b = makeRecord({ sourceId: 'dice-0', displayName: 'DAFT PUNK LIVE', eventTime: '2025-10-10', ticketsSold: 480 });
    const { rows } = reconcile([a], [b], {}, options);
    expect(rows).toHaveLength(1);
    expect(rows[0]).toMatchObject({ eventName: 'Daft Punk', ticketsSoldA: 500, ticketsSoldB: 480, score: 80 });
  });

  it('merges the same concert seen on both sides', () => {
    const { rows, stats } = reconcile([daftPunkA], [daftPunkB], {}, options);
    expect(rows).toHaveLength(1);
    expect(rows[0]).toMatchObject({
      eventName: 'Daft Punk',
      eventDate: '2025-10-10',
      artist: 'Daft Punk',
      venue: 'Accor Arena',
      ticketsSoldA: 120,
      ticketsSoldB: 80,
      sourceAId: 'sg-1',
      sourceBId: 'dice-1',
      matchedBy: 'threshold',
      score: 100,
    });
    expect(stats).toMatchObject({ matchedPairs: 1, singletonsA: 0, singletonsB: 0 });
    expect(stats.pairsByRule).toEqual({ strict: 0, threshold: 1, greedy: 0, 'artist-venue': 0 });
  });

  it('keeps different artists on the same night apart', () => {
    const a = makeRecord({ sourceId: 'sg-2', displayName: 'Artist X', venueName: 'Olympia', eventTime: '2025-10-10' });
    const b = makeRecord({ sourceId: 'dice-2', displayName: 'Artist Y', venueName: 'Olympia', eventTime: '2025-10-10' });
    const { rows, stats } = reconcile([a], [b], {}, options);
    expect(rows.map(row => [row.sourceAId, row.sourceBId])).toEqual([
      ['sg-2', null],
      [null, 'dice-2'],
    ]);
    expect(stats).toMatchObject({ matchedPairs: 0, singletonsA: 1, singletonsB: 1 });
  });

  it('links an undated record on exact artist and venue', () => {
    const a = makeRecord({ sourceId: 'sg-3', displayName: 'Band @ Venue1', eventTime: null });
    const b = makeRecord({
      sourceId: 'dice-3',
      displayName: 'Band',
      artistName: 'Band',
      venueName: 'Venue1',
      eventTime: '2025-11-01T21:00',
    });
    const { rows, stats } = reconcile([a], [b], {}, options);
    expect(rows).toHaveLength(1);
    expect(rows[0]).toMatchObject({
      eventName: 'Band @ Venue1',
      eventDate: '2025-11-01',
      artist: 'Band',
      venue: 'Venue1',
      matchedBy: 'artist-venue',
      score: null,
    });
    expect(stats.pairsByRule['artist-venue']).toBe(1);
  });

  it('does not link undated records when the fallback is off', () => {
    const a = makeRecord({ sourceId: 'sg-3', displayName: 'Band @ Venue1' });
    const b = makeRecord({ sourceId: 'dice-3', displayName: 'Band @ Venue1', eventTime: '2025-11-01' });
    expect(reconcile([a], [b], { undatedFallback: false }, options).rows).toHaveLength(2);
  });

  it('emits a side-B singleton with an empty side A', () => {
    const b = makeRecord({ sourceId: 'dice-4', displayName: 'Solo', eventTime: '2025-12-01', ticketsSold: 50 });
    const { rows } = reconcile([], [b], {}, options);
    expect(rows).toEqual([
      expect.objectContaining({
        eventName: 'Solo',
        eventDate: '2025-12-01',
        ticketsSoldA: null,
        ticketsSoldB: 50,
        sourceAId: null,
        sourceBId: 'dice-4',
        matchedBy: null,
        recordA: null,
      }),
    ]);
  });

  it('gives a tie to the earliest side-A record and uses every id once', () => {
    const twin = { ...daftPunkA, sourceId: 'sg-twin' };
    const { rows } = reconcile([daftPunkA, twin], [daftPunkB, { ...daftPunkB, sourceId: 'dice-twin' }], {}, options);
    expect(rows.map(row => [row.sourceAId, row.sourceBId])).toEqual([
      ['sg-1', 'dice-1'],
      ['sg-twin', 'dice-twin'],
    ]);
  });

  it('accounts for every input exactly once', () => {
    const sideA: RawEventRecord[] = [
      daftPunkA,
      makeRecord({ sourceId: 'sg-5', displayName: 'Justice @ Olympia', eventTime: '2025-10-12' }),
      makeRecord({ sourceId: 'sg-6', displayName: 'Nobody', eventTime: null }),
    ];
    const sideB: RawEventRecord[] = [
      makeRecord({ sourceId: 'dice-5', displayName: 'Justice', venueName: 'Olympia', eventTime: '2025-10-12T20:00' }),
      daftPunkB,
      makeRecord({ sourceId: 'dice-7', displayName: 'Other', eventTime: '2025-10-30' }),
    ];
    const { rows, stats } = reconcile(sideA, sideB, {}, options);
    const ids = idsOf(rows);
    expect([...ids.a].sort()).toEqual(['sg-1', 'sg-5', 'sg-6']);
    expect([...ids.b].sort()).toEqual(['dice-1', 'dice-5', 'dice-7']);
    expect(stats.matchedPairs * 2 + stats.singletonsA + stats.singletonsB).toBe(sideA.length + sideB.length);
  });

  it('drops duplicate source ids, first one wins', () => {
    const copy = { ...daftPunkA, ticketsSold: 999 };
    const { rows, stats } = reconcile([daftPunkA, copy], [daftPunkB], {}, options);
    expect(stats.duplicatesDropped).toBe(1);
    expect(rows).toHaveLength(1);
    expect(rows[0].ticketsSoldA).toBe(120);
  });

  it('is deterministic and leaves its inputs untouched', () => {
    const sideA = [daftPunkA];
    const sideB = [daftPunkB];
    const before = JSON.stringify([sideA, sideB]);
    expect(reconcile(sideA, sideB, {}, options)).toEqual(reconcile(sideA, sideB, {}, options));
    expect(JSON.stringify([sideA, sideB])).toBe(before);
  });

  it('links fewer pairs as the threshold rises', () => {
    const a = makeRecord({ sourceId: 'sg-8', displayName: 'x', artistName: 'Justice', venueName: 'Olympia', eventTime: '2025-10-10' });
    const b = makeRecord({
      sourceId: 'dice-8',
      displayName: 'x',
      artistName: 'Daft Punk, Justice',
      venueName: 'Zenith',
      eventTime: '2025-10-10',
    });
    expect(reconcile([a], [b], { minScore: 60 }, options).rows[0].score).toBe(65);
    expect(reconcile([a], [b], { minScore: 70 }, options).stats.matchedPairs).toBe(0);
  });

  describe('strategies', () => {
    it('strict needs the same name and start slot', () => {
      const later = { ...daftPunkB, eventTime: '2025-10-10T20:30:00+02:00' };
      expect(reconcile([daftPunkA], [daftPunkB], { strategy: 'strict' }, options).rows[0]).toMatchObject({
        matchedBy: 'strict',
        score: null,
      });
      expect(reconcile([daftPunkA], [later], { strategy: 'strict' }, options).stats.matchedPairs).toBe(0);
    });

    it('strict can key on artist and day instead', () => {
      const later = { ...daftPunkB, displayName: 'Daft Punk @ Accor Arena', eventTime: '2025-10-10T21:00:00+02:00' };
      const { stats } = reconcile([daftPunkA], [later], { strategy: 'strict', strictKey: 'artist-day' }, options);
      expect(stats.pairsByRule.strict).toBe(1);
    });

    it('greedy finds pairs that a venue bucket splits apart', () => {
      const a = makeRecord({ sourceId: 'sg-9', displayName: 'x', artistName: 'Orelsan', venueName: 'Le Bataclan', eventTime: '2025-10-10' });
      const b = makeRecord({ sourceId: 'dice-9', displayName: 'x', artistName: 'Orelsan', venueName: 'Bataclan', eventTime: '2025-10-10' });

      const bucketed = reconcile([a], [b], { strategy: 'threshold', bucketKey: 'day-venue' }, options);
      expect(bucketed.stats.matchedPairs).toBe(0);

      const greedy = reconcile([a], [b], { strategy: 'greedy', bucketKey: 'day-venue' }, options);
      expect(greedy.rows[0]).toMatchObject({ matchedBy: 'greedy', score: 95 });
      expect(greedy.stats.strategy).toBe('greedy');
    });

    it('threshold reaches candidates as many days away as the tolerance allows', () => {
      const a = makeRecord({ sourceId: 'sg-10', displayName: 'x', artistName: 'Daft Punk', eventTime: '2025-10-10T20:00' });
      const b = makeRecord({ sourceId: 'dice-10', displayName: 'x', artistName: 'Daft Punk', eventTime: '2025-10-12T19:00' });
      const settings = { strategy: 'threshold', toleranceMinutes: 3000, adjacentDays: false } as const;

      const { rows, stats } = reconcile([a], [b], settings, options);
      expect(stats.matchedPairs).toBe(1);
      expect(rows[0]).toMatchObject({ matchedBy: 'threshold', score: 70, sourceAId: 'sg-10', sourceBId: 'dice-10' });
      expect(reconcile([a], [b], { ...settings, toleranceMinutes: 30 }, options).stats.matchedPairs).toBe(0);
    });
  });
});

describe('dayDeltas', () => {
  it('widens the day window with the tolerance', () => {
    expect(dayDeltas({ toleranceMinutes: 30, adjacentDays: true })).toEqual([0, -1, 1]);
    expect(dayDeltas({ toleranceMinutes: 0, adjacentDays: false })).toEqual([0]);
    expect(dayDeltas({ toleranceMinutes: 0, adjacentDays: true })).toEqual([0, -1, 1]);
    expect(dayDeltas({ toleranceMinutes: 3000, adjacentDays: false })).toEqual([0, -1, 1, -2, 2, -3, 3]);
  });
});
