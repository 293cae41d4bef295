import fs from 'fs';
import os from 'os';
import path from 'path';
import { describe, it, expect } from 'vitest';
import { ListeningHistory, normalizePlay, RawPlaySchema } from '../listeningHistory';
import { PLAYS, play, testHistory } from '../../__tests__/fakes';

describe('normalizePlay', () => {
  it('derives calendar fields in UTC', () => {
    const record = normalizePlay(RawPlaySchema.parse(play('2025-03-01T08:15:00Z', 'Song A', 'Artist One', 1000)));
    expect(record).toMatchObject({ date: '2025-03-01', year: 2025, weekday: 'Sat', hour: 8, track: 'Song A' });
  });

  it('drops plays without a track or play time', () => {
    expect(normalizePlay(RawPlaySchema.parse(play('2025-03-01T08:00:00Z', null, 'Host', 1000)))).toBeNull();
    expect(normalizePlay(RawPlaySchema.parse(play('2025-03-01T08:00:00Z', 'Song', 'Artist', 0)))).toBeNull();
  });
});

describe('ListeningHistory', () => {
  const history = testHistory();

  it('skips rows that fail validation', () => {
    expect(ListeningHistory.fromRawPlays([...PLAYS, { foo: 1 }]).size).toBe(6);
    expect(history.size).toBe(6);
  });

  it('summarizes all plays', async () => {
    expect(await history.summaryStats({})).toEqual({
      totalRecords: 6,
      totalMinutes: 21,
      dateRange: { start: '2024-12-31', end: '2025-06-11' },
      uniqueTracks: 5,
      uniqueArtists: 4,
    });
  });

  it('summarizes a date range and reports an empty one', async () => {
    const stats = await history.summaryStats({ startDate: '2025-01-01', endDate: '2025-12-31' });
    expect(stats.totalRecords).toBe(5);
    expect(stats.totalMinutes).toBe(19);
    expect(await history.summaryStats({ startDate: '2020-01-01', endDate: '2020-12-31' })).toEqual({
      totalRecords: 0,
      totalMinutes: 0,
      dateRange: null,
      uniqueTracks: 0,
      uniqueArtists: 0,
    });
  });

  it('ranks artists by listening time', async () => {
    expect(await history.topEntities({ entity: 'artist', n: 3 })).toEqual([
      { rank: 1, name: 'Artist One', minutesPlayed: 8, playCount: 2 },
      { rank: 2, name: 'Artist Two', minutesPlayed: 6, playCount: 2 },
      { rank: 3, name: 'Artist Three', minutesPlayed: 5, playCount: 1 },
    ]);
  });

  it('ranks tracks by play count with name as tie-breaker', async () => {
    expect(await history.topEntities({ entity: 'track', n: 2 })).toEqual([
      { rank: 1, name: 'Song A', artist: 'Artist One', minutesPlayed: 8, playCount: 2 },
      { rank: 2, name: 'Song B', artist: 'Artist Two', minutesPlayed: 3, playCount: 1 },
    ]);
  });

  it('filters by artist case-insensitively', async () => {
    const rows = await history.topEntities({ entity: 'album', n: 5, artist: 'artist two' });
    expect(rows).toEqual([{ rank: 1, name: 'Second Album', artist: 'Artist Two', minutesPlayed: 6, playCount: 2 }]);
  });

  it('groups a trend by month, largest first', async () => {
    expect(await history.listeningTrend({ groupBy: 'month' })).toEqual([
      { bucket: '2025-03', minutesPlayed: 11, playCount: 3 },
      { bucket: '2025-06', minutesPlayed: 8, playCount: 2 },
      { bucket: '2024-12', minutesPlayed: 2, playCount: 1 },
    ]);
  });

  it('lists plays in a range, most recent first', async () => {
    const rows = await history.playsInRange({ startDate: '2025-03-01', endDate: '2025-03-31', limit: 2 });
    expect(rows.map((r) => [r.playedAt, r.track])).toEqual([
      ['2025-03-03T21:00:00.000Z', 'Song B'],
      ['2025-03-02T09:00:00.000Z', 'Song A'],
    ]);
  });

  it('rejects with the abort reason when the signal is already aborted', async () => {
    const controller = new AbortController();
    const reason = new Error('stop');
    controller.abort(reason);
    await expect(history.summaryStats({}, { signal: controller.signal })).rejects.toBe(reason);
  });

  it('loads Streaming*.json files from a directory', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'listening-history-'));
    fs.writeFileSync(path.join(dir, 'Streaming_History_Audio_2025.json'), JSON.stringify(PLAYS.slice(0, 3)));
    fs.writeFileSync(path.join(dir, 'Streaming_History_Audio_2024.json'), JSON.stringify(PLAYS.slice(5, 6)));
    fs.writeFileSync(path.join(dir, 'notes.json'), JSON.stringify(PLAYS));
    expect(ListeningHistory.fromDirectory(dir).size).toBe(4);
    expect(() => ListeningHistory.fromDirectory(fs.mkdtempSync(path.join(os.tmpdir(), 'empty-history-')))).toThrow(
      /No Streaming\*\.json files/
    );
  });
});

describe('ListeningHistory.aggregateBy', () => {
  const history = ListeningHistory.fromRawPlays([
    { ...play('2025-05-01T10:00:00Z', 'Song X', 'Artist One', 120000), platform: 'android', conn_country: 'DE', reason_end: 'trackdone' },
    {
      ...play('2025-05-02T10:00:00Z', 'Song Y', 'Artist Two', 60000),
      platform: 'android',
      conn_country: 'DE',
      reason_end: 'fwdbtn',
      skipped: true,
    },
    { ...play('2025-05-03T10:00:00Z', 'Song Z', 'Artist Two', 180000), platform: 'web', conn_country: 'US', reason_end: 'trackdone' },
    { ...play('2025-05-04T10:00:00Z', 'Song W', 'Artist Three', 30000), platform: 'android', reason_end: 'fwdbtn', skipped: true },
  ]);

  it('groups by platform ordered by listening time', async () => {
    expect(await history.aggregateBy({ groupBy: 'platform', limit: 10 })).toEqual([
      { value: 'android', minutesPlayed: 4, playCount: 3, playShare: 75 },
      { value: 'web', minutesPlayed: 3, playCount: 1, playShare: 25 },
    ]);
  });

  it('orders by play count and applies the limit', async () => {
    expect(await history.aggregateBy({ groupBy: 'country', metric: 'plays', limit: 1 })).toEqual([
      { value: 'DE', minutesPlayed: 3, playCount: 2, playShare: 50 },
    ]);
  });

  it('groups the skipped flag', async () => {
    expect(await history.aggregateBy({ groupBy: 'skipped', limit: 10 })).toEqual([
      { value: 'false', minutesPlayed: 5, playCount: 2, playShare: 50 },
      { value: 'true', minutesPlayed: 2, playCount: 2, playShare: 50 },
    ]);
  });

  it('applies the date range and artist filters before grouping', async () => {
    const rows = await history.aggregateBy({
      groupBy: 'reason_end',
      artist: 'artist two',
      startDate: '2025-05-02',
      endDate: '2025-05-02',
      limit: 10,
    });
    expect(rows).toEqual([{ value: 'fwdbtn', minutesPlayed: 1, playCount: 1, playShare: 100 }]);
  });

  it('returns no groups for an empty selection', async () => {
    expect(await history.aggregateBy({ groupBy: 'album', startDate: '2026-01-01', limit: 10 })).toEqual([]);
  });
});
