// In-memory listening history built from exported streaming-history JSON files.
// - Files: <dir>/Streaming*.json, each an array of play records
// - Drops plays without a track name or with zero play time
// - Derives date/year/weekday/hour in UTC

import fs from "fs";
import path from "path";
import { z } from "zod";
import type { Logger } from "../utils/logger";
import type {
  AggregateField,
  AggregateParams,
  AggregateRow,
  DateRange,
  PlayRow,
  PlaysParams,
  QueryOptions,
  QueryService,
  SummaryStats,
  TopEntitiesParams,
  TopEntityRow,
  TrendParams,
  TrendRow,
} from "./queryService";

const WEEKDAYS = ["Sun", "Mon", "Tue", "Wed", "Thu", "Fri", "Sat"];

const optionalText = z.string().nullable().optional();

export const RawPlaySchema = z
  .object({
    ts: z.string().min(1),
    ms_played: z.number().nonnegative(),
    master_metadata_track_name: optionalText,
    master_metadata_album_artist_name: optionalText,
    master_metadata_album_album_name: optionalText,
    spotify_track_uri: optionalText,
    platform: optionalText,
    conn_country: optionalText,
    reason_start: optionalText,
    reason_end: optionalText,
    shuffle: z.boolean().nullable().optional(),
    skipped: z.boolean().nullable().optional(),
  })
  .passthrough();

export type RawPlay = z.infer<typeof RawPlaySchema>;

export type PlayRecord = {
  timestamp: Date;
  date: string;
  year: number;
  weekday: string;
  hour: number;
  msPlayed: number;
  track: string;
  artist: string;
  album: string;
  trackUri: string;
  platform: string | null;
  country: string | null;
  reasonEnd: string | null;
  shuffle: boolean;
  skipped: boolean;
};

export function normalizePlay(raw: RawPlay): PlayRecord | null {
  const track = raw.master_metadata_track_name?.trim();
  if (!track || raw.ms_played <= 0) return null;
  const timestamp = new Date(raw.ts);
  if (Number.isNaN(timestamp.getTime())) return null;
  return {
    timestamp,
    date: timestamp.toISOString().slice(0, 10),
    year: timestamp.getUTCFullYear(),
    weekday: WEEKDAYS[timestamp.getUTCDay()],
    hour: timestamp.getUTCHours(),
    msPlayed: raw.ms_played,
    track,
    artist: raw.master_metadata_album_artist_name?.trim() || "Unknown artist",
    album: raw.master_metadata_album_album_name?.trim() || "Unknown album",
    trackUri: raw.spotify_track_uri?.trim() || `${track}::${raw.master_metadata_album_artist_name ?? ""}`,
    platform: raw.platform ?? null,
    country: raw.conn_country ?? null,
    reasonEnd: raw.reason_end ?? null,
    shuffle: raw.shuffle ?? false,
    skipped: raw.skipped ?? false,
  };
}

function toMinutes(ms: number): number {
  return Math.round(ms / 60000);
}

function sameText(a: string, b: string): boolean {
  return a.toLowerCase() === b.trim().toLowerCase();
}

function throwIfAborted(opts?: QueryOptions) {
  if (opts?.signal?.aborted) throw opts.signal.reason;
}

function fieldValue(r: PlayRecord, field: AggregateField): string {
  switch (field) {
    case "platform":
      return r.platform || "unknown";
    case "country":
      return r.country || "unknown";
    case "reason_end":
      return r.reasonEnd || "unknown";
    case "shuffle":
      return String(r.shuffle);
    case "skipped":
      return String(r.skipped);
    case "album":
      return r.album;
  }
}

type Bucket = { name: string; artist?: string; ms: number; plays: number };

export class ListeningHistory implements QueryService {
  private readonly records: readonly PlayRecord[];

  constructor(records: readonly PlayRecord[]) {
    this.records = [...records].sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
  }

  static fromRawPlays(rows: unknown[], logger?: Logger): ListeningHistory {
    const records: PlayRecord[] = [];
    let invalid = 0;
    let dropped = 0;
    for (const row of rows) {
      const parsed = RawPlaySchema.safeParse(row);
      if (!parsed.success) {
        invalid++;
        continue;
      }
      const record = normalizePlay(parsed.data);
      if (record) records.push(record);
      else dropped++;
    }
    logger?.info(`[history] loaded plays=${records.length} dropped=${dropped} invalid=${invalid}`);
    return new ListeningHistory(records);
  }

  static fromDirectory(dir: string, logger?: Logger): ListeningHistory {
    const root = path.resolve(dir);
    const files = fs
      .readdirSync(root)
      .filter((f) => /^Streaming.*\.json$/i.test(f))
      .sort();
    if (files.length === 0) {
      throw new Error(`No Streaming*.json files found in ${root}`);
    }
    const rows: unknown[] = [];
    for (const file of files) {
      const content: unknown = JSON.parse(fs.readFileSync(path.join(root, file), "utf8"));
      if (!Array.isArray(content)) {
        logger?.warn(`[history] ${file} is not a JSON array; skipped`);
        continue;
      }
      rows.push(...content);
    }
    return ListeningHistory.fromRawPlays(rows, logger);
  }

  get size(): number {
    return this.records.length;
  }

  private select(range: DateRange & { artist?: string; track?: string }): PlayRecord[] {
    const { startDate, endDate, artist, track } = range;
    return this.records.filter(
      (r) =>
        (!startDate || r.date >= startDate) &&
        (!endDate || r.date <= endDate) &&
        (!artist || sameText(r.artist, artist)) &&
        (!track || sameText(r.track, track))
    );
  }

  async summaryStats(params: DateRange, opts?: QueryOptions): Promise<SummaryStats> {
    throwIfAborted(opts);
    const rows = this.select(params);
    if (rows.length === 0) {
      return { totalRecords: 0, totalMinutes: 0, dateRange: null, uniqueTracks: 0, uniqueArtists: 0 };
    }
    const totalMs = rows.reduce((sum, r) => sum + r.msPlayed, 0);
    return {
      totalRecords: rows.length,
      totalMinutes: Math.floor(totalMs / 60000),
      dateRange: { start: rows[0].date, end: rows[rows.length - 1].date },
      uniqueTracks: new Set(rows.map((r) => r.trackUri)).size,
      uniqueArtists: new Set(rows.map((r) => r.artist)).size,
    };
  }

  async topEntities(params: TopEntitiesParams, opts?: QueryOptions): Promise<TopEntityRow[]> {
    throwIfAborted(opts);
    const { entity, n } = params;
    const metric = params.metric ?? (entity === "track" ? "plays" : "time");
    const buckets = new Map<string, Bucket>();
    for (const r of this.select(params)) {
      const key = entity === "artist" ? r.artist : entity === "track" ? `${r.track}\u0000${r.artist}` : `${r.album}\u0000${r.artist}`;
      const bucket = buckets.get(key) ?? {
        name: entity === "artist" ? r.artist : entity === "track" ? r.track : r.album,
        artist: entity === "artist" ? undefined : r.artist,
        ms: 0,
        plays: 0,
      };
      bucket.ms += r.msPlayed;
      bucket.plays += 1;
      buckets.set(key, bucket);
    }
    const score = (b: Bucket) => (metric === "plays" ? b.plays : b.ms);
    return [...buckets.values()]
      .sort((a, b) => score(b) - score(a) || a.name.localeCompare(b.name))
      .slice(0, n)
      .map((b, i) => ({
        rank: i + 1,
        name: b.name,
        ...(b.artist !== undefined ? { artist: b.artist } : {}),
        minutesPlayed: toMinutes(b.ms),
        playCount: b.plays,
      }));
  }

  async listeningTrend(params: TrendParams, opts?: QueryOptions): Promise<TrendRow[]> {
    throwIfAborted(opts);
    const buckets = new Map<string, Bucket>();
    for (const r of this.select(params)) {
      const key =
        params.groupBy === "hour" ? String(r.hour).padStart(2, "0")
        : params.groupBy === "weekday" ? r.weekday
        : params.groupBy === "month" ? r.date.slice(0, 7)
        : String(r.year);
      const bucket = buckets.get(key) ?? { name: key, ms: 0, plays: 0 };
      bucket.ms += r.msPlayed;
      bucket.plays += 1;
      buckets.set(key, bucket);
    }
    return [...buckets.values()]
      .sort((a, b) => b.ms - a.ms || a.name.localeCompare(b.name))
      .map((b) => ({ bucket: b.name, minutesPlayed: toMinutes(b.ms), playCount: b.plays }));
  }

  async playsInRange(params: PlaysParams, opts?: QueryOptions): Promise<PlayRow[]> {
    throwIfAborted(opts);
    return this.select(params)
      .reverse()
      .slice(0, params.limit)
      .map((r) => ({
        playedAt: r.timestamp.toISOString(),
        track: r.track,
        artist: r.artist,
        album: r.album,
        msPlayed: r.msPlayed,
        platform: r.platform,
        shuffle: r.shuffle,
        skipped: r.skipped,
      }));
  }

  async aggregateBy(params: AggregateParams, opts?: QueryOptions): Promise<AggregateRow[]> {
    throwIfAborted(opts);
    const rows = this.select(params);
    const buckets = new Map<string, Bucket>();
    for (const r of rows) {
      const key = fieldValue(r, params.groupBy);
      const bucket = buckets.get(key) ?? { name: key, ms: 0, plays: 0 };
      bucket.ms += r.msPlayed;
      bucket.plays += 1;
      buckets.set(key, bucket);
    }
    const score = (b: Bucket) => (params.metric === "plays" ? b.plays : b.ms);
    return [...buckets.values()]
      .sort((a, b) => score(b) - score(a) || a.name.localeCompare(b.name))
      .slice(0, params.limit)
      .map((b) => ({
        value: b.name,
        minutesPlayed: toMinutes(b.ms),
        playCount: b.plays,
        playShare: Math.round((b.plays / rows.length) * 1000) / 10,
      }));
  }
}
