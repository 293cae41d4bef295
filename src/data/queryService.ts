export const ENTITIES = ["artist", "track", "album"] as const;
export type Entity = (typeof ENTITIES)[number];

export const TREND_GROUPS = ["hour", "weekday", "month", "year"] as const;
export type TrendGroup = (typeof TREND_GROUPS)[number];

export const RANK_METRICS = ["time", "plays"] as const;
export type RankMetric = (typeof RANK_METRICS)[number];

export const AGGREGATE_FIELDS = ["platform", "country", "reason_end", "shuffle", "skipped", "album"] as const;
export type AggregateField = (typeof AGGREGATE_FIELDS)[number];

/** Inclusive YYYY-MM-DD bounds; either may be open. */
export type DateRange = { startDate?: string; endDate?: string };

export type QueryOptions = { signal?: AbortSignal };

export type SummaryStats = {
  totalRecords: number;
  totalMinutes: number;
  dateRange: { start: string; end: string } | null;
  uniqueTracks: number;
  uniqueArtists: number;
};

export type TopEntitiesParams = DateRange & {
  entity: Entity;
  n: number;
  metric?: RankMetric;
  artist?: string;
};

export type TopEntityRow = {
  rank: number;
  name: string;
  /** Present for tracks and albums. */
  artist?: string;
  minutesPlayed: number;
  playCount: number;
};

export type TrendParams = DateRange & { groupBy: TrendGroup; artist?: string };

export type TrendRow = { bucket: string; minutesPlayed: number; playCount: number };

export type PlaysParams = DateRange & { artist?: string; track?: string; limit: number };

export type PlayRow = {
  playedAt: string;
  track: string;
  artist: string;
  album: string;
  msPlayed: number;
  platform: string | null;
  shuffle: boolean;
  skipped: boolean;
};

export type AggregateParams = DateRange & { groupBy: AggregateField; metric?: RankMetric; artist?: string; limit: number };

export type AggregateRow = {
  value: string;
  minutesPlayed: number;
  playCount: number;
  /** Percent of the selected plays, one decimal. */
  playShare: number;
};

/** Read-only queries over a listening history. Results are ordered most relevant first. */
export interface QueryService {
  summaryStats(params: DateRange, opts?: QueryOptions): Promise<SummaryStats>;
  topEntities(params: TopEntitiesParams, opts?: QueryOptions): Promise<TopEntityRow[]>;
  listeningTrend(params: TrendParams, opts?: QueryOptions): Promise<TrendRow[]>;
  playsInRange(params: PlaysParams, opts?: QueryOptions): Promise<PlayRow[]>;
  aggregateBy(params: AggregateParams, opts?: QueryOptions): Promise<AggregateRow[]>;
}
