import { z } from "zod";
import { AGGREGATE_FIELDS, ENTITIES, RANK_METRICS, TREND_GROUPS, type QueryService } from "../data/queryService";
import { isCalendarDate } from "../execution/timeRange";
import { defineTool, ToolRegistry, type RegisteredTool } from "./registry";

const isoDate = z.string().refine(isCalendarDate, "expected a calendar date in YYYY-MM-DD form");

const startDate = isoDate.optional().describe("Inclusive start date (YYYY-MM-DD)");
const endDate = isoDate.optional().describe("Inclusive end date (YYYY-MM-DD)");
const artist = z.string().trim().min(1).optional().describe("Restrict to one artist (case-insensitive)");

function orderedDates(args: { startDate?: string; endDate?: string }): string | undefined {
  if (args.startDate && args.endDate && args.startDate > args.endDate) {
    return `startDate ${args.startDate} is after endDate ${args.endDate}`;
  }
  return undefined;
}

export function summaryStatsTool(query: QueryService): RegisteredTool {
  return defineTool({
    name: "summary_stats",
    description: "Total plays, minutes listened, covered date range and unique track/artist counts.",
    parameters: z.object({ startDate, endDate }).strict(),
    check: orderedDates,
    invoke: (args, { signal }) => query.summaryStats(args, { signal }),
  });
}

export function topEntitiesTool(query: QueryService): RegisteredTool {
  return defineTool({
    name: "top_n_entities",
    description: "Top artists, tracks or albums ranked by listening time or play count.",
    parameters: z
      .object({
        entity: z.enum(ENTITIES).describe("What to rank"),
        n: z.number().int().min(1).max(50).default(5).describe("How many entries to return"),
        metric: z.enum(RANK_METRICS).optional().describe("Ranking metric; tracks default to plays, others to time"),
        startDate,
        endDate,
        artist,
      })
      .strict(),
    check: orderedDates,
    invoke: (args, { signal }) => query.topEntities(args, { signal }),
  });
}

export function listeningTrendTool(query: QueryService): RegisteredTool {
  return defineTool({
    name: "listening_trend",
    description: "Listening time and play counts grouped by hour of day, weekday, month or year.",
    parameters: z
      .object({
        groupBy: z.enum(TREND_GROUPS).describe("Bucket to group plays by"),
        startDate,
        endDate,
        artist,
      })
      .strict(),
    check: orderedDates,
    invoke: (args, { signal }) => query.listeningTrend(args, { signal }),
  });
}

export function dateRangeFilterTool(query: QueryService): RegisteredTool {
  return defineTool({
    name: "date_range_filter",
    description: "Individual plays inside a date range, most recent first.",
    parameters: z
      .object({
        startDate: isoDate.describe("Inclusive start date (YYYY-MM-DD)"),
        endDate: isoDate.describe("Inclusive end date (YYYY-MM-DD)"),
        artist,
        track: z.string().trim().min(1).optional().describe("Restrict to one track title"),
        limit: z.number().int().min(1).max(100).default(20).describe("Maximum plays to return"),
      })
      .strict(),
    check: orderedDates,
    invoke: (args, { signal }) => query.playsInRange(args, { signal }),
  });
}

export function aggregateByTool(query: QueryService): RegisteredTool {
  return defineTool({
    name: "aggregate_by",
    description:
      "Listening time, play counts and share of plays grouped by platform, country, end reason, shuffle, skipped or album.",
    parameters: z
      .object({
        groupBy: z.enum(AGGREGATE_FIELDS).describe("Field to group plays by"),
        metric: z.enum(RANK_METRICS).default("time").describe("Ordering metric"),
        startDate,
        endDate,
        artist,
        limit: z.number().int().min(1).max(50).default(10).describe("Maximum groups to return"),
      })
      .strict(),
    check: orderedDates,
    invoke: (args, { signal }) => query.aggregateBy(args, { signal }),
  });
}

export function buildToolRegistry(query: QueryService): ToolRegistry {
  return ToolRegistry.from([
    summaryStatsTool(query),
    topEntitiesTool(query),
    listeningTrendTool(query),
    dateRangeFilterTool(query),
    aggregateByTool(query),
  ]);
}
