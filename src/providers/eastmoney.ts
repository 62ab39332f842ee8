// src/providers/eastmoney.ts
// Connect-scheme capital flow. Minute series arrive as
// data.s2n / data.n2s = ["HH:MM,shLeg,szLeg,total,...", ...] in 万.
import { z } from "zod";
import { log } from "../logger.js";
import { isFetchError, ParseError } from "../errors.js";
import type { DailyFlow, FetchResult, FlowDirection, FlowRecord } from "../types.js";
import { withSession, type AdapterOptions } from "./http.js";
import { wanToYi } from "./normalize.js";

const NORTH_FLOW_URL = "https://push2.eastmoney.com/api/qt/kamt.rtmin/get";
const SOUTH_FLOW_URL = "https://push2.eastmoney.com/api/qt/kamtbs.rtmin/get";
const NORTH_HISTORY_URL = "https://push2his.eastmoney.com/api/qt/kamt.kline/get";

const UT = "b2884a393a59ad64002292a3e90d46a5";
const HEADERS = { Referer: "https://data.eastmoney.com/" };

const SERIES_KEY: Record<FlowDirection, "s2n" | "n2s"> = {
  north: "s2n",
  south: "n2s",
};

const SeriesPayload = z.object({
  data: z
    .object({
      s2n: z.array(z.string()).optional(),
      n2s: z.array(z.string()).optional(),
    })
    .passthrough()
    .nullable(),
});

function seriesOf(payload: unknown, direction: FlowDirection): string[] {
  const parsed = SeriesPayload.safeParse(payload);
  if (!parsed.success || !parsed.data.data) {
    throw new ParseError(`no ${direction} flow data in payload`, "eastmoney");
  }
  return parsed.data.data[SERIES_KEY[direction]] ?? [];
}

/** Split one observation; sub-fields 2..4 are converted 万 → 亿. */
export function parseObservation(line: string) {
  const parts = line.split(",");
  if (parts.length < 4) return null;
  return {
    time: parts[0] ?? "",
    primary: wanToYi(parts[1]),
    secondary: wanToYi(parts[2]),
    total: wanToYi(parts[3]),
  };
}

/**
 * Latest observation of a realtime minute payload. An empty series yields a
 * zeroed record, matching what the feed shows before the session opens.
 */
export function parseRealtimeFlow(
  payload: unknown,
  direction: FlowDirection,
  recordedAt = new Date().toISOString()
): FlowRecord {
  const series = seriesOf(payload, direction);
  const latest = series.length ? parseObservation(series[series.length - 1] ?? "") : null;
  return {
    direction,
    primary: latest?.primary ?? 0,
    secondary: latest?.secondary ?? 0,
    total: latest?.total ?? 0,
    updateTime: latest?.time ?? "",
    recordedAt,
  };
}

/** Daily kline payload: one record per element, short rows skipped. */
export function parseDailyFlows(payload: unknown): DailyFlow[] {
  const out: DailyFlow[] = [];
  for (const line of seriesOf(payload, "north")) {
    const obs = parseObservation(line);
    if (!obs) {
      log.warn("[EASTMONEY] short daily row skipped", { line });
      continue;
    }
    out.push({
      date: obs.time,
      primary: obs.primary,
      secondary: obs.secondary,
      total: obs.total,
    });
  }
  return out;
}

async function fetchRealtime(
  direction: FlowDirection,
  opts: AdapterOptions
): Promise<FetchResult<FlowRecord>> {
  const url = direction === "north" ? NORTH_FLOW_URL : SOUTH_FLOW_URL;
  try {
    const payload = await withSession(
      { ...opts, source: "eastmoney", headers: HEADERS },
      (s) =>
        s.getJson(url, {
          fields1: "f1,f2,f3,f4",
          fields2: "f51,f52,f53,f54,f55,f56,f57,f58,f59,f60,f61,f62,f63,f64,f65,f66",
          ut: UT,
          _: Date.now(),
        })
    );
    const record = parseRealtimeFlow(payload, direction);
    log.info(`[EASTMONEY] ${direction} flow`, {
      primary: record.primary.toFixed(2),
      secondary: record.secondary.toFixed(2),
      total: record.total.toFixed(2),
    });
    return { records: [record], error: null };
  } catch (e) {
    if (!isFetchError(e)) throw e;
    log.error(`[EASTMONEY] ${direction} flow failed`, { error: e.message });
    return { records: [], error: e };
  }
}

/** Northbound (inbound) realtime flow. */
export function fetchNorthFlow(opts: AdapterOptions = {}) {
  return fetchRealtime("north", opts);
}

/** Southbound (outbound) realtime flow. */
export function fetchSouthFlow(opts: AdapterOptions = {}) {
  return fetchRealtime("south", opts);
}

/** Northbound daily history for the last `days` sessions. */
export async function fetchNorthFlowHistory(
  days = 20,
  opts: AdapterOptions = {}
): Promise<FetchResult<DailyFlow>> {
  try {
    const payload = await withSession(
      { ...opts, source: "eastmoney", headers: HEADERS },
      (s) =>
        s.getJson(NORTH_HISTORY_URL, {
          fields1: "f1,f2,f3,f4,f5,f6,f7,f8,f9,f10,f11,f12,f13",
          fields2: "f51,f52,f53,f54,f55,f56,f57,f58,f59,f60,f61",
          klt: "101",
          lmt: String(days),
          ut: UT,
          _: Date.now(),
        })
    );
    return { records: parseDailyFlows(payload), error: null };
  } catch (e) {
    if (!isFetchError(e)) throw e;
    log.error("[EASTMONEY] north history failed", { error: e.message });
    return { records: [], error: e };
  }
}
