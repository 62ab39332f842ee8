// src/providers/yahoo.ts
// Chart JSON: { chart: { result: [{ meta: { regularMarketPrice, previousClose, ... } }] } }
import { z } from "zod";
import { log } from "../logger.js";
import { isFetchError, ParseError, type FetchError } from "../errors.js";
import type { FetchResult } from "../types.js";
import { withSession, type AdapterOptions, type SourceSession } from "./http.js";
import { pctChange, round, toNumber } from "./normalize.js";
import type { RawQuote } from "./sina.js";

const CHART_URL = "https://query1.finance.yahoo.com/v8/finance/chart/";

const num = z.union([z.number(), z.string(), z.null()]).optional();

const ChartMetaSchema = z
  .object({
    symbol: z.string().optional(),
    shortName: z.string().optional(),
    regularMarketPrice: num,
    previousClose: num,
    chartPreviousClose: num,
    regularMarketOpen: num,
    regularMarketDayHigh: num,
    regularMarketDayLow: num,
    regularMarketVolume: num,
    marketState: z.string().optional(),
  })
  .passthrough();

const ChartSchema = z.object({
  chart: z.object({
    result: z.array(z.object({ meta: ChartMetaSchema })).nullable(),
  }),
});

export type ChartMeta = z.infer<typeof ChartMetaSchema>;

export type ChartQuote = RawQuote & {
  symbol: string;
  previousClose: number;
  marketState?: string;
};

/** Pull the meta object out of a chart payload or throw ParseError. */
export function extractChartMeta(symbol: string, payload: unknown): ChartMeta {
  const parsed = ChartSchema.safeParse(payload);
  if (!parsed.success) {
    throw new ParseError(
      `unexpected chart payload for ${symbol}: ${parsed.error.issues[0]?.message ?? "invalid"}`,
      "yahoo"
    );
  }
  const meta = parsed.data.chart.result?.[0]?.meta;
  if (!meta) throw new ParseError(`empty chart result for ${symbol}`, "yahoo");
  return meta;
}

/** Current price and previous close, with change computed locally. */
export function parseChartQuote(symbol: string, payload: unknown): ChartQuote {
  const meta = extractChartMeta(symbol, payload);
  const price = toNumber(meta.regularMarketPrice);
  const previousClose = toNumber(meta.previousClose ?? meta.chartPreviousClose);
  const change = price - previousClose;
  return {
    symbol,
    name: meta.shortName ?? symbol,
    price,
    previousClose,
    change: round(change, 2),
    changePercent: round(pctChange(price, previousClose), 2),
    open: toNumber(meta.regularMarketOpen),
    high: toNumber(meta.regularMarketDayHigh),
    low: toNumber(meta.regularMarketDayLow),
    volume: toNumber(meta.regularMarketVolume),
    marketState: meta.marketState,
  };
}

/** Fetch a chart payload inside an existing session. */
export async function getChart(
  session: SourceSession,
  symbol: string,
  range = "1d"
): Promise<unknown> {
  return session.getJson(CHART_URL + encodeURIComponent(symbol), {
    interval: "1d",
    range,
  });
}

/**
 * Quote each symbol in turn. A failed symbol is logged and skipped; the first
 * failure is reported alongside whatever did parse.
 */
export async function fetchChartQuotes(
  symbols: string[],
  opts: AdapterOptions = {}
): Promise<FetchResult<ChartQuote>> {
  const records: ChartQuote[] = [];
  let error: FetchError | null = null;
  await withSession({ ...opts, source: "yahoo" }, async (s) => {
    for (const symbol of symbols) {
      try {
        records.push(parseChartQuote(symbol, await getChart(s, symbol)));
      } catch (e) {
        if (!isFetchError(e)) throw e;
        log.warn("[YAHOO] quote failed", { symbol, error: e.message });
        error ??= e;
      }
    }
  });
  return { records, error };
}
