// src/providers/indicators.ts
// Macro gauges: VIX, dollar index, treasury yields (chart JSON) and a market
// sentiment score derived from the domestic composite's day change.
import { z } from "zod";
import { log } from "../logger.js";
import { isFetchError, ParseError } from "../errors.js";
import type {
  DxyReading,
  MarketIndicators,
  SentimentReading,
  TreasuryPoint,
  TreasuryReading,
  VixReading,
  YieldCurve,
} from "../types.js";
import { withSession, type AdapterOptions, type SourceSession } from "./http.js";
import { pctChange, round, toNumber } from "./normalize.js";
import { extractChartMeta, getChart } from "./yahoo.js";

const SENTIMENT_URL = "https://push2.eastmoney.com/api/qt/stock/get";

const TREASURY_SYMBOLS: Record<TreasuryPoint["maturity"], string> = {
  // The short end is the 13-week bill, quoted directly in percent.
  "2Y": "^IRX",
  "10Y": "^TNX",
};

function chartPrices(symbol: string, payload: unknown) {
  const meta = extractChartMeta(symbol, payload);
  const current = toNumber(meta.regularMarketPrice);
  const previous = toNumber(meta.previousClose ?? meta.chartPreviousClose);
  return { current, previous };
}

export function vixLevel(value: number): Pick<VixReading, "level" | "sentiment"> {
  if (value < 15) return { level: "low", sentiment: "greedy" };
  if (value < 20) return { level: "normal", sentiment: "calm" };
  if (value < 30) return { level: "elevated", sentiment: "cautious" };
  return { level: "high", sentiment: "fearful" };
}

export function parseVix(payload: unknown, updatedAt: string): VixReading {
  const { current, previous } = chartPrices("^VIX", payload);
  return {
    value: round(current, 2),
    change: round(current - previous, 2),
    changePercent: round(pctChange(current, previous), 2),
    previousClose: round(previous, 2),
    ...vixLevel(current),
    updatedAt,
  };
}

export function dxyTrend(value: number): Pick<DxyReading, "trend" | "description"> {
  if (value > 105) return { trend: "strong", description: "Dollar strengthening" };
  if (value > 100) return { trend: "neutral", description: "Dollar steady" };
  return { trend: "weak", description: "Dollar weakening" };
}

export function parseDxy(payload: unknown, updatedAt: string): DxyReading {
  const { current, previous } = chartPrices("DX-Y.NYB", payload);
  return {
    value: round(current, 3),
    change: round(current - previous, 3),
    changePercent: round(pctChange(current, previous), 2),
    previousClose: round(previous, 3),
    ...dxyTrend(current),
    updatedAt,
  };
}

/** The 10Y chart quotes yield x10; the short end is already in percent. */
export function parseTreasury(
  maturity: TreasuryPoint["maturity"],
  payload: unknown,
  updatedAt: string
): TreasuryPoint {
  const { current, previous } = chartPrices(TREASURY_SYMBOLS[maturity], payload);
  const scale = maturity === "2Y" ? 1 : 10;
  const y = current / scale;
  const prev = previous / scale;
  return {
    maturity,
    yield: round(y, 3),
    change: round(y - prev, 3),
    previousClose: round(prev, 3),
    updatedAt,
  };
}

export function deriveYieldCurve(
  t10: TreasuryPoint | null,
  t2: TreasuryPoint | null
): YieldCurve | null {
  if (!t10 || !t2) return null;
  const spread = round(t10.yield - t2.yield, 3);
  return {
    spread,
    inverted: spread < 0,
    description: spread < 0 ? "Yield curve inverted" : "Yield curve normal",
  };
}

const SentimentPayload = z.object({
  data: z.object({ f170: z.union([z.number(), z.string()]).optional() }).passthrough().nullable(),
});

/** Sentiment ladder from the composite's percent change (f170 is pct x100). */
export function parseSentiment(payload: unknown, updatedAt: string): SentimentReading {
  const parsed = SentimentPayload.safeParse(payload);
  if (!parsed.success || !parsed.data.data) {
    throw new ParseError("sentiment payload has no data", "eastmoney");
  }
  const chg = toNumber(parsed.data.data.f170) / 100;
  const base = { marketChange: round(chg, 2), updatedAt };
  if (chg > 2) return { score: 80, level: "extreme_greed", description: "Extreme greed", ...base };
  if (chg > 1) return { score: 65, level: "greed", description: "Greed", ...base };
  if (chg > 0) return { score: 55, level: "neutral", description: "Neutral, leaning bullish", ...base };
  if (chg > -1) return { score: 45, level: "neutral", description: "Neutral, leaning bearish", ...base };
  if (chg > -2) return { score: 35, level: "fear", description: "Fear", ...base };
  return { score: 20, level: "extreme_fear", description: "Extreme fear", ...base };
}

/** Run one gauge; failures are logged and yield null so the others proceed. */
async function gauge<T>(
  name: string,
  fn: () => Promise<T>
): Promise<T | null> {
  try {
    return await fn();
  } catch (e) {
    if (!isFetchError(e)) throw e;
    log.warn("[INDICATORS] gauge failed", { name, error: e.message });
    return null;
  }
}

/** One reader per gauge, all sharing a session and a capture time. */
function gaugeReaders(s: SourceSession, updatedAt: string) {
  const fiveDay = (symbol: string) => getChart(s, symbol, "5d");
  const vix = () => gauge("vix", async () => parseVix(await fiveDay("^VIX"), updatedAt));
  const dxy = () => gauge("dxy", async () => parseDxy(await fiveDay("DX-Y.NYB"), updatedAt));
  const treasury = async (): Promise<TreasuryReading> => {
    const treasury10y = await gauge("treasury10y", async () =>
      parseTreasury("10Y", await fiveDay(TREASURY_SYMBOLS["10Y"]), updatedAt)
    );
    const treasury2y = await gauge("treasury2y", async () =>
      parseTreasury("2Y", await fiveDay(TREASURY_SYMBOLS["2Y"]), updatedAt)
    );
    return {
      treasury10y,
      treasury2y,
      yieldCurve: deriveYieldCurve(treasury10y, treasury2y),
    };
  };
  const sentiment = () =>
    gauge("sentiment", async () =>
      parseSentiment(
        await s.getJson(SENTIMENT_URL, {
          secid: "1.000001",
          fields: "f43,f44,f45,f46,f47,f169,f170,f171",
        }),
        updatedAt
      )
    );
  return { vix, dxy, treasury, sentiment };
}

type GaugeReaders = ReturnType<typeof gaugeReaders>;

function readGauges<T>(
  opts: AdapterOptions,
  read: (r: GaugeReaders, updatedAt: string) => Promise<T>
): Promise<T> {
  const updatedAt = new Date().toISOString();
  return withSession({ ...opts, source: "indicators" }, (s) =>
    read(gaugeReaders(s, updatedAt), updatedAt)
  );
}

export function fetchVix(opts: AdapterOptions = {}): Promise<VixReading | null> {
  return readGauges(opts, (r) => r.vix());
}

export function fetchDxy(opts: AdapterOptions = {}): Promise<DxyReading | null> {
  return readGauges(opts, (r) => r.dxy());
}

/** Both maturities and the curve derived from them. */
export function fetchTreasury(opts: AdapterOptions = {}): Promise<TreasuryReading> {
  return readGauges(opts, (r) => r.treasury());
}

export function fetchSentiment(opts: AdapterOptions = {}): Promise<SentimentReading | null> {
  return readGauges(opts, (r) => r.sentiment());
}

/** Snapshot of every gauge; missing gauges are null, never a throw. */
export async function fetchMarketIndicators(
  opts: AdapterOptions = {}
): Promise<MarketIndicators> {
  const out = await readGauges(opts, async (r, updatedAt) => {
    const vix = await r.vix();
    const dxy = await r.dxy();
    const treasury = await r.treasury();
    const sentiment = await r.sentiment();
    return { vix, dxy, ...treasury, sentiment, updatedAt };
  });
  log.info("[INDICATORS] snapshot", {
    vix: out.vix?.value ?? null,
    dxy: out.dxy?.value ?? null,
    t10: out.treasury10y?.yield ?? null,
    spread: out.yieldCurve?.spread ?? null,
    sentiment: out.sentiment?.score ?? null,
  });
  return out;
}
