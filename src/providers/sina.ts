// src/providers/sina.ts
// Text quote feed: `var hq_str_<code>="f0,f1,...";` one line per code, GBK.
import { log, errMessage } from "../logger.js";
import { isFetchError, ParseError } from "../errors.js";
import type { FetchResult } from "../types.js";
import { withSession, type AdapterOptions } from "./http.js";
import { pctChange, round, toNumber } from "./normalize.js";

const QUOTE_URL = "https://hq.sinajs.cn/list=";

/** Quote fields before the subject / capture time are attached. */
export type RawQuote = {
  name: string;
  price: number;
  change: number;
  changePercent: number;
  open: number;
  high: number;
  low: number;
  volume: number;
  amount?: number;
};

export type SinaQuote = RawQuote & { code: string };

const field = (parts: string[], i: number) => toNumber(parts[i]);

/**
 * Sanity fallback for a source-supplied percentage: when it disagrees with the
 * one implied by price and previous close, trust the arithmetic. A zero
 * previous close keeps the source value.
 */
export function reconcilePercent(
  price: number,
  prevClose: number,
  sourcePercent: number
): number {
  if (!prevClose) return sourcePercent;
  const implied = round(pctChange(price, prevClose), 2);
  return Math.abs(implied - sourcePercent) > 0.05 ? implied : sourcePercent;
}

/** Domestic index row: name,open,prevClose,price,high,low,bid,ask,volume,amount,... */
function parseDomestic(parts: string[]): RawQuote | null {
  if (parts.length < 10) return null;
  const price = field(parts, 3);
  const prevClose = field(parts, 2);
  const change = price - prevClose;
  return {
    name: parts[0] ?? "",
    price,
    change,
    changePercent: round(pctChange(price, prevClose), 2),
    open: field(parts, 1),
    high: field(parts, 4),
    low: field(parts, 5),
    volume: field(parts, 8),
    amount: field(parts, 9),
  };
}

/** HK row: name,cnName,open,prevClose,high,low,price,change,pct,bid,ask,volume,... */
function parseHongKong(parts: string[]): RawQuote | null {
  if (parts.length < 10) return null;
  const price = field(parts, 6);
  const prevClose = field(parts, 3);
  // an empty change field is derived from the previous close
  const sourceChange = toNumber(parts[7], Number.NaN);
  const change = Number.isNaN(sourceChange)
    ? prevClose
      ? price - prevClose
      : 0
    : sourceChange;
  return {
    name: parts[0] ?? "",
    price,
    change,
    changePercent: reconcilePercent(price, prevClose, field(parts, 8)),
    open: field(parts, 2),
    high: field(parts, 4),
    low: field(parts, 5),
    volume: field(parts, 11),
  };
}

/** Parse one quote body (the part between the quotes). */
export function parseSinaQuote(code: string, body: string): RawQuote | null {
  if (!body) return null;
  const parts = body.split(",");
  if (code.startsWith("sh") || code.startsWith("sz")) return parseDomestic(parts);
  if (code.startsWith("hk")) return parseHongKong(parts);
  throw new ParseError(`unknown quote prefix for ${code}`, "sina");
}

const escapeRx = (s: string) => s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

/** Extract every requested code from a full response text. */
export function parseSinaResponse(codes: string[], text: string): SinaQuote[] {
  const out: SinaQuote[] = [];
  for (const code of codes) {
    const m = text.match(new RegExp(`var hq_str_${escapeRx(code)}="([^"]*)"`));
    if (!m) {
      log.warn("[SINA] code missing from response", { code });
      continue;
    }
    try {
      const parsed = parseSinaQuote(code, m[1] ?? "");
      if (parsed) out.push({ code, ...parsed });
      else log.warn("[SINA] short or empty row skipped", { code });
    } catch (e) {
      log.warn("[SINA] row parse failed", { code, error: errMessage(e) });
    }
  }
  return out;
}

/** Batch-fetch text quotes for the given feed codes. */
export async function fetchSinaQuotes(
  codes: string[],
  opts: AdapterOptions = {}
): Promise<FetchResult<SinaQuote>> {
  if (!codes.length) return { records: [], error: null };
  try {
    const text = await withSession(
      {
        ...opts,
        source: "sina",
        headers: { Referer: "https://finance.sina.com.cn/" },
      },
      (s) => s.getText(QUOTE_URL + codes.join(","), undefined, "gbk")
    );
    const records = parseSinaResponse(codes, text);
    log.info("[SINA] quotes fetched", { requested: codes.length, parsed: records.length });
    return { records, error: null };
  } catch (e) {
    if (isFetchError(e)) {
      log.error("[SINA] fetch failed", { error: e.message });
      return { records: [], error: e };
    }
    throw e;
  }
}
