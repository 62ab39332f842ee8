import type { FetchResult, Quote } from "../types.js";
import type { FetchError } from "../errors.js";
import { INDEX_MAPPING } from "../subjects.js";
import { fetchSinaQuotes } from "./sina.js";
import { fetchChartQuotes } from "./yahoo.js";
import type { AdapterOptions } from "./http.js";
import { log } from "../logger.js";

export { fetchQdiiPremiums } from "./jisilu.js";
export { fetchNorthFlow, fetchSouthFlow, fetchNorthFlowHistory } from "./eastmoney.js";
export {
  fetchDxy,
  fetchMarketIndicators,
  fetchSentiment,
  fetchTreasury,
  fetchVix,
} from "./indicators.js";

/**
 * Quote every tracked index: text feed for domestic/HK codes, chart feed for
 * overseas ones. Both feeds run concurrently with error isolation.
 */
export async function fetchAllIndices(
  opts: AdapterOptions = {}
): Promise<FetchResult<Quote>> {
  const bySina = new Map<string, string>();
  const byYahoo = new Map<string, string>();
  for (const [subject, info] of Object.entries(INDEX_MAPPING)) {
    if (info.sinaCode) bySina.set(info.sinaCode, subject);
    if (info.yahooCode) byYahoo.set(info.yahooCode, subject);
  }

  const [sina, yahoo] = await Promise.all([
    fetchSinaQuotes([...bySina.keys()], opts),
    fetchChartQuotes([...byYahoo.keys()], opts),
  ]);

  const recordedAt = new Date().toISOString();
  const records: Quote[] = [];
  for (const { code, ...q } of sina.records) {
    const subject = bySina.get(code);
    if (subject) records.push({ ...q, subject, recordedAt });
  }
  for (const { symbol, previousClose: _prev, ...q } of yahoo.records) {
    const subject = byYahoo.get(symbol);
    if (subject) records.push({ ...q, subject, recordedAt });
  }

  const error: FetchError | null = sina.error ?? yahoo.error;
  log.info("[INDICES] quotes collected", { count: records.length, failed: !!error });
  return { records, error };
}
