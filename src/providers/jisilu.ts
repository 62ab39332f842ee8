// src/providers/jisilu.ts
// QDII premium table: { rows: [{ id, cell: { fund_id, fund_nm, price, nav, estimate_nav, premium_rt, ... } }] }
import { z } from "zod";
import { log, errMessage } from "../logger.js";
import { isFetchError, ParseError } from "../errors.js";
import { ALL_TRACKED_CODES, familyOf } from "../subjects.js";
import type { FetchResult, PremiumRecord } from "../types.js";
import { withSession, type AdapterOptions } from "./http.js";
import { percentToNumber, toNumber } from "./normalize.js";

const QDII_API_URL = "https://www.jisilu.cn/data/qdii/qdii_list/";

const cellValue = z.union([z.string(), z.number(), z.null()]).optional();

const CellSchema = z
  .object({
    fund_id: z.string().min(1),
    fund_nm: z.string().nullable().optional(),
    price: cellValue,
    nav: cellValue,
    nav_dt: z.string().nullable().optional(),
    estimate_nav: cellValue,
    premium_rt: cellValue,
    volume: cellValue,
    increase_rt: cellValue,
    apply_st: z.string().nullable().optional(),
    redeem_st: z.string().nullable().optional(),
  })
  .passthrough();

const TableSchema = z.object({
  rows: z.array(z.object({ cell: z.unknown() }).passthrough()),
});

export type FundCell = z.infer<typeof CellSchema>;

/**
 * Convert one validated cell. The estimated NAV wins over the official one
 * whenever it is positive.
 */
export function parseFundCell(
  cell: FundCell,
  recordedAt = new Date().toISOString()
): PremiumRecord {
  const official = toNumber(cell.nav);
  const estimate = toNumber(cell.estimate_nav);
  return {
    fundCode: cell.fund_id,
    fundName: cell.fund_nm ?? "",
    family: familyOf(cell.fund_id),
    price: toNumber(cell.price),
    nav: estimate > 0 ? estimate : official,
    navDate: cell.nav_dt ?? "",
    premiumRate: percentToNumber(cell.premium_rt),
    volume: toNumber(cell.volume),
    increaseRate: percentToNumber(cell.increase_rt),
    applyStatus: cell.apply_st ?? "",
    redeemStatus: cell.redeem_st ?? "",
    recordedAt,
  };
}

/** Filter to tracked funds, then parse row by row; bad rows are skipped. */
export function parseQdiiTable(
  payload: unknown,
  tracked: ReadonlySet<string> = ALL_TRACKED_CODES,
  recordedAt = new Date().toISOString()
): PremiumRecord[] {
  const table = TableSchema.safeParse(payload);
  if (!table.success) {
    throw new ParseError("premium table payload has no rows", "jisilu");
  }

  const out: PremiumRecord[] = [];
  for (const row of table.data.rows) {
    const raw = row.cell;
    const code =
      raw && typeof raw === "object" && "fund_id" in raw
        ? String(raw.fund_id)
        : "";
    if (!tracked.has(code)) continue;

    const cell = CellSchema.safeParse(raw);
    if (!cell.success) {
      log.warn("[JISILU] malformed row skipped", {
        fundCode: code,
        issue: cell.error.issues[0]?.message,
      });
      continue;
    }
    try {
      out.push(parseFundCell(cell.data, recordedAt));
    } catch (e) {
      log.warn("[JISILU] row parse failed", { fundCode: code, error: errMessage(e) });
    }
  }
  return out;
}

/** Premium snapshot for every tracked QDII fund. */
export async function fetchQdiiPremiums(
  opts: AdapterOptions = {}
): Promise<FetchResult<PremiumRecord>> {
  try {
    const payload = await withSession(
      {
        ...opts,
        source: "jisilu",
        headers: {
          Referer: "https://www.jisilu.cn/data/qdii/",
          "X-Requested-With": "XMLHttpRequest",
        },
      },
      (s) =>
        s.getJson(QDII_API_URL, {
          ___jsl: `LST___t=${Date.now()}`,
          rp: "25",
          page: "1",
        })
    );
    const records = parseQdiiTable(payload);
    log.info("[JISILU] premium rows parsed", { funds: records.length });
    return { records, error: null };
  } catch (e) {
    if (!isFetchError(e)) throw e;
    log.error("[JISILU] premium fetch failed", { error: e.message });
    return { records: [], error: e };
  }
}
