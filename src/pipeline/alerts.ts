// src/pipeline/alerts.ts
// Threshold rules over canonical records. Every record is written to history
// whether or not it alerts; history + events of one batch commit together.
import { cfg } from "../config.js";
import type { MarketDB } from "../db/MarketDB.js";
import { ParseError } from "../errors.js";
import { log, errMessage } from "../logger.js";
import type { EventNotifier } from "../notify/discord.js";
import { NORTH_FLOW_SUBJECT, SOUTH_FLOW_SUBJECT } from "../subjects.js";
import type {
  EventDraft,
  FlowRecord,
  MarketEvent,
  PremiumRecord,
  Quote,
} from "../types.js";

export type AlertThresholds = {
  premiumHigh: number;
  premiumLow: number;
  flowHigh: number;
  indexMove: number;
};

export const DEFAULT_THRESHOLDS: AlertThresholds = {
  premiumHigh: cfg.PREMIUM_HIGH,
  premiumLow: cfg.PREMIUM_LOW,
  flowHigh: cfg.FLOW_HIGH,
  indexMove: cfg.INDEX_MOVE,
};

const signed = (x: number, dp = 2) => `${x >= 0 ? "+" : ""}${x.toFixed(dp)}`;

/* ---------------- rules ---------------- */

export function premiumAlert(
  p: PremiumRecord,
  t: AlertThresholds = DEFAULT_THRESHOLDS
): EventDraft | null {
  const rate = p.premiumRate;
  let alertType: "high" | "low";
  let summary: string;
  if (rate >= t.premiumHigh) {
    alertType = "high";
    summary = `Premium ${rate.toFixed(2)}% is elevated, buyers pay over NAV`;
  } else if (rate <= t.premiumLow) {
    alertType = "low";
    summary = `Discount ${Math.abs(rate).toFixed(2)}%, possible arbitrage opportunity`;
  } else {
    return null;
  }

  return {
    eventType: "premium_alert",
    subject: p.family,
    title: `[${p.fundName || p.fundCode}] premium alert ${signed(rate)}%`,
    summary,
    // a high premium hurts buyers, a discount favours them
    impact: alertType === "high" ? "negative" : "positive",
    importance: (alertType === "high" ? rate > 3 : rate < -3) ? 4 : 3,
    data: {
      fund_code: p.fundCode,
      fund_name: p.fundName,
      premium_rate: rate,
      price: p.price,
      nav: p.nav,
      alert_type: alertType,
    },
  };
}

function flowData(f: FlowRecord): Record<string, unknown> {
  return {
    direction: f.direction,
    primary: f.primary,
    secondary: f.secondary,
    total: f.total,
    update_time: f.updateTime,
  };
}

export function northFlowAlert(
  f: FlowRecord,
  t: AlertThresholds = DEFAULT_THRESHOLDS
): EventDraft | null {
  const total = f.total;
  const summary = `Shanghai Connect ${f.primary.toFixed(2)}亿, Shenzhen Connect ${f.secondary.toFixed(2)}亿`;
  if (total >= t.flowHigh) {
    return {
      eventType: "fund_flow",
      subject: NORTH_FLOW_SUBJECT,
      title: `Northbound net inflow ${total.toFixed(2)}亿`,
      summary,
      impact: "positive",
      importance: total > 80 ? 4 : 3,
      data: flowData(f),
    };
  }
  if (total <= -t.flowHigh) {
    return {
      eventType: "fund_flow",
      subject: NORTH_FLOW_SUBJECT,
      title: `Northbound net outflow ${Math.abs(total).toFixed(2)}亿`,
      summary,
      impact: "negative",
      importance: total < -80 ? 4 : 3,
      data: flowData(f),
    };
  }
  return null;
}

export function southFlowAlert(
  f: FlowRecord,
  t: AlertThresholds = DEFAULT_THRESHOLDS
): EventDraft | null {
  const total = f.total;
  if (Math.abs(total) < t.flowHigh) return null;
  return {
    eventType: "fund_flow",
    subject: SOUTH_FLOW_SUBJECT,
    title: `Southbound net ${total > 0 ? "inflow" : "outflow"} ${Math.abs(total).toFixed(2)}亿`,
    summary: `HK Connect (SH) ${f.primary.toFixed(2)}亿, HK Connect (SZ) ${f.secondary.toFixed(2)}亿`,
    impact: total > 0 ? "positive" : "negative",
    importance: 3,
    data: flowData(f),
  };
}

export function indexMoveAlert(
  q: Quote,
  t: AlertThresholds = DEFAULT_THRESHOLDS
): EventDraft | null {
  const pct = q.changePercent;
  if (Math.abs(pct) < t.indexMove) return null;
  return {
    eventType: "index_move",
    subject: q.subject,
    title: `[${q.name || q.subject}] ${pct > 0 ? "up" : "down"} ${Math.abs(pct).toFixed(2)}%`,
    summary: `Level ${q.price.toFixed(2)}, change ${signed(q.change)}`,
    impact: pct > 0 ? "positive" : "negative",
    importance: Math.abs(pct) > 3 ? 4 : 3,
    data: {
      subject: q.subject,
      name: q.name,
      price: q.price,
      change: q.change,
      change_percent: pct,
      volume: q.volume,
    },
  };
}

/* ---------------- engine ---------------- */

export type AlertEngineOptions = {
  thresholds?: Partial<AlertThresholds>;
  now?: () => Date;
  notifier?: EventNotifier | null;
  notifyMinImportance?: number;
};

/** Drop records whose key metric is not a finite number. */
function finiteOnly<T>(records: T[], metric: (r: T) => number, label: (r: T) => string): T[] {
  return records.filter((r) => {
    if (Number.isFinite(metric(r))) return true;
    const err = new ParseError(`non-finite value for ${label(r)}`, "alerts");
    log.warn("[ALERTS] record skipped", { error: err.message });
    return false;
  });
}

export class AlertEngine {
  readonly thresholds: AlertThresholds;
  private now: () => Date;
  private notifier: EventNotifier | null;
  private notifyMinImportance: number;

  constructor(private db: MarketDB, opts: AlertEngineOptions = {}) {
    this.thresholds = { ...DEFAULT_THRESHOLDS, ...opts.thresholds };
    this.now = opts.now ?? (() => new Date());
    this.notifier = opts.notifier ?? null;
    this.notifyMinImportance = opts.notifyMinImportance ?? cfg.NOTIFY_MIN_IMPORTANCE;
  }

  async evaluatePremiums(records: PremiumRecord[]): Promise<MarketEvent[]> {
    const batch = finiteOnly(records, (p) => p.premiumRate, (p) => p.fundCode);
    return this.commit("premium", () => {
      const drafts: EventDraft[] = [];
      for (const p of batch) {
        this.db.insertPremium(p);
        const ev = premiumAlert(p, this.thresholds);
        if (ev) drafts.push(ev);
      }
      return drafts;
    });
  }

  async evaluateFlows(
    north: FlowRecord | null,
    south: FlowRecord | null
  ): Promise<MarketEvent[]> {
    const [n] = north ? finiteOnly([north], (f) => f.total, () => "north flow") : [];
    const [s] = south ? finiteOnly([south], (f) => f.total, () => "south flow") : [];
    return this.commit("flow", () => {
      const drafts: EventDraft[] = [];
      if (n) {
        this.db.insertFlow(n);
        const ev = northFlowAlert(n, this.thresholds);
        if (ev) drafts.push(ev);
      }
      if (s) {
        this.db.insertFlow(s);
        const ev = southFlowAlert(s, this.thresholds);
        if (ev) drafts.push(ev);
      }
      return drafts;
    });
  }

  async evaluateIndices(quotes: Quote[]): Promise<MarketEvent[]> {
    const batch = finiteOnly(quotes, (q) => q.changePercent, (q) => q.subject);
    return this.commit("index", () => {
      const drafts: EventDraft[] = [];
      for (const q of batch) {
        this.db.insertQuote(q);
        const ev = indexMoveAlert(q, this.thresholds);
        if (ev) drafts.push(ev);
      }
      return drafts;
    });
  }

  /** History writes and event inserts of one batch in a single transaction. */
  private async commit(kind: string, write: () => EventDraft[]): Promise<MarketEvent[]> {
    const createdAt = this.now().toISOString();
    const events = this.db.transaction(() =>
      write().map((draft) => this.db.insertEvent(draft, createdAt))
    );
    log.info(`[ALERTS] ${kind} batch committed`, { events: events.length });
    await this.fanOut(events);
    return events;
  }

  private async fanOut(events: MarketEvent[]) {
    if (!this.notifier) return;
    const loud = events.filter((e) => e.importance >= this.notifyMinImportance);
    if (!loud.length) return;
    try {
      await this.notifier.notifyEvents(loud);
    } catch (e) {
      log.warn("[ALERTS] notify failed", { error: errMessage(e) });
    }
  }
}
