// src/api/queries.ts
// Read and control surface for an external transport. Snapshots come from
// the live adapters and fall back to the newest stored rows when a feed is
// down; histories and stats come from the store.
import type { FlowAggregate, MarketDB, Stored } from "../db/MarketDB.js";
import { log } from "../logger.js";
import type { ScoringEngine } from "../pipeline/predict.js";
import { clamp, round } from "../providers/normalize.js";
import {
  fetchDxy,
  fetchMarketIndicators,
  fetchNorthFlowHistory,
  fetchSentiment,
  fetchTreasury,
  fetchVix,
} from "../providers/index.js";
import { liveSources, type JobSources } from "../scheduler/jobs.js";
import type { Scheduler, SchedulerStatus, TriggerResult } from "../scheduler/Scheduler.js";
import {
  FAMILY_DESCRIPTIONS,
  INDEX_MAPPING,
  SUBJECTS,
  TRACKED_FUNDS,
} from "../subjects.js";
import type {
  DailyFlow,
  DxyReading,
  FetchResult,
  FlowDirection,
  FlowRecord,
  MarketEvent,
  MarketIndicators,
  PremiumRecord,
  Prediction,
  Quote,
  SentimentReading,
  TreasuryReading,
  VixReading,
} from "../types.js";

export type LiveFeeds = JobSources & {
  northHistory: (days: number) => Promise<FetchResult<DailyFlow>>;
  indicators: () => Promise<MarketIndicators>;
  vix: () => Promise<VixReading | null>;
  dxy: () => Promise<DxyReading | null>;
  treasury: () => Promise<TreasuryReading>;
  sentiment: () => Promise<SentimentReading | null>;
};

export const liveFeeds: LiveFeeds = {
  ...liveSources,
  northHistory: (days) => fetchNorthFlowHistory(days),
  indicators: () => fetchMarketIndicators(),
  vix: () => fetchVix(),
  dxy: () => fetchDxy(),
  treasury: () => fetchTreasury(),
  sentiment: () => fetchSentiment(),
};

export type Snapshot<T> = {
  updatedAt: string;
  source: "live" | "store";
  count: number;
  data: T[];
  error?: string;
};

export type EventListParams = {
  limit?: number;
  offset?: number;
  eventType?: string;
  subject?: string;
  minImportance?: number;
};

type RateEntry = { fundCode: string; fundName: string; premiumRate: number };

const MAX_EVENTS = 200;
const MAX_HISTORY_DAYS = 90;
const MAX_DAILY_FLOW_DAYS = 60;
const HIGH_PREMIUM = 1.5;
const DISCOUNT = -1;

const int = (x: number, lo: number, hi: number) => clamp(Math.trunc(x), lo, hi);

function roundAggregate(a: FlowAggregate) {
  return {
    total: round(a.total, 2),
    avg: round(a.avg, 2),
    max: round(a.max, 2),
    min: round(a.min, 2),
    count: a.count,
  };
}

export type QueryDeps = {
  db: MarketDB;
  scheduler: Scheduler;
  scoring: ScoringEngine;
  feeds?: LiveFeeds;
  now?: () => Date;
};

export class MarketQueries {
  private db: MarketDB;
  private scheduler: Scheduler;
  private scoring: ScoringEngine;
  private feeds: LiveFeeds;
  private now: () => Date;

  constructor(deps: QueryDeps) {
    this.db = deps.db;
    this.scheduler = deps.scheduler;
    this.scoring = deps.scoring;
    this.feeds = deps.feeds ?? liveFeeds;
    this.now = deps.now ?? (() => new Date());
  }

  private sinceDays(days: number) {
    return new Date(this.now().getTime() - days * 86_400_000).toISOString();
  }

  private async liveOrStored<T>(
    label: string,
    fetch: () => Promise<FetchResult<T>>,
    stored: () => T[]
  ): Promise<Snapshot<T>> {
    const updatedAt = this.now().toISOString();
    const res = await fetch();
    if (res.records.length || !res.error) {
      return {
        updatedAt,
        source: "live",
        count: res.records.length,
        data: res.records,
        error: res.error?.message,
      };
    }
    log.warn(`[QUERY] ${label} live fetch failed, serving stored rows`, {
      error: res.error.message,
    });
    const data = stored();
    return { updatedAt, source: "store", count: data.length, data, error: res.error.message };
  }

  /* ---------------- events ---------------- */

  listRecentEvents(params: EventListParams = {}) {
    const limit = int(params.limit ?? 50, 1, MAX_EVENTS);
    const offset = Math.max(0, Math.trunc(params.offset ?? 0));
    const { total, data } = this.db.listEvents({
      limit,
      offset,
      eventType: params.eventType,
      subject: params.subject,
      minImportance: int(params.minImportance ?? 1, 1, 5),
    });
    return { total, limit, offset, data };
  }

  getEventById(id: number): MarketEvent | null {
    return this.db.getEvent(id);
  }

  getEventStats(windowHours = 24) {
    const since = new Date(this.now().getTime() - windowHours * 3_600_000).toISOString();
    const { byType, bySubject } = this.db.eventCountsSince(since);
    const total = Object.values(byType).reduce((a, b) => a + b, 0);
    return { windowHours, total, byType, bySubject };
  }

  /* ---------------- premium ---------------- */

  async getLatestPremiumSnapshot(family?: string) {
    const snap = await this.liveOrStored("premium", this.feeds.premiums, () =>
      this.db.latestPremiums()
    );
    const codes = family ? TRACKED_FUNDS[family] : undefined;
    const data = codes ? snap.data.filter((p) => codes.includes(p.fundCode)) : snap.data;

    const grouped: Record<string, PremiumRecord[]> = {};
    for (const p of data) {
      const key = p.family ?? "other";
      (grouped[key] ??= []).push(p);
    }
    return { ...snap, count: data.length, data, grouped };
  }

  getPremiumHistory(fundCode: string, days = 30) {
    const d = int(days, 1, MAX_HISTORY_DAYS);
    const data = this.db.premiumsSince(this.sinceDays(d), fundCode);
    return { fundCode, days: d, count: data.length, data };
  }

  /** High-premium funds by rate descending, discounted ones ascending. */
  async getPremiumStats() {
    const snap = await this.liveOrStored("premium", this.feeds.premiums, () =>
      this.db.latestPremiums()
    );
    const entry = (p: PremiumRecord): RateEntry => ({
      fundCode: p.fundCode,
      fundName: p.fundName,
      premiumRate: p.premiumRate,
    });
    const highPremium = snap.data
      .filter((p) => p.premiumRate > HIGH_PREMIUM)
      .map(entry)
      .sort((a, b) => b.premiumRate - a.premiumRate);
    const discount = snap.data
      .filter((p) => p.premiumRate < DISCOUNT)
      .map(entry)
      .sort((a, b) => a.premiumRate - b.premiumRate);
    return { totalFunds: snap.count, source: snap.source, highPremium, discount };
  }

  getTrackedFunds() {
    return { funds: TRACKED_FUNDS, description: FAMILY_DESCRIPTIONS };
  }

  /* ---------------- fund flow ---------------- */

  async getFlowSnapshot() {
    const [north, south] = await Promise.all([
      this.liveOrStored("north flow", this.feeds.northFlow, () => {
        const row = this.db.latestFlow("north");
        return row ? [row] : [];
      }),
      this.liveOrStored("south flow", this.feeds.southFlow, () => {
        const row = this.db.latestFlow("south");
        return row ? [row] : [];
      }),
    ]);
    const first = (s: Snapshot<FlowRecord>) => s.data[0] ?? null;
    return {
      updatedAt: this.now().toISOString(),
      north: first(north),
      south: first(south),
    };
  }

  getFlowHistory(direction: FlowDirection, days = 30) {
    const d = int(days, 1, MAX_HISTORY_DAYS);
    const data: Stored<FlowRecord>[] = this.db.flowsSince(direction, this.sinceDays(d));
    return { direction, days: d, count: data.length, data };
  }

  getFlowStats(windowDays = 7) {
    const d = int(windowDays, 1, MAX_HISTORY_DAYS);
    const since = this.sinceDays(d);
    return {
      period: `${d}d`,
      north: roundAggregate(this.db.flowAggregate("north", since)),
      south: roundAggregate(this.db.flowAggregate("south", since)),
    };
  }

  async getNorthFlowDailyHistory(days = 20) {
    const d = int(days, 1, MAX_DAILY_FLOW_DAYS);
    const res = await this.feeds.northHistory(d);
    return {
      days: d,
      count: res.records.length,
      data: res.records,
      error: res.error?.message,
    };
  }

  /* ---------------- indices ---------------- */

  getIndicesSnapshot(): Promise<Snapshot<Quote>> {
    return this.liveOrStored("indices", this.feeds.indices, () => this.db.latestQuotes());
  }

  /** One subject's quote out of the current snapshot; null when unmapped or not quoted. */
  async getIndex(subject: string) {
    const info = INDEX_MAPPING[subject];
    if (!info) return null;
    const snap = await this.getIndicesSnapshot();
    const quote = snap.data.find((q) => q.subject === subject);
    if (!quote) return null;
    return {
      updatedAt: snap.updatedAt,
      source: snap.source,
      error: snap.error,
      data: { ...quote, displayName: info.name },
    };
  }

  getIndexHistory(subject: string, days = 30) {
    const d = int(days, 1, MAX_HISTORY_DAYS);
    const data = this.db.quotesSince(subject, this.sinceDays(d));
    return {
      subject,
      name: INDEX_MAPPING[subject]?.name ?? subject,
      days: d,
      count: data.length,
      data,
    };
  }

  getIndexMappingConfig() {
    const out: Record<string, { name: string; sinaCode: string | null; yahooCode: string | null }> = {};
    for (const [subject, info] of Object.entries(INDEX_MAPPING)) {
      out[subject] = {
        name: info.name,
        sinaCode: info.sinaCode ?? null,
        yahooCode: info.yahooCode ?? null,
      };
    }
    return out;
  }

  /* ---------------- indicators ---------------- */

  getMarketIndicatorsSnapshot(): Promise<MarketIndicators> {
    return this.feeds.indicators();
  }

  getVix(): Promise<VixReading | null> {
    return this.feeds.vix();
  }

  getDxy(): Promise<DxyReading | null> {
    return this.feeds.dxy();
  }

  getTreasury(): Promise<TreasuryReading> {
    return this.feeds.treasury();
  }

  getSentiment(): Promise<SentimentReading | null> {
    return this.feeds.sentiment();
  }

  /* ---------------- predictions ---------------- */

  getAllPredictions(): Prediction[] {
    return this.scoring.current();
  }

  /** Only an unexpired prediction counts. */
  getPredictionFor(subject: string): Prediction | null {
    return this.scoring.currentFor(subject);
  }

  async refreshAllPredictions() {
    const data = await this.scoring.refresh();
    return { count: data.length, data };
  }

  /* ---------------- operations ---------------- */

  /** Accepts a job id or its short name ("premium" for update_premium). */
  triggerJob(name: string): Promise<TriggerResult> {
    const ids = this.scheduler.jobIds();
    const id = ids.includes(name) ? name : `update_${name}`;
    return this.scheduler.trigger(ids.includes(id) ? id : name);
  }

  getSchedulerStatus(): SchedulerStatus {
    return this.scheduler.status();
  }

  startScheduler(): SchedulerStatus {
    this.scheduler.start();
    return this.scheduler.status();
  }

  async stopScheduler(): Promise<SchedulerStatus> {
    await this.scheduler.stop();
    return this.scheduler.status();
  }

  getServiceStatus() {
    const trackedFunds: Record<string, number> = {};
    for (const [family, codes] of Object.entries(TRACKED_FUNDS)) {
      trackedFunds[family] = codes.length;
    }
    return {
      status: "running" as const,
      scheduler: this.scheduler.status(),
      monitoredIndices: SUBJECTS,
      trackedFunds,
    };
  }
}
