import Database from "better-sqlite3";
import { z } from "zod";
import { MonitorError, PersistenceError } from "../errors.js";
import { errMessage } from "../logger.js";
import type {
  EventDraft,
  EventType,
  Factor,
  FlowDirection,
  FlowRecord,
  Impact,
  MarketEvent,
  PremiumRecord,
  Prediction,
  PredictionDraft,
  Quote,
} from "../types.js";

type EventRow = {
  id: number;
  event_type: EventType;
  subject: string | null;
  title: string;
  summary: string;
  impact: Impact;
  importance: number;
  source_url: string | null;
  data: string;
  created_at: string;
};

type PremiumRow = {
  id: number;
  fund_code: string;
  fund_name: string;
  family: string | null;
  price: number;
  nav: number;
  nav_date: string;
  premium_rate: number;
  volume: number;
  increase_rate: number;
  apply_status: string;
  redeem_status: string;
  recorded_at: string;
};

type FlowRow = {
  id: number;
  flow_type: FlowDirection;
  primary_leg: number;
  secondary_leg: number;
  total: number;
  update_time: string;
  recorded_at: string;
};

type QuoteRow = {
  id: number;
  subject: string;
  name: string;
  price: number;
  change: number;
  change_percent: number;
  open: number;
  high: number;
  low: number;
  volume: number;
  amount: number | null;
  market_state: string | null;
  recorded_at: string;
};

type PredictionRow = {
  id: number;
  subject: string;
  name: string;
  current_price: number;
  predicted_change: number;
  direction: Prediction["direction"];
  confidence: Prediction["confidence"];
  factors: string;
  summary: string;
  score: number;
  predicted_at: string;
  expires_at: string;
};

export type Stored<T> = T & { id: number };

export type EventQuery = {
  limit: number;
  offset: number;
  eventType?: string;
  subject?: string;
  minImportance: number;
};

export type FlowAggregate = {
  total: number;
  avg: number;
  max: number;
  min: number;
  count: number;
};

const DataSchema = z.record(z.unknown());
const FactorsSchema = z.array(
  z.object({
    type: z.enum([
      "trend",
      "fund_flow",
      "premium",
      "momentum",
      "vix",
      "dxy",
      "treasury",
      "yield_curve",
    ]),
    label: z.string(),
    value: z.string(),
    impact: z.enum(["positive", "negative", "neutral"]),
  })
);

function parseJson<T>(schema: z.ZodType<T>, text: string, fallback: T): T {
  try {
    const parsed = schema.safeParse(JSON.parse(text));
    return parsed.success ? parsed.data : fallback;
  } catch {
    return fallback;
  }
}

const SCHEMA = `
CREATE TABLE IF NOT EXISTS events (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  event_type TEXT NOT NULL,
  subject TEXT,
  title TEXT NOT NULL,
  summary TEXT,
  impact TEXT,
  importance INTEGER NOT NULL DEFAULT 3,
  source_url TEXT,
  data TEXT NOT NULL DEFAULT '{}',
  created_at TEXT NOT NULL
);
CREATE INDEX IF NOT EXISTS ix_events_created ON events(created_at);
CREATE INDEX IF NOT EXISTS ix_events_type ON events(event_type);
CREATE INDEX IF NOT EXISTS ix_events_subject ON events(subject);

CREATE TABLE IF NOT EXISTS premium_history (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  fund_code TEXT NOT NULL,
  fund_name TEXT,
  family TEXT,
  price REAL,
  nav REAL,
  nav_date TEXT,
  premium_rate REAL,
  volume REAL,
  increase_rate REAL,
  apply_status TEXT,
  redeem_status TEXT,
  recorded_at TEXT NOT NULL
);
CREATE INDEX IF NOT EXISTS ix_premium_fund ON premium_history(fund_code, recorded_at);
CREATE INDEX IF NOT EXISTS ix_premium_recorded ON premium_history(recorded_at);

CREATE TABLE IF NOT EXISTS fund_flow_history (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  flow_type TEXT NOT NULL,
  primary_leg REAL,
  secondary_leg REAL,
  total REAL,
  update_time TEXT,
  recorded_at TEXT NOT NULL
);
CREATE INDEX IF NOT EXISTS ix_flow_type ON fund_flow_history(flow_type, recorded_at);

CREATE TABLE IF NOT EXISTS index_quotes (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  subject TEXT NOT NULL,
  name TEXT,
  price REAL,
  change REAL,
  change_percent REAL,
  open REAL,
  high REAL,
  low REAL,
  volume REAL,
  amount REAL,
  market_state TEXT,
  recorded_at TEXT NOT NULL
);
CREATE INDEX IF NOT EXISTS ix_quotes_subject ON index_quotes(subject, recorded_at);

CREATE TABLE IF NOT EXISTS index_predictions (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  subject TEXT NOT NULL,
  name TEXT,
  current_price REAL,
  predicted_change REAL,
  direction TEXT,
  confidence TEXT,
  factors TEXT NOT NULL DEFAULT '[]',
  summary TEXT,
  score REAL,
  predicted_at TEXT NOT NULL,
  expires_at TEXT NOT NULL
);
CREATE INDEX IF NOT EXISTS ix_predictions_subject ON index_predictions(subject, expires_at);
`;

const toEvent = (r: EventRow): MarketEvent => ({
  id: r.id,
  eventType: r.event_type,
  subject: r.subject,
  title: r.title,
  summary: r.summary,
  impact: r.impact,
  importance: r.importance,
  data: parseJson(DataSchema, r.data, {}),
  sourceUrl: r.source_url ?? undefined,
  createdAt: r.created_at,
});

const toPremium = (r: PremiumRow): Stored<PremiumRecord> => ({
  id: r.id,
  fundCode: r.fund_code,
  fundName: r.fund_name,
  family: r.family,
  price: r.price,
  nav: r.nav,
  navDate: r.nav_date,
  premiumRate: r.premium_rate,
  volume: r.volume,
  increaseRate: r.increase_rate,
  applyStatus: r.apply_status,
  redeemStatus: r.redeem_status,
  recordedAt: r.recorded_at,
});

const toFlow = (r: FlowRow): Stored<FlowRecord> => ({
  id: r.id,
  direction: r.flow_type,
  primary: r.primary_leg,
  secondary: r.secondary_leg,
  total: r.total,
  updateTime: r.update_time,
  recordedAt: r.recorded_at,
});

const toQuote = (r: QuoteRow): Stored<Quote> => ({
  id: r.id,
  subject: r.subject,
  name: r.name,
  price: r.price,
  change: r.change,
  changePercent: r.change_percent,
  open: r.open,
  high: r.high,
  low: r.low,
  volume: r.volume,
  amount: r.amount ?? undefined,
  marketState: r.market_state ?? undefined,
  recordedAt: r.recorded_at,
});

const toPrediction = (r: PredictionRow): Prediction => ({
  id: r.id,
  subject: r.subject,
  name: r.name,
  currentPrice: r.current_price,
  predictedChange: r.predicted_change,
  direction: r.direction,
  confidence: r.confidence,
  factors: parseJson<Factor[]>(FactorsSchema, r.factors, []),
  summary: r.summary,
  score: r.score,
  predictedAt: r.predicted_at,
  expiresAt: r.expires_at,
});

/**
 * SQLite persistence: append-only history tables, the event log and
 * predictions. All timestamps are ISO-8601 UTC strings, so string order is
 * time order.
 */
export class MarketDB {
  private db: Database.Database;
  private qInsertEvent: Database.Statement<[Omit<EventRow, "id">]>;
  private qInsertPremium: Database.Statement<[Omit<PremiumRow, "id">]>;
  private qInsertFlow: Database.Statement<[Omit<FlowRow, "id">]>;
  private qInsertQuote: Database.Statement<[Omit<QuoteRow, "id">]>;
  private qInsertPrediction: Database.Statement<[Omit<PredictionRow, "id">]>;

  constructor(path: string) {
    this.db = new Database(path);
    if (path !== ":memory:") this.db.pragma("journal_mode = WAL");
    this.db.exec(SCHEMA);

    this.qInsertEvent = this.db.prepare<[Omit<EventRow, "id">]>(`INSERT INTO events
      (event_type, subject, title, summary, impact, importance, source_url, data, created_at)
      VALUES (@event_type, @subject, @title, @summary, @impact, @importance, @source_url, @data, @created_at)`);
    this.qInsertPremium = this.db.prepare<[Omit<PremiumRow, "id">]>(`INSERT INTO premium_history
      (fund_code, fund_name, family, price, nav, nav_date, premium_rate, volume, increase_rate, apply_status, redeem_status, recorded_at)
      VALUES (@fund_code, @fund_name, @family, @price, @nav, @nav_date, @premium_rate, @volume, @increase_rate, @apply_status, @redeem_status, @recorded_at)`);
    this.qInsertFlow = this.db.prepare<[Omit<FlowRow, "id">]>(`INSERT INTO fund_flow_history
      (flow_type, primary_leg, secondary_leg, total, update_time, recorded_at)
      VALUES (@flow_type, @primary_leg, @secondary_leg, @total, @update_time, @recorded_at)`);
    this.qInsertQuote = this.db.prepare<[Omit<QuoteRow, "id">]>(`INSERT INTO index_quotes
      (subject, name, price, change, change_percent, open, high, low, volume, amount, market_state, recorded_at)
      VALUES (@subject, @name, @price, @change, @change_percent, @open, @high, @low, @volume, @amount, @market_state, @recorded_at)`);
    this.qInsertPrediction = this.db.prepare<[Omit<PredictionRow, "id">]>(`INSERT INTO index_predictions
      (subject, name, current_price, predicted_change, direction, confidence, factors, summary, score, predicted_at, expires_at)
      VALUES (@subject, @name, @current_price, @predicted_change, @direction, @confidence, @factors, @summary, @score, @predicted_at, @expires_at)`);
  }

  /**
   * Run `fn` in one transaction. Any throw rolls every write back and
   * surfaces as a PersistenceError.
   */
  transaction<T>(fn: () => T): T {
    try {
      return this.db.transaction(fn)();
    } catch (e) {
      if (e instanceof PersistenceError) throw e;
      throw new PersistenceError(
        `transaction rolled back: ${errMessage(e)}`,
        e instanceof MonitorError ? e.source : "store",
        { cause: e }
      );
    }
  }

  /* ---------------- writes ---------------- */

  insertEvent(ev: EventDraft, createdAt: string): MarketEvent {
    const info = this.qInsertEvent.run({
      event_type: ev.eventType,
      subject: ev.subject,
      title: ev.title,
      summary: ev.summary,
      impact: ev.impact,
      importance: ev.importance,
      source_url: ev.sourceUrl ?? null,
      data: JSON.stringify(ev.data),
      created_at: createdAt,
    });
    return { ...ev, id: Number(info.lastInsertRowid), createdAt };
  }

  insertPremium(p: PremiumRecord) {
    this.qInsertPremium.run({
      fund_code: p.fundCode,
      fund_name: p.fundName,
      family: p.family,
      price: p.price,
      nav: p.nav,
      nav_date: p.navDate,
      premium_rate: p.premiumRate,
      volume: p.volume,
      increase_rate: p.increaseRate,
      apply_status: p.applyStatus,
      redeem_status: p.redeemStatus,
      recorded_at: p.recordedAt,
    });
  }

  insertFlow(f: FlowRecord) {
    this.qInsertFlow.run({
      flow_type: f.direction,
      primary_leg: f.primary,
      secondary_leg: f.secondary,
      total: f.total,
      update_time: f.updateTime,
      recorded_at: f.recordedAt,
    });
  }

  insertQuote(q: Quote) {
    this.qInsertQuote.run({
      subject: q.subject,
      name: q.name,
      price: q.price,
      change: q.change,
      change_percent: q.changePercent,
      open: q.open,
      high: q.high,
      low: q.low,
      volume: q.volume,
      amount: q.amount ?? null,
      market_state: q.marketState ?? null,
      recorded_at: q.recordedAt,
    });
  }

  insertPrediction(p: PredictionDraft): Prediction {
    const info = this.qInsertPrediction.run({
      subject: p.subject,
      name: p.name,
      current_price: p.currentPrice,
      predicted_change: p.predictedChange,
      direction: p.direction,
      confidence: p.confidence,
      factors: JSON.stringify(p.factors),
      summary: p.summary,
      score: p.score,
      predicted_at: p.predictedAt,
      expires_at: p.expiresAt,
    });
    return { ...p, id: Number(info.lastInsertRowid) };
  }

  /* ---------------- events ---------------- */

  listEvents(q: EventQuery): { total: number; data: MarketEvent[] } {
    const where = ["importance >= @minImportance"];
    if (q.eventType) where.push("event_type = @eventType");
    if (q.subject) where.push("subject = @subject");
    const clause = where.join(" AND ");
    const params = {
      minImportance: q.minImportance,
      eventType: q.eventType ?? null,
      subject: q.subject ?? null,
      limit: q.limit,
      offset: q.offset,
    };
    const count = this.db
      .prepare<[typeof params], { n: number }>(`SELECT COUNT(*) AS n FROM events WHERE ${clause}`)
      .get(params);
    const rows = this.db
      .prepare<[typeof params], EventRow>(
        `SELECT * FROM events WHERE ${clause}
         ORDER BY created_at DESC, id DESC LIMIT @limit OFFSET @offset`
      )
      .all(params);
    return { total: count?.n ?? 0, data: rows.map(toEvent) };
  }

  getEvent(id: number): MarketEvent | null {
    const row = this.db
      .prepare<[number], EventRow>("SELECT * FROM events WHERE id = ?")
      .get(id);
    return row ? toEvent(row) : null;
  }

  eventCountsSince(sinceIso: string) {
    const byType = this.db
      .prepare<[string], { key: string; n: number }>(
        `SELECT event_type AS key, COUNT(*) AS n FROM events
         WHERE created_at >= ? GROUP BY event_type`
      )
      .all(sinceIso);
    const bySubject = this.db
      .prepare<[string], { key: string | null; n: number }>(
        `SELECT subject AS key, COUNT(*) AS n FROM events
         WHERE created_at >= ? GROUP BY subject`
      )
      .all(sinceIso);
    const fold = (rows: { key: string | null; n: number }[]) => {
      const out: Record<string, number> = {};
      for (const r of rows) if (r.key) out[r.key] = r.n;
      return out;
    };
    return { byType: fold(byType), bySubject: fold(bySubject) };
  }

  /* ---------------- premium ---------------- */

  premiumsSince(sinceIso: string, fundCode?: string): Stored<PremiumRecord>[] {
    const rows = fundCode
      ? this.db
          .prepare<[string, string], PremiumRow>(
            `SELECT * FROM premium_history WHERE fund_code = ? AND recorded_at >= ?
             ORDER BY recorded_at ASC, id ASC`
          )
          .all(fundCode, sinceIso)
      : this.db
          .prepare<[string], PremiumRow>(
            `SELECT * FROM premium_history WHERE recorded_at >= ?
             ORDER BY recorded_at ASC, id ASC`
          )
          .all(sinceIso);
    return rows.map(toPremium);
  }

  /** Most recent row per fund. */
  latestPremiums(): Stored<PremiumRecord>[] {
    return this.db
      .prepare<[], PremiumRow>(
        `SELECT p.* FROM premium_history p
         WHERE p.id = (SELECT MAX(id) FROM premium_history WHERE fund_code = p.fund_code)
         ORDER BY p.fund_code`
      )
      .all()
      .map(toPremium);
  }

  /* ---------------- flows ---------------- */

  flowsSince(direction: FlowDirection, sinceIso: string): Stored<FlowRecord>[] {
    return this.db
      .prepare<[string, string], FlowRow>(
        `SELECT * FROM fund_flow_history WHERE flow_type = ? AND recorded_at >= ?
         ORDER BY recorded_at ASC, id ASC`
      )
      .all(direction, sinceIso)
      .map(toFlow);
  }

  recentFlows(direction: FlowDirection, sinceIso: string, limit: number): Stored<FlowRecord>[] {
    return this.db
      .prepare<[string, string, number], FlowRow>(
        `SELECT * FROM fund_flow_history WHERE flow_type = ? AND recorded_at >= ?
         ORDER BY recorded_at DESC, id DESC LIMIT ?`
      )
      .all(direction, sinceIso, limit)
      .map(toFlow);
  }

  latestFlow(direction: FlowDirection): Stored<FlowRecord> | null {
    const row = this.db
      .prepare<[string], FlowRow>(
        `SELECT * FROM fund_flow_history WHERE flow_type = ?
         ORDER BY recorded_at DESC, id DESC LIMIT 1`
      )
      .get(direction);
    return row ? toFlow(row) : null;
  }

  flowAggregate(direction: FlowDirection, sinceIso: string): FlowAggregate {
    const row = this.db
      .prepare<
        [string, string],
        { total: number | null; avg: number | null; max: number | null; min: number | null; n: number }
      >(
        `SELECT SUM(total) AS total, AVG(total) AS avg, MAX(total) AS max, MIN(total) AS min, COUNT(*) AS n
         FROM fund_flow_history WHERE flow_type = ? AND recorded_at >= ?`
      )
      .get(direction, sinceIso);
    return {
      total: row?.total ?? 0,
      avg: row?.avg ?? 0,
      max: row?.max ?? 0,
      min: row?.min ?? 0,
      count: row?.n ?? 0,
    };
  }

  /* ---------------- quotes ---------------- */

  quotesSince(subject: string, sinceIso: string): Stored<Quote>[] {
    return this.db
      .prepare<[string, string], QuoteRow>(
        `SELECT * FROM index_quotes WHERE subject = ? AND recorded_at >= ?
         ORDER BY recorded_at ASC, id ASC`
      )
      .all(subject, sinceIso)
      .map(toQuote);
  }

  /** Most recent quote per subject. */
  latestQuotes(): Stored<Quote>[] {
    return this.db
      .prepare<[], QuoteRow>(
        `SELECT q.* FROM index_quotes q
         WHERE q.id = (SELECT MAX(id) FROM index_quotes WHERE subject = q.subject)
         ORDER BY q.subject`
      )
      .all()
      .map(toQuote);
  }

  /* ---------------- predictions ---------------- */

  /** Newest prediction for the subject that has not expired at `nowIso`. */
  currentPrediction(subject: string, nowIso: string): Prediction | null {
    const row = this.db
      .prepare<[string, string], PredictionRow>(
        `SELECT * FROM index_predictions WHERE subject = ? AND expires_at > ?
         ORDER BY predicted_at DESC, id DESC LIMIT 1`
      )
      .get(subject, nowIso);
    return row ? toPrediction(row) : null;
  }

  close() {
    this.db.close();
  }
}
