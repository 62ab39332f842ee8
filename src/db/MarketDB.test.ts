import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { PersistenceError } from "../errors.js";
import type { EventDraft, FlowRecord, PremiumRecord, PredictionDraft } from "../types.js";
import { MarketDB } from "./MarketDB.js";

const draft = (over: Partial<EventDraft> = {}): EventDraft => ({
  eventType: "index_move",
  subject: "csi300",
  title: "CSI 300 up",
  summary: "Level 3500.00",
  impact: "positive",
  importance: 3,
  data: { price: 3500 },
  ...over,
});

const premium = (fundCode: string, premiumRate: number, recordedAt: string): PremiumRecord => ({
  fundCode,
  fundName: `Fund ${fundCode}`,
  family: "sp500",
  price: 1.2,
  nav: 1.18,
  navDate: "2026-02-27",
  premiumRate,
  volume: 10,
  increaseRate: 0,
  applyStatus: "open",
  redeemStatus: "open",
  recordedAt,
});

const flow = (direction: FlowRecord["direction"], total: number, recordedAt: string): FlowRecord => ({
  direction,
  primary: total,
  secondary: 0,
  total,
  updateTime: "10:00",
  recordedAt,
});

const prediction = (over: Partial<PredictionDraft> = {}): PredictionDraft => ({
  subject: "sp500",
  name: "S&P 500",
  currentPrice: 5000,
  predictedChange: 0.5,
  direction: "neutral",
  confidence: "low",
  factors: [{ type: "vix", label: "VIX normal", value: "16.0", impact: "positive" }],
  summary: "S&P 500 48h outlook: range-bound",
  score: 10,
  predictedAt: "2026-03-02T00:00:00.000Z",
  expiresAt: "2026-03-04T00:00:00.000Z",
  ...over,
});

describe("MarketDB", () => {
  let db: MarketDB;

  beforeEach(() => {
    db = new MarketDB(":memory:");
  });

  afterEach(() => {
    db.close();
  });

  describe("events", () => {
    it("assigns ids and round-trips the data column", () => {
      const ev = db.insertEvent(draft({ sourceUrl: "https://example.test/a" }), "2026-03-02T01:00:00.000Z");
      expect(ev.id).toBe(1);
      expect(db.getEvent(1)).toEqual(ev);
      expect(db.getEvent(99)).toBeNull();
    });

    it("lists newest first, ties broken by id", () => {
      db.insertEvent(draft({ title: "a" }), "2026-03-02T01:00:00.000Z");
      db.insertEvent(draft({ title: "b" }), "2026-03-02T03:00:00.000Z");
      db.insertEvent(draft({ title: "c" }), "2026-03-02T03:00:00.000Z");
      const { total, data } = db.listEvents({ limit: 10, offset: 0, minImportance: 1 });
      expect(total).toBe(3);
      expect(data.map((e) => e.title)).toEqual(["c", "b", "a"]);
    });

    it("filters and pages", () => {
      const at = "2026-03-02T01:00:00.000Z";
      db.insertEvent(draft({ importance: 4 }), at);
      db.insertEvent(draft({ eventType: "fund_flow", importance: 3 }), at);
      db.insertEvent(draft({ eventType: "fund_flow", subject: "hsi", importance: 4 }), at);

      expect(db.listEvents({ limit: 10, offset: 0, minImportance: 4 }).total).toBe(2);
      expect(
        db.listEvents({ limit: 10, offset: 0, minImportance: 1, eventType: "fund_flow" }).total
      ).toBe(2);
      expect(
        db.listEvents({ limit: 10, offset: 0, minImportance: 1, subject: "hsi" }).data.map((e) => e.id)
      ).toEqual([3]);

      const page = db.listEvents({ limit: 1, offset: 1, minImportance: 1 });
      expect(page.total).toBe(3);
      expect(page.data.map((e) => e.id)).toEqual([2]);
    });

    it("counts by type and subject within the window", () => {
      db.insertEvent(draft(), "2026-03-01T00:00:00.000Z");
      db.insertEvent(draft(), "2026-03-02T01:00:00.000Z");
      db.insertEvent(draft({ eventType: "premium_alert", subject: "sp500" }), "2026-03-02T01:00:00.000Z");
      db.insertEvent(draft({ eventType: "fund_flow", subject: null }), "2026-03-02T01:00:00.000Z");
      expect(db.eventCountsSince("2026-03-02T00:00:00.000Z")).toEqual({
        byType: { index_move: 1, premium_alert: 1, fund_flow: 1 },
        bySubject: { csi300: 1, sp500: 1 },
      });
    });
  });

  describe("transaction", () => {
    it("rolls back every write when the body throws", () => {
      expect(() =>
        db.transaction(() => {
          db.insertPremium(premium("513500", 1, "2026-03-02T01:00:00.000Z"));
          db.insertEvent(draft(), "2026-03-02T01:00:00.000Z");
          throw new Error("boom");
        })
      ).toThrow(PersistenceError);
      expect(db.premiumsSince("2000-01-01T00:00:00.000Z")).toEqual([]);
      expect(db.listEvents({ limit: 10, offset: 0, minImportance: 1 }).total).toBe(0);
    });

    it("returns the body result on commit", () => {
      const ev = db.transaction(() => db.insertEvent(draft(), "2026-03-02T01:00:00.000Z"));
      expect(ev.id).toBe(1);
    });

    it("names the cause in the message", () => {
      expect(() =>
        db.transaction(() => {
          throw new Error("disk full");
        })
      ).toThrow("transaction rolled back: disk full");
    });
  });

  describe("premiums", () => {
    it("keeps the newest row per fund", () => {
      db.insertPremium(premium("513500", 1.0, "2026-03-02T01:00:00.000Z"));
      db.insertPremium(premium("159941", 0.5, "2026-03-02T01:00:00.000Z"));
      db.insertPremium(premium("513500", 2.0, "2026-03-02T02:00:00.000Z"));
      const latest = db.latestPremiums();
      expect(latest.map((p) => [p.fundCode, p.premiumRate])).toEqual([
        ["159941", 0.5],
        ["513500", 2.0],
      ]);
      expect(latest[1]).toMatchObject({ id: 3, family: "sp500", navDate: "2026-02-27" });
    });

    it("reads history by fund, oldest first", () => {
      db.insertPremium(premium("513500", 2.0, "2026-03-02T02:00:00.000Z"));
      db.insertPremium(premium("513500", 1.0, "2026-03-01T02:00:00.000Z"));
      db.insertPremium(premium("159941", 0.5, "2026-03-02T01:00:00.000Z"));
      db.insertPremium(premium("513500", 0.1, "2026-02-01T02:00:00.000Z"));
      const rows = db.premiumsSince("2026-03-01T00:00:00.000Z", "513500");
      expect(rows.map((r) => r.premiumRate)).toEqual([1.0, 2.0]);
      expect(db.premiumsSince("2026-03-01T00:00:00.000Z")).toHaveLength(3);
    });
  });

  describe("flows", () => {
    beforeEach(() => {
      db.insertFlow(flow("north", 10, "2026-03-01T02:00:00.000Z"));
      db.insertFlow(flow("north", 30, "2026-03-02T02:00:00.000Z"));
      db.insertFlow(flow("north", -20, "2026-03-02T03:00:00.000Z"));
      db.insertFlow(flow("south", 5, "2026-03-02T03:00:00.000Z"));
    });

    it("orders history and recent rows", () => {
      expect(db.flowsSince("north", "2026-03-01T00:00:00.000Z").map((f) => f.total)).toEqual([10, 30, -20]);
      expect(db.recentFlows("north", "2026-03-01T00:00:00.000Z", 2).map((f) => f.total)).toEqual([-20, 30]);
      expect(db.latestFlow("south")).toMatchObject({ direction: "south", total: 5, primary: 5 });
    });

    it("aggregates one direction", () => {
      const agg = db.flowAggregate("north", "2026-03-01T00:00:00.000Z");
      expect(agg).toMatchObject({ total: 20, max: 30, min: -20, count: 3 });
      expect(agg.avg).toBeCloseTo(6.6667, 3);
    });

    it("returns zeros for an empty window", () => {
      expect(db.flowAggregate("south", "2026-04-01T00:00:00.000Z")).toEqual({
        total: 0,
        avg: 0,
        max: 0,
        min: 0,
        count: 0,
      });
      expect(db.latestFlow("north")?.total).toBe(-20);
    });
  });

  describe("quotes", () => {
    it("keeps the optional columns optional", () => {
      db.insertQuote({
        subject: "sp500",
        name: "S&P 500",
        price: 5000,
        change: 10,
        changePercent: 0.2,
        open: 4990,
        high: 5010,
        low: 4980,
        volume: 0,
        marketState: "REGULAR",
        recordedAt: "2026-03-02T01:00:00.000Z",
      });
      db.insertQuote({
        subject: "csi300",
        name: "CSI 300",
        price: 3500,
        change: 0,
        changePercent: 0,
        open: 3500,
        high: 3500,
        low: 3500,
        volume: 100,
        amount: 2000,
        recordedAt: "2026-03-02T01:00:00.000Z",
      });
      const latest = db.latestQuotes();
      expect(latest.map((q) => q.subject)).toEqual(["csi300", "sp500"]);
      expect(latest[0]?.amount).toBe(2000);
      expect(latest[0]?.marketState).toBeUndefined();
      expect(latest[1]?.amount).toBeUndefined();
      expect(latest[1]?.marketState).toBe("REGULAR");
    });
  });

  describe("predictions", () => {
    it("serves a prediction only before it expires", () => {
      const saved = db.insertPrediction(prediction());
      expect(db.currentPrediction("sp500", "2026-03-03T23:59:59.999Z")).toEqual(saved);
      expect(db.currentPrediction("sp500", "2026-03-04T00:00:00.000Z")).toBeNull();
      expect(db.currentPrediction("hsi", "2026-03-02T01:00:00.000Z")).toBeNull();
    });

    it("prefers the newest prediction", () => {
      db.insertPrediction(prediction());
      db.insertPrediction(prediction({ predictedAt: "2026-03-02T01:00:00.000Z", score: 20 }));
      expect(db.currentPrediction("sp500", "2026-03-02T02:00:00.000Z")?.score).toBe(20);
    });
  });
});
