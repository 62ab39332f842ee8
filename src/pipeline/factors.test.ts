import { describe, expect, it } from "vitest";
import type { FlowRecord, MarketIndicators, PremiumRecord, Quote } from "../types.js";
import {
  composite,
  confidenceOf,
  directionOf,
  dxyFactor,
  flowFactor,
  momentumFactor,
  premiumFactor,
  scoreToChange,
  summarize,
  trendFactor,
  vixFactor,
  yieldFactor,
  type ScoringContext,
} from "./factors.js";

const AT = "2026-03-02T02:00:00.000Z";

const quote = (price: number, changePercent = 0): Quote => ({
  subject: "sp500",
  name: "S&P 500",
  price,
  change: 0,
  changePercent,
  open: price,
  high: price,
  low: price,
  volume: 0,
  recordedAt: AT,
});

const flow = (total: number): FlowRecord => ({
  direction: "north",
  primary: 0,
  secondary: 0,
  total,
  updateTime: "10:00",
  recordedAt: AT,
});

const premium = (premiumRate: number): PremiumRecord => ({
  fundCode: "513500",
  fundName: "Fund",
  family: "sp500",
  price: 1,
  nav: 1,
  navDate: "",
  premiumRate,
  volume: 0,
  increaseRate: 0,
  applyStatus: "",
  redeemStatus: "",
  recordedAt: AT,
});

const indicators = (over: Partial<MarketIndicators> = {}): MarketIndicators => ({
  vix: null,
  dxy: null,
  treasury10y: null,
  treasury2y: null,
  yieldCurve: null,
  sentiment: null,
  updatedAt: AT,
  ...over,
});

const vix = (value: number, changePercent: number): MarketIndicators["vix"] => ({
  value,
  change: 0,
  changePercent,
  previousClose: value,
  level: "normal",
  sentiment: "calm",
  updatedAt: AT,
});

const dxy = (changePercent: number): MarketIndicators["dxy"] => ({
  value: 104.25,
  change: 0,
  changePercent,
  previousClose: 104,
  trend: "neutral",
  description: "",
  updatedAt: AT,
});

const ctx = (over: Partial<ScoringContext> = {}): ScoringContext => ({
  subject: "sp500",
  klass: "overseas",
  quote: null,
  quotes: [],
  northFlows: [],
  premiums: [],
  indicators: null,
  ...over,
});

describe("output mapping", () => {
  it("maps score to predicted change", () => {
    expect(scoreToChange(55)).toBe(2.75);
    expect(scoreToChange(0)).toBe(0);
  });

  it("maps -21 to bearish with medium confidence", () => {
    expect(directionOf(-21)).toBe("bearish");
    expect(confidenceOf(-21)).toBe("medium");
  });

  it("uses strict bounds", () => {
    expect(directionOf(10)).toBe("neutral");
    expect(directionOf(10.01)).toBe("bullish");
    expect(confidenceOf(40)).toBe("medium");
    expect(confidenceOf(41)).toBe("high");
    expect(confidenceOf(20)).toBe("low");
  });
});

describe("trendFactor", () => {
  it("needs two rows and a positive first price", () => {
    expect(trendFactor(ctx({ quotes: [quote(100)] }))).toEqual({ score: 0, factor: null });
    expect(trendFactor(ctx({ quotes: [quote(0), quote(100)] }))).toEqual({ score: 0, factor: null });
  });

  it("scores first vs last and clamps at 30", () => {
    const up = trendFactor(ctx({ quotes: [quote(100), quote(99), quote(102)] }));
    expect(up.score).toBeCloseTo(20, 9);
    expect(up.factor).toEqual({
      type: "trend",
      label: "Recent trend up",
      value: "+2.00%",
      impact: "positive",
    });
    expect(trendFactor(ctx({ quotes: [quote(100), quote(110)] })).score).toBe(30);
  });

  it("stays silent on small moves", () => {
    const r = trendFactor(ctx({ quotes: [quote(100), quote(100.4)] }));
    expect(r.factor).toBeNull();
    expect(r.score).toBeCloseTo(4, 9);
  });
});

describe("flowFactor", () => {
  it("averages totals and clamps at 25", () => {
    const r = flowFactor(ctx({ northFlows: [flow(60), flow(40)] }));
    expect(r.score).toBe(25);
    expect(r.factor).toMatchObject({ label: "Northbound net inflow", value: "+50.0亿" });
  });

  it("stays silent within 5", () => {
    expect(flowFactor(ctx({ northFlows: [flow(4), flow(-2)] }))).toEqual({ score: 2, factor: null });
  });
});

describe("premiumFactor", () => {
  it("divides the sum of rates by every row", () => {
    const r = premiumFactor(ctx({ premiums: [premium(2.5), premium(3.5), premium(0)] }));
    expect(r.score).toBe(-10);
    expect(r.factor).toEqual({
      type: "premium",
      label: "QDII premium",
      value: "+2.00%",
      impact: "neutral",
    });
  });

  it("reads a deep discount as positive", () => {
    const r = premiumFactor(ctx({ premiums: [premium(-2), premium(-3)] }));
    expect(r.score).toBe(12.5);
    expect(r.factor?.impact).toBe("positive");
    expect(r.factor?.label).toBe("QDII discount");
  });
});

describe("momentumFactor", () => {
  it("scores the live change", () => {
    const r = momentumFactor(ctx({ quote: quote(100, -1.5) }));
    expect(r.score).toBe(-12);
    expect(r.factor?.label).toBe("Intraday down momentum");
  });
});

describe("vixFactor", () => {
  it("applies the ladder and the delta swing", () => {
    expect(vixFactor(ctx({ indicators: indicators({ vix: vix(32, 12) }) }))).toEqual({
      score: 5,
      factor: { type: "vix", label: "VIX extreme (oversold)", value: "32.0", impact: "positive" },
    });
    expect(vixFactor(ctx({ indicators: indicators({ vix: vix(11, -15) }) })).score).toBe(0);
    expect(vixFactor(ctx({ indicators: indicators({ vix: vix(26, 0) }) })).score).toBe(-10);
    expect(vixFactor(ctx({ indicators: indicators({ vix: vix(22, 0) }) })).score).toBe(-5);
    expect(vixFactor(ctx({ indicators: indicators({ vix: vix(16, 0) }) })).score).toBe(5);
  });

  it("is silent without a reading", () => {
    expect(vixFactor(ctx({ indicators: indicators() }))).toEqual({ score: 0, factor: null });
  });
});

describe("dxyFactor", () => {
  it("scales by subject class", () => {
    const up = indicators({ dxy: dxy(0.6) });
    expect(dxyFactor(ctx({ indicators: up })).score).toBe(-10);
    expect(dxyFactor(ctx({ klass: "hongkong", indicators: up })).score).toBe(-8);
    expect(dxyFactor(ctx({ klass: "domestic", indicators: up })).score).toBe(-5);
    expect(dxyFactor(ctx({ indicators: indicators({ dxy: dxy(-0.6) }) })).factor).toEqual({
      type: "dxy",
      label: "Dollar weakening",
      value: "104.25",
      impact: "positive",
    });
  });

  it("ignores moves of 0.5% or less", () => {
    expect(dxyFactor(ctx({ indicators: indicators({ dxy: dxy(0.5) }) }))).toEqual({
      score: 0,
      factor: null,
    });
  });
});

describe("yieldFactor", () => {
  const t10 = (change: number): MarketIndicators["treasury10y"] => ({
    maturity: "10Y",
    yield: 4.3,
    change,
    previousClose: 4.3 - change,
    updatedAt: AT,
  });
  const inverted = { spread: -0.3, inverted: true, description: "Yield curve inverted" };

  it("adds both legs but reports only the first", () => {
    const r = yieldFactor(ctx({ indicators: indicators({ treasury10y: t10(0.08), yieldCurve: inverted }) }));
    expect(r.score).toBe(-25);
    expect(r.factor).toEqual({
      type: "treasury",
      label: "10Y yield rising",
      value: "4.30%",
      impact: "negative",
    });
  });

  it("reports the curve when the yield barely moved", () => {
    const r = yieldFactor(ctx({ indicators: indicators({ treasury10y: t10(0.01), yieldCurve: inverted }) }));
    expect(r.score).toBe(-10);
    expect(r.factor?.type).toBe("yield_curve");
    expect(r.factor?.value).toBe("-0.30%");
  });

  it("rewards a falling yield", () => {
    expect(yieldFactor(ctx({ indicators: indicators({ treasury10y: t10(-0.1) }) })).score).toBe(10);
  });
});

describe("composite", () => {
  it("weights each applicable factor and keeps evaluation order", () => {
    const r = composite(
      ctx({ quote: quote(5000, 1), indicators: indicators({ vix: vix(16, 0) }) })
    );
    expect(r.score).toBeCloseTo(1.95, 9);
    expect(r.factors.map((f) => f.type)).toEqual(["momentum", "vix"]);
  });

  it("leaves out the VIX for domestic subjects", () => {
    const r = composite(
      ctx({ subject: "csi300", klass: "domestic", indicators: indicators({ vix: vix(40, 0) }) })
    );
    expect(r).toEqual({ score: 0, factors: [] });
  });

  it("only scores premiums for mapped subjects", () => {
    const premiums = [premium(4)];
    expect(composite(ctx({ subject: "hstech", klass: "hongkong", premiums })).score).toBe(0);
    expect(composite(ctx({ subject: "hsi", klass: "hongkong", premiums })).score).toBe(-4);
  });
});

describe("summarize", () => {
  const f = (label: string) => ({ type: "trend" as const, label, value: "", impact: "neutral" as const });

  it("names the top two factors in order", () => {
    expect(summarize("S&P 500", 48, 2.75, "bullish", [f("A"), f("B"), f("C")])).toBe(
      "S&P 500 48h outlook: bullish, predicted change +2.75%. Key factors: A, B"
    );
  });

  it("omits a zero change and empty factors", () => {
    expect(summarize("HSI", 48, 0, "neutral", [])).toBe("HSI 48h outlook: range-bound");
  });
});
