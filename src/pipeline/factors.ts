// src/pipeline/factors.ts
// Ordered factor functions (ctx) -> { score, factor } and the fixed-weight
// reducer that turns them into a composite score.
import { clamp, round } from "../providers/normalize.js";
import { PREMIUM_SCORED, type SubjectClass } from "../subjects.js";
import type {
  Confidence,
  Direction,
  Factor,
  FlowRecord,
  Impact,
  MarketIndicators,
  PremiumRecord,
  Quote,
} from "../types.js";

export type ScoringContext = {
  subject: string;
  klass: SubjectClass;
  /** Live snapshot, null when the quote feed had nothing for the subject */
  quote: Quote | null;
  /** Stored quotes of the subject, oldest first */
  quotes: Quote[];
  /** Most recent inbound flow rows, newest first */
  northFlows: FlowRecord[];
  premiums: PremiumRecord[];
  indicators: MarketIndicators | null;
};

export type FactorResult = { score: number; factor: Factor | null };

export type FactorSpec = {
  name: string;
  weight: number;
  appliesTo: (ctx: ScoringContext) => boolean;
  evaluate: (ctx: ScoringContext) => FactorResult;
};

const NONE: FactorResult = { score: 0, factor: null };

const signed = (x: number, dp = 2) => `${x >= 0 ? "+" : ""}${x.toFixed(dp)}`;
const sideOf = (x: number) => (x > 0 ? "positive" : "negative");

export function trendFactor(ctx: ScoringContext): FactorResult {
  const rows = ctx.quotes;
  const first = rows[0];
  const last = rows[rows.length - 1];
  if (rows.length < 2 || !first || !last || first.price <= 0) return NONE;

  const pct = ((last.price - first.price) / first.price) * 100;
  const score = clamp(pct * 10, -30, 30);
  if (Math.abs(pct) <= 0.5) return { score, factor: null };
  return {
    score,
    factor: {
      type: "trend",
      label: `Recent trend ${pct > 0 ? "up" : "down"}`,
      value: `${signed(pct)}%`,
      impact: sideOf(pct),
    },
  };
}

export function flowFactor(ctx: ScoringContext): FactorResult {
  const rows = ctx.northFlows;
  if (!rows.length) return NONE;

  const avg = rows.reduce((sum, r) => sum + r.total, 0) / rows.length;
  const score = clamp(avg * 2, -25, 25);
  if (Math.abs(avg) <= 5) return { score, factor: null };
  return {
    score,
    factor: {
      type: "fund_flow",
      label: `Northbound net ${avg > 0 ? "inflow" : "outflow"}`,
      value: `${signed(avg, 1)}亿`,
      impact: sideOf(avg),
    },
  };
}

/**
 * Average over every premium row of the window, across all tracked funds;
 * zero rates count in the denominator only.
 */
export function premiumFactor(ctx: ScoringContext): FactorResult {
  const rows = ctx.premiums;
  if (!rows.length) return NONE;

  const avg =
    rows.reduce((sum, r) => sum + (r.premiumRate || 0), 0) / rows.length;
  const score = clamp(-avg * 5, -20, 20);
  if (Math.abs(avg) <= 1) return { score, factor: null };
  return {
    score,
    factor: {
      type: "premium",
      label: avg > 0 ? "QDII premium" : "QDII discount",
      value: `${signed(avg)}%`,
      impact: avg > 2 ? "negative" : avg < -1 ? "positive" : "neutral",
    },
  };
}

export function momentumFactor(ctx: ScoringContext): FactorResult {
  if (!ctx.quote) return NONE;
  const pct = ctx.quote.changePercent;
  const score = clamp(pct * 8, -25, 25);
  if (Math.abs(pct) <= 0.5) return { score, factor: null };
  return {
    score,
    factor: {
      type: "momentum",
      label: `Intraday ${pct > 0 ? "up" : "down"} momentum`,
      value: `${signed(pct)}%`,
      impact: sideOf(pct),
    },
  };
}

type Rung = { score: number; label: string; impact: Impact };

function vixRung(value: number): Rung {
  if (value > 30) return { score: 15, label: "VIX extreme (oversold)", impact: "positive" };
  if (value > 25) return { score: -10, label: "VIX high (fear)", impact: "negative" };
  if (value > 20) return { score: -5, label: "VIX elevated (caution)", impact: "negative" };
  if (value < 12) return { score: -10, label: "VIX very low (complacency)", impact: "negative" };
  return { score: 5, label: "VIX normal", impact: "positive" };
}

/** Level ladder plus a +/-10 swing when the gauge itself moved over 10%. */
export function vixFactor(ctx: ScoringContext): FactorResult {
  const vix = ctx.indicators?.vix;
  if (!vix) return NONE;

  const { label, impact, score: base } = vixRung(vix.value);
  let score = base;
  if (vix.changePercent > 10) score -= 10;
  else if (vix.changePercent < -10) score += 10;

  return {
    score,
    factor: { type: "vix", label, value: vix.value.toFixed(1), impact },
  };
}

const DXY_BAND: Record<SubjectClass, number> = {
  overseas: 10,
  hongkong: 8,
  domestic: 5,
};

export function dxyFactor(ctx: ScoringContext): FactorResult {
  const dxy = ctx.indicators?.dxy;
  if (!dxy) return NONE;
  const pct = dxy.changePercent;
  if (Math.abs(pct) <= 0.5) return NONE;

  const band = DXY_BAND[ctx.klass];
  // a stronger dollar weighs on every tracked market
  const score = pct > 0 ? -band : band;
  return {
    score,
    factor: {
      type: "dxy",
      label: pct > 0 ? "Dollar strengthening" : "Dollar weakening",
      value: dxy.value.toFixed(2),
      impact: pct > 0 ? "negative" : "positive",
    },
  };
}

/** Both legs add to the score; only the first populated factor is reported. */
export function yieldFactor(ctx: ScoringContext): FactorResult {
  const t10 = ctx.indicators?.treasury10y;
  if (!t10) return NONE;
  const curve = ctx.indicators?.yieldCurve ?? null;

  let score = 0;
  const found: Factor[] = [];
  if (t10.change > 0.05) {
    score -= 15;
    found.push({
      type: "treasury",
      label: "10Y yield rising",
      value: `${t10.yield.toFixed(2)}%`,
      impact: "negative",
    });
  } else if (t10.change < -0.05) {
    score += 10;
    found.push({
      type: "treasury",
      label: "10Y yield falling",
      value: `${t10.yield.toFixed(2)}%`,
      impact: "positive",
    });
  }
  if (curve?.inverted) {
    score -= 10;
    found.push({
      type: "yield_curve",
      label: "Yield curve inverted",
      value: `${curve.spread.toFixed(2)}%`,
      impact: "negative",
    });
  }

  const [first] = found;
  return first ? { score, factor: first } : NONE;
}

const DOMESTIC_FLOW_SUBJECTS = new Set(["csi300", "star50"]);
const overseas = (ctx: ScoringContext) => ctx.klass === "overseas";

/** Evaluation order is reporting order. */
export const FACTORS: FactorSpec[] = [
  { name: "trend", weight: 0.3, appliesTo: () => true, evaluate: trendFactor },
  {
    name: "fund_flow",
    weight: 0.25,
    appliesTo: (ctx) => DOMESTIC_FLOW_SUBJECTS.has(ctx.subject),
    evaluate: flowFactor,
  },
  {
    name: "premium",
    weight: 0.2,
    appliesTo: (ctx) => PREMIUM_SCORED.has(ctx.subject),
    evaluate: premiumFactor,
  },
  {
    name: "momentum",
    weight: 0.15,
    appliesTo: (ctx) => ctx.quote !== null,
    evaluate: momentumFactor,
  },
  { name: "vix", weight: 0.15, appliesTo: overseas, evaluate: vixFactor },
  { name: "dxy", weight: 0.1, appliesTo: () => true, evaluate: dxyFactor },
  { name: "yield", weight: 0.1, appliesTo: overseas, evaluate: yieldFactor },
];

export function composite(
  ctx: ScoringContext,
  specs: FactorSpec[] = FACTORS
): { score: number; factors: Factor[] } {
  let score = 0;
  const factors: Factor[] = [];
  for (const f of specs) {
    if (!f.appliesTo(ctx)) continue;
    const r = f.evaluate(ctx);
    score += r.score * f.weight;
    if (r.factor) factors.push(r.factor);
  }
  return { score, factors };
}

export const scoreToChange = (score: number) => round(score / 20, 2);

export function directionOf(score: number): Direction {
  if (score > 10) return "bullish";
  if (score < -10) return "bearish";
  return "neutral";
}

export function confidenceOf(score: number): Confidence {
  const abs = Math.abs(score);
  if (abs > 40) return "high";
  if (abs > 20) return "medium";
  return "low";
}

const OUTLOOK: Record<Direction, string> = {
  bullish: "bullish",
  bearish: "bearish",
  neutral: "range-bound",
};

export function summarize(
  name: string,
  horizonHours: number,
  predictedChange: number,
  direction: Direction,
  factors: Factor[]
): string {
  let summary = `${name} ${horizonHours}h outlook: ${OUTLOOK[direction]}`;
  if (predictedChange !== 0) {
    summary += `, predicted change ${signed(predictedChange)}%`;
  }
  if (factors.length) {
    summary += `. Key factors: ${factors
      .slice(0, 2)
      .map((f) => f.label)
      .join(", ")}`;
  }
  return summary;
}
