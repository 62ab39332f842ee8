/**
 * Shared record model across adapters, engines and the store
 */
import type { FetchError } from "./errors.js";

export type Impact = "positive" | "negative" | "neutral";

export type Quote = {
  /** Tracked subject id, e.g. "csi300" */
  subject: string;
  name: string;
  price: number;
  change: number;
  changePercent: number;
  open: number;
  high: number;
  low: number;
  volume: number;
  amount?: number;
  /** PRE / REGULAR / POST / CLOSED, chart sources only */
  marketState?: string;
  recordedAt: string; // ISO
};

export type PremiumRecord = {
  fundCode: string;
  fundName: string;
  /** Index family the fund tracks, null for untracked codes */
  family: string | null;
  price: number;
  /** Estimated NAV when positive, otherwise the official one */
  nav: number;
  navDate: string;
  premiumRate: number; // percent
  volume: number; // traded value, 万
  increaseRate: number;
  applyStatus: string;
  redeemStatus: string;
  recordedAt: string;
};

export type FlowDirection = "north" | "south";

export type FlowRecord = {
  direction: FlowDirection;
  /** Shanghai leg (north) or HK-via-Shanghai leg (south), 亿 */
  primary: number;
  /** Shenzhen leg (north) or HK-via-Shenzhen leg (south), 亿 */
  secondary: number;
  total: number;
  updateTime: string;
  recordedAt: string;
};

export type DailyFlow = {
  date: string;
  primary: number;
  secondary: number;
  total: number;
};

export type VixReading = {
  value: number;
  change: number;
  changePercent: number;
  previousClose: number;
  level: "low" | "normal" | "elevated" | "high";
  sentiment: "greedy" | "calm" | "cautious" | "fearful";
  updatedAt: string;
};

export type DxyReading = {
  value: number;
  change: number;
  changePercent: number;
  previousClose: number;
  trend: "strong" | "neutral" | "weak";
  description: string;
  updatedAt: string;
};

export type TreasuryPoint = {
  maturity: "2Y" | "10Y";
  yield: number;
  change: number;
  previousClose: number;
  updatedAt: string;
};

export type YieldCurve = {
  spread: number;
  inverted: boolean;
  description: string;
};

export type SentimentReading = {
  score: number; // 0..100
  level: "extreme_greed" | "greed" | "neutral" | "fear" | "extreme_fear";
  description: string;
  marketChange: number;
  updatedAt: string;
};

/** Treasury slice of the indicators snapshot. */
export type TreasuryReading = {
  treasury10y: TreasuryPoint | null;
  treasury2y: TreasuryPoint | null;
  yieldCurve: YieldCurve | null;
};

export type MarketIndicators = {
  vix: VixReading | null;
  dxy: DxyReading | null;
  treasury10y: TreasuryPoint | null;
  treasury2y: TreasuryPoint | null;
  yieldCurve: YieldCurve | null;
  sentiment: SentimentReading | null;
  updatedAt: string;
};

export type EventType = "premium_alert" | "fund_flow" | "index_move";

/** Event before the store assigns id / createdAt */
export type EventDraft = {
  eventType: EventType;
  subject: string | null;
  title: string;
  summary: string;
  impact: Impact;
  importance: number; // 1..5
  data: Record<string, unknown>;
  sourceUrl?: string;
};

export interface MarketEvent extends EventDraft {
  id: number;
  createdAt: string;
}

export type FactorType =
  | "trend"
  | "fund_flow"
  | "premium"
  | "momentum"
  | "vix"
  | "dxy"
  | "treasury"
  | "yield_curve";

export type Factor = {
  type: FactorType;
  label: string;
  value: string;
  impact: Impact;
};

export type Direction = "bullish" | "bearish" | "neutral";
export type Confidence = "low" | "medium" | "high";

export type PredictionDraft = {
  subject: string;
  name: string;
  currentPrice: number;
  predictedChange: number;
  direction: Direction;
  confidence: Confidence;
  factors: Factor[];
  summary: string;
  score: number;
  predictedAt: string;
  expiresAt: string;
};

export interface Prediction extends PredictionDraft {
  id: number;
}

/** Adapter output: records plus an optional typed failure, never a throw */
export type FetchResult<T> = {
  records: T[];
  error: FetchError | null;
};
