// src/pipeline/predict.ts
import { cfg } from "../config.js";
import type { MarketDB } from "../db/MarketDB.js";
import { log, errMessage } from "../logger.js";
import { fetchAllIndices, fetchMarketIndicators } from "../providers/index.js";
import { INDEX_MAPPING, SUBJECTS } from "../subjects.js";
import type {
  FetchResult,
  MarketIndicators,
  Prediction,
  PredictionDraft,
  Quote,
} from "../types.js";
import {
  composite,
  confidenceOf,
  directionOf,
  scoreToChange,
  summarize,
  type ScoringContext,
} from "./factors.js";

const HOUR_MS = 3_600_000;
const DAY_MS = 24 * HOUR_MS;

export type ScoringOptions = {
  now?: () => Date;
  horizonHours?: number;
  fetchQuotes?: () => Promise<FetchResult<Quote>>;
  fetchIndicators?: () => Promise<MarketIndicators>;
};

/**
 * Blends stored history with a live snapshot into one time-boxed Prediction
 * per tracked subject.
 */
export class ScoringEngine {
  readonly horizonHours: number;
  private now: () => Date;
  private fetchQuotes: () => Promise<FetchResult<Quote>>;
  private fetchIndicators: () => Promise<MarketIndicators>;

  constructor(private db: MarketDB, opts: ScoringOptions = {}) {
    this.now = opts.now ?? (() => new Date());
    this.horizonHours = opts.horizonHours ?? cfg.PREDICTION_HORIZON_HOURS;
    this.fetchQuotes = opts.fetchQuotes ?? (() => fetchAllIndices());
    this.fetchIndicators = opts.fetchIndicators ?? (() => fetchMarketIndicators());
  }

  /** Gather what the factors read for one subject at `at`. */
  buildContext(
    subject: string,
    quote: Quote | null,
    indicators: MarketIndicators | null,
    at: Date
  ): ScoringContext {
    const since = (ms: number) => new Date(at.getTime() - ms).toISOString();
    const info = INDEX_MAPPING[subject];
    return {
      subject,
      klass: info?.klass ?? "domestic",
      quote,
      quotes: this.db.quotesSince(subject, since(7 * DAY_MS)),
      northFlows: this.db.recentFlows("north", since(3 * DAY_MS), 10),
      premiums: this.db.premiumsSince(since(DAY_MS)),
      indicators,
    };
  }

  /** Score one subject and persist the result. */
  predictSubject(
    subject: string,
    quote: Quote | null,
    indicators: MarketIndicators | null
  ): Prediction {
    const at = this.now();
    const name = INDEX_MAPPING[subject]?.name ?? subject;
    const { score, factors } = composite(
      this.buildContext(subject, quote, indicators, at)
    );
    const predictedChange = scoreToChange(score);
    const direction = directionOf(score);

    const draft: PredictionDraft = {
      subject,
      name,
      currentPrice: quote?.price ?? 0,
      predictedChange,
      direction,
      confidence: confidenceOf(score),
      factors,
      summary: summarize(name, this.horizonHours, predictedChange, direction, factors),
      score,
      predictedAt: at.toISOString(),
      expiresAt: new Date(at.getTime() + this.horizonHours * HOUR_MS).toISOString(),
    };
    const saved = this.db.transaction(() => this.db.insertPrediction(draft));
    log.info("[PREDICT] prediction stored", {
      subject,
      change: predictedChange,
      direction,
      factors: factors.length,
    });
    return saved;
  }

  /**
   * Fetch the live snapshot once, then predict every subject. A failing
   * subject is logged and skipped.
   */
  async refresh(subjects: string[] = SUBJECTS): Promise<Prediction[]> {
    const [quotes, indicators] = await Promise.all([
      this.fetchQuotes(),
      this.fetchIndicators(),
    ]);
    if (quotes.error) {
      log.warn("[PREDICT] quote snapshot incomplete", { error: quotes.error.message });
    }
    const bySubject = new Map(quotes.records.map((q) => [q.subject, q]));

    const out: Prediction[] = [];
    for (const subject of subjects) {
      try {
        out.push(this.predictSubject(subject, bySubject.get(subject) ?? null, indicators));
      } catch (e) {
        log.error("[PREDICT] subject failed", { subject, error: errMessage(e) });
      }
    }
    return out;
  }

  /** Newest unexpired prediction per subject. */
  current(subjects: string[] = SUBJECTS): Prediction[] {
    const nowIso = this.now().toISOString();
    const out: Prediction[] = [];
    for (const subject of subjects) {
      const p = this.db.currentPrediction(subject, nowIso);
      if (p) out.push(p);
    }
    return out;
  }

  currentFor(subject: string): Prediction | null {
    return this.db.currentPrediction(subject, this.now().toISOString());
  }
}
