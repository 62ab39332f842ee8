// src/scheduler/jobs.ts
// Reference jobs: each pairs adapters with a downstream engine call.
import { cfg } from "../config.js";
import { log } from "../logger.js";
import type { AlertEngine } from "../pipeline/alerts.js";
import type { ScoringEngine } from "../pipeline/predict.js";
import {
  fetchAllIndices,
  fetchNorthFlow,
  fetchQdiiPremiums,
  fetchSouthFlow,
} from "../providers/index.js";
import type { FetchResult, FlowRecord, PremiumRecord, Quote } from "../types.js";
import type { JobDefinition } from "./Scheduler.js";
import { isDomesticTradingTime } from "./tradingHours.js";

export type JobSources = {
  indices: () => Promise<FetchResult<Quote>>;
  premiums: () => Promise<FetchResult<PremiumRecord>>;
  northFlow: () => Promise<FetchResult<FlowRecord>>;
  southFlow: () => Promise<FetchResult<FlowRecord>>;
};

export const liveSources: JobSources = {
  indices: () => fetchAllIndices(),
  premiums: () => fetchQdiiPremiums(),
  northFlow: () => fetchNorthFlow(),
  southFlow: () => fetchSouthFlow(),
};

export type JobDeps = {
  alerts: AlertEngine;
  scoring: ScoringEngine;
  sources?: JobSources;
  intervals?: Partial<Record<JobId, number>>;
  tradingHoursOnly?: boolean;
};

export type JobId =
  | "update_indices"
  | "update_premium"
  | "update_fund_flow"
  | "update_predictions";

export const DEFAULT_INTERVALS: Record<JobId, number> = {
  update_indices: cfg.POLL_INDICES_SECONDS * 1000,
  update_premium: cfg.POLL_PREMIUM_SECONDS * 1000,
  update_fund_flow: cfg.POLL_FLOW_SECONDS * 1000,
  update_predictions: cfg.POLL_PREDICTIONS_SECONDS * 1000,
};

/** An adapter that returned nothing but an error fails the run. */
function unwrap<T>(label: string, res: FetchResult<T>): T[] {
  if (res.error) {
    if (!res.records.length) throw res.error;
    log.warn(`[JOBS] ${label} partial`, { error: res.error.message });
  }
  return res.records;
}

export function buildJobs(deps: JobDeps): JobDefinition[] {
  const sources = deps.sources ?? liveSources;
  const every = { ...DEFAULT_INTERVALS, ...deps.intervals };
  const gate = (deps.tradingHoursOnly ?? cfg.TRADING_HOURS_ONLY)
    ? isDomesticTradingTime
    : undefined;

  return [
    {
      id: "update_indices",
      name: "Update index quotes",
      intervalMs: every.update_indices,
      runOnStart: true,
      run: async () => {
        const quotes = unwrap("indices", await sources.indices());
        if (!quotes.length) {
          log.warn("[JOBS] no index quotes received");
          return;
        }
        const events = await deps.alerts.evaluateIndices(quotes);
        log.info("[JOBS] indices updated", { quotes: quotes.length, events: events.length });
      },
    },
    {
      id: "update_premium",
      name: "Update QDII premiums",
      intervalMs: every.update_premium,
      shouldRun: gate,
      run: async () => {
        const rows = unwrap("premium", await sources.premiums());
        if (!rows.length) {
          log.warn("[JOBS] no premium rows received");
          return;
        }
        const events = await deps.alerts.evaluatePremiums(rows);
        log.info("[JOBS] premiums updated", { funds: rows.length, events: events.length });
      },
    },
    {
      id: "update_fund_flow",
      name: "Update connect fund flow",
      intervalMs: every.update_fund_flow,
      shouldRun: gate,
      run: async () => {
        const [north, south] = await Promise.all([
          sources.northFlow(),
          sources.southFlow(),
        ]);
        if (north.error && south.error) throw north.error;
        const events = await deps.alerts.evaluateFlows(
          north.records[0] ?? null,
          south.records[0] ?? null
        );
        log.info("[JOBS] fund flow updated", {
          north: north.records[0]?.total ?? null,
          south: south.records[0]?.total ?? null,
          events: events.length,
        });
      },
    },
    {
      id: "update_predictions",
      name: "Refresh index predictions",
      intervalMs: every.update_predictions,
      run: async () => {
        const predictions = await deps.scoring.refresh();
        log.info("[JOBS] predictions refreshed", { count: predictions.length });
      },
    },
  ];
}
