// src/service.ts
import fs from "node:fs";
import path from "node:path";
import { MarketQueries } from "./api/queries.js";
import { cfg } from "./config.js";
import { MarketDB } from "./db/MarketDB.js";
import { discordFromConfig } from "./notify/discord.js";
import { AlertEngine } from "./pipeline/alerts.js";
import { ScoringEngine } from "./pipeline/predict.js";
import { buildJobs } from "./scheduler/jobs.js";
import { Scheduler } from "./scheduler/Scheduler.js";

export type Service = {
  db: MarketDB;
  scheduler: Scheduler;
  queries: MarketQueries;
  shutdown: () => Promise<void>;
};

/** Wire store, engines, scheduler and the query surface. */
export function createService(dbPath = cfg.DB_PATH): Service {
  if (dbPath !== ":memory:") {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }
  const db = new MarketDB(dbPath);
  const alerts = new AlertEngine(db, {
    notifier: discordFromConfig(cfg.DISCORD_BOT_TOKEN, cfg.DISCORD_CHANNEL_ID),
  });
  const scoring = new ScoringEngine(db);
  const scheduler = new Scheduler(buildJobs({ alerts, scoring }));
  const queries = new MarketQueries({ db, scheduler, scoring });

  let closed = false;
  const shutdown = async () => {
    if (closed) return;
    closed = true;
    await scheduler.stop();
    db.close();
  };
  return { db, scheduler, queries, shutdown };
}
