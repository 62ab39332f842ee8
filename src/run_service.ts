// src/run_service.ts
import { cfg } from "./config.js";
import { log, errMessage } from "./logger.js";
import { createService } from "./service.js";

/* ---------------- boot ---------------- */
function start() {
  log.info("[BOOT] using DB:", cfg.DB_PATH);
  log.info("[BOOT] cadence:", {
    indicesSec: cfg.POLL_INDICES_SECONDS,
    premiumSec: cfg.POLL_PREMIUM_SECONDS,
    flowSec: cfg.POLL_FLOW_SECONDS,
    predictionsSec: cfg.POLL_PREDICTIONS_SECONDS,
    tradingHoursOnly: cfg.TRADING_HOURS_ONLY,
  });

  const service = createService();
  if (cfg.ENABLE_SCHEDULER) service.scheduler.start();
  else log.info("[BOOT] scheduler disabled");

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      log.info(`[BOOT] ${signal} received, shutting down`);
      service
        .shutdown()
        .then(() => process.exit(0))
        .catch((e: unknown) => {
          log.error("[BOOT] shutdown failed", { error: errMessage(e) });
          process.exit(1);
        });
    });
  }
}

start();
