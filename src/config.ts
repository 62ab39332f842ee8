import "dotenv/config";
import { z } from "zod";

const flag = (fallback: "true" | "false") =>
  z
    .enum(["true", "false", "1", "0"])
    .default(fallback)
    .transform((v) => v === "true" || v === "1");

// setInterval overflows past 2^31 - 1 ms and fires at once
export const MAX_POLL_SECONDS = 2_147_483;

const pollSeconds = (fallback: number) =>
  z.coerce.number().positive().max(MAX_POLL_SECONDS).default(fallback);

/** Validate & normalize environment variables */
export const EnvSchema = z.object({
  DB_PATH: z.string().default("./data/market.db"),
  ENABLE_SCHEDULER: flag("true"),
  TRADING_HOURS_ONLY: flag("false"),

  POLL_INDICES_SECONDS: pollSeconds(120),
  POLL_PREMIUM_SECONDS: pollSeconds(300),
  POLL_FLOW_SECONDS: pollSeconds(600),
  POLL_PREDICTIONS_SECONDS: pollSeconds(3600),

  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  HTTP_MAX_RETRIES: z.coerce.number().int().min(1).default(3),

  PREMIUM_HIGH: z.coerce.number().default(1.5),
  PREMIUM_LOW: z.coerce.number().default(-1.5),
  FLOW_HIGH: z.coerce.number().positive().default(50),
  INDEX_MOVE: z.coerce.number().positive().default(2.0),
  PREDICTION_HORIZON_HOURS: z.coerce.number().positive().default(48),

  NOTIFY_MIN_IMPORTANCE: z.coerce.number().int().min(1).max(5).default(4),
  DISCORD_BOT_TOKEN: z.string().optional(),
  DISCORD_CHANNEL_ID: z.string().optional(),

  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

export type Config = z.infer<typeof EnvSchema>;

const env = EnvSchema.parse(process.env);

export const cfg: Config = {
  ...env,
};
