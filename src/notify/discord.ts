import axios, { type AxiosInstance } from "axios";
import { log, errMessage } from "../logger.js";
import type { Impact, MarketEvent } from "../types.js";

// ---------- Types ----------
type EmbedField = { name: string; value: string; inline?: boolean };
export type Embed = {
  title?: string;
  description?: string;
  color?: number;
  timestamp?: string; // ISO
  fields?: EmbedField[];
  footer?: { text: string };
};

export type SendOptions = string | { content?: string; embeds?: Embed[] };

/** Anything that can fan out committed events. */
export interface EventNotifier {
  notifyEvents(events: MarketEvent[]): Promise<void>;
}

// ---------- Limits ----------
const LIMITS = {
  CONTENT: 2000,
  TITLE: 256,
  DESC: 4096,
  FIELDS: 25,
  FIELD_NAME: 256,
  FIELD_VALUE: 1024,
  TOTAL_EMBEDS: 10,
};

const COLORS: Record<Impact, number> = {
  positive: 0x2ecc71,
  negative: 0xe74c3c,
  neutral: 0x95a5a6,
};

const truncate = (s: string, max: number) =>
  s.length > max ? s.slice(0, max - 1) + "…" : s;

export function sanitizeEmbed(e: Embed): Embed {
  const out: Embed = { ...e };
  if (out.title) out.title = truncate(out.title, LIMITS.TITLE);
  if (out.description) out.description = truncate(out.description, LIMITS.DESC);
  if (out.fields) {
    out.fields = out.fields.slice(0, LIMITS.FIELDS).map((f) => ({
      name: truncate(f.name || "", LIMITS.FIELD_NAME),
      value: truncate(f.value || "", LIMITS.FIELD_VALUE),
      inline: f.inline,
    }));
  }
  return out;
}

/** One embed per event, colored by impact. */
export function eventEmbed(ev: MarketEvent): Embed {
  return sanitizeEmbed({
    title: ev.title,
    description: ev.summary,
    color: COLORS[ev.impact],
    timestamp: ev.createdAt,
    fields: [
      { name: "Type", value: ev.eventType, inline: true },
      { name: "Subject", value: ev.subject ?? "-", inline: true },
      { name: "Importance", value: "★".repeat(ev.importance), inline: true },
    ],
    footer: { text: `event #${ev.id}` },
  });
}

function retryAfterMs(data: unknown): number {
  if (data && typeof data === "object" && "retry_after" in data) {
    const secs = Number(data.retry_after);
    if (Number.isFinite(secs) && secs > 0) return secs * 1000;
  }
  return 1000;
}

/**
 * Posts to one channel through the bot REST API. A single 429 is retried
 * after the server's retry_after.
 */
export class DiscordNotifier implements EventNotifier {
  private url: string;
  private headers: Record<string, string>;

  constructor(
    token: string,
    channelId: string,
    private client: AxiosInstance = axios.create({ timeout: 8000 }),
    private sleep: (ms: number) => Promise<void> = (ms) =>
      new Promise((r) => setTimeout(r, ms))
  ) {
    this.url = `https://discord.com/api/v10/channels/${channelId}/messages`;
    this.headers = {
      Authorization: `Bot ${token}`,
      "Content-Type": "application/json",
    };
  }

  private async postWith429Retry(body: object) {
    try {
      return await this.client.post<unknown>(this.url, body, { headers: this.headers });
    } catch (err) {
      if (axios.isAxiosError(err) && err.response?.status === 429) {
        await this.sleep(retryAfterMs(err.response.data));
        return await this.client.post<unknown>(this.url, body, { headers: this.headers });
      }
      throw err;
    }
  }

  /** Send a message; returns the created message id when the API echoes one. */
  async send(opts: SendOptions): Promise<string | undefined> {
    const body =
      typeof opts === "string"
        ? { content: opts.slice(0, LIMITS.CONTENT) }
        : {
            content: opts.content?.slice(0, LIMITS.CONTENT),
            embeds: (opts.embeds ?? [])
              .slice(0, LIMITS.TOTAL_EMBEDS)
              .map(sanitizeEmbed),
          };
    const res = await this.postWith429Retry(body);
    const data = res.data;
    if (data && typeof data === "object" && "id" in data && typeof data.id === "string") {
      return data.id;
    }
    return undefined;
  }

  async notifyEvents(events: MarketEvent[]): Promise<void> {
    for (let i = 0; i < events.length; i += LIMITS.TOTAL_EMBEDS) {
      const chunk = events.slice(i, i + LIMITS.TOTAL_EMBEDS);
      try {
        await this.send({ embeds: chunk.map(eventEmbed) });
      } catch (e) {
        log.warn("[DISCORD] notify failed", { events: chunk.length, error: errMessage(e) });
      }
    }
  }
}

/** Build a notifier from credentials, or null when either is missing. */
export function discordFromConfig(
  token: string | undefined,
  channelId: string | undefined
): DiscordNotifier | null {
  if (!token || !channelId) return null;
  return new DiscordNotifier(token, channelId);
}
