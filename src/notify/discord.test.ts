import axios, { AxiosError, type AxiosAdapter, type InternalAxiosRequestConfig } from "axios";
import { describe, expect, it, vi } from "vitest";
import { respond } from "../testing/stubTransport.js";
import type { MarketEvent } from "../types.js";
import {
  DiscordNotifier,
  discordFromConfig,
  eventEmbed,
  sanitizeEmbed,
} from "./discord.js";

type Step = { status: number; data: unknown };

/** Replays steps in order, repeating the last; records every request. */
function sequence(steps: Step[]) {
  const seen: InternalAxiosRequestConfig[] = [];
  let i = 0;
  const adapter = vi.fn<AxiosAdapter>(async (config) => {
    seen.push(config);
    const step = steps[Math.min(i++, steps.length - 1)];
    if (!step) throw new Error("no step");
    const res = respond(config, step.status, step.data);
    if (step.status >= 400) {
      throw new AxiosError(`HTTP ${step.status}`, "ERR_BAD_RESPONSE", config, null, res);
    }
    return res;
  });
  return { adapter, seen };
}

function notifier(steps: Step[]) {
  const { adapter, seen } = sequence(steps);
  const sleep = vi.fn(async (_ms: number) => {});
  const n = new DiscordNotifier("test-secret", "123", axios.create({ adapter }), sleep);
  return { n, adapter, seen, sleep };
}

const bodyOf = (c: InternalAxiosRequestConfig | undefined): unknown =>
  JSON.parse(String(c?.data));

const event = (id: number, over: Partial<MarketEvent> = {}): MarketEvent => ({
  id,
  eventType: "fund_flow",
  subject: "csi300",
  title: `Event ${id}`,
  summary: "Shanghai Connect 30.00亿, Shenzhen Connect 30.00亿",
  impact: "positive",
  importance: 4,
  data: {},
  createdAt: "2026-03-02T02:00:00.000Z",
  ...over,
});

describe("eventEmbed", () => {
  it("colors by impact and lists the event metadata", () => {
    expect(eventEmbed(event(7, { impact: "negative", subject: null, importance: 3 }))).toEqual({
      title: "Event 7",
      description: "Shanghai Connect 30.00亿, Shenzhen Connect 30.00亿",
      color: 0xe74c3c,
      timestamp: "2026-03-02T02:00:00.000Z",
      fields: [
        { name: "Type", value: "fund_flow", inline: true },
        { name: "Subject", value: "-", inline: true },
        { name: "Importance", value: "★★★", inline: true },
      ],
      footer: { text: "event #7" },
    });
  });
});

describe("sanitizeEmbed", () => {
  it("truncates an oversized title with an ellipsis", () => {
    const out = sanitizeEmbed({ title: "x".repeat(300) });
    expect(out.title).toHaveLength(256);
    expect(out.title?.endsWith("…")).toBe(true);
  });

  it("caps the field count", () => {
    const fields = Array.from({ length: 30 }, (_, i) => ({ name: `f${i}`, value: "v" }));
    expect(sanitizeEmbed({ fields }).fields).toHaveLength(25);
  });
});

describe("DiscordNotifier", () => {
  it("posts to the channel with the bot token", async () => {
    const { n, seen } = notifier([{ status: 200, data: { id: "m1" } }]);
    await expect(n.send("hello")).resolves.toBe("m1");
    expect(seen[0]?.url).toBe("https://discord.com/api/v10/channels/123/messages");
    expect(seen[0]?.headers.Authorization).toBe("Bot test-secret");
    expect(bodyOf(seen[0])).toEqual({ content: "hello" });
  });

  it("returns undefined when the reply carries no id", async () => {
    const { n } = notifier([{ status: 204, data: null }]);
    await expect(n.send("hello")).resolves.toBeUndefined();
  });

  it("retries once after retry_after on 429", async () => {
    const { n, adapter, sleep } = notifier([
      { status: 429, data: { retry_after: 2 } },
      { status: 200, data: { id: "m2" } },
    ]);
    await expect(n.send({ content: "hi" })).resolves.toBe("m2");
    expect(adapter).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(2000);
  });

  it("surfaces other failures from send", async () => {
    const { n, adapter } = notifier([{ status: 500, data: null }]);
    await expect(n.send("hi")).rejects.toBeInstanceOf(AxiosError);
    expect(adapter).toHaveBeenCalledTimes(1);
  });

  it("chunks events ten per message and keeps going after a failure", async () => {
    const { n, seen } = notifier([
      { status: 500, data: null },
      { status: 200, data: { id: "m3" } },
    ]);
    const events = Array.from({ length: 12 }, (_, i) => event(i + 1));
    await expect(n.notifyEvents(events)).resolves.toBeUndefined();
    expect(seen).toHaveLength(2);
    const second = bodyOf(seen[1]);
    expect(second).toMatchObject({ embeds: [{ title: "Event 11" }, { title: "Event 12" }] });
  });
});

describe("discordFromConfig", () => {
  it("needs both the token and the channel", () => {
    expect(discordFromConfig("test-secret", undefined)).toBeNull();
    expect(discordFromConfig("", "123")).toBeNull();
    expect(discordFromConfig("test-secret", "123")).toBeInstanceOf(DiscordNotifier);
  });
});
