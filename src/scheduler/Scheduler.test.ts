import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { Scheduler, type JobDefinition } from "./Scheduler.js";

function deferred() {
  let release: () => void = () => {};
  const promise = new Promise<void>((resolve) => {
    release = resolve;
  });
  return { promise, release: () => release() };
}

const job = (over: Partial<JobDefinition> = {}): JobDefinition => ({
  id: "a",
  name: "Job A",
  intervalMs: 1000,
  run: vi.fn(async () => {}),
  ...over,
});

describe("Scheduler", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2026-03-02T02:00:00.000Z"));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("rejects duplicate ids", () => {
    expect(() => new Scheduler([job(), job()])).toThrow("duplicate job id a");
  });

  it("starts once and schedules every job", async () => {
    const s = new Scheduler([job(), job({ id: "b", intervalMs: 5000 })]);
    s.start();
    s.start();
    expect(vi.getTimerCount()).toBe(2);
    expect(s.status().jobs.map((j) => j.nextRunAt)).toEqual([
      "2026-03-02T02:00:01.000Z",
      "2026-03-02T02:00:05.000Z",
    ]);
    await s.stop();
  });

  it("runs on each tick", async () => {
    const run = vi.fn(async () => {});
    const s = new Scheduler([job({ run })]);
    s.start();
    expect(run).not.toHaveBeenCalled();
    await vi.advanceTimersByTimeAsync(2000);
    expect(run).toHaveBeenCalledTimes(2);
    expect(run).toHaveBeenLastCalledWith({ trigger: "tick", startedAt: new Date("2026-03-02T02:00:02.000Z") });
    expect(s.status().jobs[0]?.lastRun).toMatchObject({ status: "success", trigger: "tick" });
    await s.stop();
  });

  it("fires once on start when asked", async () => {
    const run = vi.fn(async () => {});
    const s = new Scheduler([job({ run, runOnStart: true })]);
    s.start();
    await vi.advanceTimersByTimeAsync(0);
    expect(run).toHaveBeenCalledTimes(1);
    await s.stop();
  });

  it("skips a tick while the previous run is still going", async () => {
    const gate = deferred();
    const run = vi.fn(() => gate.promise);
    const s = new Scheduler([job({ run })]);
    s.start();
    await vi.advanceTimersByTimeAsync(1000);
    await vi.advanceTimersByTimeAsync(1000);
    expect(run).toHaveBeenCalledTimes(1);
    expect(s.status().jobs[0]?.running).toBe(true);

    gate.release();
    await vi.advanceTimersByTimeAsync(1000);
    expect(run).toHaveBeenCalledTimes(2);
    await s.stop();
  });

  it("reports busy for a trigger that overlaps a run", async () => {
    const gate = deferred();
    const s = new Scheduler([job({ run: () => gate.promise })]);
    const first = s.trigger("a");
    await expect(s.trigger("a")).resolves.toEqual({
      status: "busy",
      job: "a",
      message: "job is already running",
    });
    gate.release();
    await expect(first).resolves.toMatchObject({ status: "success", job: "a" });
  });

  it("does not start a manual run over a ticking one", async () => {
    const gate = deferred();
    const run = vi.fn(() => gate.promise);
    const s = new Scheduler([job({ run })]);
    s.start();
    await vi.advanceTimersByTimeAsync(1000);
    await expect(s.trigger("a")).resolves.toMatchObject({ status: "busy" });
    expect(run).toHaveBeenCalledTimes(1);
    gate.release();
    await s.stop();
  });

  it("captures a failing run without throwing", async () => {
    const s = new Scheduler([
      job({
        run: async () => {
          throw new Error("feed down");
        },
      }),
    ]);
    await expect(s.trigger("a")).resolves.toMatchObject({
      status: "error",
      job: "a",
      message: "feed down",
    });
    expect(s.status().jobs[0]?.lastRun).toMatchObject({
      status: "error",
      trigger: "manual",
      message: "feed down",
    });
    expect(s.status().jobs[0]?.running).toBe(false);
  });

  it("names the available jobs for an unknown id", async () => {
    const s = new Scheduler([job(), job({ id: "b" })]);
    await expect(s.trigger("nope")).resolves.toEqual({
      status: "unknown",
      job: "nope",
      message: "unknown job; available: a, b",
    });
  });

  it("gates ticks but not manual triggers", async () => {
    const run = vi.fn(async () => {});
    const s = new Scheduler([job({ run, shouldRun: () => false })]);
    s.start();
    await vi.advanceTimersByTimeAsync(3000);
    expect(run).not.toHaveBeenCalled();
    await s.trigger("a");
    expect(run).toHaveBeenCalledWith({ trigger: "manual", startedAt: new Date("2026-03-02T02:00:03.000Z") });
    await s.stop();
  });

  it("waits for in-flight runs on stop", async () => {
    const gate = deferred();
    const s = new Scheduler([job({ run: () => gate.promise, runOnStart: true })]);
    s.start();
    let stopped = false;
    const stopping = s.stop().then(() => {
      stopped = true;
    });
    await vi.advanceTimersByTimeAsync(0);
    expect(stopped).toBe(false);
    expect(vi.getTimerCount()).toBe(0);

    gate.release();
    await stopping;
    expect(stopped).toBe(true);
    expect(s.status()).toMatchObject({ running: false });
    expect(s.status().jobs[0]?.nextRunAt).toBeNull();
  });
});
