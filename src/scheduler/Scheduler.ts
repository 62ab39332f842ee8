// src/scheduler/Scheduler.ts
import { log, errMessage } from "../logger.js";

export type JobContext = {
  trigger: "tick" | "manual";
  startedAt: Date;
};

export type JobDefinition = {
  id: string;
  name: string;
  intervalMs: number;
  run: (ctx: JobContext) => Promise<void>;
  /** Gate for periodic ticks only; manual triggers always run. */
  shouldRun?: (now: Date) => boolean;
  /** Fire one tick as soon as the scheduler starts. */
  runOnStart?: boolean;
};

export type JobRun = {
  status: "success" | "error";
  trigger: JobContext["trigger"];
  startedAt: string;
  durationMs: number;
  message?: string;
};

export type TriggerResult = {
  status: "success" | "error" | "busy" | "unknown";
  job: string;
  message?: string;
  durationMs?: number;
};

export type JobStatus = {
  id: string;
  name: string;
  intervalMs: number;
  nextRunAt: string | null;
  running: boolean;
  lastRun: JobRun | null;
};

export type SchedulerStatus = { running: boolean; jobs: JobStatus[] };

type Slot = {
  def: JobDefinition;
  timer: NodeJS.Timeout | null;
  nextRunAt: number | null;
  inflight: Promise<JobRun> | null;
  lastRun: JobRun | null;
};

/**
 * Fixed-interval jobs, each on its own timer. A job never overlaps itself:
 * a tick or trigger that finds it running is skipped. Failures are caught
 * per run and recorded in status.
 */
export class Scheduler {
  private slots = new Map<string, Slot>();
  private running = false;
  private now: () => Date;

  constructor(jobs: JobDefinition[], opts: { now?: () => Date } = {}) {
    this.now = opts.now ?? (() => new Date());
    for (const def of jobs) {
      if (this.slots.has(def.id)) throw new Error(`duplicate job id ${def.id}`);
      this.slots.set(def.id, {
        def,
        timer: null,
        nextRunAt: null,
        inflight: null,
        lastRun: null,
      });
    }
  }

  start() {
    if (this.running) {
      log.info("[SCHED] already running");
      return;
    }
    this.running = true;
    for (const slot of this.slots.values()) {
      const { def } = slot;
      slot.nextRunAt = this.now().getTime() + def.intervalMs;
      slot.timer = setInterval(() => {
        slot.nextRunAt = this.now().getTime() + def.intervalMs;
        void this.tick(slot);
      }, def.intervalMs);
      if (def.runOnStart) void this.tick(slot);
    }
    log.info("[SCHED] started", { jobs: [...this.slots.keys()] });
  }

  /** Clear timers and wait for in-flight runs to settle. */
  async stop() {
    if (!this.running) return;
    this.running = false;
    const pending: Promise<JobRun>[] = [];
    for (const slot of this.slots.values()) {
      if (slot.timer) clearInterval(slot.timer);
      slot.timer = null;
      slot.nextRunAt = null;
      if (slot.inflight) pending.push(slot.inflight);
    }
    await Promise.allSettled(pending);
    log.info("[SCHED] stopped");
  }

  status(): SchedulerStatus {
    return {
      running: this.running,
      jobs: [...this.slots.values()].map((s) => ({
        id: s.def.id,
        name: s.def.name,
        intervalMs: s.def.intervalMs,
        nextRunAt: s.nextRunAt === null ? null : new Date(s.nextRunAt).toISOString(),
        running: s.inflight !== null,
        lastRun: s.lastRun,
      })),
    };
  }

  jobIds() {
    return [...this.slots.keys()];
  }

  /** Run a job now and report how it went. Never throws. */
  async trigger(id: string): Promise<TriggerResult> {
    const slot = this.slots.get(id);
    if (!slot) {
      return {
        status: "unknown",
        job: id,
        message: `unknown job; available: ${this.jobIds().join(", ")}`,
      };
    }
    if (slot.inflight) {
      return { status: "busy", job: id, message: "job is already running" };
    }
    const run = await this.execute(slot, "manual");
    return {
      status: run.status,
      job: id,
      message: run.message,
      durationMs: run.durationMs,
    };
  }

  private async tick(slot: Slot) {
    const { def } = slot;
    if (slot.inflight) {
      log.warn(`[SCHED] ${def.id} still running, tick skipped`);
      return;
    }
    if (def.shouldRun && !def.shouldRun(this.now())) {
      log.debug(`[SCHED] ${def.id} gated, tick skipped`);
      return;
    }
    await this.execute(slot, "tick");
  }

  private async execute(slot: Slot, trigger: JobContext["trigger"]): Promise<JobRun> {
    const { def } = slot;
    const startedAt = this.now();
    const started = Date.now();

    const run = (async (): Promise<JobRun> => {
      try {
        await def.run({ trigger, startedAt });
        return {
          status: "success",
          trigger,
          startedAt: startedAt.toISOString(),
          durationMs: Date.now() - started,
        };
      } catch (e) {
        log.error(`[SCHED] ${def.id} failed`, { trigger, error: errMessage(e) });
        return {
          status: "error",
          trigger,
          startedAt: startedAt.toISOString(),
          durationMs: Date.now() - started,
          message: errMessage(e),
        };
      }
    })();

    slot.inflight = run;
    try {
      const result = await run;
      slot.lastRun = result;
      log.info(`[SCHED] ${def.id} done`, {
        status: result.status,
        trigger,
        tookMs: result.durationMs,
      });
      return result;
    } finally {
      slot.inflight = null;
    }
  }
}
