import { describe, expect, it, vi } from "vitest";
import { ConfigError } from "../../server/_core/errors";
import type { RunReport } from "../../server/workers/orchestrator";
import { SCHEDULER_CONFIG, Scheduler, type CronApi, type JobRunner } from "../../server/workers/scheduler";

function emptyReport(mode: RunReport["mode"]): RunReport {
  return {
    mode,
    outcomes: [],
    counts: { success: 0, partial: 0, failure: 0, no_data: 0, skipped: 0 },
    unknown: [],
    levels: [],
    durationMs: 0,
  };
}

function fakeCron() {
  const scheduled: { expression: string; task: () => void; stop: ReturnType<typeof vi.fn> }[] = [];
  const api: CronApi = {
    schedule: (expression, task) => {
      const entry = { expression, task, stop: vi.fn() };
      scheduled.push(entry);
      return { stop: entry.stop };
    },
    validate: expression => expression.split(" ").length === 5,
  };
  return { api, scheduled };
}

function jobs(overrides: Partial<Record<"cascade" | "matches" | "general", JobRunner>> = {}) {
  return {
    cascade: overrides.cascade ?? (async () => emptyReport("cascade")),
    matches: overrides.matches ?? (async () => emptyReport("tasks")),
    general: overrides.general ?? (async () => emptyReport("general")),
  };
}

describe("Scheduler", () => {
  it("schedules every job on its interval", async () => {
    const cron = fakeCron();
    const scheduler = new Scheduler(jobs(), SCHEDULER_CONFIG, cron.api);

    scheduler.start();

    expect(cron.scheduled.map(entry => entry.expression)).toEqual(["0 3 * * *", "*/30 * * * *", "0 */6 * * *"]);
    expect(scheduler.started).toBe(true);

    await scheduler.stop();
    expect(cron.scheduled.every(entry => entry.stop.mock.calls.length === 1)).toBe(true);
    expect(scheduler.started).toBe(false);
  });

  it("refuses an invalid cron expression", () => {
    const cron = fakeCron();
    const config = { ...SCHEDULER_CONFIG, matches: { interval: "every half hour", description: "bad" } };
    const scheduler = new Scheduler(jobs(), config, cron.api);

    expect(() => scheduler.start()).toThrow(ConfigError);
    expect(cron.scheduled).toEqual([]);
  });

  it("skips a run while another is in progress", async () => {
    let finish: () => void = () => undefined;
    const cascade = vi.fn(
      () =>
        new Promise<RunReport>(resolve => {
          finish = () => resolve(emptyReport("cascade"));
        })
    );
    const matches = vi.fn(async () => emptyReport("tasks"));
    const scheduler = new Scheduler(jobs({ cascade, matches }), SCHEDULER_CONFIG, fakeCron().api);

    const first = scheduler.execute("cascade");
    expect(scheduler.running).toBe("cascade");

    const second = await scheduler.execute("matches");
    expect(second).toEqual({ job: "matches", status: "skipped", durationMs: 0 });
    expect(matches).not.toHaveBeenCalled();

    finish();
    expect((await first).status).toBe("completed");
    expect(scheduler.running).toBeNull();

    expect((await scheduler.execute("matches")).status).toBe("completed");
  });

  it("reports a job that throws without rejecting", async () => {
    const scheduler = new Scheduler(
      jobs({
        general: async () => {
          throw new Error("store is closed");
        },
      }),
      SCHEDULER_CONFIG,
      fakeCron().api
    );

    const run = await scheduler.execute("general");

    expect(run).toMatchObject({ job: "general", status: "failed", error: "store is closed" });
    expect(scheduler.running).toBeNull();
  });

  it("waits for the running job when stopped", async () => {
    let finish: () => void = () => undefined;
    const cascade = vi.fn(
      () =>
        new Promise<RunReport>(resolve => {
          finish = () => resolve(emptyReport("cascade"));
        })
    );
    const scheduler = new Scheduler(jobs({ cascade }), SCHEDULER_CONFIG, fakeCron().api);
    scheduler.start();
    const run = scheduler.execute("cascade");

    let stopped = false;
    const stopping = scheduler.stop().then(() => {
      stopped = true;
    });
    await Promise.resolve();
    expect(stopped).toBe(false);
    expect(scheduler.running).toBe("cascade");

    finish();
    await stopping;
    expect(stopped).toBe(true);
    expect((await run).status).toBe("completed");
    expect(scheduler.running).toBeNull();
  });

  it("runs the job when the cron tick fires", async () => {
    const cron = fakeCron();
    const general = vi.fn(async () => emptyReport("general"));
    const scheduler = new Scheduler(jobs({ general }), SCHEDULER_CONFIG, cron.api);
    scheduler.start();

    cron.scheduled[2]?.task();
    await vi.waitFor(() => expect(general).toHaveBeenCalledTimes(1));

    await scheduler.stop();
  });
});
