import { describe, expect, test, vi } from "vitest";
import { getNextRun, matchesCron, parseCron, Scheduler } from "../../src/core/scheduler";
import { setLogLevel } from "../../src/utils/logger";

describe("cron", () => {
  test("requires five fields", () => {
    expect(() => parseCron("0 2 * *")).toThrow('Invalid cron expression: "0 2 * *". Expected 5 fields, got 4.');
    expect(() => parseCron("0 0 2 * * *")).toThrow("Expected 5 fields, got 6");
  });

  test("rejects malformed fields", () => {
    expect(() => parseCron("99 2 * * *")).toThrow();
  });

  test("getNextRun finds the next 02:00", () => {
    const cron = parseCron("0 2 * * *");
    expect(getNextRun(cron, new Date(2026, 0, 1, 1, 30, 0))).toEqual(new Date(2026, 0, 1, 2, 0, 0));
    expect(getNextRun(cron, new Date(2026, 0, 1, 2, 0, 0))).toEqual(new Date(2026, 0, 2, 2, 0, 0));
  });

  test("matchesCron works at minute granularity", () => {
    const cron = parseCron("0 2 * * *");
    expect(matchesCron(cron, new Date(2026, 0, 1, 2, 0, 30))).toBe(true);
    expect(matchesCron(cron, new Date(2026, 0, 1, 2, 1, 0))).toBe(false);
  });
});

describe("Scheduler", () => {
  test("runs the job once per due minute", async () => {
    setLogLevel("error");
    let now = new Date(2026, 0, 1, 1, 59, 0);
    const job = vi.fn(async () => {});
    const scheduler = new Scheduler("0 2 * * *", job, { now: () => new Date(now) });

    expect(await scheduler.tick()).toBe("not_due");

    now = new Date(2026, 0, 1, 2, 0, 5);
    expect(await scheduler.tick()).toBe("ran");

    now = new Date(2026, 0, 1, 2, 0, 40);
    expect(await scheduler.tick()).toBe("already_ran");

    expect(job).toHaveBeenCalledTimes(1);
    expect(scheduler.getStatus()).toEqual({
      cron: "0 2 * * *",
      lastRun: new Date(2026, 0, 1, 2, 0, 0),
      nextRun: new Date(2026, 0, 2, 2, 0, 0),
      busy: false,
    });
  });

  test("skips a trigger while the previous run is in flight", async () => {
    setLogLevel("error");
    let now = new Date(2026, 0, 1, 2, 0, 0);
    let finish: () => void = () => {};
    let calls = 0;
    const job = vi.fn(async () => {
      calls++;
      if (calls === 1) {
        await new Promise<void>((resolve) => {
          finish = resolve;
        });
      }
    });
    const scheduler = new Scheduler("* * * * *", job, { now: () => new Date(now) });

    const first = scheduler.tick();
    now = new Date(2026, 0, 1, 2, 1, 0);
    expect(await scheduler.tick()).toBe("busy");
    expect(scheduler.getStatus().busy).toBe(true);

    finish();
    expect(await first).toBe("ran");
    expect(await scheduler.tick()).toBe("ran");
    expect(job).toHaveBeenCalledTimes(2);
  });

  test("a failing job is reported and does not stop the schedule", async () => {
    setLogLevel("error");
    let now = new Date(2026, 0, 1, 2, 0, 0);
    const job = vi.fn(async () => {
      throw new Error("disk full");
    });
    const scheduler = new Scheduler("* * * * *", job, { now: () => new Date(now) });

    expect(await scheduler.tick()).toBe("failed");
    now = new Date(2026, 0, 1, 2, 1, 0);
    expect(await scheduler.tick()).toBe("failed");
    expect(job).toHaveBeenCalledTimes(2);
  });

  test("start and stop manage the check timer", async () => {
    setLogLevel("error");
    const scheduler = new Scheduler("0 2 * * *", async () => {}, {
      intervalMs: 60_000,
      now: () => new Date(2026, 0, 1, 1, 0, 0),
    });

    scheduler.start();
    expect(scheduler.running).toBe(true);
    await scheduler.stop();
    expect(scheduler.running).toBe(false);
  });
});
