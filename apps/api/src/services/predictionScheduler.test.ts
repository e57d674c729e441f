import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { DAY_MS } from "../lib/dates.js";
import type { DailyPredictionJob, JobRunResult } from "./dailyPredictionJob.js";
import { startPredictionScheduler, type PredictionScheduler } from "./predictionScheduler.js";

const HOUR_MS = 60 * 60 * 1000;

// setImmediate stays real so pending promise chains can settle between ticks.
const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

function stubJob(impl: (date: string) => Promise<JobRunResult>) {
  const run = vi.fn(impl);
  const job: DailyPredictionJob = {
    run,
    getState: () => "idle",
    getLastResult: () => null,
  };
  return { job, run };
}

describe("prediction scheduler", () => {
  let scheduler: PredictionScheduler | null = null;

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ["setTimeout", "clearTimeout", "Date"] });
    vi.setSystemTime(Date.UTC(2024, 0, 1, 23, 0));
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    scheduler?.stop();
    scheduler = null;
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it("fires at the configured UTC time for the previous day", async () => {
    const { job, run } = stubJob(async (date) => ({ status: "skipped_no_data", date }));
    scheduler = startPredictionScheduler(job, { hourUtc: 0, minuteUtc: 0 });

    expect(scheduler.nextRunAt()).toBe(Date.UTC(2024, 0, 2, 0, 0));

    vi.advanceTimersByTime(HOUR_MS - 1);
    expect(run).not.toHaveBeenCalled();

    vi.advanceTimersByTime(1);
    await flush();

    expect(run).toHaveBeenCalledTimes(1);
    expect(run).toHaveBeenCalledWith("2024-01-01");
    expect(scheduler.nextRunAt()).toBe(Date.UTC(2024, 0, 3, 0, 0));
  });

  it("keeps its daily cadence after a run blows up", async () => {
    const { job, run } = stubJob(async () => {
      throw new Error("boom");
    });
    scheduler = startPredictionScheduler(job, { hourUtc: 0, minuteUtc: 0 });

    vi.advanceTimersByTime(HOUR_MS);
    await flush();
    vi.advanceTimersByTime(DAY_MS);
    await flush();

    expect(run).toHaveBeenCalledTimes(2);
    expect(run).toHaveBeenLastCalledWith("2024-01-02");
  });

  it("stops firing once stopped", async () => {
    const { job, run } = stubJob(async (date) => ({ status: "skipped_no_data", date }));
    scheduler = startPredictionScheduler(job, { hourUtc: 6, minuteUtc: 30 });

    expect(scheduler.nextRunAt()).toBe(Date.UTC(2024, 0, 2, 6, 30));
    scheduler.stop();

    vi.advanceTimersByTime(2 * DAY_MS);
    await flush();

    expect(run).not.toHaveBeenCalled();
    expect(scheduler.nextRunAt()).toBeNull();
  });
});
