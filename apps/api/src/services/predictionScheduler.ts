import { msUntilNextUtcTime, yesterdayUtc } from "../lib/dates.js";
import type { DailyPredictionJob } from "./dailyPredictionJob.js";

export type PredictionSchedulerOptions = {
  hourUtc: number;
  minuteUtc: number;
  now?: () => number;
};

export type PredictionScheduler = {
  stop(): void;
  nextRunAt(): number | null;
};

/**
 * Runs the daily prediction job once a day at hourUtc:minuteUtc for the
 * previous UTC day. The next run is armed after every run, whatever its
 * outcome.
 */
export function startPredictionScheduler(
  job: DailyPredictionJob,
  options: PredictionSchedulerOptions
): PredictionScheduler {
  const now = options.now ?? (() => Date.now());
  const at = `${String(options.hourUtc).padStart(2, "0")}:${String(options.minuteUtc).padStart(2, "0")} UTC`;

  let timer: NodeJS.Timeout | null = null;
  let nextAt: number | null = null;
  let stopped = false;

  function arm(): void {
    if (stopped) return;
    const delay = msUntilNextUtcTime(now(), options.hourUtc, options.minuteUtc);
    nextAt = now() + delay;
    timer = setTimeout(fire, delay);
  }

  function fire(): void {
    timer = null;
    const date = yesterdayUtc(now());
    console.log(`[Scheduler] Triggering daily prediction for ${date}`);

    job
      .run(date)
      .then((result) => {
        console.log(`[Scheduler] Run for ${date} finished: ${result.status}`);
      })
      .catch((err) => {
        console.error(`[Scheduler] Run for ${date} threw`, err);
      })
      .finally(arm);
  }

  console.log(`Starting daily prediction scheduler (fires at ${at})`);
  arm();

  return {
    stop() {
      stopped = true;
      if (timer) clearTimeout(timer);
      timer = null;
      nextAt = null;
      console.log("[Scheduler] Stopped");
    },
    nextRunAt: () => nextAt,
  };
}
