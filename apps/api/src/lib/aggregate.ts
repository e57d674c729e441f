import type { DayWindow } from "./dates.js";
import type { DailyAggregate, SensorReading } from "../types/sensor.js";

type Sums = {
  ph: number;
  tds: number;
  turbidity: number;
  temperature: number;
  count: number;
};

/**
 * Reduces the readings whose timestamp falls inside `window` (both ends
 * inclusive) to per-parameter means. Readings outside the window are ignored.
 *
 * Returns null when no reading falls inside the window. That is the
 * "no data for this period" signal, not an error.
 */
export function aggregateReadings(
  readings: ReadonlyArray<Pick<SensorReading, "ts" | "ph" | "tds" | "turbidity" | "temperature">>,
  window: DayWindow
): DailyAggregate | null {
  const sums: Sums = { ph: 0, tds: 0, turbidity: 0, temperature: 0, count: 0 };

  for (const reading of readings) {
    if (reading.ts < window.startMs || reading.ts > window.endMs) continue;
    sums.ph += reading.ph;
    sums.tds += reading.tds;
    sums.turbidity += reading.turbidity;
    sums.temperature += reading.temperature;
    sums.count += 1;
  }

  if (sums.count === 0) return null;

  return {
    avgPh: sums.ph / sums.count,
    avgTds: sums.tds / sums.count,
    avgTurbidity: sums.turbidity / sums.count,
    avgTemperature: sums.temperature / sums.count,
    readingCount: sums.count,
  };
}
