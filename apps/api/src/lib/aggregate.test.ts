import { describe, expect, it } from "vitest";

import { aggregateReadings } from "./aggregate.js";
import { dayWindow } from "./dates.js";

const at = (iso: string) => Date.parse(iso);

function reading(ts: number, ph: number, tds = 300, turbidity = 2, temperature = 25) {
  return { ts, ph, tds, turbidity, temperature };
}

describe("aggregateReadings", () => {
  const window = dayWindow("2024-01-01");

  it("averages each parameter over the readings in the window", () => {
    const result = aggregateReadings(
      [
        reading(at("2024-01-01T03:00:00Z"), 7.0, 300, 1, 20),
        reading(at("2024-01-01T09:00:00Z"), 7.2, 350, 2, 22),
        reading(at("2024-01-01T15:00:00Z"), 7.4, 400, 3, 24),
      ],
      window
    );

    expect(result).not.toBeNull();
    expect(result?.readingCount).toBe(3);
    expect(result?.avgPh).toBeCloseTo(7.2, 10);
    expect(result?.avgTds).toBeCloseTo(350, 10);
    expect(result?.avgTurbidity).toBeCloseTo(2, 10);
    expect(result?.avgTemperature).toBeCloseTo(22, 10);
  });

  it("includes readings exactly on both window edges", () => {
    const result = aggregateReadings(
      [reading(window.startMs, 6.0), reading(window.endMs, 8.0)],
      window
    );

    expect(result?.readingCount).toBe(2);
    expect(result?.avgPh).toBe(7);
  });

  it("excludes readings outside the window", () => {
    const result = aggregateReadings(
      [
        reading(window.startMs - 1, 1.0),
        reading(at("2024-01-01T12:00:00Z"), 7.0),
        reading(window.endMs + 1, 13.0),
      ],
      window
    );

    expect(result?.readingCount).toBe(1);
    expect(result?.avgPh).toBe(7);
  });

  it("returns null when no reading falls in the window", () => {
    expect(aggregateReadings([], window)).toBeNull();
    expect(aggregateReadings([reading(at("2024-01-02T00:00:00Z"), 7.0)], window)).toBeNull();
  });
});
