import { describe, expect, it } from "vitest";

import { ValidationError } from "./errors.js";
import { parseDeviceTelemetry, parseReadingInput } from "./telemetry.js";

function catchValidation(fn: () => unknown): ValidationError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ValidationError) return err;
    throw err;
  }
  throw new Error("expected ValidationError");
}

describe("parseReadingInput", () => {
  it("accepts a complete reading without a timestamp", () => {
    expect(parseReadingInput({ ph: 7.2, tds: 350.5, turbidity: 2.8, temperature: 25.3 })).toEqual({
      ph: 7.2,
      tds: 350.5,
      turbidity: 2.8,
      temperature: 25.3,
      source: null,
    });
  });

  it("converts ISO timestamps to epoch ms", () => {
    const reading = parseReadingInput({ ph: 7, tds: 300, turbidity: 2, temperature: 25, ts: "2024-01-01T06:00:00Z" }, "http");
    expect(reading.ts).toBe(Date.UTC(2024, 0, 1, 6));
    expect(reading.source).toBe("http");
  });

  it("keeps epoch ms timestamps", () => {
    expect(parseReadingInput({ ph: 7, tds: 300, turbidity: 2, temperature: 25, ts: 1_700_000_000_000 }).ts).toBe(
      1_700_000_000_000
    );
  });

  it("lists every missing or malformed field", () => {
    const err = catchValidation(() => parseReadingInput({ ph: "7", tds: 300 }));
    expect(err.issues.map((i) => i.path)).toEqual(["ph", "turbidity", "temperature"]);
    expect(err.issues[1].message).toBe("turbidity is required");
  });

  it("rejects out-of-range values", () => {
    const err = catchValidation(() => parseReadingInput({ ph: 15, tds: -1, turbidity: 2, temperature: 25 }));
    expect(err.issues.map((i) => i.path)).toEqual(["ph", "tds"]);
  });

  it("rejects non-object payloads", () => {
    const err = catchValidation(() => parseReadingInput(null));
    expect(err.issues[0].path).toBe("(root)");
  });
});

describe("parseDeviceTelemetry", () => {
  it("accepts field aliases and stringified numbers", () => {
    expect(parseDeviceTelemetry({ pH: "6.9", tds: 280, ntu: "1.2", tempC: 21 }, "/device/probe-1/telemetry")).toEqual({
      ph: 6.9,
      tds: 280,
      turbidity: 1.2,
      temperature: 21,
      source: "/device/probe-1/telemetry",
    });
  });

  it("rejects arrays", () => {
    expect(() => parseDeviceTelemetry([1, 2, 3], null)).toThrow(ValidationError);
  });
});
