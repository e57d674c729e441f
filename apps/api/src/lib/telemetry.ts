import { z } from "zod";

import { ValidationError } from "./errors.js";
import type { NewReading } from "../types/sensor.js";

const measurement = (name: string) =>
  z.number({ required_error: `${name} is required`, invalid_type_error: `${name} must be a number` }).finite();

const timestamp = z.union([
  z.number().int().nonnegative(),
  z
    .string()
    .datetime({ offset: true })
    .transform((value) => Date.parse(value)),
]);

export const ReadingInput = z.object({
  ph: measurement("ph").min(0).max(14),
  tds: measurement("tds").nonnegative(),
  turbidity: measurement("turbidity").nonnegative(),
  temperature: measurement("temperature").min(-50).max(100),
  ts: timestamp.optional(),
});
export type ReadingInput = z.infer<typeof ReadingInput>;

/**
 * Validates an ingestion payload. Throws ValidationError listing every
 * offending field.
 */
export function parseReadingInput(payload: unknown, source: string | null = null): NewReading {
  const result = ReadingInput.safeParse(payload);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path.join(".") || "(root)",
      message: issue.message,
    }));
    throw new ValidationError("Invalid sensor reading", issues);
  }
  return { ...result.data, source };
}

function pick(p: Record<string, unknown>, keys: string[]): unknown {
  for (const key of keys) {
    if (p[key] !== undefined) return p[key];
  }
  return undefined;
}

function toNumber(value: unknown): unknown {
  if (typeof value === "string" && value.trim() !== "") {
    const n = Number(value);
    return Number.isFinite(n) ? n : value;
  }
  return value;
}

// Devices publish with a few field-name variants and sometimes stringified
// numbers; normalise before validating.
export function parseDeviceTelemetry(payload: unknown, source: string | null): NewReading {
  if (!payload || typeof payload !== "object" || Array.isArray(payload)) {
    throw new ValidationError("Telemetry payload must be a JSON object", [
      { path: "(root)", message: "Expected object" },
    ]);
  }
  const p = payload as Record<string, unknown>;

  return parseReadingInput(
    {
      ph: toNumber(pick(p, ["ph", "pH"])),
      tds: toNumber(pick(p, ["tds"])),
      turbidity: toNumber(pick(p, ["turbidity", "ntu"])),
      temperature: toNumber(pick(p, ["temperature", "temp", "tempC"])),
      ts: pick(p, ["ts"]),
    },
    source
  );
}
