import { z } from "zod";

/**
 * SensorReadingV1
 *
 * One tuple of water-quality measurements. The kernel treats every field as an
 * ordinary number; range checks live only in the HTTP admission schema below.
 */
export type SensorReadingV1 = {
  ph: number;
  temp: number; // °C
  tds: number; // ppm
  turb: number; // NTU
  flow: number; // 0 = stagnant under "flag" mode; a rate under "rate" mode
};

// Physical admission ranges (inclusive).
export const READING_RANGES_V1 = {
  ph: { min: 0, max: 14 },
  temp: { min: -40, max: 120 },
  tds: { min: 0, max: 100000 },
  turb: { min: 0, max: 100000 },
} as const;

export const SiteIdZ = z.string().regex(/^[A-Za-z0-9_.-]{1,64}$/, "site_id must be 1-64 chars of [A-Za-z0-9_.-]");

function boundedNumber(range: { min: number; max: number }) {
  return z.number().finite().min(range.min).max(range.max);
}

/**
 * Request body of POST /predict.
 *
 * Unknown keys (device timestamps, extra sensors) are dropped, not rejected.
 */
export const SensorReadingInputV1Z = z
  .object({
    ph: boundedNumber(READING_RANGES_V1.ph),
    temp: boundedNumber(READING_RANGES_V1.temp),
    tds: boundedNumber(READING_RANGES_V1.tds),
    turb: boundedNumber(READING_RANGES_V1.turb),
    flow: z.number().int().nonnegative(),
    site_id: SiteIdZ.optional(),
  })
  .strip();

export type SensorReadingInputV1 = z.infer<typeof SensorReadingInputV1Z>;

export function toSensorReading(input: SensorReadingInputV1): SensorReadingV1 {
  return { ph: input.ph, temp: input.temp, tds: input.tds, turb: input.turb, flow: input.flow };
}

// Replay files carry readings without admission ranges, matching what the kernel accepts.
export const SensorReadingV1Z = z.object({
  ph: z.number(),
  temp: z.number(),
  tds: z.number(),
  turb: z.number(),
  flow: z.number(),
});

// One line of a replay file: a reading plus the optional time it was taken.
export const ReplayLineV1Z = SensorReadingV1Z.extend({
  ts: z.string().datetime({ offset: true }).optional(),
});
