/**
 * Aircraft state snapshot written by a simulator bridge.
 *
 * The bridge dumps the datarefs the sync loop needs as JSON, either flat
 * or wrapped as { type, payload }:
 *
 *   {
 *     "airframe": "Aircraft/B737-800X/b738.acf",
 *     "gearOnGround": [true, true, true],
 *     "enginesRunning": [0, 0],
 *     "dep_icao": "KJFK",
 *     "arr_icao": "KLAX"
 *   }
 */

import { readFile } from "fs/promises";
import { z } from "zod";
import type { AircraftState } from "@/types/sync";
import { formatZodError, getErrorMessage } from "@/lib/error-utils";

const icao = z
  .string()
  .transform((value) => value.trim().toUpperCase())
  .pipe(z.string().regex(/^[A-Z]{4}$/))
  .optional()
  .catch(undefined);

const snapshotSchema = z
  .object({
    airframe: z.string().nullable().default(null),
    onGround: z.boolean().optional(),
    // Per-gear weight-on-wheels flags
    gearOnGround: z.array(z.boolean()).optional(),
    // Per-engine running flags; the simulator reports 0/1
    enginesRunning: z
      .array(z.union([z.boolean(), z.number()]))
      .default([])
      .transform((values) => values.map((value) => Boolean(value))),
    departureIcao: icao,
    arrivalIcao: icao,
    dep_icao: icao,
    arr_icao: icao,
  })
  .refine(
    (snapshot) =>
      snapshot.onGround !== undefined || snapshot.gearOnGround !== undefined,
    { message: "onGround or gearOnGround is required", path: ["onGround"] }
  );

const messageSchema = z.union([
  z.object({ type: z.string().optional(), payload: snapshotSchema }),
  snapshotSchema,
]);

export type SnapshotResult =
  | { success: true; aircraft: AircraftState }
  | { success: false; error: string };

/**
 * Validate a decoded snapshot and map it onto AircraftState.
 */
export function toAircraftState(value: unknown): SnapshotResult {
  const parsed = messageSchema.safeParse(value);
  if (!parsed.success) {
    return { success: false, error: formatZodError(parsed.error) };
  }

  const snapshot = "payload" in parsed.data ? parsed.data.payload : parsed.data;
  const gear = snapshot.gearOnGround;
  const onGround =
    snapshot.onGround ??
    (gear !== undefined && gear.length > 0 && gear.every(Boolean));

  const originIcao = snapshot.departureIcao ?? snapshot.dep_icao;
  const destinationIcao = snapshot.arrivalIcao ?? snapshot.arr_icao;

  const aircraft: AircraftState = {
    airframe: snapshot.airframe,
    onGround,
    enginesRunning: snapshot.enginesRunning,
  };
  if (originIcao && destinationIcao) {
    aircraft.plannedLeg = { originIcao, destinationIcao };
  }
  return { success: true, aircraft };
}

/**
 * Read the bridge's snapshot file. Anything unreadable means no aircraft.
 */
export async function readAircraftState(
  file: string
): Promise<AircraftState | null> {
  let json: unknown;
  try {
    json = JSON.parse(await readFile(file, "utf8"));
  } catch (err) {
    console.warn(`[Aircraft] Cannot read ${file}:`, getErrorMessage(err));
    return null;
  }

  const result = toAircraftState(json);
  if (!result.success) {
    console.warn(`[Aircraft] Invalid snapshot in ${file}: ${result.error}`);
    return null;
  }
  return result.aircraft;
}
