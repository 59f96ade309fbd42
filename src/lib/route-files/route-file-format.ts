/**
 * Reading and writing the CO ROUTE file formats.
 *
 * .fms files (X-Plane 11 format, version 1100) carry a keyed header (ADEP,
 * SID, ADES, STAR, ...) followed by one line per waypoint: entry type,
 * ident, via, altitude, latitude and longitude.
 *
 *   I
 *   1100 Version
 *   CYCLE 2510
 *   ADEP KJFK
 *   DEPRWY RW04L
 *   SID RNGRR4
 *   SIDTRANS GREKI
 *   ADES KLAX
 *   STAR ANJLL4
 *   NUMENR 3
 *   1 KJFK ADEP 13.000000 40.639751 -73.778925
 *   11 GREKI DRCT 15000.000000 41.480000 -73.314000
 *   1 KLAX ADES 128.000000 33.942536 -118.408075
 *
 * .fmx files are a bare token list with no place for procedures.
 */

import type {
  FlightPlanRecord,
  RouteWaypoint,
  WaypointKind,
} from "@/types/flight-plan";

type ProcedureKey =
  | "DEPRWY"
  | "SID"
  | "SIDTRANS"
  | "DESRWY"
  | "STAR"
  | "STARTRANS";

type ProcedureLine = [key: ProcedureKey, value: string];

const ENTRY_TYPES: Record<WaypointKind, number> = {
  airport: 1,
  ndb: 2,
  vor: 3,
  fix: 11,
  latlon: 28,
};

const DEPARTURE_KEYS: ProcedureKey[] = ["DEPRWY", "SID", "SIDTRANS"];
const ARRIVAL_KEYS: ProcedureKey[] = ["DESRWY", "STAR", "STARTRANS"];

function formatRunway(runway: string): string {
  return runway.startsWith("RW") ? runway : `RW${runway}`;
}

function departureLines(record: FlightPlanRecord): ProcedureLine[] {
  const lines: ProcedureLine[] = [];
  if (record.departureRunway) {
    lines.push(["DEPRWY", formatRunway(record.departureRunway)]);
  }
  if (record.departureProcedure) {
    lines.push(["SID", record.departureProcedure.name]);
    if (record.departureProcedure.transition) {
      lines.push(["SIDTRANS", record.departureProcedure.transition]);
    }
  }
  return lines;
}

function arrivalLines(record: FlightPlanRecord): ProcedureLine[] {
  const lines: ProcedureLine[] = [];
  if (record.arrivalRunway) {
    lines.push(["DESRWY", formatRunway(record.arrivalRunway)]);
  }
  if (record.arrivalProcedure) {
    lines.push(["STAR", record.arrivalProcedure.name]);
    if (record.arrivalProcedure.transition) {
      lines.push(["STARTRANS", record.arrivalProcedure.transition]);
    }
  }
  return lines;
}

export function hasProcedureData(record: FlightPlanRecord): boolean {
  return departureLines(record).length + arrivalLines(record).length > 0;
}

export function formatWaypointLine(point: RouteWaypoint): string {
  return [
    ENTRY_TYPES[point.kind],
    point.ident,
    point.via,
    point.altitudeFt.toFixed(6),
    point.latitude.toFixed(6),
    point.longitude.toFixed(6),
  ].join(" ");
}

/**
 * Build a complete .fms file for the record from its navlog waypoints.
 * Used when SimBrief's own file for the leg is not available.
 */
export function buildFmsFile(record: FlightPlanRecord): string {
  const lines = [
    "I",
    "1100 Version",
    ...(record.airacCycle ? [`CYCLE ${record.airacCycle}`] : []),
    `ADEP ${record.originIcao}`,
    ...departureLines(record).map(([key, value]) => `${key} ${value}`),
    `ADES ${record.destinationIcao}`,
    ...arrivalLines(record).map(([key, value]) => `${key} ${value}`),
    `NUMENR ${record.waypoints.length}`,
    ...record.waypoints.map(formatWaypointLine),
  ];
  return lines.join("\n") + "\n";
}

export type AugmentResult =
  | { ok: true; content: string; added: string[] }
  | { ok: false; reason: string };

function keyPattern(key: string): RegExp {
  return new RegExp(`^\\s*${key}\\s+(\\S+)\\s*$`);
}

function findKey(
  lines: string[],
  key: string
): { index: number; value: string } | null {
  const pattern = keyPattern(key);
  for (let i = 0; i < lines.length; i++) {
    const match = pattern.exec(lines[i]);
    if (match) return { index: i, value: match[1] };
  }
  return null;
}

/**
 * Insert missing procedure lines into an existing .fms file.
 *
 * Lines go right after ADEP/ADES in canonical order; every other line is
 * left as it was, line endings included. A procedure line that already
 * exists with a different value is a conflict and nothing is changed.
 */
export function addProcedureLines(
  content: string,
  record: FlightPlanRecord
): AugmentResult {
  const eol = content.includes("\r\n") ? "\r\n" : "\n";
  const hadTrailingEol = content.endsWith(eol);
  const lines = content.split(/\r?\n/);
  if (hadTrailingEol) lines.pop();

  const adep = findKey(lines, "ADEP");
  const ades = findKey(lines, "ADES");
  if (!adep || !ades) {
    return { ok: false, reason: "no ADEP/ADES lines to anchor procedures" };
  }
  if (
    adep.value !== record.originIcao ||
    ades.value !== record.destinationIcao
  ) {
    return {
      ok: false,
      reason: `file is for ${adep.value} → ${ades.value}, not ${record.originIcao} → ${record.destinationIcao}`,
    };
  }

  const groups: Array<{
    anchor: string;
    keys: ProcedureKey[];
    wanted: ProcedureLine[];
  }> = [
    { anchor: "ADEP", keys: DEPARTURE_KEYS, wanted: departureLines(record) },
    { anchor: "ADES", keys: ARRIVAL_KEYS, wanted: arrivalLines(record) },
  ];

  // Check every group for conflicts before touching anything
  for (const { wanted } of groups) {
    for (const [key, value] of wanted) {
      const existing = findKey(lines, key);
      if (existing && existing.value !== value) {
        return {
          ok: false,
          reason: `${key} is ${existing.value} but the OFP has ${value}`,
        };
      }
    }
  }

  const added: string[] = [];
  for (const { anchor, keys, wanted } of groups) {
    for (const [key, value] of wanted) {
      if (findKey(lines, key)) continue;
      // After the anchor or the last earlier key of the group present
      const earlierKeys = [anchor, ...keys.slice(0, keys.indexOf(key))];
      const insertAfter = Math.max(
        ...earlierKeys.map((earlier) => findKey(lines, earlier)?.index ?? -1)
      );
      lines.splice(insertAfter + 1, 0, `${key} ${value}`);
      added.push(`${key} ${value}`);
    }
  }

  const updated = lines.join(eol) + (hadTrailingEol ? eol : "");
  return { ok: true, content: updated, added };
}
