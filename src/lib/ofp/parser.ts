/**
 * OFP document → FlightPlanRecord.
 *
 * Unusable documents (no layout, no leg, no route, no timestamp) are
 * rejected; a template that prints no descent winds is not an error.
 */

import type {
  FlightPlanRecord,
  Leg,
  Procedure,
  RouteWaypoint,
  WaypointKind,
} from "@/types/flight-plan";
import { ParseError, type ParseErrorCode } from "@/lib/error-utils";
import {
  decodeOfpDocument,
  type AirportSection,
  type NavlogFix,
  type OfpDocument,
} from "./envelope";
import { detectLayout } from "./layouts";
import { normalizeLineEndings } from "./wind-tokens";

export interface ParseOptions {
  /** Overrides the layout the document declares */
  layoutHint?: string;
  /** Used when the document does not name its SimBrief user */
  pilotId?: string;
}

export type ParseResult =
  | { ok: true; record: FlightPlanRecord }
  | { ok: false; error: ParseError };

const ICAO_PATTERN = /^[A-Z]{4}$/;

const WAYPOINT_KINDS = new Map<string, WaypointKind>([
  ["apt", "airport"],
  ["ndb", "ndb"],
  ["vor", "vor"],
  ["wpt", "fix"],
  ["ltlg", "latlon"],
]);

function fail(code: ParseErrorCode, message: string): ParseResult {
  return { ok: false, error: new ParseError(code, message) };
}

export function parseDocument(
  raw: string,
  options: ParseOptions = {}
): ParseResult {
  const decoded = decodeOfpDocument(raw);
  if (!decoded.ok) {
    return fail("unreadable", `Unreadable OFP: ${decoded.error}`);
  }
  const doc = decoded.document;

  const planHtml = normalizeLineEndings(doc.text?.plan_html ?? "");
  const declaredLayout = doc.params?.ofp_layout?.trim() || null;
  const detection = detectLayout(
    options.layoutHint ?? declaredLayout,
    planHtml
  );
  if (!detection.ok) {
    return { ok: false, error: detection.error };
  }
  const { variant } = detection;

  const originIcao = normalizeIcao(doc.origin?.icao_code);
  const destinationIcao = normalizeIcao(doc.destination?.icao_code);
  if (!originIcao || !destinationIcao) {
    return fail("missing-leg", "OFP has no origin or destination airport");
  }
  if (originIcao === destinationIcao) {
    return fail(
      "missing-leg",
      `OFP origin and destination are both ${originIcao}`
    );
  }

  const route = tokenizeRoute(doc.general?.route);
  if (route.length === 0) {
    return fail("missing-route", "OFP has no route");
  }

  const generatedAt = Number(doc.params?.time_generated);
  if (!doc.params?.time_generated || !Number.isFinite(generatedAt)) {
    return fail("missing-timestamp", "OFP has no generation time");
  }

  const warnings: string[] = [];
  const descentWinds = variant.extractWinds(planHtml);
  if (descentWinds.length === 0 && variant.kind !== "no-winds") {
    warnings.push(`No descent winds found in the ${variant.kind} layout`);
  }

  const fixes = doc.navlog?.fix ?? [];
  const departureProcedure = findDeparture(fixes, originIcao);
  const arrivalProcedure = findArrival(fixes, destinationIcao);
  const routeFileUrl = findRouteFileUrl(doc);
  const { waypoints, unplaced } = findWaypoints(
    doc,
    fixes,
    { originIcao, destinationIcao },
    [departureProcedure?.transition, arrivalProcedure?.transition]
  );
  if (unplaced.length > 0 && !routeFileUrl) {
    warnings.push(
      `No coordinates for ${unplaced.join(", ")}; left out of the route file`
    );
  }

  const record: FlightPlanRecord = {
    originIcao,
    destinationIcao,
    pilotId: doc.params?.user_id ?? options.pilotId ?? "",
    ofpId: doc.params?.request_id ?? String(generatedAt),
    issuedAt: new Date(generatedAt * 1000),
    layout: variant.kind,
    declaredLayout,
    route: Object.freeze(route),
    waypoints: Object.freeze(waypoints.map((point) => Object.freeze(point))),
    routeFileUrl,
    airacCycle: doc.params?.airac?.trim() || null,
    descentWinds: Object.freeze(
      descentWinds.map((wind) => Object.freeze(wind))
    ),
    departureProcedure,
    arrivalProcedure,
    departureRunway: normalizeRunway(doc.origin?.plan_rwy),
    arrivalRunway: normalizeRunway(doc.destination?.plan_rwy),
    destinationIsaDeviation: findDestinationIsa(doc, fixes, destinationIcao),
    destinationMetar: doc.destination?.metar?.trim() || null,
    warnings: Object.freeze(warnings),
  };

  return { ok: true, record: Object.freeze(record) };
}

function normalizeIcao(value: string | undefined): string | null {
  const code = value?.trim().toUpperCase() ?? "";
  return ICAO_PATTERN.test(code) ? code : null;
}

function normalizeRunway(value: string | undefined): string | undefined {
  const runway = value?.trim().toUpperCase();
  return runway ? runway : undefined;
}

export function tokenizeRoute(route: string | undefined): string[] {
  if (!route) return [];
  return route
    .toUpperCase()
    .split(/\s+/)
    .filter((token) => token.length > 0);
}

/** fms_downloads.directory + fms_downloads.xpe.link */
function findRouteFileUrl(doc: OfpDocument): string | null {
  const link = doc.fms_downloads?.xpe?.link?.trim();
  if (!link) return null;
  const url = `${doc.fms_downloads?.directory?.trim() ?? ""}${link}`;
  return URL.canParse(url) ? url : null;
}

function toNumber(value: string | undefined): number | null {
  if (value === undefined || value.trim() === "") return null;
  const number = Number(value);
  return Number.isFinite(number) ? number : null;
}

function airwayOrDirect(value: string | undefined): string {
  const via = value?.trim().toUpperCase();
  return via && via !== "DCT" && via !== "DIRECT" ? via : "DRCT";
}

/**
 * Waypoint list for a route file: origin, the SID exit, the enroute fixes,
 * the STAR entry and the destination. Points without coordinates cannot be
 * written and are returned as unplaced.
 */
function findWaypoints(
  doc: OfpDocument,
  fixes: NavlogFix[],
  leg: Leg,
  transitions: Array<string | undefined>
): { waypoints: RouteWaypoint[]; unplaced: string[] } {
  const waypoints: RouteWaypoint[] = [];
  const unplaced: string[] = [];

  const add = (
    point: Omit<RouteWaypoint, "altitudeFt" | "latitude" | "longitude">,
    altitude: string | undefined,
    lat: string | undefined,
    lon: string | undefined
  ) => {
    const latitude = toNumber(lat);
    const longitude = toNumber(lon);
    if (latitude === null || longitude === null) {
      unplaced.push(point.ident);
      return;
    }
    const altitudeFt = Math.round(toNumber(altitude) ?? 0);
    waypoints.push({ ...point, altitudeFt, latitude, longitude });
  };

  const addAirport = (
    ident: string,
    via: "ADEP" | "ADES",
    airport: AirportSection | undefined
  ) => {
    const fix = fixes.find((candidate) => candidate.ident === ident);
    add(
      { ident, kind: "airport", via },
      airport?.elevation ?? fix?.altitude_feet,
      airport?.pos_lat ?? fix?.pos_lat,
      airport?.pos_long ?? fix?.pos_long
    );
  };

  addAirport(leg.originIcao, "ADEP", doc.origin);
  for (const fix of fixes) {
    const ident = fix.ident?.trim().toUpperCase();
    if (!ident || ident === leg.originIcao || ident === leg.destinationIcao) {
      continue;
    }
    const procedure = isProcedureFix(fix);
    if (procedure && !transitions.includes(ident)) continue;
    add(
      {
        ident,
        kind: WAYPOINT_KINDS.get(fix.type?.trim().toLowerCase() ?? "") ?? "fix",
        via: procedure ? "DRCT" : airwayOrDirect(fix.via_airway),
      },
      fix.altitude_feet,
      fix.pos_lat,
      fix.pos_long
    );
  }
  addAirport(leg.destinationIcao, "ADES", doc.destination);

  return { waypoints, unplaced };
}

function isProcedureFix(fix: NavlogFix): boolean {
  return fix.is_sid_star === "1" && Boolean(fix.via_airway);
}

/**
 * SID: the leading run of procedure fixes. Its name is the airway the
 * fixes are flown on; its transition is the fix where the run ends.
 */
function findDeparture(
  fixes: NavlogFix[],
  originIcao: string
): Procedure | undefined {
  const run: NavlogFix[] = [];
  for (const fix of fixes) {
    if (fix.ident === originIcao) continue;
    if (!isProcedureFix(fix)) break;
    if (run.length > 0 && fix.via_airway !== run[0].via_airway) break;
    run.push(fix);
  }
  return procedureFromRun(run, run[run.length - 1]);
}

/**
 * STAR: the trailing run of procedure fixes before the destination.
 * Its transition is the fix where the run starts.
 */
function findArrival(
  fixes: NavlogFix[],
  destinationIcao: string
): Procedure | undefined {
  const run: NavlogFix[] = [];
  for (let i = fixes.length - 1; i >= 0; i--) {
    const fix = fixes[i];
    if (fix.ident === destinationIcao) continue;
    if (!isProcedureFix(fix)) break;
    if (run.length > 0 && fix.via_airway !== run[run.length - 1].via_airway) {
      break;
    }
    run.unshift(fix);
  }
  return procedureFromRun(run, run[0]);
}

function procedureFromRun(
  run: NavlogFix[],
  transitionFix: NavlogFix | undefined
): Procedure | undefined {
  const name = run[0]?.via_airway?.trim().toUpperCase();
  if (!name) return undefined;
  const transition = transitionFix?.ident?.trim().toUpperCase();
  return transition ? { name, transition } : { name };
}

/**
 * ISA deviation at the destination: the last navlog fix when it is the
 * destination, else the flight's average.
 */
function findDestinationIsa(
  doc: OfpDocument,
  fixes: NavlogFix[],
  destinationIcao: string
): number {
  const last = fixes[fixes.length - 1];
  const candidates = [
    last?.ident === destinationIcao ? last.oat_isa_dev : undefined,
    doc.general?.avg_temp_dev,
  ];
  for (const candidate of candidates) {
    const value = Number(candidate);
    if (candidate && Number.isFinite(value)) {
      return Math.round(value);
    }
  }
  return 0;
}
