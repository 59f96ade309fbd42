/**
 * Builders for SimBrief fetcher responses used across the tests.
 */

import { XMLBuilder } from "fast-xml-parser";
import type { FlightPlanRecord, RouteWaypoint } from "@/types/flight-plan";

export interface FixtureFix {
  ident: string;
  type?: string;
  via_airway: string;
  is_sid_star: string;
  altitude_feet?: string;
  pos_lat?: string;
  pos_long?: string;
  oat_isa_dev?: string;
}

interface FixtureAirport {
  icao_code: string;
  plan_rwy: string;
  elevation: string;
  pos_lat: string;
  pos_long: string;
}

export interface OfpFixture {
  fetch: { status: string };
  params: {
    request_id: string;
    user_id: string;
    time_generated: string;
    ofp_layout: string;
    airac: string;
  };
  general: { route: string; avg_temp_dev: string };
  origin: FixtureAirport;
  destination: FixtureAirport & { metar: string };
  navlog: { fix: FixtureFix[] };
  text: { plan_html: string };
  fms_downloads: {
    directory: string;
    xpe: { name: string; link: string };
  };
}

/** Generation time of the default fixture: 2025-10-19T16:26:40Z */
export const GENERATED_AT = 1760891200;

export const LIDO_PLAN_HTML = [
  "<pre><b>[ OFP ]</b>",
  "KJFK-KLAX",
  "--------------------------------------------------------------------",
  " WIND INFORMATION ",
  "CLIMB             CRUISE            DESCENT",
  "050 240/015 +08   350 300/085 -54   350 290/060 -52",
  "100 250/025 -02   370 305/090 -56   240 280/045 -31",
  "180 260/040 -18   390 310/080 -55   100 260/020 -05",
  "",
  "END OF WIND INFORMATION</pre>",
].join("\n");

export const UAL_PLAN_HTML = [
  "<pre>DESCENT WINDS</pre>",
  "<table>",
  "<tr><th>FL350</th><td>290/060</td><td>-52</td></tr>",
  "<tr><th>FL240</th><td>280/045</td></tr>",
  "<tr><th>10000</th><td>260/020</td><td>M05</td></tr>",
  "</table>",
  "STARTFWZPAD",
].join("\n");

export const DAL_PLAN_HTML = [
  "<pre>DESCENT FORECAST WINDS",
  "  35000  24000  10000  5000",
  "  29060  28045  26020  24010",
  "****************************</pre>",
].join("\n");

export const SWA_PLAN_HTML = [
  "<pre>DESCENT WINDS",
  "  FL350      FL240      10000",
  "  29/060M52  28/045M31  26/020P05",
  "",
  "FUEL SUMMARY</pre>",
].join("\n");

export const KLM_PLAN_HTML = [
  "<pre>CRZ ALT FL350 290/060",
  "FL240 280/045",
  "FL100 260/020",
  "DEFRTE KJFK KLAX</pre>",
].join("\n");

function fix(
  ident: string,
  type: string,
  via: string,
  sidStar: boolean,
  altitude: string,
  lat: string,
  lon: string
): FixtureFix {
  return {
    ident,
    type,
    via_airway: via,
    is_sid_star: sidStar ? "1" : "0",
    altitude_feet: altitude,
    pos_lat: lat,
    pos_long: lon,
  };
}

export const DEFAULT_FIXES: FixtureFix[] = [
  fix("KJFK", "apt", "", false, "13", "40.639751", "-73.778925"),
  fix("RNGRR", "wpt", "RNGRR4", true, "9000", "40.5", "-74.1"),
  fix("GREKI", "wpt", "RNGRR4", true, "15000", "41.48", "-73.314"),
  fix("HECTOR", "vor", "J60", false, "35000", "34.797", "-116.462"),
  fix("DSNEE", "wpt", "ANJLL4", true, "11000", "34.1", "-117.6"),
  fix("ANJLL", "wpt", "ANJLL4", true, "7000", "33.99", "-117.9"),
  {
    ...fix("KLAX", "apt", "", false, "128", "33.942536", "-118.408075"),
    oat_isa_dev: "5",
  },
];

export const ROUTE_FILE_URL =
  "https://www.simbrief.com/ofp/flightplans/KJFKKLAX_XP11_1760891200.fms";

export interface FixtureOverrides {
  requestId?: string;
  layout?: string;
  origin?: string;
  destination?: string;
  route?: string;
  planHtml?: string;
  fixes?: FixtureFix[];
  timeGenerated?: string;
  status?: string;
  departureRunway?: string;
  arrivalRunway?: string;
  /** fms_downloads.xpe.link; "" for an OFP without one */
  routeFileLink?: string;
}

export function buildOfp(overrides: FixtureOverrides = {}): OfpFixture {
  return {
    fetch: { status: overrides.status ?? "Success" },
    params: {
      request_id: overrides.requestId ?? "1001",
      user_id: "123456",
      time_generated: overrides.timeGenerated ?? String(GENERATED_AT),
      ofp_layout: overrides.layout ?? "LIDO",
      airac: "2510",
    },
    general: {
      route: overrides.route ?? "RNGRR4 GREKI J60 HECTOR ANJLL4",
      avg_temp_dev: "-3",
    },
    origin: {
      icao_code: overrides.origin ?? "KJFK",
      plan_rwy: overrides.departureRunway ?? "04L",
      elevation: "13",
      pos_lat: "40.639751",
      pos_long: "-73.778925",
    },
    destination: {
      icao_code: overrides.destination ?? "KLAX",
      plan_rwy: overrides.arrivalRunway ?? "24R",
      elevation: "128",
      pos_lat: "33.942536",
      pos_long: "-118.408075",
      metar: "KLAX 191753Z 25010KT 10SM FEW020 18/12 A2992",
    },
    navlog: { fix: overrides.fixes ?? DEFAULT_FIXES },
    text: { plan_html: overrides.planHtml ?? LIDO_PLAN_HTML },
    fms_downloads: {
      directory: "https://www.simbrief.com/ofp/flightplans/",
      xpe: {
        name: "X-Plane 11",
        link: overrides.routeFileLink ?? "KJFKKLAX_XP11_1760891200.fms",
      },
    },
  };
}

export function toJson(ofp: OfpFixture): string {
  return JSON.stringify(ofp);
}

const xmlBuilder = new XMLBuilder({});

export function toXml(ofp: OfpFixture): string {
  return `<?xml version="1.0" encoding="UTF-8"?>${xmlBuilder.build({ OFP: ofp })}`;
}

/** Waypoints the parser derives from DEFAULT_FIXES */
export const DEFAULT_WAYPOINTS: RouteWaypoint[] = [
  {
    ident: "KJFK",
    kind: "airport",
    via: "ADEP",
    altitudeFt: 13,
    latitude: 40.639751,
    longitude: -73.778925,
  },
  {
    ident: "GREKI",
    kind: "fix",
    via: "DRCT",
    altitudeFt: 15000,
    latitude: 41.48,
    longitude: -73.314,
  },
  {
    ident: "HECTOR",
    kind: "vor",
    via: "J60",
    altitudeFt: 35000,
    latitude: 34.797,
    longitude: -116.462,
  },
  {
    ident: "DSNEE",
    kind: "fix",
    via: "DRCT",
    altitudeFt: 11000,
    latitude: 34.1,
    longitude: -117.6,
  },
  {
    ident: "KLAX",
    kind: "airport",
    via: "ADES",
    altitudeFt: 128,
    latitude: 33.942536,
    longitude: -118.408075,
  },
];

/** X-Plane route file as SimBrief serves it, CRLF endings included */
export const PROVIDER_FMS = [
  "I",
  "1100 Version",
  "CYCLE 2510",
  "ADEP KJFK",
  "ADES KLAX",
  "NUMENR 3",
  "1 KJFK ADEP 13.000000 40.639751 -73.778925",
  "3 HECTOR J60 35000.000000 34.797000 -116.462000",
  "1 KLAX ADES 128.000000 33.942536 -118.408075",
  "",
].join("\r\n");

export function buildRecord(
  overrides: Partial<FlightPlanRecord> = {}
): FlightPlanRecord {
  return {
    originIcao: "KJFK",
    destinationIcao: "KLAX",
    pilotId: "123456",
    ofpId: "1001",
    issuedAt: new Date(GENERATED_AT * 1000),
    layout: "lido",
    declaredLayout: "LIDO",
    route: ["RNGRR4", "GREKI", "J60", "HECTOR", "ANJLL4"],
    waypoints: DEFAULT_WAYPOINTS,
    routeFileUrl: null,
    airacCycle: "2510",
    descentWinds: [
      { altitudeFt: 35000, directionDeg: 290, speedKt: 60, temperatureC: -52 },
      { altitudeFt: 24000, directionDeg: 280, speedKt: 45, temperatureC: -31 },
      { altitudeFt: 10000, directionDeg: 260, speedKt: 20, temperatureC: -5 },
    ],
    departureProcedure: { name: "RNGRR4", transition: "GREKI" },
    arrivalProcedure: { name: "ANJLL4", transition: "DSNEE" },
    departureRunway: "04L",
    arrivalRunway: "24R",
    destinationIsaDeviation: 5,
    destinationMetar: "KLAX 191753Z 25010KT 10SM FEW020 18/12 A2992",
    warnings: [],
    ...overrides,
  };
}
