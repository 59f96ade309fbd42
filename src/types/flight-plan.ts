/**
 * Normalized flight plan data extracted from one SimBrief OFP.
 */

/** Tagged layout variants the parser knows how to read */
export type LayoutKind = "lido" | "ual" | "dal" | "swa" | "klm" | "no-winds";

/**
 * One row of the descent forecast table.
 * Temperature is null for layouts that only publish wind.
 */
export interface DescentWind {
  altitudeFt: number;
  directionDeg: number;
  speedKt: number;
  temperatureC: number | null;
}

/** SID or STAR reference, e.g. GREKI4 with the GREKI transition */
export interface Procedure {
  name: string;
  transition?: string;
}

/** X-Plane route file entry codes */
export type WaypointKind = "airport" | "ndb" | "vor" | "fix" | "latlon";

/**
 * One entry of the route file's waypoint list. Inner SID and STAR fixes
 * are left out; the procedures are named in the header instead.
 */
export interface RouteWaypoint {
  ident: string;
  kind: WaypointKind;
  /** ADEP, ADES, DRCT or an airway */
  via: string;
  altitudeFt: number;
  latitude: number;
  longitude: number;
}

export interface Leg {
  originIcao: string;
  destinationIcao: string;
}

export interface FlightPlanRecord extends Leg {
  pilotId: string;
  ofpId: string;
  /** When SimBrief generated the OFP (not a file time) */
  issuedAt: Date;
  layout: LayoutKind;
  declaredLayout: string | null;
  route: readonly string[];
  waypoints: readonly RouteWaypoint[];
  /** SimBrief's own X-Plane route file for this OFP */
  routeFileUrl: string | null;
  /** AIRAC cycle the OFP was planned with, e.g. "2510" */
  airacCycle: string | null;
  descentWinds: readonly DescentWind[];
  departureProcedure?: Procedure;
  arrivalProcedure?: Procedure;
  departureRunway?: string;
  arrivalRunway?: string;
  /** Destination ISA deviation in whole degrees C */
  destinationIsaDeviation: number;
  destinationMetar: string | null;
  warnings: readonly string[];
}

export function isSameLeg(a: Leg, b: Leg): boolean {
  return (
    a.originIcao === b.originIcao && a.destinationIcao === b.destinationIcao
  );
}

export function formatLeg(leg: Leg): string {
  return `${leg.originIcao} → ${leg.destinationIcao}`;
}
