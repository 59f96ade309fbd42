import type { Leg } from "./flight-plan";

/** .fms files come from SimBrief, .fmx files from other planning tools */
export type RouteFileFormat = "fms" | "fmx";

export type RouteFileSource = "provider" | "third-party";

export const ROUTE_FILE_EXTENSIONS: Record<RouteFileFormat, string> = {
  fms: ".fms",
  fmx: ".fmx",
};

/**
 * A route file on disk that belongs to the current leg.
 * Rediscovered every cycle; never cached.
 */
export interface RouteFileCandidate extends Leg {
  path: string;
  fileName: string;
  /** Creation time; replacement policy never looks at mtime */
  createdAt: Date;
  sourceKind: RouteFileSource;
  format: RouteFileFormat;
}

export interface ExistingRouteFile {
  candidate: RouteFileCandidate;
  content: string;
}

/** SimBrief's own .fms file for the leg, or why it could not be fetched */
export type ProviderRouteFile =
  | { ok: true; content: string }
  | { ok: false; error: string };

export type SynthesisAction = "created" | "augmented" | "kept";

/** What a reconcile pass did to the route file, seen from the leg */
export type ReconcileAction = SynthesisAction | "replaced";

export interface RouteFileResult {
  action: SynthesisAction;
  fileName: string;
  /** File name without extension; also names the uplink file */
  stem: string;
  content: string;
  /** Whether the caller has to write content to disk */
  changed: boolean;
  warnings: string[];
}
