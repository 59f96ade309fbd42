/**
 * Finds route files in the plans directory that belong to a leg.
 */

import type { Leg } from "@/types/flight-plan";
import type {
  RouteFileCandidate,
  RouteFileFormat,
} from "@/types/route-file";
import type { PlanFileInfo, PlansStorage } from "@/lib/storage/plans-storage";

/**
 * Split a file name into stem and route-file format.
 * Returns null for anything that is not .fms or .fmx.
 */
export function splitRouteFileName(
  fileName: string
): { stem: string; format: RouteFileFormat } | null {
  const match = /^(.+)\.(fms|fmx)$/i.exec(fileName);
  if (!match) return null;
  const format: RouteFileFormat =
    match[2].toLowerCase() === "fmx" ? "fmx" : "fms";
  return { stem: match[1], format };
}

/**
 * Whether a file name names a route for the leg: the origin code, then
 * the destination code somewhere after it ("KJFKKLAX", "KJFK-KLAX_02").
 * The reverse leg never matches.
 */
export function matchesLeg(stem: string, leg: Leg): boolean {
  const upper = stem.toUpperCase();
  const originIndex = upper.indexOf(leg.originIcao);
  if (originIndex === -1) return false;
  return upper.indexOf(leg.destinationIcao, originIndex + 4) !== -1;
}

export function toCandidate(
  file: PlanFileInfo,
  leg: Leg
): RouteFileCandidate | null {
  const parts = splitRouteFileName(file.name);
  if (!parts || !matchesLeg(parts.stem, leg)) return null;
  return {
    path: file.path,
    fileName: file.name,
    createdAt: file.createdAt,
    originIcao: leg.originIcao,
    destinationIcao: leg.destinationIcao,
    format: parts.format,
    sourceKind: parts.format === "fms" ? "provider" : "third-party",
  };
}

/**
 * All route files for the leg, newest first.
 */
export async function findRouteFileCandidates(
  storage: PlansStorage,
  leg: Leg
): Promise<RouteFileCandidate[]> {
  const files = await storage.list();
  return files
    .map((file) => toCandidate(file, leg))
    .filter((candidate): candidate is RouteFileCandidate => candidate !== null)
    .sort(
      (a, b) =>
        b.createdAt.getTime() - a.createdAt.getTime() ||
        a.fileName.localeCompare(b.fileName)
    );
}
