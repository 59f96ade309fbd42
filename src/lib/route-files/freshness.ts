import { isSameLeg, type Leg } from "@/types/flight-plan";
import type { RouteFileCandidate } from "@/types/route-file";

/** Route files older than this are replaced by a fresh SimBrief route */
export const FRESHNESS_THRESHOLD_MS = 48 * 60 * 60 * 1000;

/**
 * Decide whether the route file for a leg must be replaced.
 *
 * A recent file is kept even if it came from another planning tool, so
 * hand-built routes with procedures survive. Age is measured from the
 * file's creation time; at exactly the threshold the file is stale.
 */
export function shouldReplace(
  candidate: RouteFileCandidate | null,
  leg: Leg,
  now: Date,
  thresholdMs = FRESHNESS_THRESHOLD_MS
): boolean {
  if (!candidate) return true;
  if (!isSameLeg(candidate, leg)) return true;
  return now.getTime() - candidate.createdAt.getTime() >= thresholdMs;
}
