/**
 * Reconcile job: brings the plans directory in line with a parsed OFP.
 *
 * Picks the newest route file for the leg, replaces it when it is stale
 * (with SimBrief's own file when it can be downloaded), otherwise keeps it
 * and fills in missing procedures. Then writes the uplink file next to it
 * under the same stem.
 */

import type { FlightPlanRecord } from "@/types/flight-plan";
import { formatLeg } from "@/types/flight-plan";
import type {
  ProviderRouteFile,
  ReconcileAction,
} from "@/types/route-file";
import type { ReconcileOutcome } from "@/types/sync";
import { getErrorMessage } from "@/lib/error-utils";
import type { PlansStorage } from "@/lib/storage/plans-storage";
import { findRouteFileCandidates } from "@/lib/route-files/candidates";
import {
  FRESHNESS_THRESHOLD_MS,
  shouldReplace,
} from "@/lib/route-files/freshness";
import { synthesizeRouteFile } from "@/lib/route-files/synthesizer";
import { buildUplinkFile } from "@/lib/uplink-writer";

export interface ReconcileOptions {
  now: Date;
  freshnessMs?: number;
  /** Fetches SimBrief's route file; without it the file is built locally */
  downloadRouteFile?: (url: string) => Promise<ProviderRouteFile>;
}

export async function reconcileLeg(
  record: FlightPlanRecord,
  storage: PlansStorage,
  options: ReconcileOptions
): Promise<ReconcileOutcome> {
  const {
    now,
    freshnessMs = FRESHNESS_THRESHOLD_MS,
    downloadRouteFile,
  } = options;

  try {
    const candidates = await findRouteFileCandidates(storage, record);
    const newest = candidates[0] ?? null;
    const replace = shouldReplace(newest, record, now, freshnessMs);

    const existing =
      newest && !replace
        ? { candidate: newest, content: await storage.read(newest.fileName) }
        : null;

    const provided =
      !existing && record.routeFileUrl && downloadRouteFile
        ? await downloadRouteFile(record.routeFileUrl)
        : null;

    const result = synthesizeRouteFile(record, existing, provided);
    if (result.changed) {
      await storage.write(result.fileName, result.content, {
        recreate: result.action === "created",
      });
    }

    const uplink = buildUplinkFile(record, result.stem);
    await storage.write(uplink.fileName, uplink.content, { recreate: true });

    const action: ReconcileAction =
      newest && replace ? "replaced" : result.action;
    console.log(
      `[Reconcile] ${formatLeg(record)}: route ${action} (${result.fileName}), uplink ${uplink.fileName}`
    );
    for (const warning of result.warnings) {
      console.warn(`[Reconcile] ${warning}`);
    }

    return { ok: true, stem: result.stem, action, warnings: result.warnings };
  } catch (err) {
    const error = getErrorMessage(err);
    console.error(`[Reconcile] ${formatLeg(record)} failed:`, error);
    return { ok: false, error: `Could not write plan files: ${error}` };
  }
}
