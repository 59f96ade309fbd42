/**
 * Route file synthesis.
 *
 * Without a usable file for the leg a new <ORIG><DEST>.fms is made from
 * SimBrief's own route file when one was downloaded, else built from the
 * navlog. A kept file's route is never rewritten: at most its missing
 * procedure lines are filled in, and anything that cannot be merged
 * cleanly leaves the file as it is with a warning.
 */

import type { FlightPlanRecord } from "@/types/flight-plan";
import type {
  ExistingRouteFile,
  ProviderRouteFile,
  RouteFileResult,
} from "@/types/route-file";
import { ROUTE_FILE_EXTENSIONS } from "@/types/route-file";
import { splitRouteFileName } from "./candidates";
import {
  addProcedureLines,
  buildFmsFile,
  hasProcedureData,
} from "./route-file-format";

/** "KJFK" + "KLAX" → "KJFKKLAX" */
export function routeFileStem(record: FlightPlanRecord): string {
  return `${record.originIcao}${record.destinationIcao}`;
}

function createRouteFile(
  record: FlightPlanRecord,
  provided: ProviderRouteFile | null
): RouteFileResult {
  const stem = routeFileStem(record);
  const fileName = `${stem}${ROUTE_FILE_EXTENSIONS.fms}`;
  const created: RouteFileResult = {
    action: "created",
    fileName,
    stem,
    content: buildFmsFile(record),
    changed: true,
    warnings: [],
  };

  if (!provided) return created;
  if (!provided.ok) {
    return {
      ...created,
      warnings: [
        `SimBrief route file unavailable (${provided.error}); built ${fileName} from the navlog`,
      ],
    };
  }

  const augmented = addProcedureLines(provided.content, record);
  if (!augmented.ok) {
    return {
      ...created,
      content: provided.content,
      warnings: [`${fileName} procedures not added: ${augmented.reason}`],
    };
  }
  return { ...created, content: augmented.content };
}

/**
 * Pure: the same record, existing file and download always give the same
 * result. The download only matters when no file is kept.
 */
export function synthesizeRouteFile(
  record: FlightPlanRecord,
  existing: ExistingRouteFile | null,
  provided: ProviderRouteFile | null = null
): RouteFileResult {
  if (!existing) {
    return createRouteFile(record, provided);
  }

  const { candidate, content } = existing;
  const kept: RouteFileResult = {
    action: "kept",
    fileName: candidate.fileName,
    stem: splitRouteFileName(candidate.fileName)?.stem ?? candidate.fileName,
    content,
    changed: false,
    warnings: [],
  };

  if (!hasProcedureData(record)) {
    return kept;
  }

  if (candidate.format === "fmx") {
    return {
      ...kept,
      warnings: [
        `${candidate.fileName} has no procedure fields; SID/STAR not added`,
      ],
    };
  }

  const augmented = addProcedureLines(content, record);
  if (!augmented.ok) {
    return {
      ...kept,
      warnings: [`${candidate.fileName} left untouched: ${augmented.reason}`],
    };
  }

  if (augmented.added.length === 0) {
    return kept;
  }

  return {
    ...kept,
    action: "augmented",
    content: augmented.content,
    changed: true,
  };
}
