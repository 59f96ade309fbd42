/**
 * SimBrief fetcher API client.
 *
 * Returns the latest OFP for a pilot ID and downloads SimBrief's X-Plane
 * route file for it. Every failure is folded into a result so the sync
 * loop never sees an exception from here.
 */

import type { ProviderRouteFile } from "@/types/route-file";
import type { FetchOutcome } from "@/types/sync";
import { getErrorMessage } from "@/lib/error-utils";
import { decodeOfpDocument } from "@/lib/ofp/envelope";

export const DEFAULT_SIMBRIEF_URL =
  "https://www.simbrief.com/api/xml.fetcher.php";

const DEFAULT_TIMEOUT_MS = 10_000;

// SimBrief's answer when the user has not generated an OFP yet
const NO_FLIGHT_PLAN = /no flight plan/i;

// "I" (or "A") line, then "1100 Version"
const FMS_HEADER = /^[IA]\r?\n\d+ Version/;

export type DocumentFormat = "json" | "xml";

export interface SimbriefClientOptions {
  baseUrl?: string;
  format?: DocumentFormat;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

export interface FlightPlanFetcher {
  fetchLatest(pilotId: string): Promise<FetchOutcome>;
  downloadRouteFile(url: string): Promise<ProviderRouteFile>;
}

export function buildFetcherUrl(
  pilotId: string,
  baseUrl = DEFAULT_SIMBRIEF_URL,
  format: DocumentFormat = "json"
): string {
  const url = new URL(baseUrl);
  url.searchParams.set("userid", pilotId);
  if (format === "json") {
    url.searchParams.set("json", "1");
  }
  return url.toString();
}

export function createSimbriefClient(
  options: SimbriefClientOptions = {}
): FlightPlanFetcher {
  const {
    baseUrl = DEFAULT_SIMBRIEF_URL,
    format = "json",
    timeoutMs = DEFAULT_TIMEOUT_MS,
    fetchImpl = fetch,
  } = options;

  return {
    async fetchLatest(pilotId) {
      const url = buildFetcherUrl(pilotId, baseUrl, format);

      let response: Response;
      let body: string;
      try {
        response = await fetchImpl(url, {
          headers: {
            Accept: format === "json" ? "application/json" : "application/xml",
          },
          signal: AbortSignal.timeout(timeoutMs),
        });
        body = await response.text();
      } catch (err) {
        const message = getErrorMessage(err);
        console.warn("[SimBrief] Request failed:", message);
        return { kind: "transient-error", message };
      }

      if (response.status >= 500 || response.status === 429) {
        console.warn(`[SimBrief] Service returned HTTP ${response.status}`);
        return {
          kind: "transient-error",
          message: `SimBrief returned HTTP ${response.status}`,
        };
      }

      const decoded = decodeOfpDocument(body);
      if (!decoded.ok) {
        return {
          kind: "malformed",
          message: `Unreadable SimBrief response (HTTP ${response.status}): ${decoded.error}`,
        };
      }

      const status = decoded.document.fetch?.status?.trim() ?? "";
      if (response.ok && status.toLowerCase() === "success") {
        return {
          kind: "document",
          raw: body,
          ofpId: decoded.document.params?.request_id ?? null,
        };
      }

      if (NO_FLIGHT_PLAN.test(status)) {
        return { kind: "not-yet-available", message: status };
      }

      return {
        kind: "malformed",
        message: status
          ? `SimBrief: ${status}`
          : `Unexpected SimBrief response (HTTP ${response.status})`,
      };
    },

    async downloadRouteFile(url) {
      try {
        const response = await fetchImpl(url, {
          signal: AbortSignal.timeout(timeoutMs),
        });
        if (!response.ok) {
          const error = `HTTP ${response.status}`;
          console.warn("[SimBrief] Route file download failed:", error);
          return { ok: false, error };
        }
        const content = await response.text();
        if (!FMS_HEADER.test(content.trimStart())) {
          return { ok: false, error: "not an X-Plane route file" };
        }
        return { ok: true, content };
      } catch (err) {
        const error = getErrorMessage(err);
        console.warn("[SimBrief] Route file download failed:", error);
        return { ok: false, error };
      }
    },
  };
}
