/**
 * Daemon configuration from environment variables.
 */

import path from "path";
import { z } from "zod";
import { formatZodError } from "@/lib/error-utils";
import { DEFAULT_SIMBRIEF_URL, type DocumentFormat } from "@/lib/simbrief-client";
import type { SyncRuntimeConfig } from "@/lib/sync/sync-runtime";

const SETTINGS_FILE_NAME = "ofpsync.prf";

const positiveMs = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const envSchema = z
  .object({
    OFP_SYNC_PLANS_DIR: z.string().min(1).optional(),
    OFP_SYNC_SETTINGS_FILE: z.string().min(1).optional(),
    OFP_SYNC_AIRCRAFT_STATE_FILE: z.string().min(1).optional(),
    OFP_SYNC_SUPPORTED_AIRFRAMES: z
      .string()
      .default("B737-800X")
      .transform((value) =>
        value
          .split(",")
          .map((marker) => marker.trim())
          .filter(Boolean)
      )
      .refine((markers) => markers.length > 0, {
        message: "At least one airframe marker is required",
      }),
    OFP_SYNC_DOCUMENT_FORMAT: z.enum(["json", "xml"]).default("json"),
    OFP_SYNC_SIMBRIEF_URL: z.string().url().default(DEFAULT_SIMBRIEF_URL),
    OFP_SYNC_TICK_MS: positiveMs(1_000),
    OFP_SYNC_POLL_BASE_MS: positiveMs(5_000),
    OFP_SYNC_POLL_MAX_MS: positiveMs(20_000),
    OFP_SYNC_STANDBY_PROBE_MS: positiveMs(60_000),
    OFP_SYNC_FETCH_TIMEOUT_MS: positiveMs(10_000),
    OFP_SYNC_FETCH_WARNING_THRESHOLD: z.coerce
      .number()
      .int()
      .positive()
      .default(3),
    OFP_SYNC_FRESHNESS_HOURS: z.coerce.number().positive().default(48),
  })
  .refine((env) => env.OFP_SYNC_POLL_MAX_MS >= env.OFP_SYNC_POLL_BASE_MS, {
    message: "Must be at least OFP_SYNC_POLL_BASE_MS",
    path: ["OFP_SYNC_POLL_MAX_MS"],
  });

export interface SyncConfig {
  plansDir: string | null;
  settingsFile: string | null;
  aircraftStateFile: string | null;
  simbriefUrl: string;
  documentFormat: DocumentFormat;
  tickMs: number;
  fetchTimeoutMs: number;
  runtime: SyncRuntimeConfig;
}

export type ConfigResult =
  | { success: true; config: SyncConfig }
  | { success: false; error: string };

export function loadConfig(
  env: Record<string, string | undefined> = process.env
): ConfigResult {
  // Empty variables count as unset
  const defined = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== "")
  );

  const parsed = envSchema.safeParse(defined);
  if (!parsed.success) {
    return { success: false, error: formatZodError(parsed.error) };
  }

  const values = parsed.data;
  const plansDir = values.OFP_SYNC_PLANS_DIR ?? null;
  const settingsFile =
    values.OFP_SYNC_SETTINGS_FILE ??
    (plansDir ? path.join(plansDir, "..", SETTINGS_FILE_NAME) : null);

  return {
    success: true,
    config: {
      plansDir,
      settingsFile,
      aircraftStateFile: values.OFP_SYNC_AIRCRAFT_STATE_FILE ?? null,
      simbriefUrl: values.OFP_SYNC_SIMBRIEF_URL,
      documentFormat: values.OFP_SYNC_DOCUMENT_FORMAT,
      tickMs: values.OFP_SYNC_TICK_MS,
      fetchTimeoutMs: values.OFP_SYNC_FETCH_TIMEOUT_MS,
      runtime: {
        supportedAirframes: values.OFP_SYNC_SUPPORTED_AIRFRAMES,
        pollBaseMs: values.OFP_SYNC_POLL_BASE_MS,
        pollMaxMs: values.OFP_SYNC_POLL_MAX_MS,
        standbyProbeMs: values.OFP_SYNC_STANDBY_PROBE_MS,
        fetchWarningThreshold: values.OFP_SYNC_FETCH_WARNING_THRESHOLD,
        freshnessMs: values.OFP_SYNC_FRESHNESS_HOURS * 60 * 60 * 1000,
      },
    },
  };
}
