#!/usr/bin/env npx tsx
import "dotenv/config";

/**
 * Keep the Zibo 737's FMS plans in step with the latest SimBrief OFP.
 *
 * Usage:
 *   npx tsx scripts/sync-daemon.ts --help                    # Show help
 *   npx tsx scripts/sync-daemon.ts                           # Run against env config
 *   npx tsx scripts/sync-daemon.ts --plans=<dir> --state=<file>
 *   npx tsx scripts/sync-daemon.ts --pilot=<id> --once       # Save ID, sync once
 *
 * Send SIGUSR2 to reload the OFP while parked at the gate.
 */

import path from "path";
import { loadConfig, type SyncConfig } from "../src/lib/config";
import { getErrorMessage } from "../src/lib/error-utils";
import { readAircraftState } from "../src/lib/aircraft-state-file";
import { parseDocument } from "../src/lib/ofp/parser";
import { readPilotId, savePilotId } from "../src/lib/settings-store";
import { createSimbriefClient } from "../src/lib/simbrief-client";
import { createFsPlansStorage } from "../src/lib/storage/plans-storage";
import { reconcileLeg } from "../src/lib/sync/reconcile";
import { SyncRuntime } from "../src/lib/sync/sync-runtime";
import type { SyncStatus } from "../src/types/sync";

// CLI argument types
interface ParsedArgs {
  plansDir?: string; // --plans=<dir>
  stateFile?: string; // --state=<file>
  pilotId?: string; // --pilot=<id>
  once: boolean; // --once
  verbose: boolean; // --verbose, -v
  help: boolean; // --help, -h
}

function printUsage(): void {
  console.log(`
Keep the Zibo 737's FMS plans in step with the latest SimBrief OFP.

Usage:
  npx tsx scripts/sync-daemon.ts [options]

Options:
  --plans=<dir>    X-Plane "Output/FMS plans" directory (OFP_SYNC_PLANS_DIR)
  --state=<file>   Aircraft state snapshot from the simulator bridge
                   (OFP_SYNC_AIRCRAFT_STATE_FILE)
  --pilot=<id>     Save the SimBrief pilot ID before starting
  --once           Fetch and write the current OFP once, then exit
  --verbose, -v    Log every tick's status
  --help, -h       Show this help message

Signals:
  SIGUSR2          Reload the OFP (only at the gate, engines off)
  SIGINT/SIGTERM   Stop

Examples:
  npx tsx scripts/sync-daemon.ts --plans="$HOME/X-Plane 12/Output/FMS plans" --state=/tmp/zibo.json
  npx tsx scripts/sync-daemon.ts --pilot=123456 --once
`);
}

function parseArgs(): ParsedArgs {
  const args = process.argv.slice(2);

  const parsed: ParsedArgs = {
    plansDir: undefined,
    stateFile: undefined,
    pilotId: undefined,
    once: false,
    verbose: false,
    help: false,
  };

  for (const arg of args) {
    if (arg === "--help" || arg === "-h") {
      parsed.help = true;
    } else if (arg === "--once") {
      parsed.once = true;
    } else if (arg === "--verbose" || arg === "-v") {
      parsed.verbose = true;
    } else if (arg.startsWith("--plans=")) {
      parsed.plansDir = arg.slice("--plans=".length);
    } else if (arg.startsWith("--state=")) {
      parsed.stateFile = arg.slice("--state=".length);
    } else if (arg.startsWith("--pilot=")) {
      parsed.pilotId = arg.slice("--pilot=".length);
    } else {
      console.error(`Unknown argument: ${arg}\n`);
      printUsage();
      process.exit(1);
    }
  }

  return parsed;
}

function formatStatus(status: SyncStatus): string {
  const leg =
    status.originIcao && status.destinationIcao
      ? ` ${status.originIcao} → ${status.destinationIcao}`
      : "";
  const error = status.lastError ? ` (error: ${status.lastError})` : "";
  return `[${status.phase}]${leg} ${status.message}${error}`;
}

/**
 * One fetch and reconcile for the saved pilot, ignoring aircraft state.
 */
async function syncOnce(config: SyncConfig, plansDir: string): Promise<number> {
  const pilotId = config.settingsFile
    ? await readPilotId(config.settingsFile)
    : null;
  if (!pilotId) {
    console.error("SimBrief pilot ID required (use --pilot=<id>)");
    return 1;
  }

  const client = createSimbriefClient({
    baseUrl: config.simbriefUrl,
    format: config.documentFormat,
    timeoutMs: config.fetchTimeoutMs,
  });
  const outcome = await client.fetchLatest(pilotId);
  if (outcome.kind !== "document") {
    console.error(`[Daemon] ${outcome.message}`);
    return 1;
  }

  const parsed = parseDocument(outcome.raw, { pilotId });
  if (!parsed.ok) {
    console.error(`[Daemon] ${parsed.error.message}`);
    return 1;
  }

  const storage = createFsPlansStorage(plansDir);
  const result = await reconcileLeg(parsed.record, storage, {
    now: new Date(),
    freshnessMs: config.runtime.freshnessMs,
    downloadRouteFile: (url) => client.downloadRouteFile(url),
  });
  if (!result.ok) {
    console.error(`[Daemon] ${result.error}`);
    return 1;
  }

  console.log(`All set: ${result.stem} (${result.action})`);
  for (const warning of [...parsed.record.warnings, ...result.warnings]) {
    console.log(`  warning: ${warning}`);
  }
  return 0;
}

async function main(): Promise<number> {
  const args = parseArgs();
  if (args.help) {
    printUsage();
    return 0;
  }

  const loaded = loadConfig({
    ...process.env,
    OFP_SYNC_PLANS_DIR: args.plansDir ?? process.env.OFP_SYNC_PLANS_DIR,
    OFP_SYNC_AIRCRAFT_STATE_FILE:
      args.stateFile ?? process.env.OFP_SYNC_AIRCRAFT_STATE_FILE,
  });
  if (!loaded.success) {
    console.error(`Invalid configuration: ${loaded.error}`);
    return 1;
  }
  const { config } = loaded;

  if (!config.plansDir) {
    console.error("FMS plans directory required (--plans or OFP_SYNC_PLANS_DIR)");
    return 1;
  }
  const plansDir = path.resolve(config.plansDir);

  if (args.pilotId) {
    if (!config.settingsFile) {
      console.error("No settings file to save the pilot ID to");
      return 1;
    }
    await savePilotId(config.settingsFile, args.pilotId);
    console.log(`[Daemon] Saved pilot ID to ${config.settingsFile}`);
  }

  if (args.once) {
    return syncOnce(config, plansDir);
  }

  const stateFile = config.aircraftStateFile;
  if (!stateFile) {
    console.error(
      "Aircraft state file required (--state or OFP_SYNC_AIRCRAFT_STATE_FILE)"
    );
    return 1;
  }

  const runtime = new SyncRuntime({
    fetcher: createSimbriefClient({
      baseUrl: config.simbriefUrl,
      format: config.documentFormat,
      timeoutMs: config.fetchTimeoutMs,
    }),
    storage: createFsPlansStorage(plansDir),
    config: config.runtime,
  });

  console.log(`[Daemon] Watching ${stateFile}, writing to ${plansDir}`);

  let stopped = false;
  let timer: NodeJS.Timeout | undefined;
  let lastLine = "";

  process.on("SIGUSR2", () => {
    console.log("[Daemon] Reload requested");
    runtime.requestReload();
  });

  const loop = async (): Promise<void> => {
    const [aircraft, pilotId] = await Promise.all([
      readAircraftState(stateFile),
      config.settingsFile ? readPilotId(config.settingsFile) : null,
    ]);
    const line = formatStatus(runtime.tick(aircraft, pilotId));
    if (args.verbose || line !== lastLine) {
      console.log(line);
      lastLine = line;
    }
  };

  const schedule = (): void => {
    if (stopped) return;
    timer = setTimeout(() => {
      loop()
        .catch((err) => {
          console.error("[Daemon] Tick failed:", getErrorMessage(err));
        })
        .finally(schedule);
    }, config.tickMs);
  };

  return new Promise((resolve) => {
    const stop = () => {
      stopped = true;
      clearTimeout(timer);
      console.log("[Daemon] Stopping");
      runtime
        .settled()
        .then(() => resolve(0))
        .catch(() => resolve(1));
    };
    process.once("SIGINT", stop);
    process.once("SIGTERM", stop);
    schedule();
  });
}

main()
  .then((code) => process.exit(code))
  .catch((err) => {
    console.error("[Daemon] Fatal:", getErrorMessage(err));
    process.exit(1);
  });
