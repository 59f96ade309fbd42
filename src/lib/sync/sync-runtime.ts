/**
 * Drives the sync state machine from the host's tick.
 *
 * Owns the cycle state, turns the reducer's commands into background jobs
 * and feeds their results back in, one per tick.
 */

import type {
  AircraftState,
  JobCompletion,
  SyncCommand,
  SyncCycleState,
  SyncStatus,
  SyncTimingConfig,
} from "@/types/sync";
import { getErrorMessage } from "@/lib/error-utils";
import type { FlightPlanFetcher } from "@/lib/simbrief-client";
import type { PlansStorage } from "@/lib/storage/plans-storage";
import { FRESHNESS_THRESHOLD_MS } from "@/lib/route-files/freshness";
import { reconcileLeg } from "./reconcile";
import { SerialWorker } from "./serial-worker";
import {
  createInitialState,
  DEFAULT_TIMING,
  projectStatus,
  step,
} from "./state-machine";

export interface SyncRuntimeConfig extends SyncTimingConfig {
  freshnessMs: number;
}

export interface SyncRuntimeDeps {
  fetcher: FlightPlanFetcher;
  storage: PlansStorage;
  config?: Partial<SyncRuntimeConfig>;
  /** Epoch milliseconds; defaults to Date.now */
  clock?: () => number;
}

export class SyncRuntime {
  private state: SyncCycleState = createInitialState();
  private readonly worker = new SerialWorker<JobCompletion>();
  private readonly config: SyncRuntimeConfig;
  private readonly fetcher: FlightPlanFetcher;
  private readonly storage: PlansStorage;
  private readonly clock: () => number;
  private reloadRequested = false;
  private ticking = false;

  constructor(deps: SyncRuntimeDeps) {
    this.fetcher = deps.fetcher;
    this.storage = deps.storage;
    this.clock = deps.clock ?? Date.now;
    this.config = {
      ...DEFAULT_TIMING,
      freshnessMs: FRESHNESS_THRESHOLD_MS,
      ...deps.config,
    };
  }

  get status(): SyncStatus {
    return projectStatus(this.state);
  }

  /** Honoured on the next tick if the aircraft is at the gate */
  requestReload(): void {
    this.reloadRequested = true;
  }

  /** Resolves when no background job is running */
  settled(): Promise<void> {
    return this.worker.whenIdle();
  }

  tick(aircraft: AircraftState | null, pilotId: string | null): SyncStatus {
    if (this.ticking) {
      throw new Error("SyncRuntime.tick is not reentrant");
    }
    this.ticking = true;
    try {
      const previous = this.state;
      const result = step(
        previous,
        {
          now: this.clock(),
          aircraft,
          pilotId,
          reloadRequested: this.reloadRequested,
          completion: this.worker.take(),
        },
        this.config
      );
      this.reloadRequested = false;
      this.state = result.state;
      this.logChanges(previous, result.state);
      for (const command of result.commands) {
        this.dispatch(command);
      }
      return projectStatus(this.state);
    } finally {
      this.ticking = false;
    }
  }

  private dispatch(command: SyncCommand): void {
    const { requestId } = command;

    if (command.type === "fetch") {
      const { pilotId } = command;
      this.worker.submit(
        async () => ({
          type: "fetch",
          requestId,
          outcome: await this.fetcher.fetchLatest(pilotId),
        }),
        (err) => ({
          type: "fetch",
          requestId,
          outcome: { kind: "transient-error", message: getErrorMessage(err) },
        })
      );
      return;
    }

    const { record } = command;
    this.worker.submit(
      async () => ({
        type: "reconcile",
        requestId,
        outcome: await reconcileLeg(record, this.storage, {
          now: new Date(this.clock()),
          freshnessMs: this.config.freshnessMs,
          downloadRouteFile: (url) => this.fetcher.downloadRouteFile(url),
        }),
      }),
      (err) => ({
        type: "reconcile",
        requestId,
        outcome: { ok: false, error: getErrorMessage(err) },
      })
    );
  }

  private logChanges(previous: SyncCycleState, next: SyncCycleState): void {
    if (previous.phase !== next.phase) {
      console.log(`[Sync] ${previous.phase} → ${next.phase}: ${next.message}`);
    }
    if (next.lastError && next.lastError !== previous.lastError) {
      console.warn(`[Sync] ${next.lastError}`);
    }
  }
}
