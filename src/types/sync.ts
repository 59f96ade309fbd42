import type { FlightPlanRecord, Leg } from "./flight-plan";
import type { ReconcileAction } from "./route-file";

export type SyncPhase =
  | "Idle"
  | "AwaitingGroundStop"
  | "Polling"
  | "Parsed"
  | "Reconciled"
  | "Standby";

/**
 * Aircraft signals the host reports once per tick.
 */
export interface AircraftState {
  /** Loaded aircraft model path or name; null when nothing is loaded */
  airframe: string | null;
  onGround: boolean;
  enginesRunning: readonly boolean[];
  /** Leg loaded in the aircraft's FMS, when the host can report it */
  plannedLeg?: Leg;
}

// =============================================================================
// Background jobs
// =============================================================================

export type FetchOutcome =
  | { kind: "document"; raw: string; ofpId: string | null }
  | { kind: "not-yet-available"; message: string }
  | { kind: "transient-error"; message: string }
  | { kind: "malformed"; message: string };

export type ReconcileOutcome =
  | {
      ok: true;
      stem: string;
      action: ReconcileAction;
      warnings: string[];
    }
  | { ok: false; error: string };

/** "probe" fetches only look for a turnaround while in Standby */
export type FetchPurpose = "cycle" | "probe";

export type SyncCommand =
  | {
      type: "fetch";
      requestId: number;
      pilotId: string;
      purpose: FetchPurpose;
    }
  | { type: "reconcile"; requestId: number; record: FlightPlanRecord };

export type JobCompletion =
  | { type: "fetch"; requestId: number; outcome: FetchOutcome }
  | { type: "reconcile"; requestId: number; outcome: ReconcileOutcome };

export interface InFlightJob {
  type: SyncCommand["type"];
  requestId: number;
  purpose?: FetchPurpose;
}

// =============================================================================
// State machine
// =============================================================================

/**
 * Working memory for one gate-to-gate cycle.
 * Owned by the state machine; times are epoch milliseconds.
 */
export interface SyncCycleState {
  phase: SyncPhase;
  lastKnownOrigin: string | null;
  lastKnownDestination: string | null;
  retryCount: number;
  lastAttemptAt: number | null;
  nextAttemptAt: number;
  /** Monotonic across resets so late results stay recognisable */
  requestId: number;
  inFlight: InFlightJob | null;
  record: FlightPlanRecord | null;
  /** OFP already turned into files for the last completed leg */
  completedOfpId: string | null;
  /** OFP that failed to parse; skipped until SimBrief publishes another */
  rejectedOfpId: string | null;
  consecutiveFetchFailures: number;
  lastError: string | null;
  message: string;
  routeStem: string | null;
  warnings: readonly string[];
}

export interface SyncTickInput {
  now: number;
  aircraft: AircraftState | null;
  pilotId: string | null;
  reloadRequested: boolean;
  completion?: JobCompletion;
}

export interface SyncStepResult {
  state: SyncCycleState;
  commands: SyncCommand[];
}

export interface SyncTimingConfig {
  supportedAirframes: readonly string[];
  pollBaseMs: number;
  pollMaxMs: number;
  standbyProbeMs: number;
  fetchWarningThreshold: number;
}

/** Read-only projection handed to the presentation layer */
export interface SyncStatus {
  phase: SyncPhase;
  originIcao: string | null;
  destinationIcao: string | null;
  lastError: string | null;
  message: string;
  warnings: readonly string[];
}
