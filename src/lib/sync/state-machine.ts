/**
 * Gate-to-gate synchronization cycle.
 *
 * A pure reducer: the runtime hands in the owned state plus this tick's
 * inputs and gets back the next state and the jobs to start. Nothing here
 * does I/O or reads the clock, and each step makes at most one phase
 * transition.
 *
 *   Idle → AwaitingGroundStop → Polling → Parsed → Reconciled → Standby
 *                   ↑                                              │
 *                   └──────────── turnaround / reload ─────────────┘
 */

import type { Leg } from "@/types/flight-plan";
import { formatLeg, isSameLeg } from "@/types/flight-plan";
import type {
  AircraftState,
  FetchOutcome,
  FetchPurpose,
  JobCompletion,
  ReconcileOutcome,
  SyncCycleState,
  SyncPhase,
  SyncStatus,
  SyncStepResult,
  SyncTickInput,
  SyncTimingConfig,
} from "@/types/sync";
import { parseDocument } from "@/lib/ofp/parser";
import { retryDelay } from "./backoff";

export const DEFAULT_TIMING: SyncTimingConfig = {
  supportedAirframes: ["B737-800X"],
  pollBaseMs: 5_000,
  pollMaxMs: 20_000,
  standbyProbeMs: 60_000,
  fetchWarningThreshold: 3,
};

export const MESSAGES = {
  aircraftNotSupported: "Zibo not detected",
  pilotIdRequired: "SimBrief pilot ID required",
  awaitingGroundStop: "Waiting for engines off on the ground",
  polling: "Waiting for SimBrief OFP",
  reloadAtGateOnly: "Reload is only available at the gate",
  reloading: "Reloading OFP",
} as const;

const RELOADABLE_PHASES: readonly SyncPhase[] = [
  "AwaitingGroundStop",
  "Polling",
  "Parsed",
  "Reconciled",
  "Standby",
];

export function createInitialState(): SyncCycleState {
  return {
    phase: "Idle",
    lastKnownOrigin: null,
    lastKnownDestination: null,
    retryCount: 0,
    lastAttemptAt: null,
    nextAttemptAt: 0,
    requestId: 0,
    inFlight: null,
    record: null,
    completedOfpId: null,
    rejectedOfpId: null,
    consecutiveFetchFailures: 0,
    lastError: null,
    message: MESSAGES.aircraftNotSupported,
    routeStem: null,
    warnings: [],
  };
}

export function projectStatus(state: SyncCycleState): SyncStatus {
  return {
    phase: state.phase,
    originIcao: state.record?.originIcao ?? state.lastKnownOrigin,
    destinationIcao: state.record?.destinationIcao ?? state.lastKnownDestination,
    lastError: state.lastError,
    message: state.message,
    warnings: state.warnings,
  };
}

// =============================================================================
// Helpers
// =============================================================================

function enginesRunning(aircraft: AircraftState): boolean {
  return aircraft.enginesRunning.some(Boolean);
}

function atGate(aircraft: AircraftState): boolean {
  return aircraft.onGround && !enginesRunning(aircraft);
}

function lastKnownLeg(state: SyncCycleState): Leg | null {
  if (!state.lastKnownOrigin || !state.lastKnownDestination) return null;
  return {
    originIcao: state.lastKnownOrigin,
    destinationIcao: state.lastKnownDestination,
  };
}

/**
 * Start a new cycle at AwaitingGroundStop. The request id keeps counting
 * so anything still running for the old cycle is recognised as stale.
 */
export function resetCycle(
  state: SyncCycleState,
  message: string = MESSAGES.awaitingGroundStop
): SyncCycleState {
  return {
    ...createInitialState(),
    phase: "AwaitingGroundStop",
    requestId: state.requestId + 1,
    lastKnownOrigin: state.lastKnownOrigin,
    lastKnownDestination: state.lastKnownDestination,
    completedOfpId: state.completedOfpId,
    message,
  };
}

function ineligibility(
  aircraft: AircraftState,
  pilotId: string | null,
  config: SyncTimingConfig
): string | null {
  const airframe = aircraft.airframe ?? "";
  const supported = config.supportedAirframes.some((marker) =>
    airframe.includes(marker)
  );
  if (!supported) return MESSAGES.aircraftNotSupported;
  if (!pilotId) return MESSAGES.pilotIdRequired;
  return null;
}

function scheduleRetry(
  state: SyncCycleState,
  now: number,
  config: SyncTimingConfig
): SyncCycleState {
  return {
    ...state,
    nextAttemptAt:
      now + retryDelay(state.retryCount, config.pollBaseMs, config.pollMaxMs),
    retryCount: state.retryCount + 1,
  };
}

function startFetch(
  state: SyncCycleState,
  now: number,
  pilotId: string,
  purpose: FetchPurpose
): SyncStepResult {
  const requestId = state.requestId + 1;
  return {
    state: {
      ...state,
      requestId,
      inFlight: { type: "fetch", requestId, purpose },
      lastAttemptAt: now,
    },
    commands: [{ type: "fetch", requestId, pilotId, purpose }],
  };
}

function startReconcile(state: SyncCycleState, now: number): SyncStepResult {
  if (!state.record) return { state, commands: [] };
  const requestId = state.requestId + 1;
  return {
    state: {
      ...state,
      requestId,
      inFlight: { type: "reconcile", requestId },
      lastAttemptAt: now,
    },
    commands: [{ type: "reconcile", requestId, record: state.record }],
  };
}

// =============================================================================
// Completions
// =============================================================================

function onCycleFetch(
  state: SyncCycleState,
  outcome: FetchOutcome,
  input: SyncTickInput,
  config: SyncTimingConfig
): SyncStepResult {
  const { now } = input;
  const notYetAvailable = (): SyncStepResult => ({
    state: scheduleRetry(
      { ...state, consecutiveFetchFailures: 0, message: MESSAGES.polling },
      now,
      config
    ),
    commands: [],
  });

  switch (outcome.kind) {
    case "not-yet-available":
      return notYetAvailable();

    case "transient-error": {
      const failures = state.consecutiveFetchFailures + 1;
      const lastError =
        failures >= config.fetchWarningThreshold
          ? `SimBrief unreachable: ${outcome.message}`
          : state.lastError;
      return {
        state: scheduleRetry(
          { ...state, consecutiveFetchFailures: failures, lastError },
          now,
          config
        ),
        commands: [],
      };
    }

    case "malformed":
      return {
        state: scheduleRetry(
          { ...state, consecutiveFetchFailures: 0, lastError: outcome.message },
          now,
          config
        ),
        commands: [],
      };

    case "document": {
      const known = [state.completedOfpId, state.rejectedOfpId];
      if (outcome.ofpId !== null && known.includes(outcome.ofpId)) {
        return notYetAvailable();
      }

      const parsed = parseDocument(outcome.raw, {
        pilotId: input.pilotId ?? undefined,
      });
      if (!parsed.ok) {
        return {
          state: scheduleRetry(
            {
              ...state,
              consecutiveFetchFailures: 0,
              lastError: parsed.error.message,
              rejectedOfpId: outcome.ofpId,
            },
            now,
            config
          ),
          commands: [],
        };
      }

      const { record } = parsed;
      if (record.ofpId === state.completedOfpId) {
        return notYetAvailable();
      }

      return startReconcile(
        {
          ...state,
          phase: "Parsed",
          record,
          retryCount: 0,
          consecutiveFetchFailures: 0,
          lastError: null,
          warnings: record.warnings,
          message: `Writing files for ${formatLeg(record)}`,
        },
        now
      );
    }
  }
}

/**
 * A probe only looks for a turnaround: a published OFP for another leg
 * while the aircraft sits at the gate.
 */
function onProbe(
  state: SyncCycleState,
  outcome: FetchOutcome,
  input: SyncTickInput,
  config: SyncTimingConfig
): SyncStepResult {
  const next = { ...state, nextAttemptAt: input.now + config.standbyProbeMs };
  const parked = input.aircraft !== null && atGate(input.aircraft);
  if (outcome.kind !== "document" || !parked) {
    return { state: next, commands: [] };
  }
  if (outcome.ofpId !== null && outcome.ofpId === state.completedOfpId) {
    return { state: next, commands: [] };
  }

  const parsed = parseDocument(outcome.raw);
  const known = lastKnownLeg(state);
  if (!parsed.ok || (known && isSameLeg(parsed.record, known))) {
    return { state: next, commands: [] };
  }
  return { state: resetCycle(state), commands: [] };
}

function onReconcile(
  state: SyncCycleState,
  outcome: ReconcileOutcome,
  now: number,
  config: SyncTimingConfig
): SyncStepResult {
  if (!outcome.ok || !state.record) {
    const lastError = outcome.ok ? "No flight plan to reconcile" : outcome.error;
    return {
      state: scheduleRetry({ ...state, lastError }, now, config),
      commands: [],
    };
  }

  const { record } = state;
  return {
    state: {
      ...state,
      phase: "Reconciled",
      lastKnownOrigin: record.originIcao,
      lastKnownDestination: record.destinationIcao,
      completedOfpId: record.ofpId,
      rejectedOfpId: null,
      retryCount: 0,
      lastError: null,
      routeStem: outcome.stem,
      warnings: [...record.warnings, ...outcome.warnings],
      message: `All set: ${outcome.stem}`,
    },
    commands: [],
  };
}

function onCompletion(
  state: SyncCycleState,
  completion: JobCompletion,
  input: SyncTickInput,
  config: SyncTimingConfig
): SyncStepResult {
  const job = state.inFlight;
  const cleared = { ...state, inFlight: null };

  if (completion.type === "reconcile") {
    if (state.phase !== "Parsed") return { state: cleared, commands: [] };
    return onReconcile(cleared, completion.outcome, input.now, config);
  }

  if (job?.purpose === "probe") {
    if (state.phase !== "Standby") return { state: cleared, commands: [] };
    return onProbe(cleared, completion.outcome, input, config);
  }

  if (state.phase !== "Polling") return { state: cleared, commands: [] };
  return onCycleFetch(cleared, completion.outcome, input, config);
}

// =============================================================================
// Step
// =============================================================================

function acceptCompletion(
  state: SyncCycleState,
  input: SyncTickInput,
  config: SyncTimingConfig
): SyncStepResult | null {
  const { completion } = input;
  if (!completion) return null;
  if (!state.inFlight || completion.requestId !== state.inFlight.requestId) {
    // Result of a job from an earlier cycle
    return { state, commands: [] };
  }
  return onCompletion(state, completion, input, config);
}

/**
 * A tick without an aircraft snapshot carries no signal: the phase stays,
 * and only results of running jobs are taken in.
 */
function holdWithoutSignal(
  state: SyncCycleState,
  input: SyncTickInput,
  config: SyncTimingConfig
): SyncStepResult {
  if (input.reloadRequested && RELOADABLE_PHASES.includes(state.phase)) {
    state = { ...state, message: MESSAGES.reloadAtGateOnly };
  }
  return acceptCompletion(state, input, config) ?? { state, commands: [] };
}

export function step(
  state: SyncCycleState,
  input: SyncTickInput,
  config: SyncTimingConfig = DEFAULT_TIMING
): SyncStepResult {
  const { aircraft, now } = input;
  if (!aircraft) {
    return holdWithoutSignal(state, input, config);
  }

  // An airborne Standby stays put whatever else changes
  const lockedInFlight = state.phase === "Standby" && enginesRunning(aircraft);

  const blocker = ineligibility(aircraft, input.pilotId, config);
  if (blocker && !lockedInFlight) {
    if (state.phase === "Idle" && state.message === blocker) {
      return { state, commands: [] };
    }
    return {
      state: { ...resetCycle(state, blocker), phase: "Idle" },
      commands: [],
    };
  }

  if (state.phase === "Idle") {
    let start: Partial<SyncCycleState> = {
      message: MESSAGES.awaitingGroundStop,
    };
    if (input.reloadRequested) {
      start = atGate(aircraft)
        ? {
            message: MESSAGES.reloading,
            completedOfpId: null,
            rejectedOfpId: null,
          }
        : { message: MESSAGES.reloadAtGateOnly };
    }
    return {
      state: { ...state, ...start, phase: "AwaitingGroundStop" },
      commands: [],
    };
  }

  if (input.reloadRequested) {
    if (RELOADABLE_PHASES.includes(state.phase) && atGate(aircraft)) {
      return {
        state: {
          ...resetCycle(state, MESSAGES.reloading),
          completedOfpId: null,
          rejectedOfpId: null,
        },
        commands: [],
      };
    }
    state = { ...state, message: MESSAGES.reloadAtGateOnly };
  }

  const completed = acceptCompletion(state, input, config);
  if (completed) return completed;

  // Only a locked Standby gets here without one
  const pilotId = input.pilotId;
  if (!pilotId) return { state, commands: [] };

  switch (state.phase) {
    case "AwaitingGroundStop":
      if (!atGate(aircraft)) return { state, commands: [] };
      return startFetch(
        {
          ...state,
          phase: "Polling",
          retryCount: 0,
          consecutiveFetchFailures: 0,
          message: MESSAGES.polling,
        },
        now,
        pilotId,
        "cycle"
      );

    case "Polling":
      if (state.inFlight || !atGate(aircraft) || now < state.nextAttemptAt) {
        return { state, commands: [] };
      }
      return startFetch(state, now, pilotId, "cycle");

    case "Parsed":
      if (state.inFlight || now < state.nextAttemptAt) {
        return { state, commands: [] };
      }
      return startReconcile(state, now);

    case "Reconciled":
      if (!enginesRunning(aircraft)) return { state, commands: [] };
      return {
        state: { ...state, phase: "Standby", nextAttemptAt: now },
        commands: [],
      };

    case "Standby": {
      if (!atGate(aircraft)) return { state, commands: [] };
      // The FMS showing another leg is a turnaround by itself; otherwise
      // SimBrief is asked whether the next leg has been planned
      const known = lastKnownLeg(state);
      const planned = aircraft.plannedLeg;
      if (planned && !(known && isSameLeg(planned, known))) {
        return { state: resetCycle(state), commands: [] };
      }
      if (state.inFlight || now < state.nextAttemptAt) {
        return { state, commands: [] };
      }
      return startFetch(
        { ...state, nextAttemptAt: now + config.standbyProbeMs },
        now,
        pilotId,
        "probe"
      );
    }

    default:
      return { state, commands: [] };
  }
}
