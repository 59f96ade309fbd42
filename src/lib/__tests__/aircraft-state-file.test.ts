import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import { readAircraftState, toAircraftState } from "../aircraft-state-file";

describe("toAircraftState", () => {
  it("maps a flat snapshot", () => {
    expect(
      toAircraftState({
        airframe: "Aircraft/B737-800X/b738.acf",
        onGround: true,
        enginesRunning: [false, true],
        departureIcao: "kjfk",
        arrivalIcao: "KLAX",
      })
    ).toEqual({
      success: true,
      aircraft: {
        airframe: "Aircraft/B737-800X/b738.acf",
        onGround: true,
        enginesRunning: [false, true],
        plannedLeg: { originIcao: "KJFK", destinationIcao: "KLAX" },
      },
    });
  });

  it("derives on-ground from every gear and engines from 0/1", () => {
    const result = toAircraftState({
      airframe: "B737-800X",
      gearOnGround: [true, true, false],
      enginesRunning: [0, 1],
    });
    expect(result).toEqual({
      success: true,
      aircraft: {
        airframe: "B737-800X",
        onGround: false,
        enginesRunning: [false, true],
      },
    });
  });

  it("unwraps a bridge message and reads dep_icao/arr_icao", () => {
    const result = toAircraftState({
      type: "snapshot",
      payload: {
        airframe: "B737-800X",
        onGround: true,
        enginesRunning: [],
        dep_icao: "EGLL",
        arr_icao: "LFPG",
      },
    });
    expect(result.success && result.aircraft.plannedLeg).toEqual({
      originIcao: "EGLL",
      destinationIcao: "LFPG",
    });
  });

  it("ignores a malformed airport code", () => {
    const result = toAircraftState({
      airframe: "B737-800X",
      onGround: true,
      departureIcao: "JFK",
      arrivalIcao: "KLAX",
    });
    expect(result.success).toBe(true);
    expect(result.success && result.aircraft.plannedLeg).toBeUndefined();
  });

  it("requires an on-ground signal", () => {
    const result = toAircraftState({ airframe: "B737-800X" });
    expect(result.success).toBe(false);
  });
});

describe("readAircraftState", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "ofp-sync-aircraft-"));
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("reads a snapshot file", async () => {
    const file = path.join(dir, "state.json");
    await writeFile(
      file,
      JSON.stringify({ airframe: "B737-800X", onGround: true, enginesRunning: [0, 0] })
    );
    expect(await readAircraftState(file)).toEqual({
      airframe: "B737-800X",
      onGround: true,
      enginesRunning: [false, false],
    });
  });

  it("returns null when the file is missing or invalid", async () => {
    expect(await readAircraftState(path.join(dir, "missing.json"))).toBeNull();

    const file = path.join(dir, "state.json");
    await writeFile(file, "not json");
    expect(await readAircraftState(file)).toBeNull();
  });
});
