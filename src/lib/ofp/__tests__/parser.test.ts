import { describe, it, expect } from "vitest";
import { parseDocument, tokenizeRoute } from "../parser";
import {
  buildOfp,
  DAL_PLAN_HTML,
  DEFAULT_WAYPOINTS,
  GENERATED_AT,
  ROUTE_FILE_URL,
  SWA_PLAN_HTML,
  toJson,
  toXml,
  UAL_PLAN_HTML,
} from "@/test/ofp-fixtures";

function parseOk(raw: string, layoutHint?: string) {
  const result = parseDocument(raw, { layoutHint });
  if (!result.ok) {
    throw new Error(`Expected a record, got ${result.error.message}`);
  }
  return result.record;
}

describe("parseDocument", () => {
  it("builds a record from a LIDO OFP", () => {
    const record = parseOk(toJson(buildOfp()));

    expect(record.originIcao).toBe("KJFK");
    expect(record.destinationIcao).toBe("KLAX");
    expect(record.pilotId).toBe("123456");
    expect(record.ofpId).toBe("1001");
    expect(record.issuedAt.getTime()).toBe(GENERATED_AT * 1000);
    expect(record.layout).toBe("lido");
    expect(record.declaredLayout).toBe("LIDO");
    expect(record.route).toEqual(["RNGRR4", "GREKI", "J60", "HECTOR", "ANJLL4"]);
    expect(record.descentWinds).toHaveLength(3);
    expect(record.descentWinds[0]).toEqual({
      altitudeFt: 35000,
      directionDeg: 290,
      speedKt: 60,
      temperatureC: -52,
    });
    expect(record.warnings).toEqual([]);
  });

  it("derives procedures and runways from the navlog", () => {
    const record = parseOk(toJson(buildOfp()));

    expect(record.departureRunway).toBe("04L");
    expect(record.arrivalRunway).toBe("24R");
    expect(record.departureProcedure).toEqual({
      name: "RNGRR4",
      transition: "GREKI",
    });
    expect(record.arrivalProcedure).toEqual({
      name: "ANJLL4",
      transition: "DSNEE",
    });
  });

  it("lists the route file waypoints without inner procedure fixes", () => {
    const record = parseOk(toJson(buildOfp()));
    expect(record.waypoints).toEqual(DEFAULT_WAYPOINTS);
    expect(record.airacCycle).toBe("2510");
  });

  it("joins the X-Plane route file link onto its directory", () => {
    const record = parseOk(toJson(buildOfp()));
    expect(record.routeFileUrl).toBe(ROUTE_FILE_URL);
  });

  it("warns about unplaced waypoints when there is no route file link", () => {
    const record = parseOk(
      toJson(
        buildOfp({
          routeFileLink: "",
          fixes: [{ ident: "HECTOR", via_airway: "J60", is_sid_star: "0" }],
        })
      )
    );
    expect(record.routeFileUrl).toBeNull();
    expect(record.waypoints.map((point) => point.ident)).toEqual(["KJFK", "KLAX"]);
    expect(record.warnings).toEqual([
      "No coordinates for HECTOR; left out of the route file",
    ]);
  });

  it("takes the ISA deviation from the destination fix", () => {
    const record = parseOk(toJson(buildOfp()));
    expect(record.destinationIsaDeviation).toBe(5);
  });

  it("falls back to the average ISA deviation", () => {
    const record = parseOk(
      toJson(
        buildOfp({
          fixes: [{ ident: "HECTOR", via_airway: "J60", is_sid_star: "0" }],
        })
      )
    );
    expect(record.destinationIsaDeviation).toBe(-3);
    expect(record.departureProcedure).toBeUndefined();
    expect(record.arrivalProcedure).toBeUndefined();
  });

  it("keeps the destination METAR", () => {
    const record = parseOk(toJson(buildOfp()));
    expect(record.destinationMetar).toBe(
      "KLAX 191753Z 25010KT 10SM FEW020 18/12 A2992"
    );
  });

  it("parses the same OFP identically from JSON and XML", () => {
    const ofp = buildOfp();
    expect(parseOk(toXml(ofp))).toEqual(parseOk(toJson(ofp)));
  });

  it("parses a UAL OFP from XML", () => {
    const ofp = buildOfp({ layout: "UAL 2018", planHtml: UAL_PLAN_HTML });
    const record = parseOk(toXml(ofp));
    expect(record.layout).toBe("ual");
    expect(record.descentWinds.map((wind) => wind.temperatureC)).toEqual([
      -52,
      null,
      -5,
    ]);
  });

  it("uses the layout hint over the declared layout", () => {
    const ofp = buildOfp({ layout: "LIDO", planHtml: DAL_PLAN_HTML });
    const record = parseOk(toJson(ofp), "DAL");
    expect(record.layout).toBe("dal");
    expect(record.declaredLayout).toBe("LIDO");
  });

  it("detects the layout from plan_html when none is declared", () => {
    const record = parseOk(
      toJson(buildOfp({ layout: "", planHtml: SWA_PLAN_HTML }))
    );
    expect(record.layout).toBe("swa");
    expect(record.declaredLayout).toBeNull();
  });

  it("detects the layout from plan_html when the declared one is unknown", () => {
    const record = parseOk(
      toJson(buildOfp({ layout: "XYZ", planHtml: SWA_PLAN_HTML }))
    );
    expect(record.layout).toBe("swa");
    expect(record.declaredLayout).toBe("XYZ");
  });

  it("accepts a layout without winds silently", () => {
    const record = parseOk(toJson(buildOfp({ layout: "BAW", planHtml: "" })));
    expect(record.layout).toBe("no-winds");
    expect(record.descentWinds).toEqual([]);
    expect(record.warnings).toEqual([]);
  });

  it("warns when a wind layout prints no winds", () => {
    const record = parseOk(
      toJson(buildOfp({ layout: "LIDO", planHtml: "<pre>no table</pre>" }))
    );
    expect(record.descentWinds).toEqual([]);
    expect(record.warnings).toEqual(["No descent winds found in the lido layout"]);
  });

  it("returns a frozen record", () => {
    const record = parseOk(toJson(buildOfp()));
    expect(Object.isFrozen(record)).toBe(true);
    expect(Object.isFrozen(record.route)).toBe(true);
  });

  describe("errors", () => {
    function parseError(raw: string) {
      const result = parseDocument(raw);
      if (result.ok) throw new Error("Expected a parse error");
      return result.error;
    }

    it("rejects unreadable input", () => {
      const error = parseError("Service unavailable");
      expect(error.code).toBe("unreadable");
      expect(error.message).toBe(
        "Unreadable OFP: Document is neither JSON nor XML"
      );
    });

    it("rejects an unknown declared layout without known markers", () => {
      const error = parseError(
        toJson(buildOfp({ layout: "XYZ", planHtml: "<pre>PLAIN TEXT</pre>" }))
      );
      expect(error.code).toBe("unknown-layout");
      expect(error.message).toBe('Unsupported OFP layout "XYZ"');
    });

    it("rejects a missing destination", () => {
      const error = parseError(toJson(buildOfp({ destination: "" })));
      expect(error.code).toBe("missing-leg");
      expect(error.message).toBe("OFP has no origin or destination airport");
    });

    it("rejects a leg that starts and ends at the same airport", () => {
      const error = parseError(toJson(buildOfp({ destination: "KJFK" })));
      expect(error.code).toBe("missing-leg");
      expect(error.message).toBe("OFP origin and destination are both KJFK");
    });

    it("rejects an empty route", () => {
      const error = parseError(toJson(buildOfp({ route: "   " })));
      expect(error.code).toBe("missing-route");
    });

    it("rejects a missing generation time", () => {
      const error = parseError(toJson(buildOfp({ timeGenerated: "" })));
      expect(error.code).toBe("missing-timestamp");
    });
  });
});

describe("tokenizeRoute", () => {
  it("upper-cases and splits on any whitespace", () => {
    expect(tokenizeRoute(" dct\tHECTOR\n j60 ")).toEqual(["DCT", "HECTOR", "J60"]);
  });

  it("returns nothing for a missing route", () => {
    expect(tokenizeRoute(undefined)).toEqual([]);
  });
});
