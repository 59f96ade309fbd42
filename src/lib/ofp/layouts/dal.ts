import type { DescentWind } from "@/types/flight-plan";
import type { LayoutVariant } from "./types";
import {
  columns,
  parseAltitude,
  sectionAfter,
  splitTokens,
  stripTags,
} from "../wind-tokens";

// The table continues into the approach; FMC descent forecasts stop here
const LOWEST_ALTITUDE_FT = 10000;

// "27085" = 270 degrees at 85 kt
const PACKED_WIND = /^(\d{2})(\d{3})$/;

/**
 * DAL prints one column per altitude: a row of altitudes in feet and a
 * row of packed winds, closed by an asterisk line.
 */
export const dalLayout: LayoutVariant = {
  kind: "dal",

  claims: (declaredLayout) => declaredLayout === "DAL",

  hasSignature: (planHtml) => planHtml.includes("DESCENT FORECAST WINDS"),

  extractWinds(planHtml) {
    const section = sectionAfter(
      stripTags(planHtml),
      "DESCENT FORECAST WINDS",
      "*"
    );
    if (section === null) return [];

    const rows = section
      .split("\n")
      .slice(1)
      .map(splitTokens)
      .filter((row) => row.length > 0);
    if (rows.length < 2) return [];

    const winds: DescentWind[] = [];
    for (const [altitudeToken, windToken] of columns(rows.slice(0, 2))) {
      const altitudeFt = parseAltitude(altitudeToken);
      const match = PACKED_WIND.exec(windToken);
      if (altitudeFt === null || !match) continue;

      winds.push({
        altitudeFt,
        directionDeg: parseInt(match[1], 10) * 10,
        speedKt: parseInt(match[2], 10),
        temperatureC: null,
      });
      if (altitudeFt === LOWEST_ALTITUDE_FT) break;
    }
    return winds;
  },
};
