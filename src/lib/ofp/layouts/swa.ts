import type { DescentWind } from "@/types/flight-plan";
import type { LayoutVariant } from "./types";
import {
  columns,
  parseAltitude,
  sectionAfter,
  splitTokens,
  stripTags,
} from "../wind-tokens";

// "27/085P05" = 270 degrees, 85 kt, +5 C
const SWA_WIND = /^(\d{2})\/(\d{3})([PM])(\d{2})$/;

export const swaLayout: LayoutVariant = {
  kind: "swa",

  claims: (declaredLayout) => declaredLayout === "SWA",

  hasSignature(planHtml) {
    const section = sectionAfter(planHtml, "DESCENT WINDS");
    return section !== null && !/<tr[\s>]/i.test(section);
  },

  extractWinds(planHtml) {
    const section = sectionAfter(stripTags(planHtml), "DESCENT WINDS");
    if (section === null) return [];

    // Rows run from the line after the header to the next blank line
    const rows: string[][] = [];
    for (const line of section.split("\n").slice(1)) {
      const tokens = splitTokens(line);
      if (tokens.length === 0) {
        if (rows.length > 0) break;
        continue;
      }
      rows.push(tokens);
    }
    if (rows.length < 2) return [];

    const winds: DescentWind[] = [];
    for (const [altitudeToken, windToken] of columns(rows.slice(0, 2))) {
      const altitudeFt = parseAltitude(altitudeToken);
      const match = SWA_WIND.exec(windToken);
      if (altitudeFt === null || !match) continue;

      const temperature = parseInt(match[4], 10);
      winds.push({
        altitudeFt,
        directionDeg: parseInt(match[1], 10) * 10,
        speedKt: parseInt(match[2], 10),
        temperatureC: match[3] === "M" ? -temperature : temperature,
      });
    }
    return winds;
  },
};
