import type { DescentWind } from "@/types/flight-plan";
import type { LayoutVariant } from "./types";
import {
  parseAltitude,
  parseSlashWind,
  parseTemperature,
  sectionAfter,
  stripTags,
} from "../wind-tokens";

const MAX_ROWS = 4;

/**
 * UAL 2018 prints descent winds as an HTML table ending at the
 * STARTFWZPAD marker. Cells: altitude, DDD/SSS, optional temperature.
 */
export const ualLayout: LayoutVariant = {
  kind: "ual",

  claims: (declaredLayout) => declaredLayout === "UAL 2018",

  hasSignature(planHtml) {
    const section = sectionAfter(planHtml, "DESCENT WINDS", "STARTFWZPAD");
    return section !== null && /<tr[\s>]/i.test(section);
  },

  extractWinds(planHtml) {
    const section = sectionAfter(planHtml, "DESCENT WINDS", "STARTFWZPAD");
    if (section === null) return [];

    const winds: DescentWind[] = [];
    for (const row of section.matchAll(/<tr[^>]*>([\s\S]*?)<\/tr>/gi)) {
      const cells = [
        ...row[1].matchAll(/<t[dh][^>]*>([\s\S]*?)<\/t[dh]>/gi),
      ].map((cell) => stripTags(cell[1]).trim());
      if (cells.length < 2) continue;

      const altitudeFt = parseAltitude(cells[0]);
      const wind = parseSlashWind(cells[1]);
      if (altitudeFt === null || wind === null) continue;

      winds.push({
        altitudeFt,
        ...wind,
        temperatureC: cells[2] ? parseTemperature(cells[2]) : null,
      });
      if (winds.length === MAX_ROWS) break;
    }
    return winds;
  },
};
