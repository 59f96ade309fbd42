import type { DescentWind } from "@/types/flight-plan";
import type { LayoutVariant } from "./types";
import { sectionAfter, stripTags } from "../wind-tokens";

// RYR, THY and ACA print the LIDO wind table
const LIDO_CODES = ["RYR", "LIDO", "THY", "ACA"];

// Descent column is the last "FL DDD/SSS +TT" group on each line
const DESCENT_COLUMN = /(\d{3})\s+(\d{3})\/(\d{3})\s+([+-]\d{2})\s*$/;

export const lidoLayout: LayoutVariant = {
  kind: "lido",

  claims: (declaredLayout) =>
    LIDO_CODES.some((code) => declaredLayout.includes(code)),

  hasSignature: (planHtml) => /WIND INFORMATION[\s\S]*DESCENT/.test(planHtml),

  extractWinds(planHtml) {
    const plain = stripTags(planHtml);
    const from = Math.max(plain.indexOf("WIND INFORMATION"), 0);
    const body = sectionAfter(plain, "DESCENT", undefined, from);
    if (body === null) return [];

    const winds: DescentWind[] = [];
    // First line is the remainder of the DESCENT header
    for (const line of body.split("\n").slice(1)) {
      const match = DESCENT_COLUMN.exec(line);
      if (!match) {
        if (winds.length > 0) break;
        continue;
      }
      winds.push({
        altitudeFt: parseInt(match[1], 10) * 100,
        directionDeg: parseInt(match[2], 10),
        speedKt: parseInt(match[3], 10),
        temperatureC: parseInt(match[4], 10),
      });
    }
    return winds;
  },
};
