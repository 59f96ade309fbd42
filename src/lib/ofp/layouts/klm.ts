import type { DescentWind } from "@/types/flight-plan";
import type { LayoutVariant } from "./types";
import { sectionAfter, stripTags } from "../wind-tokens";

const MAX_ROWS = 3;
const KLM_WIND_LINE = /(?:FL)?(\d{3})\s+(\d{3})\/(\d{3})\s*$/;

/**
 * KLM lists three "FLnnn DDD/SSS" lines starting on the CRZ ALT line,
 * ahead of the DEFRTE block. No temperatures.
 */
export const klmLayout: LayoutVariant = {
  kind: "klm",

  claims: (declaredLayout) => declaredLayout === "KLM",

  hasSignature: (planHtml) => /CRZ ALT[\s\S]*DEFRTE/.test(planHtml),

  extractWinds(planHtml) {
    const section = sectionAfter(stripTags(planHtml), "CRZ ALT", "DEFRTE");
    if (section === null) return [];

    const lines = section
      .split("\n")
      .filter((line) => line.trim() !== "")
      .slice(0, MAX_ROWS);

    const winds: DescentWind[] = [];
    for (const line of lines) {
      const match = KLM_WIND_LINE.exec(line);
      if (!match) continue;
      winds.push({
        altitudeFt: parseInt(match[1], 10) * 100,
        directionDeg: parseInt(match[2], 10),
        speedKt: parseInt(match[3], 10),
        temperatureC: null,
      });
    }
    return winds;
  },
};
