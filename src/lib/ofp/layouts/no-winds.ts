import type { LayoutVariant } from "./types";

/**
 * Templates SimBrief supports that print no descent winds at all
 * (or none the FMC can use). Recognised by declared layout only.
 */
const LAYOUTS_WITHOUT_WINDS = new Set([
  "AAL",
  "QFA",
  "AFR",
  "DLH",
  "UAE",
  "JZA",
  "JBU",
  "GWI",
  "EZY",
  "ETD",
  "EIN",
  "BER",
  "BAW",
  "AWE",
]);

export const noWindsLayout: LayoutVariant = {
  kind: "no-winds",
  claims: (declaredLayout) => LAYOUTS_WITHOUT_WINDS.has(declaredLayout),
  hasSignature: () => false,
  extractWinds: () => [],
};
