import type { DescentWind, LayoutKind } from "@/types/flight-plan";

/**
 * One airline OFP template. Each variant is pure: it decides whether a
 * document belongs to it and reads the descent winds out of plan_html.
 */
export interface LayoutVariant {
  kind: LayoutKind;
  /** Whether SimBrief's declared ofp_layout (upper-cased) is this template */
  claims(declaredLayout: string): boolean;
  /** Structural markers, used when the document declares no layout */
  hasSignature(planHtml: string): boolean;
  extractWinds(planHtml: string): DescentWind[];
}
