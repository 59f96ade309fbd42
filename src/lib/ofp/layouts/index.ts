import { ParseError } from "@/lib/error-utils";
import type { LayoutVariant } from "./types";
import { lidoLayout } from "./lido";
import { ualLayout } from "./ual";
import { dalLayout } from "./dal";
import { swaLayout } from "./swa";
import { klmLayout } from "./klm";
import { noWindsLayout } from "./no-winds";

export type { LayoutVariant } from "./types";

/** Detection order; adding a template means adding a variant here */
export const LAYOUT_VARIANTS: readonly LayoutVariant[] = [
  lidoLayout,
  ualLayout,
  dalLayout,
  swaLayout,
  klmLayout,
  noWindsLayout,
];

export type LayoutDetection =
  | { ok: true; variant: LayoutVariant }
  | { ok: false; error: ParseError };

/**
 * Pick the one variant for a document.
 *
 * A declared layout is matched by name. When nothing claims it, or the
 * document declares none, structural markers in plan_html decide. Zero
 * matches and several matches are both errors.
 */
export function detectLayout(
  declaredLayout: string | null,
  planHtml: string
): LayoutDetection {
  const declared = declaredLayout?.trim().toUpperCase() ?? "";

  let matches = declared
    ? LAYOUT_VARIANTS.filter((variant) => variant.claims(declared))
    : [];
  if (matches.length === 0) {
    matches = LAYOUT_VARIANTS.filter((variant) =>
      variant.hasSignature(planHtml)
    );
  }

  if (matches.length === 1) {
    return { ok: true, variant: matches[0] };
  }

  if (matches.length === 0) {
    const message = declared
      ? `Unsupported OFP layout "${declared}"`
      : "Could not identify the OFP layout";
    return { ok: false, error: new ParseError("unknown-layout", message) };
  }

  const kinds = matches.map((variant) => variant.kind).join(", ");
  return {
    ok: false,
    error: new ParseError(
      "ambiguous-layout",
      `OFP matches several layouts (${kinds})`
    ),
  };
}
