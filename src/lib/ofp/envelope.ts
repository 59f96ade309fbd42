/**
 * Decodes a SimBrief fetcher response (JSON or XML) into one OFP shape.
 *
 * SimBrief serves the same tree either way; the JSON variant turns empty
 * elements into {} and the XML variant collapses single-item lists, so the
 * schema below is permissive and normalizes both.
 */

import { XMLParser } from "fast-xml-parser";
import { z } from "zod";
import { formatZodError, getErrorMessage } from "@/lib/error-utils";

/** Scalar leaf: strings and numbers become strings, anything else is absent */
const text = z.preprocess(
  (value) =>
    typeof value === "string" || typeof value === "number"
      ? String(value)
      : undefined,
  z.string().optional()
);

function section<T extends z.ZodRawShape>(shape: T) {
  return z.object(shape).optional().catch(undefined);
}

const navlogFixSchema = z.object({
  ident: text,
  type: text,
  via_airway: text,
  is_sid_star: text,
  stage: text,
  altitude_feet: text,
  pos_lat: text,
  pos_long: text,
  oat_isa_dev: text,
});

export const ofpDocumentSchema = z.object({
  fetch: section({ status: text }),
  params: section({
    request_id: text,
    user_id: text,
    time_generated: text,
    ofp_layout: text,
    airac: text,
  }),
  general: section({
    route: text,
    avg_temp_dev: text,
  }),
  origin: section({
    icao_code: text,
    plan_rwy: text,
    elevation: text,
    pos_lat: text,
    pos_long: text,
  }),
  destination: section({
    icao_code: text,
    plan_rwy: text,
    elevation: text,
    pos_lat: text,
    pos_long: text,
    metar: text,
  }),
  navlog: section({
    fix: z
      .union([z.array(navlogFixSchema), navlogFixSchema])
      .optional()
      .catch(undefined)
      .transform((value) =>
        value === undefined ? [] : Array.isArray(value) ? value : [value]
      ),
  }),
  text: section({ plan_html: text }),
  fms_downloads: section({
    directory: text,
    xpe: section({ name: text, link: text }),
  }),
});

export type OfpDocument = z.infer<typeof ofpDocumentSchema>;
export type NavlogFix = z.infer<typeof navlogFixSchema>;
export type AirportSection = NonNullable<OfpDocument["origin"]>;

export type DecodeResult =
  | { ok: true; document: OfpDocument; format: "json" | "xml" }
  | { ok: false; error: string };

const xmlParser = new XMLParser({
  ignoreAttributes: true,
  ignoreDeclaration: true,
  parseTagValue: false,
  isArray: (_name, jpath) => jpath === "OFP.navlog.fix",
});

/**
 * Decode raw fetcher output. The envelope format is sniffed from the
 * first non-blank character.
 */
export function decodeOfpDocument(raw: string): DecodeResult {
  const trimmed = raw.trimStart();
  let tree: unknown;
  let format: "json" | "xml";

  try {
    if (trimmed.startsWith("{")) {
      format = "json";
      tree = JSON.parse(trimmed);
    } else if (trimmed.startsWith("<")) {
      format = "xml";
      const parsed: unknown = xmlParser.parse(trimmed);
      tree = isRecord(parsed) ? parsed.OFP : undefined;
    } else {
      return { ok: false, error: "Document is neither JSON nor XML" };
    }
  } catch (error) {
    return { ok: false, error: getErrorMessage(error) };
  }

  if (!isRecord(tree)) {
    return { ok: false, error: "Document has no OFP root" };
  }

  const result = ofpDocumentSchema.safeParse(tree);
  if (!result.success) {
    return { ok: false, error: formatZodError(result.error) };
  }
  return { ok: true, document: result.data, format };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
