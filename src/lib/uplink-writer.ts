/**
 * Uplink artifact for the FMC's winds/performance import.
 *
 * The FMC reads SimBrief-style XML and looks for the LIDO text blocks it
 * knows inside text/plan_html, so those blocks are rebuilt here from the
 * normalized record whatever layout the OFP was printed in.
 */

import { XMLBuilder } from "fast-xml-parser";
import type { DescentWind, FlightPlanRecord } from "@/types/flight-plan";

/** Temperature printed when the layout gave none */
const DEFAULT_TEMPERATURE_C = 15;

const RULE = "-".repeat(68);

const SUMMARY_BLOCK =
  '<div style="line-height:14px;font-size:13px"><pre><!--BKMK///OFP///0--><!--BKMK///Summary and Fuel///1--><b>[ OFP ]\n' +
  `${RULE}</b>\nOFP 1\n\n`;

const WIND_BLOCK =
  '<h2 style="page-break-after: always;"> </h2><!--BKMK///Wind Information///1-->' +
  `${RULE}\n WIND INFORMATION \nDESCENT\n`;

const WEATHER_BLOCK =
  '<h2 style="page-break-after: always;"> </h2><!--BKMK///Airport WX List///0--><b>[ Airport WX List ]\n' +
  `${RULE}</b>\nDestination:\n`;

const builder = new XMLBuilder({
  format: true,
  indentBy: "  ",
});

export interface UplinkFile {
  fileName: string;
  content: string;
}

function pad(value: number, width: number): string {
  return String(Math.abs(Math.round(value))).padStart(width, "0");
}

function signed(value: number, width: number, plus = "+", minus = "-"): string {
  return `${value < 0 ? minus : plus}${pad(value, width)}`;
}

/** "350 330/022 -44" */
export function formatWindLine(wind: DescentWind): string {
  const flightLevel = pad(wind.altitudeFt / 100, 3);
  const temperature = signed(wind.temperatureC ?? DEFAULT_TEMPERATURE_C, 2);
  return `${flightLevel} ${pad(wind.directionDeg, 3)}/${pad(wind.speedKt, 3)} ${temperature}`;
}

/** "AVG ISA       M005" */
export function formatIsaLine(deviation: number): string {
  return `AVG ISA       ${signed(deviation, 3, "P", "M")}`;
}

/**
 * Destination weather block. The report time loses its Z so the FMC
 * reads it as "SA  191753  25010KT ...".
 */
export function formatDestinationWeather(
  destinationIcao: string,
  metar: string | null
): string {
  const parts = metar?.trim().split(/\s+/).slice(1) ?? [];
  if (parts.length === 0) return `${destinationIcao}\n`;
  parts[0] = parts[0].replace("Z", " ");
  return `${destinationIcao}\nSA  ${parts.join(" ")}\n`;
}

export function buildPlanHtml(record: FlightPlanRecord): string {
  const winds = record.descentWinds.map(formatWindLine).join("\n");
  return (
    SUMMARY_BLOCK +
    `${formatIsaLine(record.destinationIsaDeviation)}\n\n` +
    WIND_BLOCK +
    `${winds}\n\n` +
    WEATHER_BLOCK +
    formatDestinationWeather(record.destinationIcao, record.destinationMetar)
  );
}

/**
 * Serialize the record for the FMC. `routeStem` is the route file's name
 * without extension; the FMC pairs the two by name.
 */
export function buildUplinkFile(
  record: FlightPlanRecord,
  routeStem: string
): UplinkFile {
  const xml: string = builder.build({
    OFP: {
      origin: { icao_code: record.originIcao },
      destination: { icao_code: record.destinationIcao },
      general: { route: record.route.join(" ") },
      text: { plan_html: buildPlanHtml(record) },
    },
  });

  return {
    fileName: `${routeStem}.xml`,
    content: `<?xml version="1.0" encoding="UTF-8"?>\n${xml}`,
  };
}
