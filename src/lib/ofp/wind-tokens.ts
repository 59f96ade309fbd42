/**
 * Small helpers shared by the layout variants for reading wind tables
 * out of plan_html text.
 */

import type { DescentWind } from "@/types/flight-plan";

/** "DDD/SSS" as printed by LIDO-style tables */
export const SLASH_WIND = /^(\d{3})\/(\d{3})$/;

export function normalizeLineEndings(value: string): string {
  return value.replace(/\r\n?/g, "\n");
}

/** Drop HTML markup, keeping the text and the line structure */
export function stripTags(value: string): string {
  return value
    .replace(/<br\s*\/?>/gi, "\n")
    .replace(/<[^>]*>/g, "")
    .replace(/&nbsp;/gi, " ");
}

/**
 * Text between the first `start` marker (searched from `from`) and the
 * first `end` marker after it. Null when `start` is absent; runs to the
 * end of the text when `end` is absent.
 */
export function sectionAfter(
  value: string,
  start: string,
  end?: string,
  from = 0
): string | null {
  const startIndex = value.indexOf(start, from);
  if (startIndex === -1) return null;
  const body = value.slice(startIndex + start.length);
  if (end === undefined) return body;
  const endIndex = body.indexOf(end);
  return endIndex === -1 ? body : body.slice(0, endIndex);
}

/**
 * Altitude token to feet. Three-digit values and FL-prefixed values are
 * flight levels ("350", "FL350"); longer values are feet ("10000").
 */
export function parseAltitude(token: string): number | null {
  const match = /^(FL)?(\d{2,5})(FT)?$/i.exec(token.trim());
  if (!match) return null;
  const value = parseInt(match[2], 10);
  if (match[1] || match[2].length <= 3) return value * 100;
  return value;
}

/** "+05", "-44", "P05", "M12", "05" → signed degrees */
export function parseTemperature(token: string): number | null {
  const match = /^([+\-PM]?)(\d{1,2})$/i.exec(token.trim());
  if (!match) return null;
  const value = parseInt(match[2], 10);
  const sign = match[1].toUpperCase();
  return sign === "-" || sign === "M" ? -value : value;
}

export function parseSlashWind(
  token: string
): Pick<DescentWind, "directionDeg" | "speedKt"> | null {
  const match = SLASH_WIND.exec(token.trim());
  if (!match) return null;
  return {
    directionDeg: parseInt(match[1], 10),
    speedKt: parseInt(match[2], 10),
  };
}

/**
 * Turn a row-per-attribute table into columns, one per altitude.
 * Rows of unequal length are cut to the shortest.
 */
export function columns(rows: string[][]): string[][] {
  if (rows.length === 0) return [];
  const width = Math.min(...rows.map((row) => row.length));
  const result: string[][] = [];
  for (let i = 0; i < width; i++) {
    result.push(rows.map((row) => row[i]));
  }
  return result;
}

export function splitTokens(line: string): string[] {
  return line.trim().split(/\s+/).filter(Boolean);
}
