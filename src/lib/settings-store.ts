/**
 * Persisted SimBrief pilot ID.
 *
 * File format: { "settings": { "pilot_id": 123456 } }
 */

import { readFile, writeFile } from "fs/promises";
import { z } from "zod";
import { formatZodError, getErrorMessage } from "@/lib/error-utils";

const pilotIdSchema = z
  .union([z.string(), z.number().int().nonnegative()])
  .transform((value) => String(value).trim())
  .pipe(z.string().regex(/^\d+$/, "Pilot ID must be numeric"));

const settingsFileSchema = z.object({
  settings: z.object({
    pilot_id: pilotIdSchema,
  }),
});

export function normalizePilotId(value: string): string | null {
  const parsed = pilotIdSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}

/**
 * Read the saved pilot ID. A missing, unreadable or invalid file means
 * no pilot ID is configured.
 */
export async function readPilotId(file: string): Promise<string | null> {
  let raw: string;
  try {
    raw = await readFile(file, "utf8");
  } catch {
    return null;
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    console.warn(`[Settings] ${file} is not valid JSON:`, getErrorMessage(err));
    return null;
  }

  const parsed = settingsFileSchema.safeParse(json);
  if (!parsed.success) {
    console.warn(`[Settings] ${file}: ${formatZodError(parsed.error)}`);
    return null;
  }
  return parsed.data.settings.pilot_id;
}

export async function savePilotId(file: string, pilotId: string): Promise<void> {
  const normalized = normalizePilotId(pilotId);
  if (!normalized) {
    throw new Error(`Invalid SimBrief pilot ID "${pilotId}"`);
  }
  const content = { settings: { pilot_id: Number(normalized) } };
  await writeFile(file, JSON.stringify(content, null, 2) + "\n", "utf8");
}
