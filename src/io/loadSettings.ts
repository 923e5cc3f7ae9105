import fs from "fs/promises";
import type { LabelingConfig } from "../types/labelingConfig";
import { settingsFromJson } from "../utils/resolveConfig";

/**
 * Read a JSON settings file. A missing or corrupt file yields no settings so
 * the run continues on defaults.
 */
export async function loadSettings(
  settingsPath: string,
): Promise<Partial<LabelingConfig>> {
  let raw: string;
  try {
    raw = await fs.readFile(settingsPath, "utf8");
  } catch (err) {
    console.warn(`[settings] cannot read ${settingsPath}, using defaults:`, err);
    return {};
  }
  try {
    return settingsFromJson(JSON.parse(raw));
  } catch (err) {
    console.warn(`[settings] ${settingsPath} is not valid JSON, using defaults:`, err);
    return {};
  }
}
