import { load } from "js-yaml";

import type { HeuristicThresholds } from "lib/report/types.js";

import { DEFAULT_THRESHOLDS } from "../constants.js";
import { validateThresholds } from "../contracts/validators.js";
import { readRequiredTextFile } from "../utils/fs.js";

/**
 * Reads a YAML threshold override and merges it over {@link DEFAULT_THRESHOLDS}.
 * Keys left out of the file keep their default. An empty file is an empty override.
 */
export async function loadThresholds(path: string | null): Promise<HeuristicThresholds> {
  if (!path) {
    return { ...DEFAULT_THRESHOLDS };
  }

  const raw = await readRequiredTextFile(path, "Thresholds file");
  return parseThresholds(raw, path);
}

export async function parseThresholds(raw: string, source = "<inline>"): Promise<HeuristicThresholds> {
  const parsed: unknown = load(raw) ?? {};
  const { value, errors } = await validateThresholds(parsed);
  if (!value) {
    throw new Error(`Invalid thresholds in ${source}: ${errors.join("; ")}`);
  }
  return { ...DEFAULT_THRESHOLDS, ...value };
}
