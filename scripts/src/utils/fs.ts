import { promises as fs } from "node:fs";
import { dirname } from "node:path";
import fsExtra from "fs-extra";

import { ensureLf, ensureTrailingNewline } from "../report/deterministic.js";

export async function readTextFile(path: string): Promise<string | null> {
  try {
    const content = await fs.readFile(path, "utf8");
    return content;
  } catch (error: unknown) {
    if (isMissingFileError(error)) {
      return null;
    }
    throw error;
  }
}

/** Like {@link readTextFile}, but a missing file is an error naming `label`. */
export async function readRequiredTextFile(path: string, label: string): Promise<string> {
  const content = await readTextFile(path);
  if (content === null) {
    throw new Error(`${label} missing at ${path}`);
  }
  return content;
}

export async function writeTextFile(path: string, content: string): Promise<void> {
  await fsExtra.ensureDir(dirname(path));
  const normalized = ensureTrailingNewline(ensureLf(content));
  await fs.writeFile(path, normalized, "utf8");
}

function isMissingFileError(error: unknown): boolean {
  if (typeof error !== "object" || error === null || !("code" in error)) {
    return false;
  }
  return error.code === "ENOENT" || error.code === "EISDIR";
}
