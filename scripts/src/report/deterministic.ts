import crypto from "node:crypto";

export function ensureTrailingNewline(input: string): string {
  return input.endsWith("\n") ? input : `${input}\n`;
}

export function ensureLf(input: string): string {
  return input.replace(/\r\n/g, "\n");
}

export function computeSha256(content: string): string {
  return crypto.createHash("sha256").update(content, "utf8").digest("hex");
}

/**
 * Sorts object keys recursively and replaces non-finite numbers with `null`
 * so that snapshots of the same run serialize identically.
 */
export function normalizeSnapshot(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => normalizeSnapshot(item));
  }

  if (value && typeof value === "object") {
    const entries = Object.entries(value)
      .map(([key, child]): [string, unknown] => [key, normalizeSnapshot(child)])
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return Object.fromEntries(entries);
  }

  if (typeof value === "number" && !Number.isFinite(value)) {
    return null;
  }

  return value;
}

export function stringifyDeterministic(value: unknown): string {
  return ensureTrailingNewline(JSON.stringify(normalizeSnapshot(value), null, 2));
}
