export interface FormatOptions {
  unit?: string;
  /** Decimal places for magnitudes below 10. */
  digits?: number;
}

export const NOT_AVAILABLE = "N/A";

export function formatValue(value: number | null, options: FormatOptions = {}): string {
  const { unit = "", digits = 3 } = options;
  if (value === null || !Number.isFinite(value)) {
    return NOT_AVAILABLE;
  }

  const magnitude = Math.abs(value);
  if (magnitude >= 100) {
    return `${value.toFixed(1)}${unit}`;
  }
  if (magnitude >= 10) {
    return `${value.toFixed(2)}${unit}`;
  }
  return `${value.toFixed(digits)}${unit}`;
}
