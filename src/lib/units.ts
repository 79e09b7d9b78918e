/**
 * Unit conversion and formatting utilities for module settings.
 */

/**
 * Convert a height fraction (0-1) to a percentage.
 */
export function fractionToPercent(fraction: number): number {
  return fraction * 100;
}

/**
 * Convert a percentage to a height fraction, clamped to [0, 1].
 */
export function percentToFraction(percent: number): number {
  return Math.min(1, Math.max(0, percent / 100));
}

/**
 * Format a label with its unit, e.g. "Reaction volume (mL)".
 */
export function labelWithUnit(label: string, unit?: string): string {
  return unit ? `${label} (${unit})` : label;
}

/**
 * Parse the text of a number input; blank or malformed text gives NaN.
 */
export function parseNumberInput(text: string): number {
  return text.trim() === "" ? NaN : Number(text);
}
