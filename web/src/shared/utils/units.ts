import type {
  EmValue,
  RelativeUnit,
  RemValue,
  RoundedNumber,
} from "../types";

/**
 * Pixel to relative-unit conversion for generated stylesheets.
 * Values are rounded to a fixed precision so floating point noise such as
 * `0.30000000000000004` never reaches the emitted CSS.
 */

/** Fractional digits kept by {@link round}. */
export const ROUND_PRECISION = 7 as const;

/** Root font size assumed by browsers when none is configured. */
export const DEFAULT_ROOT_SIZE_PX = 16 as const;

/**
 * Format a number with {@link ROUND_PRECISION} fractional digits, then drop
 * trailing zeros and a bare `.0`. Integers come out without a decimal point.
 */
export function round(value: number): RoundedNumber {
  if (!Number.isFinite(value)) {
    throw new Error(`round requires a finite number, got ${value}`);
  }
  const formatted = value
    .toFixed(ROUND_PRECISION)
    .replace(/(\.[0-9]+?)0+$/, "$1")
    .replace(/\.0$/, "");
  // Tiny negatives collapse to "-0", which would not survive a second pass.
  return formatted === "-0" ? "0" : formatted;
}

/** Convert pixels to `rem` relative to the document root font size. */
export function toRem(
  pixels: number,
  rootSizePixels: number = DEFAULT_ROOT_SIZE_PX,
): RemValue {
  if (!Number.isFinite(pixels)) {
    throw new Error(`toRem requires finite pixels, got ${pixels}`);
  }
  if (!Number.isFinite(rootSizePixels) || rootSizePixels <= 0) {
    throw new Error(
      `toRem requires a positive root size, got ${rootSizePixels}`,
    );
  }
  return `${round(pixels / rootSizePixels)}rem`;
}

/** Convert pixels to `em` relative to the parent font size. */
export function toEm(pixels: number, basePixels: number): EmValue {
  if (!Number.isFinite(pixels)) {
    throw new Error(`toEm requires finite pixels, got ${pixels}`);
  }
  if (!Number.isFinite(basePixels) || basePixels === 0) {
    throw new Error(`toEm requires a non-zero base, got ${basePixels}`);
  }
  return `${round(pixels / basePixels)}em`;
}

const RELATIVE_UNIT_PATTERN = /^(-?\d+(?:\.\d+)?)(rem|em)$/;

/** Split a generated `rem`/`em` string back into magnitude and unit. */
export function parseRelativeUnit(value: RelativeUnit | string): {
  magnitude: number;
  unit: "rem" | "em";
} {
  const match = RELATIVE_UNIT_PATTERN.exec(value.trim());
  if (!match) {
    throw new Error(`Not a relative unit: "${value}"`);
  }
  const unit = match[2] === "em" ? "em" : "rem";
  return { magnitude: Number(match[1]), unit };
}
