import {
  PRESET_NAMES,
  SCALE_KEYS,
  type PresetName,
  type ProseRules,
  type StylePreset,
  type TypographyScale,
} from "../../../src/shared/types";

/**
 * Build-time assertions over authored typography constants. A failure here
 * means the configuration itself is wrong, so every check logs and throws
 * rather than trying to repair the input.
 */

/** Reject scales containing negative or non-finite pixel values. */
export function assertValidScale(
  preset: PresetName,
  scale: TypographyScale,
): void {
  for (const key of SCALE_KEYS) {
    const value = scale[key];
    if (!Number.isFinite(value) || value < 0) {
      console.error("invalid typography value", preset, key, value);
      throw new Error(
        `${preset}.${key} must be a non-negative finite number, got ${value}`,
      );
    }
  }
}

/** Require small <= DEFAULT <= large for every measurement. */
export function assertMonotonicScales(
  scales: Readonly<Record<PresetName, TypographyScale>>,
): void {
  for (const key of SCALE_KEYS) {
    const small = scales.small[key];
    const base = scales.DEFAULT[key];
    const large = scales.large[key];
    if (small > base || base > large) {
      console.error("typography scale out of order", key, {
        small,
        DEFAULT: base,
        large,
      });
      throw new Error(
        `${key} must satisfy small <= DEFAULT <= large, got ${small}, ${base}, ${large}`,
      );
    }
  }
}

/** Flatten rules into sorted dotted key paths, e.g. `h1.fontSize`. */
export function rulesKeyPaths(rules: ProseRules): string[] {
  const paths: string[] = [];
  const entries: [string, unknown][] = Object.entries(rules);
  for (const [selector, value] of entries) {
    if (typeof value === "object" && value !== null) {
      for (const property of Object.keys(value)) {
        paths.push(`${selector}.${property}`);
      }
    } else {
      paths.push(selector);
    }
  }
  return paths.sort();
}

/** Every preset must define exactly the key paths DEFAULT defines. */
export function assertPresetParity(
  presets: Readonly<Record<PresetName, StylePreset>>,
): void {
  const expected = rulesKeyPaths(presets.DEFAULT.css);
  for (const name of PRESET_NAMES) {
    const actual = rulesKeyPaths(presets[name].css);
    const missing = expected.filter((path) => !actual.includes(path));
    const extra = actual.filter((path) => !expected.includes(path));
    if (missing.length > 0 || extra.length > 0) {
      console.error("preset keys diverge from DEFAULT", name, {
        missing,
        extra,
      });
      throw new Error(
        `Preset "${name}" does not match DEFAULT: missing [${missing.join(", ")}], extra [${extra.join(", ")}]`,
      );
    }
  }
}
