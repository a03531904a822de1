/**
 * Shared type definitions for the prose typography theme.
 * Pixel inputs are plain numbers; everything handed to Tailwind is a string.
 */

/**
 * Content-density presets understood by `@tailwindcss/typography`.
 * "small"   -> compact reading size.
 * "DEFAULT" -> the base `prose` class.
 * "large"   -> roomy reading size.
 */
export type PresetName = "DEFAULT" | "small" | "large";

/** Presets ordered from the smallest to the largest scale. */
export const PRESET_NAMES: readonly PresetName[] = [
  "small",
  "DEFAULT",
  "large",
] as const;

/** Decimal string with at most seven fractional digits and no trailing zeros. */
export type RoundedNumber = string;

export type RemValue = `${string}rem`;
export type EmValue = `${string}em`;
export type RelativeUnit = RemValue | EmValue;

/** Typographic measurements of a single preset, all in pixels. */
export interface TypographyScale {
  readonly fontSize: number;
  readonly lineHeight: number;
  /** Applied to h1, h2 and h3 together. */
  readonly headingMarginTop: number;
  readonly headingMarginBottom: number;
  readonly h1: number;
  readonly h2: number;
  readonly h3: number;
  readonly h4: number;
  readonly codeFontSize: number;
  readonly preFontSize: number;
  readonly preLineHeight: number;
}

/** Keys of {@link TypographyScale}, used to walk every measurement. */
export const SCALE_KEYS: readonly (keyof TypographyScale)[] = [
  "fontSize",
  "lineHeight",
  "headingMarginTop",
  "headingMarginBottom",
  "h1",
  "h2",
  "h3",
  "h4",
  "codeFontSize",
  "preFontSize",
  "preLineHeight",
] as const;

/**
 * Typographic rules of one preset, shaped as selector -> property -> value.
 * Every preset carries every key; only the magnitudes differ.
 */
export interface ProseRules {
  readonly fontSize: RemValue;
  readonly lineHeight: RemValue;
  readonly "h1, h2, h3": {
    readonly marginTop: RemValue;
    readonly marginBottom: RemValue;
  };
  readonly h1: { readonly fontSize: RemValue };
  readonly h2: { readonly fontSize: RemValue };
  readonly h3: { readonly fontSize: RemValue };
  readonly h4: { readonly fontSize: RemValue };
  readonly code: { readonly fontSize: RemValue };
  readonly pre: { readonly fontSize: RemValue; readonly lineHeight: RemValue };
}

export interface StylePreset {
  readonly css: ProseRules;
}

/** Colour tokens passed through to the generated rules untouched. */
export interface ProseColors {
  readonly link: string;
  readonly codeText: string;
  readonly codeBackground: string;
  readonly preText: string;
  readonly preBackground: string;
}

/** Inline code padding in pixels. */
export interface CodePadding {
  readonly block: number;
  readonly inline: number;
}

/** Non-typographic rules shared by every preset. */
export interface ProseMetadata {
  readonly p: { readonly marginTop: string };
  readonly a: { readonly color: string; readonly textDecoration: string };
  readonly "a:hover": { readonly textDecoration: string };
  readonly "code::before, code::after": { readonly content: string };
  readonly code: {
    readonly fontWeight: string;
    readonly color: string;
    readonly padding: string;
    readonly backgroundColor: string;
    readonly borderRadius: string;
  };
  readonly pre: {
    readonly color: string;
    readonly backgroundColor: string;
    readonly overflowWrap: string;
    readonly whiteSpace: string;
    readonly wordBreak: string;
  };
}

/** Fully built theme: one preset per density plus the shared rules. */
export interface ThemeDescription {
  readonly rootSize: number;
  readonly presets: Readonly<Record<PresetName, StylePreset>>;
  readonly shared: ProseMetadata;
}

/** Flat CSS-in-JS rule set accepted by `@tailwindcss/typography`. */
export type CssRules = Record<string, string | Record<string, string>>;

/** Value of `theme.extend.typography` in a Tailwind configuration. */
export type TypographyConfig = Record<PresetName, { css: CssRules }>;
