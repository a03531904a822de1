import type {
  CodePadding,
  PresetName,
  TypographyScale,
} from "../../../src/shared/types";

/** Root font size the generated `rem` values are relative to. */
export const ROOT_FONT_SIZE_PX = 16 as const;

/** Compact reading scale; also the base `prose` scale. */
const COMPACT_SCALE: TypographyScale = {
  fontSize: 16,
  lineHeight: 24,
  headingMarginTop: 16,
  headingMarginBottom: 8,
  h1: 32,
  h2: 24,
  h3: 20,
  h4: 16,
  codeFontSize: 14,
  preFontSize: 14,
  preLineHeight: 18,
} as const;

/** Roomy reading scale. Body and headings are a quarter larger; code grows 2px. */
const ROOMY_SCALE: TypographyScale = {
  fontSize: 20,
  lineHeight: 30,
  headingMarginTop: 20,
  headingMarginBottom: 10,
  h1: 40,
  h2: 30,
  h3: 25,
  h4: 20,
  codeFontSize: 16,
  preFontSize: 16,
  preLineHeight: 20,
} as const;

/** Pixel scale for every preset. Must stay ordered small <= DEFAULT <= large. */
export const PRESET_SCALES: Readonly<Record<PresetName, TypographyScale>> = {
  small: COMPACT_SCALE,
  DEFAULT: COMPACT_SCALE,
  large: ROOMY_SCALE,
} as const;

/** Inline code padding, vertical then horizontal. */
export const CODE_PADDING_PX: CodePadding = { block: 4, inline: 8 } as const;

/** Corner radius of inline code; kept in px so it does not scale with text. */
export const CODE_BORDER_RADIUS = "3px" as const;
