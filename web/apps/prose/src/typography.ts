import {
  PRESET_NAMES,
  type CodePadding,
  type CssRules,
  type PresetName,
  type ProseColors,
  type ProseMetadata,
  type ProseRules,
  type StylePreset,
  type ThemeDescription,
  type TypographyConfig,
  type TypographyScale,
} from "../../../src/shared/types";
import { deepFreeze } from "../../../src/shared/utils/freeze";
import { toRem } from "../../../src/shared/utils/units";
import {
  CODE_BORDER_RADIUS,
  CODE_PADDING_PX,
  PRESET_SCALES,
  ROOT_FONT_SIZE_PX,
} from "./config";
import { PROSE_COLORS } from "./palette";
import {
  assertMonotonicScales,
  assertPresetParity,
  assertValidScale,
} from "./validation";

/** Overrides for {@link buildTypographyTheme}; omitted fields use the blog defaults. */
export interface ThemeOptions {
  rootSize?: number;
  scales?: Readonly<Record<PresetName, TypographyScale>>;
  colors?: ProseColors;
  codePadding?: CodePadding;
}

/** Convert one preset's pixel scale into rem-based prose rules. */
export function scaleToRules(
  scale: TypographyScale,
  rootSize: number = ROOT_FONT_SIZE_PX,
): ProseRules {
  const rem = (px: number) => toRem(px, rootSize);
  return {
    fontSize: rem(scale.fontSize),
    lineHeight: rem(scale.lineHeight),
    "h1, h2, h3": {
      marginTop: rem(scale.headingMarginTop),
      marginBottom: rem(scale.headingMarginBottom),
    },
    h1: { fontSize: rem(scale.h1) },
    h2: { fontSize: rem(scale.h2) },
    h3: { fontSize: rem(scale.h3) },
    h4: { fontSize: rem(scale.h4) },
    code: { fontSize: rem(scale.codeFontSize) },
    pre: {
      fontSize: rem(scale.preFontSize),
      lineHeight: rem(scale.preLineHeight),
    },
  };
}

/**
 * Rules every preset inherits: links, inline code and code blocks.
 * Colours are copied as given.
 */
export function buildSharedRules(
  colors: ProseColors,
  codePadding: CodePadding,
  rootSize: number = ROOT_FONT_SIZE_PX,
): ProseMetadata {
  return {
    p: { marginTop: "0" },
    a: { color: colors.link, textDecoration: "none" },
    "a:hover": { textDecoration: "underline" },
    // The plugin wraps inline code in backticks by default.
    "code::before, code::after": { content: '""' },
    code: {
      fontWeight: "revert",
      color: colors.codeText,
      padding: `${toRem(codePadding.block, rootSize)} ${toRem(codePadding.inline, rootSize)}`,
      backgroundColor: colors.codeBackground,
      borderRadius: CODE_BORDER_RADIUS,
    },
    pre: {
      color: colors.preText,
      backgroundColor: colors.preBackground,
      overflowWrap: "break-word",
      whiteSpace: "pre-wrap",
      wordBreak: "break-all",
    },
  };
}

function assertPositiveRoot(rootSize: number): void {
  if (!Number.isFinite(rootSize) || rootSize <= 0) {
    console.error("invalid root font size", rootSize);
    throw new Error(`rootSize must be a positive finite number, got ${rootSize}`);
  }
}

function assertValidPadding(padding: CodePadding): void {
  for (const side of ["block", "inline"] as const) {
    const value = padding[side];
    if (!Number.isFinite(value) || value < 0) {
      console.error("invalid code padding", side, value);
      throw new Error(
        `codePadding.${side} must be a non-negative finite number, got ${value}`,
      );
    }
  }
}

/**
 * Build the prose theme for every density preset. Inputs are validated,
 * the presets are checked for ordering and key parity, and the result is
 * deeply frozen. Each call returns an independent value.
 */
export function buildTypographyTheme(
  options: ThemeOptions = {},
): ThemeDescription {
  const rootSize = options.rootSize ?? ROOT_FONT_SIZE_PX;
  const scales = options.scales ?? PRESET_SCALES;
  const colors = options.colors ?? PROSE_COLORS;
  const codePadding = options.codePadding ?? CODE_PADDING_PX;

  assertPositiveRoot(rootSize);
  for (const name of PRESET_NAMES) {
    assertValidScale(name, scales[name]);
  }
  assertMonotonicScales(scales);
  assertValidPadding(codePadding);

  const presets: Record<PresetName, StylePreset> = {
    DEFAULT: { css: scaleToRules(scales.DEFAULT, rootSize) },
    small: { css: scaleToRules(scales.small, rootSize) },
    large: { css: scaleToRules(scales.large, rootSize) },
  };
  assertPresetParity(presets);

  return deepFreeze({
    rootSize,
    presets,
    shared: buildSharedRules(colors, codePadding, rootSize),
  });
}

/** Copy a typed rule tree into fresh, mutable CSS-in-JS objects. */
function toCssRules(rules: ProseRules | ProseMetadata): CssRules {
  const css: CssRules = {};
  const entries: [string, unknown][] = Object.entries(rules);
  for (const [selector, value] of entries) {
    if (typeof value === "string") {
      css[selector] = value;
    } else if (typeof value === "object" && value !== null) {
      const block: Record<string, string> = {};
      const declarations: [string, unknown][] = Object.entries(value);
      for (const [property, declared] of declarations) {
        if (typeof declared === "string") block[property] = declared;
      }
      css[selector] = block;
    }
  }
  return css;
}

/** Layer `source` over `target`, merging selectors both define. */
function mergeCssRules(target: CssRules, source: CssRules): CssRules {
  const merged: CssRules = { ...target };
  for (const [selector, value] of Object.entries(source)) {
    const existing = merged[selector];
    merged[selector] =
      typeof existing === "object" && typeof value === "object"
        ? { ...existing, ...value }
        : value;
  }
  return merged;
}

/**
 * Shape a theme for `theme.extend.typography`. DEFAULT carries the shared
 * rules plus its own scale; small and large only override the scale and
 * rely on the plugin to layer them over DEFAULT.
 */
export function toTypographyConfig(theme: ThemeDescription): TypographyConfig {
  return {
    DEFAULT: {
      css: mergeCssRules(
        toCssRules(theme.shared),
        toCssRules(theme.presets.DEFAULT.css),
      ),
    },
    small: { css: toCssRules(theme.presets.small.css) },
    large: { css: toCssRules(theme.presets.large.css) },
  };
}
