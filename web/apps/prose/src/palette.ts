import colors from "tailwindcss/colors";
import type { ProseColors } from "../../../src/shared/types";

/**
 * Colour tokens used by the prose rules. They are copied into the theme
 * verbatim; nothing here goes through unit conversion.
 */

/** Muted red for inline code, borrowed from the Nord palette. */
export const CODE_RED = "#bf616a" as const;

/** Warm gray ramp exposed as `gray` in the Tailwind theme. */
export const WARM_GRAY = colors.stone;

export const PROSE_COLORS: ProseColors = {
  link: colors.blue[400],
  codeText: CODE_RED,
  codeBackground: WARM_GRAY[50],
  preText: WARM_GRAY[800],
  preBackground: WARM_GRAY[50],
} as const;
