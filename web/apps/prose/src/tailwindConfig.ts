import type { Config } from "tailwindcss";
import typography from "@tailwindcss/typography";
import { FONT_FAMILIES } from "./fonts";
import { WARM_GRAY } from "./palette";
import {
  buildTypographyTheme,
  toTypographyConfig,
  type ThemeOptions,
} from "./typography";

/** Templates scanned for class names, relative to the styles directory. */
export const SITE_CONTENT: readonly string[] = [
  "../index.html",
  "../_includes/*.html",
  "../_layouts/*.html",
] as const;

export interface TailwindConfigOptions extends ThemeOptions {
  content?: readonly string[];
}

/**
 * Complete Tailwind configuration for the blog: font stacks, warm gray
 * palette and the generated prose presets wired into the typography plugin.
 */
export function createTailwindConfig(
  options: TailwindConfigOptions = {},
): Config {
  const { content = SITE_CONTENT, ...themeOptions } = options;
  return {
    content: [...content],
    theme: {
      fontFamily: FONT_FAMILIES,
      extend: {
        colors: { gray: WARM_GRAY },
        typography: toTypographyConfig(buildTypographyTheme(themeOptions)),
      },
    },
    plugins: [typography],
  };
}
