import { describe, expect, it } from "vitest";
import typography from "@tailwindcss/typography";
import siteConfig from "../tailwind.config";
import { FONT_FAMILIES } from "./fonts";
import { WARM_GRAY } from "./palette";
import { SITE_CONTENT, createTailwindConfig } from "./tailwindConfig";
import { buildTypographyTheme, toTypographyConfig } from "./typography";

describe("createTailwindConfig", () => {
  it("scans the site templates", () => {
    expect(createTailwindConfig().content).toEqual([
      "../index.html",
      "../_includes/*.html",
      "../_layouts/*.html",
    ]);
  });

  it("accepts other content globs", () => {
    const config = createTailwindConfig({ content: ["./posts/**/*.md"] });
    expect(config.content).toEqual(["./posts/**/*.md"]);
    expect(SITE_CONTENT).toHaveLength(3);
  });

  it("registers the typography plugin", () => {
    expect(createTailwindConfig().plugins).toEqual([typography]);
  });

  it("sets fonts and the warm gray palette", () => {
    const { theme } = createTailwindConfig();
    expect(theme?.fontFamily).toEqual(FONT_FAMILIES);
    expect(theme?.extend?.colors).toEqual({ gray: WARM_GRAY });
  });

  it("embeds the generated prose presets", () => {
    const { theme } = createTailwindConfig();
    expect(theme?.extend?.typography).toEqual(
      toTypographyConfig(buildTypographyTheme()),
    );
  });

  it("forwards theme options to the builder", () => {
    const { theme } = createTailwindConfig({ rootSize: 20 });
    expect(theme?.extend?.typography).toEqual(
      toTypographyConfig(buildTypographyTheme({ rootSize: 20 })),
    );
  });

  it("is what the site's tailwind.config.ts exports", () => {
    expect(siteConfig).toEqual(createTailwindConfig());
  });
});
