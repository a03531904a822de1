/**
 * Font stacks for the Tailwind `fontFamily` theme key. Quoted names contain
 * spaces and must keep their quotes in the emitted CSS.
 */
export const FONT_FAMILIES: Record<"sans" | "serif" | "mono", string[]> = {
  sans: ['"PT Sans"', "Helvetica", "Arial", "sans-serif"],
  // Display face for titles only.
  serif: ['"Abril Fatface"', "serif"],
  mono: [
    '"JetBrains Mono"',
    "ui-monospace",
    "SFMono-Regular",
    "Menlo",
    "Monaco",
    "Consolas",
    '"Liberation Mono"',
    '"Courier New"',
    "monospace",
  ],
};
