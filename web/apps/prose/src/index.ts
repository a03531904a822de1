export { CODE_PADDING_PX, PRESET_SCALES, ROOT_FONT_SIZE_PX } from "./config";
export { FONT_FAMILIES } from "./fonts";
export { CODE_RED, PROSE_COLORS, WARM_GRAY } from "./palette";
export {
  SITE_CONTENT,
  createTailwindConfig,
  type TailwindConfigOptions,
} from "./tailwindConfig";
export {
  buildSharedRules,
  buildTypographyTheme,
  scaleToRules,
  toTypographyConfig,
  type ThemeOptions,
} from "./typography";
export {
  assertMonotonicScales,
  assertPresetParity,
  assertValidScale,
  rulesKeyPaths,
} from "./validation";
export {
  parseRelativeUnit,
  round,
  toEm,
  toRem,
} from "../../../src/shared/utils/units";
export { PRESET_NAMES, SCALE_KEYS } from "../../../src/shared/types";
export type * from "../../../src/shared/types";
