export { createColorEngine } from './color-engine';
export {
  parseHexColor,
  toHex,
  rgbToHsv,
  hsvToRgb,
  relativeLuminance,
  colorDistance,
  complementary,
  computeContrastColor,
  WHITE,
  BLACK
} from './helpers';
export type {
  Hsv,
  ColorSample,
  SampleOutcome,
  EffectiveColor,
  ColorEngine,
  ColorEngineConfig,
  ColorEngineReload,
  OfferResult,
  SamplingStatus,
  ToggleResult
} from './types';
