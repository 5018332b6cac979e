// clockSettings — the flat, panel-friendly form of the fractal clock input.
// Color is a hex string plus a separate alpha so the panel can show a color
// picker; blend settings are plain names.

import type { BlendEquation, BlendFactor, FractalClockInput, FractalClockVariant } from "./renderers";

export type ClockSettings = {
  hourAngle: number;
  minuteAngle: number;
  animate: boolean;
  hourRatio: number;
  size: number;
  sizeFactor: number;
  recursionDepth: number;
  color: string;
  alpha: number;
  rgbBlend: BlendEquation;
  alphaBlend: BlendEquation;
  sourceRGB: BlendFactor;
  destinationRGB: BlendFactor;
  sourceAlpha: BlendFactor;
  destinationAlpha: BlendFactor;
};

export const DEFAULT_CLOCK_SETTINGS: ClockSettings = {
  hourAngle: 310,
  minuteAngle: 60,
  animate: true,
  hourRatio: 0.75,
  size: 1,
  sizeFactor: 0.75,
  recursionDepth: 8,
  color: "#40ff20",
  alpha: 0.5,
  rgbBlend: "add",
  alphaBlend: "add",
  sourceRGB: "src-alpha",
  destinationRGB: "dst-alpha",
  sourceAlpha: "one",
  destinationAlpha: "one",
};

const COMPLETE: (keyof ClockSettings)[] = [
  "hourAngle",
  "minuteAngle",
  "animate",
  "hourRatio",
  "size",
  "sizeFactor",
  "recursionDepth",
  "color",
  "alpha",
  "rgbBlend",
  "alphaBlend",
  "sourceRGB",
  "destinationRGB",
  "sourceAlpha",
  "destinationAlpha",
];

/** Settings each variant exposes; the rest are fixed by the variant. */
export const VARIANT_SETTINGS: Record<FractalClockVariant, (keyof ClockSettings)[]> = {
  "trivial": ["hourAngle", "minuteAngle", "animate", "hourRatio"],
  "trivial-recursive": ["hourAngle", "minuteAngle", "animate", "hourRatio", "sizeFactor"],
  "trivial-recursive-custom": ["hourAngle", "minuteAngle", "animate", "hourRatio", "sizeFactor", "recursionDepth"],
  "complete-without-blending": COMPLETE.slice(0, 8),
  "complete": COMPLETE,
};

/** "#rrggbb" (or "#rgb") plus alpha → normalized RGBA. */
export function parseHexColor(hex: string, alpha: number): [number, number, number, number] {
  const match = /^#?([0-9a-f]{3}|[0-9a-f]{6})$/i.exec(hex.trim());
  if (!match) throw new RangeError(`Invalid hex color "${hex}"`);

  let digits = match[1];
  if (digits.length === 3) digits = digits.replace(/./g, (c) => c + c);
  const channel = (i: number): number => parseInt(digits.slice(i * 2, i * 2 + 2), 16) / 255;
  return [channel(0), channel(1), channel(2), alpha];
}

export function toFractalClockInput(settings: ClockSettings): FractalClockInput {
  return {
    hourAngle: settings.hourAngle,
    minuteAngle: settings.minuteAngle,
    animate: settings.animate,
    size: settings.size,
    recursionDepth: settings.recursionDepth,
    hourRatio: settings.hourRatio,
    sizeFactor: settings.sizeFactor,
    color: parseHexColor(settings.color, settings.alpha),
    blendEquations: [settings.rgbBlend, settings.alphaBlend],
    blendFactors: [settings.sourceRGB, settings.destinationRGB, settings.sourceAlpha, settings.destinationAlpha],
  };
}
