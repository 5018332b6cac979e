import { describe, expect, it } from "vitest";
import {
  DEFAULT_CLOCK_SETTINGS,
  VARIANT_SETTINGS,
  parseHexColor,
  toFractalClockInput,
} from "../src/clockSettings";
import { DEFAULT_FRACTAL_CLOCK_INPUT } from "../src/renderers";

describe("parseHexColor", () => {
  it("normalizes six-digit colors", () => {
    expect(parseHexColor("#40ff20", 0.5)).toEqual([64 / 255, 1, 32 / 255, 0.5]);
    expect(parseHexColor("000000", 1)).toEqual([0, 0, 0, 1]);
  });

  it("expands three-digit colors", () => {
    expect(parseHexColor("#F0F", 0.25)).toEqual([1, 0, 1, 0.25]);
  });

  it("rejects anything else", () => {
    expect(() => parseHexColor("#12345", 1)).toThrow(RangeError);
    expect(() => parseHexColor("green", 1)).toThrow('Invalid hex color "green"');
  });
});

describe("toFractalClockInput", () => {
  it("maps the default settings onto the default clock", () => {
    expect(toFractalClockInput(DEFAULT_CLOCK_SETTINGS)).toEqual(DEFAULT_FRACTAL_CLOCK_INPUT);
  });

  it("orders blend factors source then destination, RGB then alpha", () => {
    const input = toFractalClockInput({
      ...DEFAULT_CLOCK_SETTINGS,
      rgbBlend: "subtract",
      alphaBlend: "reverse-subtract",
      sourceRGB: "one",
      destinationRGB: "zero",
      sourceAlpha: "src-color",
      destinationAlpha: "dst-color",
    });
    expect(input.blendEquations).toEqual(["subtract", "reverse-subtract"]);
    expect(input.blendFactors).toEqual(["one", "zero", "src-color", "dst-color"]);
  });
});

describe("VARIANT_SETTINGS", () => {
  it("exposes blending only in the complete clock", () => {
    const blendKeys = ["rgbBlend", "alphaBlend", "sourceRGB", "destinationRGB", "sourceAlpha", "destinationAlpha"];
    expect(VARIANT_SETTINGS["complete-without-blending"].filter((k) => blendKeys.includes(k))).toEqual([]);
    expect(VARIANT_SETTINGS["complete"]).toEqual(expect.arrayContaining(blendKeys));
    expect(VARIANT_SETTINGS["trivial"]).not.toContain("recursionDepth");
    expect(VARIANT_SETTINGS["trivial-recursive-custom"]).toContain("recursionDepth");
  });
});
