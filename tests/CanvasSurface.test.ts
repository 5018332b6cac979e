import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { CanvasSurface } from "../src/engine";

function rect(left: number, top: number, width: number, height: number): DOMRect {
  return {
    x: left,
    y: top,
    left,
    top,
    width,
    height,
    right: left + width,
    bottom: top + height,
    toJSON: () => ({}),
  };
}

function setClientSize(canvas: HTMLCanvasElement, width: number, height: number): void {
  Object.defineProperty(canvas, "clientWidth", { value: width, configurable: true });
  Object.defineProperty(canvas, "clientHeight", { value: height, configurable: true });
}

function setPixelRatio(ratio: number): void {
  vi.stubGlobal("devicePixelRatio", ratio);
}

describe("CanvasSurface", () => {
  let canvas: HTMLCanvasElement;
  let surface: CanvasSurface;

  beforeEach(() => {
    canvas = document.createElement("canvas");
    surface = new CanvasSurface(canvas, { maxPixelRatio: 2 });
    surface.attach();
  });

  afterEach(() => {
    surface.detach();
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  describe("mouse", () => {
    it("starts with no buttons and no position", () => {
      expect(surface.mouse).toEqual({ primaryButton: false, secondaryButton: false, position: null });
    });

    it("tracks buttons from the buttons bitmask", () => {
      canvas.dispatchEvent(new MouseEvent("mousedown", { buttons: 1 }));
      expect(surface.mouse.primaryButton).toBe(true);
      expect(surface.mouse.secondaryButton).toBe(false);

      canvas.dispatchEvent(new MouseEvent("mousedown", { buttons: 3 }));
      expect(surface.mouse.secondaryButton).toBe(true);

      canvas.dispatchEvent(new MouseEvent("mouseup", { buttons: 2 }));
      expect(surface.mouse.primaryButton).toBe(false);
      expect(surface.mouse.secondaryButton).toBe(true);

      canvas.dispatchEvent(new MouseEvent("mouseup", { buttons: 0 }));
      expect(surface.mouse.secondaryButton).toBe(false);
    });

    it("reports position relative to the canvas, floored", () => {
      vi.spyOn(canvas, "getBoundingClientRect").mockReturnValue(rect(10, 20, 100, 50));
      canvas.dispatchEvent(new MouseEvent("mousemove", { clientX: 35.7, clientY: 40 }));
      expect(surface.mouse.position).toEqual([25, 20]);
    });

    it("scales the position into drawing-buffer pixels", () => {
      setPixelRatio(1.5);
      vi.spyOn(canvas, "getBoundingClientRect").mockReturnValue(rect(10, 20, 100, 50));
      canvas.dispatchEvent(new MouseEvent("mousemove", { clientX: 35.5, clientY: 40 }));
      expect(surface.mouse.position).toEqual([38, 30]);
    });

    it("scales the position by the clamped pixel ratio", () => {
      setPixelRatio(3);
      vi.spyOn(canvas, "getBoundingClientRect").mockReturnValue(rect(0, 0, 100, 50));
      canvas.dispatchEvent(new MouseEvent("mousemove", { clientX: 10, clientY: 7 }));
      expect(surface.mouse.position).toEqual([20, 14]);
      expect(surface.pixelRatio()).toBe(2);
    });

    it("keeps only the latest of several moves", () => {
      vi.spyOn(canvas, "getBoundingClientRect").mockReturnValue(rect(0, 0, 100, 50));
      canvas.dispatchEvent(new MouseEvent("mousemove", { clientX: 1, clientY: 1 }));
      canvas.dispatchEvent(new MouseEvent("mousemove", { clientX: 2, clientY: 3 }));
      expect(surface.mouse.position).toEqual([2, 3]);
    });

    it("clears the position on leave", () => {
      canvas.dispatchEvent(new MouseEvent("mousemove", { clientX: 5, clientY: 5 }));
      canvas.dispatchEvent(new MouseEvent("mouseleave"));
      expect(surface.mouse.position).toBeNull();
    });

    it("suppresses the context menu", () => {
      const event = new MouseEvent("contextmenu", { cancelable: true });
      canvas.dispatchEvent(event);
      expect(event.defaultPrevented).toBe(true);
    });

    it("returns a snapshot, not the live state", () => {
      const before = surface.mouse;
      canvas.dispatchEvent(new MouseEvent("mousedown", { buttons: 1 }));
      expect(before.primaryButton).toBe(false);
    });

    it("stops tracking once detached", () => {
      surface.detach();
      canvas.dispatchEvent(new MouseEvent("mousedown", { buttons: 1 }));
      const event = new MouseEvent("contextmenu", { cancelable: true });
      canvas.dispatchEvent(event);

      expect(surface.mouse.primaryButton).toBe(false);
      expect(event.defaultPrevented).toBe(false);
    });
  });

  describe("resize", () => {
    it("sizes the drawing buffer by the clamped pixel ratio", () => {
      setClientSize(canvas, 300, 150);
      setPixelRatio(3);

      expect(surface.resize()).toEqual({ width: 600, height: 300, resized: true });
      expect(canvas.width).toBe(600);
      expect(canvas.height).toBe(300);
    });

    it("reports no resize when the size is unchanged", () => {
      setClientSize(canvas, 200, 120);
      setPixelRatio(1.5);

      expect(surface.resize().resized).toBe(true);
      expect(surface.resize()).toEqual({ width: 300, height: 180, resized: false });
    });

    it("floors fractional sizes", () => {
      setClientSize(canvas, 101, 51);
      setPixelRatio(1.5);
      expect(surface.resize()).toEqual({ width: 151, height: 76, resized: true });
    });

    it("never goes below one pixel", () => {
      setClientSize(canvas, 0, 0);
      setPixelRatio(1);
      expect(surface.resize()).toEqual({ width: 1, height: 1, resized: true });
    });
  });
});
