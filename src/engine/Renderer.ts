// Renderer — the strategy interface a mounted canvas drives once per frame.
// A renderer builds its GPU state lazily from the first frame's data, then
// draws from (state, input, frame data). The loop owns the state and hands it
// back every frame; the renderer never stores it itself.

import type { GL } from "./GL";

export type RenderLoopState = "rendering" | "paused" | "finished";

export interface MouseData {
  primaryButton: boolean;
  secondaryButton: boolean;
  /** Drawing-buffer pixels from the canvas' top-left corner, like RenderData.width; null while outside it. */
  position: readonly [number, number] | null;
}

/** Immutable snapshot handed to the renderer each frame. */
export interface RenderData {
  /** True for the first frame after the render state was (re)created. */
  readonly initialRender: boolean;
  /** Drawing-buffer size in device pixels. */
  readonly width: number;
  readonly height: number;
  readonly resized: boolean;
  readonly inputChanged: boolean;
  /** Milliseconds since this loop started. */
  readonly time: number;
  /** Milliseconds since the previous frame that drew. */
  readonly deltaTime: number;
  readonly mouse: Readonly<MouseData>;
}

export interface CanvasRenderer<State, Input> {
  initialRenderState(input: Input, gl: GL, data: RenderData): State;

  /**
   * Draw one frame. Leaves blending disabled and programs, buffers, vertex
   * arrays and textures unbound.
   */
  render(state: State, input: Input, gl: GL, data: RenderData): void;

  /** Release GPU objects owned by a state that is being dropped. */
  dispose?(state: State, gl: GL): void;

  /** Input equality used to suppress no-op input updates. Defaults to sameInput. */
  inputEquals?(a: Input, b: Input): boolean;
}

/**
 * Shallow equality: identical values, or objects with the same keys whose
 * values are identical (arrays compared element by element).
 */
export function sameInput<T>(a: T, b: T): boolean {
  if (Object.is(a, b)) return true;
  if (typeof a !== "object" || typeof b !== "object" || a === null || b === null) return false;

  const keysA = Object.keys(a);
  const keysB = Object.keys(b);
  if (keysA.length !== keysB.length) return false;

  return keysA.every((key) => {
    if (!keysB.includes(key)) return false;
    const va: unknown = Reflect.get(a, key);
    const vb: unknown = Reflect.get(b, key);
    if (Object.is(va, vb)) return true;
    if (Array.isArray(va) && Array.isArray(vb)) {
      return va.length === vb.length && va.every((v, i) => Object.is(v, vb[i]));
    }
    return false;
  });
}
