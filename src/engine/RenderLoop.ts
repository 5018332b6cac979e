// RenderLoop — owns the per-canvas frame loop, replacing a bare
// requestAnimationFrame chain with a small state machine:
//
//   rendering  draw every frame
//   paused     keep the chain alive, draw nothing
//   finished   drop the render state and stop scheduling
//
// Leaving `finished` re-initiates the chain. At most one frame is ever
// pending, so toggling states quickly never starts a second chain.

import type { GL } from "./GL";
import type { CanvasSurface } from "./CanvasSurface";
import type { CanvasRenderer, RenderData, RenderLoopState } from "./Renderer";
import { sameInput } from "./Renderer";

export interface FrameScheduler {
  request(callback: (now: number) => void): number;
  cancel(handle: number): void;
}

export const animationFrameScheduler: FrameScheduler = {
  request: (callback) => requestAnimationFrame(callback),
  cancel: (handle) => cancelAnimationFrame(handle),
};

export type RenderSurface = Pick<CanvasSurface, "resize" | "mouse">;

export interface RenderLoopOptions<Input> {
  renderer: CanvasRenderer<unknown, Input>;
  input: Input;
  loopState?: RenderLoopState;
  scheduler?: FrameScheduler;
}

// The state is kept next to the renderer that built it, so it is always
// handed back to (and disposed by) the same renderer.
interface HeldState<Input> {
  renderer: CanvasRenderer<unknown, Input>;
  value: unknown;
}

export class RenderLoop<Input> {
  private renderer: CanvasRenderer<unknown, Input>;
  private input: Input;
  private inputChanged = false;
  private state: RenderLoopState;
  private held: HeldState<Input> | null = null;
  private scheduler: FrameScheduler;
  private pending: number | null = null;
  private startTime: number | null = null;
  private lastDrawTime: number | null = null;

  constructor(
    private surface: RenderSurface,
    private gl: GL,
    options: RenderLoopOptions<Input>
  ) {
    this.renderer = options.renderer;
    this.input = options.input;
    this.state = options.loopState ?? "rendering";
    this.scheduler = options.scheduler ?? animationFrameScheduler;
    if (this.state !== "finished") this.schedule();
  }

  get loopState(): RenderLoopState {
    return this.state;
  }

  get hasRenderState(): boolean {
    return this.held !== null;
  }

  get isScheduled(): boolean {
    return this.pending !== null;
  }

  setLoopState(next: RenderLoopState): void {
    if (next === this.state) return;
    const wasFinished = this.state === "finished";
    this.state = next;
    if (wasFinished) this.restart();
  }

  setInput(input: Input): void {
    const same = this.renderer.inputEquals
      ? this.renderer.inputEquals(this.input, input)
      : sameInput(this.input, input);
    if (same) return;
    this.input = input;
    this.inputChanged = true;
  }

  setRenderer(renderer: CanvasRenderer<unknown, Input>): void {
    if (renderer === this.renderer) return;
    this.dropRenderState();
    this.renderer = renderer;
  }

  /** Finish the loop now: cancel the pending frame and release the render state. */
  destroy(): void {
    this.state = "finished";
    if (this.pending !== null) {
      this.scheduler.cancel(this.pending);
      this.pending = null;
    }
    this.dropRenderState();
  }

  private restart(): void {
    this.dropRenderState();
    this.startTime = null;
    this.lastDrawTime = null;
    if (this.pending === null) this.schedule();
  }

  private schedule(): void {
    this.pending = this.scheduler.request(this.tick);
  }

  private tick = (now: number): void => {
    this.pending = null;

    if (this.state === "finished") {
      this.dropRenderState();
      return;
    }

    if (this.startTime === null) this.startTime = now;
    if (this.state === "rendering") this.draw(now - this.startTime);

    if (this.state !== "finished") this.schedule();
  };

  private draw(time: number): void {
    const { width, height, resized } = this.surface.resize();
    const data: RenderData = {
      initialRender: this.held === null,
      width,
      height,
      resized,
      inputChanged: this.inputChanged,
      time,
      deltaTime: this.lastDrawTime === null ? 0 : time - this.lastDrawTime,
      mouse: this.surface.mouse,
    };
    this.inputChanged = false;

    try {
      if (!this.held) {
        this.held = {
          renderer: this.renderer,
          value: this.renderer.initialRenderState(this.input, this.gl, data),
        };
      }
      this.held.renderer.render(this.held.value, this.input, this.gl, data);
    } catch (e) {
      console.error("[RenderLoop] renderer failed, stopping loop:", e);
      this.state = "finished";
      this.dropRenderState();
      return;
    }
    this.lastDrawTime = time;
  }

  private dropRenderState(): void {
    const held = this.held;
    if (!held) return;
    this.held = null;
    try {
      held.renderer.dispose?.(held.value, this.gl);
    } catch (e) {
      console.error("[RenderLoop] failed to release render state:", e);
    }
  }
}
