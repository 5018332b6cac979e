// CanvasSurface — keeps the drawing buffer matched to the canvas' displayed
// size and tracks the pointer over it. Mouse state is a plain snapshot; the
// render loop copies it into each frame's RenderData. Sizes and positions are
// both in drawing-buffer pixels.

import type { MouseData } from "./Renderer";

export interface CanvasSurfaceOptions {
  /** Upper bound on devicePixelRatio used for the drawing buffer. */
  maxPixelRatio?: number;
}

export interface SurfaceSize {
  width: number;
  height: number;
  /** True when the drawing buffer was reallocated by this call. */
  resized: boolean;
}

// MouseEvent.buttons bits
const PRIMARY = 1;
const SECONDARY = 2;

export class CanvasSurface {
  readonly maxPixelRatio: number;
  private state: MouseData = { primaryButton: false, secondaryButton: false, position: null };
  private attached = false;

  constructor(readonly canvas: HTMLCanvasElement, options: CanvasSurfaceOptions = {}) {
    this.maxPixelRatio = options.maxPixelRatio ?? 2;
  }

  get mouse(): MouseData {
    return { ...this.state };
  }

  get width(): number {
    return this.canvas.width;
  }

  get height(): number {
    return this.canvas.height;
  }

  attach(): void {
    if (this.attached) return;
    this.attached = true;
    const c = this.canvas;
    c.addEventListener("mousedown", this.onMouseDown);
    c.addEventListener("mouseup", this.onMouseUp);
    c.addEventListener("mousemove", this.onMouseMove);
    c.addEventListener("mouseleave", this.onMouseLeave);
    c.addEventListener("contextmenu", this.onContextMenu);
  }

  detach(): void {
    if (!this.attached) return;
    this.attached = false;
    const c = this.canvas;
    c.removeEventListener("mousedown", this.onMouseDown);
    c.removeEventListener("mouseup", this.onMouseUp);
    c.removeEventListener("mousemove", this.onMouseMove);
    c.removeEventListener("mouseleave", this.onMouseLeave);
    c.removeEventListener("contextmenu", this.onContextMenu);
  }

  /** Match the drawing buffer to the displayed size (clamped DPR, at least 1×1). */
  resize(): SurfaceSize {
    const dpr = this.pixelRatio();
    const width = Math.max(1, Math.floor(this.canvas.clientWidth * dpr));
    const height = Math.max(1, Math.floor(this.canvas.clientHeight * dpr));

    const resized = this.canvas.width !== width || this.canvas.height !== height;
    if (resized) {
      this.canvas.width = width;
      this.canvas.height = height;
    }
    return { width, height, resized };
  }

  /** devicePixelRatio clamped to maxPixelRatio: drawing-buffer pixels per CSS pixel. */
  pixelRatio(): number {
    return Math.min(window.devicePixelRatio || 1, this.maxPixelRatio);
  }

  private onMouseDown = (e: MouseEvent): void => {
    if (e.buttons & PRIMARY) this.state.primaryButton = true;
    if (e.buttons & SECONDARY) this.state.secondaryButton = true;
  };

  private onMouseUp = (e: MouseEvent): void => {
    if (!(e.buttons & PRIMARY)) this.state.primaryButton = false;
    if (!(e.buttons & SECONDARY)) this.state.secondaryButton = false;
  };

  private onMouseMove = (e: MouseEvent): void => {
    const rect = this.canvas.getBoundingClientRect();
    const dpr = this.pixelRatio();
    this.state.position = [
      Math.floor((e.clientX - rect.left) * dpr),
      Math.floor((e.clientY - rect.top) * dpr),
    ];
  };

  private onMouseLeave = (): void => {
    this.state.position = null;
  };

  private onContextMenu = (e: MouseEvent): void => {
    e.preventDefault();
  };
}
