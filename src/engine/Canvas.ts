// Canvas — the mount contract. Binds a renderer to a <canvas> element: styles
// it, acquires a WebGL2 context, starts the render loop, and hands back a
// handle the page uses to push input, pause/resume, swap renderers and tear
// everything down.

import type { GL } from "./GL";
import { CanvasSurface } from "./CanvasSurface";
import { RenderLoop } from "./RenderLoop";
import type { FrameScheduler } from "./RenderLoop";
import type { CanvasRenderer, RenderLoopState } from "./Renderer";
import { WebGLContextError } from "./errors";

export interface CanvasProps<Input> {
  renderer: CanvasRenderer<unknown, Input>;
  input: Input;
  width?: string;  // CSS size, default "100%"
  height?: string; // CSS size, default "100%"
  loopState?: RenderLoopState;
}

export interface MountOptions {
  /** Use this context instead of calling canvas.getContext("webgl2"). */
  context?: GL;
  scheduler?: FrameScheduler;
  maxPixelRatio?: number;
}

export interface CanvasHandle<Input> {
  readonly canvas: HTMLCanvasElement;
  readonly loopState: RenderLoopState;
  setInput(input: Input): void;
  setLoopState(state: RenderLoopState): void;
  setRenderer(renderer: CanvasRenderer<unknown, Input>): void;
  setSize(width: string, height: string): void;
  destroy(): void;
}

function acquireContext(canvas: HTMLCanvasElement): GL {
  const gl = canvas.getContext("webgl2");
  if (!gl) throw new WebGLContextError("WebGL2 not supported");
  return gl;
}

export function mountCanvas<Input>(
  canvas: HTMLCanvasElement,
  props: CanvasProps<Input>,
  options: MountOptions = {}
): CanvasHandle<Input> {
  const setSize = (width: string, height: string): void => {
    canvas.style.width = width;
    canvas.style.height = height;
  };
  setSize(props.width ?? "100%", props.height ?? "100%");
  canvas.style.backgroundColor = "black";
  canvas.style.userSelect = "none";
  canvas.style.display = "block";

  const gl = options.context ?? acquireContext(canvas);
  const surface = new CanvasSurface(canvas, { maxPixelRatio: options.maxPixelRatio });
  surface.attach();

  const loop = new RenderLoop(surface, gl, {
    renderer: props.renderer,
    input: props.input,
    loopState: props.loopState,
    scheduler: options.scheduler,
  });

  return {
    canvas,
    get loopState() {
      return loop.loopState;
    },
    setInput: (input) => loop.setInput(input),
    setLoopState: (state) => loop.setLoopState(state),
    setRenderer: (renderer) => loop.setRenderer(renderer),
    setSize,
    destroy: () => {
      loop.destroy();
      surface.detach();
    },
  };
}
