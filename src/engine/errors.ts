// errors — the failures the engine raises instead of a bare Error, so callers
// can tell a broken shader from a browser that can't run the demo at all.

export type ShaderStage = "vertex" | "fragment" | "link";

/**
 * A shader failed to compile, or a program failed to link.
 * `log` carries the driver's info log verbatim.
 */
export class ShaderCompilationError extends Error {
  constructor(
    message: string,
    public readonly stage: ShaderStage,
    public readonly log: string,
    public readonly source: string
  ) {
    super(message);
    this.name = "ShaderCompilationError";
  }
}

/** No WebGL2 context, or a required extension / capability is missing. */
export class WebGLContextError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "WebGLContextError";
  }
}
