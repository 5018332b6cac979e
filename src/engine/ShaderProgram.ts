// ShaderProgram — compiles vertex + fragment GLSL and links them. Every draw
// and every compute pass needs a program, and the compile/link boilerplate is
// identical every time.

import type { GL } from "./GL";
import { ShaderCompilationError } from "./errors";
import type { ShaderStage } from "./errors";

export class ShaderProgram {
  readonly handle: WebGLProgram;

  constructor(
    private gl: GL,
    vertexSource: string,
    fragmentSource: string
  ) {
    const vs = this.compile("vertex", vertexSource);
    let fs: WebGLShader;
    try {
      fs = this.compile("fragment", fragmentSource);
    } catch (e) {
      gl.deleteShader(vs);
      throw e;
    }

    const program = gl.createProgram();
    if (!program) throw new Error("Failed to create program");

    gl.attachShader(program, vs);
    gl.attachShader(program, fs);
    gl.linkProgram(program);

    // Shaders are owned by the program once linked.
    gl.deleteShader(vs);
    gl.deleteShader(fs);

    if (!gl.getProgramParameter(program, gl.LINK_STATUS)) {
      const log = gl.getProgramInfoLog(program) ?? "";
      gl.deleteProgram(program);
      throw this.failure("link", log, `${vertexSource}\n${fragmentSource}`);
    }

    this.handle = program;
  }

  use(): void {
    this.gl.useProgram(this.handle);
  }

  /** Attribute location, or -1 if the linker dropped or never saw it. */
  attribute(name: string): number {
    return this.gl.getAttribLocation(this.handle, name);
  }

  dispose(): void {
    this.gl.deleteProgram(this.handle);
  }

  private compile(stage: "vertex" | "fragment", source: string): WebGLShader {
    const gl = this.gl;
    const shader = gl.createShader(stage === "vertex" ? gl.VERTEX_SHADER : gl.FRAGMENT_SHADER);
    if (!shader) throw new Error("Failed to create shader");

    gl.shaderSource(shader, source);
    gl.compileShader(shader);

    if (!gl.getShaderParameter(shader, gl.COMPILE_STATUS)) {
      const log = gl.getShaderInfoLog(shader) ?? "";
      gl.deleteShader(shader);
      throw this.failure(stage, log, source);
    }
    return shader;
  }

  private failure(stage: ShaderStage, log: string, source: string): ShaderCompilationError {
    const message = stage === "link" ? `Program link error:\n${log}` : `${stage} shader compile error:\n${log}`;
    console.error(`[ShaderProgram] ${message}`);
    return new ShaderCompilationError(message, stage, log, source);
  }
}
