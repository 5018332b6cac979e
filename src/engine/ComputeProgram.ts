// ComputeProgram — general-purpose GPU compute on WebGL2. A fragment shader
// runs once per texel of a width×height RGBA32F output texture by drawing a
// full-screen quad into a framebuffer. The result can be copied back into one
// of the inputs, so iterating compute() + copyOutputToInput() steps a
// simulation forward without ever leaving the GPU (ping-pong).
//
// The fragment shader sees:
//   uniform sampler2D u_input_0 .. u_input_{N-1}   bound to units 0..N-1
//   uniform vec2 u_dimensions                       (width, height)
// plus whatever the caller's UniformSet declares.

import type { GL } from "./GL";
import { ShaderProgram } from "./ShaderProgram";
import { Texture } from "./Texture";
import { Mesh } from "./Mesh";
import { Uniform } from "./Uniform";
import type { UniformKind, UniformValues } from "./Uniform";
import type { UniformSet, UniformSetConstructor } from "./UniformSet";
import { WebGLContextError } from "./errors";

export const COMPUTE_VERTEX_SHADER = `#version 300 es
in vec2 a_position;

void main() {
  gl_Position = vec4(a_position, 0.0, 1.0);
}
`;

// Two triangles covering clip space.
const QUAD = new Float32Array([
  -1, -1,  1, -1,  -1, 1,
  -1,  1,  1, -1,   1, 1,
]);

export interface ComputeProgramOptions<S extends UniformSet> {
  width: number;
  height: number;
  inputs: number;
  fragmentSource: string;
  uniforms: UniformSetConstructor<S>;
}

interface Releasable {
  dispose(): void;
}

interface ComputeInput {
  texture: Texture;
  sampler: Uniform<"1i">;
}

export class ComputeProgram<S extends UniformSet> {
  readonly width: number;
  readonly height: number;
  readonly uniforms: S;

  private program: ShaderProgram;
  private inputs: ComputeInput[];
  private output: Texture;
  private framebuffer: WebGLFramebuffer;
  private quad: Mesh;
  private dimensions: Uniform<"2f">;

  constructor(private gl: GL, options: ComputeProgramOptions<S>) {
    const { width, height, inputs } = options;
    if (!Number.isInteger(width) || !Number.isInteger(height) || width < 1 || height < 1) {
      throw new RangeError(`Compute size must be positive integers, got ${width}x${height}`);
    }
    if (!Number.isInteger(inputs) || inputs < 0) {
      throw new RangeError(`Compute input count must be a non-negative integer, got ${inputs}`);
    }

    // Rendering into RGBA32F requires this extension.
    if (!gl.getExtension("EXT_color_buffer_float")) {
      throw new WebGLContextError("EXT_color_buffer_float not supported");
    }
    const maxSize = gl.getParameter(gl.MAX_TEXTURE_SIZE);
    if (typeof maxSize === "number" && (width > maxSize || height > maxSize)) {
      throw new RangeError(`Compute size ${width}x${height} exceeds MAX_TEXTURE_SIZE ${maxSize}`);
    }

    this.width = width;
    this.height = height;

    // Everything allocated so far, released in reverse if a later step throws.
    const built: Releasable[] = [];
    const keep = <T extends Releasable>(resource: T): T => {
      built.push(resource);
      return resource;
    };

    try {
      const program = keep(new ShaderProgram(gl, COMPUTE_VERTEX_SHADER, options.fragmentSource));
      const handle = program.handle;

      const computeInputs = Array.from({ length: inputs }, (_, i) => ({
        texture: keep(new Texture(gl, { width, height })),
        sampler: new Uniform(gl, handle, `u_input_${i}`, "1i", [i]),
      }));
      const output = keep(new Texture(gl, { width, height }));
      const quad = keep(new Mesh(gl, QUAD, [{ location: program.attribute("a_position"), size: 2 }]));

      const framebuffer = gl.createFramebuffer();
      if (!framebuffer) throw new WebGLContextError("Failed to create framebuffer");
      keep({ dispose: () => gl.deleteFramebuffer(framebuffer) });

      gl.bindFramebuffer(gl.FRAMEBUFFER, framebuffer);
      gl.framebufferTexture2D(gl.FRAMEBUFFER, gl.COLOR_ATTACHMENT0, gl.TEXTURE_2D, output.handle, 0);
      const status = gl.checkFramebufferStatus(gl.FRAMEBUFFER);
      gl.bindFramebuffer(gl.FRAMEBUFFER, null);
      if (status !== gl.FRAMEBUFFER_COMPLETE) {
        throw new WebGLContextError(`Compute FBO incomplete: 0x${status.toString(16)}`);
      }

      this.program = program;
      this.inputs = computeInputs;
      this.output = output;
      this.quad = quad;
      this.framebuffer = framebuffer;
      this.dimensions = new Uniform(gl, handle, "u_dimensions", "2f", [width, height]);
      this.uniforms = new options.uniforms(gl, handle);
    } catch (e) {
      for (const resource of built.reverse()) resource.dispose();
      throw e;
    }
  }

  get inputCount(): number {
    return this.inputs.length;
  }

  get outputTexture(): Texture {
    return this.output;
  }

  inputTexture(index: number): Texture {
    return this.input(index).texture;
  }

  /** Replace the contents of input `index`; `data` holds width·height·4 floats. */
  writeInput(index: number, data: Float32Array): void {
    this.input(index).texture.write(data);
  }

  /** Stage a value for one of this program's own uniforms; uploaded by compute(). */
  setUniform<K extends UniformKind>(select: (uniforms: S) => Uniform<K>, value: UniformValues[K]): void {
    select(this.uniforms).setValue(value);
  }

  /** Run the fragment shader once per output texel. */
  compute(): void {
    const gl = this.gl;

    this.program.use();
    gl.bindFramebuffer(gl.FRAMEBUFFER, this.framebuffer);
    this.inputs.forEach(({ texture, sampler }, unit) => {
      texture.bind(unit);
      sampler.apply();
    });
    this.dimensions.apply();
    this.uniforms.applyAll();

    gl.viewport(0, 0, this.width, this.height);
    this.quad.draw(gl.TRIANGLES, 6);

    for (let unit = 0; unit < this.inputs.length; unit++) {
      gl.activeTexture(gl.TEXTURE0 + unit);
      gl.bindTexture(gl.TEXTURE_2D, null);
    }
    gl.activeTexture(gl.TEXTURE0);
    gl.bindFramebuffer(gl.FRAMEBUFFER, null);
    gl.useProgram(null);
  }

  /** Copy the last compute() result into any texture of the same size. */
  copyOutput(target: Texture): void {
    if (target.width !== this.width || target.height !== this.height) {
      throw new RangeError(
        `Copy target is ${target.width}x${target.height}, output is ${this.width}x${this.height}`
      );
    }
    const gl = this.gl;
    gl.bindFramebuffer(gl.FRAMEBUFFER, this.framebuffer);
    target.bind(0);
    gl.copyTexSubImage2D(gl.TEXTURE_2D, 0, 0, 0, 0, 0, this.width, this.height);
    gl.bindTexture(gl.TEXTURE_2D, null);
    gl.bindFramebuffer(gl.FRAMEBUFFER, null);
  }

  copyOutputToInput(index: number): void {
    this.copyOutput(this.input(index).texture);
  }

  /** Blocking GPU→CPU read of the output. Not meant for per-frame use. */
  readOutput(): Float32Array {
    const gl = this.gl;
    const out = new Float32Array(this.width * this.height * 4);
    gl.bindFramebuffer(gl.FRAMEBUFFER, this.framebuffer);
    gl.readPixels(0, 0, this.width, this.height, gl.RGBA, gl.FLOAT, out);
    gl.bindFramebuffer(gl.FRAMEBUFFER, null);
    return out;
  }

  dispose(): void {
    for (const { texture } of this.inputs) texture.dispose();
    this.output.dispose();
    this.gl.deleteFramebuffer(this.framebuffer);
    this.quad.dispose();
    this.program.dispose();
  }

  private input(index: number): ComputeInput {
    const input = this.inputs[index];
    if (!input) {
      throw new RangeError(`Compute input ${index} out of range (have ${this.inputs.length})`);
    }
    return input;
  }
}
