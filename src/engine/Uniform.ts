// Uniform — one named shader uniform with a typed value. Setting the value
// and uploading it are separate steps: renderers mutate values whenever
// their input changes and the upload happens while the program is bound.

import type { GL } from "./GL";

/** Value tuple for each uniform kind, matching the uniform{N}{f|i}v calls. */
export interface UniformValues {
  "1f": [number];
  "2f": [number, number];
  "3f": [number, number, number];
  "4f": [number, number, number, number];
  "1i": [number];
  "2i": [number, number];
  "3i": [number, number, number];
  "4i": [number, number, number, number];
}

export type UniformKind = keyof UniformValues;
export type UniformValue<K extends UniformKind> = UniformValues[K];

type Uploaders = {
  [K in UniformKind]: (gl: GL, location: WebGLUniformLocation, value: UniformValues[K]) => void;
};

const UPLOAD: Uploaders = {
  "1f": (gl, loc, v) => gl.uniform1fv(loc, v),
  "2f": (gl, loc, v) => gl.uniform2fv(loc, v),
  "3f": (gl, loc, v) => gl.uniform3fv(loc, v),
  "4f": (gl, loc, v) => gl.uniform4fv(loc, v),
  "1i": (gl, loc, v) => gl.uniform1iv(loc, v),
  "2i": (gl, loc, v) => gl.uniform2iv(loc, v),
  "3i": (gl, loc, v) => gl.uniform3iv(loc, v),
  "4i": (gl, loc, v) => gl.uniform4iv(loc, v),
};

const ZERO: { [K in UniformKind]: () => UniformValues[K] } = {
  "1f": () => [0],
  "2f": () => [0, 0],
  "3f": () => [0, 0, 0],
  "4f": () => [0, 0, 0, 0],
  "1i": () => [0],
  "2i": () => [0, 0],
  "3i": () => [0, 0, 0],
  "4i": () => [0, 0, 0, 0],
};

export function defaultUniformValue<K extends UniformKind>(kind: K): UniformValues[K] {
  return ZERO[kind]();
}

/** Names of every active uniform in a linked program, in driver order. */
export function activeUniformNames(gl: GL, program: WebGLProgram): string[] {
  const count = gl.getProgramParameter(program, gl.ACTIVE_UNIFORMS);
  if (typeof count !== "number") return [];
  const names: string[] = [];
  for (let i = 0; i < count; i++) {
    const info = gl.getActiveUniform(program, i);
    if (info) names.push(info.name);
  }
  return names;
}

export class Uniform<K extends UniformKind> {
  readonly location: WebGLUniformLocation | null;
  private current: UniformValues[K];
  private warned = false;

  constructor(
    private gl: GL,
    program: WebGLProgram,
    readonly name: string,
    readonly kind: K,
    value: UniformValues[K]
  ) {
    this.current = value;
    this.location = gl.getUniformLocation(program, name);

    // Uniforms that don't contribute to the output are stripped by the compiler.
    if (!this.location) {
      const valid = activeUniformNames(gl, program);
      console.warn(
        `[Uniform] "${name}" is not an active uniform of this program. ` +
        `Active uniforms: ${valid.length > 0 ? valid.join(", ") : "none"}`
      );
    }
  }

  /** False when the program has no such uniform; apply() is then a no-op. */
  get enabled(): boolean {
    return this.location !== null;
  }

  get value(): UniformValues[K] {
    return this.current;
  }

  setValue(value: UniformValues[K]): void {
    this.current = value;
  }

  /** Upload the held value. The owning program must be in use. */
  apply(): void {
    if (!this.location) {
      if (!this.warned) {
        console.warn(`[Uniform] skipping "${this.name}": no location`);
        this.warned = true;
      }
      return;
    }
    UPLOAD[this.kind](this.gl, this.location, this.current);
  }

  applyValue(value: UniformValues[K]): void {
    this.setValue(value);
    this.apply();
  }
}
