// UniformSet — a fixed, declaratively-built group of uniforms. Subclasses
// declare one readonly field per uniform:
//
//   class BlurUniforms extends UniformSet {
//     readonly radius = this.uniform("u_radius", "1f", [4]);
//     readonly direction = this.uniform("u_direction", "2f");
//   }
//
// Field declaration order is the index order: the first field is entry 0,
// the next entry 1, and so on with no gaps. Each field keeps its static kind,
// so `set.radius.setValue([1, 2])` is a type error.

import type { GL } from "./GL";
import { Uniform, defaultUniformValue } from "./Uniform";
import type { UniformKind, UniformValues } from "./Uniform";

/** The kind-erased view of an entry, used for iteration and inspection. */
export interface AppliableUniform {
  readonly name: string;
  readonly kind: UniformKind;
  readonly enabled: boolean;
  apply(): void;
}

export type UniformSetConstructor<S extends UniformSet> = new (gl: GL, program: WebGLProgram) => S;

export abstract class UniformSet {
  private readonly entries: AppliableUniform[] = [];

  constructor(protected readonly gl: GL, protected readonly program: WebGLProgram) {}

  /** Build a uniform and register it at the next index. */
  protected uniform<K extends UniformKind>(name: string, kind: K, value?: UniformValues[K]): Uniform<K> {
    const uniform = new Uniform(this.gl, this.program, name, kind, value ?? defaultUniformValue(kind));
    this.entries.push(uniform);
    return uniform;
  }

  get size(): number {
    return this.entries.length;
  }

  get names(): string[] {
    return this.entries.map((u) => u.name);
  }

  at(index: number): AppliableUniform | undefined {
    return this.entries[index];
  }

  /** Index assigned at declaration, or -1 for a uniform from another set. */
  indexOf(uniform: AppliableUniform): number {
    return this.entries.indexOf(uniform);
  }

  /** Upload every entry once, in declaration order. */
  applyAll(): void {
    for (const uniform of this.entries) uniform.apply();
  }
}

export class EmptyUniformSet extends UniformSet {}
