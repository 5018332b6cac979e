// Texture — an RGBA32F texture used as compute storage. Nearest filtering and
// clamp-to-edge so every texel reads back exactly as written.

import type { GL } from "./GL";

export interface TextureOptions {
  width: number;
  height: number;
  data?: Float32Array; // default: uninitialised
}

export class Texture {
  readonly handle: WebGLTexture;
  readonly width: number;
  readonly height: number;

  constructor(private gl: GL, options: TextureOptions) {
    const texture = gl.createTexture();
    if (!texture) throw new Error("Failed to create texture");

    this.handle = texture;
    this.width = options.width;
    this.height = options.height;

    gl.bindTexture(gl.TEXTURE_2D, texture);
    gl.texParameteri(gl.TEXTURE_2D, gl.TEXTURE_MIN_FILTER, gl.NEAREST);
    gl.texParameteri(gl.TEXTURE_2D, gl.TEXTURE_MAG_FILTER, gl.NEAREST);
    gl.texParameteri(gl.TEXTURE_2D, gl.TEXTURE_WRAP_S, gl.CLAMP_TO_EDGE);
    gl.texParameteri(gl.TEXTURE_2D, gl.TEXTURE_WRAP_T, gl.CLAMP_TO_EDGE);
    this.upload(options.data ?? null);
    gl.bindTexture(gl.TEXTURE_2D, null);
  }

  /** Floats per full texture: four channels per texel. */
  get length(): number {
    return this.width * this.height * 4;
  }

  write(data: Float32Array): void {
    if (data.length !== this.length) {
      throw new RangeError(
        `Texture data must hold ${this.length} floats (${this.width}x${this.height} RGBA), got ${data.length}`
      );
    }
    this.gl.bindTexture(this.gl.TEXTURE_2D, this.handle);
    this.upload(data);
    this.gl.bindTexture(this.gl.TEXTURE_2D, null);
  }

  bind(unit: number = 0): void {
    this.gl.activeTexture(this.gl.TEXTURE0 + unit);
    this.gl.bindTexture(this.gl.TEXTURE_2D, this.handle);
  }

  dispose(): void {
    this.gl.deleteTexture(this.handle);
  }

  private upload(data: Float32Array | null): void {
    const gl = this.gl;
    gl.texImage2D(gl.TEXTURE_2D, 0, gl.RGBA32F, this.width, this.height, 0, gl.RGBA, gl.FLOAT, data);
  }
}
