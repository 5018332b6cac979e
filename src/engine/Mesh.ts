// Mesh — bundles a VBO + VAO with a vertex layout description.
// You describe your attributes once and the Mesh sets up the VAO pointers:
//   1. Look up attribute locations on the program
//   2. Provide vertex data as a Float32Array
//   3. Mesh computes stride, offsets, and creates the VAO

import type { GL } from "./GL";

export interface VertexAttribute {
  location: number; // from ShaderProgram.attribute(); -1 skips the pointer
  size: number;     // number of components (e.g. 2 for vec2)
}

export class Mesh {
  readonly vao: WebGLVertexArrayObject;
  readonly vbo: WebGLBuffer;
  readonly vertexCount: number;

  constructor(
    private gl: GL,
    data: Float32Array,
    attributes: VertexAttribute[]
  ) {
    // Total floats per vertex = sum of all attribute sizes.
    const floatsPerVertex = attributes.reduce((sum, a) => sum + a.size, 0);
    this.vertexCount = floatsPerVertex > 0 ? data.length / floatsPerVertex : 0;

    const vbo = gl.createBuffer();
    if (!vbo) throw new Error("Failed to create vertex buffer");
    const vao = gl.createVertexArray();
    if (!vao) {
      gl.deleteBuffer(vbo);
      throw new Error("Failed to create VAO");
    }

    gl.bindVertexArray(vao);
    gl.bindBuffer(gl.ARRAY_BUFFER, vbo);
    gl.bufferData(gl.ARRAY_BUFFER, data, gl.STATIC_DRAW);

    const stride = floatsPerVertex * Float32Array.BYTES_PER_ELEMENT;
    let offset = 0;

    for (const attr of attributes) {
      if (attr.location >= 0) {
        gl.enableVertexAttribArray(attr.location);
        gl.vertexAttribPointer(attr.location, attr.size, gl.FLOAT, false, stride, offset);
      }
      offset += attr.size * Float32Array.BYTES_PER_ELEMENT;
    }

    gl.bindVertexArray(null);
    gl.bindBuffer(gl.ARRAY_BUFFER, null);
    this.vao = vao;
    this.vbo = vbo;
  }

  draw(mode: GLenum = this.gl.TRIANGLES, count: number = this.vertexCount): void {
    this.gl.bindVertexArray(this.vao);
    this.gl.drawArrays(mode, 0, count);
    this.gl.bindVertexArray(null);
  }

  dispose(): void {
    this.gl.deleteVertexArray(this.vao);
    this.gl.deleteBuffer(this.vbo);
  }
}
