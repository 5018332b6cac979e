// GL — the slice of WebGL2RenderingContext the engine actually calls.
// A real WebGL2RenderingContext satisfies it as-is; tests hand in an
// in-process stand-in that implements the same surface.

export interface GL {
  readonly VERTEX_SHADER: GLenum;
  readonly FRAGMENT_SHADER: GLenum;
  readonly COMPILE_STATUS: GLenum;
  readonly LINK_STATUS: GLenum;
  readonly ACTIVE_UNIFORMS: GLenum;
  readonly TEXTURE_2D: GLenum;
  readonly TEXTURE0: GLenum;
  readonly TEXTURE_MIN_FILTER: GLenum;
  readonly TEXTURE_MAG_FILTER: GLenum;
  readonly TEXTURE_WRAP_S: GLenum;
  readonly TEXTURE_WRAP_T: GLenum;
  readonly NEAREST: GLenum;
  readonly CLAMP_TO_EDGE: GLenum;
  readonly RGBA: GLenum;
  readonly RGBA32F: GLenum;
  readonly FLOAT: GLenum;
  readonly FRAMEBUFFER: GLenum;
  readonly COLOR_ATTACHMENT0: GLenum;
  readonly FRAMEBUFFER_COMPLETE: GLenum;
  readonly ARRAY_BUFFER: GLenum;
  readonly STATIC_DRAW: GLenum;
  readonly TRIANGLES: GLenum;
  readonly LINES: GLenum;
  readonly COLOR_BUFFER_BIT: GLenum;
  readonly BLEND: GLenum;
  readonly MAX_TEXTURE_SIZE: GLenum;

  // Shaders & programs
  createShader(type: GLenum): WebGLShader | null;
  shaderSource(shader: WebGLShader, source: string): void;
  compileShader(shader: WebGLShader): void;
  getShaderParameter(shader: WebGLShader, pname: GLenum): unknown;
  getShaderInfoLog(shader: WebGLShader): string | null;
  deleteShader(shader: WebGLShader | null): void;
  createProgram(): WebGLProgram | null;
  attachShader(program: WebGLProgram, shader: WebGLShader): void;
  linkProgram(program: WebGLProgram): void;
  getProgramParameter(program: WebGLProgram, pname: GLenum): unknown;
  getProgramInfoLog(program: WebGLProgram): string | null;
  deleteProgram(program: WebGLProgram | null): void;
  useProgram(program: WebGLProgram | null): void;
  getAttribLocation(program: WebGLProgram, name: string): GLint;

  // Uniforms
  getUniformLocation(program: WebGLProgram, name: string): WebGLUniformLocation | null;
  getActiveUniform(program: WebGLProgram, index: GLuint): WebGLActiveInfo | null;
  uniform1fv(location: WebGLUniformLocation | null, data: Float32List): void;
  uniform2fv(location: WebGLUniformLocation | null, data: Float32List): void;
  uniform3fv(location: WebGLUniformLocation | null, data: Float32List): void;
  uniform4fv(location: WebGLUniformLocation | null, data: Float32List): void;
  uniform1iv(location: WebGLUniformLocation | null, data: Int32List): void;
  uniform2iv(location: WebGLUniformLocation | null, data: Int32List): void;
  uniform3iv(location: WebGLUniformLocation | null, data: Int32List): void;
  uniform4iv(location: WebGLUniformLocation | null, data: Int32List): void;

  // Buffers & vertex arrays
  createBuffer(): WebGLBuffer | null;
  bindBuffer(target: GLenum, buffer: WebGLBuffer | null): void;
  bufferData(target: GLenum, srcData: Float32Array, usage: GLenum): void;
  deleteBuffer(buffer: WebGLBuffer | null): void;
  createVertexArray(): WebGLVertexArrayObject | null;
  bindVertexArray(array: WebGLVertexArrayObject | null): void;
  deleteVertexArray(array: WebGLVertexArrayObject | null): void;
  enableVertexAttribArray(index: GLuint): void;
  vertexAttribPointer(index: GLuint, size: GLint, type: GLenum, normalized: GLboolean, stride: GLsizei, offset: GLintptr): void;

  // Textures
  createTexture(): WebGLTexture | null;
  activeTexture(texture: GLenum): void;
  bindTexture(target: GLenum, texture: WebGLTexture | null): void;
  texParameteri(target: GLenum, pname: GLenum, param: GLint): void;
  texImage2D(
    target: GLenum, level: GLint, internalformat: GLint,
    width: GLsizei, height: GLsizei, border: GLint,
    format: GLenum, type: GLenum, pixels: ArrayBufferView | null
  ): void;
  copyTexSubImage2D(
    target: GLenum, level: GLint, xoffset: GLint, yoffset: GLint,
    x: GLint, y: GLint, width: GLsizei, height: GLsizei
  ): void;
  deleteTexture(texture: WebGLTexture | null): void;

  // Framebuffers
  createFramebuffer(): WebGLFramebuffer | null;
  bindFramebuffer(target: GLenum, framebuffer: WebGLFramebuffer | null): void;
  framebufferTexture2D(target: GLenum, attachment: GLenum, textarget: GLenum, texture: WebGLTexture | null, level: GLint): void;
  checkFramebufferStatus(target: GLenum): GLenum;
  deleteFramebuffer(framebuffer: WebGLFramebuffer | null): void;
  readPixels(x: GLint, y: GLint, width: GLsizei, height: GLsizei, format: GLenum, type: GLenum, dstData: ArrayBufferView | null): void;

  // Drawing & fixed-function state
  viewport(x: GLint, y: GLint, width: GLsizei, height: GLsizei): void;
  clearColor(red: GLclampf, green: GLclampf, blue: GLclampf, alpha: GLclampf): void;
  clear(mask: GLbitfield): void;
  drawArrays(mode: GLenum, first: GLint, count: GLsizei): void;
  enable(cap: GLenum): void;
  disable(cap: GLenum): void;
  blendEquationSeparate(modeRGB: GLenum, modeAlpha: GLenum): void;
  blendFuncSeparate(srcRGB: GLenum, dstRGB: GLenum, srcAlpha: GLenum, dstAlpha: GLenum): void;

  // Capabilities
  getParameter(pname: GLenum): unknown;
  getExtension(name: string): unknown;
}
