export type { GL } from "./GL";
export { ShaderCompilationError, WebGLContextError } from "./errors";
export type { ShaderStage } from "./errors";
export { ShaderProgram } from "./ShaderProgram";
export { Mesh } from "./Mesh";
export type { VertexAttribute } from "./Mesh";
export { Texture } from "./Texture";
export type { TextureOptions } from "./Texture";
export { Uniform, activeUniformNames, defaultUniformValue } from "./Uniform";
export type { UniformKind, UniformValue, UniformValues } from "./Uniform";
export { UniformSet, EmptyUniformSet } from "./UniformSet";
export type { AppliableUniform, UniformSetConstructor } from "./UniformSet";
export { ComputeProgram, COMPUTE_VERTEX_SHADER } from "./ComputeProgram";
export type { ComputeProgramOptions } from "./ComputeProgram";
export { sameInput } from "./Renderer";
export type { CanvasRenderer, MouseData, RenderData, RenderLoopState } from "./Renderer";
export { CanvasSurface } from "./CanvasSurface";
export type { CanvasSurfaceOptions, SurfaceSize } from "./CanvasSurface";
export { RenderLoop, animationFrameScheduler } from "./RenderLoop";
export type { FrameScheduler, RenderLoopOptions, RenderSurface } from "./RenderLoop";
export { mountCanvas } from "./Canvas";
export type { CanvasHandle, CanvasProps, MountOptions } from "./Canvas";
