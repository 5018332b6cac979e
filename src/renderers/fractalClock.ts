// Fractal clock — every hand carries two smaller hands at its tip: one turned
// by the hour rotation, one by the minute rotation. Hands are complex
// numbers, so "turn and shrink" is a single complex multiply.
//
// Pointer layout (one RGBA32F texel each, xy = tip position, zw = direction):
//   0      hour hand
//   1      minute hand
//   i ≥ 2  child of pointer ⌊i/2⌋-1; even i turns by the hour rotation,
//          odd i by the minute rotation
//
// The first texture row is seeded on the CPU; each compute pass then roughly
// doubles the number of valid pointers, so depth d needs max(0, d-10)+1
// passes to fill the 2^(d+1)-2 pointers it draws.

import { glMatrix, vec2 } from "gl-matrix";
import type { CanvasRenderer, GL, RenderData } from "../engine";
import { ComputeProgram, Mesh, ShaderProgram, UniformSet } from "../engine";
import { BLEND_EQUATIONS, BLEND_FACTORS } from "./blend";
import type { BlendEquation, BlendFactor } from "./blend";

export const MAX_RECURSION_DEPTH = 16;
export const CLOCK_TEXTURE_WIDTH = 1 << 10;
export const CLOCK_TEXTURE_HEIGHT = 1 << 7;

// Enough line vertices for MAX_RECURSION_DEPTH: 4·(2^16 - 1) < 2^18.
const VERTEX_INDEX_COUNT = 1 << 18;

// Animation periods in ms: one hour-hand turn, and the minute hand twelve
// times as fast.
export const HOUR_HAND_PERIOD = 12 * 60 * 60 * 10;
export const MINUTE_HAND_PERIOD = HOUR_HAND_PERIOD / 12;

export interface FractalClockInput {
  hourAngle: number;   // degrees
  minuteAngle: number; // degrees
  animate: boolean;
  size: number;
  recursionDepth: number;
  hourRatio: number;
  sizeFactor: number;
  color: [number, number, number, number];
  /** [rgb, alpha] */
  blendEquations: [BlendEquation, BlendEquation];
  /** blendFuncSeparate order: [srcRGB, dstRGB, srcAlpha, dstAlpha] */
  blendFactors: [BlendFactor, BlendFactor, BlendFactor, BlendFactor];
}

export const DEFAULT_FRACTAL_CLOCK_INPUT: FractalClockInput = {
  hourAngle: 310,
  minuteAngle: 60,
  animate: true,
  size: 1,
  recursionDepth: 8,
  hourRatio: 0.75,
  sizeFactor: 0.75,
  color: [0x40 / 255, 1, 0x20 / 255, 0.5],
  blendEquations: ["add", "add"],
  blendFactors: ["src-alpha", "dst-alpha", "one", "one"],
};

// ---------------------------------------------------------------------------
// Example variants: progressively complete versions of the same clock
// ---------------------------------------------------------------------------

export type FractalClockVariant =
  | "trivial"
  | "trivial-recursive"
  | "trivial-recursive-custom"
  | "complete-without-blending"
  | "complete";

const OPAQUE_WHITE: FractalClockInput["color"] = [1, 1, 1, 1];

function withoutBlending(input: FractalClockInput): FractalClockInput {
  return { ...input, blendEquations: ["add", "add"], blendFactors: ["one", "zero", "one", "zero"] };
}

/** Derive the reduced input a variant shows from the full clock input. */
export function fractalClockVariant(variant: FractalClockVariant, input: FractalClockInput): FractalClockInput {
  switch (variant) {
    case "trivial":
      return withoutBlending({ ...input, size: 1, recursionDepth: 1, sizeFactor: 0.75, color: OPAQUE_WHITE });
    case "trivial-recursive":
      return withoutBlending({ ...input, size: 1, recursionDepth: 2, color: OPAQUE_WHITE });
    case "trivial-recursive-custom":
      return withoutBlending({ ...input, size: 1, color: OPAQUE_WHITE });
    case "complete-without-blending":
      return withoutBlending(input);
    case "complete":
      return input;
  }
}

// ---------------------------------------------------------------------------
// CPU side: hands and the first row of pointers
// ---------------------------------------------------------------------------

export interface ClockHands {
  hourStart: vec2;
  minuteStart: vec2;
  /** Per-level rotation applied to hour children. */
  hour: vec2;
  /** Per-level rotation applied to minute children. */
  minute: vec2;
}

type HandInput = Pick<FractalClockInput, "hourAngle" | "minuteAngle" | "animate" | "hourRatio" | "sizeFactor">;

/** Hand angles in degrees; while animating they follow `time` (ms). */
export function clockAngles(input: HandInput, time: number): [number, number] {
  if (!input.animate) return [input.hourAngle, input.minuteAngle];
  return [
    ((time % HOUR_HAND_PERIOD) / HOUR_HAND_PERIOD) * 360,
    ((time % MINUTE_HAND_PERIOD) / MINUTE_HAND_PERIOD) * 360,
  ];
}

export function clockHands(input: HandInput, time: number): ClockHands {
  const [hourDeg, minuteDeg] = clockAngles(input, time);
  const h = glMatrix.toRadian(hourDeg);
  const m = glMatrix.toRadian(minuteDeg);

  const hourStart = vec2.fromValues(Math.cos(h) * input.hourRatio, Math.sin(h) * input.hourRatio);
  const minuteStart = vec2.fromValues(Math.cos(m), Math.sin(m));
  return {
    hourStart,
    minuteStart,
    hour: vec2.scale(vec2.create(), hourStart, input.sizeFactor),
    minute: vec2.scale(vec2.create(), minuteStart, input.sizeFactor),
  };
}

/** Fill pointers 0..count-1 into `out` (4 floats each), same rule as the compute shader. */
export function seedClockPointers(hands: ClockHands, count: number, out = new Float32Array(count * 4)): Float32Array {
  if (out.length < count * 4) {
    throw new RangeError(`Pointer buffer holds ${out.length / 4} pointers, need ${count}`);
  }
  for (let i = 0; i < count; i++) {
    const o = i * 4;
    if (i < 2) {
      const start = i === 0 ? hands.hourStart : hands.minuteStart;
      out[o] = start[0];
      out[o + 1] = start[1];
      out[o + 2] = start[0];
      out[o + 3] = start[1];
      continue;
    }
    const p = (Math.floor(i / 2) - 1) * 4;
    const turn = i % 2 === 0 ? hands.hour : hands.minute;
    const ax = out[p + 2] * turn[0] - out[p + 3] * turn[1];
    const ay = out[p + 2] * turn[1] + out[p + 3] * turn[0];
    out[o] = out[p] + ax;
    out[o + 1] = out[p + 1] + ay;
    out[o + 2] = ax;
    out[o + 3] = ay;
  }
  return out;
}

export function clampRecursionDepth(depth: number): number {
  return Math.min(MAX_RECURSION_DEPTH, Math.max(1, Math.round(depth)));
}

export function computePassCount(depth: number): number {
  return Math.max(0, depth - 10) + 1;
}

export function lineVertexCount(depth: number): number {
  return 4 * (2 ** depth - 1);
}

/** Scale that fits the whole clock (all levels end to end) into `size`. */
export function clockScale(size: number, sizeFactor: number, depth: number): number {
  const reach = sizeFactor === 1 ? depth : (1 - sizeFactor ** depth) / (1 - sizeFactor);
  return size / reach;
}

// ---------------------------------------------------------------------------
// Shaders
// ---------------------------------------------------------------------------

export const CLOCK_COMPUTE_SHADER = `#version 300 es
precision highp float;

uniform sampler2D u_input_0;
uniform vec2 u_dimensions;
uniform vec2 u_hour_start;
uniform vec2 u_minute_start;
uniform vec2 u_hour;
uniform vec2 u_minute;

out vec4 outColor;

vec2 complexMul(vec2 a, vec2 b) {
  return vec2(a.x * b.x - a.y * b.y, a.x * b.y + a.y * b.x);
}

void main() {
  int width = int(u_dimensions.x);
  ivec2 coord = ivec2(gl_FragCoord.xy);
  int index = coord.y * width + coord.x;

  if (index == 0) { outColor = u_hour_start.xyxy; return; }
  if (index == 1) { outColor = u_minute_start.xyxy; return; }

  int parent = index / 2 - 1;
  vec4 p = texelFetch(u_input_0, ivec2(parent % width, parent / width), 0);
  vec2 angle = complexMul(p.zw, index % 2 == 0 ? u_hour : u_minute);
  outColor = vec4(p.xy + angle, angle);
}
`;

const CLOCK_VERT = `#version 300 es
precision highp float;

in float a_index;

uniform sampler2D u_input;
uniform vec2 u_dimensions;
uniform vec2 u_scale;

void main() {
  int vertex = int(a_index);
  int pointer = vertex / 2;
  // Even vertices start the line at the parent's tip; -1 is the centre.
  if (vertex % 2 == 0) pointer = pointer / 2 - 1;

  vec2 p = vec2(0.0);
  if (pointer >= 0) {
    int width = int(u_dimensions.x);
    p = texelFetch(u_input, ivec2(pointer % width, pointer / width), 0).xy;
  }
  // Swap axes so angle 0 points up.
  gl_Position = vec4(p.y * u_scale.x, p.x * u_scale.y, 0.0, 1.0);
}
`;

const CLOCK_FRAG = `#version 300 es
precision highp float;

uniform vec4 u_color;

out vec4 outColor;

void main() {
  outColor = u_color;
}
`;

// ---------------------------------------------------------------------------
// Renderer
// ---------------------------------------------------------------------------

export class ClockComputeUniforms extends UniformSet {
  readonly hourStart = this.uniform("u_hour_start", "2f");
  readonly minuteStart = this.uniform("u_minute_start", "2f");
  readonly hour = this.uniform("u_hour", "2f");
  readonly minute = this.uniform("u_minute", "2f");
}

class ClockDrawUniforms extends UniformSet {
  readonly input = this.uniform("u_input", "1i", [0]);
  readonly dimensions = this.uniform("u_dimensions", "2f", [CLOCK_TEXTURE_WIDTH, CLOCK_TEXTURE_HEIGHT]);
  readonly scale = this.uniform("u_scale", "2f");
  readonly color = this.uniform("u_color", "4f");
}

export interface FractalClockState {
  compute: ComputeProgram<ClockComputeUniforms>;
  program: ShaderProgram;
  uniforms: ClockDrawUniforms;
  lines: Mesh;
  seed: Float32Array;
}

function xy(v: vec2): [number, number] {
  return [v[0], v[1]];
}

export class FractalClockRenderer implements CanvasRenderer<FractalClockState, FractalClockInput> {
  initialRenderState(_input: FractalClockInput, gl: GL): FractalClockState {
    const compute = new ComputeProgram(gl, {
      width: CLOCK_TEXTURE_WIDTH,
      height: CLOCK_TEXTURE_HEIGHT,
      inputs: 1,
      fragmentSource: CLOCK_COMPUTE_SHADER,
      uniforms: ClockComputeUniforms,
    });

    let program: ShaderProgram | null = null;
    try {
      program = new ShaderProgram(gl, CLOCK_VERT, CLOCK_FRAG);
      const uniforms = new ClockDrawUniforms(gl, program.handle);

      const indices = new Float32Array(VERTEX_INDEX_COUNT);
      for (let i = 0; i < indices.length; i++) indices[i] = i;
      const lines = new Mesh(gl, indices, [{ location: program.attribute("a_index"), size: 1 }]);

      console.info(`[FractalClock] ready: ${CLOCK_TEXTURE_WIDTH}x${CLOCK_TEXTURE_HEIGHT} pointer texture`);
      return {
        compute,
        program,
        uniforms,
        lines,
        seed: new Float32Array(CLOCK_TEXTURE_WIDTH * CLOCK_TEXTURE_HEIGHT * 4),
      };
    } catch (e) {
      program?.dispose();
      compute.dispose();
      throw e;
    }
  }

  render(state: FractalClockState, input: FractalClockInput, gl: GL, data: RenderData): void {
    const depth = clampRecursionDepth(input.recursionDepth);

    if (data.initialRender || data.inputChanged || input.animate) {
      this.computePointers(state, input, depth, data.time);
    }

    gl.viewport(0, 0, data.width, data.height);
    gl.clearColor(0, 0, 0, 0);
    gl.clear(gl.COLOR_BUFFER_BIT);

    const scale = clockScale(input.size, input.sizeFactor, depth);
    state.uniforms.scale.setValue([(data.height / data.width) * scale, scale]);
    state.uniforms.color.setValue([...input.color]);

    state.program.use();
    state.compute.inputTexture(0).bind(0);
    state.uniforms.applyAll();

    gl.enable(gl.BLEND);
    gl.blendEquationSeparate(BLEND_EQUATIONS[input.blendEquations[0]], BLEND_EQUATIONS[input.blendEquations[1]]);
    const [srcRGB, dstRGB, srcAlpha, dstAlpha] = input.blendFactors;
    gl.blendFuncSeparate(BLEND_FACTORS[srcRGB], BLEND_FACTORS[dstRGB], BLEND_FACTORS[srcAlpha], BLEND_FACTORS[dstAlpha]);

    state.lines.draw(gl.LINES, lineVertexCount(depth));

    gl.disable(gl.BLEND);
    gl.bindTexture(gl.TEXTURE_2D, null);
    gl.useProgram(null);
  }

  dispose(state: FractalClockState): void {
    state.compute.dispose();
    state.program.dispose();
    state.lines.dispose();
  }

  private computePointers(state: FractalClockState, input: FractalClockInput, depth: number, time: number): void {
    const hands = clockHands(input, time);
    seedClockPointers(hands, CLOCK_TEXTURE_WIDTH, state.seed);
    state.compute.writeInput(0, state.seed);

    const { compute } = state;
    compute.setUniform((u) => u.hourStart, xy(hands.hourStart));
    compute.setUniform((u) => u.minuteStart, xy(hands.minuteStart));
    compute.setUniform((u) => u.hour, xy(hands.hour));
    compute.setUniform((u) => u.minute, xy(hands.minute));

    const passes = computePassCount(depth);
    for (let i = 0; i < passes; i++) {
      compute.compute();
      compute.copyOutputToInput(0);
    }
  }
}
