// Boids — a flocking simulation stepped entirely on the GPU. Each boid is one
// texel of a 10×10 RGBA32F compute texture (xy = position in clip space,
// zw = velocity). Every frame runs one compute pass, copies the result back
// into the input, then draws one triangle per boid pointing along its
// velocity.

import type { CanvasRenderer, GL, RenderData } from "../engine";
import { ComputeProgram, Mesh, ShaderProgram, UniformSet } from "../engine";

export const BOIDS_TEXTURE_SIZE = 10;
export const BOID_COUNT = BOIDS_TEXTURE_SIZE * BOIDS_TEXTURE_SIZE;
export const BOID_VERTEX_COUNT = BOID_COUNT * 3;

export interface BoidsInput {
  cohesion: number;
  separation: number;
  alignment: number;
  edgeAvoidance: number;
  avoidanceRadius: number;
  detectionRadius: number;
  minVelocity: number;
  maxVelocity: number;
  maxAcceleration: number;
}

export const DEFAULT_BOIDS_INPUT: BoidsInput = {
  cohesion: 0.5,
  separation: 0.5,
  alignment: 0.5,
  edgeAvoidance: 0.5,
  avoidanceRadius: 0.1,
  detectionRadius: 0.2,
  minVelocity: 0.005,
  maxVelocity: 0.005,
  maxAcceleration: 0.005,
};

// ---------------------------------------------------------------------------
// Simulation step
// ---------------------------------------------------------------------------

export const BOIDS_COMPUTE_SHADER = `#version 300 es
precision highp float;

uniform sampler2D u_input_0;
uniform vec2 u_dimensions;
uniform vec2 u_space;
uniform float u_cohesion;
uniform float u_separation;
uniform float u_alignment;
uniform float u_edge_avoidance;
uniform float u_avoidance_radius;
uniform float u_detection_radius;
uniform float u_min_velocity;
uniform float u_max_velocity;
uniform float u_max_acceleration;

out vec4 outColor;

vec4 boid(int i) {
  int width = int(u_dimensions.x);
  return texelFetch(u_input_0, ivec2(i % width, i / width), 0);
}

vec2 limit(vec2 v, float maxLength) {
  float len = length(v);
  return len > maxLength ? v * (maxLength / len) : v;
}

void main() {
  ivec2 coord = ivec2(gl_FragCoord.xy);
  int selfIndex = coord.y * int(u_dimensions.x) + coord.x;
  int count = int(u_dimensions.x * u_dimensions.y);

  vec4 me = texelFetch(u_input_0, coord, 0);
  // Distances are measured in aspect-corrected space.
  vec2 pos = me.xy * u_space;
  vec2 vel = me.zw;

  vec2 centre = vec2(0.0);
  vec2 heading = vec2(0.0);
  vec2 push = vec2(0.0);
  float neighbours = 0.0;

  for (int i = 0; i < count; i++) {
    if (i == selfIndex) continue;
    vec4 other = boid(i);
    vec2 offset = other.xy * u_space - pos;
    float dist = length(offset);
    if (dist < u_detection_radius) {
      centre += offset;
      heading += other.zw;
      neighbours += 1.0;
    }
    if (dist > 0.0 && dist < u_avoidance_radius) {
      push -= offset / dist * (u_avoidance_radius - dist);
    }
  }

  vec2 accel = vec2(0.0);
  if (neighbours > 0.0) {
    accel += u_cohesion * (centre / neighbours) * 0.01;
    accel += u_alignment * (heading / neighbours - vel) * 0.1;
  }
  accel += u_separation * push * 0.1;

  // Steer back once within 0.2 of an edge.
  vec2 edge = -sign(me.xy) * smoothstep(0.8, 1.0, abs(me.xy));
  accel += u_edge_avoidance * edge * 0.01;

  vel += limit(accel, u_max_acceleration);
  float speed = length(vel);
  if (speed > u_max_velocity) {
    vel *= u_max_velocity / speed;
  } else if (speed < u_min_velocity) {
    vel = speed > 0.0 ? vel * (u_min_velocity / speed) : vec2(u_min_velocity, 0.0);
  }

  outColor = vec4(clamp(me.xy + vel, -1.0, 1.0), vel);
}
`;

// ---------------------------------------------------------------------------
// Drawing
// ---------------------------------------------------------------------------

const BOIDS_VERT = `#version 300 es
precision highp float;

in float a_index;

uniform sampler2D u_input;
uniform vec2 u_dimensions;
uniform float u_aspect;

void main() {
  int vertex = int(a_index);
  int i = vertex / 3;
  int corner = vertex - i * 3;
  int width = int(u_dimensions.x);
  vec4 b = texelFetch(u_input, ivec2(i % width, i / width), 0);

  vec2 dir = length(b.zw) > 0.0 ? normalize(b.zw) : vec2(0.0, 1.0);
  vec2 side = vec2(-dir.y, dir.x);
  vec2 offset = corner == 0 ? dir * 0.03
              : corner == 1 ? (side - dir) * 0.01
              : (-side - dir) * 0.01;

  gl_Position = vec4(b.x + offset.x * u_aspect, b.y + offset.y, 0.0, 1.0);
}
`;

const BOIDS_FRAG = `#version 300 es
precision highp float;

out vec4 outColor;

void main() {
  outColor = vec4(1.0);
}
`;

export class BoidsComputeUniforms extends UniformSet {
  readonly space = this.uniform("u_space", "2f", [1, 1]);
  readonly cohesion = this.uniform("u_cohesion", "1f");
  readonly separation = this.uniform("u_separation", "1f");
  readonly alignment = this.uniform("u_alignment", "1f");
  readonly edgeAvoidance = this.uniform("u_edge_avoidance", "1f");
  readonly avoidanceRadius = this.uniform("u_avoidance_radius", "1f");
  readonly detectionRadius = this.uniform("u_detection_radius", "1f");
  readonly minVelocity = this.uniform("u_min_velocity", "1f");
  readonly maxVelocity = this.uniform("u_max_velocity", "1f");
  readonly maxAcceleration = this.uniform("u_max_acceleration", "1f");
}

class BoidsDrawUniforms extends UniformSet {
  readonly dimensions = this.uniform("u_dimensions", "2f", [BOIDS_TEXTURE_SIZE, BOIDS_TEXTURE_SIZE]);
  readonly input = this.uniform("u_input", "1i", [0]);
  readonly aspect = this.uniform("u_aspect", "1f", [1]);
}

export interface BoidsState {
  compute: ComputeProgram<BoidsComputeUniforms>;
  program: ShaderProgram;
  uniforms: BoidsDrawUniforms;
  triangles: Mesh;
}

/** Random positions and velocities in [-1, 1], four floats per boid. */
export function seedBoids(random: () => number): Float32Array {
  const data = new Float32Array(BOID_COUNT * 4);
  for (let i = 0; i < data.length; i++) data[i] = random() * 2 - 1;
  return data;
}

export class BoidsRenderer implements CanvasRenderer<BoidsState, BoidsInput> {
  constructor(private random: () => number = Math.random) {}

  initialRenderState(_input: BoidsInput, gl: GL): BoidsState {
    const compute = new ComputeProgram(gl, {
      width: BOIDS_TEXTURE_SIZE,
      height: BOIDS_TEXTURE_SIZE,
      inputs: 1,
      fragmentSource: BOIDS_COMPUTE_SHADER,
      uniforms: BoidsComputeUniforms,
    });
    let program: ShaderProgram | null = null;
    try {
      compute.writeInput(0, seedBoids(this.random));

      program = new ShaderProgram(gl, BOIDS_VERT, BOIDS_FRAG);
      const uniforms = new BoidsDrawUniforms(gl, program.handle);

      const indices = new Float32Array(BOID_VERTEX_COUNT);
      for (let i = 0; i < indices.length; i++) indices[i] = i;
      const triangles = new Mesh(gl, indices, [{ location: program.attribute("a_index"), size: 1 }]);

      console.info(`[Boids] ready: ${BOID_COUNT} boids`);
      return { compute, program, uniforms, triangles };
    } catch (e) {
      program?.dispose();
      compute.dispose();
      throw e;
    }
  }

  render(state: BoidsState, input: BoidsInput, gl: GL, data: RenderData): void {
    const { compute } = state;
    compute.setUniform((u) => u.space, [data.width / data.height, 1]);
    compute.setUniform((u) => u.cohesion, [input.cohesion]);
    compute.setUniform((u) => u.separation, [input.separation]);
    compute.setUniform((u) => u.alignment, [input.alignment]);
    compute.setUniform((u) => u.edgeAvoidance, [input.edgeAvoidance]);
    compute.setUniform((u) => u.avoidanceRadius, [input.avoidanceRadius]);
    compute.setUniform((u) => u.detectionRadius, [input.detectionRadius]);
    compute.setUniform((u) => u.minVelocity, [input.minVelocity]);
    compute.setUniform((u) => u.maxVelocity, [input.maxVelocity]);
    compute.setUniform((u) => u.maxAcceleration, [input.maxAcceleration]);

    compute.compute();
    compute.copyOutputToInput(0);

    gl.viewport(0, 0, data.width, data.height);
    gl.clearColor(0, 0, 0, 0);
    gl.clear(gl.COLOR_BUFFER_BIT);

    state.program.use();
    compute.inputTexture(0).bind(0);
    state.uniforms.aspect.setValue([data.height / data.width]);
    state.uniforms.applyAll();

    state.triangles.draw(gl.TRIANGLES, BOID_VERTEX_COUNT);

    gl.bindTexture(gl.TEXTURE_2D, null);
    gl.useProgram(null);
  }

  dispose(state: BoidsState): void {
    state.compute.dispose();
    state.program.dispose();
    state.triangles.dispose();
  }
}
