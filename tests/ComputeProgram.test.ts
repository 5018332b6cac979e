import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ComputeProgram, EmptyUniformSet, UniformSet, WebGLContextError } from "../src/engine";
import { FakeGL, FakeProgram } from "./helpers/FakeGL";
import { GAIN_KERNEL_FRAG, IDENTITY_KERNEL_FRAG, SUM_KERNEL_FRAG } from "./helpers/shaders";

class GainUniforms extends UniformSet {
  readonly gain = this.uniform("u_gain", "1f", [1]);
}

// 3×2 texture: 24 floats, deliberately not representable as short decimals.
function sample(): Float32Array {
  return Float32Array.from({ length: 24 }, (_, i) => (i - 11) / 3);
}

describe("ComputeProgram", () => {
  let gl: FakeGL;

  beforeEach(() => {
    gl = new FakeGL();
    gl.registerKernel(IDENTITY_KERNEL_FRAG, (f) => f.texel("u_input_0", f.x, f.y));
    gl.registerKernel(GAIN_KERNEL_FRAG, (f) => {
      const gain = f.uniform("u_gain")[0] ?? 0;
      return f.texel("u_input_0", f.x, f.y).map((v) => v * gain);
    });
    gl.registerKernel(SUM_KERNEL_FRAG, (f) => {
      const a = f.texel("u_input_0", f.x, f.y);
      const b = f.texel("u_input_1", f.x, f.y);
      return a.map((v, i) => v + (b[i] ?? 0));
    });
    vi.spyOn(console, "info").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  function identity(): ComputeProgram<EmptyUniformSet> {
    return new ComputeProgram(gl, {
      width: 3,
      height: 2,
      inputs: 1,
      fragmentSource: IDENTITY_KERNEL_FRAG,
      uniforms: EmptyUniformSet,
    });
  }

  it("leaves data bit-identical through repeated identity ping-pong", () => {
    const compute = identity();
    const data = sample();
    compute.writeInput(0, data);

    for (let i = 0; i < 5; i++) {
      compute.compute();
      compute.copyOutputToInput(0);
    }

    expect(Array.from(compute.readOutput())).toEqual(Array.from(data));
    expect(gl.errors).toEqual([]);
  });

  it("rejects input data of the wrong length", () => {
    const compute = identity();
    expect(() => compute.writeInput(0, new Float32Array(23))).toThrow(RangeError);
    expect(() => compute.writeInput(0, new Float32Array(25))).toThrow(RangeError);
    expect(() => compute.writeInput(0, new Float32Array(24))).not.toThrow();
  });

  it("rejects an input index it does not have", () => {
    const compute = identity();
    expect(() => compute.writeInput(1, sample())).toThrow(RangeError);
    expect(() => compute.inputTexture(-1)).toThrow(RangeError);
    expect(() => compute.copyOutputToInput(2)).toThrow(RangeError);
  });

  it("draws one full-screen quad into its framebuffer at texture size", () => {
    const compute = identity();
    compute.compute();

    expect(gl.draws).toHaveLength(1);
    const [draw] = gl.draws;
    expect(draw.mode).toBe(gl.TRIANGLES);
    expect(draw.count).toBe(6);
    expect(draw.framebuffer).not.toBeNull();
    expect(draw.framebuffer?.color).not.toBeNull();
    expect(draw.viewport).toEqual([0, 0, 3, 2]);
  });

  it("uploads samplers and dimensions", () => {
    const compute = new ComputeProgram(gl, {
      width: 3,
      height: 2,
      inputs: 2,
      fragmentSource: SUM_KERNEL_FRAG,
      uniforms: EmptyUniformSet,
    });
    compute.compute();

    const values = gl.draws[0].program?.values;
    expect(values?.get("u_input_0")).toEqual([0]);
    expect(values?.get("u_input_1")).toEqual([1]);
    expect(values?.get("u_dimensions")).toEqual([3, 2]);
  });

  it("samples each input from its own texture unit", () => {
    const compute = new ComputeProgram(gl, {
      width: 3,
      height: 2,
      inputs: 2,
      fragmentSource: SUM_KERNEL_FRAG,
      uniforms: EmptyUniformSet,
    });
    compute.writeInput(0, sample());
    compute.writeInput(1, new Float32Array(24).fill(1));
    compute.compute();

    const expected = Array.from(sample(), (v) => Math.fround(v + 1));
    expect(Array.from(compute.readOutput())).toEqual(expected);
  });

  it("leaves nothing bound after compute and copy", () => {
    const compute = identity();
    compute.writeInput(0, sample());
    compute.compute();
    expect(gl.bindingsClear).toBe(true);

    compute.copyOutputToInput(0);
    expect(gl.bindingsClear).toBe(true);

    compute.readOutput();
    expect(gl.bindingsClear).toBe(true);
  });

  it("stages setUniform values until the next compute", () => {
    const compute = new ComputeProgram(gl, {
      width: 3,
      height: 2,
      inputs: 1,
      fragmentSource: GAIN_KERNEL_FRAG,
      uniforms: GainUniforms,
    });
    compute.writeInput(0, new Float32Array(24).fill(1.5));

    compute.setUniform((u) => u.gain, [2]);
    expect(compute.uniforms.gain.value).toEqual([2]);
    const programs = gl.created.filter((o): o is FakeProgram => o instanceof FakeProgram);
    expect(programs.some((p) => p.values.has("u_gain"))).toBe(false);

    compute.compute();
    expect(gl.draws[0].program?.values.get("u_gain")).toEqual([2]);
    expect(Array.from(compute.readOutput())).toEqual(new Array(24).fill(3));
  });

  it("copies the output into any same-sized texture", () => {
    const compute = identity();
    compute.writeInput(0, sample());
    compute.compute();
    compute.copyOutput(compute.inputTexture(0));
    expect(gl.errors).toEqual([]);

    const other = new ComputeProgram(gl, {
      width: 2,
      height: 2,
      inputs: 1,
      fragmentSource: IDENTITY_KERNEL_FRAG,
      uniforms: EmptyUniformSet,
    });
    expect(() => compute.copyOutput(other.inputTexture(0))).toThrow(RangeError);
  });

  it("exposes input and output textures", () => {
    const compute = identity();
    expect(compute.inputCount).toBe(1);
    expect(compute.outputTexture.width).toBe(3);
    expect(compute.outputTexture.height).toBe(2);
    expect(compute.inputTexture(0)).not.toBe(compute.outputTexture);
  });

  it("requires EXT_color_buffer_float", () => {
    const bare = new FakeGL({ extensions: [] });
    expect(
      () =>
        new ComputeProgram(bare, {
          width: 4,
          height: 4,
          inputs: 1,
          fragmentSource: IDENTITY_KERNEL_FRAG,
          uniforms: EmptyUniformSet,
        })
    ).toThrow(WebGLContextError);
  });

  it("refuses sizes beyond MAX_TEXTURE_SIZE or below one texel", () => {
    const small = new FakeGL({ maxTextureSize: 8 });
    const build = (width: number, height: number) =>
      new ComputeProgram(small, {
        width,
        height,
        inputs: 1,
        fragmentSource: IDENTITY_KERNEL_FRAG,
        uniforms: EmptyUniformSet,
      });

    expect(() => build(16, 4)).toThrow(RangeError);
    expect(() => build(4, 9)).toThrow(RangeError);
    expect(() => build(0, 4)).toThrow(RangeError);
    expect(() => build(2.5, 4)).toThrow(RangeError);
    expect(() => build(8, 8)).not.toThrow();
  });

  it("configures storage textures as nearest-filtered RGBA32F", () => {
    const compute = identity();
    const params = new Map([
      [gl.TEXTURE_MIN_FILTER, gl.NEAREST],
      [gl.TEXTURE_MAG_FILTER, gl.NEAREST],
      [gl.TEXTURE_WRAP_S, gl.CLAMP_TO_EDGE],
      [gl.TEXTURE_WRAP_T, gl.CLAMP_TO_EDGE],
    ]);
    compute.compute();
    const target = gl.draws[0].framebuffer?.color;
    expect(target?.internalFormat).toBe(gl.RGBA32F);
    expect(target?.params).toEqual(params);
  });

  it("dispose releases every GL object it created", () => {
    const compute = identity();
    compute.dispose();
    expect(gl.liveObjects).toBe(0);
  });

  describe("failed construction", () => {
    function build(target: FakeGL): ComputeProgram<EmptyUniformSet> {
      return new ComputeProgram(target, {
        width: 3,
        height: 2,
        inputs: 2,
        fragmentSource: SUM_KERNEL_FRAG,
        uniforms: EmptyUniformSet,
      });
    }

    it.each(["buffer", "vertexArray", "texture", "framebuffer"] as const)(
      "releases everything it built when %s creation fails",
      (resource) => {
        const exhausted = new FakeGL({ exhausted: [resource] });
        expect(() => build(exhausted)).toThrow();
        expect(exhausted.created.length).toBeGreaterThan(0);
        expect(exhausted.liveObjects).toBe(0);
        expect(exhausted.bindingsClear).toBe(true);
      }
    );

    it("releases everything it built when the framebuffer is incomplete", () => {
      const incomplete = new FakeGL({ incompleteFramebuffers: true });
      expect(() => build(incomplete)).toThrow("Compute FBO incomplete: 0x8cd6");
      expect(incomplete.liveObjects).toBe(0);
      expect(incomplete.bindingsClear).toBe(true);
    });

    it("reports a missing framebuffer as a context error", () => {
      expect(() => build(new FakeGL({ exhausted: ["framebuffer"] }))).toThrow(WebGLContextError);
    });
  });
});
