// main.ts — entry point. Builds one section per demo (canvas, fullscreen
// button, parameter panel), mounts the renderers, and pauses whichever
// canvases are scrolled out of view.

import { mountCanvas } from "./engine";
import type { CanvasHandle } from "./engine";
import {
  BLEND_EQUATION_LABELS,
  BLEND_FACTOR_LABELS,
  BoidsRenderer,
  DEFAULT_BOIDS_INPUT,
  FractalClockRenderer,
  MAX_RECURSION_DEPTH,
  fractalClockVariant,
} from "./renderers";
import type { BoidsInput, FractalClockVariant } from "./renderers";
import { DEFAULT_CLOCK_SETTINGS, VARIANT_SETTINGS, toFractalClockInput } from "./clockSettings";
import type { ClockSettings } from "./clockSettings";
import { buildPane } from "./pane";
import type { ParamMeta } from "./pane";
import { readDemoConfig } from "./config";
import type { DemoName } from "./config";
import { watchVisibility } from "./visibility";

const config = readDemoConfig(window.location.search);

const root = document.getElementById("app");
if (!root) throw new Error("#app element missing");

// ---------------------------------------------------------------------------
// Page scaffolding
// ---------------------------------------------------------------------------

interface Section {
  stage: HTMLElement;
  canvas: HTMLCanvasElement;
  controls: HTMLElement;
}

function createSection(parent: HTMLElement, title: string): Section {
  const section = document.createElement("section");
  section.className = "demo";

  const heading = document.createElement("h2");
  heading.textContent = title;

  const stage = document.createElement("div");
  stage.className = "stage";
  const canvas = document.createElement("canvas");
  const fullscreen = document.createElement("button");
  fullscreen.className = "fullscreen";
  fullscreen.title = "Fullscreen";
  fullscreen.textContent = "⛶";
  fullscreen.addEventListener("click", () => {
    stage.requestFullscreen().catch((e: unknown) => console.warn("[main] fullscreen request failed:", e));
  });
  stage.append(canvas, fullscreen);

  const controls = document.createElement("div");
  controls.className = "controls";

  section.append(heading, stage, controls);
  parent.append(section);
  return { stage, canvas, controls };
}

// Start paused; the visibility watcher resumes on-screen canvases right away.
function pauseWhenHidden<Input>(stage: HTMLElement, handle: CanvasHandle<Input>): void {
  watchVisibility(stage, (visible) => handle.setLoopState(visible ? "rendering" : "paused"));
}

function invert(labels: Record<string, string>): Record<string, string> {
  return Object.fromEntries(Object.entries(labels).map(([value, label]) => [label, value]));
}

// ---------------------------------------------------------------------------
// Boids
// ---------------------------------------------------------------------------

const BOIDS_META: Partial<Record<keyof BoidsInput, ParamMeta>> = {
  cohesion:        { label: "Cohesion", min: 0, max: 1, step: 0.01 },
  separation:      { label: "Separation", min: 0, max: 1, step: 0.01 },
  alignment:       { label: "Alignment", min: 0, max: 1, step: 0.01 },
  edgeAvoidance:   { label: "Edge avoidance", min: 0, max: 1, step: 0.01 },
  avoidanceRadius: { label: "Avoidance radius", min: 0, max: 0.5, step: 0.005 },
  detectionRadius: { label: "Detection radius", min: 0, max: 0.5, step: 0.005 },
  minVelocity:     { label: "Min velocity", min: 0, max: 0.02, step: 0.0005 },
  maxVelocity:     { label: "Max velocity", min: 0, max: 0.02, step: 0.0005 },
  maxAcceleration: { label: "Max acceleration", min: 0, max: 0.02, step: 0.0005 },
};

function mountBoids(section: Section): void {
  const params: Record<keyof BoidsInput, number> = { ...DEFAULT_BOIDS_INPUT };
  const handle = mountCanvas(
    section.canvas,
    { renderer: new BoidsRenderer(), input: { ...params }, height: "60vh", loopState: "paused" },
    { maxPixelRatio: config.maxPixelRatio }
  );
  buildPane(params, BOIDS_META, {
    title: "Boids",
    container: section.controls,
    onChange: () => handle.setInput({ ...params }),
  });
  pauseWhenHidden(section.stage, handle);
}

// ---------------------------------------------------------------------------
// Fractal clock
// ---------------------------------------------------------------------------

const CLOCK_META: Partial<Record<keyof ClockSettings, ParamMeta>> = {
  hourAngle:        { label: "Hour angle", min: 0, max: 360, step: 1 },
  minuteAngle:      { label: "Minute angle", min: 0, max: 360, step: 1 },
  animate:          { label: "Animate" },
  hourRatio:        { label: "Hour ratio", min: 0, max: 1, step: 0.01 },
  size:             { label: "Size", min: 0, max: 2, step: 0.01 },
  sizeFactor:       { label: "Size factor", min: 0, max: 1, step: 0.01 },
  recursionDepth:   { label: "Recursion depth", min: 1, max: MAX_RECURSION_DEPTH, step: 1 },
  color:            { label: "Color" },
  alpha:            { label: "Alpha", min: 0, max: 1, step: 0.01 },
  rgbBlend:         { label: "RGB blend", options: invert(BLEND_EQUATION_LABELS) },
  alphaBlend:       { label: "Alpha blend", options: invert(BLEND_EQUATION_LABELS) },
  sourceRGB:        { label: "Source RGB", options: invert(BLEND_FACTOR_LABELS) },
  destinationRGB:   { label: "Destination RGB", options: invert(BLEND_FACTOR_LABELS) },
  sourceAlpha:      { label: "Source Alpha", options: invert(BLEND_FACTOR_LABELS) },
  destinationAlpha: { label: "Destination Alpha", options: invert(BLEND_FACTOR_LABELS) },
};

const VARIANT_LABELS: Record<FractalClockVariant, string> = {
  "trivial": "Two hands",
  "trivial-recursive": "Two levels",
  "trivial-recursive-custom": "Recursive",
  "complete-without-blending": "Colored",
  "complete": "Complete",
};

function mountFractalClock(section: Section): void {
  const settings: ClockSettings = { ...DEFAULT_CLOCK_SETTINGS };
  const view: { variant: FractalClockVariant } = { variant: "complete" };
  const input = () => fractalClockVariant(view.variant, toFractalClockInput(settings));

  const handle = mountCanvas(
    section.canvas,
    { renderer: new FractalClockRenderer(), input: input(), height: "60vh", loopState: "paused" },
    { maxPixelRatio: config.maxPixelRatio }
  );

  const settingsPane = () =>
    buildPane(settings, CLOCK_META, {
      title: "Fractal clock",
      container: section.controls,
      visible: VARIANT_SETTINGS[view.variant],
      onChange: () => handle.setInput(input()),
    });

  buildPane(view, { variant: { label: "Example", options: invert(VARIANT_LABELS) } }, {
    title: "Example",
    container: section.controls,
    onChange: () => {
      pane.dispose();
      pane = settingsPane();
      handle.setInput(input());
    },
  });
  let pane = settingsPane();

  pauseWhenHidden(section.stage, handle);
}

// ---------------------------------------------------------------------------
// Mount
// ---------------------------------------------------------------------------

const DEMOS: Record<DemoName, { title: string; mount: (section: Section) => void }> = {
  "boids": { title: "Boids", mount: mountBoids },
  "fractal-clock": { title: "Fractal clock", mount: mountFractalClock },
};

for (const name of config.demos) {
  const demo = DEMOS[name];
  const section = createSection(root, demo.title);
  try {
    demo.mount(section);
  } catch (e) {
    console.error(`[main] failed to start ${name}:`, e);
    section.stage.textContent = e instanceof Error ? e.message : String(e);
  }
}
