// config — demo page settings read from the query string:
//   ?demo=boids|fractal-clock|all   which demos to mount (default all)
//   ?dpr=<n>                         max device pixel ratio for the canvases

export type DemoName = "boids" | "fractal-clock";

export const DEMO_NAMES: readonly DemoName[] = ["boids", "fractal-clock"];

export const DEFAULT_MAX_PIXEL_RATIO = 2;
const MIN_PIXEL_RATIO = 0.5;
const MAX_PIXEL_RATIO = 4;

export interface DemoConfig {
  demos: DemoName[];
  maxPixelRatio: number;
}

function isDemoName(value: string): value is DemoName {
  return DEMO_NAMES.some((name) => name === value);
}

export function readDemoConfig(search: string): DemoConfig {
  const params = new URLSearchParams(search);

  const demo = params.get("demo");
  const demos = demo !== null && isDemoName(demo) ? [demo] : [...DEMO_NAMES];
  if (demo !== null && demo !== "all" && !isDemoName(demo)) {
    console.warn(`[config] unknown demo "${demo}", showing all`);
  }

  let maxPixelRatio = DEFAULT_MAX_PIXEL_RATIO;
  const dpr = params.get("dpr");
  if (dpr !== null) {
    const parsed = Number(dpr);
    if (dpr.trim() !== "" && Number.isFinite(parsed)) {
      maxPixelRatio = Math.min(MAX_PIXEL_RATIO, Math.max(MIN_PIXEL_RATIO, parsed));
    } else {
      console.warn(`[config] ignoring invalid dpr "${dpr}"`);
    }
  }

  return { demos, maxPixelRatio };
}
