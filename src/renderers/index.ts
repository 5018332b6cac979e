export { BoidsRenderer, DEFAULT_BOIDS_INPUT } from "./boids";
export type { BoidsInput, BoidsState } from "./boids";
export { FractalClockRenderer, DEFAULT_FRACTAL_CLOCK_INPUT, MAX_RECURSION_DEPTH, fractalClockVariant } from "./fractalClock";
export type { FractalClockInput, FractalClockState, FractalClockVariant } from "./fractalClock";
export { BLEND_EQUATIONS, BLEND_FACTORS, BLEND_EQUATION_LABELS, BLEND_FACTOR_LABELS } from "./blend";
export type { BlendEquation, BlendFactor } from "./blend";
