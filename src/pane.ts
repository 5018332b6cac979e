import { Pane } from "tweakpane";

export type PaneValue = number | boolean | string;

/** Per-key UI hints for buildPane. */
export interface ParamMeta {
  label?: string;
  min?: number;
  max?: number;
  step?: number;
  /** Dropdown entries, label → value. */
  options?: Record<string, string>;
}

export interface PaneOptions {
  title?: string;
  container?: HTMLElement;
  /** Keys to show; every key when omitted. */
  visible?: readonly string[];
  /** Called after any control changed `params`. */
  onChange?: () => void;
}

/**
 * Builds a Tweakpane panel bound to a live params object.
 *
 * The params object is mutated in place by the controls; `onChange` is where
 * the caller pushes a fresh copy into its canvas.
 */
export function buildPane(
  params: Record<string, PaneValue>,
  meta: { readonly [key: string]: ParamMeta | undefined } = {},
  options: PaneOptions = {}
): Pane {
  const pane = new Pane({ title: options.title ?? "Parameters", container: options.container });

  for (const key of Object.keys(params)) {
    if (options.visible && !options.visible.includes(key)) continue;
    const m = meta[key];

    pane.addBinding(params, key, {
      label: m?.label ?? key,
      min: m?.min,
      max: m?.max,
      step: m?.step,
      options: m?.options,
    });
  }

  const onChange = options.onChange;
  if (onChange) pane.on("change", () => onChange());

  return pane;
}
