// blend — named blend equations and factors, and their WebGL enum values.
// Panels and inputs carry the names; the GL values are resolved at draw time.

export type BlendEquation = "add" | "subtract" | "reverse-subtract";

export type BlendFactor =
  | "zero"
  | "one"
  | "src-color"
  | "one-minus-src-color"
  | "dst-color"
  | "one-minus-dst-color"
  | "src-alpha"
  | "one-minus-src-alpha"
  | "dst-alpha"
  | "one-minus-dst-alpha"
  | "src-alpha-saturate";

export const BLEND_EQUATIONS: Record<BlendEquation, GLenum> = {
  "add": 0x8006,              // FUNC_ADD
  "subtract": 0x800a,         // FUNC_SUBTRACT
  "reverse-subtract": 0x800b, // FUNC_REVERSE_SUBTRACT
};

export const BLEND_FACTORS: Record<BlendFactor, GLenum> = {
  "zero": 0,
  "one": 1,
  "src-color": 0x0300,
  "one-minus-src-color": 0x0301,
  "src-alpha": 0x0302,
  "one-minus-src-alpha": 0x0303,
  "dst-alpha": 0x0304,
  "one-minus-dst-alpha": 0x0305,
  "dst-color": 0x0306,
  "one-minus-dst-color": 0x0307,
  "src-alpha-saturate": 0x0308,
};

export const BLEND_EQUATION_LABELS: Record<BlendEquation, string> = {
  "add": "Addition",
  "subtract": "Subtraction",
  "reverse-subtract": "Reverse Subtraction",
};

export const BLEND_FACTOR_LABELS: Record<BlendFactor, string> = {
  "zero": "Zero",
  "one": "One",
  "src-color": "Source Color",
  "one-minus-src-color": "One Minus Source Color",
  "dst-color": "Destination Color",
  "one-minus-dst-color": "One Minus Destination Color",
  "src-alpha": "Source Alpha",
  "one-minus-src-alpha": "One Minus Source Alpha",
  "dst-alpha": "Destination Alpha",
  "one-minus-dst-alpha": "One Minus Destination Alpha",
  "src-alpha-saturate": "Source Alpha Saturate",
};
