// Guards the ray/edge intersection denominator in containment tests.
export const EPSILON_CONTAINMENT = 1e-9

// Decimal places kept when printing path coordinates.
export const PATH_PRECISION = 3

// Bridge geometry, in mask pixels.
export const DEFAULT_BRIDGE_SPAN = 1
export const DEFAULT_BRIDGE_HALF_THICKNESS = 0.25

// Colour quantization bounds and defaults.
export const MIN_COLOURS = 2
export const MAX_COLOURS = 12
export const DEFAULT_MAX_COLOURS = 4

// Size of one mask pixel in the output document.
export const DEFAULT_SCALE = 10

// Channel distance from pure white/black that still gets the plain label.
export const COLOUR_LABEL_TOLERANCE = 10

export const DEFAULT_OUTPUT_DIR = './stencils'
