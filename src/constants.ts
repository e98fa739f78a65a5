import type { CanvasBounds, ClipWindow } from './types/base'

export const DEFAULT_CANVAS: CanvasBounds = { width: 900, height: 600 }

export const DEFAULT_CLIP_WINDOW: ClipWindow = { xMin: -50, yMin: -50, xMax: 50, yMax: 50 }

// Display margin around a clip window: at least this much, or a fraction of its size.
export const MIN_VIEW_MARGIN = 10
export const VIEW_MARGIN_FRACTION = 0.15

// Layer colours.
export const PIXEL_COLOR = 'black'
export const SEGMENT_COLOR = '#cc1a1a'
export const CLIPPED_SEGMENT_COLOR = '#0d990d'
export const WINDOW_COLOR = '#0000ff'

export const SEGMENT_STROKE_WIDTH = 1.5
export const CLIPPED_STROKE_WIDTH = 3.5
export const WINDOW_STROKE_WIDTH = 2.5
export const ENDPOINT_MARKER_RADIUS = 3

// Decimal places kept when writing coordinates.
export const COORDINATE_PRECISION = 3

// Command-line limits that keep rasterization loops bounded.
export const MAX_CANVAS_SIZE = 16384
export const MAX_PIXEL_COORDINATE = 1e6
