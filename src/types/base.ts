export type Point = {
  x: number
  y: number
}

// Integer coordinates in pixel space.
export type PixelCoordinate = {
  x: number
  y: number
}

export type Segment = {
  start: Point
  end: Point
}

// Axis-aligned rectangle. Callers keep xMin <= xMax and yMin <= yMax.
export type ClipWindow = {
  xMin: number
  yMin: number
  xMax: number
  yMax: number
}

export type CanvasBounds = {
  width: number
  height: number
}

export type ViewBox = {
  xMin: number
  yMin: number
  width: number
  height: number
}

export type ClipOutcome = { visible: true; segment: Segment } | { visible: false }
