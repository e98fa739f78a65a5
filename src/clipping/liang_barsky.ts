import type { ClipOutcome, ClipWindow, Point, Segment } from '../types/base'

// Window edges in constraint order.
enum Edge {
  Left,
  Right,
  Bottom,
  Top
}

function clamp(value: number, lo: number, hi: number): number {
  return value < lo ? lo : value > hi ? hi : value
}

/**
 * Endpoint of the visible part at parameter t. A bound of 0 or 1 keeps the
 * input endpoint, and a bound set by an edge lands exactly on that edge, so
 * rounding never pushes the result outside the window.
 */
function endpointAt(
  segment: Segment,
  t: number,
  edge: Edge | null,
  window: ClipWindow
): Point {
  let point: Point
  if (t === 0) {
    point = { ...segment.start }
  } else if (t === 1) {
    point = { ...segment.end }
  } else {
    point = {
      x: segment.start.x + t * (segment.end.x - segment.start.x),
      y: segment.start.y + t * (segment.end.y - segment.start.y)
    }
    if (edge === Edge.Left) point.x = window.xMin
    if (edge === Edge.Right) point.x = window.xMax
    if (edge === Edge.Bottom) point.y = window.yMin
    if (edge === Edge.Top) point.y = window.yMax
  }

  return {
    x: clamp(point.x, window.xMin, window.xMax),
    y: clamp(point.y, window.yMin, window.yMax)
  }
}

/**
 * Liang-Barsky clip of a segment against an axis-aligned window.
 *
 * The segment is treated as start + t * (end - start), t in [0, 1]. Each window
 * edge gives a constraint p * t <= q; entering edges (p < 0) raise the lower
 * bound, leaving edges (p > 0) lower the upper bound. Edges are inclusive, so a
 * segment lying on the boundary stays visible.
 */
export function clipSegment(segment: Segment, window: ClipWindow): ClipOutcome {
  const { start } = segment
  const dx = segment.end.x - start.x
  const dy = segment.end.y - start.y

  const p = [-dx, dx, -dy, dy]
  const q = [
    start.x - window.xMin,
    window.xMax - start.x,
    start.y - window.yMin,
    window.yMax - start.y
  ]

  let tEnter = 0
  let tLeave = 1
  let enterEdge: Edge | null = null
  let leaveEdge: Edge | null = null

  for (const edge of [Edge.Left, Edge.Right, Edge.Bottom, Edge.Top]) {
    if (p[edge] === 0) {
      // Parallel to this edge: fully outside or no restriction.
      if (q[edge] < 0) {
        return { visible: false }
      }
      continue
    }

    const t = q[edge] / p[edge]
    if (p[edge] < 0) {
      if (t > tEnter) {
        tEnter = t
        enterEdge = edge
      }
    } else {
      if (t < tLeave) {
        tLeave = t
        leaveEdge = edge
      }
    }
  }

  if (tEnter > tLeave) {
    return { visible: false }
  }

  return {
    visible: true,
    segment: {
      start: endpointAt(segment, tEnter, enterEdge, window),
      end: endpointAt(segment, tLeave, leaveEdge, window)
    }
  }
}

// Visible parts of a batch of segments, in input order.
export function clipSegments(segments: Segment[], window: ClipWindow): Segment[] {
  const clipped: Segment[] = []
  for (const segment of segments) {
    const outcome = clipSegment(segment, window)
    if (outcome.visible) {
      clipped.push(outcome.segment)
    }
  }
  return clipped
}
