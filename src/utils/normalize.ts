import { MIN_VIEW_MARGIN, VIEW_MARGIN_FRACTION } from '../constants'
import type { CanvasBounds, ClipWindow, PixelCoordinate, Segment, ViewBox } from '../types/base'

function clamp(value: number, lo: number, hi: number): number {
  return value < lo ? lo : value > hi ? hi : value
}

export function normalizeClipWindow(window: ClipWindow): ClipWindow {
  return {
    xMin: Math.min(window.xMin, window.xMax),
    yMin: Math.min(window.yMin, window.yMax),
    xMax: Math.max(window.xMin, window.xMax),
    yMax: Math.max(window.yMin, window.yMax)
  }
}

export function clampToCanvas(pixel: PixelCoordinate, canvas: CanvasBounds): PixelCoordinate {
  return {
    x: clamp(pixel.x, 0, canvas.width - 1),
    y: clamp(pixel.y, 0, canvas.height - 1)
  }
}

/**
 * Radius past which a disk centred at `center` already covers every canvas
 * pixel: the distance to the farthest canvas corner, plus one for the
 * midpoint boundary.
 */
export function coveringRadius(center: PixelCoordinate, canvas: CanvasBounds): number {
  const dx = Math.max(Math.abs(center.x), Math.abs(canvas.width - 1 - center.x))
  const dy = Math.max(Math.abs(center.y), Math.abs(canvas.height - 1 - center.y))
  return Math.ceil(Math.hypot(dx, dy)) + 1
}

export function normalizeLineWidth(width: number, maxWidth = Infinity): number {
  return width < 1 ? 1 : Math.min(width, maxWidth)
}

export function normalizeRadius(radius: number, maxRadius = Infinity): number {
  return radius < 0 ? 0 : Math.min(radius, maxRadius)
}

export function canvasViewBox(canvas: CanvasBounds): ViewBox {
  return { xMin: 0, yMin: 0, width: canvas.width, height: canvas.height }
}

/**
 * Region to display for a clip scene: the window with a margin on each axis,
 * grown as needed so every segment endpoint is inside.
 */
export function computeViewBox(window: ClipWindow, segments: Segment[] = []): ViewBox {
  const marginX = Math.max(MIN_VIEW_MARGIN, (window.xMax - window.xMin) * VIEW_MARGIN_FRACTION)
  const marginY = Math.max(MIN_VIEW_MARGIN, (window.yMax - window.yMin) * VIEW_MARGIN_FRACTION)

  let left = window.xMin - marginX
  let right = window.xMax + marginX
  let bottom = window.yMin - marginY
  let top = window.yMax + marginY

  for (const { start, end } of segments) {
    for (const point of [start, end]) {
      left = Math.min(left, point.x)
      right = Math.max(right, point.x)
      bottom = Math.min(bottom, point.y)
      top = Math.max(top, point.y)
    }
  }

  return { xMin: left, yMin: bottom, width: right - left, height: top - bottom }
}
