import type { CanvasBounds, PixelCoordinate } from '../types/base'
import { PixelBuffer, SpanSink } from './sink'

// Emit the part of a span that falls on the canvas. Off-canvas spans are dropped.
function emitClippedSpan(
  xStart: number,
  xEnd: number,
  y: number,
  canvas: CanvasBounds,
  sink: SpanSink
): void {
  if (y < 0 || y >= canvas.height) {
    return
  }
  if (xEnd < 0 || xStart > canvas.width - 1) {
    return
  }

  sink.addSpan(Math.max(xStart, 0), Math.min(xEnd, canvas.width - 1), y)
}

/**
 * Midpoint circle fill. Each octant point (x, y) becomes horizontal spans on
 * the rows it mirrors to, so the disk is filled without a separate scanline pass.
 *
 * Spans near the 45 degree diagonal can overlap; sinks that need a strict set
 * must deduplicate.
 */
export function fillDisk(
  center: PixelCoordinate,
  radius: number,
  canvas: CanvasBounds,
  sink: SpanSink
): void {
  const { x: cx, y: cy } = center

  if (radius <= 0) {
    emitClippedSpan(cx, cx, cy, canvas, sink)
    return
  }

  let x = radius
  let y = 0
  let d = 1 - radius

  while (x >= y) {
    emitClippedSpan(cx - x, cx + x, cy + y, canvas, sink)
    if (y !== 0) {
      emitClippedSpan(cx - x, cx + x, cy - y, canvas, sink)
    }

    if (x !== y) {
      emitClippedSpan(cx - y, cx + y, cy + x, canvas, sink)
      if (x !== 0) {
        emitClippedSpan(cx - y, cx + y, cy - x, canvas, sink)
      }
    }

    y++
    if (d < 0) {
      d += 2 * y + 1
    } else {
      x--
      d += 2 * (y - x) + 1
    }
  }
}

// Raw span output of fillDisk, overlaps included.
export function rasterizeDisk(
  center: PixelCoordinate,
  radius: number,
  canvas: CanvasBounds
): PixelCoordinate[] {
  const buffer = new PixelBuffer()
  fillDisk(center, radius, canvas, buffer)
  return buffer.values()
}
