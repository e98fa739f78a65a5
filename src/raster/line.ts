import type { PixelCoordinate } from '../types/base'
import type { PixelSink } from './sink'

/**
 * Bresenham line between two integer endpoints, all octants.
 *
 * The result is 8-connected, has max(|dx|, |dy|) + 1 pixels and runs from
 * `start` to `end`. Stepping uses integer arithmetic only, with a strict
 * `error < 0` test deciding when the minor axis advances.
 */
export function rasterizeLine(start: PixelCoordinate, end: PixelCoordinate): PixelCoordinate[] {
  if (start.x === end.x && start.y === end.y) {
    return [{ x: start.x, y: start.y }]
  }

  let [x0, y0, x1, y1] = [start.x, start.y, end.x, end.y]

  // Transpose steep lines so the working slope is at most 1.
  const steep = Math.abs(y1 - y0) > Math.abs(x1 - x0)
  if (steep) {
    ;[x0, y0] = [y0, x0]
    ;[x1, y1] = [y1, x1]
  }

  // Always step left to right.
  const reversed = x0 > x1
  if (reversed) {
    ;[x0, x1] = [x1, x0]
    ;[y0, y1] = [y1, y0]
  }

  const dx = x1 - x0
  const dy = Math.abs(y1 - y0)
  const yStep = y0 < y1 ? 1 : -1
  let error = Math.floor(dx / 2)
  let y = y0

  const pixels: PixelCoordinate[] = []
  for (let x = x0; x <= x1; x++) {
    pixels.push(steep ? { x: y, y: x } : { x, y })

    error -= dy
    if (error < 0) {
      y += yStep
      error += dx
    }
  }

  return reversed ? pixels.reverse() : pixels
}

export function plotLine(start: PixelCoordinate, end: PixelCoordinate, sink: PixelSink): void {
  for (const pixel of rasterizeLine(start, end)) {
    sink.addPixel(pixel)
  }
}
