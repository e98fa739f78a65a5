import type { CanvasBounds, PixelCoordinate } from '../types/base'
import { fillDisk } from './circle'
import { rasterizeLine } from './line'
import { PixelSet } from './sink'

/**
 * Thick line built by stamping a filled disk of radius floor(width / 2) on
 * every Bresenham centerline pixel. Each coordinate appears once; the order
 * of the result is unspecified.
 *
 * Work grows with centerline length times radius squared. Walking the outline
 * of the capsule instead would avoid the over-draw at each stamp.
 */
export function rasterizeThickLine(
  start: PixelCoordinate,
  end: PixelCoordinate,
  width: number,
  canvas: CanvasBounds
): PixelCoordinate[] {
  const radius = Math.max(0, Math.floor(width / 2))
  const pixels = new PixelSet()

  for (const center of rasterizeLine(start, end)) {
    fillDisk(center, radius, canvas, pixels)
  }

  return pixels.values()
}
