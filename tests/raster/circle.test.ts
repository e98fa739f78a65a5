import { describe, expect, it } from 'vitest'
import { fillDisk, rasterizeDisk } from '../../src/raster/circle'
import { PixelSet } from '../../src/raster/sink'
import { CanvasBounds, PixelCoordinate } from '../../src/types/base'

const canvas: CanvasBounds = { width: 100, height: 100 }

function sortPixels(pixels: PixelCoordinate[]): PixelCoordinate[] {
  return [...pixels].sort((a, b) => a.y - b.y || a.x - b.x)
}

describe('Midpoint disk rasterization', () => {
  it('should emit only the centre for radius 0', () => {
    expect(rasterizeDisk({ x: 10, y: 10 }, 0, canvas)).toEqual([{ x: 10, y: 10 }])
  })

  it('should emit nothing for radius 0 off the canvas', () => {
    expect(rasterizeDisk({ x: -1, y: 5 }, 0, canvas)).toEqual([])
    expect(rasterizeDisk({ x: 5, y: 100 }, 0, canvas)).toEqual([])
  })

  it('should fill radius 1 as a plus shape', () => {
    expect(rasterizeDisk({ x: 5, y: 5 }, 1, canvas)).toEqual([
      { x: 4, y: 5 },
      { x: 5, y: 5 },
      { x: 6, y: 5 },
      { x: 5, y: 6 },
      { x: 5, y: 4 }
    ])
  })

  it('should keep overlapping spans in the raw output', () => {
    const pixels = rasterizeDisk({ x: 10, y: 10 }, 2, canvas)
    const unique = new PixelSet()
    pixels.forEach((pixel) => unique.addPixel(pixel))

    expect(pixels).toHaveLength(23)
    expect(unique.size).toBe(21)
  })

  it('should fill every row of a radius 2 disk', () => {
    const pixels = new PixelSet()
    fillDisk({ x: 10, y: 10 }, 2, canvas, pixels)

    const rows = new Map<number, number[]>()
    for (const { x, y } of pixels.values()) {
      rows.set(y, [...(rows.get(y) ?? []), x])
    }
    const extents = [...rows.entries()]
      .sort(([a], [b]) => a - b)
      .map(([y, xs]) => [y, Math.min(...xs), Math.max(...xs), xs.length])

    expect(extents).toEqual([
      [8, 9, 11, 3],
      [9, 8, 12, 5],
      [10, 8, 12, 5],
      [11, 8, 12, 5],
      [12, 9, 11, 3]
    ])
  })

  it('should be symmetric about both axes through the centre', () => {
    const center = { x: 40, y: 50 }
    for (const radius of [1, 3, 5, 8, 13]) {
      const pixels = new PixelSet()
      fillDisk(center, radius, canvas, pixels)

      for (const { x, y } of pixels.values()) {
        expect(pixels.has({ x: 2 * center.x - x, y })).toBe(true)
        expect(pixels.has({ x, y: 2 * center.y - y })).toBe(true)
      }
    }
  })

  it('should stay within the radius', () => {
    const center = { x: 50, y: 50 }
    const radius = 10
    for (const { x, y } of rasterizeDisk(center, radius, canvas)) {
      expect(Math.abs(x - center.x)).toBeLessThanOrEqual(radius)
      expect(Math.abs(y - center.y)).toBeLessThanOrEqual(radius)
    }
  })

  it('should clamp spans to the canvas', () => {
    const pixels = new PixelSet()
    fillDisk({ x: 0, y: 0 }, 2, canvas, pixels)

    expect(sortPixels(pixels.values())).toEqual([
      { x: 0, y: 0 },
      { x: 1, y: 0 },
      { x: 2, y: 0 },
      { x: 0, y: 1 },
      { x: 1, y: 1 },
      { x: 2, y: 1 },
      { x: 0, y: 2 },
      { x: 1, y: 2 }
    ])
  })

  it('should clamp spans at the right edge', () => {
    expect(sortPixels(rasterizeDisk({ x: 99, y: 50 }, 1, canvas))).toEqual([
      { x: 99, y: 49 },
      { x: 98, y: 50 },
      { x: 99, y: 50 },
      { x: 99, y: 51 }
    ])
  })

  it('should drop spans lying wholly off the canvas', () => {
    expect(rasterizeDisk({ x: -5, y: 5 }, 2, canvas)).toEqual([])
    expect(rasterizeDisk({ x: 50, y: 103 }, 2, canvas)).toEqual([])
  })
})
