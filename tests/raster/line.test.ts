import { describe, expect, it } from 'vitest'
import { plotLine, rasterizeLine } from '../../src/raster/line'
import { PixelBuffer } from '../../src/raster/sink'
import { PixelCoordinate } from '../../src/types/base'

function expectLineProperties(start: PixelCoordinate, end: PixelCoordinate): void {
  const pixels = rasterizeLine(start, end)

  expect(pixels).toHaveLength(
    Math.max(Math.abs(end.x - start.x), Math.abs(end.y - start.y)) + 1
  )
  expect(pixels[0]).toEqual(start)
  expect(pixels[pixels.length - 1]).toEqual(end)

  // 8-connected: each step moves at most one pixel on each axis.
  for (let i = 1; i < pixels.length; i++) {
    expect(Math.abs(pixels[i].x - pixels[i - 1].x)).toBeLessThanOrEqual(1)
    expect(Math.abs(pixels[i].y - pixels[i - 1].y)).toBeLessThanOrEqual(1)
  }
}

describe('Bresenham line rasterization', () => {
  it('should emit a single pixel for identical endpoints', () => {
    expect(rasterizeLine({ x: 5, y: 5 }, { x: 5, y: 5 })).toEqual([{ x: 5, y: 5 }])
  })

  it('should follow the strict error test for a shallow line', () => {
    expect(rasterizeLine({ x: 0, y: 0 }, { x: 4, y: 2 })).toEqual([
      { x: 0, y: 0 },
      { x: 1, y: 0 },
      { x: 2, y: 1 },
      { x: 3, y: 1 },
      { x: 4, y: 2 }
    ])
  })

  it('should transpose steep lines', () => {
    expect(rasterizeLine({ x: 0, y: 0 }, { x: 2, y: 5 })).toEqual([
      { x: 0, y: 0 },
      { x: 0, y: 1 },
      { x: 1, y: 2 },
      { x: 1, y: 3 },
      { x: 2, y: 4 },
      { x: 2, y: 5 }
    ])
  })

  it('should step downward for negative slopes', () => {
    expect(rasterizeLine({ x: 0, y: 0 }, { x: 4, y: -2 })).toEqual([
      { x: 0, y: 0 },
      { x: 1, y: 0 },
      { x: 2, y: -1 },
      { x: 3, y: -1 },
      { x: 4, y: -2 }
    ])
  })

  it('should run from start to end when drawn right to left', () => {
    expect(rasterizeLine({ x: 4, y: 2 }, { x: 0, y: 0 })).toEqual([
      { x: 4, y: 2 },
      { x: 3, y: 1 },
      { x: 2, y: 1 },
      { x: 1, y: 0 },
      { x: 0, y: 0 }
    ])
  })

  it('should handle horizontal, vertical and diagonal lines', () => {
    expect(rasterizeLine({ x: 2, y: 7 }, { x: 5, y: 7 })).toEqual([
      { x: 2, y: 7 },
      { x: 3, y: 7 },
      { x: 4, y: 7 },
      { x: 5, y: 7 }
    ])
    expect(rasterizeLine({ x: 1, y: 3 }, { x: 1, y: 0 })).toEqual([
      { x: 1, y: 3 },
      { x: 1, y: 2 },
      { x: 1, y: 1 },
      { x: 1, y: 0 }
    ])
    expect(rasterizeLine({ x: 0, y: 0 }, { x: -3, y: -3 })).toEqual([
      { x: 0, y: 0 },
      { x: -1, y: -1 },
      { x: -2, y: -2 },
      { x: -3, y: -3 }
    ])
  })

  it('should keep length, endpoints and connectivity in every octant', () => {
    const ends = [
      { x: 17, y: 5 },
      { x: 5, y: 17 },
      { x: -5, y: 17 },
      { x: -17, y: 5 },
      { x: -17, y: -5 },
      { x: -5, y: -17 },
      { x: 5, y: -17 },
      { x: 17, y: -5 }
    ]
    for (const end of ends) {
      expectLineProperties({ x: 0, y: 0 }, end)
      expectLineProperties(end, { x: 0, y: 0 })
    }
  })

  it('should accept coordinates off the canvas', () => {
    expectLineProperties({ x: -40, y: 1000 }, { x: 12, y: -3 })
  })

  it('should feed a pixel sink in traversal order', () => {
    const buffer = new PixelBuffer()
    plotLine({ x: 3, y: 0 }, { x: 0, y: 0 }, buffer)

    expect(buffer.values()).toEqual([
      { x: 3, y: 0 },
      { x: 2, y: 0 },
      { x: 1, y: 0 },
      { x: 0, y: 0 }
    ])
  })
})
