import type { PixelCoordinate } from '../types/base'

export interface PixelSink {
  addPixel(pixel: PixelCoordinate): void
}

// Receives an inclusive horizontal run [xStart, xEnd] at row y.
export interface SpanSink {
  addSpan(xStart: number, xEnd: number, y: number): void
}

// Ordered pixel list. Duplicates are kept.
export class PixelBuffer implements PixelSink, SpanSink {
  private pixels: PixelCoordinate[] = []

  addPixel(pixel: PixelCoordinate): void {
    this.pixels.push({ x: pixel.x, y: pixel.y })
  }

  addSpan(xStart: number, xEnd: number, y: number): void {
    for (let x = xStart; x <= xEnd; x++) {
      this.pixels.push({ x, y })
    }
  }

  get size(): number {
    return this.pixels.length
  }

  values(): PixelCoordinate[] {
    return [...this.pixels]
  }
}

function pixelKey(x: number, y: number): string {
  return `${x},${y}`
}

/**
 * Pixel collection keyed by coordinate, so each pixel is held once.
 * Iteration follows first insertion, which callers should not depend on.
 */
export class PixelSet implements PixelSink, SpanSink {
  private pixels = new Map<string, PixelCoordinate>()

  addPixel(pixel: PixelCoordinate): void {
    this.insert(pixel.x, pixel.y)
  }

  addSpan(xStart: number, xEnd: number, y: number): void {
    for (let x = xStart; x <= xEnd; x++) {
      this.insert(x, y)
    }
  }

  has(pixel: PixelCoordinate): boolean {
    return this.pixels.has(pixelKey(pixel.x, pixel.y))
  }

  get size(): number {
    return this.pixels.size
  }

  values(): PixelCoordinate[] {
    return Array.from(this.pixels.values())
  }

  private insert(x: number, y: number): void {
    const key = pixelKey(x, y)
    if (!this.pixels.has(key)) {
      this.pixels.set(key, { x, y })
    }
  }
}
