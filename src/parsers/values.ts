import type { ClipWindow } from '../types/base'
import { ParseError } from './exceptions'

export function parseNumber(value: string | undefined, name: string): number {
  if (!value) {
    throw new ParseError(`Missing ${name}`)
  }
  const num = parseFloat(value)
  if (!Number.isFinite(num)) {
    throw new ParseError(`Invalid ${name}: ${value}`)
  }
  return num
}

// Pixel coordinates, widths and radii must be whole numbers.
export function parseInteger(value: string | undefined, name: string): number {
  const num = parseNumber(value, name)
  if (!Number.isInteger(num)) {
    throw new ParseError(`Invalid ${name}: ${value} is not an integer`)
  }
  if (!Number.isSafeInteger(num)) {
    throw new ParseError(`Invalid ${name}: ${value} is outside the safe integer range`)
  }
  return num
}

export function parseNumberList(value: string | undefined, name: string): number[] {
  if (!value || !value.trim()) {
    throw new ParseError(`Missing ${name}`)
  }
  return value
    .trim()
    .split(/[\s,]+/)
    .map((item, index) => parseNumber(item, `${name}[${index}]`))
}

// "xMin,yMin,xMax,yMax"
export function parseClipWindow(value: string | undefined): ClipWindow {
  const numbers = parseNumberList(value, 'window')
  if (numbers.length !== 4) {
    throw new ParseError(`Invalid window: expected 4 numbers, got ${numbers.length}`)
  }
  const [xMin, yMin, xMax, yMax] = numbers
  return { xMin, yMin, xMax, yMax }
}
