import { describe, expect, it } from 'vitest'
import { ParseError } from '../../src/parsers/exceptions'
import {
  parseClipWindow,
  parseInteger,
  parseNumber,
  parseNumberList
} from '../../src/parsers/values'

describe('Value parsing', () => {
  it('should parse numbers', () => {
    expect(parseNumber('12.5', 'x')).toBe(12.5)
    expect(parseNumber('-3', 'x')).toBe(-3)
    expect(parseNumber('0', 'x')).toBe(0)
  })

  it('should reject missing and invalid numbers', () => {
    expect(() => parseNumber(undefined, 'x0')).toThrow(ParseError)
    expect(() => parseNumber(undefined, 'x0')).toThrow('Missing x0')
    expect(() => parseNumber('abc', 'y1')).toThrow('Invalid y1: abc')
  })

  it('should reject non-finite numbers', () => {
    expect(() => parseNumber('Infinity', 'x0')).toThrow('Invalid x0: Infinity')
    expect(() => parseNumber('-Infinity', 'x1')).toThrow('Invalid x1: -Infinity')
    expect(() => parseNumber('1e400', 'y0')).toThrow('Invalid y0: 1e400')
  })

  it('should require integers for pixel values', () => {
    expect(parseInteger('7', 'r')).toBe(7)
    expect(() => parseInteger('7.5', 'r')).toThrow('Invalid r: 7.5 is not an integer')
  })

  it('should reject integers beyond the safe range', () => {
    expect(parseInteger('9007199254740991', 'r')).toBe(Number.MAX_SAFE_INTEGER)
    expect(() => parseInteger('1e20', 'r')).toThrow(
      'Invalid r: 1e20 is outside the safe integer range'
    )
  })

  it('should parse comma and space separated lists', () => {
    expect(parseNumberList('1, 2 3', 'list')).toEqual([1, 2, 3])
    expect(() => parseNumberList('  ', 'list')).toThrow('Missing list')
    expect(() => parseNumberList('1,x', 'list')).toThrow('Invalid list[1]: x')
  })

  it('should parse a clip window', () => {
    expect(parseClipWindow('-50,-50,50,50')).toEqual({
      xMin: -50,
      yMin: -50,
      xMax: 50,
      yMax: 50
    })
    expect(() => parseClipWindow('1,2,3')).toThrow('Invalid window: expected 4 numbers, got 3')
  })
})
