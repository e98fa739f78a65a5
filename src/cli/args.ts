import { DEFAULT_CANVAS, MAX_CANVAS_SIZE, MAX_PIXEL_COORDINATE } from '../constants'
import { ParseError } from '../parsers/exceptions'
import { parseClipWindow, parseInteger, parseNumber } from '../parsers/values'
import type { CanvasBounds, ClipWindow, Segment } from '../types/base'

export enum CommandType {
  Line = 'line',
  Disk = 'disk',
  Thick = 'thick',
  Clip = 'clip'
}

export type LineCommand = {
  type: CommandType.Line
  x0: number
  y0: number
  x1: number
  y1: number
}

export type DiskCommand = {
  type: CommandType.Disk
  cx: number
  cy: number
  radius: number
}

export type ThickCommand = {
  type: CommandType.Thick
  x0: number
  y0: number
  x1: number
  y1: number
  width: number
}

// Segments come either from an SVG scene file or straight from the arguments.
export type ClipCommand = {
  type: CommandType.Clip
  scenePath: string | null
  segments: Segment[]
  window: ClipWindow | null
}

export type Command = LineCommand | DiskCommand | ThickCommand | ClipCommand

export type CliArguments = {
  command: Command
  outputPath: string
  canvas: CanvasBounds
  invertY: boolean
}

const KNOWN_FLAGS = ['width', 'height', 'window', 'out', 'top-down']

function expectCount(command: string, values: string[], count: number, usage: string): void {
  if (values.length !== count) {
    throw new ParseError(`'${command}' expects ${usage}, got ${values.length} value(s)`)
  }
}

// Pixel-space values; the limit keeps disk and line loops finite.
function parsePixelValue(value: string | undefined, name: string): number {
  const num = parseInteger(value, name)
  if (Math.abs(num) > MAX_PIXEL_COORDINATE) {
    throw new ParseError(`Invalid ${name}: ${value} is outside ±${MAX_PIXEL_COORDINATE}`)
  }
  return num
}

function parseCanvasSize(value: string | undefined, name: string, fallback: number): number {
  if (value === undefined) {
    return fallback
  }
  const size = parseInteger(value, name)
  if (size < 1 || size > MAX_CANVAS_SIZE) {
    throw new ParseError(`Invalid ${name}: ${value} must be between 1 and ${MAX_CANVAS_SIZE}`)
  }
  return size
}

function parseFlags(flagArgs: string[]): Map<string, string> {
  const flags = new Map<string, string>()
  for (const arg of flagArgs) {
    const [name, ...rest] = arg.slice(2).split('=')
    if (!KNOWN_FLAGS.includes(name)) {
      throw new ParseError(`Unknown option: ${arg}`)
    }
    flags.set(name, rest.join('='))
  }
  return flags
}

function parseSegments(values: string[]): Segment[] {
  if (values.length === 0 || values.length % 4 !== 0) {
    throw new ParseError(
      `'clip' expects a scene file or groups of x0 y0 x1 y1, got ${values.length} value(s)`
    )
  }

  const segments: Segment[] = []
  for (let i = 0; i < values.length; i += 4) {
    const n = i / 4
    segments.push({
      start: {
        x: parseNumber(values[i], `x0 of segment ${n}`),
        y: parseNumber(values[i + 1], `y0 of segment ${n}`)
      },
      end: {
        x: parseNumber(values[i + 2], `x1 of segment ${n}`),
        y: parseNumber(values[i + 3], `y1 of segment ${n}`)
      }
    })
  }
  return segments
}

function parseCommand(name: string, values: string[], window: ClipWindow | null): Command {
  switch (name) {
    case CommandType.Line:
      expectCount(name, values, 4, 'x0 y0 x1 y1')
      return {
        type: CommandType.Line,
        x0: parsePixelValue(values[0], 'x0'),
        y0: parsePixelValue(values[1], 'y0'),
        x1: parsePixelValue(values[2], 'x1'),
        y1: parsePixelValue(values[3], 'y1')
      }
    case CommandType.Disk:
      expectCount(name, values, 3, 'cx cy r')
      return {
        type: CommandType.Disk,
        cx: parsePixelValue(values[0], 'cx'),
        cy: parsePixelValue(values[1], 'cy'),
        radius: parseInteger(values[2], 'r')
      }
    case CommandType.Thick:
      expectCount(name, values, 5, 'x0 y0 x1 y1 W')
      return {
        type: CommandType.Thick,
        x0: parsePixelValue(values[0], 'x0'),
        y0: parsePixelValue(values[1], 'y0'),
        x1: parsePixelValue(values[2], 'x1'),
        y1: parsePixelValue(values[3], 'y1'),
        width: parseInteger(values[4], 'W')
      }
    case CommandType.Clip:
      if (values.length === 1 && values[0].toLowerCase().endsWith('.svg')) {
        return { type: CommandType.Clip, scenePath: values[0], segments: [], window }
      }
      return { type: CommandType.Clip, scenePath: null, segments: parseSegments(values), window }
    default:
      throw new ParseError(`Unknown command: ${name}`)
  }
}

export function parseArguments(args: string[]): CliArguments {
  const flags = parseFlags(args.filter((arg) => arg.startsWith('--')))
  const [name, ...values] = args.filter((arg) => !arg.startsWith('--'))
  if (!name) {
    throw new ParseError('Missing command')
  }

  const windowFlag = flags.get('window')
  const window = windowFlag === undefined ? null : parseClipWindow(windowFlag)

  return {
    command: parseCommand(name, values, window),
    outputPath: flags.get('out') || `${name}.svg`,
    canvas: {
      width: parseCanvasSize(flags.get('width'), 'canvas width', DEFAULT_CANVAS.width),
      height: parseCanvasSize(flags.get('height'), 'canvas height', DEFAULT_CANVAS.height)
    },
    invertY: !flags.has('top-down')
  }
}
