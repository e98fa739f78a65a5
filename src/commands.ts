import { ClipCommand, Command, CommandType } from './cli/args'
import { clipSegments } from './clipping/liang_barsky'
import {
  CLIPPED_SEGMENT_COLOR,
  CLIPPED_STROKE_WIDTH,
  ENDPOINT_MARKER_RADIUS,
  PIXEL_COLOR,
  SEGMENT_COLOR,
  SEGMENT_STROKE_WIDTH,
  WINDOW_COLOR,
  WINDOW_STROKE_WIDTH
} from './constants'
import { fillDisk } from './raster/circle'
import { rasterizeLine } from './raster/line'
import { PixelSet } from './raster/sink'
import { rasterizeThickLine } from './raster/thick_line'
import { SceneReader } from './reader/scene'
import type { PixelCoordinate } from './types/base'
import type { RenderOptions } from './types/options'
import { LayerType, Scene } from './types/scene'
import {
  canvasViewBox,
  clampToCanvas,
  computeViewBox,
  coveringRadius,
  normalizeClipWindow,
  normalizeLineWidth,
  normalizeRadius
} from './utils/normalize'

export class CommandError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'CommandError'
  }
}

export type CommandResult = {
  scene: Scene
  summary: string
}

function clampEndpoint(pixel: PixelCoordinate, options: RenderOptions): PixelCoordinate {
  const clamped = clampToCanvas(pixel, options.canvas)
  if (clamped.x !== pixel.x || clamped.y !== pixel.y) {
    console.warn(
      `Endpoint (${pixel.x}, ${pixel.y}) is outside the canvas; clamped to (${clamped.x}, ${clamped.y}).`
    )
  }
  return clamped
}

function pixelScene(pixels: PixelCoordinate[], options: RenderOptions): Scene {
  return {
    viewBox: canvasViewBox(options.canvas),
    layers: [{ type: LayerType.Pixels, pixels, fill: PIXEL_COLOR }]
  }
}

async function executeClip(
  command: ClipCommand,
  options: RenderOptions
): Promise<CommandResult> {
  let segments = command.segments
  let window = command.window

  if (command.scenePath !== null) {
    const scene = await new SceneReader().readFile(command.scenePath)
    segments = scene.segments
    window = window ?? scene.window
  }

  const clipWindow = normalizeClipWindow(window ?? options.window)
  const clipped = clipSegments(segments, clipWindow)

  return {
    scene: {
      viewBox: computeViewBox(clipWindow, segments),
      layers: [
        {
          type: LayerType.Window,
          window: clipWindow,
          stroke: WINDOW_COLOR,
          strokeWidth: WINDOW_STROKE_WIDTH
        },
        {
          type: LayerType.Segments,
          segments,
          stroke: SEGMENT_COLOR,
          strokeWidth: SEGMENT_STROKE_WIDTH
        },
        {
          type: LayerType.Segments,
          segments: clipped,
          stroke: CLIPPED_SEGMENT_COLOR,
          strokeWidth: CLIPPED_STROKE_WIDTH
        },
        {
          type: LayerType.Markers,
          points: clipped.flatMap((segment) => [segment.start, segment.end]),
          fill: CLIPPED_SEGMENT_COLOR,
          radius: ENDPOINT_MARKER_RADIUS
        }
      ]
    },
    summary: `Clip: ${clipped.length} of ${segments.length} segments visible`
  }
}

// Runs one command and describes the result as a scene for the SVG writer.
export async function executeCommand(
  command: Command,
  options: RenderOptions
): Promise<CommandResult> {
  switch (command.type) {
    case CommandType.Line: {
      const start = clampEndpoint({ x: command.x0, y: command.y0 }, options)
      const end = clampEndpoint({ x: command.x1, y: command.y1 }, options)
      const pixels = rasterizeLine(start, end)
      return { scene: pixelScene(pixels, options), summary: `Line: ${pixels.length} pixels` }
    }
    case CommandType.Disk: {
      const center = { x: command.cx, y: command.cy }
      const radius = normalizeRadius(command.radius, coveringRadius(center, options.canvas))
      if (command.radius < 0) {
        console.warn(`Radius ${command.radius} is negative; using ${radius}.`)
      } else if (radius !== command.radius) {
        console.warn(`Radius ${command.radius} exceeds the canvas; using ${radius}.`)
      }
      // Disk spans overlap near the diagonal, so collect them into a set.
      const pixels = new PixelSet()
      fillDisk(center, radius, options.canvas, pixels)
      return {
        scene: pixelScene(pixels.values(), options),
        summary: `Disk: ${pixels.size} pixels`
      }
    }
    case CommandType.Thick: {
      const start = clampEndpoint({ x: command.x0, y: command.y0 }, options)
      const end = clampEndpoint({ x: command.x1, y: command.y1 }, options)
      const maxRadius = Math.max(
        coveringRadius(start, options.canvas),
        coveringRadius(end, options.canvas)
      )
      const width = normalizeLineWidth(command.width, 2 * maxRadius + 1)
      if (command.width < 1) {
        console.warn(`Line width ${command.width} is below 1; using ${width}.`)
      } else if (width !== command.width) {
        console.warn(`Line width ${command.width} exceeds the canvas; using ${width}.`)
      }
      const pixels = rasterizeThickLine(start, end, width, options.canvas)
      return {
        scene: pixelScene(pixels, options),
        summary: `Thick line: ${pixels.length} pixels`
      }
    }
    case CommandType.Clip:
      return executeClip(command, options)
    default:
      throw new CommandError(`Unsupported command: ${JSON.stringify(command)}`)
  }
}
