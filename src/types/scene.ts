import type { ClipWindow, PixelCoordinate, Point, Segment, ViewBox } from './base'

export enum LayerType {
  Pixels = 'pixels',
  Segments = 'segments',
  Window = 'window',
  Markers = 'markers'
}

export interface PixelLayer {
  type: LayerType.Pixels
  pixels: PixelCoordinate[]
  fill: string
}

export interface SegmentLayer {
  type: LayerType.Segments
  segments: Segment[]
  stroke: string
  strokeWidth: number
}

export interface WindowLayer {
  type: LayerType.Window
  window: ClipWindow
  stroke: string
  strokeWidth: number
}

// Dots drawn over points of interest, such as clipped segment endpoints.
export interface MarkerLayer {
  type: LayerType.Markers
  points: Point[]
  fill: string
  radius: number
}

export type Layer = PixelLayer | SegmentLayer | WindowLayer | MarkerLayer

// Everything the SVG writer needs to draw one picture.
export interface Scene {
  viewBox: ViewBox
  layers: Layer[]
}

// Clip input loaded from an SVG document.
export interface ClipScene {
  window: ClipWindow | null
  segments: Segment[]
}
