export * from './types/base'
export * from './types/scene'
export type { RenderOptions } from './types/options'
export { rasterizeLine, plotLine } from './raster/line'
export { fillDisk, rasterizeDisk } from './raster/circle'
export { rasterizeThickLine } from './raster/thick_line'
export { PixelBuffer, PixelSet } from './raster/sink'
export type { PixelSink, SpanSink } from './raster/sink'
export { clipSegment, clipSegments } from './clipping/liang_barsky'
export * from './utils/normalize'
export { SceneReader, SceneReadError } from './reader/scene'
export { SvgWriter, SvgWriteError } from './writer/svg'
export { ParseError } from './parsers/exceptions'
export { runCommand } from './main'
