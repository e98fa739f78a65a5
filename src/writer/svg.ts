import { XMLBuilder } from 'fast-xml-parser'
import { promises as fs } from 'node:fs'
import { COORDINATE_PRECISION } from '../constants'
import type { ViewBox } from '../types/base'
import { Layer, LayerType, Scene } from '../types/scene'

export class SvgWriteError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'SvgWriteError'
  }
}

export type SvgWriteOptions = {
  invertY: boolean
}

interface XmlElement {
  [key: string]: string | XmlElement | XmlElement[]
}

const SVG_NAMESPACE = 'http://www.w3.org/2000/svg'

function formatNumber(value: number): string {
  return String(Number(value.toFixed(COORDINATE_PRECISION)))
}

export class SvgWriter {
  private builder = new XMLBuilder({
    ignoreAttributes: false,
    attributeNamePrefix: '@_',
    format: true,
    suppressEmptyNode: true
  })

  private formatViewBox(viewBox: ViewBox, invertY: boolean): string {
    // Under scale(1 -1) the visible y range is mirrored.
    const yMin = invertY ? -(viewBox.yMin + viewBox.height) : viewBox.yMin
    return [viewBox.xMin, yMin, viewBox.width, viewBox.height].map(formatNumber).join(' ')
  }

  private formatLayer(layer: Layer): XmlElement {
    switch (layer.type) {
      case LayerType.Pixels:
        return {
          '@_class': layer.type,
          '@_fill': layer.fill,
          rect: layer.pixels.map((pixel) => ({
            '@_x': formatNumber(pixel.x),
            '@_y': formatNumber(pixel.y),
            '@_width': '1',
            '@_height': '1'
          }))
        }
      case LayerType.Segments:
        return {
          '@_class': layer.type,
          '@_fill': 'none',
          '@_stroke': layer.stroke,
          '@_stroke-width': formatNumber(layer.strokeWidth),
          line: layer.segments.map((segment) => ({
            '@_x1': formatNumber(segment.start.x),
            '@_y1': formatNumber(segment.start.y),
            '@_x2': formatNumber(segment.end.x),
            '@_y2': formatNumber(segment.end.y)
          }))
        }
      case LayerType.Window:
        return {
          '@_class': layer.type,
          '@_fill': 'none',
          '@_stroke': layer.stroke,
          '@_stroke-width': formatNumber(layer.strokeWidth),
          rect: {
            '@_x': formatNumber(layer.window.xMin),
            '@_y': formatNumber(layer.window.yMin),
            '@_width': formatNumber(layer.window.xMax - layer.window.xMin),
            '@_height': formatNumber(layer.window.yMax - layer.window.yMin)
          }
        }
      case LayerType.Markers:
        return {
          '@_class': layer.type,
          '@_fill': layer.fill,
          circle: layer.points.map((point) => ({
            '@_cx': formatNumber(point.x),
            '@_cy': formatNumber(point.y),
            '@_r': formatNumber(layer.radius)
          }))
        }
    }
  }

  public format(scene: Scene, options: SvgWriteOptions): string {
    try {
      const content: XmlElement = { g: scene.layers.map((layer) => this.formatLayer(layer)) }
      if (options.invertY) {
        content['@_transform'] = 'scale(1 -1)'
      }

      const document: XmlElement = {
        svg: {
          '@_xmlns': SVG_NAMESPACE,
          '@_viewBox': this.formatViewBox(scene.viewBox, options.invertY),
          '@_width': formatNumber(scene.viewBox.width),
          '@_height': formatNumber(scene.viewBox.height),
          g: content
        }
      }

      return this.builder.build(document)
    } catch (error) {
      throw new SvgWriteError(
        `Failed to write SVG: ${error instanceof Error ? error.message : 'Unknown error'}`
      )
    }
  }

  public async formatAndWrite(
    scene: Scene,
    outputPath: string,
    options: SvgWriteOptions
  ): Promise<string> {
    const svg = this.format(scene, options)
    await fs.writeFile(outputPath, svg, 'utf8')
    return svg
  }
}
