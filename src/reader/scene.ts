import { XMLParser } from 'fast-xml-parser'
import { promises as fs } from 'node:fs'
import { parseNumber } from '../parsers/values'
import type { ClipWindow, Segment } from '../types/base'
import type { ClipScene } from '../types/scene'
import { normalizeClipWindow } from '../utils/normalize'

export class SceneReadError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'SceneReadError'
  }
}

type XmlNode = Record<string, unknown>

const REPEATED_ELEMENTS = ['g', 'rect', 'line']

function isXmlNode(value: unknown): value is XmlNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

// Child elements of a given tag. Elements without attributes parse as empty strings.
function childNodes(node: XmlNode, tag: string): XmlNode[] {
  const value = node[tag]
  if (!Array.isArray(value)) {
    return []
  }
  return value.map((child: unknown) => (isXmlNode(child) ? child : {}))
}

function attribute(node: XmlNode, name: string): string | undefined {
  const value = node[name]
  return typeof value === 'string' ? value : undefined
}

/**
 * Reads clip input from an SVG document: `<rect>` gives the clip window and
 * `<line>` elements give the segments. Groups are descended; transforms and
 * other shapes are ignored.
 */
export class SceneReader {
  private xmlParser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: '',
    isArray: (tagName: string, _jPath: string, _isLeafNode: boolean, isAttribute: boolean) =>
      !isAttribute && REPEATED_ELEMENTS.includes(tagName)
  })

  private readWindow(node: XmlNode): ClipWindow {
    const x = parseNumber(attribute(node, 'x') ?? '0', 'rect x')
    const y = parseNumber(attribute(node, 'y') ?? '0', 'rect y')
    const width = parseNumber(attribute(node, 'width'), 'rect width')
    const height = parseNumber(attribute(node, 'height'), 'rect height')

    return normalizeClipWindow({ xMin: x, yMin: y, xMax: x + width, yMax: y + height })
  }

  private readSegment(node: XmlNode): Segment {
    return {
      start: {
        x: parseNumber(attribute(node, 'x1') ?? '0', 'line x1'),
        y: parseNumber(attribute(node, 'y1') ?? '0', 'line y1')
      },
      end: {
        x: parseNumber(attribute(node, 'x2') ?? '0', 'line x2'),
        y: parseNumber(attribute(node, 'y2') ?? '0', 'line y2')
      }
    }
  }

  private collect(node: XmlNode, windows: ClipWindow[], segments: Segment[]): void {
    for (const rect of childNodes(node, 'rect')) {
      windows.push(this.readWindow(rect))
    }
    for (const line of childNodes(node, 'line')) {
      segments.push(this.readSegment(line))
    }
    for (const group of childNodes(node, 'g')) {
      this.collect(group, windows, segments)
    }
  }

  public readString(content: string): ClipScene {
    let parsed: unknown
    try {
      parsed = this.xmlParser.parse(content, true)
    } catch (error) {
      throw new SceneReadError(
        `Failed to parse SVG: ${error instanceof Error ? error.message : 'Unknown error'}`
      )
    }

    if (!isXmlNode(parsed) || !('svg' in parsed)) {
      throw new SceneReadError('Failed to read scene: no <svg> root element found')
    }
    const root = isXmlNode(parsed.svg) ? parsed.svg : {}

    const windows: ClipWindow[] = []
    const segments: Segment[] = []
    this.collect(root, windows, segments)

    if (windows.length > 1) {
      console.warn(`Scene has ${windows.length} <rect> elements; using the first as clip window.`)
    }

    return { window: windows.length > 0 ? windows[0] : null, segments }
  }

  public async readFile(filepath: string): Promise<ClipScene> {
    const content = await fs.readFile(filepath, 'utf8')
    return this.readString(content)
  }
}
