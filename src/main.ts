import { pathToFileURL } from 'node:url'
import { parseArguments } from './cli/args'
import { executeCommand } from './commands'
import { DEFAULT_CLIP_WINDOW } from './constants'
import type { RenderOptions } from './types/options'
import { SvgWriter } from './writer/svg'

export type RunResult = {
  outputPath: string
  summary: string
  svg: string
}

export async function runCommand(args: string[]): Promise<RunResult> {
  // Parse.
  const parsed = parseArguments(args)
  const options: RenderOptions = {
    canvas: parsed.canvas,
    window: DEFAULT_CLIP_WINDOW,
    invertY: parsed.invertY
  }

  // Rasterize or clip.
  const { scene, summary } = await executeCommand(parsed.command, options)

  // Write.
  const writer = new SvgWriter()
  const svg = await writer.formatAndWrite(scene, parsed.outputPath, { invertY: options.invertY })

  return { outputPath: parsed.outputPath, summary, svg }
}

const USAGE = [
  'Usage: tsx src/main.ts <command> [values...] [--out=file.svg] [options]',
  '  line x0 y0 x1 y1',
  '  disk cx cy r',
  '  thick x0 y0 x1 y1 W',
  '  clip scene.svg | clip x0 y0 x1 y1 [x0 y0 x1 y1 ...]',
  'Options: --width=900 --height=600 --window=xMin,yMin,xMax,yMax --top-down'
].join('\n')

async function main() {
  const args = process.argv.slice(2)

  if (args.length < 1) {
    console.log(USAGE)
    process.exit(1)
  }

  try {
    const result = await runCommand(args)
    console.log(`${result.summary}. Wrote ${result.outputPath}`)
  } catch (error) {
    console.error('Command failed:', error instanceof Error ? error.message : error)
    process.exitCode = 1
  }
}

// Run the main function if this file is executed directly.
const entryPath = process.argv[1]
const isMainModule = entryPath !== undefined && import.meta.url === pathToFileURL(entryPath).href
if (isMainModule) {
  void main()
}
