#!/usr/bin/env node
import { promises as fs } from 'node:fs'
import path from 'path'
import {
  DEFAULT_BRIDGE_HALF_THICKNESS,
  DEFAULT_BRIDGE_SPAN,
  DEFAULT_MAX_COLOURS,
  DEFAULT_OUTPUT_DIR,
  DEFAULT_SCALE,
  MAX_COLOURS,
  MIN_COLOURS
} from './constants'
import { Converter } from './converter/converter'
import { buildColourLayers } from './quantize/masks'
import { quantizeImage } from './quantize/quantizer'
import { ImageReader } from './reader/base'
import { StencilOptions } from './types/stencil'
import { BridgeOptions, JunctionMode, TraceOptions } from './types/trace'
import { StencilWriter } from './writer/base'

export async function convertImageToStencils(
  inputPath: string,
  outputDir: string,
  options: StencilOptions = {}
): Promise<string[]> {
  const log = (message: string): void => {
    if (options.verbose) console.log(message)
  }

  // Read.
  const image = await new ImageReader().readFile(inputPath)

  // Quantize and split into colour layers.
  log('Quantizing image')
  const quantized = quantizeImage(image, options.maxColours ?? DEFAULT_MAX_COLOURS)
  log('Creating masks')
  const layers = buildColourLayers(quantized)

  // Trace.
  log('Creating SVGs')
  const baseFilename = options.baseFilename ?? path.parse(inputPath).name
  const documents = new Converter(options).convertLayers(layers, baseFilename)

  // Write.
  return new StencilWriter().writeAll(documents, outputDir)
}

// Converts every PNG in a directory into `outputDir/<stem>/`.
export async function convertDirectory(
  inputDir: string,
  outputDir: string,
  options: StencilOptions = {}
): Promise<Map<string, string[]>> {
  const entries = await fs.readdir(inputDir, { withFileTypes: true })
  const inputs = entries
    .filter((entry) => entry.isFile() && /\.png$/i.test(entry.name))
    .map((entry) => entry.name)
    .sort()

  const results = new Map<string, string[]>()
  for (const [i, name] of inputs.entries()) {
    if (options.verbose) console.log(`Making stencils for #${i + 1}`)
    const stem = path.parse(name).name
    const written = await convertImageToStencils(
      path.join(inputDir, name),
      path.join(outputDir, stem),
      { ...options, baseFilename: undefined }
    )
    results.set(name, written)
  }

  return results
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'UsageError'
  }
}

export type CliArguments = {
  input: string
  outputDir: string
  options: StencilOptions
}

function numberFlag(name: string, value: string | undefined): number {
  const parsed = Number(value)
  if (value === undefined || value.trim() === '' || !Number.isFinite(parsed)) {
    throw new UsageError(`${name} expects a number, got ${value ?? 'nothing'}`)
  }
  return parsed
}

export const USAGE = `Usage: pixel-stencils <input.png | inputDir> [options]

Options:
  -o, --output-dir <dir>     Where SVGs are written (default ${DEFAULT_OUTPUT_DIR})
  -n, --max-colors <k>       Palette size cap, ${MIN_COLOURS}-${MAX_COLOURS} (default ${DEFAULT_MAX_COLOURS})
  -s, --scale <n>            Document size of one pixel (default ${DEFAULT_SCALE})
  --split-junctions          Keep diagonally touching pixels in separate outlines
  --no-bridges               Do not connect islands to the surrounding material
  --bridge-span <n>          Bridge length in pixels (default ${DEFAULT_BRIDGE_SPAN})
                             Islands further than this from a wall stay unattached
  --bridge-thickness <n>     Bridge thickness in pixels (default ${DEFAULT_BRIDGE_HALF_THICKNESS * 2})
  --reach-holes              Run each bridge to the nearest wall at
                             the island's mid-height (hole or neighbouring island)
  -v, --verbose              Print progress`

export function parseArguments(args: string[]): CliArguments {
  let input: string | undefined
  let outputDir = DEFAULT_OUTPUT_DIR
  const bridges: BridgeOptions = {}
  const trace: TraceOptions = { bridges }
  const options: StencilOptions = {
    maxColours: DEFAULT_MAX_COLOURS,
    scale: DEFAULT_SCALE,
    trace
  }

  for (let i = 0; i < args.length; i++) {
    const arg = args[i]
    switch (arg) {
      case '--output-dir':
      case '-o': {
        const dir = args[++i]
        if (!dir) throw new UsageError(`${arg} expects a directory`)
        outputDir = dir
        break
      }
      case '--max-colors':
      case '-n':
        options.maxColours = numberFlag(arg, args[++i])
        break
      case '--scale':
      case '-s':
        options.scale = numberFlag(arg, args[++i])
        break
      case '--split-junctions':
        trace.junctions = JunctionMode.Split
        break
      case '--no-bridges':
        bridges.enabled = false
        break
      case '--bridge-span':
        bridges.span = numberFlag(arg, args[++i])
        break
      case '--bridge-thickness':
        bridges.halfThickness = numberFlag(arg, args[++i]) / 2
        break
      case '--reach-holes':
        bridges.reachEnclosingHole = true
        break
      case '--verbose':
      case '-v':
        options.verbose = true
        break
      default:
        if (arg.startsWith('-')) throw new UsageError(`Unknown option ${arg}`)
        if (input !== undefined) throw new UsageError(`Unexpected argument ${arg}`)
        input = arg
    }
  }

  if (input === undefined) throw new UsageError('Missing input path')
  return { input, outputDir, options }
}

async function main(): Promise<void> {
  let cli: CliArguments
  try {
    cli = parseArguments(process.argv.slice(2))
  } catch (error) {
    console.error(error instanceof Error ? error.message : error)
    console.log(USAGE)
    process.exitCode = 1
    return
  }

  try {
    const stat = await fs.stat(cli.input)
    if (stat.isDirectory()) {
      const results = await convertDirectory(cli.input, cli.outputDir, cli.options)
      console.log(`Converted ${results.size} PNG(s) to SVGs in ${cli.outputDir}`)
    } else {
      const written = await convertImageToStencils(cli.input, cli.outputDir, cli.options)
      console.log(`Wrote ${written.length} SVG layer(s) to ${cli.outputDir}`)
    }
  } catch (error) {
    console.error('Conversion failed:', error instanceof Error ? error.message : error)
    process.exitCode = 1
  }
}

// Run the main function if this file is executed directly.
if (require.main === module) {
  main().catch((error: unknown) => {
    console.error(error)
    process.exitCode = 1
  })
}
