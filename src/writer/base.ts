import { XMLBuilder } from 'fast-xml-parser'
import { promises as fs } from 'node:fs'
import path from 'path'
import { FillRule } from '../types/base'
import { StencilDocument } from '../types/stencil'
import { SubPathKind } from '../types/trace'
import { colourToHex } from './colour_label'
import { PathDataFormatter } from './formatter'

const SVG_NAMESPACE = 'http://www.w3.org/2000/svg'
const XML_DECLARATION = '<?xml version="1.0" encoding="utf-8" ?>'

export class StencilWriteError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'StencilWriteError'
  }
}

export async function ensureOutDir(dir: string): Promise<void> {
  try {
    await fs.mkdir(dir, { recursive: true })
  } catch (error) {
    throw new StencilWriteError(
      `Cannot create output directory ${dir}: ${error instanceof Error ? error.message : error}`
    )
  }

  const stat = await fs.stat(dir)
  if (!stat.isDirectory()) {
    throw new StencilWriteError(`Output path ${dir} is not a directory`)
  }
}

export class StencilWriter {
  private formatter = new PathDataFormatter()
  private xmlBuilder = new XMLBuilder({
    ignoreAttributes: false,
    attributeNamePrefix: '@_',
    format: true,
    suppressEmptyNode: true
  })

  public format(document: StencilDocument): string {
    const fill = colourToHex(document.colour)
    const loops = document.path.filter((subPath) => subPath.kind === SubPathKind.Loop)
    const bridges = document.path.filter((subPath) => subPath.kind === SubPathKind.Bridge)

    const svg: Record<string, unknown> = {
      '@_xmlns': SVG_NAMESPACE,
      '@_version': '1.1',
      '@_width': String(document.width * document.scale),
      '@_height': String(document.height * document.scale),
      '@_viewBox': `0 0 ${document.width} ${document.height}`
    }

    // Loops rely on even-odd for holes. Bridges get their own nonzero path so
    // overlapping bridges stay filled whatever the nesting underneath.
    const paths = [
      { subPaths: loops, fillRule: FillRule.EvenOdd },
      { subPaths: bridges, fillRule: FillRule.NonZero }
    ]
      .filter(({ subPaths }) => subPaths.length > 0)
      .map(({ subPaths, fillRule }) => ({
        '@_d': this.formatter.format(subPaths),
        '@_fill': fill,
        '@_fill-rule': fillRule
      }))

    // An empty layer still gets a document, just without a path.
    if (paths.length > 0) {
      svg.path = paths
    }

    return `${XML_DECLARATION}\n${this.xmlBuilder.build({ svg })}`
  }

  public async writeAll(documents: StencilDocument[], outputDir: string): Promise<string[]> {
    await ensureOutDir(outputDir)

    return Promise.all(
      documents.map(async (document) => {
        const outputPath = path.join(outputDir, document.filename)
        try {
          await fs.writeFile(outputPath, this.format(document), 'utf8')
        } catch (error) {
          throw new StencilWriteError(
            `Failed to write ${outputPath}: ${error instanceof Error ? error.message : error}`
          )
        }
        return outputPath
      })
    )
  }
}
