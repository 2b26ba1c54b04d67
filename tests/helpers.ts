import { readFileSync } from 'node:fs'
import path from 'path'
import { parseMask } from '../src/mask/mask'
import { Mask } from '../src/types/mask'
import { Point } from '../src/types/base'
import { CompoundPath, Loop, SubPathKind, Vertex } from '../src/types/trace'
import { isPointInsidePolygon } from '../src/utils/polygon'
import { compareVertices, vertexKey } from '../src/utils/vertex'

export const maskDir = path.join(__dirname, 'data', 'masks')

export function loadMask(name: string): Mask {
  return parseMask(readFileSync(path.join(maskDir, `${name}.txt`), 'utf8'))
}

export function loadExpectedPathData(name: string): string {
  return readFileSync(path.join(maskDir, `${name}.d.txt`), 'utf8').trim()
}

export function edgeKey(a: Vertex, b: Vertex): string {
  const [p, q] = compareVertices(a, b) < 0 ? [a, b] : [b, a]
  return `${vertexKey(p)}|${vertexKey(q)}`
}

// Unit lattice edges covered by a loop, including the closing segment.
export function loopUnitEdges(loop: Loop): string[] {
  const edges: string[] = []

  loop.forEach((from, i) => {
    const to = loop[(i + 1) % loop.length]
    const dx = Math.sign(to.x - from.x)
    const dy = Math.sign(to.y - from.y)
    let current = from
    while (current.x !== to.x || current.y !== to.y) {
      const next = { x: current.x + dx, y: current.y + dy }
      edges.push(edgeKey(current, next))
      current = next
    }
  })

  return edges
}

export function v(x: number, y: number): Vertex {
  return { x, y }
}

/**
 * Whether a point renders filled the way the writer draws a layer: loops under
 * even-odd, bridges (all wound the same way) under nonzero on top.
 */
export function rendersFilled(path: CompoundPath, point: Point): boolean {
  const loopHits = path.filter(
    (s) => s.kind === SubPathKind.Loop && isPointInsidePolygon(point, s.points)
  ).length
  const onBridge = path.some(
    (s) => s.kind === SubPathKind.Bridge && isPointInsidePolygon(point, s.points)
  )
  return loopHits % 2 === 1 || onBridge
}
