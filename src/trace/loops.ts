import { JunctionDiagonal, JunctionMode, Loop, Vertex } from '../types/trace'
import { isCollinear } from '../utils/geometry'
import { compareVertices, formatVertex, vertexKey, verticesEqual } from '../utils/vertex'
import { Adjacency, BoundaryDecompositionError, BoundaryGraph } from './boundary_graph'

function removeNeighbour(adjacency: Adjacency, from: Vertex, to: Vertex): void {
  const key = vertexKey(from)
  const entry = adjacency.get(key)
  const index = entry ? entry.neighbours.findIndex((n) => verticesEqual(n, to)) : -1

  if (!entry || index < 0) {
    throw new BoundaryDecompositionError(
      `Edge ${formatVertex(from)}-${formatVertex(to)} is missing from the boundary graph`
    )
  }

  entry.neighbours.splice(index, 1)
  if (entry.neighbours.length === 0) {
    adjacency.delete(key)
  }
}

function popEdge(adjacency: Adjacency, a: Vertex, b: Vertex): void {
  removeNeighbour(adjacency, a, b)
  removeNeighbour(adjacency, b, a)
}

/**
 * The other edge at a diagonal junction that borders the same filled pixel
 * as the edge we arrived along.
 */
export function junctionPartner(diagonal: JunctionDiagonal, at: Vertex, from: Vertex): Vertex {
  const dx = from.x - at.x
  const dy = from.y - at.y

  // Main diagonal pairs up/left and down/right; anti pairs up/right and down/left.
  return diagonal === JunctionDiagonal.Main
    ? { x: at.x + dy, y: at.y + dx }
    : { x: at.x - dy, y: at.y - dx }
}

class LoopWalker {
  constructor(
    private readonly adjacency: Adjacency,
    private readonly junctions: Map<string, JunctionDiagonal>,
    private readonly mode: JunctionMode
  ) {}

  private splitJunction(vertex: Vertex): JunctionDiagonal | undefined {
    return this.mode === JunctionMode.Split ? this.junctions.get(vertexKey(vertex)) : undefined
  }

  private chooseNext(start: Vertex, current: Vertex, prev: Vertex | undefined): Vertex {
    const entry = this.adjacency.get(vertexKey(current))
    if (!entry || entry.neighbours.length === 0) {
      throw new BoundaryDecompositionError(
        `Boundary walk from ${formatVertex(start)} stalled at ${formatVertex(current)}`
      )
    }

    const diagonal = prev ? this.splitJunction(current) : undefined
    if (prev && diagonal) {
      const partner = junctionPartner(diagonal, current, prev)
      if (!entry.neighbours.some((n) => verticesEqual(n, partner))) {
        throw new BoundaryDecompositionError(
          `Junction ${formatVertex(current)} has no remaining edge toward ${formatVertex(partner)}`
        )
      }
      return partner
    }

    // Deterministic selection to produce stable output.
    const candidates = entry.neighbours.filter((n) => !prev || !verticesEqual(n, prev))
    if (candidates.length === 0) {
      throw new BoundaryDecompositionError(
        `Boundary walk from ${formatVertex(start)} can only go back at ${formatVertex(current)}`
      )
    }
    return [...candidates].sort(compareVertices)[0]
  }

  private closes(start: Vertex, prev: Vertex, firstStep: Vertex): boolean {
    const diagonal = this.splitJunction(start)
    if (!diagonal) return true

    // A split junction start is only closed by the edge paired with the first one.
    return verticesEqual(junctionPartner(diagonal, start, prev), firstStep)
  }

  public walk(start: Vertex): Loop {
    const loop: Loop = [start]
    let prev: Vertex | undefined
    let current = start
    let firstStep: Vertex | undefined

    for (;;) {
      const next = this.chooseNext(start, current, prev)
      popEdge(this.adjacency, current, next)

      if (!firstStep) firstStep = next
      prev = current
      current = next

      if (verticesEqual(current, start) && this.closes(start, prev, firstStep)) {
        return loop
      }
      loop.push(current)
    }
  }
}

/**
 * Decompose a boundary graph into edge-disjoint closed loops. Takes ownership
 * of the graph; it cannot be read again afterwards.
 *
 * Loops come back in the order their start vertex was first inserted into the
 * graph, and each walk always prefers the lexicographically smallest
 * neighbour, so the result depends only on the mask.
 */
export function extractLoops(graph: BoundaryGraph, mode: JunctionMode = JunctionMode.Merge): Loop[] {
  const { adjacency, junctions } = graph.take()
  const walker = new LoopWalker(adjacency, junctions, mode)
  const loops: Loop[] = []

  for (;;) {
    const first = adjacency.values().next()
    if (first.done) break
    loops.push(walker.walk(first.value.vertex))
  }

  return loops
}

// Drop vertices that sit in the middle of a straight run.
export function simplifyLoop(loop: Loop): Loop {
  const n = loop.length
  if (n < 4) return [...loop]

  return loop.filter((vertex, i) => !isCollinear(loop[(i - 1 + n) % n], vertex, loop[(i + 1) % n]))
}
