import { isFilled } from '../mask/mask'
import { Mask } from '../types/mask'
import { JunctionDiagonal, Vertex } from '../types/trace'
import { compareVertices, vertexKey, verticesEqual } from '../utils/vertex'

export class BoundaryDecompositionError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'BoundaryDecompositionError'
  }
}

export interface VertexEntry {
  vertex: Vertex
  neighbours: Vertex[]
}

// Vertex key -> entry, iterated in first-insertion order.
export type Adjacency = Map<string, VertexEntry>

export type OwnedGraph = {
  adjacency: Adjacency
  junctions: Map<string, JunctionDiagonal>
}

export class BoundaryGraph {
  private adjacency: Adjacency = new Map()
  private junctions = new Map<string, JunctionDiagonal>()
  private consumed = false

  private assertOwned(): void {
    if (this.consumed) {
      throw new BoundaryDecompositionError('Boundary graph has already been consumed')
    }
  }

  private link(from: Vertex, to: Vertex): void {
    const key = vertexKey(from)
    let entry = this.adjacency.get(key)
    if (!entry) {
      entry = { vertex: { x: from.x, y: from.y }, neighbours: [] }
      this.adjacency.set(key, entry)
    }
    if (!entry.neighbours.some((n) => verticesEqual(n, to))) {
      entry.neighbours.push({ x: to.x, y: to.y })
    }
  }

  public addEdge(a: Vertex, b: Vertex): void {
    this.assertOwned()
    this.link(a, b)
    this.link(b, a)
  }

  public markJunction(vertex: Vertex, diagonal: JunctionDiagonal): void {
    this.assertOwned()
    this.junctions.set(vertexKey(vertex), diagonal)
  }

  public junctionAt(vertex: Vertex): JunctionDiagonal | undefined {
    this.assertOwned()
    return this.junctions.get(vertexKey(vertex))
  }

  public get vertexCount(): number {
    this.assertOwned()
    return this.adjacency.size
  }

  public get edgeCount(): number {
    this.assertOwned()
    let degreeSum = 0
    for (const entry of this.adjacency.values()) degreeSum += entry.neighbours.length
    return degreeSum / 2
  }

  public get isConsumed(): boolean {
    return this.consumed
  }

  public degree(vertex: Vertex): number {
    this.assertOwned()
    return this.adjacency.get(vertexKey(vertex))?.neighbours.length ?? 0
  }

  public neighbours(vertex: Vertex): Vertex[] {
    this.assertOwned()
    const entry = this.adjacency.get(vertexKey(vertex))
    return entry ? [...entry.neighbours].sort(compareVertices) : []
  }

  public vertices(): Vertex[] {
    this.assertOwned()
    return [...this.adjacency.values()].map((entry) => entry.vertex)
  }

  // Every undirected edge once, smaller endpoint first.
  public edges(): [Vertex, Vertex][] {
    this.assertOwned()
    const edges: [Vertex, Vertex][] = []
    for (const { vertex, neighbours } of this.adjacency.values()) {
      for (const neighbour of neighbours) {
        if (compareVertices(vertex, neighbour) < 0) edges.push([vertex, neighbour])
      }
    }
    return edges
  }

  /**
   * Hand the adjacency over to a single consumer. The graph is unusable
   * afterwards: every other method throws.
   */
  public take(): OwnedGraph {
    this.assertOwned()
    const owned = { adjacency: this.adjacency, junctions: this.junctions }
    this.consumed = true
    this.adjacency = new Map()
    this.junctions = new Map()
    return owned
  }
}

function junctionDiagonal(mask: Mask, vertex: Vertex): JunctionDiagonal | undefined {
  const topLeft = isFilled(mask, vertex.x - 1, vertex.y - 1)
  const topRight = isFilled(mask, vertex.x, vertex.y - 1)
  const bottomLeft = isFilled(mask, vertex.x - 1, vertex.y)
  const bottomRight = isFilled(mask, vertex.x, vertex.y)

  if (topLeft && bottomRight && !topRight && !bottomLeft) return JunctionDiagonal.Main
  if (topRight && bottomLeft && !topLeft && !bottomRight) return JunctionDiagonal.Anti
  return undefined
}

export function buildBoundaryGraph(mask: Mask): BoundaryGraph {
  const graph = new BoundaryGraph()
  const { width: w, height: h } = mask

  if (w <= 0 || h <= 0) return graph

  for (let y = 0; y < h; y++) {
    for (let x = 0; x < w; x++) {
      if (!isFilled(mask, x, y)) continue

      // Top edge.
      if (!isFilled(mask, x, y - 1)) {
        graph.addEdge({ x, y }, { x: x + 1, y })
      }
      // Bottom edge.
      if (!isFilled(mask, x, y + 1)) {
        graph.addEdge({ x: x + 1, y: y + 1 }, { x, y: y + 1 })
      }
      // Left edge.
      if (!isFilled(mask, x - 1, y)) {
        graph.addEdge({ x, y: y + 1 }, { x, y })
      }
      // Right edge.
      if (!isFilled(mask, x + 1, y)) {
        graph.addEdge({ x: x + 1, y }, { x: x + 1, y: y + 1 })
      }
    }
  }

  for (const vertex of graph.vertices()) {
    if (graph.degree(vertex) !== 4) continue
    const diagonal = junctionDiagonal(mask, vertex)
    if (diagonal) graph.markJunction(vertex, diagonal)
  }

  return graph
}
