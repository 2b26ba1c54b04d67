import { Vertex } from '../types/trace'

export function vertexKey(v: Vertex): string {
  return `${v.x},${v.y}`
}

// Lexicographic on x, then y.
export function compareVertices(a: Vertex, b: Vertex): number {
  if (a.x !== b.x) return a.x - b.x
  return a.y - b.y
}

export function verticesEqual(a: Vertex, b: Vertex): boolean {
  return a.x === b.x && a.y === b.y
}

export function formatVertex(v: Vertex): string {
  return `(${v.x},${v.y})`
}
