import { EPSILON_CONTAINMENT } from '../constants'
import { Point } from '../types/base'

// Even-odd ray crossing against a horizontal ray running to +x.
export function isPointInsidePolygon(point: Point, polygon: Point[]): boolean {
  let inside = false
  let j = polygon.length - 1

  for (let i = 0; i < polygon.length; i++) {
    const currentVertex = polygon[i]
    const prevVertex = polygon[j]

    // Half-open on y, so a ray through a vertex counts exactly one of its two edges.
    if (currentVertex.y > point.y !== prevVertex.y > point.y) {
      const intersectX =
        currentVertex.x +
        ((prevVertex.x - currentVertex.x) * (point.y - currentVertex.y)) /
          (prevVertex.y - currentVertex.y + EPSILON_CONTAINMENT)

      if (point.x < intersectX) {
        inside = !inside
      }
    }

    j = i
  }

  return inside
}

// X positions where the polygon's vertical edges cross the horizontal line at y.
export function verticalCrossingsAt(y: number, polygon: Point[]): number[] {
  const crossings: number[] = []

  for (let i = 0; i < polygon.length; i++) {
    const a = polygon[i]
    const b = polygon[(i + 1) % polygon.length]
    if (a.x !== b.x) continue

    if (Math.min(a.y, b.y) <= y && y <= Math.max(a.y, b.y)) {
      crossings.push(a.x)
    }
  }

  return crossings
}
