import { BoundingBox, Point } from '../types/base'

export function calculateCentroid(points: Point[]): Point {
  if (points.length === 0) {
    throw new Error('Cannot calculate centroid of empty points array.')
  }

  let sumX = 0
  let sumY = 0

  for (const point of points) {
    sumX += point.x
    sumY += point.y
  }

  return {
    x: sumX / points.length,
    y: sumY / points.length
  }
}

export function computeBoundingBox(points: Point[]): BoundingBox {
  if (points.length === 0) {
    throw new Error('Cannot compute bounding box of empty points array.')
  }

  let xMin = Infinity
  let yMin = Infinity
  let xMax = -Infinity
  let yMax = -Infinity

  for (const point of points) {
    xMin = Math.min(xMin, point.x)
    yMin = Math.min(yMin, point.y)
    xMax = Math.max(xMax, point.x)
    yMax = Math.max(yMax, point.y)
  }

  return { xMin, yMin, xMax, yMax }
}

export function isCollinear(a: Point, b: Point, c: Point): boolean {
  // Exact for lattice points, which is all we ever pass here.
  return (b.x - a.x) * (c.y - a.y) - (c.x - a.x) * (b.y - a.y) === 0
}

// Point halfway along the first unit step from the first vertex toward the second.
export function firstStepMidpoint(points: Point[]): Point {
  if (points.length < 2) {
    throw new Error('Cannot probe a loop with fewer than two vertices.')
  }

  const [start, next] = points
  return {
    x: start.x + Math.sign(next.x - start.x) / 2,
    y: start.y + Math.sign(next.y - start.y) / 2
  }
}
