import { DEFAULT_BRIDGE_HALF_THICKNESS, DEFAULT_BRIDGE_SPAN } from '../constants'
import { BoundingBox, Point } from '../types/base'
import { Bridge, BridgeOptions, ClassifiedLoop, LoopRole } from '../types/trace'
import { verticalCrossingsAt } from '../utils/polygon'

export function touchesCanvasBorder(box: BoundingBox, width: number, height: number): boolean {
  return box.xMin <= 0 || box.yMin <= 0 || box.xMax >= width || box.yMax >= height
}

function rectangle(x0: number, x1: number, yMid: number, halfThickness: number): Bridge['points'] {
  const top = yMid - halfThickness
  const bottom = yMid + halfThickness
  return [
    { x: x0, y: top },
    { x: x1, y: top },
    { x: x1, y: bottom },
    { x: x0, y: bottom }
  ]
}

// Horizontal gaps from the island's box to the nearest vertical wall of any obstacle at height y.
function gapsToObstacles(
  box: BoundingBox,
  y: number,
  obstacles: Point[][]
): { left?: number; right?: number } {
  const crossings = obstacles.flatMap((obstacle) => verticalCrossingsAt(y, obstacle))
  const leftWalls = crossings.filter((x) => x < box.xMin)
  const rightWalls = crossings.filter((x) => x > box.xMax)

  return {
    left: leftWalls.length > 0 ? box.xMin - Math.max(...leftWalls) : undefined,
    right: rightWalls.length > 0 ? Math.min(...rightWalls) - box.xMax : undefined
  }
}

// The enclosing hole and every other loop directly inside it.
function obstaclesAround(loop: ClassifiedLoop, loops: ClassifiedLoop[]): Point[][] {
  if (loop.parent === undefined) return []
  const { index, parent } = loop
  return loops
    .filter((other) => other.index === parent || (other.parent === parent && other.index !== index))
    .map((other) => other.vertices)
}

/**
 * Connector rectangles that keep islands attached to the surrounding material
 * once the stencil is cut. Each island away from the canvas border gets one
 * bridge on its left and one on its right, centred on its mid-height.
 *
 * In reach mode a bridge runs to the nearest wall at mid-height, either of the
 * enclosing hole or of a sibling island, so it never crosses other material.
 */
export function synthesizeBridges(
  loops: ClassifiedLoop[],
  width: number,
  height: number,
  options: BridgeOptions = {}
): Bridge[] {
  const span = options.span ?? DEFAULT_BRIDGE_SPAN
  const halfThickness = options.halfThickness ?? DEFAULT_BRIDGE_HALF_THICKNESS

  if (!(span > 0) || !(halfThickness > 0)) {
    throw new Error(`Bridge span and half thickness must be positive, got ${span} and ${halfThickness}`)
  }
  if (options.enabled === false) return []

  const bridges: Bridge[] = []

  for (const loop of loops) {
    if (loop.role !== LoopRole.Island) continue
    if (touchesCanvasBorder(loop.boundingBox, width, height)) continue

    const box = loop.boundingBox
    const yMid = (box.yMin + box.yMax) / 2

    const gaps = options.reachEnclosingHole
      ? gapsToObstacles(box, yMid, obstaclesAround(loop, loops))
      : {}

    bridges.push({
      loopIndex: loop.index,
      side: 'left',
      points: rectangle(box.xMin - (gaps.left ?? span), box.xMin, yMid, halfThickness)
    })
    bridges.push({
      loopIndex: loop.index,
      side: 'right',
      points: rectangle(box.xMax, box.xMax + (gaps.right ?? span), yMid, halfThickness)
    })
  }

  return bridges
}
