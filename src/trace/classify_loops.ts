import { Point } from '../types/base'
import { ClassifiedLoop, ContainmentProbe, Loop, LoopRole } from '../types/trace'
import { calculateCentroid, computeBoundingBox, firstStepMidpoint } from '../utils/geometry'
import { isPointInsidePolygon } from '../utils/polygon'

export function roleFromDepth(depth: number): LoopRole {
  if (depth === 0) return LoopRole.Outline
  return depth % 2 === 1 ? LoopRole.Hole : LoopRole.Island
}

export function probePoint(loop: Loop, probe: ContainmentProbe): Point {
  return probe === ContainmentProbe.Centroid ? calculateCentroid(loop) : firstStepMidpoint(loop)
}

/**
 * Nesting depth of every loop: how many of the other loops contain its probe
 * point under the even-odd rule.
 *
 * Quadratic in the number of loops. A single colour layer of pixel art gives
 * tens of loops, not thousands.
 */
export function classifyLoops(
  loops: Loop[],
  probe: ContainmentProbe = ContainmentProbe.EdgeMidpoint
): ClassifiedLoop[] {
  const probes = loops.map((loop) => probePoint(loop, probe))

  // For every loop, collect the loops containing its probe point.
  const containers = loops.map((_, i) =>
    loops.reduce<number[]>((found, outer, j) => {
      if (i !== j && isPointInsidePolygon(probes[i], outer)) found.push(j)
      return found
    }, [])
  )

  return loops.map((vertices, index) => {
    const depth = containers[index].length

    // The innermost container is the one that is itself nested deepest.
    let parent: number | undefined
    for (const j of containers[index]) {
      if (parent === undefined || containers[j].length > containers[parent].length) {
        parent = j
      }
    }

    return {
      index,
      vertices,
      depth,
      role: roleFromDepth(depth),
      boundingBox: computeBoundingBox(vertices),
      parent
    }
  })
}
