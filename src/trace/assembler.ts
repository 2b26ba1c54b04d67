import { Bridge, ClassifiedLoop, CompoundPath, SubPathKind } from '../types/trace'

/**
 * Loops in discovery order, each followed by its own bridges. Even-odd fill
 * recreates holes and islands, so no clipping happens here.
 */
export function assembleCompoundPath(loops: ClassifiedLoop[], bridges: Bridge[]): CompoundPath {
  const bridgesByLoop = new Map<number, Bridge[]>()
  for (const bridge of bridges) {
    const list = bridgesByLoop.get(bridge.loopIndex) ?? []
    list.push(bridge)
    bridgesByLoop.set(bridge.loopIndex, list)
  }

  const path: CompoundPath = []
  const ordered = [...loops].sort((a, b) => a.index - b.index)

  for (const loop of ordered) {
    path.push({ kind: SubPathKind.Loop, loopIndex: loop.index, points: loop.vertices })

    for (const bridge of bridgesByLoop.get(loop.index) ?? []) {
      path.push({ kind: SubPathKind.Bridge, loopIndex: loop.index, points: bridge.points })
    }
  }

  return path
}
