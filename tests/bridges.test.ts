import { describe, expect, it } from '@jest/globals'
import { maskFromRows } from '../src/mask/mask'
import { assembleCompoundPath } from '../src/trace/assembler'
import { synthesizeBridges, touchesCanvasBorder } from '../src/trace/bridges'
import { classifyLoops } from '../src/trace/classify_loops'
import { traceMask } from '../src/trace/tracer'
import { ClassifiedLoop, Loop, LoopRole, SubPathKind } from '../src/types/trace'
import { computeBoundingBox } from '../src/utils/geometry'
import { loadMask, rendersFilled, v } from './helpers'

function square(min: number, max: number): Loop {
  return [v(min, min), v(min, max), v(max, max), v(max, min)]
}

const nested = classifyLoops([square(0, 7), square(1, 6), square(3, 4)])

describe('Bridge synthesis', () => {
  it('should attach two bridges to an island and none to outline or hole', () => {
    const bridges = synthesizeBridges(nested, 7, 7)

    expect(bridges).toEqual([
      {
        loopIndex: 2,
        side: 'left',
        points: [v(2, 3.25), v(3, 3.25), v(3, 3.75), v(2, 3.75)]
      },
      {
        loopIndex: 2,
        side: 'right',
        points: [v(4, 3.25), v(5, 3.25), v(5, 3.75), v(4, 3.75)]
      }
    ])
  })

  it('should honour span and thickness', () => {
    const [left, right] = synthesizeBridges(nested, 7, 7, { span: 0.5, halfThickness: 0.5 })

    expect(left.points).toEqual([v(2.5, 3), v(3, 3), v(3, 4), v(2.5, 4)])
    expect(right.points).toEqual([v(4, 3), v(4.5, 3), v(4.5, 4), v(4, 4)])
  })

  it('should stretch bridges to the enclosing hole when asked', () => {
    const [left, right] = synthesizeBridges(nested, 7, 7, { reachEnclosingHole: true })

    expect(left.points).toEqual([v(1, 3.25), v(3, 3.25), v(3, 3.75), v(1, 3.75)])
    expect(right.points).toEqual([v(4, 3.25), v(6, 3.25), v(6, 3.75), v(4, 3.75)])
  })

  it('should stop reaching bridges at a neighbouring island', () => {
    const { path, bridges } = traceMask(loadMask('twins'), { bridges: { reachEnclosingHole: true } })

    expect(bridges.map((b) => [b.loopIndex, b.side, b.points[0].x, b.points[1].x])).toEqual([
      [2, 'left', 1, 2],
      [2, 'right', 3, 6],
      [3, 'left', 3, 6],
      [3, 'right', 7, 8]
    ])
    expect(rendersFilled(path, v(6.5, 2.5))).toBe(true)
    expect(rendersFilled(path, v(2.5, 2.5))).toBe(true)
    expect(rendersFilled(path, v(4.5, 2.5))).toBe(true)
  })

  it('should skip islands touching the canvas border', () => {
    const vertices = [v(0, 2), v(0, 3), v(1, 3), v(1, 2)]
    const onBorder: ClassifiedLoop = {
      index: 0,
      vertices,
      depth: 2,
      role: LoopRole.Island,
      boundingBox: computeBoundingBox(vertices)
    }

    expect(synthesizeBridges([onBorder], 5, 5)).toEqual([])
  })

  it('should detect every canvas border', () => {
    expect(touchesCanvasBorder({ xMin: 0, yMin: 1, xMax: 2, yMax: 2 }, 5, 5)).toBe(true)
    expect(touchesCanvasBorder({ xMin: 1, yMin: 0, xMax: 2, yMax: 2 }, 5, 5)).toBe(true)
    expect(touchesCanvasBorder({ xMin: 1, yMin: 1, xMax: 5, yMax: 2 }, 5, 5)).toBe(true)
    expect(touchesCanvasBorder({ xMin: 1, yMin: 1, xMax: 2, yMax: 5 }, 5, 5)).toBe(true)
    expect(touchesCanvasBorder({ xMin: 1, yMin: 1, xMax: 4, yMax: 4 }, 5, 5)).toBe(false)
  })

  it('should emit nothing when disabled', () => {
    expect(synthesizeBridges(nested, 7, 7, { enabled: false })).toEqual([])
  })

  it('should reject a non-positive span', () => {
    expect(() => synthesizeBridges(nested, 7, 7, { span: 0 })).toThrow(
      'Bridge span and half thickness must be positive'
    )
  })
})

describe('Bridge coverage', () => {
  const closeIslands = maskFromRows(['#######', '#.....#', '#.#.#.#', '#.....#', '#######'])

  it('should keep overlapping bridges between close islands filled', () => {
    const { path, bridges } = traceMask(closeIslands)

    expect(bridges[1].points).toEqual(bridges[2].points)
    expect(rendersFilled(path, v(3.5, 2.5))).toBe(true)
  })

  it('should reach a hole wall one pixel away with the default span', () => {
    const { path, bridges } = traceMask(closeIslands)

    expect(bridges[0].points).toEqual([v(1, 2.25), v(2, 2.25), v(2, 2.75), v(1, 2.75)])
    expect(bridges[3].points).toEqual([v(5, 2.25), v(6, 2.25), v(6, 2.75), v(5, 2.75)])
    expect(rendersFilled(path, v(1.5, 2.5))).toBe(true)
    expect(rendersFilled(path, v(5.5, 2.5))).toBe(true)
  })

  it('should leave the rest of the hole empty', () => {
    const { path } = traceMask(closeIslands)

    expect(rendersFilled(path, v(3.5, 1.5))).toBe(false)
    expect(rendersFilled(path, v(3.5, 2.1))).toBe(false)
  })
})

describe('Compound path assembly', () => {
  it('should follow each loop with its own bridges', () => {
    const bridges = synthesizeBridges(nested, 7, 7)
    const path = assembleCompoundPath(nested, bridges)

    expect(path.map((s) => [s.kind, s.loopIndex])).toEqual([
      [SubPathKind.Loop, 0],
      [SubPathKind.Loop, 1],
      [SubPathKind.Loop, 2],
      [SubPathKind.Bridge, 2],
      [SubPathKind.Bridge, 2]
    ])
    expect(path[2].points).toEqual(square(3, 4))
  })

  it('should be empty for no loops', () => {
    expect(assembleCompoundPath([], [])).toEqual([])
  })
})
