import { describe, expect, it } from '@jest/globals'
import { createMask, maskFromRows } from '../src/mask/mask'
import { traceMask } from '../src/trace/tracer'
import { ContainmentProbe, JunctionMode, LoopRole, SubPathKind } from '../src/types/trace'
import { PathDataFormatter } from '../src/writer/formatter'
import { loadExpectedPathData, loadMask, v } from './helpers'

const formatter = new PathDataFormatter()

describe('Mask tracing', () => {
  it('should trace a solid rectangle as one four-vertex outline', () => {
    const result = traceMask(maskFromRows(['####', '####', '####']))

    expect(result.loops).toHaveLength(1)
    expect(result.loops[0].vertices).toEqual([v(0, 0), v(0, 3), v(4, 3), v(4, 0)])
    expect(result.loops[0].depth).toBe(0)
    expect(result.bridges).toEqual([])
    expect(formatter.format(result.path)).toBe('M 0 0 L 0 3 L 4 3 L 4 0 Z')
  })

  it('should trace a 5x5 block with a one-pixel hole as outline and hole', () => {
    const result = traceMask(maskFromRows(['#####', '#####', '##.##', '#####', '#####']))

    expect(result.loops.map((l) => l.depth)).toEqual([0, 1])
    expect(result.loops.map((l) => l.role)).toEqual([LoopRole.Outline, LoopRole.Hole])
    expect(result.bridges).toEqual([])
    expect(formatter.format(result.path)).toBe('M 0 0 L 0 5 L 5 5 L 5 0 Z M 3 2 L 2 2 L 2 3 L 3 3 Z')
  })

  it('should bridge only the island inside a 5x5 hole', () => {
    const result = traceMask(loadMask('nested'))

    expect(result.loops.map((l) => l.depth)).toEqual([0, 1, 2])
    expect(result.bridges.map((b) => b.loopIndex)).toEqual([2, 2])
    expect(result.path.filter((s) => s.kind === SubPathKind.Bridge)).toHaveLength(2)
  })

  it.each(['nested', 'rings', 'twins', 'pinwheel'])('should match the expected path for %s', (name) => {
    const result = traceMask(loadMask(name))

    expect(formatter.format(result.path)).toBe(loadExpectedPathData(name))
  })

  it('should nest concentric rings five deep', () => {
    const result = traceMask(loadMask('rings'))

    expect(result.loops.map((l) => l.depth)).toEqual([0, 1, 2, 3, 4, 5])
    expect(result.loops.map((l) => l.parent)).toEqual([undefined, 0, 1, 2, 3, 4])
    expect(result.bridges.map((b) => b.loopIndex)).toEqual([2, 2, 4, 4])
  })

  it('should produce nothing for empty and degenerate masks', () => {
    for (const mask of [maskFromRows(['...', '...']), createMask(0, 0), createMask(3, 0)]) {
      const result = traceMask(mask)
      expect(result.loops).toEqual([])
      expect(result.path).toEqual([])
      expect(formatter.format(result.path)).toBe('')
    }
  })

  it('should keep every lattice step when simplification is off', () => {
    const result = traceMask(maskFromRows(['##', '##']), { simplify: false })

    expect(result.loops[0].vertices).toHaveLength(8)
  })

  it('should split diagonal touches only when asked', () => {
    const mask = maskFromRows(['.#', '#.'])

    expect(traceMask(mask).loops).toHaveLength(1)
    expect(traceMask(mask, { junctions: JunctionMode.Split }).loops).toHaveLength(2)
  })

  it('should pass the probe choice through to classification', () => {
    const mask = maskFromRows(['#####', '#####', '##.##', '#####', '#####'])

    const result = traceMask(mask, { probe: ContainmentProbe.Centroid })

    expect(result.loops.map((l) => l.depth)).toEqual([1, 1])
  })

  it('should serialize the same path identically twice', () => {
    const { path } = traceMask(loadMask('rings'))

    expect(formatter.format(path)).toBe(formatter.format(path))
    expect(formatter.format(traceMask(loadMask('rings')).path)).toBe(formatter.format(path))
  })
})
