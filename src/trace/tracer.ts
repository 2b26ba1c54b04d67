import { Mask } from '../types/mask'
import { ContainmentProbe, JunctionMode, TraceOptions, TraceResult } from '../types/trace'
import { assembleCompoundPath } from './assembler'
import { buildBoundaryGraph } from './boundary_graph'
import { synthesizeBridges } from './bridges'
import { classifyLoops } from './classify_loops'
import { extractLoops, simplifyLoop } from './loops'

// Mask to compound path: boundary graph, loops, nesting, bridges, assembly.
export function traceMask(mask: Mask, options: TraceOptions = {}): TraceResult {
  const graph = buildBoundaryGraph(mask)
  const rawLoops = extractLoops(graph, options.junctions ?? JunctionMode.Merge)
  const loops = options.simplify === false ? rawLoops : rawLoops.map(simplifyLoop)

  const classified = classifyLoops(loops, options.probe ?? ContainmentProbe.EdgeMidpoint)
  const bridges = synthesizeBridges(classified, mask.width, mask.height, options.bridges)

  return {
    loops: classified,
    bridges,
    path: assembleCompoundPath(classified, bridges)
  }
}
