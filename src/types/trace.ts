import { BoundingBox, Point } from './base'

// A lattice point on pixel boundaries. Coordinates are always integers.
export type Vertex = Point

// Ordered, implicitly closed vertex sequence.
export type Loop = Vertex[]

export enum LoopRole {
  Outline = 'outline',
  Hole = 'hole',
  Island = 'island'
}

// How the extractor resolves vertices where two filled pixels touch diagonally.
export enum JunctionMode {
  Merge = 'merge',
  Split = 'split'
}

// Which point of a loop is tested against the other loops.
export enum ContainmentProbe {
  EdgeMidpoint = 'edge-midpoint',
  Centroid = 'centroid'
}

// Orientation of the filled diagonal at a degree-4 vertex.
export enum JunctionDiagonal {
  Main = 'main', // Top-left and bottom-right pixels filled.
  Anti = 'anti' // Top-right and bottom-left pixels filled.
}

export interface ClassifiedLoop {
  index: number
  vertices: Loop
  depth: number
  role: LoopRole
  boundingBox: BoundingBox
  parent?: number // Index of the innermost loop containing this one.
}

export interface Bridge {
  loopIndex: number
  side: 'left' | 'right'
  points: [Point, Point, Point, Point]
}

export enum SubPathKind {
  Loop = 'loop',
  Bridge = 'bridge'
}

export interface SubPath {
  kind: SubPathKind
  loopIndex: number
  points: Point[]
}

export type CompoundPath = SubPath[]

export type BridgeOptions = {
  enabled?: boolean
  span?: number
  halfThickness?: number
  reachEnclosingHole?: boolean
}

export type TraceOptions = {
  junctions?: JunctionMode
  simplify?: boolean
  probe?: ContainmentProbe
  bridges?: BridgeOptions
}

export type TraceResult = {
  loops: ClassifiedLoop[]
  bridges: Bridge[]
  path: CompoundPath
}
