export type Point = {
  x: number
  y: number
}

export type BoundingBox = {
  xMin: number
  yMin: number
  xMax: number
  yMax: number
}

export type Rgb = [number, number, number]

export enum FillRule {
  NonZero = 'nonzero',
  EvenOdd = 'evenodd'
}
