import { Rgb } from './base'
import { Mask } from './mask'
import { CompoundPath, TraceOptions } from './trace'

export type Palette = Rgb[]

export type QuantizedImage = {
  width: number
  height: number
  palette: Palette
  labels: Int32Array // Palette index per pixel, -1 for transparent.
}

export type ColourLayer = {
  colour: Rgb
  mask: Mask
}

// Options that control stencil generation.
export type StencilOptions = {
  maxColours?: number
  scale?: number
  baseFilename?: string
  verbose?: boolean
  trace?: TraceOptions
}

export type StencilDocument = {
  filename: string
  label: string
  colour: Rgb
  width: number
  height: number
  scale: number
  path: CompoundPath
}
