import { COLOUR_LABEL_TOLERANCE } from '../constants'
import { Rgb } from '../types/base'

export type ColourLabel = {
  label: string
  nextIndex: number
}

/**
 * Predictable file label for a colour. Near-white and near-black get plain
 * names; everything else is `color{n}`, numbered from the counter passed in.
 */
export function labelColour(rgb: Rgb, nextIndex: number): ColourLabel {
  const tol = COLOUR_LABEL_TOLERANCE

  if (rgb.every((c) => Math.abs(c - 255) <= tol)) {
    return { label: 'white', nextIndex }
  }
  if (rgb.every((c) => c <= tol)) {
    return { label: 'black', nextIndex }
  }
  return { label: `color${nextIndex}`, nextIndex: nextIndex + 1 }
}

export function colourToHex(rgb: Rgb): string {
  return '#' + rgb.map((c) => c.toString(16).padStart(2, '0')).join('')
}
