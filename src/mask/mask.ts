import { Mask } from '../types/mask'

export function createMask(width: number, height: number): Mask {
  return { width, height, data: new Uint8Array(Math.max(0, width * height)) }
}

// Out-of-bounds pixels read as empty.
export function isFilled(mask: Mask, x: number, y: number): boolean {
  if (x < 0 || y < 0 || x >= mask.width || y >= mask.height) return false
  return mask.data[y * mask.width + x] !== 0
}

export function setFilled(mask: Mask, x: number, y: number, filled = true): void {
  mask.data[y * mask.width + x] = filled ? 1 : 0
}

export function countFilled(mask: Mask): number {
  let count = 0
  for (const value of mask.data) {
    if (value !== 0) count++
  }
  return count
}

/**
 * Build a mask from text rows, `#` marking a filled pixel and `.` an empty
 * one. All rows must be the same length.
 */
export function maskFromRows(rows: string[]): Mask {
  const height = rows.length
  const width = height > 0 ? rows[0].length : 0
  const mask = createMask(width, height)

  rows.forEach((row, y) => {
    if (row.length !== width) {
      throw new Error(`Mask row ${y} has length ${row.length}, expected ${width}`)
    }
    for (let x = 0; x < width; x++) {
      if (row[x] === '#') setFilled(mask, x, y)
    }
  })

  return mask
}

export function parseMask(text: string): Mask {
  const rows = text
    .split(/\r?\n/)
    .map((row) => row.trimEnd())
    .filter((row) => row.length > 0)
  return maskFromRows(rows)
}
