import { DEFAULT_MAX_COLOURS, MAX_COLOURS, MIN_COLOURS } from '../constants'
import { Rgb } from '../types/base'
import { RgbaImage } from '../types/mask'
import { QuantizedImage } from '../types/stencil'

export class QuantizeError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'QuantizeError'
  }
}

type ColourCount = {
  rgb: Rgb
  count: number
}

export function packRgb(rgb: Rgb): number {
  return (rgb[0] << 16) | (rgb[1] << 8) | rgb[2]
}

export function unpackRgb(packed: number): Rgb {
  return [(packed >> 16) & 0xff, (packed >> 8) & 0xff, packed & 0xff]
}

function colourDistanceSq(a: Rgb, b: Rgb): number {
  return (a[0] - b[0]) ** 2 + (a[1] - b[1]) ** 2 + (a[2] - b[2]) ** 2
}

// Histogram of opaque pixels, keyed by packed RGB.
function countOpaqueColours(image: RgbaImage): Map<number, number> {
  const counts = new Map<number, number>()
  const data = image.data

  for (let i = 0; i < image.width * image.height * 4; i += 4) {
    if (data[i + 3] === 0) continue
    const key = packRgb([data[i], data[i + 1], data[i + 2]])
    counts.set(key, (counts.get(key) ?? 0) + 1)
  }

  return counts
}

function widestChannel(box: ColourCount[]): { channel: 0 | 1 | 2; range: number } {
  let best: { channel: 0 | 1 | 2; range: number } = { channel: 0, range: -1 }

  for (const channel of [0, 1, 2] as const) {
    // A box can hold hundreds of thousands of colours, too many to spread into Math.max.
    let min = Infinity
    let max = -Infinity
    for (const { rgb } of box) {
      min = Math.min(min, rgb[channel])
      max = Math.max(max, rgb[channel])
    }
    const range = max - min
    if (range > best.range) best = { channel, range }
  }

  return best
}

function meanColour(box: ColourCount[]): ColourCount {
  const total = box.reduce((sum, c) => sum + c.count, 0)
  const mean = (channel: 0 | 1 | 2): number =>
    Math.round(box.reduce((sum, c) => sum + c.rgb[channel] * c.count, 0) / total)

  return { rgb: [mean(0), mean(1), mean(2)], count: total }
}

/**
 * Weighted median cut. Splits the box with the widest channel range at the
 * pixel-weighted median of that channel until there are `maxColours` boxes.
 */
function medianCut(colours: ColourCount[], maxColours: number): ColourCount[] {
  const boxes: ColourCount[][] = [colours]

  while (boxes.length < maxColours) {
    let target = -1
    let targetChannel: 0 | 1 | 2 = 0
    let targetRange = 0

    boxes.forEach((box, i) => {
      if (box.length < 2) return
      const { channel, range } = widestChannel(box)
      if (range > targetRange) {
        target = i
        targetChannel = channel
        targetRange = range
      }
    })

    if (target < 0) break

    const channel = targetChannel
    const sorted = [...boxes[target]].sort(
      (a, b) => a.rgb[channel] - b.rgb[channel] || packRgb(a.rgb) - packRgb(b.rgb)
    )
    const total = sorted.reduce((sum, c) => sum + c.count, 0)

    // Both halves keep at least one colour.
    let cumulative = 0
    let cut = 1
    for (let i = 0; i < sorted.length - 1; i++) {
      cumulative += sorted[i].count
      cut = i + 1
      if (cumulative * 2 >= total) break
    }

    boxes.splice(target, 1, sorted.slice(0, cut), sorted.slice(cut))
  }

  return boxes.map(meanColour)
}

/**
 * Reduce the opaque pixels of an image to at most `maxColours` colours without
 * dithering. Palette entries are ordered by pixel count, most used first.
 * Transparent pixels are labelled -1.
 */
export function quantizeImage(
  image: RgbaImage,
  maxColours: number = DEFAULT_MAX_COLOURS
): QuantizedImage {
  if (!Number.isInteger(maxColours) || maxColours < MIN_COLOURS || maxColours > MAX_COLOURS) {
    throw new QuantizeError(
      `Colour count must be an integer between ${MIN_COLOURS} and ${MAX_COLOURS}, got ${maxColours}`
    )
  }

  const counts = countOpaqueColours(image)
  const distinct: ColourCount[] = [...counts].map(([packed, count]) => ({
    rgb: unpackRgb(packed),
    count
  }))

  const reduced = distinct.length <= maxColours ? distinct : medianCut(distinct, maxColours)
  reduced.sort((a, b) => b.count - a.count || packRgb(a.rgb) - packRgb(b.rgb))
  const palette = reduced.map((c) => c.rgb)

  // Nearest palette entry per distinct colour, lowest index on ties.
  const nearest = new Map<number, number>()
  for (const packed of counts.keys()) {
    const rgb = unpackRgb(packed)
    let best = 0
    for (let i = 1; i < palette.length; i++) {
      if (colourDistanceSq(rgb, palette[i]) < colourDistanceSq(rgb, palette[best])) best = i
    }
    nearest.set(packed, best)
  }

  const labels = new Int32Array(image.width * image.height).fill(-1)
  const data = image.data
  for (let p = 0; p < labels.length; p++) {
    const i = p * 4
    if (data[i + 3] === 0) continue
    labels[p] = nearest.get(packRgb([data[i], data[i + 1], data[i + 2]])) ?? -1
  }

  return { width: image.width, height: image.height, palette, labels }
}
