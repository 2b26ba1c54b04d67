import { createMask } from '../mask/mask'
import { ColourLayer, QuantizedImage } from '../types/stencil'

/**
 * One mask per palette entry that labels at least one pixel, in palette
 * order. Transparent pixels (label -1) end up in no mask.
 */
export function buildColourLayers(image: QuantizedImage): ColourLayer[] {
  const masks = image.palette.map(() => createMask(image.width, image.height))
  const used = new Array<boolean>(image.palette.length).fill(false)

  image.labels.forEach((label, p) => {
    if (label < 0) return
    masks[label].data[p] = 1
    used[label] = true
  })

  return image.palette
    .map((colour, i) => ({ colour, mask: masks[i] }))
    .filter((_, i) => used[i])
}
