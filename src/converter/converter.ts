import { DEFAULT_SCALE } from '../constants'
import { ColourLayer, StencilDocument, StencilOptions } from '../types/stencil'
import { traceMask } from '../trace/tracer'
import { labelColour } from '../writer/colour_label'

export class ConverterError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConverterError'
  }
}

// Turns colour layers into one stencil document each.
export class Converter {
  private readonly scale: number

  constructor(private readonly options: StencilOptions = {}) {
    this.scale = options.scale ?? DEFAULT_SCALE
    if (!(this.scale > 0)) {
      throw new ConverterError(`Scale must be positive, got ${this.scale}`)
    }
  }

  public convertLayers(layers: ColourLayer[], baseFilename: string): StencilDocument[] {
    if (layers.length === 0) return []

    const { width, height } = layers[0].mask
    for (const layer of layers) {
      if (layer.mask.width !== width || layer.mask.height !== height) {
        throw new ConverterError(
          `All masks must be ${width}x${height}, got ${layer.mask.width}x${layer.mask.height}`
        )
      }
    }

    // Labels are numbered by an explicit counter; repeats get a suffix.
    let nextIndex = 1
    const seen = new Map<string, number>()

    return layers.map((layer) => {
      const labelled = labelColour(layer.colour, nextIndex)
      nextIndex = labelled.nextIndex

      const repeats = (seen.get(labelled.label) ?? 0) + 1
      seen.set(labelled.label, repeats)
      const label = repeats > 1 ? `${labelled.label}_${repeats}` : labelled.label

      const { path } = traceMask(layer.mask, this.options.trace)

      return {
        filename: `${baseFilename}_${label}.svg`,
        label,
        colour: layer.colour,
        width,
        height,
        scale: this.scale,
        path
      }
    })
  }
}
