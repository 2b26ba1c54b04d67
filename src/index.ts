export { convertDirectory, convertImageToStencils } from './main'
export { Converter, ConverterError } from './converter/converter'
export { countFilled, createMask, isFilled, maskFromRows, parseMask, setFilled } from './mask/mask'
export { buildColourLayers } from './quantize/masks'
export { quantizeImage, QuantizeError } from './quantize/quantizer'
export { ImageReader, ImageReadError } from './reader/base'
export { assembleCompoundPath } from './trace/assembler'
export { BoundaryDecompositionError, BoundaryGraph, buildBoundaryGraph } from './trace/boundary_graph'
export { synthesizeBridges, touchesCanvasBorder } from './trace/bridges'
export { classifyLoops, roleFromDepth } from './trace/classify_loops'
export { extractLoops, simplifyLoop } from './trace/loops'
export { traceMask } from './trace/tracer'
export { StencilWriteError, StencilWriter } from './writer/base'
export { colourToHex, labelColour } from './writer/colour_label'
export { PathDataFormatter } from './writer/formatter'
export * from './types/base'
export * from './types/mask'
export * from './types/stencil'
export * from './types/trace'
