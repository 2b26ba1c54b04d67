// Row-major boolean grid, non-zero entries are filled.
export type Mask = {
  width: number
  height: number
  data: Uint8Array
}

// Decoded image, four bytes (RGBA) per pixel.
export type RgbaImage = {
  width: number
  height: number
  data: Uint8Array
}
