import sharp from 'sharp'
import { RgbaImage } from '../types/mask'

export class ImageReadError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ImageReadError'
  }
}

export class ImageReader {
  private async decode(input: string | Buffer): Promise<RgbaImage> {
    const { data, info } = await sharp(input)
      .toColourspace('srgb')
      .ensureAlpha()
      .raw()
      .toBuffer({ resolveWithObject: true })

    if (info.channels !== 4) {
      throw new ImageReadError(`Expected 4 channels after decoding, got ${info.channels}`)
    }

    return {
      width: info.width,
      height: info.height,
      data: new Uint8Array(data.buffer, data.byteOffset, data.byteLength)
    }
  }

  public async readBuffer(buffer: Buffer): Promise<RgbaImage> {
    try {
      return await this.decode(buffer)
    } catch (error) {
      if (error instanceof ImageReadError) throw error
      throw new ImageReadError(
        `Failed to decode image buffer: ${error instanceof Error ? error.message : error}`
      )
    }
  }

  public async readFile(filepath: string): Promise<RgbaImage> {
    try {
      return await this.decode(filepath)
    } catch (error) {
      if (error instanceof ImageReadError) throw error
      throw new ImageReadError(
        `Failed to read image ${filepath}: ${error instanceof Error ? error.message : error}`
      )
    }
  }
}
