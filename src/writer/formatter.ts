import { PATH_PRECISION } from '../constants'
import { Point } from '../types/base'
import { CompoundPath, SubPath } from '../types/trace'

export class FormatterError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'FormatterError'
  }
}

// Compound path to SVG path data: `M x y L x y ... Z` per sub-path.
export class PathDataFormatter {
  private formatNumber(value: number): string {
    if (!Number.isFinite(value)) {
      throw new FormatterError(`Cannot format non-finite coordinate: ${value}`)
    }
    // Number() drops trailing zeros and turns -0 into 0.
    return String(Number(value.toFixed(PATH_PRECISION)) + 0)
  }

  private formatPoint(point: Point): string {
    return `${this.formatNumber(point.x)} ${this.formatNumber(point.y)}`
  }

  private formatSubPath(subPath: SubPath): string {
    if (subPath.points.length === 0) {
      throw new FormatterError(`Empty ${subPath.kind} sub-path for loop ${subPath.loopIndex}`)
    }

    const [first, ...rest] = subPath.points
    const pieces = [`M ${this.formatPoint(first)}`]
    pieces.push(...rest.map((point) => `L ${this.formatPoint(point)}`))
    pieces.push('Z')
    return pieces.join(' ')
  }

  public format(path: CompoundPath): string {
    return path.map((subPath) => this.formatSubPath(subPath)).join(' ')
  }
}
