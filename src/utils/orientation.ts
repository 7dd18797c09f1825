import type { Size, UniformOrientation } from '@/types/contact-sheet'

/** Clockwise rotation in degrees, as sharp's rotate() takes it */
export type QuarterTurn = 0 | 90 | 270

/**
 * Rotation forcing a uniform thumbnail orientation.
 * portrait: wider-than-tall turns 90° counter-clockwise.
 * landscape: taller-than-wide turns 90° clockwise.
 * Squares are left as they are.
 */
export function uniformRotation(size: Size, mode: UniformOrientation): QuarterTurn {
  switch (mode) {
    case 'portrait':
      return size.width > size.height ? 270 : 0
    case 'landscape':
      return size.height > size.width ? 90 : 0
    default:
      return 0
  }
}

export function rotatedSize(size: Size, turn: QuarterTurn): Size {
  return turn === 0 ? { ...size } : { width: size.height, height: size.width }
}
