import { Config, Context, Layer } from 'effect'
import type {
  FillOrder,
  LabelMode,
  PageOrientation,
  Size,
  UniformOrientation,
} from '@/types/contact-sheet'

// Contact sheet の固定値はここを唯一の参照源とする（Magic Number禁止規約）

/** pdfkit の 'A4' と同じ寸法 (pt) */
export const A4_PORTRAIT: Size = { width: 595.28, height: 841.89 }

export const MM_TO_PT = 72 / 25.4

export const SUPPORTED_IMAGE_EXTENSIONS = [
  '.jpg',
  '.jpeg',
  '.png',
  '.tif',
  '.tiff',
  '.webp',
] as const

export interface CliDefaults {
  readonly output: string
  readonly pageOrient: PageOrientation
  readonly uniformOrient: UniformOrientation
  readonly marginMm: number
  readonly gapMm: number
  readonly labels: LabelMode
  readonly order: FillOrder
}

export const cliDefaults: CliDefaults = {
  output: 'contact_sheet.pdf',
  pageOrient: 'portrait',
  uniformOrient: 'portrait',
  marginMm: 10.0,
  gapMm: 2.0,
  labels: 'none',
  order: 'film-strip-order',
}

export const partialOutputSuffix = '.partial'

export function mmToPt(mm: number): number {
  return mm * MM_TO_PT
}

export function pageSizeFor(orient: PageOrientation): Size {
  return orient === 'landscape'
    ? { width: A4_PORTRAIT.height, height: A4_PORTRAIT.width }
    : { ...A4_PORTRAIT }
}

export interface ContactSheetConfigShape {
  readonly caption: {
    readonly font: string
    readonly fontSize: number
    /** baseline distance below the cell's bottom edge */
    readonly offset: number
  }
  readonly thumbnail: {
    /** rasterized pixels per drawn point */
    readonly rasterScale: number
    readonly jpegQuality: number
  }
  readonly autoGrid: {
    readonly maxRows: number
    readonly maxCols: number
  }
}

export const defaultContactSheetConfig: ContactSheetConfigShape = {
  caption: { font: 'Helvetica', fontSize: 7, offset: 2 },
  thumbnail: { rasterScale: 1, jpegQuality: 90 },
  autoGrid: { maxRows: 15, maxCols: 30 },
}

const positive = (name: string) =>
  Config.validate<number>({ message: `${name} must be positive`, validation: (n) => n > 0 })

export const contactSheetConfig: Config.Config<ContactSheetConfigShape> = Config.all({
  caption: Config.all({
    font: Config.string('CONTACT_SHEET_CAPTION_FONT').pipe(
      Config.withDefault(defaultContactSheetConfig.caption.font),
    ),
    fontSize: Config.number('CONTACT_SHEET_CAPTION_FONT_SIZE').pipe(
      positive('CONTACT_SHEET_CAPTION_FONT_SIZE'),
      Config.withDefault(defaultContactSheetConfig.caption.fontSize),
    ),
    offset: Config.number('CONTACT_SHEET_CAPTION_OFFSET').pipe(
      Config.withDefault(defaultContactSheetConfig.caption.offset),
    ),
  }),
  thumbnail: Config.all({
    rasterScale: Config.number('CONTACT_SHEET_RASTER_SCALE').pipe(
      positive('CONTACT_SHEET_RASTER_SCALE'),
      Config.withDefault(defaultContactSheetConfig.thumbnail.rasterScale),
    ),
    jpegQuality: Config.integer('CONTACT_SHEET_JPEG_QUALITY').pipe(
      Config.validate({
        message: 'CONTACT_SHEET_JPEG_QUALITY must be within 1..100',
        validation: (q) => q >= 1 && q <= 100,
      }),
      Config.withDefault(defaultContactSheetConfig.thumbnail.jpegQuality),
    ),
  }),
  autoGrid: Config.all({
    maxRows: Config.integer('CONTACT_SHEET_MAX_ROWS').pipe(
      positive('CONTACT_SHEET_MAX_ROWS'),
      Config.withDefault(defaultContactSheetConfig.autoGrid.maxRows),
    ),
    maxCols: Config.integer('CONTACT_SHEET_MAX_COLS').pipe(
      positive('CONTACT_SHEET_MAX_COLS'),
      Config.withDefault(defaultContactSheetConfig.autoGrid.maxCols),
    ),
  }),
})

export class ContactSheetConfig extends Context.Tag('ContactSheetConfig')<
  ContactSheetConfig,
  ContactSheetConfigShape
>() {}

export const ContactSheetConfigLive = Layer.effect(ContactSheetConfig, contactSheetConfig)

export const makeContactSheetConfigLayer = (
  overrides: Partial<ContactSheetConfigShape> = {},
): Layer.Layer<ContactSheetConfig> =>
  Layer.succeed(ContactSheetConfig, {
    caption: { ...defaultContactSheetConfig.caption, ...(overrides.caption || {}) },
    thumbnail: { ...defaultContactSheetConfig.thumbnail, ...(overrides.thumbnail || {}) },
    autoGrid: { ...defaultContactSheetConfig.autoGrid, ...(overrides.autoGrid || {}) },
  })
