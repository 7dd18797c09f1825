import { Effect } from 'effect'
import { ContactSheetConfig } from '@/config/contact-sheet.config'
import { getLogger } from '@/infrastructure/logging/logger'
import type {
  CellPlacement,
  FillOrder,
  ImageRef,
  LabelMode,
  PageGeometry,
  PageRange,
  ThumbnailFit,
  UniformOrientation,
} from '@/types/contact-sheet'
import type { DecodeError, DocumentError } from '@/types/errors/contact-sheet-error'
import { indexToCell } from '@/utils/cell-mapper'
import { cellSizeOf } from '@/utils/grid-planner'
import type { DocumentWriter } from './document-service'
import { ImageService } from './image-service'

/**
 * Cell rectangles for every item of a page, in index order.
 * pdfkit は左上原点・y 下向きなので row 0 (最上段) が y = margin になる。
 */
export function layoutPage(
  geometry: PageGeometry,
  range: PageRange,
  order: FillOrder,
): CellPlacement[] {
  const cell = cellSizeOf(geometry)
  const placements: CellPlacement[] = []
  for (let index = 0; index < range.end - range.start; index++) {
    const { row, col } = indexToCell(index, geometry.rows, geometry.cols, order)
    placements.push({
      index,
      row,
      col,
      x: geometry.margin + col * (cell.width + geometry.gap),
      y: geometry.margin + row * (cell.height + geometry.gap),
      width: cell.width,
      height: cell.height,
    })
  }
  return placements
}

/** Uniform aspect-preserving scale into the cell, integer size of at least 1x1, centered */
export function fitThumbnail(
  imageWidth: number,
  imageHeight: number,
  cellWidth: number,
  cellHeight: number,
): ThumbnailFit {
  const scale = Math.min(cellWidth / imageWidth, cellHeight / imageHeight)
  const width = Math.max(1, Math.floor(imageWidth * scale))
  const height = Math.max(1, Math.floor(imageHeight * scale))
  return {
    width,
    height,
    offsetX: (cellWidth - width) / 2,
    offsetY: (cellHeight - height) / 2,
  }
}

export function captionFor(image: ImageRef, mode: LabelMode): string {
  switch (mode) {
    case 'index':
      return image.stem
    case 'name':
      return image.name
    default:
      return ''
  }
}

export interface RenderPageOptions {
  readonly uniformOrient: UniformOrientation
  readonly labels: LabelMode
  readonly order: FillOrder
}

/**
 * Draw one page: images are decoded, drawn and released strictly one at a time.
 * Any decode failure aborts the page (and the run); a range outside `images` is a defect.
 */
export function renderPage(
  writer: DocumentWriter,
  images: readonly ImageRef[],
  range: PageRange,
  geometry: PageGeometry,
  options: RenderPageOptions,
): Effect.Effect<void, DecodeError | DocumentError, ImageService | ContactSheetConfig> {
  return Effect.gen(function* () {
    const imageService = yield* ImageService
    const config = yield* ContactSheetConfig
    const logger = getLogger().withContext({ service: 'page-renderer' })

    if (range.start < 0 || range.end > images.length || range.start >= range.end) {
      return yield* Effect.dieMessage(
        `Invalid page range [${range.start}, ${range.end}) for ${images.length} images`,
      )
    }

    yield* writer.addPage()
    const placements = layoutPage(geometry, range, options.order)

    for (const placement of placements) {
      const image = images[range.start + placement.index]
      const pixels = yield* imageService.load(image, options.uniformOrient)
      const fit = fitThumbnail(pixels.width, pixels.height, placement.width, placement.height)
      const encoded = yield* imageService.encodeThumbnail(image, pixels, fit)
      yield* writer.drawImage(encoded, {
        x: placement.x + fit.offsetX,
        y: placement.y + fit.offsetY,
        width: fit.width,
        height: fit.height,
      })

      const caption = captionFor(image, options.labels)
      if (caption) {
        yield* writer.drawText(caption, placement.x, placement.y + placement.height + config.caption.offset)
      }
    }

    logger.debug('page_rendered', {
      page: writer.pageCount(),
      start: range.start,
      end: range.end,
    })
  })
}
