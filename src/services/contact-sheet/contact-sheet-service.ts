import path from 'node:path'
import { Context, Effect, Layer } from 'effect'
import { ContactSheetConfig, mmToPt, pageSizeFor } from '@/config/contact-sheet.config'
import { getLogger } from '@/infrastructure/logging/logger'
import type { ContactSheetOptions, ContactSheetSummary } from '@/types/contact-sheet'
import { type ContactSheetError, NoImagesError } from '@/types/errors/contact-sheet-error'
import { resolveGrid } from '@/utils/grid-planner'
import { findImages } from '@/utils/image-locator'
import { paginate } from '@/utils/paginate'
import { DocumentService } from './document-service'
import { ImageService } from './image-service'
import { renderPage } from './page-renderer'

export class ContactSheetService extends Context.Tag('ContactSheetService')<
  ContactSheetService,
  {
    readonly build: (
      options: ContactSheetOptions,
    ) => Effect.Effect<ContactSheetSummary, ContactSheetError>
  }
>() {}

export const ContactSheetServiceLive = Layer.effect(
  ContactSheetService,
  Effect.gen(function* () {
    const config = yield* ContactSheetConfig
    const documents = yield* DocumentService
    const imageService = yield* ImageService
    const logger = getLogger().withContext({ service: 'ContactSheetService' })

    const build = (options: ContactSheetOptions) =>
      Effect.gen(function* () {
        const runLogger = logger.withContext({
          inputDir: options.inputDir,
          output: options.output,
        })
        const images = yield* findImages(options.inputDir)
        if (images.length === 0) {
          return yield* Effect.fail(
            new NoImagesError({
              message: `No supported images found in ${options.inputDir}`,
              directory: options.inputDir,
            }),
          )
        }
        runLogger.info('images_located', { count: images.length })

        const pageSize = pageSizeFor(options.pageOrient)
        const geometry = yield* resolveGrid({
          itemCount: images.length,
          pageSize,
          margin: mmToPt(options.marginMm),
          gap: mmToPt(options.gapMm),
          overrides: { rows: options.rows, cols: options.cols },
          bounds: config.autoGrid,
        })
        const pages = paginate(images.length, geometry.rows * geometry.cols)

        yield* documents.withDocument(
          { output: options.output, pageSize, title: path.basename(options.inputDir) },
          (writer) =>
            Effect.forEach(
              pages,
              (range) =>
                renderPage(writer, images, range, geometry, {
                  uniformOrient: options.uniformOrient,
                  labels: options.labels,
                  order: options.order,
                }),
              { discard: true },
            ),
        )

        runLogger.debug('build_finished', {
          pages: pages.length,
          rows: geometry.rows,
          cols: geometry.cols,
        })
        return {
          output: options.output,
          imageCount: images.length,
          pageCount: pages.length,
          rows: geometry.rows,
          cols: geometry.cols,
          pageOrient: options.pageOrient,
          uniformOrient: options.uniformOrient,
          marginMm: options.marginMm,
          gapMm: options.gapMm,
          labels: options.labels,
          order: options.order,
        } satisfies ContactSheetSummary
      }).pipe(
        Effect.provideService(ImageService, imageService),
        Effect.provideService(ContactSheetConfig, config),
      )

    return { build }
  }),
)

export function formatSummary(summary: ContactSheetSummary): string {
  return (
    `✓ Done: ${summary.output} (${summary.imageCount} images, ${summary.pageCount} pages, ` +
    `grid ${summary.rows}x${summary.cols}; page ${summary.pageOrient}, uniform ${summary.uniformOrient}; ` +
    `margin ${summary.marginMm} mm, gap ${summary.gapMm} mm; labels ${summary.labels}; order ${summary.order})`
  )
}
