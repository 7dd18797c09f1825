import { once } from 'node:events'
import { createWriteStream, type WriteStream } from 'node:fs'
import { rename, rm } from 'node:fs/promises'
import { finished } from 'node:stream/promises'
import { Context, Effect, Exit, Layer } from 'effect'
import PDFDocument from 'pdfkit'
import { ContactSheetConfig, partialOutputSuffix } from '@/config/contact-sheet.config'
import { getLogger } from '@/infrastructure/logging/logger'
import type { Size } from '@/types/contact-sheet'
import { DocumentError } from '@/types/errors/contact-sheet-error'

export interface DrawBox {
  readonly x: number
  readonly y: number
  readonly width: number
  readonly height: number
}

/** Append-only page writer handed to the caller of withDocument */
export interface DocumentWriter {
  readonly addPage: () => Effect.Effect<void, DocumentError>
  readonly drawImage: (data: Buffer, box: DrawBox) => Effect.Effect<void, DocumentError>
  /** (x, y) is the text baseline start */
  readonly drawText: (text: string, x: number, y: number) => Effect.Effect<void, DocumentError>
  readonly pageCount: () => number
}

export interface DocumentOptions {
  readonly output: string
  readonly pageSize: Size
  readonly title?: string
}

export class DocumentService extends Context.Tag('DocumentService')<
  DocumentService,
  {
    /**
     * Open a document, run `use`, then commit it to `output`.
     * On failure or interruption the partially written file is removed instead.
     */
    readonly withDocument: <A, E, R>(
      options: DocumentOptions,
      use: (writer: DocumentWriter) => Effect.Effect<A, E, R>,
    ) => Effect.Effect<A, E | DocumentError, R>
  }
>() {}

interface OpenDocument {
  readonly doc: PDFKit.PDFDocument
  readonly stream: WriteStream
  readonly partialPath: string
  ended: boolean
  pages: number
  /** first error emitted by the file stream; pdfkit's pipe does not surface it */
  failure?: Error
}

export type OpenStream = (path: string) => WriteStream

export const makeDocumentServiceLayer = (openStream: OpenStream = createWriteStream) =>
  Layer.effect(
    DocumentService,
    Effect.gen(function* () {
      const config = yield* ContactSheetConfig
      const logger = getLogger().withContext({ service: 'DocumentService' })

      const openDocument = (options: DocumentOptions) =>
        Effect.tryPromise({
          try: async (): Promise<OpenDocument> => {
            const partialPath = `${options.output}${partialOutputSuffix}`
            const stream = openStream(partialPath)
            const open: OpenDocument = {
              doc: new PDFDocument({
                autoFirstPage: false,
                size: [options.pageSize.width, options.pageSize.height],
                margin: 0,
                info: { Title: options.title ?? 'Contact sheet' },
              }),
              stream,
              partialPath,
              ended: false,
              pages: 0,
            }
            stream.on('error', (error) => {
              open.failure ??= error
              logger.error('document_stream_failed', { partialPath, error: error.message })
            })
            await once(stream, 'open')
            open.doc.pipe(stream)
            return open
          },
          catch: (cause) =>
            new DocumentError({ message: `Failed to open output ${options.output}`, cause }),
        })

      const endDocument = async (open: OpenDocument) => {
        if (!open.ended) {
          open.ended = true
          open.doc.end()
        }
        // 既に壊れたストリームは finished を待っても失敗するだけ
        if (!open.failure) await finished(open.stream)
      }

      const streamFailure = (open: OpenDocument) =>
        new DocumentError({ message: `Failed to write ${open.partialPath}`, cause: open.failure })

      /** Runs a pdfkit call unless the file stream has already failed */
      const guarded = (open: OpenDocument, label: string, draw: () => void) =>
        Effect.suspend(() =>
          open.failure
            ? Effect.fail(streamFailure(open))
            : Effect.try({
                try: draw,
                catch: (cause) => new DocumentError({ message: label, cause }),
              }),
        )

      const commit = (open: OpenDocument, output: string) =>
        Effect.tryPromise({
          try: async () => {
            await endDocument(open)
            if (open.failure) throw streamFailure(open)
            await rename(open.partialPath, output)
          },
          catch: (cause) => new DocumentError({ message: `Failed to save ${output}`, cause }),
        }).pipe(
          Effect.tap(() =>
            Effect.sync(() => logger.info('document_committed', { output, pages: open.pages })),
          ),
        )

      const discard = (open: OpenDocument) =>
        Effect.tryPromise(async () => {
          try {
            await endDocument(open)
          } finally {
            await rm(open.partialPath, { force: true })
          }
        }).pipe(
          Effect.tap(() =>
            Effect.sync(() => logger.warn('document_discarded', { partialPath: open.partialPath })),
          ),
          Effect.catchAll((error) =>
            Effect.sync(() =>
              logger.error('document_discard_failed', {
                partialPath: open.partialPath,
                error: error.message,
              }),
            ),
          ),
        )

      const writerFor = (open: OpenDocument, pageSize: Size): DocumentWriter => ({
        addPage: () =>
          guarded(open, 'Failed to add page', () => {
            open.doc.addPage({ size: [pageSize.width, pageSize.height], margin: 0 })
            open.pages += 1
          }),
        drawImage: (data, box) =>
          guarded(open, 'Failed to draw image', () => {
            open.doc.image(data, box.x, box.y, { width: box.width, height: box.height })
          }),
        drawText: (text, x, y) =>
          guarded(open, `Failed to draw caption "${text}"`, () => {
            open.doc
              .font(config.caption.font)
              .fontSize(config.caption.fontSize)
              .fillColor('#000000')
              .text(text, x, y, { lineBreak: false, baseline: 'alphabetic' })
          }),
        pageCount: () => open.pages,
      })

      const withDocument = <A, E, R>(
        options: DocumentOptions,
        use: (writer: DocumentWriter) => Effect.Effect<A, E, R>,
      ): Effect.Effect<A, E | DocumentError, R> =>
        Effect.acquireUseRelease(
          openDocument(options),
          (open) =>
            use(writerFor(open, options.pageSize)).pipe(
              Effect.tap(() => commit(open, options.output)),
            ),
          (open, exit) => (Exit.isSuccess(exit) ? Effect.void : discard(open)),
        )

      return { withDocument }
    }),
  )

export const DocumentServiceLive = makeDocumentServiceLayer()
