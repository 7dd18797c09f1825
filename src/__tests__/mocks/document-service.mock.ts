import { Effect, Exit, Layer } from 'effect'
import {
  type DocumentOptions,
  DocumentService,
  type DocumentWriter,
  type DrawBox,
} from '@/services/contact-sheet/document-service'

export type RecordedOp =
  | { op: 'addPage' }
  | { op: 'image'; data: Buffer; box: DrawBox }
  | { op: 'text'; text: string; x: number; y: number }

export interface RecordedDocument {
  readonly options: DocumentOptions
  readonly ops: RecordedOp[]
  committed: boolean
}

export function createRecordingWriter(ops: RecordedOp[] = []): {
  writer: DocumentWriter
  ops: RecordedOp[]
} {
  let pages = 0
  const writer: DocumentWriter = {
    addPage: () =>
      Effect.sync(() => {
        pages += 1
        ops.push({ op: 'addPage' })
      }),
    drawImage: (data, box) => Effect.sync(() => void ops.push({ op: 'image', data, box })),
    drawText: (text, x, y) => Effect.sync(() => void ops.push({ op: 'text', text, x, y })),
    pageCount: () => pages,
  }
  return { writer, ops }
}

/** In-process DocumentService that records draw calls instead of writing a PDF */
export function makeRecordingDocumentLayer(): {
  layer: Layer.Layer<DocumentService>
  documents: RecordedDocument[]
} {
  const documents: RecordedDocument[] = []
  const layer = Layer.succeed(DocumentService, {
    withDocument: (options, use) =>
      Effect.suspend(() => {
        const doc: RecordedDocument = { options, ops: [], committed: false }
        documents.push(doc)
        const { writer } = createRecordingWriter(doc.ops)
        return use(writer).pipe(
          Effect.onExit((exit) =>
            Effect.sync(() => {
              doc.committed = Exit.isSuccess(exit)
            }),
          ),
        )
      }),
  })
  return { layer, documents }
}

export const imageOps = (ops: readonly RecordedOp[]) =>
  ops.flatMap((o) => (o.op === 'image' ? [o] : []))

export const textOps = (ops: readonly RecordedOp[]) =>
  ops.flatMap((o) => (o.op === 'text' ? [o] : []))
