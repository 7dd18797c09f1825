import { Layer } from 'effect'
import { type ContactSheetConfig, ContactSheetConfigLive } from '@/config/contact-sheet.config'
import { ContactSheetService, ContactSheetServiceLive } from './contact-sheet-service'
import { DocumentService, DocumentServiceLive } from './document-service'
import { ImageService, ImageServiceLive } from './image-service'

export { ContactSheetService, DocumentService, ImageService }
export { formatSummary } from './contact-sheet-service'

/** sharp + pdfkit backed services on top of the given config layer */
export const makeContactSheetLayer = <E>(
  configLayer: Layer.Layer<ContactSheetConfig, E>,
): Layer.Layer<ContactSheetService, E> =>
  ContactSheetServiceLive.pipe(
    Layer.provide(Layer.mergeAll(DocumentServiceLive, ImageServiceLive)),
    Layer.provide(configLayer),
  )

export const ContactSheetLive = makeContactSheetLayer(ContactSheetConfigLive)
