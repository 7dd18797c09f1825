import { Data } from 'effect'

/**
 * Contact sheet error taxonomy.
 * Input errors are reported to the user as-is; the rest abort the run with their message.
 */
export type ContactSheetError =
  | NotFoundError
  | NoImagesError
  | ArgumentError
  | GridValidationError
  | LayoutDegenerateError
  | DecodeError
  | DocumentError

/** Input directory missing or not a directory */
export class NotFoundError extends Data.TaggedError('NotFoundError')<{
  message: string
  path: string
}> {}

/** Directory exists but holds no supported image */
export class NoImagesError extends Data.TaggedError('NoImagesError')<{
  message: string
  directory: string
}> {}

/** CLI arguments rejected by validation */
export class ArgumentError extends Data.TaggedError('ArgumentError')<{
  message: string
  details?: unknown
}> {}

/** Explicit grid / item count that cannot produce a valid page geometry */
export class GridValidationError extends Data.TaggedError('GridValidationError')<{
  message: string
  details?: unknown
}> {}

/** Automatic search found nothing and the (1, n) fallback has non-positive cells */
export class LayoutDegenerateError extends Data.TaggedError('LayoutDegenerateError')<{
  message: string
  rows: number
  cols: number
}> {}

export class DecodeError extends Data.TaggedError('DecodeError')<{
  message: string
  path: string
  cause?: unknown
}> {}

/** PDF open / write / finalize failure */
export class DocumentError extends Data.TaggedError('DocumentError')<{
  message: string
  cause?: unknown
}> {}

export const ContactSheetError = {
  isInputError: (e: ContactSheetError): boolean => {
    switch (e._tag) {
      case 'NotFoundError':
      case 'NoImagesError':
      case 'ArgumentError':
      case 'GridValidationError':
        return true
      default:
        return false
    }
  },
  toMessage: (e: ContactSheetError): string => {
    switch (e._tag) {
      case 'DecodeError':
      case 'DocumentError': {
        const cause = e.cause instanceof Error ? `: ${e.cause.message}` : ''
        return `${e.message}${cause}`
      }
      default:
        return e.message
    }
  },
}
