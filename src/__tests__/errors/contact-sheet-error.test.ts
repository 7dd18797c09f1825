import { describe, expect, it } from 'vitest'
import {
  ArgumentError,
  ContactSheetError,
  DecodeError,
  DocumentError,
  GridValidationError,
  LayoutDegenerateError,
  NoImagesError,
  NotFoundError,
} from '@/types/errors/contact-sheet-error'

describe('ContactSheetError', () => {
  it('classifies input errors', () => {
    expect(ContactSheetError.isInputError(new NotFoundError({ message: 'x', path: '/x' }))).toBe(true)
    expect(ContactSheetError.isInputError(new NoImagesError({ message: 'x', directory: '/x' }))).toBe(true)
    expect(ContactSheetError.isInputError(new ArgumentError({ message: 'x' }))).toBe(true)
    expect(ContactSheetError.isInputError(new GridValidationError({ message: 'x' }))).toBe(true)
    expect(
      ContactSheetError.isInputError(new LayoutDegenerateError({ message: 'x', rows: 1, cols: 9 })),
    ).toBe(false)
    expect(ContactSheetError.isInputError(new DocumentError({ message: 'x' }))).toBe(false)
  })

  it('appends the underlying cause for I/O errors only', () => {
    expect(
      ContactSheetError.toMessage(
        new DocumentError({ message: 'Failed to save out.pdf', cause: new Error('EACCES') }),
      ),
    ).toBe('Failed to save out.pdf: EACCES')
    expect(
      ContactSheetError.toMessage(
        new DecodeError({ message: 'Failed to decode image a.jpg', path: 'a.jpg', cause: 'opaque' }),
      ),
    ).toBe('Failed to decode image a.jpg')
    expect(
      ContactSheetError.toMessage(new GridValidationError({ message: 'Rows and columns must be positive integers' })),
    ).toBe('Rows and columns must be positive integers')
  })

  it('carries a tag for matching', () => {
    const error = new LayoutDegenerateError({ message: 'no room', rows: 1, cols: 400 })
    expect(error._tag).toBe('LayoutDegenerateError')
    expect(error).toBeInstanceOf(Error)
  })
})
