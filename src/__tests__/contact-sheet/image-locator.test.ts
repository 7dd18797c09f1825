import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import { Effect } from 'effect'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { NotFoundError } from '@/types/errors/contact-sheet-error'
import { findImages, selectImageFiles, toImageRef } from '@/utils/image-locator'

describe('selectImageFiles', () => {
  it('groups by extension, sorts each group and drops duplicates and other files', () => {
    const refs = selectImageFiles('/photos', [
      'b.png',
      'a.JPG',
      'c.jpg',
      'a.jpg',
      'notes.txt',
      'd.TIFF',
      'e.webp',
      'f.jpeg',
      'a.jpg',
    ])
    expect(refs.map((r) => r.name)).toEqual([
      'a.JPG',
      'a.jpg',
      'c.jpg',
      'f.jpeg',
      'b.png',
      'd.TIFF',
      'e.webp',
    ])
  })

  it('keeps a path listed under both .jpg and .JPG matches exactly once', () => {
    const refs = selectImageFiles('/photos', ['IMG_1.JPG', 'IMG_1.JPG'])
    expect(refs).toEqual([{ path: '/photos/IMG_1.JPG', name: 'IMG_1.JPG', stem: 'IMG_1' }])
  })

  it('sorts all spellings of an extension as one group', () => {
    const refs = selectImageFiles('/photos', ['b.jpg', 'a.JPG', 'c.Jpg'])
    expect(refs.map((r) => r.name)).toEqual(['a.JPG', 'b.jpg', 'c.Jpg'])
  })

  it('returns nothing when no extension matches', () => {
    expect(selectImageFiles('/photos', ['a.gif', 'b.bmp', 'jpg'])).toEqual([])
  })
})

describe('toImageRef', () => {
  it('splits file name and stem', () => {
    expect(toImageRef('/shoot/roll.2/frame-01.tiff')).toEqual({
      path: '/shoot/roll.2/frame-01.tiff',
      name: 'frame-01.tiff',
      stem: 'frame-01',
    })
  })
})

describe('findImages', () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'contact-sheet-locator-'))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('lists regular image files only, in deterministic order', async () => {
    await writeFile(path.join(dir, 'b.jpg'), '')
    await writeFile(path.join(dir, 'A.jpg'), '')
    await writeFile(path.join(dir, 'a.png'), '')
    await writeFile(path.join(dir, 'readme.txt'), '')
    await mkdir(path.join(dir, 'sub.jpg'))

    const refs = await Effect.runPromise(findImages(dir))
    expect(refs.map((r) => r.name)).toEqual(['A.jpg', 'b.jpg', 'a.png'])
    expect(refs[0]?.path).toBe(path.join(dir, 'A.jpg'))
  })

  it('returns an empty list for a folder without images', async () => {
    await writeFile(path.join(dir, 'readme.txt'), '')
    await expect(Effect.runPromise(findImages(dir))).resolves.toEqual([])
  })

  it('fails with NotFoundError for a missing folder', async () => {
    const missing = path.join(dir, 'nope')
    const either = await Effect.runPromise(Effect.either(findImages(missing)))
    expect(either._tag).toBe('Left')
    if (either._tag === 'Left') {
      expect(either.left).toBeInstanceOf(NotFoundError)
      expect(either.left.message).toBe(`Input folder not found: ${missing}`)
    }
  })

  it('fails with NotFoundError when the path is a file', async () => {
    const file = path.join(dir, 'photo.jpg')
    await writeFile(file, '')
    const either = await Effect.runPromise(Effect.either(findImages(file)))
    expect(either._tag).toBe('Left')
    if (either._tag === 'Left') {
      expect(either.left.message).toBe(`Input path is not a directory: ${file}`)
    }
  })
})
