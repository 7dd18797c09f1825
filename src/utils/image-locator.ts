import { readdir, stat } from 'node:fs/promises'
import path from 'node:path'
import { Effect } from 'effect'
import { SUPPORTED_IMAGE_EXTENSIONS } from '@/config/contact-sheet.config'
import type { ImageRef } from '@/types/contact-sheet'
import { NotFoundError } from '@/types/errors/contact-sheet-error'

export function toImageRef(filePath: string): ImageRef {
  const absolute = path.resolve(filePath)
  const name = path.basename(absolute)
  return { path: absolute, name, stem: path.parse(name).name }
}

/**
 * Order file names by extension group (SUPPORTED_IMAGE_EXTENSIONS order), alphabetically
 * inside each group, keeping only the first occurrence of each resolved path.
 */
export function selectImageFiles(dir: string, names: readonly string[]): ImageRef[] {
  const seen = new Set<string>()
  const out: ImageRef[] = []
  for (const ext of SUPPORTED_IMAGE_EXTENSIONS) {
    const group = names.filter((n) => path.extname(n).toLowerCase() === ext).sort()
    for (const name of group) {
      const ref = toImageRef(path.join(dir, name))
      if (seen.has(ref.path)) continue
      seen.add(ref.path)
      out.push(ref)
    }
  }
  return out
}

/** Stats through symlinks; dangling links count as not-a-file */
async function isRegularFile(p: string): Promise<boolean> {
  try {
    return (await stat(p)).isFile()
  } catch {
    return false
  }
}

export function findImages(dir: string): Effect.Effect<ImageRef[], NotFoundError> {
  const notFound = () => new NotFoundError({ message: `Input folder not found: ${dir}`, path: dir })

  return Effect.gen(function* () {
    const info = yield* Effect.tryPromise({ try: () => stat(dir), catch: notFound })
    if (!info.isDirectory()) {
      return yield* Effect.fail(
        new NotFoundError({ message: `Input path is not a directory: ${dir}`, path: dir }),
      )
    }
    const entries = yield* Effect.tryPromise({ try: () => readdir(dir), catch: notFound })
    const candidates = selectImageFiles(dir, entries)
    return yield* Effect.filter(candidates, (ref) =>
      Effect.promise(() => isRegularFile(ref.path)),
    )
  })
}
