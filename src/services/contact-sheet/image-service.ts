import { open } from 'node:fs/promises'
import { Context, Effect, Layer } from 'effect'
import sharp from 'sharp'
import { ContactSheetConfig } from '@/config/contact-sheet.config'
import { getLogger } from '@/infrastructure/logging/logger'
import type { ImageRef, Size, UniformOrientation } from '@/types/contact-sheet'
import { DecodeError } from '@/types/errors/contact-sheet-error'
import { rotatedSize, uniformRotation } from '@/utils/orientation'

/** Decoded, orientation-normalized pixels. Only ever lives in memory. */
export interface OrientedImage {
  readonly data: Buffer
  readonly width: number
  readonly height: number
  readonly channels: sharp.Channels
}

export class ImageService extends Context.Tag('ImageService')<
  ImageService,
  {
    readonly load: (
      image: ImageRef,
      uniform: UniformOrientation,
    ) => Effect.Effect<OrientedImage, DecodeError>
    /** Resize to the drawn size (points) and encode for embedding */
    readonly encodeThumbnail: (
      image: ImageRef,
      pixels: OrientedImage,
      drawn: Size,
    ) => Effect.Effect<Buffer, DecodeError>
  }
>() {}

const toOriented = ({ data, info }: { data: Buffer; info: sharp.OutputInfo }): OrientedImage => ({
  data,
  width: info.width,
  height: info.height,
  channels: info.channels,
})

const rawInput = (img: OrientedImage) =>
  sharp(img.data, { raw: { width: img.width, height: img.height, channels: img.channels } })

export const ImageServiceLive = Layer.effect(
  ImageService,
  Effect.gen(function* () {
    const config = yield* ContactSheetConfig
    const logger = getLogger().withContext({ service: 'ImageService' })

    // ファイルハンドルは読み込み失敗時も必ず close する
    const readSource = (image: ImageRef) =>
      Effect.acquireUseRelease(
        Effect.tryPromise({
          try: () => open(image.path, 'r'),
          catch: (cause) =>
            new DecodeError({ message: `Failed to open image ${image.path}`, path: image.path, cause }),
        }),
        (handle) =>
          Effect.tryPromise({
            try: () => handle.readFile(),
            catch: (cause) =>
              new DecodeError({ message: `Failed to read image ${image.path}`, path: image.path, cause }),
          }),
        (handle) =>
          Effect.tryPromise(() => handle.close()).pipe(
            Effect.catchAll((error) =>
              Effect.sync(() =>
                logger.warn('image_handle_close_failed', {
                  path: image.path,
                  error: error.message,
                }),
              ),
            ),
          ),
      )

    const decodeStored = (image: ImageRef, source: Buffer) =>
      Effect.tryPromise({
        try: () => sharp(source).raw().toBuffer({ resolveWithObject: true }),
        catch: (cause) =>
          new DecodeError({ message: `Failed to decode image ${image.path}`, path: image.path, cause }),
      }).pipe(Effect.map(toOriented))

    // EXIF orientation 適用失敗だけはローカルで回復し、保存時の向きのまま使う
    const normalizeExif = (image: ImageRef, source: Buffer) =>
      Effect.tryPromise(() => sharp(source).rotate().raw().toBuffer({ resolveWithObject: true })).pipe(
        Effect.map(toOriented),
        Effect.catchAll((error) =>
          Effect.sync(() =>
            logger.warn('exif_orientation_failed', { path: image.path, error: error.message }),
          ).pipe(Effect.zipRight(decodeStored(image, source))),
        ),
      )

    const applyUniform = (image: ImageRef, pixels: OrientedImage, uniform: UniformOrientation) => {
      const turn = uniformRotation(pixels, uniform)
      if (turn === 0) return Effect.succeed(pixels)
      return Effect.tryPromise({
        try: () => rawInput(pixels).rotate(turn).raw().toBuffer({ resolveWithObject: true }),
        catch: (cause) =>
          new DecodeError({ message: `Failed to rotate image ${image.path}`, path: image.path, cause }),
      }).pipe(
        Effect.map(toOriented),
        Effect.tap((rotated) =>
          Effect.sync(() =>
            logger.debug('uniform_rotation_applied', {
              path: image.path,
              turn,
              expected: rotatedSize(pixels, turn),
              actual: { width: rotated.width, height: rotated.height },
            }),
          ),
        ),
      )
    }

    const load = (image: ImageRef, uniform: UniformOrientation) =>
      Effect.gen(function* () {
        const source = yield* readSource(image)
        const normalized = yield* normalizeExif(image, source)
        return yield* applyUniform(image, normalized, uniform)
      })

    const encodeThumbnail = (image: ImageRef, pixels: OrientedImage, drawn: Size) => {
      const scale = config.thumbnail.rasterScale
      const width = Math.max(1, Math.round(drawn.width * scale))
      const height = Math.max(1, Math.round(drawn.height * scale))
      return Effect.tryPromise({
        try: () =>
          rawInput(pixels)
            .resize(width, height, { fit: 'fill' })
            .flatten({ background: '#ffffff' })
            .jpeg({ quality: config.thumbnail.jpegQuality })
            .toBuffer(),
        catch: (cause) =>
          new DecodeError({
            message: `Failed to encode thumbnail for ${image.path}`,
            path: image.path,
            cause,
          }),
      })
    }

    return { load, encodeThumbnail }
  }),
)
