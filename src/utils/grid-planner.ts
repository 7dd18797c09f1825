import { Effect } from 'effect'
import { getLogger } from '@/infrastructure/logging/logger'
import type { GridDimensions, GridOverrides, PageGeometry, Size } from '@/types/contact-sheet'
import { GridValidationError, LayoutDegenerateError } from '@/types/errors/contact-sheet-error'

export interface AutoGridBounds {
  readonly maxRows: number
  readonly maxCols: number
}

export interface AutoGridChoice extends GridDimensions {
  /** true when no candidate qualified and (1, n) was returned unchecked */
  readonly fallback: boolean
}

export function usableArea(page: Size, margin: number): Size {
  return { width: page.width - 2 * margin, height: page.height - 2 * margin }
}

export function computeCellSize(usable: Size, rows: number, cols: number, gap: number): Size {
  return {
    width: (usable.width - gap * (cols - 1)) / cols,
    height: (usable.height - gap * (rows - 1)) / rows,
  }
}

export function cellSizeOf(geometry: PageGeometry): Size {
  return computeCellSize(
    usableArea({ width: geometry.pageWidth, height: geometry.pageHeight }, geometry.margin),
    geometry.rows,
    geometry.cols,
    geometry.gap,
  )
}

/**
 * Brute-force (rows, cols) search maximizing cell area.
 * rows が外側ループなので同面積なら行数の少ない方が残る。
 */
export function chooseGridAuto(
  n: number,
  usable: Size,
  gap: number,
  bounds: AutoGridBounds,
): AutoGridChoice {
  let best: AutoGridChoice = { rows: 1, cols: n, fallback: true }
  let bestArea = -1

  for (let rows = 1; rows <= Math.min(bounds.maxRows, n); rows++) {
    const cols = Math.ceil(n / rows)
    if (cols > bounds.maxCols) continue
    const cell = computeCellSize(usable, rows, cols, gap)
    if (cell.width <= 0 || cell.height <= 0) continue
    const area = cell.width * cell.height
    if (area > bestArea) {
      bestArea = area
      best = { rows, cols, fallback: false }
    }
  }
  return best
}

/** Explicit overrides: a single given dimension derives the other from n */
export function explicitGrid(n: number, overrides: GridOverrides): GridDimensions | null {
  const { rows, cols } = overrides
  if (rows !== undefined && cols !== undefined) return { rows, cols }
  if (rows !== undefined) return { rows, cols: Math.ceil(n / rows) }
  if (cols !== undefined) return { rows: Math.ceil(n / cols), cols }
  return null
}

function isPositiveInt(v: number | undefined): boolean {
  return v === undefined || (Number.isInteger(v) && v > 0)
}

export interface ResolveGridInput {
  readonly itemCount: number
  readonly pageSize: Size
  readonly margin: number
  readonly gap: number
  readonly overrides: GridOverrides
  readonly bounds: AutoGridBounds
}

/**
 * Resolve the document's PageGeometry, rejecting any grid whose cells would not have
 * positive width and height.
 */
export function resolveGrid(
  input: ResolveGridInput,
): Effect.Effect<PageGeometry, GridValidationError | LayoutDegenerateError> {
  return Effect.gen(function* () {
    const logger = getLogger().withContext({ service: 'grid-planner' })
    const { itemCount, pageSize, margin, gap, overrides, bounds } = input

    if (!Number.isInteger(itemCount) || itemCount < 1) {
      return yield* Effect.fail(
        new GridValidationError({
          message: `At least one item is required to plan a grid (got ${itemCount})`,
        }),
      )
    }
    if (!isPositiveInt(overrides.rows) || !isPositiveInt(overrides.cols)) {
      return yield* Effect.fail(
        new GridValidationError({
          message: 'Rows and columns must be positive integers',
          details: overrides,
        }),
      )
    }

    const usable = usableArea(pageSize, margin)
    const explicit = explicitGrid(itemCount, overrides)
    const grid = explicit ?? chooseGridAuto(itemCount, usable, gap, bounds)
    const cell = computeCellSize(usable, grid.rows, grid.cols, gap)
    const valid = cell.width > 0 && cell.height > 0

    if (explicit && !valid) {
      return yield* Effect.fail(
        new GridValidationError({
          message: `Grid ${grid.rows}x${grid.cols} leaves no room for cells on the page`,
          details: { ...grid, cell },
        }),
      )
    }
    if (!explicit && 'fallback' in grid && grid.fallback) {
      if (!valid) {
        return yield* Effect.fail(
          new LayoutDegenerateError({
            message: `No usable automatic grid for ${itemCount} images on this page; pass --rows/--cols`,
            rows: grid.rows,
            cols: grid.cols,
          }),
        )
      }
      logger.warn('grid_fallback_used', { rows: grid.rows, cols: grid.cols, itemCount })
    }

    logger.debug('grid_resolved', {
      rows: grid.rows,
      cols: grid.cols,
      mode: explicit ? 'explicit' : 'auto',
      cellWidth: cell.width,
      cellHeight: cell.height,
    })

    return {
      pageWidth: pageSize.width,
      pageHeight: pageSize.height,
      margin,
      gap,
      rows: grid.rows,
      cols: grid.cols,
    }
  })
}
