import type { Cell, FillOrder } from '@/types/contact-sheet'

const FILL_ORDER_ALIASES: Record<string, FillOrder> = {
  'reading-order': 'reading-order',
  'row-left-right': 'reading-order',
  'film-strip-order': 'film-strip-order',
  'film-bottom-up': 'film-strip-order',
}

export const FILL_ORDER_CHOICES = Object.keys(FILL_ORDER_ALIASES)

/** Canonical name or alias -> FillOrder, undefined for anything else */
export function parseFillOrder(raw: string): FillOrder | undefined {
  return Object.hasOwn(FILL_ORDER_ALIASES, raw) ? FILL_ORDER_ALIASES[raw] : undefined
}

/**
 * Map a linear index within a page to its grid cell.
 *
 * - reading-order: left→right, top→bottom
 * - film-strip-order: each column fills bottom→top, columns advance left→right
 *   (35mm ストリップを並べた配置)
 *
 * row 0 is always the top row, col 0 the leftmost column.
 * Unknown order values fall back to reading-order.
 */
export function indexToCell(index: number, rows: number, cols: number, order: FillOrder): Cell {
  switch (order) {
    case 'film-strip-order': {
      const col = Math.floor(index / rows)
      const rowFromBottom = index % rows
      return { row: rows - 1 - rowFromBottom, col }
    }
    default:
      return { row: Math.floor(index / cols), col: index % cols }
  }
}
