import type { PageRange } from '@/types/contact-sheet'

/**
 * Split n items into consecutive pages of `perPage`; only the last page may be shorter.
 * Callers must resolve a non-empty grid first.
 */
export function paginate(n: number, perPage: number): PageRange[] {
  if (!Number.isInteger(perPage) || perPage < 1) {
    throw new RangeError(`perPage must be a positive integer (got ${perPage})`)
  }
  const pages: PageRange[] = []
  for (let start = 0; start < n; start += perPage) {
    pages.push({ start, end: Math.min(start + perPage, n) })
  }
  return pages
}
