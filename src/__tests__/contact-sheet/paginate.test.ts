import { describe, expect, it } from 'vitest'
import { paginate } from '@/utils/paginate'

describe('paginate', () => {
  it('splits into full pages with the remainder on the last one', () => {
    expect(paginate(10, 4)).toEqual([
      { start: 0, end: 4 },
      { start: 4, end: 8 },
      { start: 8, end: 10 },
    ])
  })

  it('produces exact pages when n is a multiple of perPage', () => {
    expect(paginate(8, 4)).toEqual([
      { start: 0, end: 4 },
      { start: 4, end: 8 },
    ])
  })

  it('returns no pages for zero items', () => {
    expect(paginate(0, 3)).toEqual([])
  })

  it('covers [0, n) contiguously with ceil(n / perPage) pages', () => {
    for (let n = 1; n <= 40; n++) {
      for (let perPage = 1; perPage <= 12; perPage++) {
        const pages = paginate(n, perPage)
        expect(pages).toHaveLength(Math.ceil(n / perPage))
        let cursor = 0
        for (const page of pages) {
          expect(page.start).toBe(cursor)
          expect(page.end).toBeGreaterThan(page.start)
          expect(page.end - page.start).toBeLessThanOrEqual(perPage)
          cursor = page.end
        }
        expect(cursor).toBe(n)
      }
    }
  })

  it('rejects a non-positive or fractional page capacity', () => {
    expect(() => paginate(5, 0)).toThrow(RangeError)
    expect(() => paginate(5, -2)).toThrow(RangeError)
    expect(() => paginate(5, 1.5)).toThrow(RangeError)
  })
})
