import { describe, it, expect } from 'vitest'
import {
  normalizeBoolean,
  normalizeSortKey,
  normalizeVisibilityFilter,
  parseTagList,
  joinTagList,
  isValidUrl,
  parseDiigoDate,
  generateBookmarkId,
  toBookmark,
  formatBookmark,
} from './index.js'

// ============================================================================
// Parameter normalization
// ============================================================================

describe('normalizeBoolean', () => {
  it('should map affirmative values to yes', () => {
    for (const value of [true, 'yes', 'YES', 'true', 'True', '1', 'y', 'Y']) {
      expect(normalizeBoolean(value)).toBe('yes')
    }
  })

  it('should map everything else to no', () => {
    for (const value of [false, 'no', 'false', '0', '', 'maybe', ' yes', undefined, null, 1]) {
      expect(normalizeBoolean(value)).toBe('no')
    }
  })
})

describe('normalizeSortKey', () => {
  it('should pass through integers in range', () => {
    expect(normalizeSortKey(0)).toBe(0)
    expect(normalizeSortKey(3)).toBe(3)
  })

  it('should clamp integers outside the range', () => {
    expect(normalizeSortKey(-4)).toBe(0)
    expect(normalizeSortKey(9)).toBe(3)
  })

  it('should map string aliases', () => {
    expect(normalizeSortKey('created')).toBe(0)
    expect(normalizeSortKey('created_at')).toBe(0)
    expect(normalizeSortKey('updated')).toBe(1)
    expect(normalizeSortKey('UPDATED_AT')).toBe(1)
    expect(normalizeSortKey('popularity')).toBe(2)
    expect(normalizeSortKey('hot')).toBe(3)
  })

  it('should default unknown strings to most recently updated', () => {
    expect(normalizeSortKey('newest')).toBe(1)
    expect(normalizeSortKey('')).toBe(1)
    expect(normalizeSortKey(undefined)).toBe(1)
  })
})

describe('normalizeVisibilityFilter', () => {
  it('should keep all and public', () => {
    expect(normalizeVisibilityFilter('all')).toBe('all')
    expect(normalizeVisibilityFilter('Public')).toBe('public')
  })

  it('should approximate private as all', () => {
    expect(normalizeVisibilityFilter('private')).toBe('all')
  })

  it('should default anything else to all', () => {
    expect(normalizeVisibilityFilter('read_later')).toBe('all')
    expect(normalizeVisibilityFilter(undefined)).toBe('all')
  })
})

// ============================================================================
// Tags
// ============================================================================

describe('parseTagList / joinTagList', () => {
  it('should split, trim and drop empty tokens', () => {
    expect(parseTagList(' js, ts ,,tools ')).toEqual(['js', 'ts', 'tools'])
  })

  it('should return an empty list for empty or blank input', () => {
    expect(parseTagList('')).toEqual([])
    expect(parseTagList('   ')).toEqual([])
    expect(parseTagList(undefined)).toEqual([])
  })

  it('should join with commas', () => {
    expect(joinTagList(['a', 'b c', 'd'])).toBe('a,b c,d')
    expect(joinTagList([])).toBe('')
  })

  it('should round-trip trimmed non-empty tags', () => {
    const tags = ['reading list', 'dev', 'tools@work', 'x']
    expect(parseTagList(joinTagList(tags))).toEqual(tags)
  })
})

// ============================================================================
// URLs
// ============================================================================

describe('isValidUrl', () => {
  it('should accept URLs with scheme and host', () => {
    expect(isValidUrl('https://example.com')).toBe(true)
    expect(isValidUrl('http://localhost:8080/path?q=1')).toBe(true)
    expect(isValidUrl('ftp://files.example.com/a.txt')).toBe(true)
  })

  it('should reject text without scheme or host', () => {
    expect(isValidUrl('example.com')).toBe(false)
    expect(isValidUrl('not a url')).toBe(false)
    expect(isValidUrl('mailto:someone@example.com')).toBe(false)
    expect(isValidUrl('http://')).toBe(false)
    expect(isValidUrl('')).toBe(false)
  })
})

// ============================================================================
// Dates and derived ids
// ============================================================================

describe('parseDiigoDate', () => {
  it('should parse the Diigo timestamp format ignoring the zone', () => {
    const date = parseDiigoDate('2008/04/30 06:28:54 +0800')
    expect(date?.toISOString()).toBe('2008-04-30T06:28:54.000Z')
  })

  it('should return undefined for unparseable values', () => {
    expect(parseDiigoDate('yesterday')).toBeUndefined()
    expect(parseDiigoDate('2008/13/30 06:28:54 +0800')).toBeUndefined()
    expect(parseDiigoDate(undefined)).toBeUndefined()
  })
})

describe('generateBookmarkId', () => {
  it('should prefix the date and append 4 hex chars', () => {
    const id = generateBookmarkId('2008/04/30 06:28:54 +0800', 'https://example.com')
    expect(id).toMatch(/^080430[0-9a-f]{4}$/)
  })

  it('should be the same for the same timestamp and URL', () => {
    const a = generateBookmarkId('2021/01/02 03:04:05 +0000', 'https://example.com/a')
    const b = generateBookmarkId('2021/01/02 03:04:05 +0000', 'https://example.com/a')
    expect(a).toBe(b)
  })

  it('should fall back to 8 random chars when the timestamp is unparseable', () => {
    expect(generateBookmarkId('garbage', 'https://example.com')).toHaveLength(8)
  })
})

// ============================================================================
// Record mapping
// ============================================================================

describe('toBookmark', () => {
  it('should map wire fields to a bookmark', () => {
    expect(
      toBookmark({
        url: 'https://example.com',
        title: 'Example',
        desc: 'A site',
        tags: 'a,b',
        shared: 'yes',
        readlater: 'no',
        created_at: '2020/01/01 00:00:00 +0000',
        updated_at: '2020/01/02 00:00:00 +0000',
        annotations: [{ content: 'highlight' }],
      })
    ).toEqual({
      url: 'https://example.com',
      title: 'Example',
      description: 'A site',
      tags: 'a,b',
      shared: true,
      readLater: false,
      createdAt: '2020/01/01 00:00:00 +0000',
      updatedAt: '2020/01/02 00:00:00 +0000',
      annotations: [{ content: 'highlight' }],
    })
  })

  it('should fill defaults for missing fields', () => {
    expect(toBookmark({ url: 'https://example.com' })).toEqual({
      url: 'https://example.com',
      title: '',
      description: '',
      tags: '',
      shared: false,
      readLater: false,
      createdAt: undefined,
      updatedAt: undefined,
      annotations: [],
    })
  })
})

describe('formatBookmark', () => {
  it('should add the tag list and the derived id', () => {
    const formatted = formatBookmark(
      toBookmark({ url: 'https://example.com', tags: 'x, y', created_at: '2019/07/08 10:00:00 +0000' })
    )
    expect(formatted.tagList).toEqual(['x', 'y'])
    expect(formatted.generatedId).toMatch(/^190708[0-9a-f]{4}$/)
  })

  it('should leave out the derived id without a created timestamp', () => {
    const formatted = formatBookmark(toBookmark({ url: 'https://example.com' }))
    expect(formatted.generatedId).toBeUndefined()
    expect(formatted.tagList).toEqual([])
  })
})
