import { setTimeout as sleepTimer } from 'node:timers/promises';
import { v4 as uuidv4, v5 as uuidv5 } from 'uuid';
import {
  Bookmark,
  DiigoBookmarkRecord,
  FormattedBookmark,
  SortKey,
  VisibilityFilter,
  WireBoolean
} from '../store/types.js';

const AFFIRMATIVE_VALUES = ['yes', 'true', '1', 'y'];

const SORT_ALIASES: Record<string, SortKey> = {
  created: 0,
  created_at: 0,
  updated: 1,
  updated_at: 1,
  popularity: 2,
  hot: 3
};

// Diigo has no private-only filter, so "private" falls back to "all"
const VISIBILITY_ALIASES: Record<string, VisibilityFilter> = {
  all: 'all',
  public: 'public',
  private: 'all'
};

const DEFAULT_SORT: SortKey = 1;

/**
 * Convert a boolean or boolean-like string to the "yes"/"no" form the API expects.
 * Anything that is not recognised as affirmative maps to "no".
 */
export function normalizeBoolean(value: unknown): WireBoolean {
  if (typeof value === 'boolean') {
    return value ? 'yes' : 'no';
  }
  if (typeof value === 'string') {
    return AFFIRMATIVE_VALUES.includes(value.toLowerCase()) ? 'yes' : 'no';
  }
  return 'no';
}

/**
 * Convert a sort parameter to the API integer.
 *   created / created_at -> 0
 *   updated / updated_at -> 1
 *   popularity           -> 2
 *   hot                  -> 3
 * Numbers are clamped into [0, 3]; unknown strings fall back to 1 (most recently updated).
 */
export function normalizeSortKey(value: number | string | undefined): SortKey {
  if (typeof value === 'number') {
    if (Number.isNaN(value)) {
      return DEFAULT_SORT;
    }
    const clamped = Math.max(0, Math.min(3, Math.trunc(value)));
    return clamped === 0 ? 0 : clamped === 1 ? 1 : clamped === 2 ? 2 : 3;
  }
  if (typeof value === 'string') {
    return SORT_ALIASES[value.toLowerCase()] ?? DEFAULT_SORT;
  }
  return DEFAULT_SORT;
}

export function normalizeVisibilityFilter(value: string | undefined): VisibilityFilter {
  if (typeof value !== 'string') {
    return 'all';
  }
  return VISIBILITY_ALIASES[value.toLowerCase()] ?? 'all';
}

/**
 * Parse comma-separated tags ("a, b,,c") into trimmed, non-empty tokens.
 */
export function parseTagList(text: string | undefined): string[] {
  if (!text || !text.trim()) {
    return [];
  }
  return text
    .split(',')
    .map(tag => tag.trim())
    .filter(tag => tag.length > 0);
}

export function joinTagList(tags: string[]): string {
  return tags.join(',');
}

/**
 * True when the text parses as a URL with both a scheme and a host
 */
export function isValidUrl(text: string): boolean {
  if (typeof text !== 'string' || text.length === 0) {
    return false;
  }
  try {
    const parsed = new URL(text);
    return parsed.protocol.length > 1 && parsed.host.length > 0;
  } catch {
    return false;
  }
}

/**
 * Parse a Diigo timestamp such as "2008/04/30 06:28:54 +0800".
 * The zone suffix is ignored and the fields are read as UTC.
 */
export function parseDiigoDate(text: string | undefined): Date | undefined {
  if (!text) {
    return undefined;
  }
  const match = /^(\d{4})\/(\d{2})\/(\d{2}) (\d{2}):(\d{2}):(\d{2})/.exec(text.trim());
  if (!match) {
    return undefined;
  }

  const [year, month, day, hour, minute, second] = match.slice(1).map(part => parseInt(part, 10));
  const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second));

  // Date.UTC rolls invalid fields over (month 13 -> next year), reject those
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day ||
    date.getUTCHours() !== hour ||
    date.getUTCMinutes() !== minute ||
    date.getUTCSeconds() !== second
  ) {
    return undefined;
  }
  return date;
}

/**
 * Derive a short, human-readable id from the created timestamp and URL.
 * Format: YYMMDD + first 4 chars of a UUIDv5, e.g. "080430a1b2".
 * Falls back to 8 random chars when the timestamp can't be parsed.
 */
export function generateBookmarkId(createdAt: string, url: string): string {
  const date = parseDiigoDate(createdAt);
  if (!date) {
    return uuidv4().slice(0, 8);
  }

  const seconds = Math.floor(date.getTime() / 1000);
  const fullId = uuidv5(`${seconds}${url}`, uuidv5.URL);
  const yy = String(date.getUTCFullYear() % 100).padStart(2, '0');
  const mm = String(date.getUTCMonth() + 1).padStart(2, '0');
  const dd = String(date.getUTCDate()).padStart(2, '0');

  return `${yy}${mm}${dd}${fullId.slice(0, 4)}`;
}

/**
 * Map an API record to a Bookmark
 */
export function toBookmark(record: DiigoBookmarkRecord): Bookmark {
  return {
    url: record.url,
    title: record.title ?? '',
    description: record.desc ?? '',
    tags: record.tags ?? '',
    shared: record.shared === 'yes',
    readLater: record.readlater === 'yes',
    createdAt: record.created_at,
    updatedAt: record.updated_at,
    annotations: Array.isArray(record.annotations) ? record.annotations : []
  };
}

/**
 * Add the derived id and parsed tag list for output
 */
export function formatBookmark(bookmark: Bookmark): FormattedBookmark {
  const formatted: FormattedBookmark = {
    ...bookmark,
    tagList: parseTagList(bookmark.tags)
  };
  if (bookmark.createdAt) {
    formatted.generatedId = generateBookmarkId(bookmark.createdAt, bookmark.url);
  }
  return formatted;
}

/**
 * Resolve after the given number of seconds; rejects if the signal aborts first
 */
export async function sleepSeconds(seconds: number, signal?: AbortSignal): Promise<void> {
  if (seconds <= 0) {
    return;
  }
  await sleepTimer(seconds * 1000, undefined, { signal });
}
