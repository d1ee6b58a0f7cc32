import { DiigoClient, SleepFn } from '../client/diigoClient.js';
import { OperationResult, fail, notFoundError, ok, validationError } from '../client/errors.js';
import {
  isValidUrl,
  normalizeBoolean,
  sleepSeconds,
  toBookmark
} from '../utils/index.js';
import { logger } from '../utils/logger.js';
import {
  Annotation,
  Bookmark,
  BookmarkFilters,
  BookmarkUpdate,
  BulkFailure,
  BulkSummary,
  DiigoBookmarkRecord,
  PageRequest,
  SaveBookmarkInput,
  SaveResponse
} from './types.js';

const BOOKMARKS_ENDPOINT = 'bookmarks';
const DEFAULT_RECENT_COUNT = 50;

export interface OrchestratorOptions {
  defaultUser: string;
  pageSize: number;              // server cap on bookmarks per request
  sleep?: SleepFn;
}

// Records without a url are dropped; rawCount is what the server sent
interface LoadedPage {
  bookmarks: Bookmark[];
  rawCount: number;
}

export interface SearchOptions extends BookmarkFilters {
  user?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isBookmarkRecord(value: unknown): value is DiigoBookmarkRecord {
  return isRecord(value) && typeof value.url === 'string';
}

function toSaveResponse(payload: unknown): SaveResponse {
  return isRecord(payload) ? payload : { message: String(payload) };
}

/**
 * Bookmark operations on top of DiigoClient.
 *
 * The API has no search, no per-field update and no id, so this layer pages through
 * everything when it needs to find a bookmark, filters on the client, and rebuilds the
 * full record before an update. All methods return an OperationResult; none throws.
 */
export class BookmarkOrchestrator {
  private readonly sleep: SleepFn;

  constructor(
    private readonly client: DiigoClient,
    private readonly options: OrchestratorOptions
  ) {
    this.sleep = options.sleep ?? sleepSeconds;
  }

  // Read operations

  /**
   * Fetch one page. `count` is capped at the server page size.
   */
  async fetchPage(request: PageRequest = {}): Promise<OperationResult<Bookmark[]>> {
    const page = await this.loadPage(request);
    if (!page.ok) {
      return page;
    }
    return ok(page.value.bookmarks);
  }

  /**
   * Page through every bookmark matching the filters.
   * Stops on a short or empty page; the first failing page ends the walk.
   */
  async fetchAll(user?: string, filters: BookmarkFilters = {}): Promise<OperationResult<Bookmark[]>> {
    const pageSize = this.options.pageSize;
    const bookmarks: Bookmark[] = [];
    let start = 0;

    for (;;) {
      const page = await this.loadPage({ ...filters, user, start, count: pageSize });
      if (!page.ok) {
        return page;
      }
      if (page.value.rawCount === 0) {
        break;
      }

      bookmarks.push(...page.value.bookmarks);

      // 最后一页: 按上游返回的条数判断, 不按过滤后的条数
      if (page.value.rawCount < pageSize) {
        break;
      }
      start += pageSize;
    }

    return ok(bookmarks);
  }

  /**
   * One page when `count` is given, otherwise every bookmark
   */
  async listBookmarks(request: PageRequest = {}): Promise<OperationResult<Bookmark[]>> {
    if (request.count === undefined) {
      const { user, sort, tags, filter, listName } = request;
      return this.fetchAll(user, { sort, tags, filter, listName });
    }
    return this.fetchPage(request);
  }

  /**
   * Case-insensitive substring match on title or description.
   *
   * Diigo offers no full-text search, so this fetches everything matching the filters and
   * filters locally. It is an approximation: results keep the API order and are not ranked.
   */
  async search(query: string, options: SearchOptions = {}): Promise<OperationResult<Bookmark[]>> {
    const { user, ...filters } = options;
    const all = await this.fetchAll(user, filters);
    if (!all.ok) {
      return all;
    }

    const needle = query.toLowerCase();
    return ok(
      all.value.filter(
        b => b.title.toLowerCase().includes(needle) || b.description.toLowerCase().includes(needle)
      )
    );
  }

  /**
   * Exact string match on the URL; no trailing-slash or case normalization
   */
  async findByUrl(url: string, user?: string): Promise<OperationResult<Bookmark>> {
    const all = await this.fetchAll(user);
    if (!all.ok) {
      return all;
    }

    const found = all.value.find(b => b.url === url);
    if (!found) {
      return fail(notFoundError(`Bookmark not found: ${url}`));
    }
    return ok(found);
  }

  async getRecent(count: number = DEFAULT_RECENT_COUNT, user?: string): Promise<OperationResult<Bookmark[]>> {
    return this.fetchPage({ user, count, sort: 1 });
  }

  async getAnnotations(url: string, user?: string): Promise<OperationResult<Annotation[]>> {
    const found = await this.findByUrl(url, user);
    if (!found.ok) {
      return found;
    }
    return ok(found.value.annotations);
  }

  // Write operations

  /**
   * Save as a new entry (merge off). Invalid URLs fail before any request.
   */
  async create(input: SaveBookmarkInput): Promise<OperationResult<SaveResponse>> {
    if (!isValidUrl(input.url)) {
      return fail(validationError(`Invalid URL: ${input.url}`));
    }
    if (typeof input.title !== 'string' || !input.title.trim()) {
      return fail(validationError('title is required and must be a non-empty string'));
    }
    return this.save(input, false);
  }

  /**
   * Read-modify-write: fields left out of `fields` keep the stored value, then the
   * complete record is saved with merge on.
   */
  async update(url: string, fields: BookmarkUpdate): Promise<OperationResult<SaveResponse>> {
    if (!isValidUrl(url)) {
      return fail(validationError(`Invalid URL: ${url}`));
    }

    const existing = await this.findByUrl(url);
    if (!existing.ok) {
      return existing;
    }

    const current = existing.value;
    return this.save(
      {
        url,
        title: fields.title ?? current.title,
        description: fields.description ?? current.description,
        tags: fields.tags ?? current.tags,
        shared: fields.shared ?? current.shared,
        readLater: fields.readLater ?? current.readLater
      },
      true
    );
  }

  /**
   * The delete call needs url and title together; a missing title is looked up first.
   */
  async delete(url: string, title?: string): Promise<OperationResult<SaveResponse>> {
    let resolvedTitle = title;
    if (!resolvedTitle) {
      const found = await this.findByUrl(url);
      if (!found.ok) {
        return found;
      }
      resolvedTitle = found.value.title;
    }

    const result = await this.client.request('POST', BOOKMARKS_ENDPOINT, {}, {
      url,
      title: resolvedTitle
    });
    if (!result.ok) {
      return result;
    }
    return ok(toSaveResponse(result.value));
  }

  /**
   * Create bookmarks one at a time, waiting `delaySeconds` between calls (not after the last).
   * Failures are recorded by input index and never stop the batch.
   */
  async bulkCreate(items: SaveBookmarkInput[], delaySeconds: number): Promise<OperationResult<BulkSummary>> {
    const failures: BulkFailure[] = [];
    let success = 0;

    for (let index = 0; index < items.length; index++) {
      const item = items[index];
      const result = await this.create(item);

      if (result.ok) {
        success++;
      } else {
        logger.warn(`Bulk item ${index} failed: ${result.error.message}`);
        failures.push({
          index,
          url: item.url,
          error: result.error.message,
          kind: result.error.kind
        });
      }

      // 限流: 最后一条之后不再等待
      if (index < items.length - 1) {
        await this.sleep(Math.max(0, delaySeconds));
      }
    }

    return ok({
      total: items.length,
      success,
      failed: failures.length,
      failures
    });
  }

  private async loadPage(request: PageRequest): Promise<OperationResult<LoadedPage>> {
    const count = Math.min(request.count ?? this.options.pageSize, this.options.pageSize);

    const result = await this.client.request('GET', BOOKMARKS_ENDPOINT, {
      user: request.user ?? this.options.defaultUser,
      start: request.start ?? 0,
      count,
      sort: request.sort ?? 1,
      filter: request.filter ?? 'all',
      tags: request.tags || undefined,
      list: request.listName || undefined
    });
    if (!result.ok) {
      return result;
    }

    const payload = result.value;
    if (!Array.isArray(payload)) {
      return ok({ bookmarks: [], rawCount: 0 });
    }
    return ok({
      bookmarks: payload.filter(isBookmarkRecord).map(toBookmark),
      rawCount: payload.length
    });
  }

  private async save(input: SaveBookmarkInput, merge: boolean): Promise<OperationResult<SaveResponse>> {
    const result = await this.client.request('POST', BOOKMARKS_ENDPOINT, {}, {
      url: input.url,
      title: input.title,
      desc: input.description ?? '',
      tags: input.tags ?? '',
      shared: normalizeBoolean(input.shared ?? false),
      readLater: normalizeBoolean(input.readLater ?? false),
      merge: normalizeBoolean(merge)
    });
    if (!result.ok) {
      return result;
    }
    return ok(toSaveResponse(result.value));
  }
}
