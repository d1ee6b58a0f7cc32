import { DiigoClientOptions, FetchFn, SleepFn, withDiigoClient } from '../client/diigoClient.js';
import { DiigoErrorKind, OperationResult, describeCause } from '../client/errors.js';
import { ConfigManager, DiigoConfig } from '../config/settings.js';
import { BookmarkOrchestrator } from '../store/bookmarkOrchestrator.js';
import { BookmarkUpdate, SaveBookmarkInput } from '../store/types.js';
import {
  formatBookmark,
  normalizeBoolean,
  normalizeSortKey,
  normalizeVisibilityFilter
} from '../utils/index.js';
import {
  BulkBookmarkItem,
  BulkCreateBookmarksArgs,
  CreateBookmarkArgs,
  DeleteBookmarkArgs,
  GetAnnotationsArgs,
  GetBookmarkArgs,
  GetRecentBookmarksArgs,
  ListBookmarksArgs,
  SearchBookmarksArgs,
  UpdateBookmarkArgs
} from './schemas.js';

export interface ToolResult {
  success: boolean;
  data?: unknown;
  error?: string;
  errorKind?: DiigoErrorKind;
}

// Test seams: replace the network and the clock
export interface HandlerOverrides {
  fetch?: FetchFn;
  sleep?: SleepFn;
}

const SEARCH_NOTE =
  'Diigo has no full-text search: results are a case-insensitive substring match on title and description, in API order, not ranked.';

function toToolResult<T>(result: OperationResult<T>, shape: (value: T) => unknown): ToolResult {
  if (!result.ok) {
    return { success: false, error: result.error.message, errorKind: result.error.kind };
  }
  return { success: true, data: shape(result.value) };
}

function invalid(message: string): ToolResult {
  return { success: false, error: message, errorKind: 'ValidationError' };
}

function toFlag(value: boolean | string | undefined): boolean | undefined {
  return value === undefined ? undefined : normalizeBoolean(value) === 'yes';
}

function toSaveInput(item: BulkBookmarkItem | CreateBookmarkArgs): SaveBookmarkInput {
  return {
    url: item.url ?? '',
    title: item.title ?? '',
    description: item.desc ?? '',
    tags: item.tags ?? '',
    shared: toFlag(item.shared) ?? false,
    readLater: toFlag(item.read_later) ?? false
  };
}

/**
 * Tool implementations. Each call opens its own client, runs one orchestrator
 * operation, closes the client and shapes the outcome as a ToolResult.
 */
export class MCPHandlers {
  constructor(
    private config: DiigoConfig,
    private overrides: HandlerOverrides = {}
  ) {}

  private clientOptions(): DiigoClientOptions {
    return {
      baseUrl: this.config.baseUrl,
      username: this.config.username,
      password: this.config.password,
      apiKey: this.config.apiKey,
      timeoutSeconds: this.config.requestTimeoutSeconds,
      maxRetries: this.config.maxRetries,
      backoffBase: this.config.retryBackoff,
      fetch: this.overrides.fetch,
      sleep: this.overrides.sleep
    };
  }

  private withStore<T>(fn: (store: BookmarkOrchestrator) => Promise<T>): Promise<T> {
    return withDiigoClient(this.clientOptions(), client =>
      fn(
        new BookmarkOrchestrator(client, {
          defaultUser: ConfigManager.getDefaultUser(this.config),
          pageSize: this.config.maxBookmarksPerRequest,
          sleep: this.overrides.sleep
        })
      )
    );
  }

  // list_bookmarks - 省略 count 时自动翻页取全部
  async listBookmarks(args: ListBookmarksArgs): Promise<ToolResult> {
    try {
      const result = await this.withStore(store =>
        store.listBookmarks({
          user: args.user,
          count: args.count,
          start: args.start,
          sort: normalizeSortKey(args.sort),
          tags: args.tags,
          filter: normalizeVisibilityFilter(args.filter),
          listName: args.list_name
        })
      );

      return toToolResult(result, bookmarks => ({
        bookmarks: bookmarks.map(formatBookmark),
        total: bookmarks.length
      }));
    } catch (error) {
      return { success: false, error: `Failed to list bookmarks: ${describeCause(error)}` };
    }
  }

  // search_bookmarks
  async searchBookmarks(args: SearchBookmarksArgs): Promise<ToolResult> {
    try {
      const result = await this.withStore(store =>
        store.search(args.query, {
          user: args.user,
          tags: args.tags,
          filter: normalizeVisibilityFilter(args.filter)
        })
      );

      return toToolResult(result, bookmarks => ({
        query: args.query,
        bookmarks: bookmarks.map(formatBookmark),
        total: bookmarks.length,
        note: SEARCH_NOTE
      }));
    } catch (error) {
      return { success: false, error: `Failed to search bookmarks: ${describeCause(error)}` };
    }
  }

  // get_bookmark
  async getBookmark(args: GetBookmarkArgs): Promise<ToolResult> {
    try {
      if (!args.url) {
        return invalid('url is required and must be a string');
      }

      const result = await this.withStore(store => store.findByUrl(args.url, args.user));
      return toToolResult(result, bookmark => ({ bookmark: formatBookmark(bookmark) }));
    } catch (error) {
      return { success: false, error: `Failed to get bookmark: ${describeCause(error)}` };
    }
  }

  // create_bookmark
  async createBookmark(args: CreateBookmarkArgs): Promise<ToolResult> {
    try {
      const input = toSaveInput(args);
      const result = await this.withStore(store => store.create(input));

      return toToolResult(result, response => ({
        url: input.url,
        message: `Successfully saved bookmark "${input.title}"`,
        response
      }));
    } catch (error) {
      return { success: false, error: `Failed to create bookmark: ${describeCause(error)}` };
    }
  }

  // update_bookmark - 未提供的字段保留原值
  async updateBookmark(args: UpdateBookmarkArgs): Promise<ToolResult> {
    try {
      const { url, title, desc, tags, shared, read_later } = args;

      const fields: BookmarkUpdate = {
        title,
        description: desc,
        tags,
        shared: toFlag(shared),
        readLater: toFlag(read_later)
      };
      const result = await this.withStore(store => store.update(url, fields));

      return toToolResult(result, response => ({
        url,
        message: `Successfully updated bookmark "${url}"`,
        response
      }));
    } catch (error) {
      return { success: false, error: `Failed to update bookmark: ${describeCause(error)}` };
    }
  }

  // delete_bookmark - 未提供 title 时先按 URL 查找
  async deleteBookmark(args: DeleteBookmarkArgs): Promise<ToolResult> {
    try {
      if (!args.url) {
        return invalid('url is required and must be a string');
      }

      const result = await this.withStore(store => store.delete(args.url, args.title));
      return toToolResult(result, response => ({
        url: args.url,
        message: `Successfully deleted bookmark "${args.url}"`,
        response
      }));
    } catch (error) {
      return { success: false, error: `Failed to delete bookmark: ${describeCause(error)}` };
    }
  }

  // get_recent_bookmarks
  async getRecentBookmarks(args: GetRecentBookmarksArgs): Promise<ToolResult> {
    try {
      const result = await this.withStore(store => store.getRecent(args.count, args.user));
      return toToolResult(result, bookmarks => ({
        bookmarks: bookmarks.map(formatBookmark),
        total: bookmarks.length
      }));
    } catch (error) {
      return { success: false, error: `Failed to get recent bookmarks: ${describeCause(error)}` };
    }
  }

  // get_annotations
  async getAnnotations(args: GetAnnotationsArgs): Promise<ToolResult> {
    try {
      if (!args.url) {
        return invalid('url is required and must be a string');
      }

      const result = await this.withStore(store => store.getAnnotations(args.url, args.user));
      return toToolResult(result, annotations => ({
        url: args.url,
        annotations,
        total: annotations.length
      }));
    } catch (error) {
      return { success: false, error: `Failed to get annotations: ${describeCause(error)}` };
    }
  }

  // bulk_create_bookmarks - 逐条串行创建, 单条失败不影响其他
  async bulkCreateBookmarks(args: BulkCreateBookmarksArgs): Promise<ToolResult> {
    try {
      if (args.bookmarks.length === 0) {
        return invalid('bookmarks must contain at least one item');
      }

      const items = args.bookmarks.map(toSaveInput);
      const result = await this.withStore(store => store.bulkCreate(items, args.delay));
      return toToolResult(result, summary => ({
        message: `Created ${summary.success}/${summary.total} bookmarks`,
        ...summary
      }));
    } catch (error) {
      return { success: false, error: `Failed to bulk create bookmarks: ${describeCause(error)}` };
    }
  }
}
