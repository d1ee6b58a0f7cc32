import type { DiigoErrorKind } from '../client/errors.js';

// Annotation (highlight / comment) attached to a bookmark, passed through as-is
export interface Annotation {
  content?: string;
  comments?: unknown[];
  created_at?: string;
  user?: string;
  [key: string]: unknown;
}

// Bookmark record exactly as the Diigo API returns it
export interface DiigoBookmarkRecord {
  url: string;
  title?: string;
  desc?: string;
  tags?: string;                 // comma-joined, e.g. "js,ts,tools"
  shared?: string;               // "yes" | "no"
  readlater?: string;            // "yes" | "no"
  created_at?: string;           // "2008/04/30 06:28:54 +0800"
  updated_at?: string;
  user?: string;
  annotations?: Annotation[];
  [key: string]: unknown;
}

// Bookmark. Identity is the URL; the API has no id field
export interface Bookmark {
  url: string;
  title: string;
  description: string;
  tags: string;
  shared: boolean;
  readLater: boolean;
  createdAt?: string;
  updatedAt?: string;
  annotations: Annotation[];
}

// Bookmark as returned to tool callers
export interface FormattedBookmark extends Bookmark {
  generatedId?: string;          // 派生的短 ID, 不稳定, 仅供展示
  tagList: string[];
}

// Diigo sort orders: 0=created, 1=updated, 2=popularity, 3=hot
export type SortKey = 0 | 1 | 2 | 3;

export type VisibilityFilter = 'all' | 'public';

// "yes" / "no" as sent on the wire
export type WireBoolean = 'yes' | 'no';

export interface BookmarkFilters {
  sort?: SortKey;
  tags?: string;
  filter?: VisibilityFilter;
  listName?: string;
}

export interface PageRequest extends BookmarkFilters {
  user?: string;
  start?: number;
  count?: number;
}

// Full record sent to the save endpoint
export interface SaveBookmarkInput {
  url: string;
  title: string;
  description?: string;
  tags?: string;
  shared?: boolean;
  readLater?: boolean;
}

export type BookmarkUpdate = Partial<Omit<SaveBookmarkInput, 'url'>>;

// Upstream acknowledgement of a save / delete
// e.g. { message: "added 1 bookmark" }
export type SaveResponse = Record<string, unknown>;

export interface BulkFailure {
  index: number;                 // position in the input batch
  url: string | undefined;
  error: string;
  kind: DiigoErrorKind;
}

export interface BulkSummary {
  total: number;
  success: number;
  failed: number;
  failures: BulkFailure[];
}
