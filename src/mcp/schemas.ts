import { z } from 'zod';

// Argument parsers for each tool. Loose forms (sort aliases, "yes"/"no" flags)
// pass through here untouched and are normalized by the handlers.

const looseBoolean = z.union([z.boolean(), z.string()]);

export const listBookmarksSchema = z.object({
  user: z.string().optional(),
  count: z.number().int().positive().optional(),
  start: z.number().int().nonnegative().default(0),
  sort: z.union([z.number(), z.string()]).default(1),
  tags: z.string().optional(),
  filter: z.string().default('all'),
  list_name: z.string().optional()
});

export const searchBookmarksSchema = z.object({
  query: z.string({ required_error: 'query is required' }),
  tags: z.string().optional(),
  filter: z.string().default('all'),
  user: z.string().optional()
});

export const getBookmarkSchema = z.object({
  url: z.string({ required_error: 'url is required' }),
  user: z.string().optional()
});

export const createBookmarkSchema = z.object({
  url: z.string({ required_error: 'url is required' }),
  title: z.string({ required_error: 'title is required' }),
  desc: z.string().default(''),
  tags: z.string().default(''),
  shared: looseBoolean.default(false),
  read_later: looseBoolean.default(false)
});

export const updateBookmarkSchema = z.object({
  url: z.string({ required_error: 'url is required' }),
  title: z.string().optional(),
  desc: z.string().optional(),
  tags: z.string().optional(),
  shared: looseBoolean.optional(),
  read_later: looseBoolean.optional()
});

export const deleteBookmarkSchema = z.object({
  url: z.string({ required_error: 'url is required' }),
  title: z.string().optional()
});

export const getRecentBookmarksSchema = z.object({
  count: z.number().int().positive().default(50),
  user: z.string().optional()
});

export const getAnnotationsSchema = z.object({
  url: z.string({ required_error: 'url is required' }),
  user: z.string().optional()
});

// url / title stay optional per item so one malformed entry fails alone instead of the whole batch
export const bulkBookmarkItemSchema = z.object({
  url: z.string().optional(),
  title: z.string().optional(),
  desc: z.string().optional(),
  tags: z.string().optional(),
  shared: looseBoolean.optional(),
  read_later: looseBoolean.optional()
});

export const bulkCreateBookmarksSchema = z.object({
  bookmarks: z.array(bulkBookmarkItemSchema, { required_error: 'bookmarks is required' }),
  delay: z.number().nonnegative().default(0.5)
});

export type ListBookmarksArgs = z.output<typeof listBookmarksSchema>;
export type SearchBookmarksArgs = z.output<typeof searchBookmarksSchema>;
export type GetBookmarkArgs = z.output<typeof getBookmarkSchema>;
export type CreateBookmarkArgs = z.output<typeof createBookmarkSchema>;
export type UpdateBookmarkArgs = z.output<typeof updateBookmarkSchema>;
export type DeleteBookmarkArgs = z.output<typeof deleteBookmarkSchema>;
export type GetRecentBookmarksArgs = z.output<typeof getRecentBookmarksSchema>;
export type GetAnnotationsArgs = z.output<typeof getAnnotationsSchema>;
export type BulkBookmarkItem = z.output<typeof bulkBookmarkItemSchema>;
export type BulkCreateBookmarksArgs = z.output<typeof bulkCreateBookmarksSchema>;

export type ArgsParseResult<T> =
  | { success: true; data: T }
  | { success: false; error: string };

/**
 * Validate raw tool arguments; the error lists each offending field.
 */
export function parseArgs<S extends z.ZodTypeAny>(schema: S, raw: unknown): ArgsParseResult<z.output<S>> {
  const parsed = schema.safeParse(raw ?? {});
  if (parsed.success) {
    return { success: true, data: parsed.data };
  }
  const error = parsed.error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
  return { success: false, error };
}
