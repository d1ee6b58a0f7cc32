import { Tool } from '@modelcontextprotocol/sdk/types.js';

const userProperty = {
  type: 'string',
  description: 'Diigo username (defaults to the configured user)'
};

const bookmarkFields = {
  url: { type: 'string', description: 'Bookmark URL, e.g. "https://example.com/article"' },
  title: { type: 'string', description: 'Bookmark title' },
  desc: { type: 'string', description: 'Description' },
  tags: { type: 'string', description: 'Comma-separated tags, e.g. "typescript,tools"' },
  shared: {
    type: ['boolean', 'string'],
    description: 'Public (true) or private (false). Also accepts "yes"/"no"'
  },
  read_later: {
    type: ['boolean', 'string'],
    description: 'Mark as unread / read later. Also accepts "yes"/"no"'
  }
};

// Tool definitions
export const TOOLS: Tool[] = [
  {
    name: 'list_bookmarks',
    description: 'List bookmarks with optional filters (tags, list, visibility, sort order). Omit count to page through ALL bookmarks automatically.',
    inputSchema: {
      type: 'object',
      properties: {
        user: userProperty,
        count: {
          type: 'integer',
          description: 'Number to fetch, capped at the server page size (omit to fetch everything)'
        },
        start: {
          type: 'integer',
          default: 0,
          description: 'Start offset (only used together with count)'
        },
        sort: {
          type: ['integer', 'string'],
          default: 1,
          description: '0=created, 1=updated, 2=popularity, 3=hot. Also accepts "created", "updated", "popularity", "hot"'
        },
        tags: {
          type: 'string',
          description: 'Comma-separated tags to filter by'
        },
        filter: {
          type: 'string',
          enum: ['all', 'public', 'private'],
          default: 'all',
          description: 'Visibility filter. "private" is treated as "all" (Diigo has no private-only filter)'
        },
        list_name: {
          type: 'string',
          description: 'Only bookmarks in this Diigo list'
        }
      }
    }
  },
  {
    name: 'search_bookmarks',
    description: `Search bookmarks by a text query.

**NOTE - this is client-side filtering, not real search:**
- Diigo's API has no full-text search
- All bookmarks matching tags/filter are fetched, then kept if title or description contains the query (case-insensitive)
- Results are NOT ranked by relevance`,
    inputSchema: {
      type: 'object',
      properties: {
        query: {
          type: 'string',
          description: 'Text to look for in title/description'
        },
        tags: {
          type: 'string',
          description: 'Comma-separated tags to narrow the fetch'
        },
        filter: {
          type: 'string',
          enum: ['all', 'public', 'private'],
          default: 'all'
        },
        user: userProperty
      },
      required: ['query']
    }
  },
  {
    name: 'get_bookmark',
    description: 'Get a single bookmark by its exact URL, with full details including annotations.',
    inputSchema: {
      type: 'object',
      properties: {
        url: { type: 'string', description: 'Bookmark URL (exact match, no normalization)' },
        user: userProperty
      },
      required: ['url']
    }
  },
  {
    name: 'create_bookmark',
    description: 'Create a new bookmark. Saving an existing URL overwrites it (no merge).',
    inputSchema: {
      type: 'object',
      properties: {
        ...bookmarkFields,
        desc: { ...bookmarkFields.desc, default: '' },
        tags: { ...bookmarkFields.tags, default: '' },
        shared: { ...bookmarkFields.shared, default: false },
        read_later: { ...bookmarkFields.read_later, default: false }
      },
      required: ['url', 'title']
    }
  },
  {
    name: 'update_bookmark',
    description: `Update an existing bookmark identified by URL.

Only specify the fields you want to change - all other fields keep their current values.
With no fields besides url the bookmark is saved again unchanged.`,
    inputSchema: {
      type: 'object',
      properties: {
        url: { type: 'string', description: 'Bookmark URL (identifier)' },
        title: { type: 'string', description: 'New title' },
        desc: { type: 'string', description: 'New description' },
        tags: { type: 'string', description: 'New tags (comma-separated, replaces the current tags)' },
        shared: { ...bookmarkFields.shared, description: 'New sharing status' },
        read_later: { ...bookmarkFields.read_later, description: 'New read-later status' }
      },
      required: ['url']
    }
  },
  {
    name: 'delete_bookmark',
    description: `Delete a bookmark by URL.

**Before deleting, ask yourself:** can you use update_bookmark instead?
The title is looked up automatically when not provided.`,
    inputSchema: {
      type: 'object',
      properties: {
        url: { type: 'string', description: 'Bookmark URL' },
        title: {
          type: 'string',
          description: 'Bookmark title (looked up by URL if not provided)'
        }
      },
      required: ['url']
    }
  },
  {
    name: 'get_recent_bookmarks',
    description: 'Get the most recently updated bookmarks.',
    inputSchema: {
      type: 'object',
      properties: {
        count: {
          type: 'integer',
          default: 50,
          description: 'Number to fetch (capped at the server page size)'
        },
        user: userProperty
      }
    }
  },
  {
    name: 'get_annotations',
    description: 'Get the annotations (highlights and comments) of a bookmark.',
    inputSchema: {
      type: 'object',
      properties: {
        url: { type: 'string', description: 'Bookmark URL' },
        user: userProperty
      },
      required: ['url']
    }
  },
  {
    name: 'bulk_create_bookmarks',
    description: `Create multiple bookmarks in one call.

Bookmarks are created ONE AT A TIME with a delay between calls to respect Diigo's rate limits.
A failing item does not stop the batch; the result lists every failure with its index.`,
    inputSchema: {
      type: 'object',
      properties: {
        bookmarks: {
          type: 'array',
          description: 'Bookmarks to create',
          items: {
            type: 'object',
            properties: bookmarkFields,
            required: ['url', 'title']
          }
        },
        delay: {
          type: 'number',
          default: 0.5,
          description: 'Seconds to wait between requests'
        }
      },
      required: ['bookmarks']
    }
  }
];
