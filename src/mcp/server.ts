import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  Tool
} from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { describeCause } from '../client/errors.js';
import { logger } from '../utils/logger.js';
import { MCPHandlers, ToolResult } from './handlers.js';
import {
  bulkCreateBookmarksSchema,
  createBookmarkSchema,
  deleteBookmarkSchema,
  getAnnotationsSchema,
  getBookmarkSchema,
  getRecentBookmarksSchema,
  listBookmarksSchema,
  parseArgs,
  searchBookmarksSchema,
  updateBookmarkSchema
} from './schemas.js';
import { TOOLS } from './tools.js';

export const SERVER_NAME = 'diigo-mcp-server';
export const SERVER_VERSION = '0.1.0';

export type ToolCallResponse = {
  content: Array<{ type: 'text'; text: string }>;
  isError: boolean;
};

async function run<S extends z.ZodTypeAny>(
  schema: S,
  raw: unknown,
  handler: (args: z.output<S>) => Promise<ToolResult>
): Promise<ToolResult> {
  const parsed = parseArgs(schema, raw);
  if (!parsed.success) {
    return { success: false, error: `Invalid arguments: ${parsed.error}`, errorKind: 'ValidationError' };
  }
  return handler(parsed.data);
}

export class MCPServer {
  private server: Server;

  constructor(
    private handlers: MCPHandlers,
    private tools: Tool[] = TOOLS
  ) {
    this.server = new Server(
      {
        name: SERVER_NAME,
        version: SERVER_VERSION
      },
      {
        capabilities: {
          tools: {}
        }
      }
    );

    this.setupHandlers();
  }

  private setupHandlers(): void {
    // List available tools
    this.server.setRequestHandler(ListToolsRequestSchema, async () => {
      return { tools: this.tools };
    });

    // Handle tool calls
    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      const { name, arguments: args } = request.params;
      return this.callTool(name, args);
    });
  }

  /**
   * Dispatch one tool call and serialize its result as text content
   */
  async callTool(name: string, args: unknown): Promise<ToolCallResponse> {
    const keys = args && typeof args === 'object' ? Object.keys(args).join(', ') : '';
    logger.info(`Calling tool: ${name} (${keys})`);

    let result: ToolResult;
    try {
      result = await this.dispatch(name, args);
    } catch (error) {
      logger.error(`Tool ${name} failed:`, error);
      result = { success: false, error: `Internal error: ${describeCause(error)}` };
    }

    return {
      content: [
        {
          type: 'text',
          text: JSON.stringify(result, null, 2)
        }
      ],
      isError: !result.success
    };
  }

  private dispatch(name: string, args: unknown): Promise<ToolResult> {
    const h = this.handlers;
    switch (name) {
      case 'list_bookmarks':
        return run(listBookmarksSchema, args, a => h.listBookmarks(a));
      case 'search_bookmarks':
        return run(searchBookmarksSchema, args, a => h.searchBookmarks(a));
      case 'get_bookmark':
        return run(getBookmarkSchema, args, a => h.getBookmark(a));
      case 'create_bookmark':
        return run(createBookmarkSchema, args, a => h.createBookmark(a));
      case 'update_bookmark':
        return run(updateBookmarkSchema, args, a => h.updateBookmark(a));
      case 'delete_bookmark':
        return run(deleteBookmarkSchema, args, a => h.deleteBookmark(a));
      case 'get_recent_bookmarks':
        return run(getRecentBookmarksSchema, args, a => h.getRecentBookmarks(a));
      case 'get_annotations':
        return run(getAnnotationsSchema, args, a => h.getAnnotations(a));
      case 'bulk_create_bookmarks':
        return run(bulkCreateBookmarksSchema, args, a => h.bulkCreateBookmarks(a));
      default:
        return Promise.resolve({ success: false, error: `Unknown tool: ${name}` });
    }
  }

  async start(): Promise<void> {
    const transport = new StdioServerTransport();
    await this.server.connect(transport);
    logger.info(`${SERVER_NAME} ${SERVER_VERSION} started`);
  }

  async stop(): Promise<void> {
    await this.server.close();
  }
}
