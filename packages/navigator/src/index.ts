#!/usr/bin/env tsx
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import { loadConfig } from './config';
import { FeedLoader } from './feed-loader';
import { logger } from './logger';
import { NavigationNode } from './navigation';
import { handleToolCall, TOOLS } from './tools';

/**
 * GTFS Navigator MCP Server
 *
 * Gives LLM agents a `navigate` tool over one GTFS feed: drill from the
 * whole feed into a route, stop or trip and list or count what is
 * reachable from it.
 *
 * Feed source and cache are configured through GTFS_FEED_URL,
 * GTFS_FEED_PATH, GTFS_CACHE_DIR and GTFS_CACHE_MAX_AGE_HOURS.
 */
class NavigatorServer {
  private server: Server;
  private feedLoader: FeedLoader;
  private root: NavigationNode | null = null;

  constructor(feedLoader: FeedLoader) {
    this.server = new Server(
      {
        name: 'gtfs-navigator',
        version: '0.1.0',
      },
      {
        capabilities: {
          tools: {},
        },
      }
    );

    this.feedLoader = feedLoader;
    this.setupHandlers();
  }

  private async rootNode(): Promise<NavigationNode> {
    if (!this.root) {
      if (!this.feedLoader.isLoaded()) {
        logger.info('GTFS feed not loaded, loading now...');
        await this.feedLoader.load();
      }
      this.root = NavigationNode.root(this.feedLoader.getSchedule());
    }
    return this.root;
  }

  private setupHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => {
      return { tools: TOOLS };
    });

    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      const { name, arguments: args } = request.params;
      const root = await this.rootNode();
      return handleToolCall(name, args, root);
    });
  }

  async run(): Promise<void> {
    try {
      logger.info('Preloading GTFS feed...');
      await this.rootNode();

      const transport = new StdioServerTransport();
      await this.server.connect(transport);
      logger.info('GTFS Navigator MCP Server running on stdio');
    } catch (error) {
      logger.error('Failed to start server:', error instanceof Error ? error.message : error);
      throw error;
    }
  }
}

// Start the server
async function main(): Promise<void> {
  const config = loadConfig(process.env, process.argv.slice(2));
  await new NavigatorServer(new FeedLoader(config)).run();
}

main().catch((error) => {
  logger.error('Fatal error:', error instanceof Error ? error.message : error);
  process.exit(1);
});
