import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { ToolArgumentError } from './errors';
import { interpret } from './interpreter';
import { logger as rootLogger } from './logger';
import type { NavigationNode } from './navigation';
import { BufferReportSink } from './report';
import type { ToolResponse } from './types';

const logger = rootLogger.child('tools');

export const NAVIGATE_TOOL: Tool = {
  name: 'navigate',
  description:
    'Navigate the loaded GTFS schedule with a dot-separated command path. ' +
    "Every command starts at the whole feed. 'info' prints counts; 'stops', 'routes' and 'trips' " +
    "take 'list', 'info' or an id followed by another command. " +
    "Examples: 'routes.list', 'stops.place-dwnxg.routes.list', 'routes.Red.trips.info'",
  inputSchema: {
    type: 'object',
    properties: {
      command: {
        type: 'string',
        description: "Command path, e.g. 'routes.Red.info'",
      },
    },
    required: ['command'],
  },
};

export const TOOLS: Tool[] = [NAVIGATE_TOOL];

/**
 * Run one navigation command from the root node and return its report
 */
export function navigate(args: Record<string, unknown> | undefined, root: NavigationNode): ToolResponse {
  const command = args?.command;
  if (typeof command !== 'string' || command.trim() === '') {
    throw new ToolArgumentError("Argument 'command' must be a non-empty string");
  }

  logger.info(`Navigating: ${command}`);

  const sink = new BufferReportSink();
  interpret(root, command, sink);

  return {
    content: [{ type: 'text', text: sink.lines.length > 0 ? sink.text() : '(no output)' }],
  };
}

/**
 * Dispatch a tool call, turning any failure into an error response
 */
export function handleToolCall(
  name: string,
  args: Record<string, unknown> | undefined,
  root: NavigationNode
): ToolResponse {
  try {
    logger.info(`Tool called: ${name}`, { args });

    switch (name) {
      case NAVIGATE_TOOL.name:
        return navigate(args, root);

      default:
        throw new Error(`Unknown tool: ${name}`);
    }
  } catch (error) {
    logger.error(`Error handling tool ${name}:`, error instanceof Error ? error.message : error);
    return {
      content: [
        {
          type: 'text',
          text: `Error: ${error instanceof Error ? error.message : String(error)}`,
        },
      ],
      isError: true,
    };
  }
}
