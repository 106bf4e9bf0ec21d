import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import {
  appendMessageTool,
  appendMessageSchema,
  addFileTool,
  addFileSchema,
  removeFileTool,
  removeFileSchema,
  listFilesTool,
  listFilesSchema,
  buildPayloadTool,
  buildPayloadSchema,
  usageTool,
  usageSchema,
  statsTool,
  statsSchema,
  type AppendMessageInput,
  type AddFileInput,
  type RemoveFileInput,
  type BuildPayloadToolInput,
} from './tools/index.js';
import { registerAllResources } from './resources/index.js';
import { loadConfig } from './config.js';
import { logger } from './logger.js';
import { createContextSession, type ContextSession } from './session.js';

// A type alias, not an interface, so it stays assignable to the SDK's open result type
export type ToolResponse = {
  content: { type: 'text'; text: string }[];
  isError?: boolean;
};

/**
 * Run a tool against the session, returning its result as JSON text.
 * Failures become isError responses instead of protocol errors.
 */
export function wrapTool<T extends Record<string, unknown>, R>(
  name: string,
  fn: (args: T) => R
): (args: T) => Promise<ToolResponse> {
  return async (args: T) => {
    logger.tool(name, args);

    try {
      const result = fn(args);
      logger.debug(`Tool ${name} completed`);
      return {
        content: [{ type: 'text' as const, text: JSON.stringify(result, null, 2) }],
      };
    } catch (error) {
      logger.error(`Tool ${name} failed`, error);
      return {
        content: [{ type: 'text' as const, text: JSON.stringify({ error: error instanceof Error ? error.message : String(error) }) }],
        isError: true,
      };
    }
  };
}

export function createServer(session: ContextSession = createContextSession(loadConfig())): McpServer {
  logger.info('Creating context-budget MCP server');

  const server = new McpServer({
    name: 'context-budget',
    version: '1.0.0',
  });

  server.tool(
    'context_append_message',
    'Record a conversation turn (user, assistant, tool or system) in the message log',
    appendMessageSchema.shape,
    wrapTool('context_append_message', (args: AppendMessageInput) => appendMessageTool(session, args))
  );

  server.tool(
    'context_add_file',
    'Pin a file, or every text file under a directory, into context. Re-pinning a path refreshes it; the oldest pins are evicted past capacity',
    addFileSchema.shape,
    wrapTool('context_add_file', (args: AddFileInput) => addFileTool(session, args))
  );

  server.tool(
    'context_remove_file',
    'Unpin a file from context',
    removeFileSchema.shape,
    wrapTool('context_remove_file', (args: RemoveFileInput) => removeFileTool(session, args))
  );

  server.tool(
    'context_list_files',
    'List pinned files, oldest first, with their token counts',
    listFilesSchema.shape,
    wrapTool('context_list_files', () => listFilesTool(session))
  );

  server.tool(
    'context_build_payload',
    'Build the ordered message list for the next model request within the token budget',
    buildPayloadSchema.shape,
    wrapTool('context_build_payload', (args: BuildPayloadToolInput) => buildPayloadTool(session, args))
  );

  server.tool(
    'context_usage',
    'Token usage ratio and health tier (ok, warn, critical) across log and pinned files',
    usageSchema.shape,
    wrapTool('context_usage', () => usageTool(session))
  );

  server.tool(
    'context_stats',
    'Session statistics: counts, token totals, budgets and remaining tokens',
    statsSchema.shape,
    wrapTool('context_stats', () => statsTool(session))
  );

  registerAllResources(server, session);
  logger.debug('Registered resources');

  logger.info('Context-budget MCP server ready', { tools: 7, resources: 2 });
  return server;
}
