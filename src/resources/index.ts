import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { getSessionUsage, listFiles, type ContextSession } from '../session.js';

export function registerAllResources(server: McpServer, session: ContextSession): void {
  server.resource(
    'usage',
    'context://usage',
    async () => ({
      contents: [
        {
          uri: 'context://usage',
          mimeType: 'application/json',
          text: JSON.stringify(getSessionUsage(session), null, 2),
        },
      ],
    })
  );

  server.resource(
    'pinned-files',
    'context://files',
    async () => ({
      contents: [
        {
          uri: 'context://files',
          mimeType: 'application/json',
          text: JSON.stringify(listFiles(session), null, 2),
        },
      ],
    })
  );
}
