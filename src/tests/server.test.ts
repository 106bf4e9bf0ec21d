import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

import { createServer, wrapTool } from '../server.js';
import { createContextSession, type ContextSession } from '../session.js';
import { wordCounter } from './fixtures.js';

function firstText(result: unknown): string {
  if (typeof result !== 'object' || result === null) return '';
  const content = 'content' in result ? result.content : 'contents' in result ? result.contents : undefined;
  if (!Array.isArray(content) || content.length === 0) return '';
  const item: unknown = content[0];
  if (typeof item === 'object' && item !== null && 'text' in item && typeof item.text === 'string') {
    return item.text;
  }
  return '';
}

describe('wrapTool', () => {
  it('returns the result as JSON text', async () => {
    const handler = wrapTool('echo', (args: { value: number }) => ({ doubled: args.value * 2 }));
    const response = await handler({ value: 21 });

    assert.strictEqual(response.isError, undefined);
    assert.deepStrictEqual(JSON.parse(firstText(response)), { doubled: 42 });
  });

  it('turns a thrown error into an isError response', async () => {
    const handler = wrapTool('fail', () => {
      throw new Error('File not found: a.ts');
    });
    const response = await handler({});

    assert.strictEqual(response.isError, true);
    assert.strictEqual(firstText(response), '{"error":"File not found: a.ts"}');
  });
});

describe('MCP Server', () => {
  let session: ContextSession;
  let server: McpServer;
  let client: Client;

  beforeEach(async () => {
    session = createContextSession({ systemPrompt: 'sys', maxTokens: 100 }, { counter: wordCounter });
    server = createServer(session);
    client = new Client({ name: 'context-budget-test', version: '1.0.0' });

    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await Promise.all([client.connect(clientTransport), server.connect(serverTransport)]);
  });

  afterEach(async () => {
    await client.close();
    await server.close();
  });

  it('registers every context tool', async () => {
    const { tools } = await client.listTools();

    assert.deepStrictEqual(tools.map(t => t.name).sort(), [
      'context_add_file',
      'context_append_message',
      'context_build_payload',
      'context_list_files',
      'context_remove_file',
      'context_stats',
      'context_usage',
    ]);
  });

  it('records turns and builds the payload over the protocol', async () => {
    await client.callTool({ name: 'context_append_message', arguments: { role: 'user', content: 'hello there' } });
    await client.callTool({ name: 'context_add_file', arguments: { path: 'notes.md', content: 'x' } });

    const result = await client.callTool({ name: 'context_build_payload', arguments: { extraUser: 'next' } });
    const report = JSON.parse(firstText(result));

    assert.deepStrictEqual(report.includedFiles, ['notes.md']);
    assert.strictEqual(report.totalTokens, 10);
    assert.strictEqual(session.log.messages.length, 1);
  });

  it('reports tool failures as isError results', async () => {
    const result = await client.callTool({ name: 'context_add_file', arguments: { path: '../outside.md' } });

    assert.strictEqual(result.isError, true);
    assert.match(firstText(result), /outside the working directory/);
  });

  it('serves usage and pinned files as resources', async () => {
    await client.callTool({ name: 'context_add_file', arguments: { path: 'a.ts', content: 'x' } });

    const usage = await client.readResource({ uri: 'context://usage' });
    assert.deepStrictEqual(JSON.parse(firstText(usage)), { totalTokens: 6, ratio: 0.06, tier: 'ok' });

    const files = await client.readResource({ uri: 'context://files' });
    assert.deepStrictEqual(JSON.parse(firstText(files)), [{ path: 'a.ts', tokenCount: 6 }]);
  });
});
