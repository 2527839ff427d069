/**
 * MCP surface tests
 * Tool listing, argument validation, error bodies and a full client/server
 * round trip over an in-memory transport.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { CallToolResultSchema, McpError, type CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { McpToolsServer } from '../server/McpServer.js';
import { createTestDatabase, makeToolInput } from './fixtures.js';

const TOOL_NAMES = [
  'index_file',
  'index_batch',
  'search_knowledge',
  'get_file_context',
  'find_related',
  'search_by_type',
  'get_stats',
  'analyze_dependencies',
];

function textOf(result: CallToolResult): string {
  const first = result.content[0];
  return first?.type === 'text' ? first.text : '';
}

function bodyOf(result: CallToolResult): unknown {
  return JSON.parse(textOf(result));
}

describe('KnowledgeBaseMcpTools', () => {
  let server: McpToolsServer;

  beforeEach(async () => {
    server = new McpToolsServer(
      { name: 'test-kb', version: '0.0.0', databasePath: ':memory:' },
      await createTestDatabase()
    );
  });

  afterEach(async () => {
    await server.stop();
  });

  describe('tool listing', () => {
    it('exposes the knowledge base tools in a stable order', () => {
      expect(server.getAvailableTools().map((tool) => tool.name)).toEqual(TOOL_NAMES);
    });

    it('marks only the mandatory index_file fields as required', () => {
      const indexFile = server.getAvailableTools().find((tool) => tool.name === 'index_file');
      expect(indexFile?.inputSchema.required).toEqual(['path', 'repo', 'file_type', 'technology', 'summary', 'content_hash']);
    });

    it('annotates query tools as read-only', () => {
      const readOnly = server
        .getAvailableTools()
        .filter((tool) => tool.annotations?.readOnlyHint === true)
        .map((tool) => tool.name);
      expect(readOnly).toEqual(TOOL_NAMES.slice(2));
    });
  });

  describe('callTool', () => {
    it('indexes and reads back a file in snake_case', async () => {
      const indexed = await server.callTool('index_file', makeToolInput({ tags: ['storage'] }));
      expect(indexed.isError).toBe(false);
      expect(bodyOf(indexed)).toMatchObject({
        outcome: 'created',
        record: { path: 'infra/main.bicep', file_type: 'bicep', content_hash: 'hash-1', tags: ['storage'] },
      });

      const context = await server.callTool('get_file_context', { path: 'infra/main.bicep' });
      expect(bodyOf(context)).toMatchObject({ record: { path: 'infra/main.bicep' }, dependents: [] });
    });

    it('searches with defaults applied', async () => {
      await server.callTool('index_file', makeToolInput({ tags: ['storage'] }));

      const result = await server.callTool('search_knowledge', { query: 'storage' });
      expect(bodyOf(result)).toMatchObject({
        count: 1,
        results: [{ score: 3, matched_terms: ['storage'], matches: [{ term: 'storage', fields: ['tag'] }] }],
      });
    });

    it('reports a batch with per-item outcomes', async () => {
      const result = await server.callTool('index_batch', {
        files: [makeToolInput({ path: 'a.bicep' }), { path: 'b.bicep' }],
      });

      expect(result.isError).toBe(false);
      expect(bodyOf(result)).toMatchObject({
        results: [
          { index: 0, path: 'a.bicep', outcome: 'created' },
          { index: 1, path: 'b.bicep', error: { kind: 'ValidationError' } },
        ],
        summary: { created: 1, unchanged: 0, replaced: 0, failed: 1 },
      });
    });

    it('returns a NotFound error body for an unknown path', async () => {
      const result = await server.callTool('get_file_context', { path: 'nope' });
      expect(result.isError).toBe(true);
      expect(bodyOf(result)).toEqual({
        error: { kind: 'NotFound', message: 'No knowledge indexed for path: nope' },
      });
    });

    it('returns an InvalidQuery error body for a blank query', async () => {
      const result = await server.callTool('search_knowledge', { query: '  ' });
      expect(result.isError).toBe(true);
      expect(bodyOf(result)).toMatchObject({ error: { kind: 'InvalidQuery' } });
    });

    it('returns validation issues for missing arguments', async () => {
      const result = await server.callTool('get_file_context', {});
      expect(bodyOf(result)).toEqual({
        error: {
          kind: 'ValidationError',
          message: 'Invalid arguments for get_file_context: path: Required',
          issues: [{ path: 'path', message: 'Required' }],
        },
      });
    });

    it('rejects search_by_type without a category', async () => {
      const result = await server.callTool('search_by_type', { repo: 'platform' });
      expect(bodyOf(result)).toMatchObject({ error: { kind: 'ValidationError' } });
    });

    it('reports stats and dependency analysis in snake_case', async () => {
      await server.callTool('index_file', makeToolInput({ path: 'a.bicep', dependencies: ['b.bicep'] }));

      expect(bodyOf(await server.callTool('get_stats', {}))).toMatchObject({
        total_count: 1,
        by_repo: { platform: 1 },
        total_dependencies: 1,
      });
      expect(bodyOf(await server.callTool('analyze_dependencies', { path: 'a.bicep', max_depth: 3 }))).toEqual({
        root: 'a.bicep',
        indexed: true,
        direct_dependencies: ['b.bicep'],
        direct_dependents: [],
        dependency_depth_map: { 'a.bicep': 0, 'b.bicep': 1 },
        depth: 1,
      });
    });

    it('rejects an unknown tool with a protocol error', async () => {
      await expect(server.callTool('no_such_tool', {})).rejects.toThrow(McpError);
    });
  });

  describe('protocol round trip', () => {
    let client: Client;

    beforeEach(async () => {
      const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
      await server.createProtocolServer().connect(serverTransport);
      client = new Client({ name: 'test-client', version: '0.0.0' });
      await client.connect(clientTransport);
    });

    afterEach(async () => {
      await client.close();
    });

    it('lists tools with their input schemas', async () => {
      const { tools } = await client.listTools();
      expect(tools.map((tool) => tool.name)).toEqual(TOOL_NAMES);
      expect(tools.every((tool) => tool.inputSchema.type === 'object')).toBe(true);
    });

    it('calls a tool and returns its JSON result', async () => {
      const raw = await client.callTool({ name: 'index_file', arguments: makeToolInput() });
      const result = CallToolResultSchema.parse(raw);

      expect(result.isError).toBe(false);
      expect(bodyOf(result)).toMatchObject({ outcome: 'created', record: { path: 'infra/main.bicep' } });
    });

    it('surfaces domain errors as tool errors, not protocol errors', async () => {
      const result = CallToolResultSchema.parse(
        await client.callTool({ name: 'get_file_context', arguments: { path: 'nope' } })
      );
      expect(result.isError).toBe(true);
      expect(bodyOf(result)).toMatchObject({ error: { kind: 'NotFound' } });
    });
  });
});
