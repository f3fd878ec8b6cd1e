/**
 * Tests for server_log, server_config and tool category gating
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { callTool, createTestServer, type TestServerContext } from '../helpers/createTestServer.js';

async function toolNames(context: TestServerContext): Promise<string[]> {
  const { tools } = await context.client.listTools();
  return tools.map(t => t.name).sort();
}

describe('system tools', () => {
  let context: TestServerContext;

  beforeEach(async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    context = await createTestServer({ ZAGREB_MAX_GRAPHS: '8' });
  });

  afterEach(async () => {
    await context.client.close();
    vi.restoreAllMocks();
  });

  it('should report the effective configuration', async () => {
    await callTool(context.client, 'graph_create', { name: 'p', template: 'petersen' });
    const data = JSON.parse((await callTool(context.client, 'server_config')).text);

    expect(data.server).toEqual({ name: 'zagreb-graph', version: '0.1.0' });
    expect(data.categories).toEqual(['graphs', 'queries', 'network', 'system']);
    expect(data.tools).toHaveLength(9);
    expect(data.default_exact).toBe(false);
    expect(data.max_vertices).toBe(5000);
    expect(data.max_graphs).toBe(8);
    expect(data.graphs_held).toBe(1);
    expect(data.data_dir).toBe(process.cwd());
  });

  it('should log each tool call', async () => {
    await callTool(context.client, 'graph_create', { name: 'g', vertices: 3 });
    const data = JSON.parse((await callTool(context.client, 'server_log', { component: 'graphs' })).text);
    const last = data.entries[data.entries.length - 1];

    expect(last.component).toBe('graphs');
    expect(last.level).toBe('info');
    expect(last.message).toMatch(/^graph_create ok in \d+ms \{"name":"g"\}$/);
    expect(last.time).toBe(new Date(last.ts).toISOString());
  });

  it('should log failed tool calls as warnings', async () => {
    await callTool(context.client, 'graph_delete', { name: 'nope' });
    const data = JSON.parse((await callTool(context.client, 'server_log', { component: 'graphs', limit: 1 })).text);

    expect(data.count).toBe(1);
    expect(data.entries[0].level).toBe('warn');
    expect(data.entries[0].message).toMatch(/^graph_delete failed in \d+ms /);
  });

  it('should filter the log by minimum level', async () => {
    await callTool(context.client, 'graph_create', { name: 'ok', vertices: 2 });
    await callTool(context.client, 'graph_delete', { name: 'missing' });
    const data = JSON.parse((await callTool(context.client, 'server_log', { level: 'warn', limit: 1 })).text);

    expect(data.entries[0].level).toBe('warn');
    expect(data.entries[0].message).toMatch(/^graph_delete failed in \d+ms \{"name":"missing"/);
  });

  it('should log the registered categories at startup', async () => {
    const data = JSON.parse((await callTool(context.client, 'server_log', { component: 'server' })).text);
    const messages = data.entries.map((e: { message: string }) => e.message);

    expect(messages).toContain('Tool categories: graphs, queries, network, system');
    expect(messages).toContain('Registered 9 tools');
  });
});

describe('tool category gating', () => {
  let context: TestServerContext | undefined;

  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(async () => {
    await context?.client.close();
    context = undefined;
    vi.restoreAllMocks();
  });

  it('should register every tool by default', async () => {
    context = await createTestServer();

    expect(await toolNames(context)).toEqual([
      'graph_add_edges',
      'graph_analyze',
      'graph_create',
      'graph_delete',
      'graph_list',
      'graph_query',
      'network_analyze',
      'server_config',
      'server_log',
    ]);
  });

  it('should register graph and query tools for the minimal preset', async () => {
    context = await createTestServer({ ZAGREB_TOOLS: 'minimal' });

    expect(await toolNames(context)).toEqual([
      'graph_add_edges',
      'graph_analyze',
      'graph_create',
      'graph_delete',
      'graph_list',
      'graph_query',
    ]);
  });

  it('should register only the listed categories', async () => {
    context = await createTestServer({ ZAGREB_TOOLS: 'network,system' });

    expect(await toolNames(context)).toEqual(['network_analyze', 'server_config', 'server_log']);
  });
});
