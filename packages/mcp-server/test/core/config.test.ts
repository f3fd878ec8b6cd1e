/**
 * Tests for environment configuration and tool category presets
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as path from 'path';
import {
  enabledToolNames,
  loadServerConfig,
  parseEnabledCategories,
} from '../../src/core/config.js';
import { getServerLog } from '../../src/core/serverLog.js';

function lastConfigMessage(): string | undefined {
  return getServerLog({ component: 'config' }).entries.at(-1)?.message;
}

beforeEach(() => {
  vi.spyOn(console, 'error').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('parseEnabledCategories', () => {
  it('should enable everything by default', () => {
    expect([...parseEnabledCategories(undefined)]).toEqual(['graphs', 'queries', 'network', 'system']);
    expect([...parseEnabledCategories('  ')]).toEqual(['graphs', 'queries', 'network', 'system']);
  });

  it('should expand presets case-insensitively', () => {
    expect([...parseEnabledCategories('minimal')]).toEqual(['graphs', 'queries']);
    expect([...parseEnabledCategories(' FULL ')]).toEqual(['graphs', 'queries', 'network', 'system']);
  });

  it('should accept comma-separated categories', () => {
    expect([...parseEnabledCategories('system, graphs')]).toEqual(['system', 'graphs']);
  });

  it('should accept preset names inside a list', () => {
    expect([...parseEnabledCategories('minimal,network')]).toEqual(['graphs', 'queries', 'network']);
  });

  it('should ignore unknown categories with a warning', () => {
    expect([...parseEnabledCategories('queries,bogus')]).toEqual(['queries']);
    expect(lastConfigMessage()).toBe('Unknown tool category "bogus" - ignoring');
  });

  it('should fall back to the default preset when nothing is valid', () => {
    expect([...parseEnabledCategories('bogus')]).toEqual(['graphs', 'queries', 'network', 'system']);
    expect(lastConfigMessage()).toBe('No valid categories found, using default (full)');
  });
});

describe('enabledToolNames', () => {
  it('should list the tools of the enabled categories', () => {
    expect(enabledToolNames(new Set(['queries', 'system']))).toEqual([
      'graph_query',
      'graph_analyze',
      'server_log',
      'server_config',
    ]);
  });
});

describe('loadServerConfig', () => {
  it('should apply defaults', () => {
    const config = loadServerConfig({});

    expect(config.defaultExact).toBe(false);
    expect(config.maxVertices).toBe(5000);
    expect(config.maxGraphs).toBe(64);
    expect(config.dataDir).toBe(process.cwd());
    expect(config.categories.size).toBe(4);
  });

  it('should read valid values', () => {
    const config = loadServerConfig({
      ZAGREB_TOOLS: 'minimal',
      ZAGREB_EXACT: 'true',
      ZAGREB_MAX_VERTICES: '100',
      ZAGREB_MAX_GRAPHS: '3',
      ZAGREB_DATA_DIR: 'data/topologies',
    });

    expect([...config.categories]).toEqual(['graphs', 'queries']);
    expect(config.defaultExact).toBe(true);
    expect(config.maxVertices).toBe(100);
    expect(config.maxGraphs).toBe(3);
    expect(config.dataDir).toBe(path.resolve('data/topologies'));
  });

  it('should accept 1 and 0 as flags', () => {
    expect(loadServerConfig({ ZAGREB_EXACT: '1' }).defaultExact).toBe(true);
    expect(loadServerConfig({ ZAGREB_EXACT: '0' }).defaultExact).toBe(false);
  });

  it('should fall back on invalid flags with a warning', () => {
    expect(loadServerConfig({ ZAGREB_EXACT: 'yes' }).defaultExact).toBe(false);
    expect(lastConfigMessage()).toBe('Invalid ZAGREB_EXACT="yes", using default false');
  });

  it('should fall back on invalid numbers with a warning', () => {
    expect(loadServerConfig({ ZAGREB_MAX_VERTICES: 'abc' }).maxVertices).toBe(5000);
    expect(lastConfigMessage()).toBe('Invalid ZAGREB_MAX_VERTICES="abc", using default 5000');

    expect(loadServerConfig({ ZAGREB_MAX_GRAPHS: '-2' }).maxGraphs).toBe(64);
    expect(lastConfigMessage()).toBe('Invalid ZAGREB_MAX_GRAPHS="-2", using default 64');

    expect(loadServerConfig({ ZAGREB_MAX_VERTICES: '2.5' }).maxVertices).toBe(5000);
  });
});
