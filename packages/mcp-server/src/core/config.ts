/**
 * Server configuration from environment variables
 *
 * ZAGREB_TOOLS controls which tools are loaded.
 *
 * Presets:
 *   minimal  - Graph management and queries
 *   full     - All tools [DEFAULT]
 *
 * Fine-grained: use comma-separated category names for custom sets.
 *   ZAGREB_TOOLS=graphs,queries,system
 *
 * Categories: graphs, queries, network, system
 */

import * as path from 'path';
import { z } from 'zod';
import { serverLog } from './serverLog.js';
import { DEFAULT_MAX_GRAPHS, DEFAULT_MAX_VERTICES } from './constants.js';

export type ToolCategory = 'graphs' | 'queries' | 'network' | 'system';

export type ToolPreset = 'minimal' | 'full';

export const ALL_CATEGORIES: readonly ToolCategory[] = ['graphs', 'queries', 'network', 'system'];

export const PRESETS: Record<ToolPreset, readonly ToolCategory[]> = {
  minimal: ['graphs', 'queries'],
  full: ALL_CATEGORIES,
};

const DEFAULT_PRESET: ToolPreset = 'full';

export interface ServerConfig {
  categories: Set<ToolCategory>;
  /** Connectivity strategy for calls that do not pass `exact` */
  defaultExact: boolean;
  maxVertices: number;
  maxGraphs: number;
  /** Absolute directory topology files are read from and reports written to */
  dataDir: string;
}

const CATEGORY_NAMES: ReadonlySet<string> = new Set(ALL_CATEGORIES);

function isToolCategory(value: string): value is ToolCategory {
  return CATEGORY_NAMES.has(value);
}

function isPreset(value: string): value is ToolPreset {
  return value === 'minimal' || value === 'full';
}

/**
 * Parse a ZAGREB_TOOLS value into enabled categories
 */
export function parseEnabledCategories(envValue: string | undefined): Set<ToolCategory> {
  const trimmed = envValue?.trim();

  // No value = use default preset
  if (!trimmed) {
    return new Set(PRESETS[DEFAULT_PRESET]);
  }

  const lowerValue = trimmed.toLowerCase();
  if (isPreset(lowerValue)) {
    return new Set(PRESETS[lowerValue]);
  }

  // Comma-separated categories, preset names allowed in the list
  const categories = new Set<ToolCategory>();
  for (const item of trimmed.split(',')) {
    const name = item.trim().toLowerCase();
    if (isToolCategory(name)) {
      categories.add(name);
    } else if (isPreset(name)) {
      for (const c of PRESETS[name]) {
        categories.add(c);
      }
    } else if (name) {
      serverLog('config', `Unknown tool category "${item.trim()}" - ignoring`, 'warn');
    }
  }

  if (categories.size === 0) {
    serverLog('config', `No valid categories found, using default (${DEFAULT_PRESET})`, 'warn');
    return new Set(PRESETS[DEFAULT_PRESET]);
  }

  return categories;
}

const PositiveIntSchema = z.coerce.number().int().positive();

const BooleanFlagSchema = z
  .enum(['true', 'false', '1', '0'])
  .transform(value => value === 'true' || value === '1');

function readPositiveInt(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === '') return fallback;

  const parsed = PositiveIntSchema.safeParse(raw.trim());
  if (!parsed.success) {
    serverLog('config', `Invalid ${name}="${raw}", using default ${fallback}`, 'warn');
    return fallback;
  }
  return parsed.data;
}

function readFlag(name: string, raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined || raw.trim() === '') return fallback;

  const parsed = BooleanFlagSchema.safeParse(raw.trim().toLowerCase());
  if (!parsed.success) {
    serverLog('config', `Invalid ${name}="${raw}", using default ${fallback}`, 'warn');
    return fallback;
  }
  return parsed.data;
}

/**
 * Build the server configuration. Invalid values fall back to their
 * defaults with a warning in the server log.
 */
export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  return {
    categories: parseEnabledCategories(env.ZAGREB_TOOLS),
    defaultExact: readFlag('ZAGREB_EXACT', env.ZAGREB_EXACT, false),
    maxVertices: readPositiveInt('ZAGREB_MAX_VERTICES', env.ZAGREB_MAX_VERTICES, DEFAULT_MAX_VERTICES),
    maxGraphs: readPositiveInt('ZAGREB_MAX_GRAPHS', env.ZAGREB_MAX_GRAPHS, DEFAULT_MAX_GRAPHS),
    dataDir: path.resolve(env.ZAGREB_DATA_DIR?.trim() || process.cwd()),
  };
}

/** Tool names registered by each category */
export const CATEGORY_TOOLS: Record<ToolCategory, readonly string[]> = {
  graphs: ['graph_create', 'graph_add_edges', 'graph_list', 'graph_delete'],
  queries: ['graph_query', 'graph_analyze'],
  network: ['network_analyze'],
  system: ['server_log', 'server_config'],
};

export function enabledToolNames(categories: ReadonlySet<ToolCategory>): string[] {
  return ALL_CATEGORIES.filter(c => categories.has(c)).flatMap(c => CATEGORY_TOOLS[c]);
}
