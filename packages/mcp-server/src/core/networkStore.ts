/**
 * Topology files and saved reports under the data directory
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import type { NetworkReport, NetworkTopology } from '@zagreb-graph/core';

const ValidatorSchema = z.object({
  id: z.number().int().nonnegative(),
  pubkey: z.string(),
  vote_account: z.string(),
  stake: z.number().nonnegative(),
  name: z.string().nullable().optional(),
});

const PeerConnectionsSchema = z.object({
  id: z.number().int().nonnegative(),
  peers: z.array(z.number().int().nonnegative()),
});

export const TopologySchema = z.object({
  validators: z.array(ValidatorSchema),
  connections: z.array(PeerConnectionsSchema).default([]),
});

/**
 * Resolve a path relative to the data directory.
 *
 * @throws Error if the result lies outside the data directory
 */
export function resolveDataPath(dataDir: string, relativePath: string): string {
  const root = path.resolve(dataDir);
  const resolved = path.resolve(root, relativePath);
  const relative = path.relative(root, resolved);

  const escapes = relative === '..' || relative.startsWith(`..${path.sep}`);
  if (relative === '' || escapes || path.isAbsolute(relative)) {
    throw new Error(`Path escapes the data directory: ${relativePath}`);
  }
  return resolved;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Validate an untrusted value as a network topology.
 *
 * @throws Error listing the schema violations
 */
export function parseTopology(value: unknown, origin = 'topology'): NetworkTopology {
  const parsed = TopologySchema.safeParse(value);
  if (!parsed.success) {
    throw new Error(`Invalid ${origin}: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

/**
 * Read and validate a topology JSON file.
 *
 * @throws Error if the file is missing, escapes the data directory, or is not a valid topology
 */
export async function loadTopology(dataDir: string, file: string): Promise<NetworkTopology> {
  const fullPath = resolveDataPath(dataDir, file);

  let raw: string;
  try {
    raw = await fs.readFile(fullPath, 'utf-8');
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new Error(`Cannot read topology file ${file}: ${msg}`);
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new Error(`Topology file ${file} is not valid JSON: ${msg}`);
  }

  return parseTopology(data, `topology file ${file}`);
}

/**
 * Write a report as pretty-printed JSON, creating parent directories.
 * Returns the absolute path written.
 */
export async function saveReport(dataDir: string, file: string, report: NetworkReport): Promise<string> {
  const fullPath = resolveDataPath(dataDir, file);
  await fs.mkdir(path.dirname(fullPath), { recursive: true });
  await fs.writeFile(fullPath, JSON.stringify(report, null, 2) + '\n', 'utf-8');
  return fullPath;
}
