/**
 * Tests for the session graph registry
 */

import { describe, it, expect } from 'vitest';
import { Graph, completeGraph } from '@zagreb-graph/core';
import { GraphRegistry } from '../../src/core/graphRegistry.js';

describe('GraphRegistry', () => {
  it('should register and look up graphs by name', () => {
    const registry = new GraphRegistry(4, 100);
    const graph = completeGraph(4);
    registry.add('k4', graph, 'complete');

    expect(registry.has('k4')).toBe(true);
    expect(registry.require('k4').graph).toBe(graph);
    expect(registry.size).toBe(1);
  });

  it('should summarize graphs in insertion order', () => {
    const registry = new GraphRegistry(4, 100);
    registry.add('b', new Graph(3), 'custom');
    registry.add('a', completeGraph(4), 'complete');

    const summaries = registry.list();
    expect(summaries.map(s => [s.name, s.source, s.vertex_count, s.edge_count])).toEqual([
      ['b', 'custom', 3, 0],
      ['a', 'complete', 4, 6],
    ]);
  });

  it('should reject unknown names', () => {
    const registry = new GraphRegistry(4, 100);

    expect(() => registry.require('missing')).toThrow('Graph "missing" not found');
    expect(registry.delete('missing')).toBe(false);
  });

  it('should reject duplicate and malformed names', () => {
    const registry = new GraphRegistry(4, 100);
    registry.add('g', new Graph(1), 'custom');

    expect(() => registry.add('g', new Graph(1), 'custom')).toThrow('Graph "g" already exists');
    expect(() => registry.add('bad name', new Graph(1), 'custom')).toThrow('Invalid graph name "bad name"');
    expect(() => registry.add('', new Graph(1), 'custom')).toThrow('Invalid graph name ""');
  });

  it('should enforce the graph limit', () => {
    const registry = new GraphRegistry(2, 100);
    registry.add('a', new Graph(1), 'custom');
    registry.add('b', new Graph(1), 'custom');

    expect(() => registry.add('c', new Graph(1), 'custom')).toThrow('Graph limit reached (2); delete a graph first');

    registry.delete('a');
    expect(registry.add('c', new Graph(1), 'custom').name).toBe('c');
  });

  it('should enforce the vertex limit', () => {
    const registry = new GraphRegistry(4, 10);

    expect(() => registry.checkVertexCount(10)).not.toThrow();
    expect(() => registry.checkVertexCount(11)).toThrow('Vertex count 11 exceeds the limit of 10');
    expect(() => registry.add('big', new Graph(11), 'custom')).toThrow('Vertex count 11 exceeds the limit of 10');
  });
});
