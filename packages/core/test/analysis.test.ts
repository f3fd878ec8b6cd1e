/**
 * Tests for analysis reports and derived indicators
 */

import { describe, it, expect } from 'vitest';
import { Graph } from '../src/graph.js';
import {
  analyzeGraph,
  averageDegree,
  classifyTraversal,
  connectivityLevel,
  lowConnectivityVertices,
  zagrebEfficiency,
  zagrebThresholds,
} from '../src/analysis.js';
import {
  buildTemplate,
  completeGraph,
  cycleGraph,
  graphFromEdges,
  pathGraph,
  petersenGraph,
  starGraph,
} from '../src/builders.js';

describe('analyzeGraph', () => {
  it('should report every invariant of the Petersen graph', () => {
    const graph = petersenGraph();
    const result = analyzeGraph(graph);

    expect(result).toMatchObject({
      vertex_count: 10,
      edge_count: 15,
      zagreb_index: 90,
      min_degree: 3,
      max_degree: 3,
      is_likely_hamiltonian: false,
      is_likely_traceable: true,
      independence_number: 4,
    });
    expect(result.zagreb_upper_bound).toBeCloseTo(117.9708, 3);
  });

  it('should report the empty graph without failing', () => {
    expect(analyzeGraph(new Graph(0))).toEqual({
      vertex_count: 0,
      edge_count: 0,
      zagreb_index: 0,
      min_degree: 0,
      max_degree: 0,
      is_likely_hamiltonian: false,
      is_likely_traceable: false,
      independence_number: 0,
      zagreb_upper_bound: 0,
    });
  });

  it('should honour the exact option', () => {
    // Two K4s sharing vertex 3
    const graph = new Graph(7);
    for (const block of [[0, 1, 2, 3], [3, 4, 5, 6]]) {
      for (let i = 0; i < 4; i++) {
        for (let j = i + 1; j < 4; j++) {
          graph.addEdge(block[i], block[j]);
        }
      }
    }

    expect(analyzeGraph(graph).is_likely_hamiltonian).toBe(true);
    expect(analyzeGraph(graph, { exact: true }).is_likely_hamiltonian).toBe(false);
  });
});

describe('averageDegree and zagrebEfficiency', () => {
  it('should compute 2e/n', () => {
    expect(averageDegree(petersenGraph())).toBe(3);
    expect(averageDegree(starGraph(5))).toBe(1.6);
    expect(averageDegree(new Graph(0))).toBe(0);
  });

  it('should reach 1 where the bound is tight', () => {
    expect(zagrebEfficiency(starGraph(5))).toBe(1);
    expect(zagrebEfficiency(completeGraph(6))).toBeCloseTo(150 / 350, 10);
  });

  it('should return 0 when the bound is 0', () => {
    expect(zagrebEfficiency(new Graph(1))).toBe(0);
    expect(zagrebEfficiency(new Graph(0))).toBe(0);
  });
});

describe('connectivityLevel', () => {
  it('should stop at the first failing level', () => {
    expect(connectivityLevel(pathGraph(5))).toBe(1);
    expect(connectivityLevel(cycleGraph(5))).toBe(2);
    expect(connectivityLevel(petersenGraph())).toBe(3);
    expect(connectivityLevel(petersenGraph(), undefined, true)).toBe(3);
  });

  it('should cap at maxK', () => {
    expect(connectivityLevel(completeGraph(8))).toBe(5);
    expect(connectivityLevel(completeGraph(8), 3)).toBe(3);
  });

  it('should return 0 for disconnected and empty graphs', () => {
    expect(connectivityLevel(graphFromEdges(4, [[0, 1]]))).toBe(0);
    expect(connectivityLevel(new Graph(0))).toBe(0);
  });
});

describe('lowConnectivityVertices', () => {
  it('should list vertices within one of the minimum degree', () => {
    expect(lowConnectivityVertices(starGraph(5))).toEqual([1, 2, 3, 4]);
    expect(lowConnectivityVertices(pathGraph(4))).toEqual([0, 1, 2, 3]);
  });

  it('should leave out well-connected hubs', () => {
    // Leaves 1-4 around hub 0, plus 5 hanging off leaf 1
    const graph = graphFromEdges(6, [[0, 1], [0, 2], [0, 3], [0, 4], [1, 5]]);

    expect(lowConnectivityVertices(graph)).toEqual([1, 2, 3, 4, 5]);
  });
});

describe('classifyTraversal', () => {
  it('should classify by the strongest traversal property', () => {
    expect(classifyTraversal(completeGraph(4))).toBe('hamiltonian');
    expect(classifyTraversal(pathGraph(5))).toBe('traceable');
    expect(classifyTraversal(petersenGraph())).toBe('traceable');
    expect(classifyTraversal(graphFromEdges(5, [[0, 1], [1, 2]]))).toBe('fragmented');
  });
});

describe('zagrebThresholds', () => {
  it('should omit thresholds that do not apply', () => {
    expect(zagrebThresholds(completeGraph(2))).toEqual({ hamiltonian: null, traceable: null });
    expect(zagrebThresholds(cycleGraph(5))).toEqual({ hamiltonian: 16, traceable: null });
  });

  it('should give both thresholds from 9 vertices', () => {
    // (10-1-2)*9 + floor(225/3) + floor((sqrt 7 - sqrt 3)^2 * 15) = 150
    // (10-2-1)*9 + floor(225/3) + floor((sqrt 7 - sqrt 3)^2 * 15) = 150
    expect(zagrebThresholds(petersenGraph())).toEqual({ hamiltonian: 150, traceable: 150 });
  });
});

describe('buildTemplate', () => {
  it('should build each named shape', () => {
    expect(buildTemplate('complete', 5).isComplete()).toBe(true);
    expect(buildTemplate('cycle', 5).isCycle()).toBe(true);
    expect(buildTemplate('star', 5).isStar()).toBe(true);
    expect(buildTemplate('path', 5).isPath()).toBe(true);
    expect(buildTemplate('petersen', 3).isPetersen()).toBe(true);
  });
});
