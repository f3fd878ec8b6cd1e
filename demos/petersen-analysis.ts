/**
 * Petersen graph walkthrough
 *
 * The Petersen graph is 3-regular and 3-connected yet has no Hamiltonian
 * cycle. This prints what the engine reports for it, next to the complete
 * graph K10 for contrast.
 *
 * Run with: npm run demo
 */

import {
  analyzeGraph,
  classifyTraversal,
  completeGraph,
  connectivityLevel,
  petersenGraph,
  zagrebThresholds,
  type Graph,
} from '@zagreb-graph/core';

function report(label: string, graph: Graph): void {
  const analysis = analyzeGraph(graph);
  const thresholds = zagrebThresholds(graph);
  const n = graph.vertexCount();
  const diracDegree = Math.floor(n / 2);

  console.log(`\n== ${label} ==`);
  console.log(`vertices: ${analysis.vertex_count}, edges: ${analysis.edge_count}`);
  console.log(`degree range: ${analysis.min_degree}..${analysis.max_degree}`);
  console.log(`first Zagreb index: ${analysis.zagreb_index} (upper bound ${analysis.zagreb_upper_bound.toFixed(2)})`);
  console.log(`connectivity level: ${connectivityLevel(graph)}`);
  console.log(`independence number (greedy): ${analysis.independence_number}`);

  if (thresholds.hamiltonian !== null) {
    const meets = analysis.zagreb_index >= thresholds.hamiltonian;
    console.log(`Hamiltonian threshold: ${thresholds.hamiltonian} -> ${meets ? 'met' : 'not met'}`);
  }
  console.log(`Dirac: needs min degree ${diracDegree}, has ${analysis.min_degree}`);
  console.log(`traversal class: ${classifyTraversal(graph)}`);
}

report('Petersen graph', petersenGraph());
report('Complete graph K10', completeGraph(10));
