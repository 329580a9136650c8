/**
 * Traversal Engine Tests
 * Start resolution, edge matching precedence, end reset, global search
 * and decision options
 */

import { describe, it, expect } from '@jest/globals';
import {
  buildOptions,
  findNextFromNode,
  findNextGlobally,
  outgoingEdges,
  resolveNextNode,
  resolveStartNode,
} from '../src/traversal/traversal-engine';
import type { LoadedGraph } from '../src/types/graph.types';
import { makeEdge, makeNode } from './helpers';

const start = makeNode(1, 'start', '', 'Bienvenido');
const menu = makeNode(2, 'decision', 'hola', '¿Quieres ver precios?');
const yes = makeNode(3, 'message', 'precios', 'Cuesta 10');
const no = makeNode(4, 'end', 'adiós', 'Hasta luego');

const graph: LoadedGraph = {
  nodes: [start, menu, yes, no],
  edges: [makeEdge(10, 1, 2), makeEdge(11, 2, 3, 'sí'), makeEdge(12, 2, 4, 'no')],
};

describe('resolveStartNode', () => {
  it('should hand over to the target of the start node first edge', () => {
    expect(resolveStartNode(graph)?.id).toBe(2);
  });

  it('should use the start node itself when it has no edges', () => {
    expect(resolveStartNode({ nodes: [start, yes], edges: [] })?.id).toBe(1);
  });

  it('should begin at the first message node without a start node', () => {
    expect(resolveStartNode({ nodes: [menu, yes, no], edges: [] })?.id).toBe(3);
  });

  it('should give null for a graph without start or message nodes', () => {
    expect(resolveStartNode({ nodes: [menu, no], edges: [] })).toBeNull();
    expect(resolveStartNode({ nodes: [], edges: [] })).toBeNull();
  });
});

describe('findNextFromNode', () => {
  it('should prefer an exact condition over a substring match', () => {
    const current = makeNode(1, 'decision', '', '?');
    const contains = makeNode(2, 'message', '', 'contains');
    const exact = makeNode(3, 'message', '', 'exact');
    const g: LoadedGraph = {
      nodes: [current, contains, exact],
      edges: [makeEdge(10, 1, 2, 'no gracias'), makeEdge(11, 1, 3, 'no')],
    };

    expect(findNextFromNode(g, 1, 'No')).toEqual({ node: exact, reason: 'edge-exact' });
  });

  it('should match a condition that contains the message', () => {
    expect(findNextFromNode(graph, 2, 'S')).toEqual({ node: yes, reason: 'edge-contains' });
  });

  it('should fall back to the first edge', () => {
    expect(findNextFromNode(graph, 2, 'quizás')).toEqual({ node: yes, reason: 'edge-default' });
  });

  it('should give null for a node without outgoing edges', () => {
    expect(findNextFromNode(graph, 3, 'hola')).toBeNull();
  });

  it('should not let an empty condition match every message', () => {
    const g: LoadedGraph = {
      nodes: [menu, yes, no],
      edges: [makeEdge(11, 2, 3), makeEdge(12, 2, 4, 'no')],
    };
    expect(findNextFromNode(g, 2, 'no')).toEqual({ node: no, reason: 'edge-exact' });
  });
});

describe('findNextGlobally', () => {
  it('should find the first node whose trigger contains the message', () => {
    expect(findNextGlobally(graph, 'PRECIO')).toEqual({ node: yes, reason: 'trigger-match' });
  });

  it('should fall back to the start state', () => {
    expect(findNextGlobally(graph, 'zzz')).toEqual({ node: menu, reason: 'start' });
  });
});

describe('resolveNextNode', () => {
  it('should follow edges from the current node', () => {
    expect(resolveNextNode(graph, 2, 'no')).toEqual({ node: no, reason: 'edge-exact' });
  });

  it('should loop an end node without edges back to the start state', () => {
    expect(resolveNextNode(graph, 4, 'precios')).toEqual({ node: menu, reason: 'end-reset' });
  });

  it('should search globally from a dead end that is not an end node', () => {
    expect(resolveNextNode(graph, 3, 'adi')).toEqual({ node: no, reason: 'trigger-match' });
  });

  it('should treat a pointer to a missing node as no pointer', () => {
    expect(resolveNextNode(graph, 99, 'hola')).toEqual({ node: menu, reason: 'trigger-match' });
  });

  it('should start a new conversation at the start state', () => {
    expect(resolveNextNode(graph, null, 'buenas')).toEqual({ node: menu, reason: 'start' });
  });

  it('should be exhausted on an empty graph', () => {
    expect(resolveNextNode({ nodes: [], edges: [] }, null, 'hola')).toEqual({
      node: null,
      reason: 'exhausted',
    });
  });

  it('should give the same outcome for the same inputs', () => {
    const first = resolveNextNode(graph, 2, 'quizás');
    for (let i = 0; i < 5; i++) {
      expect(resolveNextNode(graph, 2, 'quizás')).toEqual(first);
    }
  });
});

describe('outgoingEdges', () => {
  it('should skip edges whose target is not live', () => {
    const g: LoadedGraph = { nodes: [menu, yes], edges: [makeEdge(11, 2, 3), makeEdge(12, 2, 4)] };
    expect(outgoingEdges(g, 2).map((edge) => edge.id)).toEqual([11]);
  });
});

describe('buildOptions', () => {
  it('should offer one option per edge of a decision node', () => {
    expect(buildOptions(graph, menu, 'Opción')).toEqual([
      { id: 3, label: 'sí', message: 'precios' },
      { id: 4, label: 'no', message: 'adiós' },
    ]);
  });

  it('should label an edge without condition with the default label', () => {
    const g: LoadedGraph = { nodes: [menu, yes], edges: [makeEdge(11, 2, 3)] };
    expect(buildOptions(g, menu, 'Opción')).toEqual([
      { id: 3, label: 'Opción', message: 'precios' },
    ]);
  });

  it('should offer nothing for other kinds', () => {
    expect(buildOptions(graph, start, 'Opción')).toEqual([]);
  });
});
