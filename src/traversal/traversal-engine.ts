/**
 * Conversation state machine: picks the next node of a bot's graph for the
 * node a contact is at and the message they sent.
 *
 * Every function here is pure. The same graph and inputs always give the
 * same result, which is what lets the chat runtime run without sessions.
 */

import { DECISION, END, MESSAGE, START } from '../constants';
import type { FlowEdge, FlowNode, LoadedGraph } from '../types/graph.types';
import type { ChatOption, TraversalReason } from '../types/state.types';

export type TraversalOutcome = {
  node: FlowNode | null;
  reason: TraversalReason;
};

type Step = { node: FlowNode; reason: TraversalReason };

function findNode(graph: LoadedGraph, nodeId: number): FlowNode | undefined {
  return graph.nodes.find((node) => node.id === nodeId);
}

/**
 * Edges leaving `nodeId` whose target is live, in storage order
 */
export function outgoingEdges(graph: LoadedGraph, nodeId: number): FlowEdge[] {
  return graph.edges.filter(
    (edge) =>
      edge.sourceNodeId === nodeId && findNode(graph, edge.targetNodeId) !== undefined
  );
}

/**
 * Entry state of a conversation. A start node hands over to the target of
 * its first edge; a graph without a start node begins at its first message
 * node.
 */
export function resolveStartNode(graph: LoadedGraph): FlowNode | null {
  const start = graph.nodes.find((node) => node.kind === START);
  if (!start) {
    return graph.nodes.find((node) => node.kind === MESSAGE) ?? null;
  }

  const firstEdge = graph.edges.find((edge) => edge.sourceNodeId === start.id);
  if (!firstEdge) return start;
  return findNode(graph, firstEdge.targetNodeId) ?? start;
}

/**
 * Follow an edge out of the current node. An edge whose condition equals the
 * message wins over one whose condition merely contains it; otherwise the
 * first edge is the default branch. Comparisons ignore case.
 */
export function findNextFromNode(
  graph: LoadedGraph,
  currentNodeId: number,
  message: string
): Step | null {
  const edges = outgoingEdges(graph, currentNodeId);
  if (edges.length === 0) return null;

  const needle = message.toLowerCase();
  const guarded = edges.filter((edge) => edge.condition !== '');
  const candidates: [TraversalReason, FlowEdge | undefined][] = [
    [
      'edge-exact',
      guarded.find((edge) => edge.condition.toLowerCase() === needle),
    ],
    [
      'edge-contains',
      guarded.find((edge) => edge.condition.toLowerCase().includes(needle)),
    ],
    ['edge-default', edges[0]],
  ];

  for (const [reason, edge] of candidates) {
    const node = edge && findNode(graph, edge.targetNodeId);
    if (node) return { node, reason };
  }
  return null;
}

/**
 * First node whose trigger phrase contains the message, falling back to the
 * start state
 */
export function findNextGlobally(graph: LoadedGraph, message: string): Step | null {
  const needle = message.toLowerCase();
  const matched = graph.nodes.find(
    (node) => node.userMessage !== '' && node.userMessage.toLowerCase().includes(needle)
  );
  if (matched) return { node: matched, reason: 'trigger-match' };

  const start = resolveStartNode(graph);
  return start ? { node: start, reason: 'start' } : null;
}

/**
 * Next node for a contact at `currentNodeId` (null for a new conversation).
 * A pointer to a node that is no longer live counts as no pointer. An end
 * node without outgoing edges loops back to the start state. When nothing
 * resolves, the outcome is `exhausted` with no node.
 */
export function resolveNextNode(
  graph: LoadedGraph,
  currentNodeId: number | null,
  message: string
): TraversalOutcome {
  const current = currentNodeId === null ? undefined : findNode(graph, currentNodeId);

  if (current) {
    const next = findNextFromNode(graph, current.id, message);
    if (next) return next;

    if (current.kind === END) {
      const start = resolveStartNode(graph);
      if (start) return { node: start, reason: 'end-reset' };
    }
  }

  return findNextGlobally(graph, message) ?? { node: null, reason: 'exhausted' };
}

/**
 * Buttons offered by a decision node, one per outgoing edge. Other kinds
 * offer none.
 */
export function buildOptions(
  graph: LoadedGraph,
  node: FlowNode,
  defaultOptionLabel: string
): ChatOption[] {
  if (node.kind !== DECISION) return [];

  const options: ChatOption[] = [];
  for (const edge of outgoingEdges(graph, node.id)) {
    const target = findNode(graph, edge.targetNodeId);
    if (!target) continue;
    options.push({
      id: target.id,
      label: edge.condition || edge.label || defaultOptionLabel,
      message: target.userMessage,
    });
  }
  return options;
}
