/**
 * Computes the change set between two editor graphs so a client can send
 * only what moved instead of the whole graph
 */

import type {
  BackupGraph,
  EditorEdge,
  EditorNode,
} from '../types/graph.types';

export type EditorGraphDiff = {
  nodesToCreate: EditorNode[];
  nodesToUpdate: EditorNode[];
  nodesToDelete: string[];
  edgesToCreate: EditorEdge[];
  edgesToUpdate: EditorEdge[];
  edgesToDelete: string[];
};

export function hasNodeChanged(previous: EditorNode, next: EditorNode): boolean {
  return (
    previous.position.x !== next.position.x ||
    previous.position.y !== next.position.y ||
    previous.data.label !== next.data.label ||
    previous.data.message !== next.data.message ||
    previous.type !== next.type
  );
}

export function hasEdgeChanged(previous: EditorEdge, next: EditorEdge): boolean {
  if (
    previous.source !== next.source ||
    previous.target !== next.target ||
    (previous.sourceHandle ?? null) !== (next.sourceHandle ?? null) ||
    (previous.targetHandle ?? null) !== (next.targetHandle ?? null)
  ) {
    return true;
  }

  if (
    previous.label !== next.label ||
    previous.condition !== next.condition ||
    previous.type !== next.type
  ) {
    return true;
  }

  // only the stroke settings of the style are significant
  return (
    previous.style?.stroke !== next.style?.stroke ||
    previous.style?.strokeWidth !== next.style?.strokeWidth
  );
}

function splitById<T extends { id: string }>(
  previous: T[],
  next: T[],
  changed: (a: T, b: T) => boolean
): { create: T[]; update: T[]; remove: string[] } {
  const before = new Map(previous.map((item) => [item.id, item]));
  const after = new Set(next.map((item) => item.id));

  const create: T[] = [];
  const update: T[] = [];
  for (const item of next) {
    const old = before.get(item.id);
    if (!old) create.push(item);
    else if (changed(old, item)) update.push(item);
  }
  const remove = previous
    .filter((item) => !after.has(item.id))
    .map((item) => item.id);

  return { create, update, remove };
}

/**
 * Entities are matched by id. New ids are created, ids that disappeared are
 * deleted and matched entities are updated when a significant field differs.
 */
export function computeGraphDiff(
  previous: BackupGraph,
  next: BackupGraph
): EditorGraphDiff {
  const nodes = splitById(previous.nodes, next.nodes, hasNodeChanged);
  const edges = splitById(previous.edges, next.edges, hasEdgeChanged);
  return {
    nodesToCreate: nodes.create,
    nodesToUpdate: nodes.update,
    nodesToDelete: nodes.remove,
    edgesToCreate: edges.create,
    edgesToUpdate: edges.update,
    edgesToDelete: edges.remove,
  };
}
