/**
 * Loads the live graph of a bot and converts it to the editor's shape
 */

import { StorageAdapter, StorageReader } from './persistence/storage-adapter';
import type { Logger } from './logger';
import type {
  BackupGraph,
  EditorEdge,
  EditorGraph,
  EditorNode,
  FlowEdge,
  FlowNode,
  LoadedGraph,
} from './types/graph.types';

/**
 * Identifier the editor knows a node or edge by
 */
export function editorId(row: { id: number; frontendId: string | null }): string {
  return row.frontendId ?? String(row.id);
}

function compareNodes(a: FlowNode, b: FlowNode): number {
  if (a.position !== b.position) {
    if (a.position === null) return 1;
    if (b.position === null) return -1;
    return a.position - b.position;
  }
  return a.id - b.id;
}

function toEditorNode(node: FlowNode): EditorNode {
  const editorNode: EditorNode = {
    id: editorId(node),
    type: node.kind,
    position: { x: node.positionX, y: node.positionY },
    data: { label: node.userMessage, message: node.botResponse },
  };
  if (node.metadata) editorNode.metadata = structuredClone(node.metadata);
  return editorNode;
}

function toEditorEdge(
  edge: FlowEdge,
  nodesById: Map<number, FlowNode>
): EditorEdge | null {
  const source = nodesById.get(edge.sourceNodeId);
  const target = nodesById.get(edge.targetNodeId);
  if (!source || !target) return null;

  const editorEdge: EditorEdge = {
    id: editorId(edge),
    source: editorId(source),
    target: editorId(target),
    sourceHandle: edge.sourceHandle,
    targetHandle: edge.targetHandle,
    type: edge.edgeType,
    animated: edge.animated,
  };
  if (edge.label !== null) editorEdge.label = edge.label;
  // a write derives a missing condition from the label, so any other
  // condition (an empty one included) has to be sent along
  if (edge.condition !== (edge.label ?? '')) {
    editorEdge.condition = edge.condition;
  }
  if (edge.style) editorEdge.style = structuredClone(edge.style);
  if (edge.metadata) editorEdge.metadata = structuredClone(edge.metadata);
  return editorEdge;
}

/**
 * Graph in the editor's read shape
 */
export function toEditorGraph(graph: LoadedGraph, name: string): EditorGraph {
  return { ...snapshotGraph(graph), name };
}

/**
 * Copy of a graph that can be replayed through a full graph write
 */
export function snapshotGraph(graph: LoadedGraph): BackupGraph {
  const nodesById = new Map(graph.nodes.map((node) => [node.id, node]));
  const edges: EditorEdge[] = [];
  for (const edge of graph.edges) {
    const editorEdge = toEditorEdge(edge, nodesById);
    if (editorEdge) edges.push(editorEdge);
  }
  return { nodes: graph.nodes.map(toEditorNode), edges };
}

export class GraphStore {
  constructor(
    private readonly adapter: StorageAdapter,
    private readonly logger: Logger
  ) {}

  /**
   * Live graph of a bot from committed data
   */
  async load(botId: number): Promise<LoadedGraph> {
    return this.adapter.read((reader) => this.loadWith(reader, botId));
  }

  /**
   * Live graph of a bot as seen by `reader`, which may be a transaction.
   * Nodes come ordered by legacy position (unpositioned last) then id,
   * edges by id. Edges with an endpoint outside the live node set are
   * dropped.
   */
  async loadWith(reader: StorageReader, botId: number): Promise<LoadedGraph> {
    const nodes = (await reader.listNodes(botId)).sort(compareNodes);
    const liveIds = new Set(nodes.map((node) => node.id));

    const edges: FlowEdge[] = [];
    for (const edge of await reader.listEdges(botId)) {
      if (liveIds.has(edge.sourceNodeId) && liveIds.has(edge.targetNodeId)) {
        edges.push(edge);
      } else {
        this.logger.warn('Ignoring edge with a missing endpoint', {
          botId,
          edgeId: edge.id,
          sourceNodeId: edge.sourceNodeId,
          targetNodeId: edge.targetNodeId,
        });
      }
    }
    edges.sort((a, b) => a.id - b.id);

    return { nodes, edges };
  }

  toEditorGraph(graph: LoadedGraph, name: string): EditorGraph {
    return toEditorGraph(graph, name);
  }

  snapshot(graph: LoadedGraph): BackupGraph {
    return snapshotGraph(graph);
  }
}
