/**
 * Reconciles submitted graphs with stored rows while keeping storage ids
 * stable across saves
 */

import { v4 as uuidv4 } from 'uuid';
import { DEFAULT_EDGE_TYPE, MESSAGE } from '../constants';
import { ValidationError } from '../errors';
import { editorId } from '../graph-store';
import type { Logger } from '../logger';
import type { StorageTransaction } from '../persistence/storage-adapter';
import type {
  EditorEdgeInput,
  EditorEdgePatch,
  EditorGraphPayload,
  EditorNodeInput,
  EditorNodePatch,
  GraphDiff,
  LegacySeed,
} from '../schema/editor-schema';
import type {
  DroppedEdge,
  DroppedEdgeReason,
  FlowEdge,
  FlowEdgeUpdate,
  FlowNode,
  FlowNodeUpdate,
  JsonObject,
  SyncResult,
  SyncStats,
} from '../types/graph.types';

export function generateNodeId(): string {
  return `node-${uuidv4()}`;
}

export function generateEdgeId(): string {
  return `edge-${uuidv4()}`;
}

/**
 * Counts distinct rows touched by one write. A row created and then updated
 * again by a later duplicate entry counts once, as created.
 */
class StatsCollector {
  private readonly nodesCreated = new Set<number>();
  private readonly nodesUpdated = new Set<number>();
  private readonly edgesCreated = new Set<number>();
  private readonly edgesUpdated = new Set<number>();
  nodesDeleted = 0;
  edgesDeleted = 0;

  nodeCreated(id: number): void {
    this.nodesCreated.add(id);
  }

  nodeUpdated(id: number): void {
    if (!this.nodesCreated.has(id)) this.nodesUpdated.add(id);
  }

  edgeCreated(id: number): void {
    this.edgesCreated.add(id);
  }

  edgeUpdated(id: number): void {
    if (!this.edgesCreated.has(id)) this.edgesUpdated.add(id);
  }

  toStats(): SyncStats {
    return {
      nodesCreated: this.nodesCreated.size,
      nodesUpdated: this.nodesUpdated.size,
      nodesDeleted: this.nodesDeleted,
      edgesCreated: this.edgesCreated.size,
      edgesUpdated: this.edgesUpdated.size,
      edgesDeleted: this.edgesDeleted,
    };
  }
}

function nodeFields(node: EditorNodeInput) {
  return {
    kind: node.type,
    positionX: node.position.x,
    positionY: node.position.y,
    userMessage: node.data.label,
    botResponse: node.data.message,
    metadata: node.metadata,
  };
}

function edgeFields(edge: EditorEdgeInput, source: FlowNode, target: FlowNode) {
  return {
    sourceNodeId: source.id,
    targetNodeId: target.id,
    // the label doubles as the condition unless one is given
    condition: edge.condition ?? edge.label ?? '',
    label: edge.label ?? null,
    sourceHandle: edge.sourceHandle,
    targetHandle: edge.targetHandle,
    edgeType: edge.type,
    animated: edge.animated,
    style: edge.style,
    metadata: edge.metadata,
  };
}

function mergeMetadata(
  stored: JsonObject | null,
  patch: JsonObject | undefined
): JsonObject | undefined {
  return patch === undefined ? undefined : { ...(stored ?? {}), ...patch };
}

function dropReason(
  source: FlowNode | undefined,
  target: FlowNode | undefined
): DroppedEdgeReason {
  if (!source && !target) return 'missing-endpoints';
  return source ? 'missing-target' : 'missing-source';
}

type KeyedRow = { id: number; frontendId: string | null };

/**
 * Rows by the id the editor knows them by. A row stored without a frontend
 * id is keyed by its storage id, unless another row already uses that
 * string as its frontend id; such rows are handed to `onCollision` and left
 * out.
 */
export function indexByEditorId<R extends KeyedRow>(
  rows: R[],
  onCollision: (row: R, key: string) => void
): Map<string, R> {
  const index = new Map<string, R>();
  for (const row of rows) {
    if (row.frontendId !== null) index.set(row.frontendId, row);
  }
  for (const row of rows) {
    if (row.frontendId !== null) continue;
    const key = editorId(row);
    if (index.has(key)) onCollision(row, key);
    else index.set(key, row);
  }
  return index;
}

export class SyncEngine {
  constructor(private readonly logger: Logger) {}

  /**
   * Make the bot's live graph equal to `payload`. Rows whose frontend id is
   * submitted again keep their storage id; rows left out are soft-deleted.
   * Edges whose endpoints are not among the submitted nodes are skipped and
   * reported in `droppedEdges`.
   */
  async replaceGraph(
    tx: StorageTransaction,
    botId: number,
    payload: Pick<EditorGraphPayload, 'nodes' | 'edges'>
  ): Promise<SyncResult> {
    const stats = new StatsCollector();
    const droppedEdges: DroppedEdge[] = [];

    const liveNodes = await tx.listNodes(botId);
    const nodesByKey = this.indexRows(botId, liveNodes);
    const submitted = new Map<string, FlowNode>();

    for (const node of payload.nodes) {
      const frontendId = node.id ?? generateNodeId();
      const existing = submitted.get(frontendId) ?? nodesByKey.get(frontendId);
      let row: FlowNode;
      if (existing) {
        row = await tx.updateNode(existing.id, { frontendId, ...nodeFields(node) });
        stats.nodeUpdated(row.id);
      } else {
        row = await tx.insertNode({
          botId,
          frontendId,
          position: null,
          condition: '',
          ...nodeFields(node),
        });
        stats.nodeCreated(row.id);
      }
      submitted.set(frontendId, row);
    }

    const keptNodeIds = new Set([...submitted.values()].map((node) => node.id));
    stats.nodesDeleted = await tx.softDeleteNodes(
      botId,
      liveNodes.filter((node) => !keptNodeIds.has(node.id)).map((node) => node.id)
    );

    const liveEdges = await tx.listEdges(botId);
    const edgesByKey = this.indexRows(botId, liveEdges);
    const written = new Map<string, FlowEdge>();

    for (const edge of payload.edges) {
      const source = submitted.get(edge.source);
      const target = submitted.get(edge.target);
      if (!source || !target) {
        droppedEdges.push(this.dropEdge(botId, edge, dropReason(source, target)));
        continue;
      }

      const frontendId = edge.id ?? generateEdgeId();
      const existing = written.get(frontendId) ?? edgesByKey.get(frontendId);
      let row: FlowEdge;
      if (existing) {
        row = await tx.updateEdge(existing.id, edgeFields(edge, source, target));
        stats.edgeUpdated(row.id);
      } else {
        row = await tx.insertEdge({
          botId,
          frontendId,
          ...edgeFields(edge, source, target),
        });
        stats.edgeCreated(row.id);
      }
      written.set(frontendId, row);
    }

    const keptEdgeIds = new Set([...written.values()].map((edge) => edge.id));
    stats.edgesDeleted = await tx.softDeleteEdges(
      botId,
      liveEdges.filter((edge) => !keptEdgeIds.has(edge.id)).map((edge) => edge.id)
    );

    const result = { stats: stats.toStats(), droppedEdges };
    this.logger.info('Graph replaced', { botId, ...result.stats });
    return result;
  }

  /**
   * Apply an incremental change set. Node operations run first; edges then
   * resolve their endpoints against the resulting live nodes.
   */
  async applyDiff(
    tx: StorageTransaction,
    botId: number,
    diff: GraphDiff
  ): Promise<SyncResult> {
    const stats = new StatsCollector();
    const droppedEdges: DroppedEdge[] = [];
    const nodesByKey = this.indexRows(botId, await tx.listNodes(botId));

    for (const node of diff.nodesToCreate) {
      const frontendId = node.id ?? generateNodeId();
      const existing = nodesByKey.get(frontendId);
      if (existing) {
        const row = await tx.updateNode(existing.id, nodeFields(node));
        stats.nodeUpdated(row.id);
        nodesByKey.set(frontendId, row);
      } else {
        const row = await tx.insertNode({
          botId,
          frontendId,
          position: null,
          condition: '',
          ...nodeFields(node),
        });
        stats.nodeCreated(row.id);
        nodesByKey.set(frontendId, row);
      }
    }

    for (const patch of diff.nodesToUpdate) {
      const existing = nodesByKey.get(patch.id);
      if (!existing) {
        this.logger.warn('Skipping update of unknown node', { botId, nodeId: patch.id });
        continue;
      }
      const row = await tx.updateNode(existing.id, this.nodePatch(existing, patch));
      stats.nodeUpdated(row.id);
      nodesByKey.set(patch.id, row);
    }

    const deletedNodeIds: number[] = [];
    for (const id of diff.nodesToDelete) {
      const existing = nodesByKey.get(id);
      if (!existing) {
        this.logger.warn('Skipping delete of unknown node', { botId, nodeId: id });
        continue;
      }
      deletedNodeIds.push(existing.id);
      nodesByKey.delete(id);
    }
    stats.nodesDeleted = await tx.softDeleteNodes(botId, deletedNodeIds);

    const removed = new Set(deletedNodeIds);
    const liveEdges = await tx.listEdges(botId);
    const incident = liveEdges.filter(
      (edge) => removed.has(edge.sourceNodeId) || removed.has(edge.targetNodeId)
    );
    stats.edgesDeleted += await tx.softDeleteEdges(
      botId,
      incident.map((edge) => edge.id)
    );

    const cascaded = new Set(incident.map((edge) => edge.id));
    const edgesByKey = this.indexRows(
      botId,
      liveEdges.filter((edge) => !cascaded.has(edge.id))
    );
    const nodesById = new Map([...nodesByKey.values()].map((node) => [node.id, node]));
    const keyOf = (nodeId: number) => {
      const node = nodesById.get(nodeId);
      return node ? editorId(node) : String(nodeId);
    };

    for (const edge of diff.edgesToCreate) {
      const source = nodesByKey.get(edge.source);
      const target = nodesByKey.get(edge.target);
      if (!source || !target) {
        droppedEdges.push(this.dropEdge(botId, edge, dropReason(source, target)));
        continue;
      }
      const frontendId = edge.id ?? generateEdgeId();
      const existing = edgesByKey.get(frontendId);
      const row = existing
        ? await tx.updateEdge(existing.id, edgeFields(edge, source, target))
        : await tx.insertEdge({ botId, frontendId, ...edgeFields(edge, source, target) });
      if (existing) stats.edgeUpdated(row.id);
      else stats.edgeCreated(row.id);
      edgesByKey.set(frontendId, row);
    }

    for (const patch of diff.edgesToUpdate) {
      const existing = edgesByKey.get(patch.id);
      if (!existing) {
        this.logger.warn('Skipping update of unknown edge', { botId, edgeId: patch.id });
        continue;
      }
      const source =
        patch.source === undefined
          ? nodesById.get(existing.sourceNodeId)
          : nodesByKey.get(patch.source);
      const target =
        patch.target === undefined
          ? nodesById.get(existing.targetNodeId)
          : nodesByKey.get(patch.target);
      if (!source || !target) {
        droppedEdges.push(
          this.dropEdge(
            botId,
            {
              id: patch.id,
              source: patch.source ?? keyOf(existing.sourceNodeId),
              target: patch.target ?? keyOf(existing.targetNodeId),
            },
            dropReason(source, target)
          )
        );
        continue;
      }
      const row = await tx.updateEdge(
        existing.id,
        this.edgePatch(existing, patch, source, target)
      );
      stats.edgeUpdated(row.id);
      edgesByKey.set(patch.id, row);
    }

    const deletedEdgeIds: number[] = [];
    for (const id of diff.edgesToDelete) {
      const existing = edgesByKey.get(id);
      if (!existing) {
        this.logger.warn('Skipping delete of unknown edge', { botId, edgeId: id });
        continue;
      }
      deletedEdgeIds.push(existing.id);
      edgesByKey.delete(id);
    }
    stats.edgesDeleted += await tx.softDeleteEdges(botId, deletedEdgeIds);

    const result = { stats: stats.toStats(), droppedEdges };
    this.logger.info('Graph diff applied', { botId, ...result.stats });
    return result;
  }

  /**
   * Replace the bot's graph with an ordered list of flows, as bot creation
   * and template expansion produce them. Edges reference flows by their
   * index in `input.flows`.
   */
  async seedLegacyGraph(
    tx: StorageTransaction,
    botId: number,
    input: LegacySeed
  ): Promise<SyncResult> {
    validateSeedFlows(input.flows);

    const stats = new StatsCollector();
    const droppedEdges: DroppedEdge[] = [];

    stats.nodesDeleted = await tx.softDeleteNodes(
      botId,
      (await tx.listNodes(botId)).map((node) => node.id)
    );
    stats.edgesDeleted = await tx.softDeleteEdges(
      botId,
      (await tx.listEdges(botId)).map((edge) => edge.id)
    );

    const byIndex = new Map<string, FlowNode>();
    for (const [index, flow] of input.flows.entries()) {
      const row = await tx.insertNode({
        botId,
        frontendId: null,
        kind: flow.intent ?? MESSAGE,
        position: index,
        positionX: flow.positionX ?? 0,
        positionY: flow.positionY ?? 0,
        userMessage: flow.userMessage,
        botResponse: flow.botResponse,
        condition: flow.condition ?? '',
        metadata: null,
      });
      stats.nodeCreated(row.id);
      byIndex.set(String(index), row);
    }

    for (const edge of input.edges) {
      const source = byIndex.get(edge.source);
      const target = byIndex.get(edge.target);
      if (!source || !target) {
        droppedEdges.push(this.dropEdge(botId, edge, dropReason(source, target)));
        continue;
      }
      const row = await tx.insertEdge({
        botId,
        frontendId: null,
        sourceNodeId: source.id,
        targetNodeId: target.id,
        condition: '',
        label: null,
        sourceHandle: null,
        targetHandle: null,
        edgeType: DEFAULT_EDGE_TYPE,
        animated: true,
        style: null,
        metadata: null,
      });
      stats.edgeCreated(row.id);
    }

    const result = { stats: stats.toStats(), droppedEdges };
    this.logger.info('Graph seeded', { botId, ...result.stats });
    return result;
  }

  private indexRows<R extends KeyedRow>(botId: number, rows: R[]): Map<string, R> {
    return indexByEditorId(rows, (row, key) =>
      this.logger.warn('Editor id already taken by a frontend id', {
        botId,
        rowId: row.id,
        editorId: key,
      })
    );
  }

  private nodePatch(existing: FlowNode, patch: EditorNodePatch): FlowNodeUpdate {
    return {
      kind: patch.type,
      positionX: patch.position?.x,
      positionY: patch.position?.y,
      userMessage: patch.data?.label,
      botResponse: patch.data?.message,
      metadata: mergeMetadata(existing.metadata, patch.metadata),
    };
  }

  private edgePatch(
    existing: FlowEdge,
    patch: EditorEdgePatch,
    source: FlowNode,
    target: FlowNode
  ): FlowEdgeUpdate {
    // a condition that was derived from the label follows the new label
    const derived = existing.condition === (existing.label ?? '');
    const condition =
      patch.condition ??
      (patch.label !== undefined && derived ? patch.label ?? '' : undefined);
    return {
      sourceNodeId: source.id,
      targetNodeId: target.id,
      condition,
      label: patch.label,
      sourceHandle: patch.sourceHandle,
      targetHandle: patch.targetHandle,
      edgeType: patch.type,
      animated: patch.animated,
      style: patch.style,
      metadata: mergeMetadata(existing.metadata, patch.metadata),
    };
  }

  private dropEdge(
    botId: number,
    edge: { id?: string; source: string; target: string },
    reason: DroppedEdgeReason
  ): DroppedEdge {
    const dropped: DroppedEdge = {
      id: edge.id ?? null,
      source: edge.source,
      target: edge.target,
      reason,
    };
    this.logger.warn('Skipping edge with unresolved endpoint', { botId, ...dropped });
    return dropped;
  }
}

/**
 * Rejects flows with an empty trigger or response and flows whose trigger
 * repeats an earlier one (compared trimmed and case-insensitively)
 */
export function validateSeedFlows(
  flows: Pick<LegacySeed['flows'][number], 'userMessage' | 'botResponse'>[]
): void {
  const seen = new Set<string>();
  for (const [index, flow] of flows.entries()) {
    const trigger = flow.userMessage.trim().toLowerCase();
    if (!trigger || !flow.botResponse.trim()) {
      throw new ValidationError(
        `Flow at position ${index} has an empty message or response`
      );
    }
    if (seen.has(trigger)) {
      throw new ValidationError(
        `Trigger "${trigger}" at position ${index} is duplicated`
      );
    }
    seen.add(trigger);
  }
}
