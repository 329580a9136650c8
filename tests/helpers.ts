/**
 * Shared fixtures for the test suites
 */

import { MemoryStorageAdapter } from '../src/persistence/memory-adapter';
import {
  editorGraphPayloadSchema,
  type EditorGraphPayload,
} from '../src/schema/editor-schema';
import type { FlowEdge, FlowNode, NodeKind } from '../src/types/graph.types';
import type { Bot } from '../src/types/state.types';

export async function setupBot(
  name = 'Support bot',
  ownerId: string | null = 'owner-1'
): Promise<{ adapter: MemoryStorageAdapter; bot: Bot }> {
  const adapter = new MemoryStorageAdapter();
  const bot = await adapter.createBot({ name, ownerId });
  return { adapter, bot };
}

export const editorNode = (
  id: string,
  type: NodeKind,
  label: string,
  message: string,
  position = { x: 0, y: 0 }
) => ({ id, type, position, data: { label, message } });

export const editorEdge = (
  id: string,
  source: string,
  target: string,
  label?: string
) => ({ id, source, target, ...(label === undefined ? {} : { label }) });

/**
 * Editor submission as the sync engine receives it after validation
 */
export function payload(
  nodes: unknown[],
  edges: unknown[],
  name?: string
): EditorGraphPayload {
  return editorGraphPayloadSchema.parse({ nodes, edges, name });
}

const epoch = new Date('2024-01-01T00:00:00Z');

export function makeNode(
  id: number,
  kind: NodeKind,
  userMessage: string,
  botResponse: string
): FlowNode {
  return {
    id,
    botId: 1,
    frontendId: `n${id}`,
    kind,
    position: null,
    positionX: 0,
    positionY: 0,
    userMessage,
    botResponse,
    condition: '',
    metadata: null,
    isDeleted: false,
    createdAt: epoch,
    updatedAt: epoch,
  };
}

export function makeEdge(
  id: number,
  sourceNodeId: number,
  targetNodeId: number,
  condition = ''
): FlowEdge {
  return {
    id,
    botId: 1,
    frontendId: `e${id}`,
    sourceNodeId,
    targetNodeId,
    condition,
    label: condition || null,
    sourceHandle: null,
    targetHandle: null,
    edgeType: 'default',
    animated: true,
    style: null,
    metadata: null,
    isDeleted: false,
    createdAt: epoch,
    updatedAt: epoch,
  };
}
