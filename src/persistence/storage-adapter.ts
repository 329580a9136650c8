/**
 * Storage adapter interface for bot graphs, conversation pointers and backups
 * Every write goes through a transaction that commits as a whole or not at all
 */

import type {
  Backup,
  FlowEdge,
  FlowEdgeUpdate,
  FlowNode,
  FlowNodeUpdate,
  NewFlowEdge,
  NewFlowNode,
} from '../types/graph.types';
import type {
  Bot,
  ConversationState,
  CounterIncrement,
  NewBot,
} from '../types/state.types';
import { isFlowEngineError, TransactionError } from '../errors';
import type { Logger } from '../logger';

export type ListOptions = {
  /** Include soft-deleted rows (defaults to false) */
  includeDeleted?: boolean;
};

/**
 * Read access to stored data
 */
export interface StorageReader {
  getBot(botId: number): Promise<Bot | null>;

  /**
   * Nodes of a bot in insertion order
   */
  listNodes(botId: number, options?: ListOptions): Promise<FlowNode[]>;

  /**
   * Edges of a bot in insertion order
   */
  listEdges(botId: number, options?: ListOptions): Promise<FlowEdge[]>;

  getConversationState(
    botId: number,
    contactIdentifier: string
  ): Promise<ConversationState | null>;

  /**
   * Backups of a bot, newest version first
   */
  listBackups(botId: number): Promise<Backup[]>;

  getBackup(backupId: string): Promise<Backup | null>;
}

/**
 * Read and write access inside one atomic unit of work
 */
export interface StorageTransaction extends StorageReader {
  renameBot(botId: number, name: string): Promise<void>;

  incrementBotCounters(botId: number, increment: CounterIncrement): Promise<void>;

  /**
   * Insert a node and assign it a fresh storage id
   */
  insertNode(node: NewFlowNode): Promise<FlowNode>;

  updateNode(nodeId: number, update: FlowNodeUpdate): Promise<FlowNode>;

  /**
   * Mark nodes as deleted
   * @returns Number of rows that were live before the call
   */
  softDeleteNodes(botId: number, nodeIds: number[]): Promise<number>;

  insertEdge(edge: NewFlowEdge): Promise<FlowEdge>;

  updateEdge(edgeId: number, update: FlowEdgeUpdate): Promise<FlowEdge>;

  softDeleteEdges(botId: number, edgeIds: number[]): Promise<number>;

  /**
   * Create the pointer for a contact or move the existing one
   */
  saveConversationState(
    botId: number,
    contactIdentifier: string,
    currentNodeId: number
  ): Promise<ConversationState>;

  insertBackup(backup: Backup): Promise<void>;

  deleteBackups(backupIds: string[]): Promise<void>;

  /**
   * Remove every node, edge, conversation pointer and backup of a bot
   */
  purgeBot(botId: number): Promise<void>;
}

/**
 * Drop keys whose value is undefined so a partial update never blanks a
 * stored field
 */
export function stripUndefined<T extends object>(update: T): Partial<T> {
  const result: Partial<T> = {};
  for (const key in update) {
    if (update[key] !== undefined) result[key] = update[key];
  }
  return result;
}

/**
 * Run `work` in a transaction of `adapter`. Engine errors propagate as they
 * are; anything else is logged and rethrown as a TransactionError. Either
 * way the transaction has been rolled back.
 */
export async function runTransaction<T>(
  adapter: StorageAdapter,
  logger: Logger,
  failure: string,
  work: (tx: StorageTransaction) => Promise<T>
): Promise<T> {
  try {
    return await adapter.transaction(work);
  } catch (error) {
    if (isFlowEngineError(error)) throw error;
    logger.error(`${failure}, transaction rolled back`, {
      error: error instanceof Error ? error.message : String(error),
    });
    throw new TransactionError(failure, error);
  }
}

/**
 * Abstract storage adapter
 * Implement this class to back the engine with another database
 */
export abstract class StorageAdapter {
  /**
   * Run `work` inside a transaction. If `work` throws, none of its writes
   * are kept and the error is rethrown.
   */
  abstract transaction<T>(
    work: (tx: StorageTransaction) => Promise<T>
  ): Promise<T>;

  /**
   * Run read-only `work` against committed data
   */
  abstract read<T>(work: (reader: StorageReader) => Promise<T>): Promise<T>;

  /**
   * Register a bot. Bot management lives outside the engine; this is the
   * hook it uses to make a bot known to storage.
   */
  abstract createBot(bot: NewBot): Promise<Bot>;
}
