/**
 * In-memory storage adapter for development and testing
 * Stores everything in process memory (data is lost when process ends)
 */

import {
  ListOptions,
  stripUndefined,
  StorageAdapter,
  StorageReader,
  StorageTransaction,
} from './storage-adapter';
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

type Tables = {
  bots: Map<number, Bot>;
  nodes: Map<number, FlowNode>;
  edges: Map<number, FlowEdge>;
  conversationStates: Map<string, ConversationState>;
  backups: Map<string, Backup>;
  sequences: { bot: number; node: number; edge: number };
};

function emptyTables(): Tables {
  return {
    bots: new Map(),
    nodes: new Map(),
    edges: new Map(),
    conversationStates: new Map(),
    backups: new Map(),
    sequences: { bot: 0, node: 0, edge: 0 },
  };
}

const stateKey = (botId: number, contact: string) => `${botId}:${contact}`;

/**
 * Read access over one set of tables. Rows handed out are copies, so
 * callers can never mutate stored data in place.
 */
class MemoryReader implements StorageReader {
  constructor(protected readonly tables: Tables) {}

  async getBot(botId: number): Promise<Bot | null> {
    const bot = this.tables.bots.get(botId);
    return bot ? { ...bot } : null;
  }

  async listNodes(botId: number, options: ListOptions = {}): Promise<FlowNode[]> {
    return [...this.tables.nodes.values()]
      .filter(
        (node) =>
          node.botId === botId && (options.includeDeleted || !node.isDeleted)
      )
      .map((node) => structuredClone(node));
  }

  async listEdges(botId: number, options: ListOptions = {}): Promise<FlowEdge[]> {
    return [...this.tables.edges.values()]
      .filter(
        (edge) =>
          edge.botId === botId && (options.includeDeleted || !edge.isDeleted)
      )
      .map((edge) => structuredClone(edge));
  }

  async getConversationState(
    botId: number,
    contactIdentifier: string
  ): Promise<ConversationState | null> {
    const state = this.tables.conversationStates.get(
      stateKey(botId, contactIdentifier)
    );
    return state ? { ...state } : null;
  }

  async listBackups(botId: number): Promise<Backup[]> {
    return [...this.tables.backups.values()]
      .filter((backup) => backup.botId === botId)
      .sort((a, b) => b.version - a.version)
      .map((backup) => structuredClone(backup));
  }

  async getBackup(backupId: string): Promise<Backup | null> {
    const backup = this.tables.backups.get(backupId);
    return backup ? structuredClone(backup) : null;
  }
}

class MemoryTransaction extends MemoryReader implements StorageTransaction {
  async renameBot(botId: number, name: string): Promise<void> {
    const bot = this.requireBot(botId);
    bot.name = name;
  }

  async incrementBotCounters(
    botId: number,
    increment: CounterIncrement
  ): Promise<void> {
    const bot = this.requireBot(botId);
    bot.messageCount += increment.messages ?? 0;
    bot.conversationCount += increment.conversations ?? 0;
  }

  async insertNode(node: NewFlowNode): Promise<FlowNode> {
    const now = new Date();
    const row: FlowNode = {
      ...structuredClone(node),
      id: ++this.tables.sequences.node,
      isDeleted: false,
      createdAt: now,
      updatedAt: now,
    };
    this.tables.nodes.set(row.id, row);
    return structuredClone(row);
  }

  async updateNode(nodeId: number, update: FlowNodeUpdate): Promise<FlowNode> {
    const row = this.tables.nodes.get(nodeId);
    if (!row) throw new Error(`Node ${nodeId} does not exist`);
    Object.assign(row, structuredClone(stripUndefined(update)), {
      updatedAt: new Date(),
    });
    return structuredClone(row);
  }

  async softDeleteNodes(botId: number, nodeIds: number[]): Promise<number> {
    return this.softDelete(this.tables.nodes, botId, nodeIds);
  }

  async insertEdge(edge: NewFlowEdge): Promise<FlowEdge> {
    const now = new Date();
    const row: FlowEdge = {
      ...structuredClone(edge),
      id: ++this.tables.sequences.edge,
      isDeleted: false,
      createdAt: now,
      updatedAt: now,
    };
    this.tables.edges.set(row.id, row);
    return structuredClone(row);
  }

  async updateEdge(edgeId: number, update: FlowEdgeUpdate): Promise<FlowEdge> {
    const row = this.tables.edges.get(edgeId);
    if (!row) throw new Error(`Edge ${edgeId} does not exist`);
    Object.assign(row, structuredClone(stripUndefined(update)), {
      updatedAt: new Date(),
    });
    return structuredClone(row);
  }

  async softDeleteEdges(botId: number, edgeIds: number[]): Promise<number> {
    return this.softDelete(this.tables.edges, botId, edgeIds);
  }

  async saveConversationState(
    botId: number,
    contactIdentifier: string,
    currentNodeId: number
  ): Promise<ConversationState> {
    const key = stateKey(botId, contactIdentifier);
    const now = new Date();
    const existing = this.tables.conversationStates.get(key);
    const state: ConversationState = existing
      ? { ...existing, currentNodeId, updatedAt: now }
      : { botId, contactIdentifier, currentNodeId, createdAt: now, updatedAt: now };
    this.tables.conversationStates.set(key, state);
    return { ...state };
  }

  async insertBackup(backup: Backup): Promise<void> {
    if (this.tables.backups.has(backup.id)) {
      throw new Error(`Backup ${backup.id} already exists`);
    }
    this.tables.backups.set(backup.id, structuredClone(backup));
  }

  async deleteBackups(backupIds: string[]): Promise<void> {
    for (const id of backupIds) this.tables.backups.delete(id);
  }

  async purgeBot(botId: number): Promise<void> {
    for (const [id, node] of this.tables.nodes) {
      if (node.botId === botId) this.tables.nodes.delete(id);
    }
    for (const [id, edge] of this.tables.edges) {
      if (edge.botId === botId) this.tables.edges.delete(id);
    }
    for (const [key, state] of this.tables.conversationStates) {
      if (state.botId === botId) this.tables.conversationStates.delete(key);
    }
    for (const [id, backup] of this.tables.backups) {
      if (backup.botId === botId) this.tables.backups.delete(id);
    }
  }

  private requireBot(botId: number): Bot {
    const bot = this.tables.bots.get(botId);
    if (!bot) throw new Error(`Bot ${botId} does not exist`);
    return bot;
  }

  private softDelete<R extends FlowNode | FlowEdge>(
    rows: Map<number, R>,
    botId: number,
    ids: number[]
  ): number {
    const now = new Date();
    let deleted = 0;
    for (const id of ids) {
      const row = rows.get(id);
      if (row && row.botId === botId && !row.isDeleted) {
        row.isDeleted = true;
        row.updatedAt = now;
        deleted++;
      }
    }
    return deleted;
  }
}

/**
 * Memory-based storage adapter
 * A transaction works on a copy of the tables that replaces the committed
 * tables only when the work succeeds. Transactions run one at a time.
 */
export class MemoryStorageAdapter extends StorageAdapter {
  private tables: Tables = emptyTables();
  private queue: Promise<unknown> = Promise.resolve();

  async transaction<T>(work: (tx: StorageTransaction) => Promise<T>): Promise<T> {
    return this.commit((draft) => work(new MemoryTransaction(draft)));
  }

  async read<T>(work: (reader: StorageReader) => Promise<T>): Promise<T> {
    return work(new MemoryReader(this.tables));
  }

  async createBot(bot: NewBot): Promise<Bot> {
    return this.commit(async (draft) => {
      const row: Bot = {
        id: ++draft.sequences.bot,
        name: bot.name,
        ownerId: bot.ownerId ?? null,
        messageCount: 0,
        conversationCount: 0,
      };
      draft.bots.set(row.id, row);
      return { ...row };
    });
  }

  private commit<T>(work: (draft: Tables) => Promise<T>): Promise<T> {
    const run = this.queue.then(async () => {
      const draft = structuredClone(this.tables);
      const result = await work(draft);
      this.tables = draft;
      return result;
    });
    // the caller observes failures through `run`; the queue only orders work
    this.queue = run.catch(() => undefined);
    return run;
  }

  /**
   * Clear all data from memory (useful for testing)
   */
  clearAll(): void {
    this.tables = emptyTables();
  }

  /**
   * Get all bot IDs in storage (useful for debugging)
   */
  getAllBotIds(): number[] {
    return Array.from(this.tables.bots.keys());
  }
}
