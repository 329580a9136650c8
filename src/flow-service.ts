/**
 * Entry point for an API layer: editor reads and writes, backups, seeding
 * and chat steps for bots stored through one storage adapter
 */

import { BackupManager } from './backup/backup-manager';
import { botCacheKey, ReadCache } from './cache/read-cache';
import { ChatRuntime } from './chat/chat-runtime';
import {
  resolveOptions,
  type FlowEngineOptions,
  type FlowEngineOptionsInput,
} from './config';
import { NotFoundError } from './errors';
import { GraphStore } from './graph-store';
import { consoleLogger, type Logger } from './logger';
import {
  runTransaction,
  StorageAdapter,
  StorageReader,
  StorageTransaction,
} from './persistence/storage-adapter';
import {
  editorGraphPayloadSchema,
  graphDiffSchema,
  legacySeedSchema,
  parsePayload,
} from './schema/editor-schema';
import { SyncEngine } from './sync/sync-engine';
import type {
  BackupSummary,
  DroppedEdge,
  EditorGraph,
  LoadedGraph,
  SyncResult,
  SyncStats,
} from './types/graph.types';
import type { Bot, ChatStepRequest, ChatStepResult } from './types/state.types';
import { KeyedMutex } from './util/keyed-mutex';

/**
 * What the cache holds per bot: the editor's view and the live graph the
 * chat runtime walks
 */
export type CachedGraph =
  | { view: 'editor'; graph: EditorGraph }
  | { view: 'live'; graph: LoadedGraph };

export type FlowServiceConfig = {
  storageAdapter: StorageAdapter;
  options?: FlowEngineOptionsInput;
  logger?: Logger;
  cache?: ReadCache<CachedGraph>;
};

export type EditorGraphRead = EditorGraph & { source: 'cache' | 'store' };

export type SaveResult = {
  status: 'success';
  /** Backup taken before the write, null when there was nothing to back up */
  backupId: string | null;
  droppedEdges: DroppedEdge[];
  stats: SyncStats;
};

export type RestoreResult = {
  status: 'success';
  backupId: string;
  version: number;
  droppedEdges: DroppedEdge[];
  stats: SyncStats;
};

export class FlowService {
  readonly options: FlowEngineOptions;
  private readonly adapter: StorageAdapter;
  private readonly logger: Logger;
  private readonly cache: ReadCache<CachedGraph>;
  private readonly locks = new KeyedMutex();
  private readonly graphStore: GraphStore;
  private readonly syncEngine: SyncEngine;
  private readonly backups: BackupManager;
  private readonly chatRuntime: ChatRuntime;

  constructor(config: FlowServiceConfig) {
    this.options = resolveOptions(config.options);
    this.adapter = config.storageAdapter;
    this.logger = config.logger ?? consoleLogger;
    this.cache = config.cache ?? new ReadCache<CachedGraph>({ logger: this.logger });
    this.graphStore = new GraphStore(this.adapter, this.logger);
    this.syncEngine = new SyncEngine(this.logger);
    this.backups = new BackupManager(
      this.adapter,
      this.graphStore,
      this.options.maxBackups,
      this.logger
    );
    this.chatRuntime = new ChatRuntime(
      this.adapter,
      (botId) => this.loadLiveGraph(botId),
      this.options,
      this.logger
    );
  }

  /**
   * Graph in the editor's shape, served from the cache when possible
   */
  async getEditorGraph(botId: number, ownerId?: string): Promise<EditorGraphRead> {
    const generation = this.cache.generation(botId);
    const bot = await this.requireBot(botId, ownerId);

    const key = botCacheKey(botId, 'editor');
    const cached = this.cache.get(key);
    if (cached.found && cached.value.view === 'editor') {
      this.logger.debug('Editor graph served from cache', { botId });
      return { ...structuredClone(cached.value.graph), source: 'cache' };
    }

    const graph = this.graphStore.toEditorGraph(
      await this.graphStore.load(botId),
      bot.name
    );
    this.cache.setIfCurrent(
      botId,
      generation,
      key,
      { view: 'editor', graph },
      this.options.cacheTtlSeconds
    );
    this.logger.debug('Editor graph loaded from store', { botId });
    return { ...structuredClone(graph), source: 'store' };
  }

  /**
   * Replace the bot's graph with an editor submission. The previous graph is
   * backed up in the same transaction.
   */
  async saveEditorGraph(
    botId: number,
    payload: unknown,
    ownerId?: string
  ): Promise<SaveResult> {
    const graph = parsePayload(editorGraphPayloadSchema, payload, 'Invalid graph payload');

    return this.writeGraph(botId, ownerId, 'Graph save failed', async (tx) => {
      const backupId = await this.backupIfPresent(tx, botId);
      if (graph.name) await tx.renameBot(botId, graph.name);
      const result = await this.syncEngine.replaceGraph(tx, botId, graph);
      return { status: 'success' as const, backupId, ...result };
    });
  }

  /**
   * Apply an incremental change set, backing up the previous graph first
   */
  async applyGraphDiff(
    botId: number,
    diff: unknown,
    ownerId?: string
  ): Promise<SaveResult> {
    const changes = parsePayload(graphDiffSchema, diff, 'Invalid graph diff');

    return this.writeGraph(botId, ownerId, 'Graph diff failed', async (tx) => {
      const backupId = await this.backupIfPresent(tx, botId);
      const result = await this.syncEngine.applyDiff(tx, botId, changes);
      return { status: 'success' as const, backupId, ...result };
    });
  }

  async listBackups(botId: number, ownerId?: string): Promise<BackupSummary[]> {
    await this.requireBot(botId, ownerId);
    return this.backups.listBackups(botId);
  }

  /**
   * Replay a backup through the full graph write
   */
  async restoreBackup(
    botId: number,
    backupId: string,
    ownerId?: string
  ): Promise<RestoreResult> {
    return this.writeGraph(botId, ownerId, 'Backup restore failed', async (tx) => {
      const backup = await this.backups.getBackup(botId, backupId, tx);
      const graph = parsePayload(
        editorGraphPayloadSchema,
        backup.graph,
        `Backup ${backupId} is not a valid graph`
      );
      const result = await this.syncEngine.replaceGraph(tx, botId, graph);
      this.logger.info('Backup restored', { botId, backupId, version: backup.version });
      return { status: 'success' as const, backupId, version: backup.version, ...result };
    });
  }

  /**
   * Replace the graph with an ordered list of flows (bot creation and
   * templates). No backup is taken.
   */
  async seedGraph(botId: number, input: unknown): Promise<SyncResult> {
    const seed = parsePayload(legacySeedSchema, input, 'Invalid flows');
    return this.writeGraph(botId, undefined, 'Graph seeding failed', (tx) =>
      this.syncEngine.seedLegacyGraph(tx, botId, seed)
    );
  }

  async chat(request: ChatStepRequest): Promise<ChatStepResult> {
    return this.chatRuntime.step(request);
  }

  /**
   * Remove everything stored for a bot's graph, for use when the bot itself
   * is deleted
   */
  async deleteBotGraph(botId: number): Promise<void> {
    await this.locks.runExclusive(botId, async () => {
      await runTransaction(this.adapter, this.logger, 'Graph delete failed', (tx) =>
        tx.purgeBot(botId)
      );
      this.cache.invalidateBot(botId);
    });
    this.logger.info('Bot graph deleted', { botId });
  }

  /**
   * Live graph for the chat runtime, cached like the editor view
   */
  private async loadLiveGraph(botId: number): Promise<LoadedGraph> {
    const key = botCacheKey(botId, 'live');
    const cached = this.cache.get(key);
    if (cached.found && cached.value.view === 'live') return cached.value.graph;

    const generation = this.cache.generation(botId);
    const graph = await this.graphStore.load(botId);
    this.cache.setIfCurrent(
      botId,
      generation,
      key,
      { view: 'live', graph },
      this.options.cacheTtlSeconds
    );
    return graph;
  }

  /**
   * Serialized per bot, one transaction, cache dropped after commit
   */
  private async writeGraph<T>(
    botId: number,
    ownerId: string | undefined,
    failure: string,
    work: (tx: StorageTransaction) => Promise<T>
  ): Promise<T> {
    return this.locks.runExclusive(botId, async () => {
      const result = await runTransaction(this.adapter, this.logger, failure, async (tx) => {
        await this.requireBotWith(tx, botId, ownerId);
        return work(tx);
      });
      this.cache.invalidateBot(botId);
      return result;
    });
  }

  private async backupIfPresent(
    tx: StorageTransaction,
    botId: number
  ): Promise<string | null> {
    const current = await this.graphStore.loadWith(tx, botId);
    if (current.nodes.length === 0 && current.edges.length === 0) return null;
    const backup = await this.backups.createBackup(tx, botId);
    return backup.id;
  }

  private async requireBot(botId: number, ownerId?: string): Promise<Bot> {
    return this.adapter.read((reader) => this.requireBotWith(reader, botId, ownerId));
  }

  private async requireBotWith(
    reader: StorageReader,
    botId: number,
    ownerId?: string
  ): Promise<Bot> {
    const bot = await reader.getBot(botId);
    if (!bot || (ownerId !== undefined && bot.ownerId !== ownerId)) {
      throw new NotFoundError(`Bot ${botId} not found`);
    }
    return bot;
  }
}
