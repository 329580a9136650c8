/**
 * Versioned, bounded snapshots of a bot's graph
 * Backups are stored through the storage adapter so they survive restarts
 */

import { v4 as uuidv4 } from 'uuid';
import { NotFoundError } from '../errors';
import { GraphStore } from '../graph-store';
import type { Logger } from '../logger';
import {
  StorageAdapter,
  StorageReader,
  StorageTransaction,
} from '../persistence/storage-adapter';
import type { Backup, BackupSummary } from '../types/graph.types';

/**
 * Oldest first: by creation time, then by version for backups taken in
 * the same millisecond
 */
function byAge(a: Backup, b: Backup): number {
  return a.createdAt.getTime() - b.createdAt.getTime() || a.version - b.version;
}

export class BackupManager {
  constructor(
    private readonly adapter: StorageAdapter,
    private readonly graphStore: GraphStore,
    private readonly maxBackups: number,
    private readonly logger: Logger
  ) {}

  /**
   * Snapshot the live graph as the next version, then evict the oldest
   * backups beyond the retention limit. Runs in the caller's transaction.
   */
  async createBackup(tx: StorageTransaction, botId: number): Promise<Backup> {
    const graph = await this.graphStore.loadWith(tx, botId);
    const existing = await tx.listBackups(botId);
    const version =
      existing.reduce((max, backup) => Math.max(max, backup.version), 0) + 1;

    const backup: Backup = {
      id: uuidv4(),
      botId,
      version,
      createdAt: new Date(),
      graph: this.graphStore.snapshot(graph),
    };
    await tx.insertBackup(backup);
    this.logger.info('Backup created', { botId, backupId: backup.id, version });

    const retained = [...existing, backup].sort(byAge);
    const excess = retained.length - this.maxBackups;
    if (excess > 0) {
      const evicted = retained.slice(0, excess).map((old) => old.id);
      await tx.deleteBackups(evicted);
      this.logger.info('Old backups evicted', { botId, evicted });
    }

    return backup;
  }

  /**
   * Backups of a bot, newest version first
   */
  async listBackups(botId: number): Promise<BackupSummary[]> {
    const backups = await this.adapter.read((reader) => reader.listBackups(botId));
    return backups
      .sort((a, b) => b.version - a.version)
      .map(({ id, version, createdAt }) => ({ id, version, timestamp: createdAt }));
  }

  /**
   * Fetch a backup that must belong to `botId`. Pass `reader` to read
   * inside an open transaction.
   */
  async getBackup(
    botId: number,
    backupId: string,
    reader?: StorageReader
  ): Promise<Backup> {
    const backup = reader
      ? await reader.getBackup(backupId)
      : await this.adapter.read((committed) => committed.getBackup(backupId));

    // a backup of another bot is reported exactly like a missing one
    if (!backup || backup.botId !== botId) {
      throw new NotFoundError(`Backup ${backupId} not found`);
    }
    return backup;
  }
}
