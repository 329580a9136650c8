/**
 * BackupManager Tests
 * Versioning, retention and ownership checks
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import { BackupManager } from '../src/backup/backup-manager';
import { NotFoundError } from '../src/errors';
import { GraphStore } from '../src/graph-store';
import { silentLogger } from '../src/logger';
import { MemoryStorageAdapter } from '../src/persistence/memory-adapter';
import { SyncEngine } from '../src/sync/sync-engine';
import type { Backup } from '../src/types/graph.types';
import { editorEdge, editorNode, payload, setupBot } from './helpers';

describe('BackupManager', () => {
  let adapter: MemoryStorageAdapter;
  let botId: number;
  let manager: BackupManager;

  beforeEach(async () => {
    ({ adapter, bot: { id: botId } } = await setupBot());
    manager = new BackupManager(adapter, new GraphStore(adapter, silentLogger), 10, silentLogger);
    await adapter.transaction((tx) =>
      new SyncEngine(silentLogger).replaceGraph(
        tx,
        botId,
        payload(
          [editorNode('a', 'start', '', 'Hola'), editorNode('b', 'message', 'precio', 'Diez')],
          [editorEdge('ab', 'a', 'b', 'precio')]
        )
      )
    );
  });

  it('should snapshot the live graph in editor shape', async () => {
    const backup = await adapter.transaction((tx) => manager.createBackup(tx, botId));

    expect(backup.version).toBe(1);
    expect(backup.botId).toBe(botId);
    expect(backup.graph.nodes.map((node) => node.id)).toEqual(['a', 'b']);
    expect(backup.graph.edges).toEqual([
      {
        id: 'ab',
        source: 'a',
        target: 'b',
        sourceHandle: null,
        targetHandle: null,
        type: 'default',
        animated: true,
        label: 'precio',
      },
    ]);
  });

  it('should keep only the most recent backups', async () => {
    const created: Backup[] = [];
    for (let i = 0; i < 12; i++) {
      created.push(await adapter.transaction((tx) => manager.createBackup(tx, botId)));
    }

    const summaries = await manager.listBackups(botId);
    expect(summaries.map((summary) => summary.version)).toEqual([
      12, 11, 10, 9, 8, 7, 6, 5, 4, 3,
    ]);
    expect(summaries[0].timestamp.getTime()).toBe(created[11].createdAt.getTime());
  });

  it('should keep numbering after evictions', async () => {
    const small = new BackupManager(
      adapter,
      new GraphStore(adapter, silentLogger),
      2,
      silentLogger
    );
    for (let i = 0; i < 3; i++) {
      await adapter.transaction((tx) => small.createBackup(tx, botId));
    }
    const next = await adapter.transaction((tx) => small.createBackup(tx, botId));

    expect(next.version).toBe(4);
    expect((await small.listBackups(botId)).map((summary) => summary.version)).toEqual([4, 3]);
  });

  it('should fetch a backup of the same bot', async () => {
    const created = await adapter.transaction((tx) => manager.createBackup(tx, botId));
    const fetched = await manager.getBackup(botId, created.id);

    expect(fetched.id).toBe(created.id);
    expect(fetched.graph).toEqual(created.graph);
  });

  it('should refuse unknown backups and backups of other bots', async () => {
    const created = await adapter.transaction((tx) => manager.createBackup(tx, botId));
    const other = await adapter.createBot({ name: 'Other' });

    await expect(manager.getBackup(botId, 'missing')).rejects.toThrow(NotFoundError);
    await expect(manager.getBackup(other.id, created.id)).rejects.toThrow(
      new NotFoundError(`Backup ${created.id} not found`)
    );
  });

  it('should list nothing for a bot without backups', async () => {
    expect(await manager.listBackups(botId)).toEqual([]);
  });
});
