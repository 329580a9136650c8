/**
 * MemoryStorageAdapter Tests
 * Tests rows, soft deletes, pointers, backups and transaction rollback
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import { MemoryStorageAdapter } from '../src/persistence/memory-adapter';
import type { NewFlowEdge, NewFlowNode } from '../src/types/graph.types';

const newNode = (botId: number, frontendId: string): NewFlowNode => ({
  botId,
  frontendId,
  kind: 'message',
  position: null,
  positionX: 0,
  positionY: 0,
  userMessage: `trigger ${frontendId}`,
  botResponse: `response ${frontendId}`,
  condition: '',
  metadata: null,
});

const newEdge = (
  botId: number,
  sourceNodeId: number,
  targetNodeId: number
): NewFlowEdge => ({
  botId,
  frontendId: `${sourceNodeId}->${targetNodeId}`,
  sourceNodeId,
  targetNodeId,
  condition: '',
  label: null,
  sourceHandle: null,
  targetHandle: null,
  edgeType: 'default',
  animated: true,
  style: null,
  metadata: null,
});

describe('MemoryStorageAdapter', () => {
  let adapter: MemoryStorageAdapter;
  let botId: number;

  beforeEach(async () => {
    adapter = new MemoryStorageAdapter();
    botId = (await adapter.createBot({ name: 'Bot', ownerId: 'owner-1' })).id;
  });

  describe('Bots', () => {
    it('should create bots with sequential ids and zero counters', async () => {
      const second = await adapter.createBot({ name: 'Other' });

      expect(second.id).toBe(botId + 1);
      expect(second).toEqual({
        id: botId + 1,
        name: 'Other',
        ownerId: null,
        messageCount: 0,
        conversationCount: 0,
      });
      expect(adapter.getAllBotIds()).toEqual([botId, botId + 1]);
    });

    it('should rename and count inside a transaction', async () => {
      await adapter.transaction(async (tx) => {
        await tx.renameBot(botId, 'Renamed');
        await tx.incrementBotCounters(botId, { messages: 2, conversations: 1 });
      });

      const bot = await adapter.read((reader) => reader.getBot(botId));
      expect(bot?.name).toBe('Renamed');
      expect(bot?.messageCount).toBe(2);
      expect(bot?.conversationCount).toBe(1);
    });
  });

  describe('Nodes and edges', () => {
    it('should never reuse storage ids', async () => {
      const ids = await adapter.transaction(async (tx) => {
        const a = await tx.insertNode(newNode(botId, 'a'));
        await tx.softDeleteNodes(botId, [a.id]);
        const b = await tx.insertNode(newNode(botId, 'b'));
        return [a.id, b.id];
      });

      expect(ids).toEqual([1, 2]);
    });

    it('should hide soft-deleted rows unless asked for them', async () => {
      await adapter.transaction(async (tx) => {
        const a = await tx.insertNode(newNode(botId, 'a'));
        const b = await tx.insertNode(newNode(botId, 'b'));
        const edge = await tx.insertEdge(newEdge(botId, a.id, b.id));
        expect(await tx.softDeleteNodes(botId, [a.id])).toBe(1);
        expect(await tx.softDeleteEdges(botId, [edge.id])).toBe(1);
      });

      const live = await adapter.read((reader) => reader.listNodes(botId));
      const all = await adapter.read((reader) =>
        reader.listNodes(botId, { includeDeleted: true })
      );
      const edges = await adapter.read((reader) => reader.listEdges(botId));

      expect(live.map((node) => node.frontendId)).toEqual(['b']);
      expect(all.map((node) => node.isDeleted)).toEqual([true, false]);
      expect(edges).toEqual([]);
    });

    it('should count only rows that were live', async () => {
      const counts = await adapter.transaction(async (tx) => {
        const a = await tx.insertNode(newNode(botId, 'a'));
        const first = await tx.softDeleteNodes(botId, [a.id]);
        const second = await tx.softDeleteNodes(botId, [a.id, 999]);
        return [first, second];
      });

      expect(counts).toEqual([1, 0]);
    });

    it('should keep stored values for fields an update leaves undefined', async () => {
      const updated = await adapter.transaction(async (tx) => {
        const a = await tx.insertNode(newNode(botId, 'a'));
        return tx.updateNode(a.id, { botResponse: 'changed', userMessage: undefined });
      });

      expect(updated.userMessage).toBe('trigger a');
      expect(updated.botResponse).toBe('changed');
    });

    it('should hand out copies that cannot change stored rows', async () => {
      await adapter.transaction((tx) => tx.insertNode(newNode(botId, 'a')));

      const [node] = await adapter.read((reader) => reader.listNodes(botId));
      node.userMessage = 'mutated';

      const [again] = await adapter.read((reader) => reader.listNodes(botId));
      expect(again.userMessage).toBe('trigger a');
    });
  });

  describe('Conversation state', () => {
    it('should create the pointer once and move it afterwards', async () => {
      const first = await adapter.transaction((tx) =>
        tx.saveConversationState(botId, 'contact-1', 5)
      );
      const second = await adapter.transaction((tx) =>
        tx.saveConversationState(botId, 'contact-1', 7)
      );

      expect(second.currentNodeId).toBe(7);
      expect(second.createdAt).toEqual(first.createdAt);
      expect(
        await adapter.read((reader) => reader.getConversationState(botId, 'contact-2'))
      ).toBeNull();
    });
  });

  describe('Backups', () => {
    it('should list backups newest version first', async () => {
      await adapter.transaction(async (tx) => {
        for (const version of [1, 3, 2]) {
          await tx.insertBackup({
            id: `backup-${version}`,
            botId,
            version,
            createdAt: new Date(),
            graph: { nodes: [], edges: [] },
          });
        }
      });

      const backups = await adapter.read((reader) => reader.listBackups(botId));
      expect(backups.map((backup) => backup.version)).toEqual([3, 2, 1]);
    });
  });

  describe('Transactions', () => {
    it('should discard every write of a failed transaction', async () => {
      await expect(
        adapter.transaction(async (tx) => {
          await tx.insertNode(newNode(botId, 'a'));
          await tx.renameBot(botId, 'Lost');
          throw new Error('boom');
        })
      ).rejects.toThrow('boom');

      expect(await adapter.read((reader) => reader.listNodes(botId))).toEqual([]);
      expect((await adapter.read((reader) => reader.getBot(botId)))?.name).toBe('Bot');
    });

    it('should keep working after a failed transaction', async () => {
      await expect(
        adapter.transaction(async () => {
          throw new Error('first');
        })
      ).rejects.toThrow('first');

      const node = await adapter.transaction((tx) => tx.insertNode(newNode(botId, 'a')));
      expect(node.id).toBe(1);
    });

    it('should run concurrent transactions one after another', async () => {
      const order: string[] = [];
      await Promise.all([
        adapter.transaction(async (tx) => {
          order.push('first:start');
          await new Promise((resolve) => setTimeout(resolve, 10));
          await tx.insertNode(newNode(botId, 'a'));
          order.push('first:end');
        }),
        adapter.transaction(async (tx) => {
          order.push('second:start');
          await tx.insertNode(newNode(botId, 'b'));
          order.push('second:end');
        }),
      ]);

      expect(order).toEqual(['first:start', 'first:end', 'second:start', 'second:end']);
      const nodes = await adapter.read((reader) => reader.listNodes(botId));
      expect(nodes.map((node) => node.id)).toEqual([1, 2]);
    });
  });

  describe('Purge', () => {
    it('should remove only the purged bot', async () => {
      const other = await adapter.createBot({ name: 'Other' });
      await adapter.transaction(async (tx) => {
        await tx.insertNode(newNode(botId, 'a'));
        await tx.insertNode(newNode(other.id, 'b'));
        await tx.saveConversationState(botId, 'contact-1', 1);
      });

      await adapter.transaction((tx) => tx.purgeBot(botId));

      const mine = await adapter.read((reader) =>
        reader.listNodes(botId, { includeDeleted: true })
      );
      const theirs = await adapter.read((reader) => reader.listNodes(other.id));
      expect(mine).toEqual([]);
      expect(theirs).toHaveLength(1);
      expect(
        await adapter.read((reader) => reader.getConversationState(botId, 'contact-1'))
      ).toBeNull();
    });

    it('should drop everything on clearAll', async () => {
      adapter.clearAll();
      expect(adapter.getAllBotIds()).toEqual([]);
    });
  });
});
