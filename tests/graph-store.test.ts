/**
 * GraphStore Tests
 * Live graph ordering and the editor read shape
 */

import { describe, it, expect } from '@jest/globals';
import { GraphStore, editorId, snapshotGraph, toEditorGraph } from '../src/graph-store';
import { silentLogger, type Logger } from '../src/logger';
import { makeEdge, makeNode, setupBot } from './helpers';

describe('GraphStore', () => {
  describe('load', () => {
    it('should order legacy positions first, then by id', async () => {
      const { adapter, bot } = await setupBot();
      await adapter.transaction(async (tx) => {
        const base = {
          botId: bot.id,
          kind: 'message',
          positionX: 0,
          positionY: 0,
          botResponse: 'r',
          condition: '',
          metadata: null,
        };
        await tx.insertNode({ ...base, frontendId: 'free', position: null, userMessage: 'free' });
        await tx.insertNode({ ...base, frontendId: 'second', position: 1, userMessage: 'second' });
        await tx.insertNode({ ...base, frontendId: 'first', position: 0, userMessage: 'first' });
      });

      const graph = await new GraphStore(adapter, silentLogger).load(bot.id);
      expect(graph.nodes.map((node) => node.frontendId)).toEqual(['first', 'second', 'free']);
    });

    it('should drop and log edges that point at deleted nodes', async () => {
      const { adapter, bot } = await setupBot();
      const warnings: string[] = [];
      const logger: Logger = { ...silentLogger, warn: (message) => warnings.push(message) };

      await adapter.transaction(async (tx) => {
        const node = {
          botId: bot.id,
          frontendId: null,
          kind: 'message',
          position: null,
          positionX: 0,
          positionY: 0,
          userMessage: 'u',
          botResponse: 'r',
          condition: '',
          metadata: null,
        };
        const a = await tx.insertNode(node);
        const b = await tx.insertNode(node);
        await tx.insertEdge({
          botId: bot.id,
          frontendId: 'ab',
          sourceNodeId: a.id,
          targetNodeId: b.id,
          condition: '',
          label: null,
          sourceHandle: null,
          targetHandle: null,
          edgeType: 'default',
          animated: true,
          style: null,
          metadata: null,
        });
        await tx.softDeleteNodes(bot.id, [b.id]);
      });

      const graph = await new GraphStore(adapter, logger).load(bot.id);
      expect(graph.nodes).toHaveLength(1);
      expect(graph.edges).toEqual([]);
      expect(warnings).toEqual(['Ignoring edge with a missing endpoint']);
    });
  });

  describe('toEditorGraph', () => {
    const start = makeNode(1, 'start', '', 'Welcome');
    const decision = { ...makeNode(2, 'decision', 'hola', '¿Sí o no?'), frontendId: null };
    const yes = { ...makeNode(3, 'message', 'sí', 'Perfecto'), metadata: { tag: 'yes' } };

    it('should fall back to the storage id when there is no frontend id', () => {
      expect(editorId(decision)).toBe('2');
      expect(editorId(start)).toBe('n1');
    });

    it('should emit the editor read shape', () => {
      const graph = toEditorGraph(
        {
          nodes: [start, decision, yes],
          edges: [
            makeEdge(10, 1, 2),
            { ...makeEdge(11, 2, 3, 'sí'), style: { stroke: '#f00' } },
          ],
        },
        'Support bot'
      );

      expect(graph).toEqual({
        name: 'Support bot',
        nodes: [
          { id: 'n1', type: 'start', position: { x: 0, y: 0 }, data: { label: '', message: 'Welcome' } },
          { id: '2', type: 'decision', position: { x: 0, y: 0 }, data: { label: 'hola', message: '¿Sí o no?' } },
          {
            id: 'n3',
            type: 'message',
            position: { x: 0, y: 0 },
            data: { label: 'sí', message: 'Perfecto' },
            metadata: { tag: 'yes' },
          },
        ],
        edges: [
          {
            id: 'e10',
            source: 'n1',
            target: '2',
            sourceHandle: null,
            targetHandle: null,
            type: 'default',
            animated: true,
          },
          {
            id: 'e11',
            source: '2',
            target: 'n3',
            sourceHandle: null,
            targetHandle: null,
            type: 'default',
            animated: true,
            label: 'sí',
            style: { stroke: '#f00' },
          },
        ],
      });
    });

    it('should emit a condition only when it differs from the label', () => {
      const edge = { ...makeEdge(10, 1, 3, 'si'), label: 'Sí' };
      const { edges } = snapshotGraph({ nodes: [start, yes], edges: [edge] });

      expect(edges[0].label).toBe('Sí');
      expect(edges[0].condition).toBe('si');
    });

    it('should keep an empty condition under a label', () => {
      const edge = { ...makeEdge(10, 1, 3), label: 'Continuar' };
      const { edges } = snapshotGraph({ nodes: [start, yes], edges: [edge] });

      expect(edges[0]).toMatchObject({ label: 'Continuar', condition: '' });
    });
  });
});
