/**
 * One chat step: load the contact's pointer, traverse, store the pointer.
 * Nothing about a conversation is kept in memory between steps.
 */

import { DECISION } from '../constants';
import type { FlowEngineOptions } from '../config';
import { NotFoundError } from '../errors';
import type { Logger } from '../logger';
import { runTransaction, StorageAdapter } from '../persistence/storage-adapter';
import {
  chatStepRequestSchema,
  parsePayload,
  wireChatRequestSchema,
} from '../schema/editor-schema';
import { buildOptions, resolveNextNode } from '../traversal/traversal-engine';
import type { LoadedGraph } from '../types/graph.types';
import type {
  ChatHistoryEntry,
  ChatOption,
  ChatStepRequest,
  ChatStepResult,
} from '../types/state.types';

export type GraphLoader = (botId: number) => Promise<LoadedGraph>;

/**
 * Chat step response as sent over the wire
 */
export type WireChatResponse = {
  response: string;
  conversation_history: { role: 'user' | 'bot'; message: string; flow_id?: number | null }[];
  current_flow_id: number | null;
  is_decision: boolean;
  options: ChatOption[];
};

export class ChatRuntime {
  constructor(
    private readonly adapter: StorageAdapter,
    private readonly loadGraph: GraphLoader,
    private readonly options: FlowEngineOptions,
    private readonly logger: Logger
  ) {}

  async step(request: ChatStepRequest): Promise<ChatStepResult> {
    const input = parsePayload(chatStepRequestSchema, request, 'Invalid chat request');

    const bot = await this.adapter.read((reader) => reader.getBot(input.botId));
    if (!bot) {
      throw new NotFoundError(`Bot ${input.botId} not found`);
    }
    const graph = await this.loadGraph(bot.id);

    return runTransaction(this.adapter, this.logger, 'Chat step failed', async (tx) => {
      const contact = input.contact;
      const state = contact ? await tx.getConversationState(bot.id, contact) : null;
      const currentNodeId = contact
        ? state?.currentNodeId ?? null
        : input.currentFlowId ?? null;

      const outcome = resolveNextNode(graph, currentNodeId, input.message);
      this.logger.debug('Next node resolved', {
        botId: bot.id,
        from: currentNodeId,
        to: outcome.node?.id ?? null,
        reason: outcome.reason,
      });

      if (outcome.node && contact) {
        await tx.saveConversationState(bot.id, contact, outcome.node.id);
      }
      // a conversation starts when a new contact's pointer is first stored
      await tx.incrementBotCounters(bot.id, {
        messages: 1,
        conversations: outcome.node && contact && !state ? 1 : 0,
      });

      const node = outcome.node;
      const response = node
        ? node.botResponse || this.options.defaultReply
        : this.options.fallbackMessage;
      // an exhausted step leaves a stored pointer where it was
      const currentFlowId = node ? node.id : state?.currentNodeId ?? null;

      const conversationHistory: ChatHistoryEntry[] = [
        ...input.conversationHistory,
        { role: 'user', message: input.message },
        { role: 'bot', message: response, flowId: currentFlowId },
      ];

      return {
        response,
        conversationHistory,
        currentFlowId,
        isDecision: node?.kind === DECISION,
        options: node ? buildOptions(graph, node, this.options.defaultOptionLabel) : [],
        reason: outcome.reason,
      };
    });
  }
}

/**
 * Reads a snake_case chat request into a step request for `botId`
 */
export function parseWireChatRequest(
  botId: number,
  body: unknown,
  contact?: string
): ChatStepRequest {
  const wire = parsePayload(wireChatRequestSchema, body, 'Invalid chat request');
  return {
    botId,
    message: wire.message,
    contact,
    currentFlowId: wire.current_flow_id ?? null,
    conversationHistory: wire.conversation_history.map((entry) => ({
      role: entry.role,
      message: entry.message,
      flowId: entry.flow_id,
    })),
  };
}

export function toWireChatResponse(result: ChatStepResult): WireChatResponse {
  return {
    response: result.response,
    conversation_history: result.conversationHistory.map((entry) =>
      entry.flowId === undefined
        ? { role: entry.role, message: entry.message }
        : { role: entry.role, message: entry.message, flow_id: entry.flowId }
    ),
    current_flow_id: result.currentFlowId,
    is_decision: result.isDecision,
    options: result.options.map((option) => ({ ...option })),
  };
}
