/**
 * Conversation and bot bookkeeping types.
 *
 * Nothing here is held in memory between chat steps: every step reloads
 * the pointer from storage and writes it back.
 */

/**
 * Minimal view of a bot the engine needs. Bots themselves are created
 * and listed elsewhere.
 */
export interface Bot {
  id: number;
  name: string;
  ownerId: string | null;
  messageCount: number;
  conversationCount: number;
}

export type NewBot = Pick<Bot, 'name'> & Partial<Pick<Bot, 'ownerId'>>;

/**
 * Where one contact currently stands in one bot's graph
 */
export interface ConversationState {
  botId: number;
  contactIdentifier: string;
  currentNodeId: number;
  createdAt: Date;
  updatedAt: Date;
}

export type CounterIncrement = {
  messages?: number;
  conversations?: number;
};

export type ChatHistoryEntry = {
  role: 'user' | 'bot';
  message: string;
  flowId?: number | null;
};

export type ChatOption = {
  /** Storage id of the node the option leads to */
  id: number;
  label: string;
  message: string;
};

/**
 * How the traversal engine picked the next node
 */
export type TraversalReason =
  | 'edge-exact'
  | 'edge-contains'
  | 'edge-default'
  | 'end-reset'
  | 'trigger-match'
  | 'start'
  | 'exhausted';

export type ChatStepRequest = {
  botId: number;
  message: string;
  /** Identifies the contact whose pointer is stored between steps */
  contact?: string;
  /** Pointer carried by the client when no contact is given */
  currentFlowId?: number | null;
  conversationHistory?: ChatHistoryEntry[];
};

export type ChatStepResult = {
  response: string;
  conversationHistory: ChatHistoryEntry[];
  currentFlowId: number | null;
  isDecision: boolean;
  options: ChatOption[];
  /** How the next node was chosen */
  reason: TraversalReason;
};
