import { START, END, DECISION, MESSAGE, MENU_OPTION } from '../constants';

/**
 * Kind of a conversation step. The well-known kinds drive traversal;
 * anything else is stored and returned untouched.
 */
export type NodeKind =
  | typeof START
  | typeof END
  | typeof DECISION
  | typeof MESSAGE
  | typeof MENU_OPTION
  | (string & {});

export type JsonObject = Record<string, unknown>;

/**
 * A persisted conversation step belonging to one bot
 */
export interface FlowNode {
  /** Storage identity, never reused */
  id: number;
  botId: number;
  /** Stable identifier assigned by the editor, unique among live nodes */
  frontendId: string | null;
  kind: NodeKind;
  /** Legacy contiguous ordering used by seeded graphs; null for editor nodes */
  position: number | null;
  positionX: number;
  positionY: number;
  /** Trigger phrase the user is expected to send */
  userMessage: string;
  botResponse: string;
  /** Legacy per-node condition kept for seeded graphs */
  condition: string;
  metadata: JsonObject | null;
  isDeleted: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export type NewFlowNode = Omit<
  FlowNode,
  'id' | 'isDeleted' | 'createdAt' | 'updatedAt'
>;

export type FlowNodeUpdate = Partial<
  Pick<
    FlowNode,
    | 'frontendId'
    | 'kind'
    | 'positionX'
    | 'positionY'
    | 'userMessage'
    | 'botResponse'
    | 'metadata'
  >
>;

/**
 * A persisted transition between two nodes of the same bot
 */
export interface FlowEdge {
  id: number;
  botId: number;
  frontendId: string | null;
  sourceNodeId: number;
  targetNodeId: number;
  /** Matched against user input during traversal */
  condition: string;
  /** Display text shown by the editor */
  label: string | null;
  sourceHandle: string | null;
  targetHandle: string | null;
  edgeType: string;
  animated: boolean;
  style: JsonObject | null;
  metadata: JsonObject | null;
  isDeleted: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export type NewFlowEdge = Omit<
  FlowEdge,
  'id' | 'isDeleted' | 'createdAt' | 'updatedAt'
>;

export type FlowEdgeUpdate = Partial<
  Pick<
    FlowEdge,
    | 'sourceNodeId'
    | 'targetNodeId'
    | 'condition'
    | 'label'
    | 'sourceHandle'
    | 'targetHandle'
    | 'edgeType'
    | 'animated'
    | 'style'
    | 'metadata'
  >
>;

/**
 * The live graph of one bot as loaded from storage
 */
export type LoadedGraph = {
  nodes: FlowNode[];
  edges: FlowEdge[];
};

export type EditorPosition = { x: number; y: number };

/**
 * Node as exchanged with the visual editor. `id` is the frontend id.
 */
export type EditorNode = {
  id: string;
  type: NodeKind;
  position: EditorPosition;
  data: { label: string; message: string };
  metadata?: JsonObject;
};

/**
 * Edge as exchanged with the visual editor. `source` and `target` are
 * frontend node ids.
 */
export type EditorEdge = {
  id: string;
  source: string;
  target: string;
  sourceHandle: string | null;
  targetHandle: string | null;
  type: string;
  animated: boolean;
  label?: string;
  condition?: string;
  style?: JsonObject;
  metadata?: JsonObject;
};

export type EditorGraph = {
  nodes: EditorNode[];
  edges: EditorEdge[];
  name: string;
};

/** Replay-safe copy of a graph, shaped like an editor submission */
export type BackupGraph = Omit<EditorGraph, 'name'>;

export type DroppedEdgeReason =
  | 'missing-source'
  | 'missing-target'
  | 'missing-endpoints';

/**
 * An edge left out of a write because an endpoint did not resolve
 */
export type DroppedEdge = {
  id: string | null;
  source: string;
  target: string;
  reason: DroppedEdgeReason;
};

export type SyncStats = {
  nodesCreated: number;
  nodesUpdated: number;
  nodesDeleted: number;
  edgesCreated: number;
  edgesUpdated: number;
  edgesDeleted: number;
};

export type SyncResult = {
  stats: SyncStats;
  droppedEdges: DroppedEdge[];
};

/**
 * Immutable, versioned snapshot of a bot's graph
 */
export interface Backup {
  id: string;
  botId: number;
  /** Per-bot version, starting at 1 */
  version: number;
  createdAt: Date;
  graph: BackupGraph;
}

export type BackupSummary = {
  id: string;
  version: number;
  timestamp: Date;
};
