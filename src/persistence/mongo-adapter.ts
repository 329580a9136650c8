/**
 * MongoDB storage adapter for persistent graphs, pointers and backups
 * Transactions need a replica set (a single-node replica set is enough)
 */

import {
  MongoClient,
  type ClientSession,
  type Collection,
  type Db,
} from 'mongodb';
import {
  ListOptions,
  stripUndefined,
  StorageAdapter,
  StorageReader,
  StorageTransaction,
} from './storage-adapter';
import { mongoStorageOptionsSchema, type MongoStorageOptions } from '../config';
import { parsePayload } from '../schema/editor-schema';
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

/** Stored shape of an entity: its `id` lives in `_id` */
export type StoredDocument<T extends { id: number | string }> = Omit<T, 'id'> & {
  _id: T['id'];
};

export type BotDocument = StoredDocument<Bot>;
export type NodeDocument = StoredDocument<FlowNode>;
export type EdgeDocument = StoredDocument<FlowEdge>;
export type BackupDocument = StoredDocument<Backup>;
export type ConversationStateDocument = ConversationState & { _id: string };
type CounterDocument = { _id: string; seq: number };

export function toDocument<T extends { id: number | string }>(
  entity: T
): StoredDocument<T> {
  const { id, ...rest } = entity;
  return { ...rest, _id: id };
}

export function fromDocument<D extends { _id: unknown }>(
  doc: D
): Omit<D, '_id'> & { id: D['_id'] } {
  const { _id, ...rest } = doc;
  return { ...rest, id: _id };
}

export function conversationStateId(botId: number, contact: string): string {
  return `${botId}:${contact}`;
}

function stripStateId(doc: ConversationStateDocument): ConversationState {
  const { _id, ...state } = doc;
  return state;
}

type Collections = {
  bots: Collection<BotDocument>;
  nodes: Collection<NodeDocument>;
  edges: Collection<EdgeDocument>;
  conversationStates: Collection<ConversationStateDocument>;
  backups: Collection<BackupDocument>;
  counters: Collection<CounterDocument>;
};

class MongoReader implements StorageReader {
  constructor(
    protected readonly collections: Collections,
    protected readonly session?: ClientSession
  ) {}

  async getBot(botId: number): Promise<Bot | null> {
    const doc = await this.collections.bots.findOne(
      { _id: botId },
      { session: this.session }
    );
    return doc ? fromDocument(doc) : null;
  }

  async listNodes(botId: number, options: ListOptions = {}): Promise<FlowNode[]> {
    const docs = await this.collections.nodes
      .find(
        options.includeDeleted ? { botId } : { botId, isDeleted: false },
        { sort: { _id: 1 }, session: this.session }
      )
      .toArray();
    return docs.map((doc) => fromDocument(doc));
  }

  async listEdges(botId: number, options: ListOptions = {}): Promise<FlowEdge[]> {
    const docs = await this.collections.edges
      .find(
        options.includeDeleted ? { botId } : { botId, isDeleted: false },
        { sort: { _id: 1 }, session: this.session }
      )
      .toArray();
    return docs.map((doc) => fromDocument(doc));
  }

  async getConversationState(
    botId: number,
    contactIdentifier: string
  ): Promise<ConversationState | null> {
    const doc = await this.collections.conversationStates.findOne(
      { _id: conversationStateId(botId, contactIdentifier) },
      { session: this.session }
    );
    return doc ? stripStateId(doc) : null;
  }

  async listBackups(botId: number): Promise<Backup[]> {
    const docs = await this.collections.backups
      .find({ botId }, { sort: { version: -1 }, session: this.session })
      .toArray();
    return docs.map((doc) => fromDocument(doc));
  }

  async getBackup(backupId: string): Promise<Backup | null> {
    const doc = await this.collections.backups.findOne(
      { _id: backupId },
      { session: this.session }
    );
    return doc ? fromDocument(doc) : null;
  }
}

class MongoTransaction extends MongoReader implements StorageTransaction {
  async renameBot(botId: number, name: string): Promise<void> {
    await this.collections.bots.updateOne(
      { _id: botId },
      { $set: { name } },
      { session: this.session }
    );
  }

  async incrementBotCounters(
    botId: number,
    increment: CounterIncrement
  ): Promise<void> {
    await this.collections.bots.updateOne(
      { _id: botId },
      {
        $inc: {
          messageCount: increment.messages ?? 0,
          conversationCount: increment.conversations ?? 0,
        },
      },
      { session: this.session }
    );
  }

  async insertNode(node: NewFlowNode): Promise<FlowNode> {
    const now = new Date();
    const row: FlowNode = {
      ...node,
      id: await nextSequence(this.collections.counters, 'nodes', this.session),
      isDeleted: false,
      createdAt: now,
      updatedAt: now,
    };
    await this.collections.nodes.insertOne(toDocument(row), {
      session: this.session,
    });
    return row;
  }

  async updateNode(nodeId: number, update: FlowNodeUpdate): Promise<FlowNode> {
    const doc = await this.collections.nodes.findOneAndUpdate(
      { _id: nodeId },
      { $set: { ...stripUndefined(update), updatedAt: new Date() } },
      { returnDocument: 'after', session: this.session }
    );
    if (!doc) throw new Error(`Node ${nodeId} does not exist`);
    return fromDocument(doc);
  }

  async softDeleteNodes(botId: number, nodeIds: number[]): Promise<number> {
    if (nodeIds.length === 0) return 0;
    const result = await this.collections.nodes.updateMany(
      { _id: { $in: nodeIds }, botId, isDeleted: false },
      { $set: { isDeleted: true, updatedAt: new Date() } },
      { session: this.session }
    );
    return result.modifiedCount;
  }

  async insertEdge(edge: NewFlowEdge): Promise<FlowEdge> {
    const now = new Date();
    const row: FlowEdge = {
      ...edge,
      id: await nextSequence(this.collections.counters, 'edges', this.session),
      isDeleted: false,
      createdAt: now,
      updatedAt: now,
    };
    await this.collections.edges.insertOne(toDocument(row), {
      session: this.session,
    });
    return row;
  }

  async updateEdge(edgeId: number, update: FlowEdgeUpdate): Promise<FlowEdge> {
    const doc = await this.collections.edges.findOneAndUpdate(
      { _id: edgeId },
      { $set: { ...stripUndefined(update), updatedAt: new Date() } },
      { returnDocument: 'after', session: this.session }
    );
    if (!doc) throw new Error(`Edge ${edgeId} does not exist`);
    return fromDocument(doc);
  }

  async softDeleteEdges(botId: number, edgeIds: number[]): Promise<number> {
    if (edgeIds.length === 0) return 0;
    const result = await this.collections.edges.updateMany(
      { _id: { $in: edgeIds }, botId, isDeleted: false },
      { $set: { isDeleted: true, updatedAt: new Date() } },
      { session: this.session }
    );
    return result.modifiedCount;
  }

  async saveConversationState(
    botId: number,
    contactIdentifier: string,
    currentNodeId: number
  ): Promise<ConversationState> {
    const now = new Date();
    const doc = await this.collections.conversationStates.findOneAndUpdate(
      { _id: conversationStateId(botId, contactIdentifier) },
      {
        $set: { currentNodeId, updatedAt: now },
        $setOnInsert: { botId, contactIdentifier, createdAt: now },
      },
      { upsert: true, returnDocument: 'after', session: this.session }
    );
    if (!doc) {
      throw new Error(
        `Conversation state for ${contactIdentifier} on bot ${botId} was not written`
      );
    }
    return stripStateId(doc);
  }

  async insertBackup(backup: Backup): Promise<void> {
    await this.collections.backups.insertOne(toDocument(backup), {
      session: this.session,
    });
  }

  async deleteBackups(backupIds: string[]): Promise<void> {
    if (backupIds.length === 0) return;
    await this.collections.backups.deleteMany(
      { _id: { $in: backupIds } },
      { session: this.session }
    );
  }

  async purgeBot(botId: number): Promise<void> {
    const options = { session: this.session };
    await this.collections.edges.deleteMany({ botId }, options);
    await this.collections.nodes.deleteMany({ botId }, options);
    await this.collections.conversationStates.deleteMany({ botId }, options);
    await this.collections.backups.deleteMany({ botId }, options);
  }
}

async function nextSequence(
  counters: Collection<CounterDocument>,
  name: string,
  session?: ClientSession
): Promise<number> {
  const doc = await counters.findOneAndUpdate(
    { _id: name },
    { $inc: { seq: 1 } },
    { upsert: true, returnDocument: 'after', session }
  );
  if (!doc) throw new Error(`Sequence ${name} could not be incremented`);
  return doc.seq;
}

/**
 * MongoDB-based storage adapter
 * Persists graphs, pointers and backups for production use
 */
export class MongoStorageAdapter extends StorageAdapter {
  private client: MongoClient | null = null;
  private db: Db | null = null;
  private collections: Collections | null = null;
  private readonly options: ReturnType<typeof mongoStorageOptionsSchema.parse>;

  constructor(options: MongoStorageOptions) {
    super();
    this.options = parsePayload(
      mongoStorageOptionsSchema,
      options,
      'Invalid MongoDB options'
    );
  }

  /**
   * Connect to MongoDB
   * Must be called before using the adapter
   */
  async connect(): Promise<void> {
    if (this.collections) {
      return;
    }

    const client = new MongoClient(this.options.uri);
    try {
      await client.connect();
    } catch (error) {
      throw new Error(
        `Failed to connect to MongoDB: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    }

    const db = client.db(this.options.database);
    const prefix = this.options.collectionPrefix;
    const collections: Collections = {
      bots: db.collection<BotDocument>(`${prefix}bots`),
      nodes: db.collection<NodeDocument>(`${prefix}nodes`),
      edges: db.collection<EdgeDocument>(`${prefix}edges`),
      conversationStates: db.collection<ConversationStateDocument>(
        `${prefix}conversation_states`
      ),
      backups: db.collection<BackupDocument>(`${prefix}backups`),
      counters: db.collection<CounterDocument>(`${prefix}counters`),
    };

    // Create indexes for efficient queries
    await collections.nodes.createIndex({ botId: 1, frontendId: 1 });
    await collections.nodes.createIndex({ botId: 1, position: 1 });
    await collections.edges.createIndex({ botId: 1, frontendId: 1 });
    await collections.edges.createIndex({
      botId: 1,
      sourceNodeId: 1,
      targetNodeId: 1,
    });
    await collections.conversationStates.createIndex(
      { botId: 1, contactIdentifier: 1 },
      { unique: true }
    );
    await collections.backups.createIndex(
      { botId: 1, version: -1 },
      { unique: true }
    );

    this.client = client;
    this.db = db;
    this.collections = collections;
  }

  /**
   * Disconnect from MongoDB
   */
  async disconnect(): Promise<void> {
    if (this.client) {
      await this.client.close();
      this.client = null;
      this.db = null;
      this.collections = null;
    }
  }

  /** Database handle, for collaborators sharing the connection */
  getDb(): Db {
    if (!this.db) {
      throw new Error('MongoStorageAdapter is not connected. Call connect() first.');
    }
    return this.db;
  }

  private ensureConnected(): { client: MongoClient; collections: Collections } {
    if (!this.client || !this.collections) {
      throw new Error('MongoStorageAdapter is not connected. Call connect() first.');
    }
    return { client: this.client, collections: this.collections };
  }

  async transaction<T>(work: (tx: StorageTransaction) => Promise<T>): Promise<T> {
    const { client, collections } = this.ensureConnected();
    const session = client.startSession();
    try {
      let outcome: { value: T } | undefined;
      await session.withTransaction(async () => {
        outcome = { value: await work(new MongoTransaction(collections, session)) };
      });
      if (!outcome) throw new Error('Transaction was aborted');
      return outcome.value;
    } finally {
      await session.endSession();
    }
  }

  async read<T>(work: (reader: StorageReader) => Promise<T>): Promise<T> {
    const { collections } = this.ensureConnected();
    return work(new MongoReader(collections));
  }

  async createBot(bot: NewBot): Promise<Bot> {
    const { collections } = this.ensureConnected();
    const row: Bot = {
      id: await nextSequence(collections.counters, 'bots'),
      name: bot.name,
      ownerId: bot.ownerId ?? null,
      messageCount: 0,
      conversationCount: 0,
    };
    await collections.bots.insertOne(toDocument(row));
    return row;
  }
}
