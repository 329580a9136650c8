export * from './types/graph.types';
export * from './types/state.types';
export * from './constants';
export * from './config';
export * from './errors';
export * from './logger';
export * from './schema/editor-schema';
export * from './persistence/storage-adapter';
export * from './persistence/memory-adapter';
export * from './persistence/mongo-adapter';
export * from './graph-store';
export * from './sync/sync-engine';
export * from './sync/diff';
export * from './backup/backup-manager';
export * from './cache/read-cache';
export * from './traversal/traversal-engine';
export * from './chat/chat-runtime';
export * from './flow-service';
export * from './util/keyed-mutex';
