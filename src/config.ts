import { z } from 'zod';
import {
  DEFAULT_CACHE_TTL_SECONDS,
  DEFAULT_OPTION_LABEL,
  DEFAULT_REPLY,
  FALLBACK_MESSAGE,
  MAX_BACKUPS,
} from './constants';
import { ValidationError } from './errors';

/**
 * Tunables of the flow engine. Every field has a default.
 */
export const flowEngineOptionsSchema = z.object({
  cacheTtlSeconds: z.number().int().positive().default(DEFAULT_CACHE_TTL_SECONDS),
  maxBackups: z.number().int().positive().default(MAX_BACKUPS),
  fallbackMessage: z.string().min(1).default(FALLBACK_MESSAGE),
  defaultReply: z.string().min(1).default(DEFAULT_REPLY),
  defaultOptionLabel: z.string().min(1).default(DEFAULT_OPTION_LABEL),
});

export type FlowEngineOptions = z.infer<typeof flowEngineOptionsSchema>;

export type FlowEngineOptionsInput = z.input<typeof flowEngineOptionsSchema>;

export function resolveOptions(
  input: FlowEngineOptionsInput = {}
): FlowEngineOptions {
  const parsed = flowEngineOptionsSchema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError(
      'Invalid flow engine options',
      parsed.error.issues.map(
        (issue) => `${issue.path.join('.')}: ${issue.message}`
      )
    );
  }
  return parsed.data;
}

type Env = Record<string, string | undefined>;

const intFromEnv = z.coerce.number().int().positive();

function readInt(env: Env, key: string): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return undefined;
  const parsed = intFromEnv.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError(`${key} must be a positive integer`, [
      `${key}=${raw}`,
    ]);
  }
  return parsed.data;
}

/**
 * Reads engine options from environment variables:
 * FLOW_CACHE_TTL_SECONDS, FLOW_MAX_BACKUPS, FLOW_FALLBACK_MESSAGE
 */
export function optionsFromEnv(env: Env = process.env): FlowEngineOptions {
  return resolveOptions({
    cacheTtlSeconds: readInt(env, 'FLOW_CACHE_TTL_SECONDS'),
    maxBackups: readInt(env, 'FLOW_MAX_BACKUPS'),
    fallbackMessage: env.FLOW_FALLBACK_MESSAGE || undefined,
  });
}

export const mongoStorageOptionsSchema = z.object({
  uri: z.string().min(1),
  database: z.string().min(1),
  collectionPrefix: z.string().default('flow_'),
});

/**
 * MongoDB connection settings
 */
export type MongoStorageOptions = z.input<typeof mongoStorageOptionsSchema>;

/**
 * Reads MONGO_URI, MONGO_DATABASE and MONGO_COLLECTION_PREFIX
 */
export function mongoOptionsFromEnv(
  env: Env = process.env
): z.infer<typeof mongoStorageOptionsSchema> {
  const parsed = mongoStorageOptionsSchema.safeParse({
    uri: env.MONGO_URI,
    database: env.MONGO_DATABASE,
    collectionPrefix: env.MONGO_COLLECTION_PREFIX || undefined,
  });
  if (!parsed.success) {
    throw new ValidationError(
      'MONGO_URI and MONGO_DATABASE must be set',
      parsed.error.issues.map(
        (issue) => `${issue.path.join('.')}: ${issue.message}`
      )
    );
  }
  return parsed.data;
}
