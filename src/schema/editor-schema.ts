/**
 * Zod schemas for everything that enters the engine from outside:
 * editor submissions, incremental diffs, legacy seed input and chat steps.
 * Unknown fields are stripped.
 */

import { z } from 'zod';
import { DEFAULT_EDGE_TYPE, MESSAGE } from '../constants';
import { ValidationError } from '../errors';

const jsonObject = z.record(z.unknown());

/** Editors send ids as strings, older clients sometimes as numbers */
const entityId = z.union([z.string().min(1), z.number()]).transform(String);

const optionalText = z
  .string()
  .nullish()
  .transform((value) => value ?? undefined);

export const editorNodeSchema = z.object({
  id: entityId.optional(),
  type: z.string().min(1).default(MESSAGE),
  position: z
    .object({
      x: z.number().default(0),
      y: z.number().default(0),
    })
    .default({}),
  data: z
    .object({
      label: z.string().nullish().transform((value) => value ?? ''),
      message: z.string().nullish().transform((value) => value ?? ''),
    })
    .default({}),
  metadata: jsonObject.nullish().transform((value) => value ?? null),
});

export type EditorNodeInput = z.infer<typeof editorNodeSchema>;

export const editorEdgeSchema = z.object({
  id: entityId.optional(),
  source: entityId,
  target: entityId,
  sourceHandle: z.string().nullish().transform((value) => value || null),
  targetHandle: z.string().nullish().transform((value) => value || null),
  type: z.string().min(1).default(DEFAULT_EDGE_TYPE),
  animated: z.boolean().default(true),
  label: optionalText,
  condition: optionalText,
  style: jsonObject.nullish().transform((value) => value ?? null),
  metadata: jsonObject.nullish().transform((value) => value ?? null),
});

export type EditorEdgeInput = z.infer<typeof editorEdgeSchema>;

export const editorGraphPayloadSchema = z.object(
  {
    nodes: z.array(editorNodeSchema, {
      required_error: 'nodes is required',
    }),
    edges: z.array(editorEdgeSchema, {
      required_error: 'edges is required',
    }),
    name: z.string().trim().min(1).optional(),
  },
  { invalid_type_error: 'graph payload must be an object' }
);

export type EditorGraphPayload = z.infer<typeof editorGraphPayloadSchema>;

/**
 * Partial node used by diff updates: only the fields present are changed
 */
export const editorNodePatchSchema = z.object({
  id: entityId,
  type: z.string().min(1).optional(),
  position: z
    .object({ x: z.number().optional(), y: z.number().optional() })
    .optional(),
  data: z
    .object({
      label: z.string().optional(),
      message: z.string().optional(),
    })
    .optional(),
  metadata: jsonObject.optional(),
});

export type EditorNodePatch = z.infer<typeof editorNodePatchSchema>;

export const editorEdgePatchSchema = z.object({
  id: entityId,
  source: entityId.optional(),
  target: entityId.optional(),
  sourceHandle: z.string().nullable().optional(),
  targetHandle: z.string().nullable().optional(),
  type: z.string().min(1).optional(),
  animated: z.boolean().optional(),
  label: z.string().nullable().optional(),
  condition: z.string().optional(),
  style: jsonObject.nullable().optional(),
  metadata: jsonObject.optional(),
});

export type EditorEdgePatch = z.infer<typeof editorEdgePatchSchema>;

const SNAKE_DIFF_KEYS: Record<string, string> = {
  nodes_to_create: 'nodesToCreate',
  nodes_to_update: 'nodesToUpdate',
  nodes_to_delete: 'nodesToDelete',
  edges_to_create: 'edgesToCreate',
  edges_to_update: 'edgesToUpdate',
  edges_to_delete: 'edgesToDelete',
};

function camelizeDiffKeys(input: unknown): unknown {
  if (typeof input !== 'object' || input === null || Array.isArray(input)) {
    return input;
  }
  return Object.fromEntries(
    Object.entries(input).map(([key, value]) => [
      SNAKE_DIFF_KEYS[key] ?? key,
      value,
    ])
  );
}

/**
 * Incremental change set. Accepts camelCase keys or the snake_case keys
 * older editor builds send.
 */
export const graphDiffSchema = z.preprocess(
  camelizeDiffKeys,
  z.object({
    nodesToCreate: z.array(editorNodeSchema).default([]),
    nodesToUpdate: z.array(editorNodePatchSchema).default([]),
    nodesToDelete: z.array(entityId).default([]),
    edgesToCreate: z.array(editorEdgeSchema).default([]),
    edgesToUpdate: z.array(editorEdgePatchSchema).default([]),
    edgesToDelete: z.array(entityId).default([]),
  })
);

export type GraphDiff = z.infer<typeof graphDiffSchema>;

export const legacySeedSchema = z.object({
  flows: z.array(
    z.object({
      userMessage: z.string(),
      botResponse: z.string(),
      intent: z.string().min(1).optional(),
      condition: z.string().optional(),
      positionX: z.number().optional(),
      positionY: z.number().optional(),
    })
  ),
  edges: z
    .array(z.object({ source: entityId, target: entityId }))
    .default([]),
});

export type LegacySeedInput = z.input<typeof legacySeedSchema>;

export type LegacySeed = z.infer<typeof legacySeedSchema>;

export const chatHistoryEntrySchema = z.object({
  role: z.enum(['user', 'bot']),
  message: z.string(),
  flowId: z.number().int().nullable().optional(),
});

export const chatStepRequestSchema = z.object({
  botId: z.number().int(),
  message: z.string().trim().min(1, 'message is required'),
  contact: z.string().min(1).optional(),
  currentFlowId: z.number().int().nullable().optional(),
  conversationHistory: z.array(chatHistoryEntrySchema).default([]),
});

/**
 * Chat step as it arrives over the wire (snake_case)
 */
export const wireChatRequestSchema = z.object({
  message: z.string({ required_error: 'message is required' }),
  current_flow_id: z.number().int().nullable().optional(),
  conversation_history: z
    .array(
      z.object({
        role: z.enum(['user', 'bot']),
        message: z.string(),
        flow_id: z.number().int().nullable().optional(),
      })
    )
    .default([]),
});

export type WireChatRequest = z.input<typeof wireChatRequestSchema>;

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0
      ? `${issue.path.join('.')}: ${issue.message}`
      : issue.message
  );
}

/**
 * Parses `input` with `schema`, raising a ValidationError that lists every
 * issue instead of a ZodError.
 */
export function parsePayload<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
  message: string
): z.infer<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError(message, formatIssues(parsed.error));
  }
  return parsed.data;
}
