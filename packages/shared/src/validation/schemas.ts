import { z } from 'zod';
import type { Method } from '../types/centrifugo.types.js';

/**
 * Schemas for everything the client reads off the wire.
 * Optional protocol fields get their zero value so callers never branch on absence.
 */

// Stream offsets are uint64 on the server; past 2^53 they no longer compare exactly
const offsetSchema = z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER).default(0);

export const clientInfoSchema = z.object({
  client: z.string().default(''),
  user: z.string().default(''),
  conn_info: z.unknown().optional(),
  chan_info: z.unknown().optional(),
});

export type ClientInfoWire = z.infer<typeof clientInfoSchema>;

export const publicationSchema = z.object({
  data: z.unknown(),
  offset: offsetSchema,
  info: clientInfoSchema.optional(),
  tags: z.record(z.string()).optional(),
});

export type PublicationWire = z.infer<typeof publicationSchema>;

export const replyErrorSchema = z.object({
  code: z.number().int(),
  message: z.string().default(''),
  temporary: z.boolean().default(false),
});

// Reply envelope: the result sits under a key named after the method
export const replyEnvelopeSchema = z
  .object({
    id: z.number().int().positive(),
    error: replyErrorSchema.optional(),
  })
  .passthrough();

export const pushSchema = z.object({
  channel: z.string().default(''),
  pub: publicationSchema.optional(),
  join: z.object({ info: clientInfoSchema }).optional(),
  leave: z.object({ info: clientInfoSchema }).optional(),
  unsubscribe: z
    .object({
      code: z.number().int(),
      reason: z.string().default(''),
    })
    .optional(),
  disconnect: z
    .object({
      code: z.number().int(),
      reason: z.string().default(''),
    })
    .optional(),
  message: z.object({ data: z.unknown() }).optional(),
});

export type Push = z.infer<typeof pushSchema>;

// Result schemas
export const connectResultSchema = z.object({
  client: z.string().min(1, 'Client id is required'),
  version: z.string().default(''),
  data: z.unknown().optional(),
  expires: z.boolean().default(false),
  ttl: z.number().nonnegative().default(0),
  ping: z.number().nonnegative().default(0),
  pong: z.boolean().default(false),
});

export const subscribeResultSchema = z.object({
  recoverable: z.boolean().default(false),
  epoch: z.string().default(''),
  offset: offsetSchema,
  publications: z.array(publicationSchema).default([]),
  recovered: z.boolean().default(false),
  was_recovering: z.boolean().default(false),
  positioned: z.boolean().default(false),
  expires: z.boolean().default(false),
  ttl: z.number().nonnegative().default(0),
  data: z.unknown().optional(),
});

export const emptyResultSchema = z.object({});

export const presenceResultSchema = z.object({
  presence: z.record(clientInfoSchema).default({}),
});

export const presenceStatsResultSchema = z.object({
  num_clients: z.number().int().nonnegative().default(0),
  num_users: z.number().int().nonnegative().default(0),
});

export const historyResultSchema = z.object({
  publications: z.array(publicationSchema).default([]),
  epoch: z.string().default(''),
  offset: offsetSchema,
});

export const rpcResultSchema = z.object({
  data: z.unknown().optional(),
});

export const refreshResultSchema = z.object({
  client: z.string().default(''),
  version: z.string().default(''),
  expires: z.boolean().default(false),
  ttl: z.number().nonnegative().default(0),
});

export const subRefreshResultSchema = z.object({
  expires: z.boolean().default(false),
  ttl: z.number().nonnegative().default(0),
});

export type ConnectResult = z.infer<typeof connectResultSchema>;
export type SubscribeResult = z.infer<typeof subscribeResultSchema>;
export type EmptyResult = z.infer<typeof emptyResultSchema>;
export type PresenceResultWire = z.infer<typeof presenceResultSchema>;
export type PresenceStatsResultWire = z.infer<typeof presenceStatsResultSchema>;
export type HistoryResultWire = z.infer<typeof historyResultSchema>;
export type RpcResultWire = z.infer<typeof rpcResultSchema>;
export type RefreshResult = z.infer<typeof refreshResultSchema>;
export type SubRefreshResult = z.infer<typeof subRefreshResultSchema>;

export interface ResultMap {
  connect: ConnectResult;
  subscribe: SubscribeResult;
  unsubscribe: EmptyResult;
  publish: EmptyResult;
  presence: PresenceResultWire;
  presence_stats: PresenceStatsResultWire;
  history: HistoryResultWire;
  rpc: RpcResultWire;
  refresh: RefreshResult;
  sub_refresh: SubRefreshResult;
}

export const resultSchemas: {
  [M in Method]: z.ZodType<ResultMap[M], z.ZodTypeDef, unknown>;
} = {
  connect: connectResultSchema,
  subscribe: subscribeResultSchema,
  unsubscribe: emptyResultSchema,
  publish: emptyResultSchema,
  presence: presenceResultSchema,
  presence_stats: presenceStatsResultSchema,
  history: historyResultSchema,
  rpc: rpcResultSchema,
  refresh: refreshResultSchema,
  sub_refresh: subRefreshResultSchema,
};

// Validation helper
export function validateFrame<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown
):
  | {
      success: true;
      data: T;
    }
  | {
      success: false;
      error: string;
    } {
  const result = schema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  const errorMessage = result.error.errors
    .map((e) => (e.path.length > 0 ? `${e.path.join('.')}: ${e.message}` : e.message))
    .join(', ');
  return { success: false, error: errorMessage };
}
