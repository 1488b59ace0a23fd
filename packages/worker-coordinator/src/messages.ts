/**
 * @module @sqlite-relay/worker-coordinator
 * Message envelope exchanged on the broadcast bus.
 */

import { z } from 'zod';

const optionalText = z
  .string()
  .nullish()
  .transform((value) => value ?? undefined);

export const queryRequestSchema = z.object({
  type: z.literal('query-request'),
  queryId: z.string().min(1),
  sql: z.string(),
});

export const queryResponseSchema = z.object({
  type: z.literal('query-response'),
  queryId: z.string().min(1),
  result: optionalText,
  error: optionalText,
});

export const leaderAnnouncementSchema = z.object({
  type: z.literal('new-leader'),
  leaderId: z.string().min(1),
});

export const channelMessageSchema = z
  .discriminatedUnion('type', [queryRequestSchema, queryResponseSchema, leaderAnnouncementSchema])
  .refine(
    (message) =>
      message.type !== 'query-response' ||
      message.result !== undefined ||
      message.error !== undefined,
    { message: 'query-response carries neither result nor error' }
  );

export type QueryRequest = z.output<typeof queryRequestSchema>;
export type QueryResponse = z.output<typeof queryResponseSchema>;
export type LeaderAnnouncement = z.output<typeof leaderAnnouncementSchema>;
export type ChannelMessage = z.output<typeof channelMessageSchema>;
export type ChannelMessageType = ChannelMessage['type'];

/** Outcome of a query as carried by a response */
export type QueryOutcome = { result: string } | { error: string };

export function createQueryRequest(queryId: string, sql: string): QueryRequest {
  return { type: 'query-request', queryId, sql };
}

export function createQueryResponse(queryId: string, outcome: QueryOutcome): QueryResponse {
  return 'error' in outcome
    ? { type: 'query-response', queryId, result: undefined, error: outcome.error }
    : { type: 'query-response', queryId, result: outcome.result, error: undefined };
}

export function createLeaderAnnouncement(leaderId: string): LeaderAnnouncement {
  return { type: 'new-leader', leaderId };
}

/**
 * Validate a payload received from the bus. Accepts structured objects and
 * JSON text; returns null for anything that is not one of the three kinds.
 */
export function decodeChannelMessage(data: unknown): ChannelMessage | null {
  let candidate = data;
  if (typeof data === 'string') {
    try {
      candidate = JSON.parse(data);
    } catch {
      return null;
    }
  }

  const parsed = channelMessageSchema.safeParse(candidate);
  return parsed.success ? parsed.data : null;
}
