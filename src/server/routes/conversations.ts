import type { FastifyInstance } from 'fastify';

import type { OnThisDayService } from '../services/onThisDay.js';
import type { ConversationListing, ConversationTimeline } from '../types/index.js';

/** Shared `?month=&day=` schema; both default to today when omitted. */
export const dayQuerySchema = {
  type: 'object',
  properties: {
    month: { type: 'integer', minimum: 1, maximum: 12 },
    day: { type: 'integer', minimum: 1, maximum: 31 },
  },
  additionalProperties: false,
} as const;

interface DayQuerystring {
  month?: number;
  day?: number;
}

/**
 * Conversation routes.
 *
 * GET /api/conversations                      chats active on the day
 * GET /api/conversations/:chatId/messages     one chat's day, by year
 */
export default async function conversationRoutes(
  fastify: FastifyInstance,
  opts: { service: OnThisDayService },
): Promise<void> {
  const { service } = opts;

  fastify.get<{ Querystring: DayQuerystring; Reply: ConversationListing }>(
    '/api/conversations',
    { schema: { querystring: dayQuerySchema } },
    async (request) => service.listConversations(request.query, request.log),
  );

  fastify.get<{
    Params: { chatId: number };
    Querystring: DayQuerystring;
    Reply: ConversationTimeline;
  }>(
    '/api/conversations/:chatId/messages',
    {
      schema: {
        params: {
          type: 'object',
          properties: { chatId: { type: 'integer', minimum: 0 } },
          required: ['chatId'],
        },
        querystring: dayQuerySchema,
      },
    },
    async (request) => service.getTimeline(request.params.chatId, request.query, request.log),
  );
}
