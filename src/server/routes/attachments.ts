import { createReadStream } from 'node:fs';
import type { FastifyInstance } from 'fastify';

import type { OnThisDayService } from '../services/onThisDay.js';

/**
 * Attachment route plugin.
 *
 * GET /api/attachments/:attachmentId streams the attachment file
 * (HEIC images as JPEG when conversion works).
 */
export default async function attachmentRoutes(
  fastify: FastifyInstance,
  opts: { service: OnThisDayService },
): Promise<void> {
  const { service } = opts;

  fastify.get<{ Params: { attachmentId: number } }>(
    '/api/attachments/:attachmentId',
    {
      schema: {
        params: {
          type: 'object',
          properties: { attachmentId: { type: 'integer', minimum: 0 } },
          required: ['attachmentId'],
        },
      },
    },
    async (request, reply) => {
      const file = await service.getAttachment(request.params.attachmentId, request.log);
      return reply
        .type(file.mimeType ?? 'application/octet-stream')
        .send(createReadStream(file.path));
    },
  );
}
