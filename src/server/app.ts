import Fastify from 'fastify';
import type { FastifyInstance, FastifyServerOptions } from 'fastify';
import fastifyCors from '@fastify/cors';
import fastifyStatic from '@fastify/static';
import { existsSync } from 'node:fs';

import type { AppConfig } from './config.js';
import { errorHandler } from './middleware/errorHandler.js';
import attachmentRoutes from './routes/attachments.js';
import conversationRoutes from './routes/conversations.js';
import { loadAddressBook } from './services/addressBook.js';
import { lazyContactBook } from './services/contacts.js';
import type { ContactBook } from './services/contacts.js';
import { OnThisDayService } from './services/onThisDay.js';
import type { CommandRunner } from './services/imageConvert.js';

export interface BuildAppOptions {
  config: AppConfig;
  logger?: FastifyServerOptions['logger'];
  /** Contact book getter; defaults to a lazily loaded AddressBook scan. */
  contacts?: () => ContactBook;
  runCommand?: CommandRunner;
}

/** Assemble the Fastify instance: plugins, error handler and routes. */
export async function buildApp(options: BuildAppOptions): Promise<FastifyInstance> {
  const { config } = options;

  const fastify = Fastify({ logger: options.logger ?? false });

  const contacts =
    options.contacts ??
    lazyContactBook(() => loadAddressBook(config.addressBookDir, fastify.log.child({ module: 'contacts' })));

  const service = new OnThisDayService({
    chatDbPath: config.chatDbPath,
    contacts,
    imageCacheDir: config.imageCacheDir,
    imageConvertTimeoutMs: config.imageConvertTimeoutMs,
    logger: fastify.log,
    runCommand: options.runCommand,
  });

  // --- Plugin registration ---

  // CORS: permissive in dev, restrictive in production
  await fastify.register(fastifyCors, {
    origin: config.production ? config.corsOrigin : true,
  });

  // Serve the prebuilt front end when present
  if (existsSync(config.publicDir)) {
    await fastify.register(fastifyStatic, {
      root: config.publicDir,
      prefix: '/',
      // Don't intercept API routes
      wildcard: false,
    });

    // SPA fallback: serve index.html for non-API routes
    fastify.setNotFoundHandler((request, reply) => {
      if (request.url.startsWith('/api')) {
        reply.status(404).send({
          error: {
            code: 'NOT_FOUND',
            message: `Route ${request.method} ${request.url} not found`,
          },
        });
        return;
      }
      reply.sendFile('index.html');
    });
  }

  // --- Error handler ---
  fastify.setErrorHandler(errorHandler);

  // --- Route registration ---
  await fastify.register(conversationRoutes, { service });
  await fastify.register(attachmentRoutes, { service });

  // --- Health check ---
  fastify.get('/api/health', async () => ({
    status: 'ok',
    service: 'on-this-day-web',
    timestamp: new Date().toISOString(),
  }));

  // Build the contact cache before the first request rather than during it
  fastify.addHook('onReady', async () => {
    contacts();
  });

  return fastify;
}
