import { buildApp } from './app.js';
import { loadConfig } from './config.js';

const config = loadConfig();

const fastify = await buildApp({
  config,
  logger: {
    level: config.logLevel,
    // Structured JSON output (Pino default)
    transport: !config.production
      ? { target: 'pino-pretty', options: { colorize: true } }
      : undefined,
  },
});

// --- Start server ---
try {
  await fastify.listen({ port: config.port, host: config.host });
  fastify.log.info(
    { chatDbPath: config.chatDbPath },
    `On This Day web service listening on ${config.host}:${config.port}`,
  );
} catch (err) {
  fastify.log.fatal(err, 'Failed to start On This Day web service');
  process.exit(1);
}
