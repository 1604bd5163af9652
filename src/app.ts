import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { ZodError } from 'zod';
import { env as processEnv, type Env } from './config/env.js';
import { registerRoutes } from './api/routes.js';
import { zodPlugin } from './plugins/zod.js';
import { AppError } from './common/errors.js';
import { getCatalog, type Catalog } from './modules/catalog/catalog.registry.js';
import { createMarketData } from './modules/market-data/index.js';
import type { MacroFetcher, QuoteFetcher } from './modules/market-data/contracts/market-data.contracts.js';
import { allIndicesSelection } from './modules/selection/selection.presets.js';
import { SessionStore } from './modules/selection/session.store.js';

export interface BuildAppOptions {
  env?: Env;
  catalog?: Catalog;
  quotes?: QuoteFetcher;
  macro?: MacroFetcher;
  sessions?: SessionStore;
  logger?: boolean;
}

/**
 * Build Fastify Application. Providers default to the live Yahoo and
 * FRED fetchers; tests hand in fakes.
 */
export function buildApp(options: BuildAppOptions = {}): FastifyInstance {
  const env = options.env ?? processEnv;
  const catalog = options.catalog ?? getCatalog();

  const live = options.quotes && options.macro ? null : createMarketData(env);
  const quotes = options.quotes ?? live?.quotes;
  const macro = options.macro ?? live?.macro;
  if (!quotes || !macro) {
    throw new Error('Market data fetchers could not be created');
  }

  const sessions = options.sessions ?? new SessionStore({
    idleTtlMs: env.SESSION_IDLE_TTL_MIN * 60 * 1000,
    seedIndices: () => allIndicesSelection(catalog),
  });

  const app = Fastify({
    logger: options.logger === false ? false : { level: env.LOG_LEVEL },
    trustProxy: true,
  });

  // CORS
  app.register(cors, {
    origin: env.CORS_ORIGINS === '*' ? true : env.CORS_ORIGINS.split(','),
    credentials: true,
  });

  // Plugins
  app.register(zodPlugin);

  // Global error handler
  app.setErrorHandler((err, _req, reply) => {
    if (err instanceof AppError) {
      if (err.statusCode >= 500) app.log.error(err);
      return reply.status(err.statusCode).send({
        ok: false,
        error: err.code,
        message: err.message,
      });
    }

    // Schema validation (zod) errors
    if (err instanceof ZodError || err.validation) {
      const message = err instanceof ZodError
        ? err.issues.map((i) => `${i.path.join('.') || 'input'}: ${i.message}`).join('; ')
        : err.message;
      return reply.status(400).send({
        ok: false,
        error: 'VALIDATION_ERROR',
        message,
      });
    }

    app.log.error(err);

    // Unknown errors
    const statusCode = err.statusCode ?? 500;
    return reply.status(statusCode).send({
      ok: false,
      error: 'INTERNAL_ERROR',
      message: env.NODE_ENV === 'production' ? 'Internal server error' : err.message,
    });
  });

  // Not found handler
  app.setNotFoundHandler((_req, reply) => {
    reply.status(404).send({
      ok: false,
      error: 'NOT_FOUND',
      message: 'Route not found',
    });
  });

  app.register(async (fastify) => {
    await registerRoutes(fastify, { env, catalog, quotes, macro, sessions });
  });

  return app;
}
