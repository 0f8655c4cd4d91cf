import Fastify, { type FastifyServerOptions } from 'fastify';
import cors from '@fastify/cors';
import { env, isProduction } from './env.js';
import { triageRoutes } from './routes/triage.js';
import { createTriageMatcher, loadRuleTable, type TriageMatcher } from './services/triage/index.js';
import { AppError, formatErrorResponse, toAppError } from './utils/errors.js';

export const API_VERSION = '1.0.0';

export interface BuildServerOptions {
  logger?: FastifyServerOptions['logger'];
  matcher?: TriageMatcher;
}

function defaultLogger(): FastifyServerOptions['logger'] {
  if (isProduction()) {
    return { level: env.LOG_LEVEL };
  }
  return {
    level: env.LOG_LEVEL,
    transport: {
      target: 'pino-pretty',
      options: {
        translateTime: 'HH:MM:ss Z',
        ignore: 'pid,hostname',
      },
    },
  };
}

export async function buildServer(options: BuildServerOptions = {}) {
  // The rule table is loaded once; a bad file stops startup here
  const matcher = options.matcher ?? createTriageMatcher(loadRuleTable(env.TRIAGE_RULES_PATH));

  const server = Fastify({
    logger: options.logger ?? defaultLogger(),
  });

  await server.register(cors, {
    origin: env.CORS_ORIGINS,
    credentials: true,
  });

  server.setErrorHandler((error, request, reply) => {
    const appError = toAppError(error);
    if (appError.statusCode >= 500) {
      request.log.error({ err: error }, 'Unhandled error');
    }
    return reply.code(appError.statusCode).send(formatErrorResponse(appError, !isProduction()));
  });

  server.setNotFoundHandler((request, reply) => {
    const error = AppError.notFound(`Route ${request.method} ${request.url} not found`);
    return reply.code(error.statusCode).send(formatErrorResponse(error));
  });

  // Main health endpoint with /v1 prefix
  server.get('/v1/health', async () => {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      version: API_VERSION,
    };
  });

  // Legacy redirect
  server.get('/health', async (request, reply) => {
    return reply.code(301).redirect('/v1/health');
  });

  await server.register(triageRoutes, { prefix: '/v1', matcher });

  return server;
}
