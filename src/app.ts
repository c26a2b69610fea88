// Server assembly
// Builds the Fastify instance from already-constructed services so tests can inject their own

import Fastify, { type FastifyInstance, type FastifyServerOptions } from 'fastify';
import cors from '@fastify/cors';
import { ZodError } from 'zod';
import { env } from './env.js';
import { toolRoutes } from './routes/tools.js';
import { sessionRoutes } from './routes/sessions.js';
import { TurnOrderError } from './services/memory/conversation-memory.js';
import type { ReasoningOrchestrator } from './services/orchestrator/index.js';
import type { SessionManager } from './services/sessions.js';
import type { ToolRegistry } from './services/tools/registry.js';
import {
  AppError,
  CollaboratorUnavailableError,
  ErrorCode,
  TurnAbortedError,
  formatErrorResponse,
} from './utils/errors.js';

export const API_VERSION = '1.0.0';

export interface AppDeps {
  sessions: SessionManager;
  orchestrator: ReasoningOrchestrator;
  registry: ToolRegistry;
}

export interface BuildServerOptions {
  logger?: FastifyServerOptions['logger'];
  corsOrigins?: string[];
}

export function toAppError(error: Error): AppError {
  if (error instanceof AppError) {
    return error;
  }
  if (error instanceof ZodError) {
    return AppError.validationError('Invalid request body', error.issues);
  }
  if (error instanceof CollaboratorUnavailableError) {
    return AppError.serviceUnavailable(error.message);
  }
  if (error instanceof TurnAbortedError) {
    return AppError.clientClosed(error.message);
  }
  if (error instanceof TurnOrderError) {
    return AppError.conflict(error.message);
  }
  // Fastify's own client errors (bad JSON, wrong content type, body too large)
  if ('statusCode' in error && typeof error.statusCode === 'number' && error.statusCode < 500) {
    return new AppError(ErrorCode.BAD_REQUEST, error.message, error.statusCode);
  }
  return AppError.internal();
}

export async function buildServer(deps: AppDeps, options: BuildServerOptions = {}): Promise<FastifyInstance> {
  const server = Fastify({ logger: options.logger ?? false });

  await server.register(cors, {
    origin: options.corsOrigins ?? env.CORS_ORIGINS,
    credentials: true,
  });

  server.setErrorHandler((error: Error, request, reply) => {
    const appError = toAppError(error);
    if (appError.statusCode >= 500) {
      request.log.error({ err: error }, appError.message);
    } else {
      request.log.warn({ code: appError.code }, appError.message);
    }
    return reply
      .code(appError.statusCode)
      .send(formatErrorResponse(appError, env.NODE_ENV !== 'production'));
  });

  server.get('/v1/health', async () => {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      version: API_VERSION,
      tools: deps.registry.names(),
      activeSessions: deps.sessions.size,
    };
  });

  // Legacy redirect
  server.get('/health', async (request, reply) => {
    return reply.code(301).redirect('/v1/health');
  });

  await server.register(toolRoutes, { prefix: '/v1', registry: deps.registry });
  await server.register(sessionRoutes, {
    prefix: '/v1',
    sessions: deps.sessions,
    orchestrator: deps.orchestrator,
  });

  server.addHook('onClose', async () => {
    deps.sessions.destroy();
  });

  return server;
}
