// Session routes
import type { FastifyInstance, FastifyReply } from 'fastify';
import { z } from 'zod';
import { hasOpenExchange, type ReasoningOrchestrator, type TurnOutcome } from '../services/orchestrator/index.js';
import type { ConversationMemory } from '../services/memory/conversation-memory.js';
import type { SessionManager } from '../services/sessions.js';
import { renderTrace, synthesizeAnswer } from '../services/synthesizer.js';
import { AppError } from '../utils/errors.js';

const SendMessageSchema = z.object({
  content: z.string().trim().min(1).max(4000),
  includeTrace: z.boolean().optional().default(false),
});

const RetrySchema = z.object({
  includeTrace: z.boolean().optional().default(false),
});

export interface SessionRouteOptions {
  sessions: SessionManager;
  orchestrator: ReasoningOrchestrator;
}

/** Aborts when the client goes away before the response is written */
function disconnectSignal(reply: FastifyReply): AbortSignal {
  const controller = new AbortController();
  reply.raw.once('close', () => {
    if (!reply.raw.writableFinished) {
      controller.abort();
    }
  });
  return controller.signal;
}

function toResponse(memory: ConversationMemory, outcome: TurnOutcome, includeTrace: boolean) {
  const answer = synthesizeAnswer(memory.snapshot(), { includeTrace });
  return {
    ...answer,
    iterations: outcome.iterations,
    toolCalls: outcome.toolCalls,
    ...(answer.trace ? { traceMarkdown: renderTrace(answer.trace) } : {}),
  };
}

export async function sessionRoutes(server: FastifyInstance, opts: SessionRouteOptions) {
  const { sessions, orchestrator } = opts;

  // POST /v1/sessions - Start a conversation
  server.post('/sessions', async (request, reply) => {
    const memory = sessions.create();
    return reply.code(201).send({ session: memory.snapshot() });
  });

  // GET /v1/sessions/:id - Full turn history
  server.get<{ Params: { id: string } }>('/sessions/:id', async request => {
    const memory = sessions.get(request.params.id);
    return { session: memory.snapshot() };
  });

  // POST /v1/sessions/:id/messages - Run one user turn
  server.post<{ Params: { id: string } }>('/sessions/:id/messages', async (request, reply) => {
    const body = SendMessageSchema.parse(request.body);
    const signal = disconnectSignal(reply);

    return sessions.runExclusive(request.params.id, async memory => {
      const outcome = await orchestrator.runTurn(memory, body.content, { signal });
      return toResponse(memory, outcome, body.includeTrace);
    });
  });

  // POST /v1/sessions/:id/retry - Continue a turn that did not reach an answer
  server.post<{ Params: { id: string } }>('/sessions/:id/retry', async (request, reply) => {
    const body = RetrySchema.parse(request.body ?? {});
    const signal = disconnectSignal(reply);

    return sessions.runExclusive(request.params.id, async memory => {
      if (!hasOpenExchange(memory.history())) {
        throw AppError.conflict('Session has no unanswered message to retry');
      }
      const outcome = await orchestrator.resumeTurn(memory, { signal });
      return toResponse(memory, outcome, body.includeTrace);
    });
  });

  // POST /v1/sessions/:id/reset - Drop the history and continue under a new id
  server.post<{ Params: { id: string } }>('/sessions/:id/reset', async request => {
    const memory = sessions.reset(request.params.id);
    return { session: memory.snapshot() };
  });

  // DELETE /v1/sessions/:id - End a conversation
  server.delete<{ Params: { id: string } }>('/sessions/:id', async request => {
    sessions.delete(request.params.id);
    return { success: true };
  });
}
