// Session Manager
// Owns the live conversations. Each session is driven by one turn at a time;
// idle sessions expire from the TTL cache.

import { ConversationMemory } from './memory/conversation-memory.js';
import { AppError } from '../utils/errors.js';
import { componentLogger, type Logger } from '../utils/logger.js';
import { TTLCache } from '../utils/ttl-cache.js';

interface SessionEntry {
  memory: ConversationMemory;
  busy: boolean;
}

export interface SessionManagerOptions {
  ttlMs?: number;
  cleanupMs?: number;
  /** Factory for new memories; tests pass fixed ids and clocks */
  createMemory?: () => ConversationMemory;
  logger?: Logger;
}

export class SessionManager {
  private sessions: TTLCache<string, SessionEntry>;
  private createMemory: () => ConversationMemory;
  private ttlMs: number | undefined;
  private logger: Logger;

  constructor(options: SessionManagerOptions = {}) {
    this.logger = options.logger ?? componentLogger('sessions');
    this.ttlMs = options.ttlMs;
    this.createMemory = options.createMemory ?? (() => new ConversationMemory());
    this.sessions = new TTLCache<string, SessionEntry>(options.ttlMs, options.cleanupMs, sessionId => {
      this.logger.debug({ sessionId }, 'Session expired');
    });
  }

  get size(): number {
    return this.sessions.size;
  }

  create(): ConversationMemory {
    const memory = this.createMemory();
    this.sessions.set(memory.sessionId, { memory, busy: false });
    this.logger.info({ sessionId: memory.sessionId }, 'Session created');
    return memory;
  }

  get(sessionId: string): ConversationMemory {
    return this.entry(sessionId).memory;
  }

  /** Clear the session's history; the conversation continues under a new id */
  reset(sessionId: string): ConversationMemory {
    const entry = this.entry(sessionId);
    if (entry.busy) {
      throw AppError.conflict('Session is busy with another message');
    }
    entry.memory.clear();
    this.sessions.delete(sessionId);
    this.sessions.set(entry.memory.sessionId, entry);
    this.logger.info({ sessionId, newSessionId: entry.memory.sessionId }, 'Session reset');
    return entry.memory;
  }

  delete(sessionId: string): void {
    const entry = this.entry(sessionId);
    if (entry.busy) {
      throw AppError.conflict('Session is busy with another message');
    }
    this.sessions.delete(sessionId);
    this.logger.info({ sessionId }, 'Session deleted');
  }

  /** Run `task` as the only turn in flight for the session; a second caller gets a 409 */
  async runExclusive<T>(sessionId: string, task: (memory: ConversationMemory) => Promise<T>): Promise<T> {
    const entry = this.entry(sessionId);
    if (entry.busy) {
      throw AppError.conflict('Session is busy with another message');
    }

    entry.busy = true;
    try {
      return await task(entry.memory);
    } finally {
      entry.busy = false;
      // Expiry restarts when the turn ends
      this.sessions.set(entry.memory.sessionId, entry, this.ttlMs);
    }
  }

  destroy(): void {
    this.sessions.destroy();
  }

  private entry(sessionId: string): SessionEntry {
    const entry = this.sessions.get(sessionId);
    if (!entry) {
      throw AppError.notFound(`Session ${sessionId} not found`);
    }
    this.sessions.touch(sessionId, this.ttlMs);
    return entry;
  }
}
