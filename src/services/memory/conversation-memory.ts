/**
 * Conversation Memory
 * Append-only turn log for one session. Turns are deep-frozen on append and
 * never edited; the only way to drop history is `clear()`, which starts a new session.
 */

import { randomUUID } from 'crypto';
import type { SessionSnapshot, ToolCallTurn, Turn, TurnInput } from './types.js';

export interface ConversationMemoryOptions {
  sessionId?: string;
  now?: () => Date;
  idFactory?: () => string;
}

/** Raised when an append would break the call/result pairing of the log */
export class TurnOrderError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TurnOrderError';
  }
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

export class ConversationMemory {
  private turns: Turn[] = [];
  private id: string;
  private created: Date;
  private readonly now: () => Date;
  private readonly idFactory: () => string;

  constructor(options: ConversationMemoryOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.idFactory = options.idFactory ?? randomUUID;
    this.id = options.sessionId ?? this.idFactory();
    this.created = this.now();
  }

  get sessionId(): string {
    return this.id;
  }

  get createdAt(): string {
    return this.created.toISOString();
  }

  get size(): number {
    return this.turns.length;
  }

  /** The tool call still waiting for its result, if any */
  get pendingCall(): ToolCallTurn | undefined {
    const last = this.turns[this.turns.length - 1];
    return last?.type === 'tool_call' ? last : undefined;
  }

  append(input: TurnInput): Turn {
    const pending = this.pendingCall;

    if (pending) {
      if (input.type !== 'tool_result' || input.callId !== pending.callId) {
        throw new TurnOrderError(
          `Tool call ${pending.callId} (${pending.tool}) must be resolved before appending ${input.type}`,
        );
      }
    } else if (input.type === 'tool_result' && input.callId !== null) {
      throw new TurnOrderError(`No pending tool call matches result ${input.callId}`);
    }

    const turn: Turn = deepFreeze({
      ...structuredClone(input),
      index: this.turns.length,
      at: this.now().toISOString(),
    });

    this.turns.push(turn);
    return turn;
  }

  /** Read-only snapshot of every turn so far */
  history(): readonly Turn[] {
    return Object.freeze([...this.turns]);
  }

  snapshot(): SessionSnapshot {
    return {
      id: this.id,
      createdAt: this.createdAt,
      turns: this.history(),
    };
  }

  /** Drop the whole session and start a new one */
  clear(): void {
    this.turns = [];
    this.id = this.idFactory();
    this.created = this.now();
  }
}
