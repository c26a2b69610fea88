import { describe, it, expect, afterEach } from 'vitest';
import { ConversationMemory } from '../memory/conversation-memory.js';
import { SessionManager } from '../sessions.js';
import { AppError } from '../../utils/errors.js';

describe('SessionManager', () => {
  let manager: SessionManager | undefined;

  afterEach(() => {
    manager?.destroy();
    manager = undefined;
  });

  function create() {
    let ids = 0;
    manager = new SessionManager({
      createMemory: () => new ConversationMemory({ idFactory: () => `session-${++ids}` }),
    });
    return manager;
  }

  it('creates and looks up sessions', () => {
    const sessions = create();

    const memory = sessions.create();

    expect(memory.sessionId).toBe('session-1');
    expect(sessions.get('session-1')).toBe(memory);
    expect(sessions.size).toBe(1);
  });

  it('raises a 404 for unknown sessions', () => {
    const sessions = create();

    const error = (() => {
      try {
        sessions.get('nope');
      } catch (caught) {
        return caught;
      }
    })();

    expect(error).toBeInstanceOf(AppError);
    expect(error).toMatchObject({ statusCode: 404, message: 'Session nope not found' });
  });

  it('runs one turn at a time per session', async () => {
    const sessions = create();
    const a = sessions.create();
    const b = sessions.create();
    let release: () => void = () => {};
    const gate = new Promise<void>(resolve => {
      release = resolve;
    });

    const first = sessions.runExclusive(a.sessionId, async () => {
      await gate;
      return 'first';
    });

    await expect(sessions.runExclusive(a.sessionId, async () => 'second')).rejects.toMatchObject({
      statusCode: 409,
      message: 'Session is busy with another message',
    });
    // Other sessions are not blocked
    await expect(sessions.runExclusive(b.sessionId, async () => 'other')).resolves.toBe('other');

    release();
    await expect(first).resolves.toBe('first');
    await expect(sessions.runExclusive(a.sessionId, async () => 'again')).resolves.toBe('again');
  });

  it('frees the session when a turn fails', async () => {
    const sessions = create();
    const memory = sessions.create();

    await expect(
      sessions.runExclusive(memory.sessionId, async () => {
        throw new Error('model down');
      }),
    ).rejects.toThrow('model down');

    await expect(sessions.runExclusive(memory.sessionId, async () => 'retry')).resolves.toBe('retry');
  });

  it('reset() clears history and moves the session to its new id', () => {
    const sessions = create();
    const memory = sessions.create();
    memory.append({ type: 'user_message', text: 'hello' });

    const reset = sessions.reset('session-1');

    expect(reset.sessionId).toBe('session-2');
    expect(reset.size).toBe(0);
    expect(() => sessions.get('session-1')).toThrow('Session session-1 not found');
    expect(sessions.get('session-2')).toBe(memory);
  });

  it('deletes sessions', () => {
    const sessions = create();
    sessions.create();

    sessions.delete('session-1');

    expect(sessions.size).toBe(0);
    expect(() => sessions.delete('session-1')).toThrow('Session session-1 not found');
  });

  it('expires idle sessions', async () => {
    manager = new SessionManager({ ttlMs: 10 });
    const memory = manager.create();

    await new Promise(resolve => setTimeout(resolve, 30));

    expect(() => manager?.get(memory.sessionId)).toThrow(`Session ${memory.sessionId} not found`);
  });
});
