import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  MessageEnvelope,
  MessageType,
  NullMessageStore,
  InMemoryMessageStore,
  DatabaseMessageStore,
  StoreError,
  createMessageStore,
  type MessageStore,
} from '../../src/messaging/index.js';
import { PGliteDatabaseAdapter } from '../../src/persistence/index.js';
import { createLogger } from '../../src/observability/index.js';

function envelope(sender: string, recipient: string, payload: string): MessageEnvelope {
  return MessageEnvelope.create({ sender, recipient, payload });
}

const durableStores: Array<[string, () => MessageStore]> = [
  ['InMemoryMessageStore', () => new InMemoryMessageStore()],
  ['DatabaseMessageStore', () => new DatabaseMessageStore(new PGliteDatabaseAdapter())],
];

describe.each(durableStores)('%s', (_name, createStore) => {
  let store: MessageStore;

  beforeEach(async () => {
    store = createStore();
    await store.initialize();
  });

  afterEach(async () => {
    await store.close();
  });

  it('should be durable', () => {
    expect(store.durable).toBe(true);
  });

  it('should save and retrieve messages', async () => {
    const message = MessageEnvelope.create({
      sender: 'A',
      recipient: 'B',
      payload: 'hello',
      correlationId: 'corr-1',
      secretKey: 'test-secret',
    });
    await store.saveMessage(message);

    const loaded = await store.getMessage(message.messageId);
    expect(loaded?.serialize()).toEqual(message.serialize());
    expect(loaded?.verify('test-secret')).toBe(true);
    expect(await store.getDeliveryStatus(message.messageId)).toEqual({
      messageId: message.messageId,
      state: 'pending',
      retryCount: 0,
    });
  });

  it('should return null for unknown ids', async () => {
    expect(await store.getMessage('missing')).toBeNull();
    expect(await store.getDeliveryStatus('missing')).toBeNull();
    expect(await store.getRetryCount('missing')).toBe(0);
    expect(await store.recordFailure('missing', 3)).toBeNull();
    expect(await store.updateMessageState('missing', 'processed')).toBe(false);
    expect(await store.markProcessed('missing')).toBe(false);
  });

  it('should mark a pending message processed once', async () => {
    const message = envelope('A', 'B', 'hello');
    await store.saveMessage(message);

    expect(await store.markProcessed(message.messageId)).toBe(true);
    expect(await store.markProcessed(message.messageId)).toBe(false);
    expect(await store.getDeliveryStatus(message.messageId)).toEqual({
      messageId: message.messageId,
      state: 'processed',
      retryCount: 0,
    });
  });

  it('should keep processed and failed messages terminal', async () => {
    const processed = envelope('A', 'B', 'done');
    const failed = envelope('A', 'B', 'broken');
    await store.saveMessage(processed);
    await store.saveMessage(failed);
    await store.markProcessed(processed.messageId);
    for (let i = 0; i < 4; i++) {
      await store.recordFailure(failed.messageId, 3);
    }

    expect(await store.recordFailure(processed.messageId, 3)).toBeNull();
    expect(await store.recordFailure(failed.messageId, 3)).toBeNull();
    expect(await store.markProcessed(failed.messageId)).toBe(false);

    expect(await store.getDeliveryStatus(processed.messageId)).toEqual({
      messageId: processed.messageId,
      state: 'processed',
      retryCount: 0,
    });
    expect(await store.getDeliveryStatus(failed.messageId)).toEqual({
      messageId: failed.messageId,
      state: 'failed',
      retryCount: 4,
    });
    expect(await store.getPendingMessages('B')).toEqual([]);
  });

  it('should ignore a second save of the same message', async () => {
    const message = envelope('A', 'B', 'hello');
    await store.saveMessage(message);
    await store.updateMessageState(message.messageId, 'processed');
    await store.saveMessage(message);

    expect(await store.getPendingMessages('B')).toEqual([]);
    expect((await store.getDeliveryStatus(message.messageId))?.state).toBe('processed');
  });

  it('should list pending messages per recipient in arrival order', async () => {
    const first = envelope('A', 'B', 'one');
    const other = envelope('A', 'C', 'other');
    const second = envelope('D', 'B', 'two');
    await store.saveMessage(first);
    await store.saveMessage(other);
    await store.saveMessage(second);

    const pending = await store.getPendingMessages('B');
    expect(pending.map(m => m.payload)).toEqual(['one', 'two']);
    expect(await store.countPendingMessages('B')).toBe(2);
    expect(await store.countPendingMessages('C')).toBe(1);
    expect(await store.countPendingMessages('nobody')).toBe(0);
  });

  it('should drop processed and failed messages from the pending list', async () => {
    const processed = envelope('A', 'B', 'done');
    const failed = envelope('A', 'B', 'broken');
    const waiting = envelope('A', 'B', 'waiting');
    await store.saveMessage(processed);
    await store.saveMessage(failed);
    await store.saveMessage(waiting);

    expect(await store.updateMessageState(processed.messageId, 'processed')).toBe(true);
    expect(await store.updateMessageState(failed.messageId, 'failed', 4)).toBe(true);

    expect((await store.getPendingMessages('B')).map(m => m.payload)).toEqual(['waiting']);
    expect(await store.getRetryCount(failed.messageId)).toBe(4);
    expect(await store.getRetryCount(processed.messageId)).toBe(0);
  });

  it('should count failures up to the retry ceiling, then fail', async () => {
    const message = envelope('A', 'B', 'flaky');
    await store.saveMessage(message);

    expect(await store.recordFailure(message.messageId, 3)).toEqual({
      messageId: message.messageId,
      state: 'pending',
      retryCount: 1,
    });
    expect((await store.recordFailure(message.messageId, 3))?.retryCount).toBe(2);
    expect((await store.recordFailure(message.messageId, 3))?.state).toBe('pending');
    expect(await store.recordFailure(message.messageId, 3)).toEqual({
      messageId: message.messageId,
      state: 'failed',
      retryCount: 4,
    });
    expect(await store.getPendingMessages('B')).toEqual([]);
  });

  it('should not lose updates under concurrent failures', async () => {
    const message = envelope('A', 'B', 'contended');
    await store.saveMessage(message);

    await Promise.all(Array.from({ length: 5 }, () => store.recordFailure(message.messageId, 10)));

    expect(await store.getRetryCount(message.messageId)).toBe(5);
  });

  it('should stop counting concurrent failures once the message has failed', async () => {
    const message = envelope('A', 'B', 'contended');
    await store.saveMessage(message);

    const results = await Promise.all(Array.from({ length: 5 }, () => store.recordFailure(message.messageId, 3)));

    expect(results.map(r => r?.state ?? null).sort()).toEqual(['failed', null, 'pending', 'pending', 'pending'].sort());
    expect(await store.getDeliveryStatus(message.messageId)).toEqual({
      messageId: message.messageId,
      state: 'failed',
      retryCount: 4,
    });
  });

  it('should return the most recent conversation, oldest first', async () => {
    const sent = [
      envelope('A', 'B', 'a1'),
      envelope('B', 'A', 'b1'),
      envelope('A', 'C', 'unrelated'),
      envelope('A', 'B', 'a2'),
      envelope('B', 'A', 'b2'),
    ];
    for (const message of sent) {
      await store.saveMessage(message);
    }

    const all = await store.getConversationHistory('A', 'B', 10);
    expect(all.map(m => m.payload)).toEqual(['a1', 'b1', 'a2', 'b2']);

    const recent = await store.getConversationHistory('B', 'A', 2);
    expect(recent.map(m => m.payload)).toEqual(['a2', 'b2']);

    expect(await store.getConversationHistory('A', 'B', 0)).toEqual([]);
  });

  it('should include processed messages in the conversation', async () => {
    const message = envelope('A', 'B', 'answered');
    await store.saveMessage(message);
    await store.updateMessageState(message.messageId, 'processed');

    expect((await store.getConversationHistory('A', 'B', 5)).map(m => m.payload)).toEqual(['answered']);
  });
});

describe('NullMessageStore', () => {
  it('should accept writes and keep nothing', async () => {
    const store = new NullMessageStore();
    const message = envelope('A', 'B', 'hello');
    await store.initialize();
    await store.saveMessage(message);

    expect(store.durable).toBe(false);
    expect(await store.getMessage(message.messageId)).toBeNull();
    expect(await store.getPendingMessages('B')).toEqual([]);
    expect(await store.countPendingMessages('B')).toBe(0);
    expect(await store.recordFailure(message.messageId, 3)).toBeNull();
    expect(await store.getConversationHistory('A', 'B', 10)).toEqual([]);
  });
});

describe('DatabaseMessageStore', () => {
  it('should reject unsafe table names', () => {
    const adapter = new PGliteDatabaseAdapter();
    expect(() => new DatabaseMessageStore(adapter, 'messages; DROP TABLE x')).toThrow(StoreError);
  });

  it('should use a custom table name', async () => {
    const adapter = new PGliteDatabaseAdapter();
    const store = new DatabaseMessageStore(adapter, 'agent_inbox');
    await store.initialize();
    await store.saveMessage(envelope('A', 'B', 'hello'));

    const result = await adapter.query<{ count: number }>('SELECT COUNT(*)::int AS count FROM agent_inbox');
    expect(result.rows[0].count).toBe(1);
    await store.close();
  });

  it('should keep the message type and reply fields', async () => {
    const store = new DatabaseMessageStore(new PGliteDatabaseAdapter());
    const message = MessageEnvelope.create({
      sender: 'broker',
      recipient: 'A',
      payload: 'rejected',
      messageType: MessageType.ERROR,
      replyTo: 'msg-0',
    });
    await store.saveMessage(message);

    const loaded = await store.getMessage(message.messageId);
    expect(loaded?.messageType).toBe('error');
    expect(loaded?.replyTo).toBe('msg-0');
    expect(loaded?.correlationId).toBeUndefined();
    await store.close();
  });

  it('should wrap database failures in StoreError', async () => {
    const adapter = new PGliteDatabaseAdapter();
    const store = new DatabaseMessageStore(adapter);
    await store.initialize();
    await adapter.execute('DROP TABLE messages');

    await expect(store.getPendingMessages('B')).rejects.toThrow(StoreError);
    await expect(store.getPendingMessages('B')).rejects.toThrow(/Store operation 'getPendingMessages' failed/);
    await store.close();
  });
});

describe('InMemoryMessageStore', () => {
  it('should log through the supplied logger', async () => {
    const logger = createLogger({ level: 'silent' });
    const debug = vi.spyOn(logger, 'debug');
    const store = new InMemoryMessageStore(logger);
    const message = envelope('A', 'B', 'hello');

    await store.saveMessage(message);
    await store.saveMessage(message);

    expect(debug).toHaveBeenCalledWith({ messageId: message.messageId }, 'Duplicate message ignored');
  });
});

describe('createMessageStore', () => {
  it('should create the configured store type', async () => {
    expect(createMessageStore({ type: 'none' })).toBeInstanceOf(NullMessageStore);
    expect(createMessageStore({ type: 'memory' })).toBeInstanceOf(InMemoryMessageStore);

    const pglite = createMessageStore({ type: 'pglite' });
    expect(pglite).toBeInstanceOf(DatabaseMessageStore);
    await pglite.initialize();
    await pglite.close();
  });
});
