import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  MessageBroker,
  MessageConsumer,
  MessageEnvelope,
  InMemoryMessageStore,
} from '../../src/messaging/index.js';

const SECRET = 'test-secret';

describe('MessageConsumer', () => {
  let store: InMemoryMessageStore;
  let broker: MessageBroker;

  beforeEach(() => {
    store = new InMemoryMessageStore();
    broker = new MessageBroker({ store });
  });

  describe('drain', () => {
    it('should process and acknowledge pending messages in order', async () => {
      const seen: string[] = [];
      const consumer = new MessageConsumer(broker, {
        agentId: 'B',
        handler: envelope => {
          seen.push(envelope.payload);
        },
      });
      await broker.sendMessage(MessageEnvelope.create({ sender: 'A', recipient: 'B', payload: 'one' }));
      await broker.sendMessage(MessageEnvelope.create({ sender: 'C', recipient: 'B', payload: 'two' }));
      await broker.sendMessage(MessageEnvelope.create({ sender: 'A', recipient: 'D', payload: 'elsewhere' }));

      const result = await consumer.drain();

      expect(seen).toEqual(['one', 'two']);
      expect(result).toEqual({ processed: 2, retried: 0, failed: 0, skipped: 0 });
      expect(await broker.getPendingMessages('B')).toEqual([]);
      expect(await broker.getPendingMessages('D')).toHaveLength(1);
    });

    it('should route handler errors into retries', async () => {
      const message = MessageEnvelope.create({ sender: 'A', recipient: 'B', payload: 'flaky' });
      await broker.sendMessage(message);
      const consumer = new MessageConsumer(broker, {
        agentId: 'B',
        handler: async () => {
          throw new Error('handler crashed');
        },
      });
      const onRetry = vi.fn();
      const onFailed = vi.fn();
      consumer.on('message:retry', onRetry);
      consumer.on('message:failed', onFailed);

      const results = [];
      for (let i = 0; i < 4; i++) {
        results.push(await consumer.drain());
      }

      expect(results.map(r => [r.retried, r.failed])).toEqual([
        [1, 0],
        [1, 0],
        [1, 0],
        [0, 1],
      ]);
      expect(onRetry).toHaveBeenCalledTimes(3);
      expect(onFailed).toHaveBeenCalledTimes(1);
      expect(onFailed.mock.calls[0][1]).toBeInstanceOf(Error);
      expect(await store.getDeliveryStatus(message.messageId)).toMatchObject({ state: 'failed', retryCount: 4 });
      expect(await consumer.drain()).toEqual({ processed: 0, retried: 0, failed: 0, skipped: 0 });
    });

    it('should succeed on a later attempt', async () => {
      let attempts = 0;
      const consumer = new MessageConsumer(broker, {
        agentId: 'B',
        handler: () => {
          attempts++;
          if (attempts < 3) throw new Error('not yet');
        },
      });
      const message = MessageEnvelope.create({ sender: 'A', recipient: 'B', payload: 'eventually' });
      await broker.sendMessage(message);

      await consumer.drain();
      await consumer.drain();
      const last = await consumer.drain();

      expect(last.processed).toBe(1);
      expect(await store.getDeliveryStatus(message.messageId)).toMatchObject({ state: 'processed', retryCount: 2 });
    });

    it('should skip messages that fail verification and leave them pending', async () => {
      const signedBroker = new MessageBroker({ store, secretKey: SECRET });
      const handler = vi.fn();
      const consumer = new MessageConsumer(signedBroker, { agentId: 'B', handler });
      const onRejected = vi.fn();
      consumer.on('message:rejected', onRejected);

      const forged = MessageEnvelope.create({ sender: 'A', recipient: 'B', payload: 'forged', secretKey: 'other-secret' });
      const genuine = MessageEnvelope.create({ sender: 'A', recipient: 'B', payload: 'genuine', secretKey: SECRET });
      await signedBroker.sendMessage(forged);
      await signedBroker.sendMessage(genuine);

      const result = await consumer.drain();

      expect(result).toEqual({ processed: 1, retried: 0, failed: 0, skipped: 1 });
      expect(handler).toHaveBeenCalledTimes(1);
      expect(handler).toHaveBeenCalledWith(genuine);
      expect(onRejected).toHaveBeenCalledWith(forged);
      expect((await signedBroker.getPendingMessages('B')).map(m => m.payload)).toEqual(['forged']);
    });

    it('should not verify when the broker has no secret', async () => {
      const handler = vi.fn();
      const consumer = new MessageConsumer(broker, { agentId: 'B', handler });
      await broker.sendMessage(MessageEnvelope.create({ sender: 'A', recipient: 'B', payload: 'plain' }));

      expect((await consumer.drain()).processed).toBe(1);
    });

    it('should honour an explicit verification setting', async () => {
      const signedBroker = new MessageBroker({ store, secretKey: SECRET });
      const handler = vi.fn();
      const consumer = new MessageConsumer(signedBroker, { agentId: 'B', handler, verifySignatures: false });
      await signedBroker.sendMessage(MessageEnvelope.create({ sender: 'A', recipient: 'B', payload: 'unsigned' }));

      expect((await consumer.drain()).processed).toBe(1);
    });

    it('should share a running drain between callers', async () => {
      let release: () => void = () => {};
      const gate = new Promise<void>(resolve => {
        release = resolve;
      });
      const handler = vi.fn(() => gate);
      const consumer = new MessageConsumer(broker, { agentId: 'B', handler });
      await broker.sendMessage(MessageEnvelope.create({ sender: 'A', recipient: 'B', payload: 'slow' }));

      const first = consumer.drain();
      const second = consumer.drain();
      release();

      expect(await first).toEqual(await second);
      expect(handler).toHaveBeenCalledTimes(1);
    });
  });

  describe('start / stop', () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it('should poll on the configured interval', async () => {
      const handler = vi.fn();
      const consumer = new MessageConsumer(broker, { agentId: 'B', handler, pollIntervalMs: 500 });
      await broker.sendMessage(MessageEnvelope.create({ sender: 'A', recipient: 'B', payload: 'tick' }));

      consumer.start();
      expect(consumer.isRunning).toBe(true);

      await vi.advanceTimersByTimeAsync(499);
      expect(handler).not.toHaveBeenCalled();

      await vi.advanceTimersByTimeAsync(1);
      expect(handler).toHaveBeenCalledTimes(1);

      await broker.sendMessage(MessageEnvelope.create({ sender: 'A', recipient: 'B', payload: 'tock' }));
      await vi.advanceTimersByTimeAsync(500);
      expect(handler).toHaveBeenCalledTimes(2);

      await consumer.stop();
      expect(consumer.isRunning).toBe(false);

      await broker.sendMessage(MessageEnvelope.create({ sender: 'A', recipient: 'B', payload: 'after stop' }));
      await vi.advanceTimersByTimeAsync(5000);
      expect(handler).toHaveBeenCalledTimes(2);
    });

    it('should wait for an in-flight drain when stopping', async () => {
      let release: () => void = () => {};
      const gate = new Promise<void>(resolve => {
        release = resolve;
      });
      const consumer = new MessageConsumer(broker, { agentId: 'B', handler: () => gate, pollIntervalMs: 100 });
      const message = MessageEnvelope.create({ sender: 'A', recipient: 'B', payload: 'slow' });
      await broker.sendMessage(message);

      consumer.start();
      await vi.advanceTimersByTimeAsync(100);

      let stopped = false;
      const stopping = consumer.stop().then(() => {
        stopped = true;
      });
      await vi.advanceTimersByTimeAsync(0);
      expect(stopped).toBe(false);

      release();
      await stopping;
      expect(stopped).toBe(true);
      expect((await store.getDeliveryStatus(message.messageId))?.state).toBe('processed');
    });

    it('should report poll errors and keep polling', async () => {
      const spy = vi.spyOn(store, 'getPendingMessages').mockRejectedValueOnce(new Error('store offline'));
      const handler = vi.fn();
      const consumer = new MessageConsumer(broker, { agentId: 'B', handler, pollIntervalMs: 100 });
      const onError = vi.fn();
      consumer.on('poll:error', onError);
      await broker.sendMessage(MessageEnvelope.create({ sender: 'A', recipient: 'B', payload: 'retry me' }));

      consumer.start();
      await vi.advanceTimersByTimeAsync(100);
      expect(onError).toHaveBeenCalledTimes(1);
      expect(handler).not.toHaveBeenCalled();

      await vi.advanceTimersByTimeAsync(100);
      expect(handler).toHaveBeenCalledTimes(1);
      expect(spy).toHaveBeenCalledTimes(2);

      await consumer.stop();
    });

    it('should ignore a second start', async () => {
      const handler = vi.fn();
      const consumer = new MessageConsumer(broker, { agentId: 'B', handler, pollIntervalMs: 100 });
      await broker.sendMessage(MessageEnvelope.create({ sender: 'A', recipient: 'B', payload: 'once' }));

      consumer.start();
      consumer.start();
      await vi.advanceTimersByTimeAsync(100);

      expect(handler).toHaveBeenCalledTimes(1);
      await consumer.stop();
    });
  });
});
