/**
 * Message Consumer
 * Drains an agent's pending messages through a handler, acknowledging
 * successes and routing failures into the broker's retry accounting
 */

import { EventEmitter } from 'events';
import type { MessageBroker } from './broker.js';
import type { MessageEnvelope } from './envelope.js';
import { errorMessage } from './errors.js';
import { getLogger, type Logger } from '../observability/logger.js';

export type MessageHandler = (envelope: MessageEnvelope) => void | Promise<void>;

export interface MessageConsumerConfig {
  /** Agent whose queue is drained */
  agentId: string;
  handler: MessageHandler;
  /** Skip messages whose signature does not verify. Defaults to on when the broker has a secret. */
  verifySignatures?: boolean;
  /** Polling interval in ms */
  pollIntervalMs?: number;
  logger?: Logger;
}

export interface DrainResult {
  processed: number;
  retried: number;
  failed: number;
  skipped: number;
}

/**
 * Consumer events (listener signatures)
 */
export interface MessageConsumerEvents {
  'message:processed': (envelope: MessageEnvelope) => void;
  'message:retry': (envelope: MessageEnvelope, error: unknown) => void;
  'message:failed': (envelope: MessageEnvelope, error: unknown) => void;
  'message:rejected': (envelope: MessageEnvelope) => void;
  'poll:error': (error: unknown) => void;
}

const DEFAULT_POLL_INTERVAL_MS = 1000;

export class MessageConsumer extends EventEmitter {
  readonly agentId: string;
  private readonly handler: MessageHandler;
  private readonly verifySignatures: boolean;
  private readonly pollIntervalMs: number;
  private readonly logger: Logger;
  private pollTimer: ReturnType<typeof setInterval> | null = null;
  private inFlight: Promise<DrainResult> | null = null;

  constructor(
    private readonly broker: MessageBroker,
    config: MessageConsumerConfig
  ) {
    super();
    this.agentId = config.agentId;
    this.handler = config.handler;
    this.verifySignatures = config.verifySignatures ?? broker.signsMessages;
    this.pollIntervalMs = config.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.logger = config.logger ?? getLogger().child({ module: 'MessageConsumer', agentId: config.agentId });
  }

  get isRunning(): boolean {
    return this.pollTimer !== null;
  }

  /**
   * Start polling. Ticks that find a drain still running are skipped.
   */
  start(): void {
    if (this.pollTimer) {
      return;
    }

    this.pollTimer = setInterval(() => {
      void this.poll();
    }, this.pollIntervalMs);

    this.logger.info({ pollIntervalMs: this.pollIntervalMs }, 'Consumer started');
  }

  /**
   * Stop polling and wait for an in-flight drain to finish
   */
  async stop(): Promise<void> {
    if (this.pollTimer) {
      clearInterval(this.pollTimer);
      this.pollTimer = null;
      this.logger.info('Consumer stopped');
    }

    if (this.inFlight) {
      // Failures of this drain are reported by whoever started it
      await Promise.allSettled([this.inFlight]);
    }
  }

  /**
   * Process every message currently pending for the agent. Concurrent calls
   * share the running drain.
   */
  drain(): Promise<DrainResult> {
    if (!this.inFlight) {
      this.inFlight = this.drainPending().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  private async poll(): Promise<void> {
    if (this.inFlight) {
      return;
    }

    try {
      await this.drain();
    } catch (error) {
      this.logger.error({ error: errorMessage(error) }, 'Polling failed');
      this.emit('poll:error', error);
    }
  }

  private async drainPending(): Promise<DrainResult> {
    const result: DrainResult = { processed: 0, retried: 0, failed: 0, skipped: 0 };
    const pending = await this.broker.getPendingMessages(this.agentId);

    for (const envelope of pending) {
      if (this.verifySignatures && !this.broker.verifyEnvelope(envelope)) {
        this.logger.warn(
          { messageId: envelope.messageId, sender: envelope.sender },
          'Skipping message with invalid signature'
        );
        result.skipped++;
        this.emit('message:rejected', envelope);
        continue;
      }

      try {
        await this.handler(envelope);
      } catch (error) {
        this.logger.warn(
          { messageId: envelope.messageId, error: errorMessage(error) },
          'Message handler failed'
        );

        const retry = await this.broker.handleFailure(envelope.messageId, this.agentId);
        if (retry) {
          result.retried++;
          this.emit('message:retry', envelope, error);
        } else {
          result.failed++;
          this.emit('message:failed', envelope, error);
        }
        continue;
      }

      await this.broker.acknowledgeMessage(envelope.messageId, this.agentId);
      result.processed++;
      this.emit('message:processed', envelope);
    }

    if (pending.length > 0) {
      this.logger.debug({ ...result }, 'Drain complete');
    }

    return result;
  }
}
