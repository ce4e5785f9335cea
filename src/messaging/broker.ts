/**
 * Message Broker
 * Admission, queuing, acknowledgement and retry of inter-agent messages
 */

import { MessageEnvelope } from './envelope.js';
import { errorMessage } from './errors.js';
import { MessageType } from './types.js';
import { NullMessageStore, type MessageStore } from './stores/message-store.js';
import type { MessageValidator, PolicyViolation, ValidationContext } from '../policy/types.js';
import { NoopTelemetrySink } from '../telemetry/sinks.js';
import { TelemetryEventType, type TelemetryEventInput, type TelemetrySink } from '../telemetry/types.js';
import { getLogger, type Logger } from '../observability/logger.js';

export interface MessageBrokerOptions {
  /** Shared secret used to sign broker-generated envelopes and verify incoming ones */
  secretKey?: string;
  store?: MessageStore;
  telemetry?: TelemetrySink;
  validator?: MessageValidator;
  logger?: Logger;
  /** Sender id stamped on error envelopes */
  systemAgentId?: string;
  /** Messages of conversation history handed to the validator */
  historyLimit?: number;
  /** Queue an error envelope for the sender when a message exhausts its retries */
  notifySenderOnFailure?: boolean;
}

export function formatPolicyRejection(recipient: string, violations: PolicyViolation[]): string {
  const lines = violations.map(v => `Policy '${v.policyName}': ${v.reason}`);
  return (
    `Your message to ${recipient} was rejected due to policy violations:\n\n` +
    lines.join('\n') +
    '\n\nPlease modify your message and try again.'
  );
}

export function formatDeliveryFailure(recipient: string, maxRetries: number): string {
  return `Your message to ${recipient} could not be delivered after ${maxRetries} retries.`;
}

export class MessageBroker {
  static readonly MAX_RETRIES = 3;

  private readonly secretKey?: string;
  private readonly store: MessageStore;
  private readonly telemetry: TelemetrySink;
  private readonly validator?: MessageValidator;
  private readonly logger: Logger;
  private readonly systemAgentId: string;
  private readonly historyLimit: number;
  private readonly notifySenderOnFailure: boolean;

  constructor(options: MessageBrokerOptions = {}) {
    this.secretKey = options.secretKey || undefined;
    this.store = options.store ?? new NullMessageStore();
    this.telemetry = options.telemetry ?? new NoopTelemetrySink();
    this.validator = options.validator;
    this.logger = options.logger ?? getLogger().child({ module: 'MessageBroker' });
    this.systemAgentId = options.systemAgentId ?? 'broker';
    this.historyLimit = options.historyLimit ?? 10;
    this.notifySenderOnFailure = options.notifySenderOnFailure ?? false;
  }

  /** Whether messages are actually queued */
  get isDurable(): boolean {
    return this.store.durable;
  }

  /** Whether the broker holds a secret to sign and verify with */
  get signsMessages(): boolean {
    return this.secretKey !== undefined;
  }

  /**
   * Check an envelope's signature against the broker secret.
   * Always false when the broker has no secret.
   */
  verifyEnvelope(envelope: MessageEnvelope): boolean {
    return this.secretKey !== undefined && envelope.verify(this.secretKey);
  }

  /**
   * Validate and queue a message. A rejected message is not queued; the
   * sender receives an error envelope listing the violations instead.
   */
  async sendMessage(envelope: MessageEnvelope): Promise<void> {
    if (envelope.messageType !== MessageType.ERROR && this.validator) {
      const context = await this.buildValidationContext(envelope);
      const result = await this.validator.validate(envelope, context);

      if (!result.valid) {
        await this.reject(envelope, result.violations);
        return;
      }
    }

    await this.enqueue(envelope);
  }

  /**
   * Pending messages for a recipient, in arrival order
   */
  async getPendingMessages(recipient: string): Promise<MessageEnvelope[]> {
    return this.store.getPendingMessages(recipient);
  }

  /**
   * Mark a pending message processed. Unknown ids and messages already
   * processed or failed are ignored.
   */
  async acknowledgeMessage(messageId: string, recipient: string): Promise<void> {
    const envelope = await this.store.getMessage(messageId);
    if (!envelope) {
      this.logger.debug({ messageId, recipient }, 'Acknowledge for unknown message ignored');
      return;
    }

    const previousLength = await this.store.countPendingMessages(recipient);
    if (!(await this.store.markProcessed(messageId))) {
      this.logger.debug({ messageId, recipient }, 'Acknowledge for message no longer pending ignored');
      return;
    }
    const queueLength = await this.store.countPendingMessages(recipient);

    await this.emit({
      eventType: TelemetryEventType.MESSAGE_PROCESSED,
      correlationId: envelope.correlationId,
      agentId: recipient,
      messageId,
      details: { sender: envelope.sender, messageType: envelope.messageType },
    });
    await this.emitQueueLength(recipient, envelope, previousLength, queueLength);
  }

  /**
   * Record a processing failure. Returns true while the message should be
   * retried, false once it has failed for good, is not tracked or was
   * already processed.
   */
  async handleFailure(messageId: string, recipient: string): Promise<boolean> {
    if (!this.store.durable) {
      return false;
    }

    const envelope = await this.store.getMessage(messageId);
    if (!envelope) {
      return false;
    }

    const status = await this.store.recordFailure(messageId, MessageBroker.MAX_RETRIES);
    if (!status) {
      this.logger.debug({ messageId, recipient }, 'Failure for message no longer pending ignored');
      return false;
    }

    if (status.state === 'pending') {
      this.logger.info(
        { messageId, recipient, retryCount: status.retryCount },
        'Message scheduled for retry'
      );
      await this.emit({
        eventType: TelemetryEventType.RETRY,
        correlationId: envelope.correlationId,
        agentId: recipient,
        messageId,
        details: { retryCount: status.retryCount, maxRetries: MessageBroker.MAX_RETRIES },
      });
      return true;
    }

    this.logger.warn(
      { messageId, recipient, sender: envelope.sender, retryCount: status.retryCount },
      'Message failed after exhausting retries'
    );
    await this.emit({
      eventType: TelemetryEventType.MESSAGE_FAILED,
      correlationId: envelope.correlationId,
      agentId: recipient,
      messageId,
      details: {
        retryCount: status.retryCount,
        maxRetries: MessageBroker.MAX_RETRIES,
        sender: envelope.sender,
        messageType: envelope.messageType,
      },
    });

    if (this.notifySenderOnFailure && envelope.messageType !== MessageType.ERROR) {
      await this.store.saveMessage(
        this.createErrorEnvelope(
          envelope,
          formatDeliveryFailure(envelope.recipient, MessageBroker.MAX_RETRIES)
        )
      );
    }

    return false;
  }

  // ============================================================================
  // Private Helpers
  // ============================================================================

  private async buildValidationContext(envelope: MessageEnvelope): Promise<ValidationContext> {
    const context: ValidationContext = { timestamp: Date.now() / 1000 };
    if (!this.store.durable) {
      return context;
    }

    try {
      context.conversationHistory = await this.store.getConversationHistory(
        envelope.sender,
        envelope.recipient,
        this.historyLimit
      );
    } catch (error) {
      this.logger.warn(
        { messageId: envelope.messageId, error: errorMessage(error) },
        'Conversation history lookup failed; validating without history'
      );
      context.conversationHistory = [];
    }

    return context;
  }

  private async reject(envelope: MessageEnvelope, violations: PolicyViolation[]): Promise<void> {
    this.logger.info(
      {
        messageId: envelope.messageId,
        sender: envelope.sender,
        recipient: envelope.recipient,
        violations: violations.map(v => v.policyName),
      },
      'Message rejected by policy'
    );

    await this.store.saveMessage(
      this.createErrorEnvelope(envelope, formatPolicyRejection(envelope.recipient, violations))
    );

    await this.emit({
      eventType: TelemetryEventType.MESSAGE_VALIDATION_FAILED,
      correlationId: envelope.correlationId,
      agentId: envelope.sender,
      messageId: envelope.messageId,
      details: {
        recipient: envelope.recipient,
        violations: violations.map(v => ({ policy: v.policyName, reason: v.reason })),
      },
    });
  }

  private async enqueue(envelope: MessageEnvelope): Promise<void> {
    if (!this.store.durable) {
      this.logger.debug(
        { messageId: envelope.messageId, recipient: envelope.recipient },
        'No durable store; message accepted without queuing'
      );
      await this.emit({
        eventType: TelemetryEventType.MESSAGE_SENT,
        correlationId: envelope.correlationId,
        agentId: envelope.sender,
        messageId: envelope.messageId,
        details: { recipient: envelope.recipient, messageType: envelope.messageType, durable: false },
      });
      return;
    }

    const previousLength = await this.store.countPendingMessages(envelope.recipient);
    await this.store.saveMessage(envelope);
    const queueLength = await this.store.countPendingMessages(envelope.recipient);

    await this.emit({
      eventType: TelemetryEventType.MESSAGE_SENT,
      correlationId: envelope.correlationId,
      agentId: envelope.sender,
      messageId: envelope.messageId,
      details: { recipient: envelope.recipient, messageType: envelope.messageType },
    });
    await this.emitQueueLength(envelope.recipient, envelope, previousLength, queueLength);
  }

  private createErrorEnvelope(original: MessageEnvelope, payload: string): MessageEnvelope {
    return MessageEnvelope.create({
      sender: this.systemAgentId,
      recipient: original.sender,
      payload,
      messageType: MessageType.ERROR,
      correlationId: original.correlationId,
      replyTo: original.messageId,
      secretKey: this.secretKey,
    });
  }

  private async emitQueueLength(
    agentId: string,
    envelope: MessageEnvelope,
    previousLength: number,
    queueLength: number
  ): Promise<void> {
    await this.emit({
      eventType: TelemetryEventType.QUEUE_LENGTH_CHANGED,
      correlationId: envelope.correlationId,
      agentId,
      messageId: envelope.messageId,
      details: { queueLength, previousLength },
    });
  }

  /**
   * Telemetry never affects delivery: sink errors are logged and dropped.
   */
  private async emit(event: TelemetryEventInput): Promise<void> {
    try {
      await this.telemetry.recordEvent(event);
    } catch (error) {
      this.logger.warn(
        { eventType: event.eventType, messageId: event.messageId, error: errorMessage(error) },
        'Telemetry sink failed'
      );
    }
  }
}
