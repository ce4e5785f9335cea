/**
 * Message Envelope
 * Immutable, optionally signed unit of inter-agent communication
 */

import { randomUUID } from 'crypto';
import { z } from 'zod';
import { InvalidEnvelopeError } from './errors.js';
import { defaultSigner, type MessageSigner } from './signing.js';
import { MessageType, type SerializedEnvelope } from './types.js';

const AgentIdSchema = z
  .string()
  .min(1, 'must not be empty')
  .refine(value => value.trim().length > 0, 'must not be blank');

export const MessageTypeSchema = z.enum([
  MessageType.DIRECT,
  MessageType.BROADCAST,
  MessageType.RESPONSE,
  MessageType.ERROR,
]);

const CreateEnvelopeSchema = z.object({
  sender: AgentIdSchema,
  recipient: AgentIdSchema,
  payload: z.string(),
  messageType: MessageTypeSchema.default(MessageType.DIRECT),
  correlationId: z.string().optional(),
  replyTo: z.string().optional(),
});

/**
 * Schema for envelopes coming back from storage or transport
 */
export const SerializedEnvelopeSchema = z.object({
  messageId: z.string().min(1),
  sender: AgentIdSchema,
  recipient: AgentIdSchema,
  messageType: MessageTypeSchema,
  payload: z.string(),
  timestamp: z.number().finite().nonnegative(),
  correlationId: z.string().nullable(),
  replyTo: z.string().nullable(),
  signature: z.string().nullable(),
});

export interface CreateEnvelopeOptions {
  sender: string;
  recipient: string;
  payload: string;
  messageType?: MessageType;
  correlationId?: string;
  replyTo?: string;
  /** Shared secret; when set the envelope is signed at creation */
  secretKey?: string;
  signer?: MessageSigner;
}

interface EnvelopeFields {
  messageId: string;
  sender: string;
  recipient: string;
  messageType: MessageType;
  payload: string;
  timestamp: number;
  correlationId?: string;
  replyTo?: string;
  signature?: string;
}

function formatIssues(error: z.ZodError): string[] {
  return error.errors.map(e => (e.path.length > 0 ? `${e.path.join('.')}: ${e.message}` : e.message));
}

export class MessageEnvelope {
  readonly messageId: string;
  readonly sender: string;
  readonly recipient: string;
  readonly messageType: MessageType;
  readonly payload: string;
  /** Creation time in seconds since epoch */
  readonly timestamp: number;
  readonly correlationId?: string;
  readonly replyTo?: string;
  readonly signature?: string;

  private constructor(fields: EnvelopeFields) {
    this.messageId = fields.messageId;
    this.sender = fields.sender;
    this.recipient = fields.recipient;
    this.messageType = fields.messageType;
    this.payload = fields.payload;
    this.timestamp = fields.timestamp;
    this.correlationId = fields.correlationId;
    this.replyTo = fields.replyTo;
    this.signature = fields.signature;
    Object.freeze(this);
  }

  /**
   * Create a new envelope with a fresh id and the current time.
   * Signs `{ message_id, payload }` when a secret key is supplied.
   */
  static create(options: CreateEnvelopeOptions): MessageEnvelope {
    const result = CreateEnvelopeSchema.safeParse(options);
    if (!result.success) {
      throw new InvalidEnvelopeError(formatIssues(result.error));
    }

    const input = result.data;
    const messageId = randomUUID();
    const signer = options.signer ?? defaultSigner;

    return new MessageEnvelope({
      messageId,
      sender: input.sender,
      recipient: input.recipient,
      messageType: input.messageType,
      payload: input.payload,
      timestamp: Date.now() / 1000,
      correlationId: input.correlationId,
      replyTo: input.replyTo,
      signature: options.secretKey
        ? signer.sign({ message_id: messageId, payload: input.payload }, options.secretKey)
        : undefined,
    });
  }

  /**
   * Rebuild an envelope from its serialized form
   */
  static restore(record: unknown): MessageEnvelope {
    const result = SerializedEnvelopeSchema.safeParse(record);
    if (!result.success) {
      throw new InvalidEnvelopeError(formatIssues(result.error));
    }

    const data = result.data;
    return new MessageEnvelope({
      messageId: data.messageId,
      sender: data.sender,
      recipient: data.recipient,
      messageType: data.messageType,
      payload: data.payload,
      timestamp: data.timestamp,
      correlationId: data.correlationId ?? undefined,
      replyTo: data.replyTo ?? undefined,
      signature: data.signature ?? undefined,
    });
  }

  /**
   * Check the signature against `secretKey`. Never throws: a missing,
   * malformed or foreign signature, or a tampered payload, yields false.
   */
  verify(secretKey: string, signer: MessageSigner = defaultSigner): boolean {
    if (!this.signature) {
      return false;
    }

    try {
      const claims = signer.verify(this.signature, secretKey);
      return claims.message_id === this.messageId && claims.payload === this.payload;
    } catch {
      return false;
    }
  }

  get isSigned(): boolean {
    return this.signature !== undefined;
  }

  serialize(): SerializedEnvelope {
    return {
      messageId: this.messageId,
      sender: this.sender,
      recipient: this.recipient,
      messageType: this.messageType,
      payload: this.payload,
      timestamp: this.timestamp,
      correlationId: this.correlationId ?? null,
      replyTo: this.replyTo ?? null,
      signature: this.signature ?? null,
    };
  }

  toJSON(): SerializedEnvelope {
    return this.serialize();
  }
}
