/**
 * Messaging domain types
 */

/**
 * Message type tags. `ERROR` is reserved for broker-synthesized replies and
 * is never passed through policy validation.
 */
export const MessageType = {
  DIRECT: 'direct',
  BROADCAST: 'broadcast',
  RESPONSE: 'response',
  ERROR: 'error',
} as const;

export type MessageType = (typeof MessageType)[keyof typeof MessageType];

/**
 * Delivery state tracked by the store for every persisted envelope
 */
export type DeliveryState = 'pending' | 'processed' | 'failed';

export interface DeliveryStatus {
  messageId: string;
  state: DeliveryState;
  retryCount: number;
}

/**
 * Plain representation of an envelope, used for storage and transport
 */
export interface SerializedEnvelope {
  messageId: string;
  sender: string;
  recipient: string;
  messageType: MessageType;
  payload: string;
  /** Seconds since epoch */
  timestamp: number;
  correlationId: string | null;
  replyTo: string | null;
  signature: string | null;
}

/**
 * Claims covered by an envelope signature
 */
export interface SignatureClaims {
  message_id: string;
  payload: string;
}
