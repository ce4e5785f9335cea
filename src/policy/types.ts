/**
 * Policy validation types
 */

import type { MessageEnvelope } from '../messaging/envelope.js';

export interface PolicyViolation {
  policyName: string;
  reason: string;
}

/**
 * Context passed to validators alongside the envelope
 */
export interface ValidationContext {
  /** Validation time, seconds since epoch */
  timestamp: number;
  /** Most recent messages between sender and recipient, oldest first */
  conversationHistory?: MessageEnvelope[];
}

export interface ValidationResult {
  valid: boolean;
  violations: PolicyViolation[];
}

/**
 * Admission gate consulted by the broker before a message is queued
 */
export interface MessageValidator {
  validate(envelope: MessageEnvelope, context: ValidationContext): Promise<ValidationResult>;
}

/**
 * A single named rule. Returns a violation, or null when the message passes.
 */
export interface MessagePolicy {
  readonly name: string;
  readonly description?: string;
  evaluate(
    envelope: MessageEnvelope,
    context: ValidationContext
  ): PolicyViolation | null | Promise<PolicyViolation | null>;
}
