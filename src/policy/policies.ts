/**
 * Built-in message policies
 */

import type { MessageEnvelope } from '../messaging/envelope.js';
import type { PoliciesConfig } from '../config/schema.js';
import { PolicyValidator } from './validator.js';
import type { Logger } from '../observability/logger.js';
import type { MessagePolicy, PolicyViolation, ValidationContext } from './types.js';

/**
 * Rejects payloads longer than `maxLength` characters, counted as Unicode
 * code points
 */
export class ContentLengthPolicy implements MessagePolicy {
  readonly name = 'content_length';
  readonly description: string;

  constructor(private readonly maxLength: number) {
    this.description = `Payload must not exceed ${maxLength} characters`;
  }

  evaluate(envelope: MessageEnvelope): PolicyViolation | null {
    const length = [...envelope.payload].length;
    if (length <= this.maxLength) {
      return null;
    }
    return {
      policyName: this.name,
      reason: `payload length ${length} exceeds ${this.maxLength} characters`,
    };
  }
}

/**
 * Rejects payloads matching any of the given patterns (case-insensitive for strings)
 */
export class ForbiddenPatternPolicy implements MessagePolicy {
  readonly name = 'forbidden_content';
  readonly description = 'Payload must not contain forbidden content';
  private readonly patterns: RegExp[];

  constructor(patterns: Array<string | RegExp>) {
    this.patterns = patterns.map(p =>
      typeof p === 'string' ? new RegExp(p, 'i') : new RegExp(p.source, p.flags.replace(/[gy]/g, ''))
    );
  }

  evaluate(envelope: MessageEnvelope): PolicyViolation | null {
    const match = this.patterns.find(p => p.test(envelope.payload));
    if (!match) {
      return null;
    }
    return { policyName: this.name, reason: `matches forbidden pattern '${match.source}'` };
  }
}

const PII_PATTERNS: ReadonlyArray<{ kind: string; regex: RegExp }> = [
  { kind: 'email', regex: /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/ },
  { kind: 'phone number', regex: /(?:\+?1[-.\s]?)?\(?\b\d{3}\)?[-.\s]\d{3}[-.\s]\d{4}\b/ },
  { kind: 'SSN', regex: /\b\d{3}-\d{2}-\d{4}\b/ },
  {
    kind: 'credit card number',
    regex: /\b(?:4[0-9]{12}(?:[0-9]{3})?|5[1-5][0-9]{14}|3[47][0-9]{13}|6(?:011|5[0-9]{2})[0-9]{12})\b/,
  },
];

/**
 * Rejects payloads carrying personal data. The reason lists the kinds found,
 * e.g. `contains email, phone number`.
 */
export class PiiPolicy implements MessagePolicy {
  readonly name = 'no_pii';
  readonly description = 'Payload must not contain personal data';

  evaluate(envelope: MessageEnvelope): PolicyViolation | null {
    const found = PII_PATTERNS.filter(p => p.regex.test(envelope.payload)).map(p => p.kind);
    if (found.length === 0) {
      return null;
    }
    return { policyName: this.name, reason: `contains ${found.join(', ')}` };
  }
}

/**
 * Limits how many messages a sender may address to one recipient within a
 * sliding window. Counts come from the conversation history in the context,
 * so the effective ceiling is bounded by the history the broker supplies.
 */
export class RateLimitPolicy implements MessagePolicy {
  readonly name = 'rate_limit';
  readonly description: string;

  constructor(
    private readonly maxMessages: number,
    private readonly windowSeconds: number
  ) {
    this.description = `At most ${maxMessages} messages per ${windowSeconds}s to the same recipient`;
  }

  evaluate(envelope: MessageEnvelope, context: ValidationContext): PolicyViolation | null {
    const windowStart = context.timestamp - this.windowSeconds;
    const recent = (context.conversationHistory ?? []).filter(
      e =>
        e.sender === envelope.sender &&
        e.recipient === envelope.recipient &&
        e.messageId !== envelope.messageId &&
        e.timestamp >= windowStart
    ).length;

    if (recent < this.maxMessages) {
      return null;
    }
    return {
      policyName: this.name,
      reason: `more than ${this.maxMessages} messages to ${envelope.recipient} within ${this.windowSeconds}s`,
    };
  }
}

export type PolicyCheck = (
  envelope: MessageEnvelope,
  context: ValidationContext
) => string | null | Promise<string | null>;

/**
 * Build a policy from a predicate returning a rejection reason or null
 */
export function createPolicy(name: string, check: PolicyCheck, description?: string): MessagePolicy {
  return {
    name,
    description,
    async evaluate(envelope, context) {
      const reason = await check(envelope, context);
      return reason === null ? null : { policyName: name, reason };
    },
  };
}

/**
 * Build a validator from configuration. Returns undefined when no policy is enabled.
 */
export function createPolicyValidator(
  config: PoliciesConfig,
  extraPolicies: MessagePolicy[] = [],
  logger?: Logger
): PolicyValidator | undefined {
  const policies: MessagePolicy[] = [];

  if (config.contentLength.enabled) {
    policies.push(new ContentLengthPolicy(config.contentLength.maxLength));
  }
  if (config.forbiddenContent.enabled && config.forbiddenContent.patterns.length > 0) {
    policies.push(new ForbiddenPatternPolicy(config.forbiddenContent.patterns));
  }
  if (config.pii.enabled) {
    policies.push(new PiiPolicy());
  }
  if (config.rateLimit.enabled) {
    policies.push(new RateLimitPolicy(config.rateLimit.maxMessages, config.rateLimit.windowSeconds));
  }
  policies.push(...extraPolicies);

  return policies.length > 0 ? new PolicyValidator(policies, logger) : undefined;
}
