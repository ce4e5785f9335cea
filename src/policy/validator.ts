/**
 * Policy Validator
 * Runs an ordered set of policies and collects their violations
 */

import type { MessageEnvelope } from '../messaging/envelope.js';
import { errorMessage } from '../messaging/errors.js';
import { getLogger, type Logger } from '../observability/logger.js';
import type {
  MessagePolicy,
  MessageValidator,
  PolicyViolation,
  ValidationContext,
  ValidationResult,
} from './types.js';

export class PolicyValidator implements MessageValidator {
  private readonly policies = new Map<string, MessagePolicy>();
  private readonly logger: Logger;

  constructor(policies: MessagePolicy[] = [], logger?: Logger) {
    this.logger = logger ?? getLogger().child({ module: 'PolicyValidator' });
    for (const policy of policies) {
      this.addPolicy(policy);
    }
  }

  /**
   * Register a policy. Names are unique; re-adding a name replaces the policy.
   */
  addPolicy(policy: MessagePolicy): this {
    this.policies.set(policy.name, policy);
    return this;
  }

  removePolicy(name: string): boolean {
    return this.policies.delete(name);
  }

  listPolicies(): string[] {
    return Array.from(this.policies.keys());
  }

  get size(): number {
    return this.policies.size;
  }

  /**
   * Evaluate every policy. A policy that throws counts as a violation.
   */
  async validate(envelope: MessageEnvelope, context: ValidationContext): Promise<ValidationResult> {
    const violations: PolicyViolation[] = [];

    for (const policy of this.policies.values()) {
      try {
        const violation = await policy.evaluate(envelope, context);
        if (violation) {
          violations.push(violation);
        }
      } catch (error) {
        this.logger.error(
          { policy: policy.name, messageId: envelope.messageId, error: errorMessage(error) },
          'Policy evaluation failed'
        );
        violations.push({
          policyName: policy.name,
          reason: `evaluation failed: ${errorMessage(error)}`,
        });
      }
    }

    if (violations.length > 0) {
      this.logger.debug(
        { messageId: envelope.messageId, violations: violations.map(v => v.policyName) },
        'Message failed validation'
      );
    }

    return { valid: violations.length === 0, violations };
  }
}
