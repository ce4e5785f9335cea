export {
  type PolicyViolation,
  type ValidationContext,
  type ValidationResult,
  type MessageValidator,
  type MessagePolicy,
} from './types.js';

export { PolicyValidator } from './validator.js';

export {
  ContentLengthPolicy,
  ForbiddenPatternPolicy,
  PiiPolicy,
  RateLimitPolicy,
  createPolicy,
  createPolicyValidator,
  type PolicyCheck,
} from './policies.js';
