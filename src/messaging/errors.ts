// Messaging error classes

export abstract class BrokerError extends Error {
  abstract readonly code: string;
  readonly timestamp: number;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
    this.timestamp = Date.now();
  }

  toJSON(): Record<string, unknown> {
    return {
      error: this.code,
      message: this.message,
      timestamp: this.timestamp,
    };
  }
}

export class InvalidEnvelopeError extends BrokerError {
  readonly code = 'INVALID_ENVELOPE';

  constructor(public readonly issues: string[]) {
    super(`Invalid envelope: ${issues.join(', ')}`);
  }
}

export class SignatureError extends BrokerError {
  readonly code = 'INVALID_SIGNATURE';

  constructor(
    message: string = 'Invalid signature',
    public readonly reason?: 'malformed' | 'algorithm' | 'signature' | 'claims'
  ) {
    super(message);
  }
}

export class StoreError extends BrokerError {
  readonly code = 'STORE_ERROR';

  constructor(
    message: string,
    public readonly operation: string,
    cause?: unknown
  ) {
    super(`Store operation '${operation}' failed: ${message}`, { cause });
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
