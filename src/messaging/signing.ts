import { createHmac, timingSafeEqual } from 'crypto';
import { SignatureError } from './errors.js';
import type { SignatureClaims } from './types.js';

const ALGORITHM = 'HS256';
const TOKEN_TYPE = 'JWT';

/**
 * Keyed signature scheme over `{ message_id, payload }`.
 *
 * Implementations must be stateless with respect to the secret: the same
 * signer instance is shared by every envelope and every broker.
 */
export interface MessageSigner {
  readonly algorithm: string;
  /** Produce a signature token for the claims */
  sign(claims: SignatureClaims, secret: string): string;
  /** Decode a token, throwing SignatureError if it was not produced with `secret` */
  verify(token: string, secret: string): SignatureClaims;
}

/**
 * HMAC-SHA256 signer producing compact JWS tokens (`header.payload.signature`).
 */
export class HmacTokenSigner implements MessageSigner {
  readonly algorithm = ALGORITHM;

  sign(claims: SignatureClaims, secret: string): string {
    const header = { alg: ALGORITHM, typ: TOKEN_TYPE };
    const headerB64 = this.base64UrlEncode(JSON.stringify(header));
    const payloadB64 = this.base64UrlEncode(
      JSON.stringify({ message_id: claims.message_id, payload: claims.payload })
    );
    const signature = this.createSignature(`${headerB64}.${payloadB64}`, secret);
    return `${headerB64}.${payloadB64}.${signature}`;
  }

  verify(token: string, secret: string): SignatureClaims {
    const parts = token.split('.');
    if (parts.length !== 3) {
      throw new SignatureError('Malformed token', 'malformed');
    }

    const [headerB64, payloadB64, signatureB64] = parts;

    const header = this.parseSegment(headerB64);
    if (header.alg !== ALGORITHM) {
      throw new SignatureError(`Unsupported algorithm: ${String(header.alg)}`, 'algorithm');
    }

    const expectedSignature = this.createSignature(`${headerB64}.${payloadB64}`, secret);
    if (!this.constantTimeCompare(signatureB64, expectedSignature)) {
      throw new SignatureError('Invalid signature', 'signature');
    }

    const payload = this.parseSegment(payloadB64);
    if (typeof payload.message_id !== 'string' || typeof payload.payload !== 'string') {
      throw new SignatureError('Missing signed claims', 'claims');
    }

    return { message_id: payload.message_id, payload: payload.payload };
  }

  private parseSegment(segment: string): Record<string, unknown> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(this.base64UrlDecode(segment));
    } catch {
      throw new SignatureError('Invalid token segment', 'malformed');
    }
    if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) {
      throw new SignatureError('Invalid token segment', 'malformed');
    }
    return Object.fromEntries(Object.entries(parsed));
  }

  private createSignature(data: string, secret: string): string {
    return createHmac('sha256', secret).update(data).digest('base64url');
  }

  private base64UrlEncode(str: string): string {
    return Buffer.from(str, 'utf8').toString('base64url');
  }

  private base64UrlDecode(str: string): string {
    return Buffer.from(str, 'base64url').toString('utf8');
  }

  private constantTimeCompare(a: string, b: string): boolean {
    const left = Buffer.from(a);
    const right = Buffer.from(b);
    if (left.length !== right.length) return false;
    return timingSafeEqual(left, right);
  }
}

export const defaultSigner: MessageSigner = new HmacTokenSigner();
