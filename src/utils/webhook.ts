import { createHmac, timingSafeEqual } from 'node:crypto';

export const SIGNATURE_HEADER = 'x-gitea-signature';

/**
 * Hex HMAC-SHA256 of the raw body, the form Gitea puts in X-Gitea-Signature.
 */
export function signPayload(secret: string, body: Buffer | string): string {
  return createHmac('sha256', secret).update(body).digest('hex');
}

export class WebhookValidator {
  private secret?: string;

  constructor(secret: string | undefined) {
    this.secret = secret;
  }

  /**
   * Verify a Gitea webhook signature against the raw request body.
   * A missing secret never authenticates anything.
   */
  verifySignature(body: Buffer, signature: string | undefined): boolean {
    if (!signature || !this.secret) {
      return false;
    }

    const expected = Buffer.from(signPayload(this.secret, body), 'utf8');
    const provided = Buffer.from(signature, 'utf8');

    if (expected.length !== provided.length) {
      return false;
    }
    return timingSafeEqual(expected, provided);
  }
}
