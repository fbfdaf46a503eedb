import * as crypto from 'crypto';
import { z } from 'zod';

const StateSchema = z.object({ payload: z.string(), signature: z.string() });
const PayloadSchema = z.object({ nonce: z.string().min(1), expiresAt: z.number() });

function sign(payload: string, secret: string): string {
  return crypto.createHmac('sha256', secret).update(payload).digest('hex');
}

/**
 * Generate a signed, expiring OAuth state token.
 * @returns Base64url-encoded signed state token
 */
export function generateOAuthState(secret: string, ttlMs: number, now: number = Date.now()): string {
  const payload = JSON.stringify({ nonce: crypto.randomBytes(16).toString('hex'), expiresAt: now + ttlMs });
  const state = { payload, signature: sign(payload, secret) };
  return Buffer.from(JSON.stringify(state)).toString('base64url');
}

/**
 * Validate an OAuth state token.
 * @returns true if the signature matches and the token has not expired
 */
export function validateOAuthState(state: string, secret: string, now: number = Date.now()): boolean {
  let decoded: unknown;
  try {
    decoded = JSON.parse(Buffer.from(state, 'base64url').toString());
  } catch {
    return false;
  }

  const parsedState = StateSchema.safeParse(decoded);
  if (!parsedState.success) return false;
  const { payload, signature } = parsedState.data;

  const expected = Buffer.from(sign(payload, secret));
  const actual = Buffer.from(signature);
  if (expected.length !== actual.length || !crypto.timingSafeEqual(expected, actual)) {
    return false;
  }

  let body: unknown;
  try {
    body = JSON.parse(payload);
  } catch {
    return false;
  }
  const parsedPayload = PayloadSchema.safeParse(body);
  return parsedPayload.success && now <= parsedPayload.data.expiresAt;
}
