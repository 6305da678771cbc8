import * as crypto from 'crypto';

/**
 * Token de sesión: `<userId>.<hmac-sha256(userId) en hex>`.
 */
export function signSessionToken(userId: string, secret: string): string {
  return `${userId}.${hmac(userId, secret)}`;
}

/** Devuelve el userId si la firma es válida, o null. */
export function verifySessionToken(
  token: string,
  secret: string,
): string | null {
  const separator = token.lastIndexOf('.');

  if (separator <= 0 || separator === token.length - 1) {
    return null;
  }

  const userId = token.slice(0, separator);
  const received = Buffer.from(token.slice(separator + 1), 'utf8');
  const expected = Buffer.from(hmac(userId, secret), 'utf8');

  // timingSafeEqual exige el mismo largo
  if (received.length !== expected.length) {
    return null;
  }

  return crypto.timingSafeEqual(received, expected) ? userId : null;
}

function hmac(value: string, secret: string): string {
  return crypto.createHmac('sha256', secret).update(value).digest('hex');
}
