/**
 * Webhook request signing
 *
 * The robot endpoint accepts a request when `timestamp` is recent and `sign`
 * is the HMAC-SHA256 of "timestamp\nsecret" keyed by the secret.
 */

import { createHmac } from 'crypto';
import { NotifierError, NotifierErrorType } from '../error-handling';
import { SignedRequest } from '../types';

export const SIGNATURE_SCHEME = 'HmacSHA256';

export interface Signature {
  timestamp: string;
  sign: string;
}

export function sign(secret: string | undefined, nowMillis: number): Signature {
  if (!secret) {
    throw new NotifierError('Signing secret is not configured', NotifierErrorType.SIGNING_ERROR, {
      operation: 'sign'
    });
  }

  const timestamp = String(Math.round(nowMillis));
  const stringToSign = `${timestamp}\n${secret}`;
  const digest = createHmac('sha256', secret).update(stringToSign, 'utf8').digest('base64');

  return { timestamp, sign: encodeURIComponent(digest) };
}

/**
 * Append timestamp and sign to the webhook URL. Call once per delivery attempt.
 */
export function signUrl(
  baseUrl: string | undefined,
  secret: string | undefined,
  nowMillis: number
): SignedRequest {
  if (!baseUrl) {
    throw new NotifierError('Webhook URL is not configured', NotifierErrorType.SIGNING_ERROR, {
      operation: 'signUrl'
    });
  }

  const signature = sign(secret, nowMillis);
  const separator = baseUrl.includes('?') ? '&' : '?';

  return {
    url: `${baseUrl}${separator}timestamp=${signature.timestamp}&sign=${signature.sign}`,
    timestamp: signature.timestamp,
    sign: signature.sign
  };
}
