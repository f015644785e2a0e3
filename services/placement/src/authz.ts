import { createHash, timingSafeEqual } from 'node:crypto';
import type { PlacementConfig } from './config';

type AccessResult =
  | { ok: true; requesterId: string }
  | { ok: false; status: number; error: string };

const block = (error: string, status = 401): AccessResult => ({ ok: false, status, error });

const digestKey = (key: string): Buffer => createHash('sha256').update(key, 'utf8').digest();

const KEY_FINGERPRINT_LENGTH = 16;

/**
 * Public quote callers authenticate with one of the configured API keys. The
 * requester identity is a fingerprint of the key, never the key itself.
 */
export const checkQuoteAccess = (
  config: Pick<PlacementConfig, 'apiKeys'>,
  apiKey: string | undefined,
): AccessResult => {
  if (!config.apiKeys?.length) {
    return block('quote-api-disabled', 503);
  }
  if (!apiKey) {
    return block('unauthorized');
  }
  const presented = digestKey(apiKey);
  const known = config.apiKeys.some((candidate) => timingSafeEqual(digestKey(candidate), presented));
  if (!known) {
    return block('unauthorized');
  }
  return { ok: true, requesterId: `api-key:${presented.toString('hex').slice(0, KEY_FINGERPRINT_LENGTH)}` };
};
