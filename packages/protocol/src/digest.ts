import stableStringify from 'fast-json-stable-stringify';
import { sha256 } from '@noble/hashes/sha256';
import { bytesToHex } from '@noble/hashes/utils';

export const stableDigest = (value: unknown): string => {
  const serialized = stableStringify(value);
  return bytesToHex(sha256(new TextEncoder().encode(serialized)));
};
