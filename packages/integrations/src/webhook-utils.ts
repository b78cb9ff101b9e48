import { createHash, timingSafeEqual } from 'node:crypto';

function digest(value: string): Buffer {
  return createHash('sha256').update(value).digest();
}

// Compared as sha256 digests: timingSafeEqual needs equal-length buffers.
export function secretsMatch(candidate: string, expected: string): boolean {
  return timingSafeEqual(digest(candidate), digest(expected));
}

export function pickSharedSecret(
  headerValue: string | string[] | undefined,
  queryValue: unknown,
): string | null {
  const header = Array.isArray(headerValue) ? headerValue[0] : headerValue;
  if (typeof header === 'string' && header.length > 0) {
    return header;
  }

  if (typeof queryValue === 'string' && queryValue.length > 0) {
    return queryValue;
  }

  return null;
}
