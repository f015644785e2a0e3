type Window = { count: number; resetAt: number };

export type RateLimiter = {
  allow: (key: string) => boolean;
};

/** Fixed-window counter per key. Returns null when limiting is not configured. */
export const createRateLimiter = (
  max: number | undefined,
  windowMs: number | undefined,
  nowMs: () => number = Date.now,
): RateLimiter | null => {
  if (!max || max <= 0 || !windowMs || windowMs <= 0) {
    return null;
  }

  const windows = new Map<string, Window>();

  const allow = (key: string): boolean => {
    const now = nowMs();
    const existing = windows.get(key);
    if (!existing || existing.resetAt <= now) {
      windows.set(key, { count: 1, resetAt: now + windowMs });
      return true;
    }
    if (existing.count >= max) {
      return false;
    }
    existing.count += 1;
    return true;
  };

  return { allow };
};
