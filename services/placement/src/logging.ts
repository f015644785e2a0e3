type RedactionValue = Record<string, unknown> | unknown[] | string | number | boolean | null | undefined;

const REDACT_KEYS = new Set([
  'apiKey',
  'apiKeys',
  'authorization',
  'x-api-key',
  'password',
  'secret',
  'token',
  'url',
  'connectionString',
]);

const REDACT_PATTERN = /key|secret|token|auth|password/i;

const sanitize = (value: unknown, seen = new WeakSet<object>()): RedactionValue => {
  if (value === null || value === undefined) {
    return value;
  }
  if (typeof value === 'bigint' || typeof value === 'symbol' || typeof value === 'function') {
    return String(value);
  }
  if (typeof value !== 'object') {
    return value;
  }
  if (value instanceof Error) {
    const code = 'code' in value && typeof value.code === 'string' ? value.code : undefined;
    return code ? { name: value.name, message: value.message, code } : { name: value.name, message: value.message };
  }
  if (seen.has(value)) {
    return '[REDACTED]';
  }
  seen.add(value);
  if (Array.isArray(value)) {
    return value.map((entry) => sanitize(entry, seen));
  }
  const result: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    // Identifiers such as nodeId/requestId stay visible.
    if (REDACT_KEYS.has(key) || (REDACT_PATTERN.test(key) && !key.endsWith('Id'))) {
      result[key] = '[REDACTED]';
    } else {
      result[key] = sanitize(entry, seen);
    }
  }
  return result;
};

export const serialize = (value: unknown): string => {
  try {
    return JSON.stringify(sanitize(value));
  } catch {
    return '[unserializable]';
  }
};

export const logInfo = (message: string, meta?: unknown): void => {
  if (meta === undefined) {
    console.log(message);
    return;
  }
  console.log(message, serialize(meta));
};

export const logWarn = (message: string, meta?: unknown): void => {
  if (meta === undefined) {
    console.warn(message);
    return;
  }
  console.warn(message, serialize(meta));
};

export const logError = (message: string, meta?: unknown): void => {
  if (meta === undefined) {
    console.error(message);
    return;
  }
  console.error(message, serialize(meta));
};
