type RedactionValue = Record<string, unknown> | unknown[] | string | number | boolean | null | undefined;

const REDACT_KEYS = new Set(['password', 'connectionString', 'authorization', 'secret', 'token']);

const sanitize = (value: unknown, seen = new WeakSet<object>()): RedactionValue => {
  if (value === null || value === undefined) {
    return value;
  }
  if (typeof value !== 'object') {
    if (typeof value === 'bigint' || typeof value === 'symbol' || typeof value === 'function') {
      return String(value);
    }
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      return value;
    }
    return undefined;
  }
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  if (seen.has(value)) {
    return '[REDACTED]';
  }
  seen.add(value);
  if (Array.isArray(value)) {
    return value.map((entry) => sanitize(entry, seen));
  }
  if (value instanceof Map) {
    return sanitize(Object.fromEntries(value), seen);
  }
  const result: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (REDACT_KEYS.has(key) || /secret|password|credential/i.test(key)) {
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
