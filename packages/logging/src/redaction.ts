// Key fragments that always hide the value: token values, cookies and the admin
// bearer credential must never reach a log line.
const ALWAYS_REDACTED = ['token', 'secret', 'authorization', 'cookie', 'password'] as const;

const REDACTED = '[REDACTED]';

const canonicalKey = (key: string) => key.toLowerCase().replace(/[^a-z0-9]/gu, '');

export type MetadataRedactor = (metadata: Record<string, unknown>) => Record<string, unknown>;

export const createRedactor = (extraKeys: readonly string[] = []): MetadataRedactor => {
  const extra = new Set(extraKeys.map(canonicalKey).filter(key => key.length > 0));

  const isSensitive = (key: string) => {
    const canonical = canonicalKey(key);
    return extra.has(canonical) || ALWAYS_REDACTED.some(fragment => canonical.includes(fragment));
  };

  const redactEntries = (record: object, ancestors: readonly object[]) =>
    Object.fromEntries(
      Object.entries(record).map(([key, value]) => [key, isSensitive(key) ? REDACTED : redact(value, [...ancestors, record])])
    );

  const redact = (value: unknown, ancestors: readonly object[]): unknown => {
    if (value instanceof Error) {
      return {name: value.name, message: value.message, ...(value.stack ? {stack: value.stack} : {})};
    }
    if (value instanceof Date) {
      return value.toISOString();
    }
    if (typeof value === 'function') {
      return '[FUNCTION]';
    }
    if (typeof value === 'bigint') {
      return value.toString();
    }
    if (typeof value !== 'object' || value === null) {
      return value;
    }
    if (ancestors.includes(value)) {
      return '[CIRCULAR]';
    }
    if (Array.isArray(value)) {
      return value.map(item => redact(item, [...ancestors, value]));
    }

    return redactEntries(value, ancestors);
  };

  return metadata => redactEntries(metadata, []);
};
