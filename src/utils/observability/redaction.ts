const SECRET_KEY_PATTERN = /(token|secret|password|api[_-]?key|authorization|cookie|credential|client[_-]?secret)/i;
const ADDRESS_KEY_PATTERN = /^(sender|from|to|recipient|address)$/i;
const CONTENT_KEY_PATTERN = /^(body|content|prompt|systemPrompt|system|messages|response|text|draft)$/i;

const EMAIL_PATTERN = /[^\s<>"'(),;:@]+@([A-Za-z0-9.-]+\.[A-Za-z]{2,})/g;

type RedactOptions = {
  depth?: number;
};

function redactStringByKey(key: string | undefined, value: string): string {
  if (key && SECRET_KEY_PATTERN.test(key)) {
    return '[REDACTED]';
  }
  if (key && CONTENT_KEY_PATTERN.test(key)) {
    return `[REDACTED_TEXT len=${value.length}]`;
  }
  if (key && ADDRESS_KEY_PATTERN.test(key)) {
    return redactAddress(value);
  }
  return value.replace(EMAIL_PATTERN, '***@$1');
}

function redactObject(value: object, depth: number): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [childKey, childValue] of Object.entries(value)) {
    if (SECRET_KEY_PATTERN.test(childKey)) {
      result[childKey] = '[REDACTED]';
      continue;
    }
    result[childKey] = redactUnknown(childValue, childKey, { depth: depth + 1 });
  }
  return result;
}

function redactUnknown(
  value: unknown,
  key?: string,
  options: RedactOptions = {},
): unknown {
  const depth = options.depth ?? 0;
  if (depth > 6) return '[TRUNCATED]';

  if (value === null || value === undefined) return value;

  if (value instanceof Error) {
    return {
      name: value.name,
      message: redactStringByKey(key, value.message),
    };
  }

  if (typeof value === 'string') {
    return redactStringByKey(key, value);
  }

  if (typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }

  if (Array.isArray(value)) {
    if (key && CONTENT_KEY_PATTERN.test(key)) {
      return `[REDACTED_ARRAY len=${value.length}]`;
    }
    return value.map((item) => redactUnknown(item, key, { depth: depth + 1 }));
  }

  if (typeof value === 'object') {
    return redactObject(value, depth);
  }

  return String(value);
}

/** Keep the domain of every address in `value`, mask the local part. */
export function redactAddress(value: string): string {
  return value.replace(EMAIL_PATTERN, '***@$1');
}

export function redactSecrets(value: Record<string, unknown>): Record<string, unknown> {
  return redactObject(value, 0);
}

