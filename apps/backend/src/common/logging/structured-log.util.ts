import { createHash, randomUUID } from 'crypto';

const REDACTED_VALUE = '[REDACTED]';
const MAX_STRING_LENGTH = 512;
const MAX_RECURSION_DEPTH = 6;

// Mailbox addresses, message content and code values never reach log sinks.
const SENSITIVE_KEY_MATCHERS: RegExp[] = [
  /password/,
  /token/,
  /secret/,
  /authorization/,
  /apikey/,
  /cookie/,
  /email/,
  /address/,
  /sender/,
  /subject/,
  /body/,
  /content/,
  /^html$/,
  /^text$/,
  /^code$/,
  /verificationcode/,
  /latestcode/,
  /messageid/,
];

const SAFE_KEY_ALLOWLIST = new Set([
  'event',
  'runcorrelationid',
  'mailboxid',
  'mailboxfingerprint',
  'verificationid',
  'statuscode',
  'durationms',
  'trigger',
]);

type RedactContext = {
  depth: number;
  seen: WeakSet<object>;
};

function normalizeKey(input: string): string {
  return input.replace(/[^a-z0-9]/gi, '').toLowerCase();
}

function isSensitiveKey(key: string): boolean {
  const normalized = normalizeKey(key);
  if (!normalized || SAFE_KEY_ALLOWLIST.has(normalized)) return false;
  return SENSITIVE_KEY_MATCHERS.some((matcher) => matcher.test(normalized));
}

function truncateStringValue(input: string): string {
  if (input.length <= MAX_STRING_LENGTH) return input;
  const remaining = input.length - MAX_STRING_LENGTH;
  return `${input.slice(0, MAX_STRING_LENGTH)}...[truncated:${remaining}]`;
}

function redactRecord(
  record: object,
  context: RedactContext,
): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [entryKey, entryValue] of Object.entries(record)) {
    result[entryKey] = isSensitiveKey(entryKey)
      ? REDACTED_VALUE
      : redactValue(entryValue, {
          ...context,
          depth: context.depth + 1,
        });
  }
  return result;
}

function redactValue(value: unknown, context: RedactContext): unknown {
  if (context.depth > MAX_RECURSION_DEPTH) return '[MAX_DEPTH]';
  switch (typeof value) {
    case 'undefined':
    case 'number':
    case 'boolean':
      return value;
    case 'string':
      return truncateStringValue(value);
    case 'bigint':
    case 'symbol':
      return value.toString();
    case 'function':
      return '[FUNCTION]';
    default:
      break;
  }
  if (value === null) return null;
  if (value instanceof Date) return value.toISOString();
  if (Array.isArray(value)) {
    return value.map((entry) =>
      redactValue(entry, { ...context, depth: context.depth + 1 }),
    );
  }
  if (typeof value === 'object') {
    if (context.seen.has(value)) return '[CIRCULAR]';
    context.seen.add(value);
    return redactRecord(value, context);
  }
  return '[UNSERIALIZABLE]';
}

export function redactStructuredLogPayload(
  payload: Record<string, unknown>,
): Record<string, unknown> {
  return redactRecord(payload, { depth: 0, seen: new WeakSet() });
}

export function serializeStructuredLog(
  payload: Record<string, unknown>,
): string {
  return JSON.stringify(redactStructuredLogPayload(payload));
}

export function resolveCorrelationId(
  input: string | string[] | undefined,
): string {
  const rawValue = Array.isArray(input) ? input[0] : input;
  const normalized = String(rawValue || '').trim();
  return normalized || randomUUID();
}

export function fingerprintIdentifier(input: string): string {
  return createHash('sha256')
    .update(input.trim().toLowerCase())
    .digest('hex')
    .slice(0, 16);
}

export function describeUnknownError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
}
