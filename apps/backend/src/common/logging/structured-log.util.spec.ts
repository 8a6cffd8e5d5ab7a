import {
  describeUnknownError,
  fingerprintIdentifier,
  redactStructuredLogPayload,
  resolveCorrelationId,
  serializeStructuredLog,
} from './structured-log.util';

describe('structured-log.util', () => {
  it('redacts mailbox addresses, codes and message content recursively', () => {
    const payload = redactStructuredLogPayload({
      event: 'scan_record_created',
      mailboxFingerprint: 'abc123',
      mailboxAddress: 'a@x.test',
      statusCode: 200,
      errorCode: 'ECONNRESET',
      record: {
        code: '482913',
        patternName: 'labeled_code',
        subject: 'Your login',
      },
      messages: [
        {
          sourceMessageId: 'msg-1',
          arrivedAt: new Date('2026-01-01T00:00:00.000Z'),
        },
      ],
    });

    expect(payload).toEqual({
      event: 'scan_record_created',
      mailboxFingerprint: 'abc123',
      mailboxAddress: '[REDACTED]',
      statusCode: 200,
      errorCode: 'ECONNRESET',
      record: {
        code: '[REDACTED]',
        patternName: 'labeled_code',
        subject: '[REDACTED]',
      },
      messages: [
        {
          sourceMessageId: '[REDACTED]',
          arrivedAt: '2026-01-01T00:00:00.000Z',
        },
      ],
    });
  });

  it('marks circular references instead of recursing', () => {
    const looped: Record<string, unknown> = { event: 'loop' };
    looped.self = looped;

    expect(redactStructuredLogPayload({ wrapper: looped })).toEqual({
      wrapper: { event: 'loop', self: '[CIRCULAR]' },
    });
  });

  it('preserves provided correlation id and generates fallback when absent', () => {
    expect(resolveCorrelationId('run-abc')).toBe('run-abc');
    expect(resolveCorrelationId([' run-array '])).toBe('run-array');
    expect(resolveCorrelationId(undefined)).toMatch(
      /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i,
    );
  });

  it('truncates long strings during serialization', () => {
    const parsed = JSON.parse(
      serializeStructuredLog({
        event: 'long_text',
        detail: 'x'.repeat(600),
      }),
    ) as Record<string, string>;

    expect(parsed.detail).toBe(`${'x'.repeat(512)}...[truncated:88]`);
  });

  it('fingerprints addresses case-insensitively', () => {
    const fingerprintA = fingerprintIdentifier('A@x.test');
    const fingerprintB = fingerprintIdentifier(' a@x.test ');
    const fingerprintC = fingerprintIdentifier('b@x.test');

    expect(fingerprintA).toHaveLength(16);
    expect(fingerprintA).toBe(fingerprintB);
    expect(fingerprintA).not.toBe(fingerprintC);
  });

  it('describes errors, strings and plain values', () => {
    expect(describeUnknownError(new Error('boom'))).toBe('boom');
    expect(describeUnknownError('plain')).toBe('plain');
    expect(describeUnknownError({ status: 503 })).toBe('{"status":503}');
  });
});
