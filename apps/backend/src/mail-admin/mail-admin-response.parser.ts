import { MessageRef, RawMessage, RemoteMailbox } from './mail-admin.types';

type UnknownRecord = Record<string, unknown>;

function isRecord(value: unknown): value is UnknownRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(record: UnknownRecord, keys: string[]): string | null {
  for (const key of keys) {
    const candidate = record[key];
    if (typeof candidate === 'string' && candidate.trim()) {
      return candidate;
    }
    if (typeof candidate === 'number' && Number.isFinite(candidate)) {
      return String(candidate);
    }
  }
  return null;
}

function readDate(record: UnknownRecord, keys: string[]): Date | null {
  for (const key of keys) {
    const candidate = record[key];
    if (typeof candidate !== 'string' && typeof candidate !== 'number') {
      continue;
    }
    const parsed = new Date(candidate);
    if (!Number.isNaN(parsed.getTime())) return parsed;
  }
  return null;
}

/** Accepts a bare array or the usual `messages` / `items` / `value` wrappers. */
export function resolveCollection(rawData: unknown, keys: string[]): unknown[] {
  if (Array.isArray(rawData)) return rawData;
  if (!isRecord(rawData)) return [];
  for (const key of keys) {
    const candidate = rawData[key];
    if (Array.isArray(candidate)) return candidate;
  }
  return [];
}

export function parseRemoteMailboxes(rawData: unknown): RemoteMailbox[] {
  const entries = resolveCollection(rawData, ['mailboxes', 'users', 'items', 'value']);
  const mailboxes: RemoteMailbox[] = [];
  for (const entry of entries) {
    if (typeof entry === 'string' && entry.includes('@')) {
      mailboxes.push({ address: entry.trim().toLowerCase(), enabled: true });
      continue;
    }
    if (!isRecord(entry)) continue;
    const address = readString(entry, ['email', 'address']);
    if (!address) continue;
    mailboxes.push({
      address: address.trim().toLowerCase(),
      enabled: entry.enabled !== false,
    });
  }
  return mailboxes;
}

export function parseMessageRefs(rawData: unknown): MessageRef[] {
  const entries = resolveCollection(rawData, ['messages', 'items', 'value']);
  const refs: MessageRef[] = [];
  for (const entry of entries) {
    if (!isRecord(entry)) continue;
    const id = readString(entry, ['id', 'messageId']);
    const arrivedAt = readDate(entry, ['receivedAt', 'arrivedAt', 'date']);
    if (!id || !arrivedAt) continue;
    refs.push({
      id,
      arrivedAt,
      subject: readString(entry, ['subject']),
      sender: readString(entry, ['from', 'sender']),
    });
  }
  return refs;
}

export function parseRawMessage(rawData: unknown, ref: MessageRef): RawMessage {
  const envelope = isRecord(rawData) ? rawData : {};
  const record = isRecord(envelope.message) ? envelope.message : envelope;
  return {
    id: ref.id,
    arrivedAt: readDate(record, ['receivedAt', 'arrivedAt', 'date']) ?? ref.arrivedAt,
    subject: readString(record, ['subject']) ?? ref.subject,
    sender: readString(record, ['from', 'sender']) ?? ref.sender,
    text: readString(record, ['textBody', 'text', 'body']),
    html: readString(record, ['htmlBody', 'html']),
  };
}
