import { CachedMailboxMeta } from '../cache/verification-cache.types';
import { Mailbox } from './entities/mailbox.entity';

export function toCachedMailboxMeta(mailbox: Mailbox): CachedMailboxMeta {
  return {
    mailboxId: mailbox.id,
    address: mailbox.address,
    domain: mailbox.domain,
    status: mailbox.status,
    createdAt: mailbox.createdAt.toISOString(),
    expiresAt: mailbox.expiresAt.toISOString(),
  };
}
