/**
 * Typed runtime configuration for mailbox provisioning, scanning, caching
 * and scheduling. Numeric values are clamped to their allowed range.
 */
import {
  resolveBooleanEnv,
  resolveCsvEnv,
  resolveIntegerEnv,
  resolveStringEnv,
} from '../common/env/env.util';

export const TEMPMAIL_CONFIG = Symbol('TEMPMAIL_CONFIG');

export type MailAdminProvider = 'GENERIC' | 'MAILU';
export type MailAdminTokenHeader = 'authorization' | 'x-api-key';

export const EXPIRY_GRACE_SAFETY_FACTOR = 4;
export const SCAN_LEASE_TIMEOUT_MULTIPLIER = 3;

export interface RemoteRetryPolicy {
  maxAttempts: number;
  backoffMs: number;
  jitterMs: number;
}

export interface TempMailConfig {
  mailbox: {
    defaultDomain: string;
    allowedDomains: string[];
    defaultTtlSeconds: number;
    minTtlSeconds: number;
    maxTtlSeconds: number;
  };
  mailAdmin: {
    provider: MailAdminProvider;
    adminApiBaseUrls: string[];
    messageApiBaseUrl: string;
    apiToken: string;
    tokenHeader: MailAdminTokenHeader;
    timeoutMs: number;
  };
  remoteRetry: RemoteRetryPolicy;
  scan: {
    intervalMs: number;
    leaseMs: number;
    maxLeaseRenewals: number;
    concurrency: number;
    maxMailboxesPerRun: number;
    messageLimit: number;
  };
  cache: {
    codeTtlSeconds: number;
    metaTtlSeconds: number;
    statsTtlSeconds: number;
  };
  lifecycle: {
    expiryGraceMs: number;
    cleanupRetentionMs: number;
  };
  scheduler: {
    enabled: boolean;
    scanAllIntervalMs: number;
    dataSyncIntervalMs: number;
    statsRefreshIntervalMs: number;
    cleanupIntervalMs: number;
  };
  redisUrl: string;
}

function normalizeBaseUrl(rawUrl: string): string {
  return rawUrl.trim().replace(/\/+$/, '');
}

function resolveProvider(rawValue: string | undefined): MailAdminProvider {
  const normalized = String(rawValue ?? '')
    .trim()
    .toUpperCase();
  return normalized === 'MAILU' ? 'MAILU' : 'GENERIC';
}

function resolveTokenHeader(
  rawValue: string | undefined,
): MailAdminTokenHeader {
  const normalized = String(rawValue ?? '')
    .trim()
    .toLowerCase();
  return normalized === 'x-api-key' ? 'x-api-key' : 'authorization';
}

function resolveAdminApiBaseUrls(env: NodeJS.ProcessEnv): string[] {
  const fromList = resolveCsvEnv(env.TEMPMAIL_MAIL_ADMIN_API_URLS, [])
    .map(normalizeBaseUrl)
    .filter(Boolean);
  if (fromList.length) return Array.from(new Set(fromList));
  const single = normalizeBaseUrl(env.TEMPMAIL_MAIL_ADMIN_API_URL || '');
  return single ? [single] : [];
}

export function resolveTempMailConfig(env: NodeJS.ProcessEnv): TempMailConfig {
  const defaultDomain = resolveStringEnv(
    env.TEMPMAIL_DEFAULT_DOMAIN,
    'tempmail.local',
  ).toLowerCase();
  const allowedDomains = resolveCsvEnv(env.TEMPMAIL_ALLOWED_DOMAINS, [
    defaultDomain,
  ]).map((domain) => domain.toLowerCase());
  const minTtlSeconds = resolveIntegerEnv({
    rawValue: env.TEMPMAIL_MIN_TTL_SECONDS,
    fallbackValue: 300,
    minimumValue: 60,
    maximumValue: 86_400,
  });
  const maxTtlSeconds = resolveIntegerEnv({
    rawValue: env.TEMPMAIL_MAX_TTL_SECONDS,
    fallbackValue: 7 * 86_400,
    minimumValue: minTtlSeconds,
    maximumValue: 30 * 86_400,
  });
  const adminApiBaseUrls = resolveAdminApiBaseUrls(env);
  const timeoutMs = resolveIntegerEnv({
    rawValue: env.TEMPMAIL_MAIL_ADMIN_API_TIMEOUT_MS,
    fallbackValue: 10_000,
    minimumValue: 500,
    maximumValue: 60_000,
  });
  const scanIntervalMs =
    resolveIntegerEnv({
      rawValue: env.TEMPMAIL_SCAN_INTERVAL_SECONDS,
      fallbackValue: 30,
      minimumValue: 5,
      maximumValue: 3_600,
    }) * 1000;

  return {
    mailbox: {
      defaultDomain,
      allowedDomains: allowedDomains.includes(defaultDomain)
        ? allowedDomains
        : [defaultDomain, ...allowedDomains],
      defaultTtlSeconds: resolveIntegerEnv({
        rawValue: env.TEMPMAIL_DEFAULT_TTL_SECONDS,
        fallbackValue: 86_400,
        minimumValue: minTtlSeconds,
        maximumValue: maxTtlSeconds,
      }),
      minTtlSeconds,
      maxTtlSeconds,
    },
    mailAdmin: {
      provider: resolveProvider(env.TEMPMAIL_MAIL_ADMIN_PROVIDER),
      adminApiBaseUrls,
      messageApiBaseUrl:
        normalizeBaseUrl(env.TEMPMAIL_MESSAGE_API_URL || '') ||
        adminApiBaseUrls[0] ||
        '',
      apiToken: String(env.TEMPMAIL_MAIL_ADMIN_API_TOKEN || '').trim(),
      tokenHeader: resolveTokenHeader(env.TEMPMAIL_MAIL_ADMIN_API_TOKEN_HEADER),
      timeoutMs,
    },
    remoteRetry: {
      maxAttempts: resolveIntegerEnv({
        rawValue: env.TEMPMAIL_REMOTE_MAX_ATTEMPTS,
        fallbackValue: 3,
        minimumValue: 1,
        maximumValue: 8,
      }),
      backoffMs: resolveIntegerEnv({
        rawValue: env.TEMPMAIL_REMOTE_RETRY_BACKOFF_MS,
        fallbackValue: 500,
        minimumValue: 0,
        maximumValue: 30_000,
      }),
      jitterMs: resolveIntegerEnv({
        rawValue: env.TEMPMAIL_REMOTE_RETRY_JITTER_MS,
        fallbackValue: 150,
        minimumValue: 0,
        maximumValue: 10_000,
      }),
    },
    scan: {
      intervalMs: scanIntervalMs,
      leaseMs: timeoutMs * SCAN_LEASE_TIMEOUT_MULTIPLIER,
      maxLeaseRenewals: resolveIntegerEnv({
        rawValue: env.TEMPMAIL_SCAN_MAX_LEASE_RENEWALS,
        fallbackValue: 1,
        minimumValue: 0,
        maximumValue: 5,
      }),
      concurrency: resolveIntegerEnv({
        rawValue: env.TEMPMAIL_SCAN_CONCURRENCY,
        fallbackValue: 5,
        minimumValue: 1,
        maximumValue: 64,
      }),
      maxMailboxesPerRun: resolveIntegerEnv({
        rawValue: env.TEMPMAIL_SCAN_MAX_MAILBOXES_PER_RUN,
        fallbackValue: 500,
        minimumValue: 1,
        maximumValue: 10_000,
      }),
      messageLimit: resolveIntegerEnv({
        rawValue: env.TEMPMAIL_SCAN_MESSAGE_LIMIT,
        fallbackValue: 25,
        minimumValue: 1,
        maximumValue: 200,
      }),
    },
    cache: {
      codeTtlSeconds: resolveIntegerEnv({
        rawValue: env.TEMPMAIL_CODE_CACHE_TTL_SECONDS,
        fallbackValue: 3_600,
        minimumValue: 30,
        maximumValue: 86_400,
      }),
      metaTtlSeconds: resolveIntegerEnv({
        rawValue: env.TEMPMAIL_META_CACHE_TTL_SECONDS,
        fallbackValue: 86_400,
        minimumValue: 30,
        maximumValue: 7 * 86_400,
      }),
      statsTtlSeconds: resolveIntegerEnv({
        rawValue: env.TEMPMAIL_STATS_CACHE_TTL_SECONDS,
        fallbackValue: 600,
        minimumValue: 30,
        maximumValue: 86_400,
      }),
    },
    lifecycle: {
      expiryGraceMs:
        resolveIntegerEnv({
          rawValue: env.TEMPMAIL_EXPIRY_GRACE_SECONDS,
          fallbackValue:
            (scanIntervalMs / 1000) * EXPIRY_GRACE_SAFETY_FACTOR,
          minimumValue: 0,
          maximumValue: 7 * 86_400,
        }) * 1000,
      cleanupRetentionMs:
        resolveIntegerEnv({
          rawValue: env.TEMPMAIL_CLEANUP_RETENTION_HOURS,
          fallbackValue: 0,
          minimumValue: 0,
          maximumValue: 24 * 365,
        }) * 3_600_000,
    },
    scheduler: {
      enabled: resolveBooleanEnv(env.TEMPMAIL_SCHEDULER_ENABLED, true),
      scanAllIntervalMs: scanIntervalMs,
      dataSyncIntervalMs:
        resolveIntegerEnv({
          rawValue: env.TEMPMAIL_DATA_SYNC_INTERVAL_SECONDS,
          fallbackValue: 300,
          minimumValue: 30,
          maximumValue: 86_400,
        }) * 1000,
      statsRefreshIntervalMs:
        resolveIntegerEnv({
          rawValue: env.TEMPMAIL_STATS_REFRESH_INTERVAL_SECONDS,
          fallbackValue: 300,
          minimumValue: 30,
          maximumValue: 86_400,
        }) * 1000,
      cleanupIntervalMs:
        resolveIntegerEnv({
          rawValue: env.TEMPMAIL_CLEANUP_INTERVAL_SECONDS,
          fallbackValue: 86_400,
          minimumValue: 60,
          maximumValue: 7 * 86_400,
        }) * 1000,
    },
    redisUrl: resolveStringEnv(env.REDIS_URL, 'redis://localhost:6379'),
  };
}
